export * from "./pidfile/index.js";
export { loadConfig, loadConfigOrDefaults, writeDefaultConfig, validateConfig, getConfigHome } from "./config/loader.js";
export type { PidguardConfig } from "./config/types.js";
export { Logger, runExclusive, resolvePidFileOptions } from "./runner/index.js";
export type { LoggerOptions, RunOptions, RunResult, PidFileTarget } from "./runner/index.js";
