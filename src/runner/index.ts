export { Logger, type LoggerOptions } from "./logger.js";
export { runExclusive, resolvePidFileOptions, type RunOptions, type RunResult, type PidFileTarget } from "./runner.js";
