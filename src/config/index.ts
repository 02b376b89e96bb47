export { loadConfig, loadConfigOrDefaults, writeDefaultConfig, validateConfig, getConfigHome } from "./loader.js";
export type { PidguardConfig } from "./types.js";
export { CONFIG_DEFAULTS } from "./types.js";
