import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import * as yaml from "yaml";
import type { PidguardConfig } from "./types.js";
import { CONFIG_DEFAULTS } from "./types.js";

/**
 * Returns the pidguard config home directory: $PIDGUARD_HOME or ~/.pidguard
 * This is where the default config file, logs and command pid files are stored.
 */
export function getConfigHome(): string {
    return process.env.PIDGUARD_HOME ?? path.join(os.homedir(), ".pidguard");
}

function field(raw: object, key: string): unknown {
    return Reflect.get(raw, key);
}

/**
 * Validate a loaded configuration object. Throws on invalid config.
 */
export function validateConfig(config: unknown): PidguardConfig {
    // An empty YAML document parses to null; every key is optional
    if (config === null || config === undefined) {
        return validateConfig({});
    }

    if (typeof config !== "object" || Array.isArray(config)) {
        throw new Error("Configuration must be a YAML object");
    }

    const rawSleep = field(config, "sleepSeconds");
    const sleepSeconds = typeof rawSleep === "number" ? rawSleep : CONFIG_DEFAULTS.sleepSeconds;
    if (!Number.isFinite(sleepSeconds) || sleepSeconds < 0) {
        throw new Error("sleepSeconds must be a non-negative number");
    }

    const rawRetries = field(config, "retries");
    const retries = typeof rawRetries === "number" ? rawRetries : CONFIG_DEFAULTS.retries;
    if (retries < 0 || !Number.isInteger(retries)) {
        throw new Error("retries must be a non-negative integer");
    }

    const rawMaxLogSize = field(config, "maxLogSizeMB");
    const maxLogSizeMB = typeof rawMaxLogSize === "number" ? rawMaxLogSize : CONFIG_DEFAULTS.maxLogSizeMB;
    if (maxLogSizeMB <= 0) {
        throw new Error("maxLogSizeMB must be a positive number");
    }

    const rawMaxLogFiles = field(config, "maxLogFiles");
    const maxLogFiles = typeof rawMaxLogFiles === "number" ? rawMaxLogFiles : CONFIG_DEFAULTS.maxLogFiles;
    if (maxLogFiles <= 0 || !Number.isInteger(maxLogFiles)) {
        throw new Error("maxLogFiles must be a positive integer");
    }

    const result: PidguardConfig = { sleepSeconds, retries, maxLogSizeMB, maxLogFiles };

    const file = field(config, "file");
    if (file !== undefined && file !== null) {
        if (typeof file !== "string" || file.trim() === "") {
            throw new Error("file must be a non-empty string");
        }
        result.file = file.trim();
    }

    return result;
}

/**
 * Load and validate a pidguard config from a YAML file.
 * @param configDir Directory containing the config file (defaults to ~/.pidguard)
 */
export function loadConfig(configDir?: string): PidguardConfig {
    const dir = configDir ?? getConfigHome();
    const configPath = path.join(dir, CONFIG_DEFAULTS.configFileName);

    if (!fs.existsSync(configPath)) {
        throw new Error(`Config file not found: ${configPath}`);
    }

    const raw = fs.readFileSync(configPath, "utf-8");
    const parsed: unknown = yaml.parse(raw);
    return validateConfig(parsed);
}

/**
 * Like `loadConfig`, but a missing config file yields the defaults.
 * An invalid config file still throws.
 */
export function loadConfigOrDefaults(configDir?: string): PidguardConfig {
    const dir = configDir ?? getConfigHome();
    if (!fs.existsSync(path.join(dir, CONFIG_DEFAULTS.configFileName))) {
        return validateConfig({});
    }
    return loadConfig(dir);
}

/**
 * Write a default .pidguard.yml configuration file.
 * @param configDir Directory to write the config file to (defaults to ~/.pidguard)
 * @returns The path of the created file
 */
export function writeDefaultConfig(configDir?: string): string {
    const dir = configDir ?? getConfigHome();
    const configPath = path.join(dir, CONFIG_DEFAULTS.configFileName);

    if (fs.existsSync(configPath)) {
        throw new Error(`Config file already exists: ${configPath}`);
    }

    fs.mkdirSync(dir, { recursive: true });

    const template = [
        "# pidguard configuration",
        "",
        "# Pid file used by 'pidguard run' when --file is not given.",
        "# Relative paths resolve against this directory.",
        "# Without it, each command gets <config dir>/<command name>.pid",
        "# file: worker.pid",
        "",
        "# Seconds to wait between attempts to create the pid file",
        "sleepSeconds: 1",
        "",
        "# Attempts after the first one before giving up",
        "retries: 0",
        "",
        "# Log rotation settings (optional)",
        "# maxLogSizeMB: 10    # Max log file size in MB before rotation (default: 10)",
        "# maxLogFiles: 5      # Max number of rotated log files to keep (default: 5)",
    ].join("\n") + "\n";

    fs.writeFileSync(configPath, template, "utf-8");
    return configPath;
}
