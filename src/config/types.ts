/**
 * Top-level pidguard configuration (maps to .pidguard.yml).
 */
export interface PidguardConfig {
    /** Pid file path; relative paths resolve against the config directory */
    file?: string;
    /** Seconds to wait between create attempts */
    sleepSeconds: number;
    /** Create attempts after the first one */
    retries: number;
    /** Maximum size of a single log file in MB before rotation (default: 10) */
    maxLogSizeMB: number;
    /** Maximum number of rotated log files to keep (default: 5) */
    maxLogFiles: number;
}

/** Default configuration values */
export const CONFIG_DEFAULTS = {
    sleepSeconds: 1,
    retries: 0,
    maxLogSizeMB: 10,
    maxLogFiles: 5,
    configFileName: ".pidguard.yml",
} as const;
