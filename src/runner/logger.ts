import * as fs from "node:fs";
import * as path from "node:path";
import { getConfigHome } from "../config/loader.js";
import type { LogSink } from "../pidfile/log.js";

const DEFAULT_MAX_LOG_SIZE_MB = 10;
const DEFAULT_MAX_LOG_FILES = 5;
const LOG_BASENAME = "pidguard";

export interface LoggerOptions {
    logDir?: string;
    maxLogSizeMB?: number;
    maxLogFiles?: number;
}

/**
 * Appends timestamped lines to `<logDir>/pidguard.log`, rotating it to
 * `pidguard.1.log`, `pidguard.2.log`, ... once it reaches the size limit.
 */
export class Logger implements LogSink {
    private logDir: string;
    private logFile: string;
    private maxLogSize: number;
    private maxLogFiles: number;
    private rotationFailed = false;

    constructor(options: LoggerOptions = {}) {
        this.logDir = options.logDir ?? path.join(getConfigHome(), "logs");
        this.maxLogSize = (options.maxLogSizeMB ?? DEFAULT_MAX_LOG_SIZE_MB) * 1024 * 1024;
        this.maxLogFiles = options.maxLogFiles ?? DEFAULT_MAX_LOG_FILES;
        this.logFile = path.join(this.logDir, `${LOG_BASENAME}.log`);
        fs.mkdirSync(this.logDir, { recursive: true });
    }

    /**
     * Get the path to the current log file.
     */
    getLogFilePath(): string {
        return this.logFile;
    }

    /**
     * Write an info log message.
     */
    info(message: string): void {
        this.write("INFO", message);
    }

    /**
     * Write a warning log message.
     */
    warn(message: string): void {
        this.write("WARN", message);
    }

    /**
     * Write an error log message.
     */
    error(message: string): void {
        this.write("ERROR", message);
    }

    private write(level: string, message: string): void {
        const timestamp = new Date().toISOString();
        const line = `[${timestamp}] [${level}] ${message}\n`;

        this.rotateIfNeeded();
        fs.appendFileSync(this.logFile, line, "utf-8");
    }

    private rotateIfNeeded(): void {
        try {
            if (!fs.existsSync(this.logFile)) return;

            const stat = fs.statSync(this.logFile);
            if (stat.size < this.maxLogSize) return;

            // Shift numbered logs up, dropping the oldest
            for (let i = this.maxLogFiles - 1; i > 0; i--) {
                const from = path.join(this.logDir, `${LOG_BASENAME}.${i}.log`);
                const to = path.join(this.logDir, `${LOG_BASENAME}.${i + 1}.log`);
                if (fs.existsSync(from)) {
                    if (i + 1 >= this.maxLogFiles) {
                        fs.unlinkSync(from);
                    } else {
                        fs.renameSync(from, to);
                    }
                }
            }

            fs.renameSync(this.logFile, path.join(this.logDir, `${LOG_BASENAME}.1.log`));
        } catch (err) {
            // Keep appending to the current log
            if (!this.rotationFailed) {
                this.rotationFailed = true;
                const message = err instanceof Error ? err.message : String(err);
                process.stderr.write(`pidguard: log rotation failed: ${message}\n`);
            }
        }
    }
}
