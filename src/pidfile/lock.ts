import { spawnSync } from "node:child_process";
import { silentLogger, type LogSink } from "./log.js";

/**
 * Advisory, exclusive, non-blocking lock on an open file descriptor.
 *
 * The lock belongs to the open file description: closing the descriptor
 * releases it, and a second descriptor opened on the same path (even in
 * this process) cannot take it while the first is open.
 */
export interface FileLocker {
    /** Try to take the lock without waiting. Returns false if another holder has it. */
    tryLock(fd: number): boolean;
    /** Release a lock previously taken on `fd`. */
    unlock(fd: number): void;
}

export interface FlockLockerOptions {
    /** flock(1) executable (defaults to `flock` on the PATH) */
    command?: string;
    logger?: LogSink;
}

/**
 * Locks through the flock(1) utility.
 *
 * The descriptor is handed to the child as stdio[3]; flock(1) locks it, and
 * because both processes share the file description the lock survives the
 * child's exit and lasts until our descriptor is closed.
 *
 * Without flock(1) (Windows, minimal images) locking degrades to a no-op that
 * always succeeds, and the pid file falls back on the liveness probe alone.
 */
export class FlockLocker implements FileLocker {
    private command: string;
    private logger: LogSink;
    private unavailable = false;

    constructor(options: FlockLockerOptions = {}) {
        this.command = options.command ?? "flock";
        this.logger = options.logger ?? silentLogger;
    }

    tryLock(fd: number): boolean {
        if (this.unavailable) return true;

        const result = spawnSync(this.command, ["--exclusive", "--nonblock", "3"], {
            stdio: ["ignore", "ignore", "pipe", fd],
            windowsHide: true,
        });

        if (result.error) {
            this.unavailable = true;
            this.logger.warn(`${this.command} not available, proceeding without file locks: ${result.error.message}`);
            return true;
        }

        return result.status === 0;
    }

    unlock(fd: number): void {
        if (this.unavailable) return;

        const result = spawnSync(this.command, ["--unlock", "3"], {
            stdio: ["ignore", "ignore", "pipe", fd],
            windowsHide: true,
        });

        if (result.error || result.status !== 0) {
            // Closing the descriptor releases the lock regardless
            this.logger.warn(`Failed to unlock descriptor ${fd}; it is released on close`);
        }
    }
}
