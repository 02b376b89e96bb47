import * as fs from "node:fs";
import { exitCleanup as defaultExitCleanup, type CleanupCallback, type ExitCleanup } from "./cleanup.js";
import { OwnershipError, PidFileError, type OwnershipCheck } from "./errors.js";
import { GuardToken } from "./guard.js";
import { FlockLocker, type FileLocker } from "./lock.js";
import { silentLogger, type LogSink } from "./log.js";
import { getProgramPath, resolvePidFilePath } from "./paths.js";
import { errorCode, errorMessage, isProcessRunning, sleepSeconds } from "./process.js";

export const DEFAULT_SLEEP_SECONDS = 1;
export const DEFAULT_RETRIES = 0;

export interface PidFileOptions {
    /** Pid file path; relative paths are anchored to `baseDir` */
    file?: string;
    /** Program the default path is derived from (defaults to the running script) */
    programPath?: string;
    /** Directory relative paths are anchored to (defaults to the program's directory) */
    baseDir?: string;
    locker?: FileLocker;
    logger?: LogSink;
    exitCleanup?: ExitCleanup;
}

export interface CreateOptions {
    /** Pause between attempts, in seconds (default: 1) */
    sleepSeconds?: number;
    /** Attempts after the first one (default: 0) */
    retries?: number;
}

export interface ForceOptions {
    /** Skip the running/ownership checks */
    force?: boolean;
}

export type CreateFailure = "running" | "locked" | "io";

export type CreateAttempt =
    | { ok: true; pid: number }
    | { ok: false; reason: CreateFailure; error?: unknown };

/**
 * Everything needed to release the file without the PidFile object, so the
 * exit and finalization hooks can hold it without keeping the PidFile alive.
 */
interface Claim {
    file: string | undefined;
    /** Write handle from a successful create; holds the lock while open */
    fd: number | undefined;
    pid: number | undefined;
    selfGuarded: boolean;
    locker: FileLocker;
    logger: LogSink;
}

interface HeldClaim {
    claim: Claim;
    onExit: CleanupCallback;
    exitCleanup: ExitCleanup;
}

const PID_PATTERN = /^\d+\n?$/;

function parsePid(content: string): number | undefined {
    return PID_PATTERN.test(content) ? Number.parseInt(content, 10) : undefined;
}

function closeQuietly(fd: number, logger: LogSink): void {
    try {
        fs.closeSync(fd);
    } catch (err) {
        logger.warn(`Failed to close pid file descriptor ${fd}: ${errorMessage(err)}`);
    }
}

function ownsClaim(claim: Claim): boolean {
    return claim.selfGuarded && claim.pid === process.pid;
}

function releaseClaim(claim: Claim, unlink: boolean): void {
    if (unlink && claim.file !== undefined) {
        try {
            fs.unlinkSync(claim.file);
        } catch (err) {
            if (errorCode(err) !== "ENOENT") {
                claim.logger.warn(`Failed to remove pid file ${claim.file}: ${errorMessage(err)}`);
            }
        }
        claim.pid = undefined;
    }

    if (claim.fd !== undefined) {
        const fd = claim.fd;
        claim.fd = undefined;
        claim.locker.unlock(fd);
        closeQuietly(fd, claim.logger);
    }

    claim.selfGuarded = false;
}

// A PidFile dropped without dispose(): close its handle, and remove the file if it was armed.
const finalizer = new FinalizationRegistry<HeldClaim>((held) => {
    held.exitCleanup.delete(held.onExit);
    releaseClaim(held.claim, ownsClaim(held.claim));
});

/**
 * A pid file guarding against a second running instance.
 *
 * Mutual exclusion comes from an exclusive advisory lock held on the write
 * handle for as long as this object owns the file; the pid inside the file
 * lets a stale file left by a dead process be recognised and replaced.
 *
 * @example
 * const pidFile = new PidFile({ file: "/var/run/worker.pid" });
 * if (await pidFile.create({ retries: 5, sleepSeconds: 2 })) {
 *     pidFile.armSelfCleanup();
 *     try {
 *         await work();
 *     } finally {
 *         pidFile.dispose();
 *     }
 * }
 */
export class PidFile {
    private claim: Claim;
    private programPath: string;
    private baseDir: string | undefined;
    private configured: string | undefined;
    private exitCleanup: ExitCleanup;
    private onExit: CleanupCallback;
    private disposed = false;

    constructor(options: PidFileOptions = {}) {
        this.configured = options.file;
        this.programPath = options.programPath ?? getProgramPath();
        this.baseDir = options.baseDir;
        this.exitCleanup = options.exitCleanup ?? defaultExitCleanup;

        const logger = options.logger ?? silentLogger;
        const claim: Claim = {
            file: undefined,
            fd: undefined,
            pid: undefined,
            selfGuarded: false,
            locker: options.locker ?? new FlockLocker({ logger }),
            logger,
        };
        this.claim = claim;
        this.onExit = () => {
            if (ownsClaim(claim)) releaseClaim(claim, true);
        };

        finalizer.register(this, { claim, onExit: this.onExit, exitCleanup: this.exitCleanup }, this);
    }

    /**
     * Get the pid file path, or set it before the file is created.
     */
    file(newValue?: string): string {
        if (newValue !== undefined && newValue !== "") {
            if (this.claim.fd !== undefined) {
                throw new PidFileError(`Cannot move a pid file while holding its lock: ${this.claim.file ?? newValue}`);
            }
            this.configured = newValue;
            this.claim.file = undefined;
        }

        if (this.claim.file === undefined) {
            this.claim.file = resolvePidFilePath(this.configured, this.programPath, this.baseDir);
        }

        return this.claim.file;
    }

    /**
     * The pid last written to or read from the file by this object.
     */
    pid(): number | undefined {
        return this.claim.pid;
    }

    /**
     * Whether the file denotes a live process.
     *
     * A file locked by someone else counts as running without being read.
     * Otherwise the recorded pid is read and probed.
     */
    running(): boolean {
        const file = this.file();

        let fd: number;
        try {
            fd = fs.openSync(file, "r+");
        } catch {
            this.claim.pid = undefined;
            return false;
        }

        try {
            if (!this.claim.locker.tryLock(fd)) {
                return true;
            }
            // Unparseable content clears the pid: pid() always matches what the file holds
            this.claim.pid = parsePid(fs.readFileSync(fd, "utf-8"));
        } catch (err) {
            this.claim.logger.warn(`Failed to read pid file ${file}: ${errorMessage(err)}`);
            this.claim.pid = undefined;
        } finally {
            closeQuietly(fd, this.claim.logger);
        }

        return this.claim.pid !== undefined && isProcessRunning(this.claim.pid);
    }

    /**
     * Make a single attempt to create the file, lock it and write our pid.
     * On success the write handle stays open, keeping the lock, until `remove()` or `dispose()`.
     */
    attempt(): CreateAttempt {
        this.assertNotDisposed();

        if (this.running()) {
            return { ok: false, reason: "running" };
        }

        let fd: number;
        try {
            fd = fs.openSync(this.file(), "w");
        } catch (err) {
            return { ok: false, reason: "io", error: err };
        }

        if (!this.claim.locker.tryLock(fd)) {
            closeQuietly(fd, this.claim.logger);
            return { ok: false, reason: "locked" };
        }

        try {
            fs.writeSync(fd, String(process.pid));
        } catch (err) {
            closeQuietly(fd, this.claim.logger);
            return { ok: false, reason: "io", error: err };
        }

        this.claim.fd = fd;
        this.claim.pid = process.pid;
        return { ok: true, pid: process.pid };
    }

    /**
     * Create the pid file, retrying `retries` times with `sleepSeconds` between attempts.
     * Resolves to false when every attempt failed; never rejects on contention.
     * @throws PidFileError for a negative or fractional `retries` or a non-finite `sleepSeconds`
     */
    async create(options: CreateOptions = {}): Promise<boolean> {
        const sleep = options.sleepSeconds ?? DEFAULT_SLEEP_SECONDS;
        const retries = options.retries ?? DEFAULT_RETRIES;

        if (!Number.isInteger(retries) || retries < 0) {
            throw new PidFileError(`retries must be a non-negative integer, got ${retries}`);
        }
        if (!Number.isFinite(sleep) || sleep < 0) {
            throw new PidFileError(`sleepSeconds must be a non-negative number, got ${sleep}`);
        }

        let attempts = 0;

        for (;;) {
            const result = this.attempt();
            if (result.ok) return true;

            attempts++;
            if (attempts > retries) return false;

            this.claim.logger.info(
                `Pid file ${this.file()} unavailable (${result.reason}), retry ${attempts}/${retries} in ${sleep}s`,
            );
            await sleepSeconds(sleep);
        }
    }

    /**
     * Check the precondition of a non-forced `remove` or guard: the file must
     * denote a live process, and any recorded pid must be ours.
     */
    checkOwnership(operation: "remove" | "guard" = "remove"): OwnershipCheck {
        if (!this.running()) {
            const message =
                operation === "remove"
                    ? "Unable to remove file for non-running process"
                    : "No running process to guard against";
            return { ok: false, error: new OwnershipError("not-running", message) };
        }

        const pid = this.claim.pid;
        if (pid !== undefined && pid !== 0 && pid !== process.pid) {
            const message =
                operation === "remove"
                    ? "Cannot remove pid file that wasn't created by this process"
                    : "Unable to guard file not owned by this process";
            return { ok: false, error: new OwnershipError("not-owner", message) };
        }

        return { ok: true };
    }

    /**
     * Delete the pid file and release its lock.
     * @throws OwnershipError when not forced and the file is not ours to remove
     */
    remove(options: ForceOptions = {}): this {
        if (!options.force) {
            this.assertOwnership("remove");
        }

        this.file();
        releaseClaim(this.claim, true);
        this.exitCleanup.delete(this.onExit);
        return this;
    }

    /**
     * Remove the file when this object is disposed or the process exits,
     * unless `remove()` runs first.
     * @throws OwnershipError when not forced and the file is not ours to guard
     */
    armSelfCleanup(options: ForceOptions = {}): void {
        this.assertNotDisposed();
        if (!options.force) {
            this.assertOwnership("guard");
        }

        this.claim.selfGuarded = true;
        this.exitCleanup.add(this.onExit);
    }

    /**
     * Hand cleanup to a separate token: disposing the token calls `remove()`,
     * whenever this object itself goes away.
     * @throws OwnershipError when not forced and the file is not ours to guard
     */
    detachGuardToken(options: ForceOptions = {}): GuardToken {
        this.assertNotDisposed();
        if (!options.force) {
            this.assertOwnership("guard");
        }

        return new GuardToken(this, "remove", { logger: this.claim.logger, exitCleanup: this.exitCleanup });
    }

    /**
     * End of this object's life. Runs armed self-cleanup and closes the lock
     * handle. Never throws; safe to call more than once.
     */
    dispose(): void {
        if (this.disposed) return;
        this.disposed = true;
        finalizer.unregister(this);

        if (this.claim.selfGuarded) {
            try {
                this.remove();
            } catch (err) {
                this.claim.logger.warn(`Pid file cleanup failed: ${errorMessage(err)}`);
            }
        }

        this.exitCleanup.delete(this.onExit);
        releaseClaim(this.claim, false);
    }

    private assertOwnership(operation: "remove" | "guard"): void {
        const check = this.checkOwnership(operation);
        if (!check.ok) {
            throw check.error;
        }
    }

    private assertNotDisposed(): void {
        if (this.disposed) {
            throw new PidFileError(`Pid file ${this.file()} has been disposed`);
        }
    }
}
