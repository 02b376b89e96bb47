/**
 * Base class for errors raised by PidFile operations.
 */
export class PidFileError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "PidFileError";
    }
}

/**
 * Why a non-forced remove or guard was refused.
 * - `not-running`: the file does not denote a live process
 * - `not-owner`: the recorded pid belongs to another process
 */
export type OwnershipFailure = "not-running" | "not-owner";

/**
 * Raised when `remove` or a guard is called on a pid file this process does not own.
 * Always a programming error on the caller's side, never a transient condition.
 */
export class OwnershipError extends PidFileError {
    readonly reason: OwnershipFailure;

    constructor(reason: OwnershipFailure, message: string) {
        super(message);
        this.name = "OwnershipError";
        this.reason = reason;
    }
}

export type OwnershipCheck = { ok: true } | { ok: false; error: OwnershipError };
