/**
 * Process primitives the pid file relies on: the liveness probe and timed pauses.
 */
import { setTimeout as delay } from "node:timers/promises";

/**
 * Check whether a process with the given PID is alive.
 *
 * Sends signal 0, which only performs the existence and permission checks.
 * A process owned by another user answers with EPERM and still counts as alive.
 * PID 0 and negative values address process groups and are never probed.
 */
export function isProcessRunning(pid: number): boolean {
    if (!Number.isInteger(pid) || pid <= 0) {
        return false;
    }

    try {
        process.kill(pid, 0);
        return true;
    } catch (err) {
        return errorCode(err) === "EPERM";
    }
}

/**
 * Pause for the given number of seconds (fractions allowed).
 */
export async function sleepSeconds(seconds: number): Promise<void> {
    await delay(Math.max(0, seconds) * 1000);
}

/**
 * Read the `code` of a Node.js system error, if there is one.
 */
export function errorCode(err: unknown): string | undefined {
    if (typeof err === "object" && err !== null && "code" in err) {
        const code: unknown = err.code;
        return typeof code === "string" ? code : undefined;
    }
    return undefined;
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
