import { PidFile, type PidFileOptions } from "./pid-file.js";

/**
 * Run `fn` with a fresh pid file and dispose of it when `fn` settles, whether
 * it returns, rejects or throws. Pair with `armSelfCleanup()` inside `fn` to
 * tie the file's lifetime to the scope.
 */
export async function withPidFile<T>(
    options: PidFileOptions,
    fn: (pidFile: PidFile) => T | Promise<T>,
): Promise<T> {
    const pidFile = new PidFile(options);
    try {
        return await fn(pidFile);
    } finally {
        pidFile.dispose();
    }
}
