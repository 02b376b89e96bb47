export {
    PidFile,
    DEFAULT_RETRIES,
    DEFAULT_SLEEP_SECONDS,
    type PidFileOptions,
    type CreateOptions,
    type CreateAttempt,
    type CreateFailure,
    type ForceOptions,
} from "./pid-file.js";
export { GuardToken, type GuardMode, type GuardTokenOptions, type Removable } from "./guard.js";
export { PidFileError, OwnershipError, type OwnershipCheck, type OwnershipFailure } from "./errors.js";
export { FlockLocker, type FileLocker, type FlockLockerOptions } from "./lock.js";
export { ExitCleanup, exitCleanup, type CleanupCallback, type ExitCleanupOptions } from "./cleanup.js";
export { defaultPidFilePath, resolvePidFilePath, getProgramPath } from "./paths.js";
export { isProcessRunning } from "./process.js";
export { silentLogger, type LogSink } from "./log.js";
export { withPidFile } from "./scope.js";
