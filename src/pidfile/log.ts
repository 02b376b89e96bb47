/**
 * Destination for the messages the pid file emits on best-effort failures.
 * The runner's rotating `Logger` satisfies this interface.
 */
export interface LogSink {
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export const silentLogger: LogSink = {
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
};
