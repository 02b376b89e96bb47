import * as path from "node:path";

export const PID_FILE_EXTENSION = ".pid";

/**
 * Path of the running program's entry script, or of the node binary when
 * there is none (e.g. a REPL).
 */
export function getProgramPath(): string {
    return process.argv[1] ?? process.execPath;
}

/**
 * Default pid file for a program: its own file name with `.pid` appended,
 * next to the program itself. `/srv/app/server.js` → `/srv/app/server.js.pid`.
 */
export function defaultPidFilePath(programPath: string = getProgramPath()): string {
    const resolved = path.resolve(programPath);
    return path.join(path.dirname(resolved), path.basename(resolved) + PID_FILE_EXTENSION);
}

/**
 * Resolve a configured pid file path. Relative paths are anchored to `baseDir`,
 * not to the working directory.
 */
export function resolvePidFilePath(value: string | undefined, programPath: string, baseDir?: string): string {
    if (value === undefined || value === "") {
        return defaultPidFilePath(programPath);
    }

    if (path.isAbsolute(value)) {
        return path.normalize(value);
    }

    const anchor = baseDir ?? path.dirname(path.resolve(programPath));
    return path.resolve(anchor, value);
}
