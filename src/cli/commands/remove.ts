import { getConfigHome, loadConfigOrDefaults } from "../../config/loader.js";
import { PidFile } from "../../pidfile/pid-file.js";
import { resolvePidFileOptions } from "../../runner/runner.js";

interface RemoveOptions {
    file?: string;
    command?: string;
    config?: string;
    force?: boolean;
}

export type RemoveOutcome =
    | { removed: true; file: string }
    | { removed: false; pid: number | undefined };

/**
 * Remove a pid file left behind by a dead process. A file whose process is
 * still running (or whose lock is held) stays unless `force` is set.
 */
export function removeStalePidFile(pidFile: PidFile, force = false): RemoveOutcome {
    // The file belongs to another process, so only a stale file goes without force
    if (pidFile.running() && !force) {
        return { removed: false, pid: pidFile.pid() };
    }

    pidFile.remove({ force: true });
    return { removed: true, file: pidFile.file() };
}

export function removeCommand(options: RemoveOptions = {}): void {
    try {
        const configDir = options.config ?? getConfigHome();
        const config = loadConfigOrDefaults(configDir);
        const pidFile = new PidFile(
            resolvePidFileOptions({ file: options.file, command: options.command, configDir, config }),
        );

        try {
            const outcome = removeStalePidFile(pidFile, options.force);
            if (!outcome.removed) {
                console.error(`Error: process ${outcome.pid ?? "holding the lock"} is still running.`);
                console.error("Use --force to remove the PID file anyway.");
                process.exit(1);
            }

            console.log(`Removed PID file: ${outcome.file}`);
        } finally {
            pidFile.dispose();
        }
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`Error: ${message}`);
        process.exit(1);
    }
}
