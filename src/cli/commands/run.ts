import * as path from "node:path";
import { getConfigHome, loadConfigOrDefaults } from "../../config/loader.js";
import { PidFile } from "../../pidfile/pid-file.js";
import { Logger } from "../../runner/logger.js";
import { resolvePidFileOptions, runExclusive } from "../../runner/runner.js";

interface RunCommandOptions {
    file?: string;
    config?: string;
    retries?: number;
    sleep?: number;
}

export async function runCommand(command: string, args: string[], options: RunCommandOptions): Promise<void> {
    try {
        const configDir = options.config ?? getConfigHome();
        const config = loadConfigOrDefaults(configDir);
        const logger = new Logger({
            logDir: path.join(configDir, "logs"),
            maxLogSizeMB: config.maxLogSizeMB,
            maxLogFiles: config.maxLogFiles,
        });

        const pidFile = new PidFile({
            ...resolvePidFileOptions({ file: options.file, fallbackCommand: command, configDir, config }),
            logger,
        });

        const result = await runExclusive({
            command,
            args,
            pidFile,
            sleepSeconds: options.sleep ?? config.sleepSeconds,
            retries: options.retries ?? config.retries,
            logger,
        });

        if (!result.started) {
            const holder = pidFile.pid();
            console.error(
                `Error: ${command} is already running${holder !== undefined ? ` (PID: ${holder})` : ""}.`,
            );
            console.error(`PID file: ${pidFile.file()}`);
            process.exit(1);
        }

        if (result.signal !== null) {
            // Die the way the command did
            process.kill(process.pid, result.signal);
            return;
        }
        process.exit(result.exitCode ?? 1);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`Error: ${message}`);
        process.exit(1);
    }
}
