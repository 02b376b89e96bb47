import { getConfigHome, loadConfigOrDefaults } from "../../config/loader.js";
import { PidFile } from "../../pidfile/pid-file.js";
import { resolvePidFileOptions } from "../../runner/runner.js";

interface StatusOptions {
    file?: string;
    command?: string;
    config?: string;
}

/**
 * Status lines for a pid file: its path, then whether its process is
 * running, stale (with the recorded pid) or absent.
 */
export function describeStatus(pidFile: PidFile): string[] {
    const running = pidFile.running();
    const pid = pidFile.pid();
    const lines = [`PID file: ${pidFile.file()}`];

    if (running) {
        lines.push(`Process: running (PID: ${pid ?? "unknown, file is locked"})`);
    } else if (pid !== undefined) {
        lines.push(`Process: not running (stale PID file: ${pid})`);
    } else {
        lines.push("Process: not running");
    }

    return lines;
}

export function statusCommand(options: StatusOptions = {}): void {
    try {
        const configDir = options.config ?? getConfigHome();
        const config = loadConfigOrDefaults(configDir);
        const pidFile = new PidFile(
            resolvePidFileOptions({ file: options.file, command: options.command, configDir, config }),
        );

        try {
            console.log("=== pidguard status ===\n");
            for (const line of describeStatus(pidFile)) {
                console.log(line);
            }
        } finally {
            pidFile.dispose();
        }
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`Error: ${message}`);
        process.exit(1);
    }
}
