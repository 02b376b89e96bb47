import { spawn, type ChildProcess } from "node:child_process";
import * as path from "node:path";
import type { PidguardConfig } from "../config/types.js";
import type { LogSink } from "../pidfile/log.js";
import { PidFile, type PidFileOptions } from "../pidfile/pid-file.js";

export interface PidFileTarget {
    /** Pid file given on the command line; relative to the working directory */
    file?: string;
    /** Command named on the command line whose default pid file should be used */
    command?: string;
    /** Command whose default pid file is used when neither `file` nor the config names one */
    fallbackCommand?: string;
    configDir: string;
    config: PidguardConfig;
}

function commandPidFile(configDir: string, command: string): PidFileOptions {
    return { programPath: path.join(configDir, path.basename(command)) };
}

/**
 * Work out which pid file a CLI invocation refers to.
 *
 * Precedence: an explicit file (relative to cwd), an explicit command
 * (`<configDir>/<command>.pid`), the config's `file` (relative to the config
 * directory), then the fallback command's default file.
 */
export function resolvePidFileOptions(target: PidFileTarget): PidFileOptions {
    if (target.file) {
        return { file: target.file, baseDir: process.cwd() };
    }
    if (target.command) {
        return commandPidFile(target.configDir, target.command);
    }
    if (target.config.file) {
        return { file: target.config.file, baseDir: target.configDir };
    }
    if (target.fallbackCommand) {
        return commandPidFile(target.configDir, target.fallbackCommand);
    }
    throw new Error("No pid file given: pass --file, --command, or set 'file' in the config");
}

export interface RunOptions {
    command: string;
    args: string[];
    pidFile: PidFile;
    sleepSeconds: number;
    retries: number;
    logger: LogSink;
}

export interface RunResult {
    /** False when the pid file could not be created and the command never ran */
    started: boolean;
    exitCode: number | null;
    signal: NodeJS.Signals | null;
}

const FORWARDED_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM", "SIGHUP"];

function waitForExit(child: ChildProcess): Promise<{ code: number | null; signal: NodeJS.Signals | null }> {
    return new Promise((resolve, reject) => {
        child.once("error", reject);
        child.once("exit", (code, signal) => resolve({ code, signal }));
    });
}

/**
 * Run a command as the only instance holding `pidFile`.
 *
 * The pid file is created (with retries), armed, and disposed when the
 * command exits or fails to start. Termination signals received meanwhile
 * are passed on to the command.
 */
export async function runExclusive(options: RunOptions): Promise<RunResult> {
    const { pidFile, logger } = options;
    const file = pidFile.file();

    const created = await pidFile.create({ sleepSeconds: options.sleepSeconds, retries: options.retries });
    if (!created) {
        const holder = pidFile.pid();
        logger.warn(`Another instance holds ${file}${holder !== undefined ? ` (PID: ${holder})` : ""}`);
        pidFile.dispose();
        return { started: false, exitCode: null, signal: null };
    }

    pidFile.armSelfCleanup();
    logger.info(`Pid file ${file} created (PID: ${process.pid})`);

    const forward = (signal: NodeJS.Signals): void => {
        logger.info(`Forwarding ${signal} to ${options.command}`);
        child.kill(signal);
    };

    const child = spawn(options.command, options.args, { stdio: "inherit", windowsHide: true });
    for (const signal of FORWARDED_SIGNALS) {
        process.on(signal, forward);
    }

    try {
        const { code, signal } = await waitForExit(child);
        logger.info(`${options.command} exited (code: ${code ?? "none"}, signal: ${signal ?? "none"})`);
        return { started: true, exitCode: code, signal };
    } finally {
        for (const signal of FORWARDED_SIGNALS) {
            process.off(signal, forward);
        }
        pidFile.dispose();
        logger.info(`Pid file ${file} released`);
    }
}
