#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import { initCommand } from "./commands/init.js";
import { runCommand } from "./commands/run.js";
import { statusCommand } from "./commands/status.js";
import { removeCommand } from "./commands/remove.js";

function parseCount(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new InvalidArgumentError("Must be a non-negative integer.");
    }
    return parsed;
}

function parseSeconds(value: string): number {
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed < 0) {
        throw new InvalidArgumentError("Must be a non-negative number of seconds.");
    }
    return parsed;
}

const program = new Command();

program
    .name("pidguard")
    .description("Run commands as a single instance, guarded by a PID file")
    .version("0.1.0")
    .enablePositionalOptions();

program
    .command("init")
    .description("Create a .pidguard.yml configuration file in ~/.pidguard")
    .option("--config <dir>", "Directory to write the config file to (defaults to ~/.pidguard)")
    .action(initCommand);

program
    .command("run")
    .description("Run a command unless another instance already holds its PID file")
    .argument("<command>", "Command to run")
    .argument("[args...]", "Arguments passed to the command")
    .option("--file <path>", "PID file to hold (defaults to the config's file, else <config dir>/<command>.pid)")
    .option("--retries <n>", "Attempts after the first one before giving up", parseCount)
    .option("--sleep <seconds>", "Seconds to wait between attempts", parseSeconds)
    .option("--config <dir>", "Directory containing the config file (defaults to ~/.pidguard)")
    .passThroughOptions()
    .action(runCommand);

program
    .command("status")
    .description("Show whether the process recorded in a PID file is running")
    .option("--file <path>", "PID file to inspect")
    .option("--command <name>", "Inspect <config dir>/<name>.pid; takes precedence over the config's file")
    .option("--config <dir>", "Directory containing the config file (defaults to ~/.pidguard)")
    .action(statusCommand);

program
    .command("remove")
    .description("Remove a stale PID file")
    .option("--file <path>", "PID file to remove")
    .option("--command <name>", "Remove <config dir>/<name>.pid; takes precedence over the config's file")
    .option("--force", "Remove the file even if its process is still running")
    .option("--config <dir>", "Directory containing the config file (defaults to ~/.pidguard)")
    .action(removeCommand);

await program.parseAsync();
