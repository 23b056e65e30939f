/**
 * @tally/cli — Command-line surface.
 *
 *   tally <input.csv> [--order first-seen|client] [--log-level <level>] [--log-file <path>]
 *
 * Exit codes:
 * - 0: the run completed (individual rows may have been skipped)
 * - 1: fatal error (bad options, unreadable input or log file, broken CSV)
 */

import chalk from "chalk";
import { Command, CommanderError, Option } from "commander";
import { ZodError } from "zod";
import { LOG_LEVELS, OUTPUT_ORDERS, loadConfig } from "./config.js";
import type { CliConfig } from "./config.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { processFile } from "./run.js";

export const VERSION = "0.1.0";

export interface CliIo {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
}

const processIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

interface RawOptions {
  readonly order?: string;
  readonly logLevel?: string;
  readonly logFile?: string;
}

function buildCommand(io: CliIo): Command {
  return new Command()
    .name("tally")
    .description("Apply a CSV of client transactions and print the resulting balances")
    .version(VERSION)
    .argument("<input>", "path to the transactions CSV")
    .addOption(
      new Option("--order <order>", "output row order")
        .choices(OUTPUT_ORDERS)
        .default("first-seen"),
    )
    .addOption(
      new Option("--log-level <level>", "minimum level to log")
        .choices(LOG_LEVELS)
        .default("warn"),
    )
    .option("--log-file <path>", "write logs to this file instead of stderr")
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });
}

function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

function fail(io: CliIo, error: unknown): number {
  io.stderr(`${chalk.red(`Failed to process input: ${describeError(error)}`)}\n`);
  return 1;
}

/**
 * Run the CLI with user arguments (no node/script prefix).
 * Resolves to the process exit code.
 */
export async function runCli(args: readonly string[], io: CliIo = processIo): Promise<number> {
  const command = buildCommand(io);

  try {
    command.parse([...args], { from: "user" });
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  let config: CliConfig;
  try {
    config = loadConfig({ inputPath: command.args[0], ...command.opts<RawOptions>() });
  } catch (error: unknown) {
    return fail(io, error);
  }

  let logger: Logger | undefined;
  try {
    logger = createLogger(config);
    io.stdout(await processFile(config, logger));
    return 0;
  } catch (error: unknown) {
    logger?.fatal({ err: error }, "Run failed");
    return fail(io, error);
  }
}
