/**
 * @tally/cli — Structured logging.
 *
 * JSON lines via pino, to a log file when one is configured and to
 * stderr otherwise. stdout is reserved for the snapshot.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { CliConfig } from "./config.js";

export type { Logger };

const STDERR_FD = 2;

export function createLogger(config: Pick<CliConfig, "logLevel" | "logFile">): Logger {
  const destination = pino.destination({
    dest: config.logFile ?? STDERR_FD,
    sync: true,
    mkdir: config.logFile !== undefined,
  });

  return pino({ name: "tally", level: config.logLevel }, destination);
}

/** A logger that drops everything. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
