/**
 * @tally/cli — CSV adapters and command-line runner for @tally/engine.
 */

export { runCli, VERSION } from "./cli.js";
export type { CliIo } from "./cli.js";
export { loadConfig, CliConfigSchema, OUTPUT_ORDERS, LOG_LEVELS } from "./config.js";
export type { CliConfig, OutputOrder, LogLevel } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export {
  readRecords,
  readRecordsFromFile,
  parseRow,
  indexColumns,
  RowSchema,
  RecordParseError,
  ReaderError,
} from "./reader.js";
export type { ReadResult, ReaderErrorCode } from "./reader.js";
export { renderSnapshot, orderAccounts, SNAPSHOT_HEADER } from "./writer.js";
export { processRecords, processFile } from "./run.js";
export type { RunSummary } from "./run.js";
