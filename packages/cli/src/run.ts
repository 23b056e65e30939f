/**
 * @tally/cli — Run pipeline.
 *
 * Reader → Processor → Writer. Rejected and malformed rows are logged
 * and skipped; they never reach the output and never fail the run.
 * Fatal errors (unreadable input, broken CSV) propagate.
 */

import { Processor, Store } from "@tally/engine";
import type { AccountSnapshot, ProcessorStats } from "@tally/engine";
import type { CliConfig } from "./config.js";
import type { Logger } from "./logger.js";
import type { ReadResult } from "./reader.js";
import { readRecordsFromFile } from "./reader.js";
import { orderAccounts, renderSnapshot } from "./writer.js";

export interface RunSummary {
  readonly accounts: readonly AccountSnapshot[];
  readonly stats: ProcessorStats;
  /** Rows that failed to parse and were never offered to the processor. */
  readonly malformed: number;
}

/**
 * Fold every readable row into a fresh Processor.
 */
export async function processRecords(
  rows: AsyncIterable<ReadResult>,
  logger: Logger,
): Promise<RunSummary> {
  const processor = new Processor(new Store());
  let malformed = 0;

  for await (const row of rows) {
    if (!row.ok) {
      malformed++;
      logger.info({ line: row.line, issues: row.error.issues }, "Skipping malformed row");
      continue;
    }

    const result = processor.apply(row.record);
    if (!result.ok) {
      logger.info(
        {
          line: row.line,
          kind: row.record.kind,
          client: row.record.client,
          tx: row.record.tx,
          code: result.error.code,
        },
        `Skipping rejected ${row.record.kind}: ${result.error.message}`,
      );
    }
  }

  const summary: RunSummary = {
    accounts: processor.accounts(),
    stats: processor.stats,
    malformed,
  };

  logger.info(
    {
      applied: summary.stats.applied,
      rejected: summary.stats.rejected,
      malformed,
      accounts: summary.accounts.length,
    },
    "Processing complete",
  );

  return summary;
}

/**
 * Process the configured input file and return the CSV snapshot.
 */
export async function processFile(
  config: Pick<CliConfig, "inputPath" | "order">,
  logger: Logger,
): Promise<string> {
  logger.debug({ inputPath: config.inputPath }, "Reading transactions");
  const summary = await processRecords(readRecordsFromFile(config.inputPath), logger);
  return renderSnapshot(orderAccounts(summary.accounts, config.order));
}
