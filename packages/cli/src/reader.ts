/**
 * @tally/cli — CSV record reader.
 *
 * Turns CSV text into typed engine records, one row at a time.
 *
 * Input format:
 *   type,client,tx,amount
 *   deposit,1,1,1.0
 *   dispute,1,1,
 *
 * - Header names are matched case-insensitively, in any order
 * - `amount` is required for deposit/withdrawal, empty otherwise
 * - Whitespace around fields is trimmed, blank lines are skipped
 * - A leading UTF-8 byte order mark is dropped
 *
 * A bad row is yielded as `{ ok: false }` and reading continues. A
 * missing header column, broken CSV syntax, or an I/O error rejects the
 * iterator: nothing after that point can be trusted.
 */

import { createReadStream } from "node:fs";
import type { Readable } from "node:stream";
import { CsvError, parse } from "csv-parse";
import { z } from "zod";
import { Amount, AmountError, RECORD_KINDS } from "@tally/engine";
import type { DisputeRecord, FundsRecord, TransactionRecord } from "@tally/engine";

// =============================================================================
// Errors
// =============================================================================

/**
 * A single row could not be turned into a record. Recoverable.
 */
export class RecordParseError extends Error {
  public readonly line: number;
  public readonly issues: readonly string[];

  constructor(line: number, issues: readonly string[]) {
    super(`Line ${String(line)}: ${issues.join("; ")}`);
    this.name = "RecordParseError";
    this.line = line;
    this.issues = issues;
  }
}

export type ReaderErrorCode = "MISSING_COLUMN" | "MALFORMED_CSV";

/**
 * The input as a whole cannot be read. Fatal.
 */
export class ReaderError extends Error {
  public readonly code: ReaderErrorCode;

  constructor(code: ReaderErrorCode, message: string) {
    super(message);
    this.name = "ReaderError";
    this.code = code;
  }
}

// =============================================================================
// Row Schema
// =============================================================================

const REQUIRED_COLUMNS = ["type", "client", "tx"] as const;

const UnsignedId = z
  .string()
  .regex(/^\d+$/, "must be an unsigned integer")
  .transform(Number)
  .refine(Number.isSafeInteger, "is too large");

export const RowSchema = z
  .object({
    type: z.enum(RECORD_KINDS),
    client: UnsignedId,
    tx: UnsignedId,
    amount: z
      .string()
      .optional()
      .transform((value) => (value === undefined || value === "" ? undefined : value)),
  })
  .transform((row, ctx): TransactionRecord => {
    if (row.type === "deposit" || row.type === "withdrawal") {
      if (row.amount === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["amount"],
          message: `is required for ${row.type}`,
        });
        return z.NEVER;
      }

      let amount: Amount;
      try {
        amount = Amount.fromDecimal(row.amount);
      } catch (error: unknown) {
        if (!(error instanceof AmountError)) {
          throw error;
        }
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["amount"], message: error.message });
        return z.NEVER;
      }

      const record: FundsRecord = { kind: row.type, client: row.client, tx: row.tx, amount };
      return record;
    }

    if (row.amount !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["amount"],
        message: `must be empty for ${row.type}`,
      });
      return z.NEVER;
    }

    const record: DisputeRecord = { kind: row.type, client: row.client, tx: row.tx };
    return record;
  });

/** What csv-parse hands back per row with `info: true`. */
const ParsedRow = z.object({
  record: z.array(z.string()),
  info: z.object({ lines: z.number() }),
});

// =============================================================================
// Reader
// =============================================================================

export type ReadResult =
  | { readonly ok: true; readonly line: number; readonly record: TransactionRecord }
  | { readonly ok: false; readonly line: number; readonly error: RecordParseError };

type ColumnIndex = Record<(typeof REQUIRED_COLUMNS)[number], number> & { amount?: number };

/**
 * Parse one data row (cells already split) into a record.
 */
export function parseRow(cells: readonly string[], columns: ColumnIndex, line: number): ReadResult {
  const result = RowSchema.safeParse({
    type: cells[columns.type],
    client: cells[columns.client],
    tx: cells[columns.tx],
    amount: columns.amount === undefined ? undefined : cells[columns.amount],
  });

  if (result.success) {
    return { ok: true, line, record: result.data };
  }

  const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
  return { ok: false, line, error: new RecordParseError(line, issues) };
}

/**
 * Map header names to column positions.
 * Throws ReaderError("MISSING_COLUMN") if a required column is absent.
 */
export function indexColumns(header: readonly string[]): ColumnIndex {
  const names = header.map((name) => name.toLowerCase());
  const position = (name: string): number | undefined => {
    const index = names.indexOf(name);
    return index === -1 ? undefined : index;
  };

  const missing = REQUIRED_COLUMNS.filter((name) => position(name) === undefined);
  const type = position("type");
  const client = position("client");
  const tx = position("tx");
  if (type === undefined || client === undefined || tx === undefined) {
    throw new ReaderError(
      "MISSING_COLUMN",
      `Input header is missing column(s): ${missing.join(", ")}`,
    );
  }

  const amount = position("amount");
  return amount === undefined ? { type, client, tx } : { type, client, tx, amount };
}

/**
 * Lazily read records from a CSV stream. Consumable once.
 */
export async function* readRecords(input: Readable): AsyncGenerator<ReadResult> {
  const parser = parse({
    bom: true,
    trim: true,
    skip_empty_lines: true,
    relax_column_count: true,
    info: true,
  });
  input.once("error", (error) => parser.destroy(error));
  input.pipe(parser);

  let columns: ColumnIndex | undefined;

  try {
    for await (const chunk of parser) {
      const parsed = ParsedRow.safeParse(chunk);
      if (!parsed.success) {
        throw new ReaderError("MALFORMED_CSV", "CSV parser returned an unexpected row shape");
      }

      const { record: cells, info } = parsed.data;
      if (columns === undefined) {
        columns = indexColumns(cells);
        continue;
      }

      yield parseRow(cells, columns, info.lines);
    }
  } catch (error: unknown) {
    if (error instanceof CsvError) {
      throw new ReaderError("MALFORMED_CSV", error.message);
    }
    throw error;
  } finally {
    // The consumer may stop early; the source must not stay open.
    input.destroy();
  }
}

/** Open `path` and read records from it. */
export function readRecordsFromFile(path: string): AsyncGenerator<ReadResult> {
  return readRecords(createReadStream(path));
}
