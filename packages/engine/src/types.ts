/**
 * @tally/engine — Record, snapshot, and error types.
 *
 * Rules:
 * - All exported shapes are readonly
 * - Per-record failures are ProcessingErrors, returned to the caller
 * - Anything else thrown out of the engine is fatal
 */

import type { Amount } from "./amount.js";

// ─── Identifiers ─────────────────────────────────────────────────────────

/** Unsigned integer identifying an account holder. */
export type ClientId = number;

/** Unsigned integer identifying a deposit or withdrawal. */
export type TxId = number;

// ─── Records ─────────────────────────────────────────────────────────────

export type FundsKind = "deposit" | "withdrawal";
export type DisputeKind = "dispute" | "resolve" | "chargeback";
export type RecordKind = FundsKind | DisputeKind;

export const RECORD_KINDS = [
  "deposit",
  "withdrawal",
  "dispute",
  "resolve",
  "chargeback",
] as const satisfies readonly RecordKind[];

/**
 * A deposit or withdrawal. The amount is optional at the type level so
 * that a record built without one is rejected by the processor rather
 * than by the compiler.
 */
export interface FundsRecord {
  readonly kind: FundsKind;
  readonly client: ClientId;
  readonly tx: TxId;
  readonly amount?: Amount | undefined;
}

/** A dispute lifecycle step. References an earlier deposit by `tx`. */
export interface DisputeRecord {
  readonly kind: DisputeKind;
  readonly client: ClientId;
  readonly tx: TxId;
}

export type TransactionRecord = FundsRecord | DisputeRecord;

// ─── Dispute Lifecycle ───────────────────────────────────────────────────

/** clean → disputed → resolved | charged_back. Never back to clean. */
export type DisputeState = "clean" | "disputed" | "resolved" | "charged_back";

export interface LedgerEntry {
  readonly tx: TxId;
  readonly client: ClientId;
  readonly amount: Amount;
  readonly state: DisputeState;
}

// ─── Snapshots ───────────────────────────────────────────────────────────

export interface AccountSnapshot {
  readonly client: ClientId;
  readonly available: Amount;
  readonly held: Amount;
  /** Always available + held. */
  readonly total: Amount;
  readonly locked: boolean;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for per-record processing failures. */
export type ProcessingErrorCode =
  | "INVALID_AMOUNT"
  | "UNKNOWN_CLIENT"
  | "UNKNOWN_TRANSACTION"
  | "CLIENT_MISMATCH"
  | "DUPLICATE_TRANSACTION_ID"
  | "INSUFFICIENT_FUNDS"
  | "ACCOUNT_LOCKED"
  | "INVALID_STATE_TRANSITION";

/**
 * A record could not be applied. State is untouched when this is raised.
 */
export class ProcessingError extends Error {
  public readonly code: ProcessingErrorCode;
  public readonly client: ClientId;
  public readonly tx: TxId | undefined;

  constructor(
    code: ProcessingErrorCode,
    message: string,
    client: ClientId,
    tx?: TxId,
  ) {
    super(message);
    this.name = "ProcessingError";
    this.code = code;
    this.client = client;
    this.tx = tx;
  }
}

export type AmountErrorCode = "PARSE_ERROR" | "OVERFLOW";

/**
 * Amount parsing or arithmetic failure.
 * OVERFLOW is fatal: the engine never clamps.
 */
export class AmountError extends Error {
  public readonly code: AmountErrorCode;

  constructor(code: AmountErrorCode, message: string) {
    super(message);
    this.name = "AmountError";
    this.code = code;
  }
}

// ─── Results ─────────────────────────────────────────────────────────────

/** Outcome of applying one record. */
export type ApplyResult =
  | { readonly ok: true; readonly record: TransactionRecord }
  | {
      readonly ok: false;
      readonly record: TransactionRecord;
      readonly error: ProcessingError;
    };

/** Running counts kept by the processor. */
export interface ProcessorStats {
  readonly applied: number;
  readonly rejected: number;
  readonly rejectedByCode: Readonly<Partial<Record<ProcessingErrorCode, number>>>;
}
