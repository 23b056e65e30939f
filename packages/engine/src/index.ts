/**
 * @tally/engine — Transaction-processing engine.
 *
 * Folds a sequence of deposit, withdrawal, dispute, resolve and
 * chargeback records into per-client balances. Knows nothing about
 * files or CSV.
 *
 * Design rules:
 * - Exact fixed-point arithmetic (bigint, 4 decimals)
 * - One Store per run, owned by its Processor
 * - Rejected records are returned, never thrown and never half-applied
 */

// Core engine
export { Processor } from "./processor.js";
export { Store } from "./store.js";

// State
export { Account } from "./account.js";
export { DisputeLedger } from "./dispute-ledger.js";

// Money
export { Amount, AMOUNT_DECIMALS } from "./amount.js";

// Types
export type {
  ClientId,
  TxId,
  FundsKind,
  DisputeKind,
  RecordKind,
  FundsRecord,
  DisputeRecord,
  TransactionRecord,
  DisputeState,
  LedgerEntry,
  AccountSnapshot,
  ProcessingErrorCode,
  AmountErrorCode,
  ApplyResult,
  ProcessorStats,
} from "./types.js";

export { ProcessingError, AmountError, RECORD_KINDS } from "./types.js";
