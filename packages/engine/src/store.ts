/**
 * @tally/engine — Per-run state.
 *
 * One Store per run, owned by exactly one Processor. Nothing here is
 * module-level, so independent runs can share a process.
 */

import type { Account } from "./account.js";
import { DisputeLedger } from "./dispute-ledger.js";
import type { ClientId, TxId } from "./types.js";

export class Store {
  /** Accounts in first-seen order (Map preserves insertion order). */
  readonly accounts: Map<ClientId, Account> = new Map();

  /** Deposits eligible for dispute. */
  readonly ledger: DisputeLedger = new DisputeLedger();

  /** Withdrawal ids; kept only so deposit and withdrawal ids stay unique. */
  readonly withdrawals: Set<TxId> = new Set();
}
