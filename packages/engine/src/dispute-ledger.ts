/**
 * @tally/engine — Dispute ledger.
 *
 * Records every deposit that can later be disputed, keyed by
 * transaction id, and walks each one through its lifecycle:
 *
 *   clean → disputed → resolved
 *                    → charged_back
 *
 * Transitions are monotonic. An entry never returns to clean, and a
 * resolved or charged-back entry cannot be disputed again.
 *
 * API surface:
 * - recordDeposit() — Register a clean entry
 * - dispute() / resolve() / chargeback() — Advance an entry, return its amount
 * - get() / has() — Read-only lookups
 */

import type { Amount } from "./amount.js";
import type { ClientId, DisputeState, LedgerEntry, TxId } from "./types.js";
import { ProcessingError } from "./types.js";

const VALID_TRANSITIONS: Record<DisputeState, readonly DisputeState[]> = {
  clean: ["disputed"],
  disputed: ["resolved", "charged_back"],
  resolved: [],
  charged_back: [],
};

export class DisputeLedger {
  private readonly _entries: Map<TxId, LedgerEntry> = new Map();

  /**
   * Insert a clean entry for a deposit.
   * Throws DUPLICATE_TRANSACTION_ID if `tx` is already recorded.
   */
  recordDeposit(tx: TxId, client: ClientId, amount: Amount): LedgerEntry {
    if (this._entries.has(tx)) {
      throw new ProcessingError(
        "DUPLICATE_TRANSACTION_ID",
        `Transaction ${String(tx)} already exists`,
        client,
        tx,
      );
    }

    const entry: LedgerEntry = { tx, client, amount, state: "clean" };
    this._entries.set(tx, entry);
    return entry;
  }

  /** Open a dispute. Returns the amount to hold. */
  dispute(tx: TxId, client: ClientId): Amount {
    return this._transition(tx, client, "disputed");
  }

  /** Close a dispute in the client's favour. Returns the amount to release. */
  resolve(tx: TxId, client: ClientId): Amount {
    return this._transition(tx, client, "resolved");
  }

  /** Reverse a disputed deposit. Returns the amount to charge back. */
  chargeback(tx: TxId, client: ClientId): Amount {
    return this._transition(tx, client, "charged_back");
  }

  /**
   * Validate without changing anything. Throws exactly what the
   * matching transition would throw.
   */
  assertCanTransition(tx: TxId, client: ClientId, next: DisputeState): LedgerEntry {
    const entry = this._entries.get(tx);
    if (entry === undefined) {
      throw new ProcessingError(
        "UNKNOWN_TRANSACTION",
        `Unknown transaction: ${String(tx)}`,
        client,
        tx,
      );
    }

    if (entry.client !== client) {
      throw new ProcessingError(
        "CLIENT_MISMATCH",
        `Transaction ${String(tx)} belongs to client ${String(entry.client)}, not ${String(client)}`,
        client,
        tx,
      );
    }

    if (!VALID_TRANSITIONS[entry.state].includes(next)) {
      throw new ProcessingError(
        "INVALID_STATE_TRANSITION",
        `Transaction ${String(tx)} cannot move from ${entry.state} to ${next}`,
        client,
        tx,
      );
    }

    return entry;
  }

  get(tx: TxId): LedgerEntry | undefined {
    return this._entries.get(tx);
  }

  has(tx: TxId): boolean {
    return this._entries.has(tx);
  }

  get size(): number {
    return this._entries.size;
  }

  private _transition(tx: TxId, client: ClientId, next: DisputeState): Amount {
    const entry = this.assertCanTransition(tx, client, next);
    this._entries.set(tx, { ...entry, state: next });
    return entry.amount;
  }
}
