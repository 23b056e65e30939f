/**
 * @tally/engine — Transaction processor.
 *
 * Applies one record at a time against the accounts and the dispute
 * ledger of its Store.
 *
 * Validation rules (fail-closed, all checked before anything mutates):
 * - deposit:    positive amount, unlocked account, unused tx id
 * - withdrawal: positive amount, known client, unlocked account,
 *               unused tx id, enough available funds
 * - dispute / resolve / chargeback: unlocked account, known tx owned
 *               by the same client, valid lifecycle transition
 *
 * A rejected record is reported as `{ ok: false, error }` and leaves the
 * store exactly as it was. Deciding what to do about it is the caller's
 * job; the processor never stops on a rejected record.
 */

import { Account } from "./account.js";
import type { Amount } from "./amount.js";
import { Store } from "./store.js";
import type {
  AccountSnapshot,
  ApplyResult,
  ClientId,
  DisputeRecord,
  FundsRecord,
  ProcessingErrorCode,
  ProcessorStats,
  TransactionRecord,
} from "./types.js";
import { ProcessingError } from "./types.js";

export class Processor {
  private readonly _store: Store;
  private _applied = 0;
  private _rejected = 0;
  private readonly _rejectedByCode = new Map<ProcessingErrorCode, number>();

  constructor(store: Store = new Store()) {
    this._store = store;
  }

  /**
   * Apply a single record.
   *
   * ProcessingErrors come back as a failed result. Any other error
   * (amount overflow, a bug) is rethrown.
   */
  apply(record: TransactionRecord): ApplyResult {
    try {
      switch (record.kind) {
        case "deposit":
          this._deposit(record);
          break;
        case "withdrawal":
          this._withdraw(record);
          break;
        case "dispute":
        case "resolve":
        case "chargeback":
          this._dispute(record);
          break;
      }
    } catch (error: unknown) {
      if (error instanceof ProcessingError) {
        this._rejected++;
        this._rejectedByCode.set(
          error.code,
          (this._rejectedByCode.get(error.code) ?? 0) + 1,
        );
        return { ok: false, record, error };
      }
      throw error;
    }

    this._applied++;
    return { ok: true, record };
  }

  /**
   * Apply every record in order. Returns one result per record.
   */
  applyAll(records: Iterable<TransactionRecord>): readonly ApplyResult[] {
    const results: ApplyResult[] = [];
    for (const record of records) {
      results.push(this.apply(record));
    }
    return results;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /**
   * Snapshot of every account, in the order clients were first seen.
   */
  accounts(): readonly AccountSnapshot[] {
    return [...this._store.accounts.values()].map((account) => account.snapshot());
  }

  account(client: ClientId): AccountSnapshot | undefined {
    return this._store.accounts.get(client)?.snapshot();
  }

  get stats(): ProcessorStats {
    const rejectedByCode: Partial<Record<ProcessingErrorCode, number>> = {};
    for (const [code, count] of this._rejectedByCode) {
      rejectedByCode[code] = count;
    }
    return {
      applied: this._applied,
      rejected: this._rejected,
      rejectedByCode,
    };
  }

  // ─── Handlers ────────────────────────────────────────────────────────

  private _deposit(record: FundsRecord): void {
    const amount = requirePositiveAmount(record);
    const existing = this._store.accounts.get(record.client);
    existing?.assertUnlocked();
    this._assertUnusedTx(record);

    const account = existing ?? this._open(record.client);
    account.deposit(amount);
    this._store.ledger.recordDeposit(record.tx, record.client, amount);
  }

  private _withdraw(record: FundsRecord): void {
    const amount = requirePositiveAmount(record);
    const account = this._requireAccount(record.client);
    account.assertUnlocked();
    this._assertUnusedTx(record);

    account.withdraw(amount);
    this._store.withdrawals.add(record.tx);
  }

  private _dispute(record: DisputeRecord): void {
    const { ledger, accounts } = this._store;
    accounts.get(record.client)?.assertUnlocked();

    switch (record.kind) {
      case "dispute": {
        ledger.assertCanTransition(record.tx, record.client, "disputed");
        const account = this._requireAccount(record.client);
        account.hold(ledger.dispute(record.tx, record.client));
        break;
      }
      case "resolve": {
        ledger.assertCanTransition(record.tx, record.client, "resolved");
        const account = this._requireAccount(record.client);
        account.release(ledger.resolve(record.tx, record.client));
        break;
      }
      case "chargeback": {
        ledger.assertCanTransition(record.tx, record.client, "charged_back");
        const account = this._requireAccount(record.client);
        account.chargeback(ledger.chargeback(record.tx, record.client));
        break;
      }
    }
  }

  // ─── Helpers ─────────────────────────────────────────────────────────

  private _open(client: ClientId): Account {
    const account = new Account(client);
    this._store.accounts.set(client, account);
    return account;
  }

  private _requireAccount(client: ClientId): Account {
    const account = this._store.accounts.get(client);
    if (account === undefined) {
      throw new ProcessingError(
        "UNKNOWN_CLIENT",
        `Unknown client: ${String(client)}`,
        client,
      );
    }
    return account;
  }

  private _assertUnusedTx(record: FundsRecord): void {
    if (this._store.ledger.has(record.tx) || this._store.withdrawals.has(record.tx)) {
      throw new ProcessingError(
        "DUPLICATE_TRANSACTION_ID",
        `Transaction ${String(record.tx)} already exists`,
        record.client,
        record.tx,
      );
    }
  }
}

function requirePositiveAmount(record: FundsRecord): Amount {
  if (record.amount === undefined) {
    throw new ProcessingError(
      "INVALID_AMOUNT",
      `A ${record.kind} requires an amount`,
      record.client,
      record.tx,
    );
  }
  if (!record.amount.isPositive()) {
    throw new ProcessingError(
      "INVALID_AMOUNT",
      `A ${record.kind} amount must be positive, got ${record.amount.toDecimal()}`,
      record.client,
      record.tx,
    );
  }
  return record.amount;
}
