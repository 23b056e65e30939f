/**
 * @tally/engine — Per-client balance state.
 *
 * Every transition either mutates the account or throws a
 * ProcessingError having changed nothing. `total` is derived from
 * available + held and never stored.
 *
 * A chargeback locks the account. A locked account rejects every
 * further transition.
 */

import { Amount } from "./amount.js";
import type { AccountSnapshot, ClientId } from "./types.js";
import { ProcessingError } from "./types.js";

export class Account {
  readonly client: ClientId;
  private _available: Amount = Amount.zero();
  private _held: Amount = Amount.zero();
  private _locked = false;

  constructor(client: ClientId) {
    this.client = client;
  }

  get available(): Amount {
    return this._available;
  }

  get held(): Amount {
    return this._held;
  }

  get total(): Amount {
    return this._available.add(this._held);
  }

  get locked(): boolean {
    return this._locked;
  }

  /**
   * Throws ACCOUNT_LOCKED if a chargeback has frozen this account.
   */
  assertUnlocked(): void {
    if (this._locked) {
      throw new ProcessingError(
        "ACCOUNT_LOCKED",
        `Account ${String(this.client)} is locked`,
        this.client,
      );
    }
  }

  deposit(amount: Amount): void {
    this.assertUnlocked();
    this._available = this._available.add(amount);
  }

  withdraw(amount: Amount): void {
    this.assertUnlocked();
    if (this._available.compare(amount) < 0) {
      throw new ProcessingError(
        "INSUFFICIENT_FUNDS",
        `Account ${String(this.client)} has ${this._available.toDecimal()} available, cannot withdraw ${amount.toDecimal()}`,
        this.client,
      );
    }
    this._available = this._available.sub(amount);
  }

  /**
   * Move disputed funds from available to held. Available may go
   * negative when the funds were already withdrawn.
   */
  hold(amount: Amount): void {
    this.assertUnlocked();
    const available = this._available.sub(amount);
    const held = this._held.add(amount);
    this._available = available;
    this._held = held;
  }

  /** Return held funds to available after a resolve. */
  release(amount: Amount): void {
    this.assertUnlocked();
    const held = this._held.sub(amount);
    const available = this._available.add(amount);
    this._held = held;
    this._available = available;
  }

  /** Remove held funds and lock the account. */
  chargeback(amount: Amount): void {
    this.assertUnlocked();
    this._held = this._held.sub(amount);
    this._locked = true;
  }

  snapshot(): AccountSnapshot {
    return {
      client: this.client,
      available: this._available,
      held: this._held,
      total: this.total,
      locked: this._locked,
    };
  }
}
