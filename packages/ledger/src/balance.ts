import type { BaseUnits } from '@clearledger/core';
import { err, ok, type Result } from 'neverthrow';

import { InsufficientFundsError } from './errors.js';
import type { BalanceSnapshot } from './types.js';

/**
 * One client's account: plain arithmetic on base units.
 *
 * Knows nothing about transaction ids or history; the only rule it enforces is
 * that a withdrawal cannot exceed the available funds. Every mutation keeps
 * `total === available + held`.
 */
export class Balance {
  private available: BaseUnits = 0n;
  private held: BaseUnits = 0n;
  private total: BaseUnits = 0n;
  private locked = false;

  get isLocked(): boolean {
    return this.locked;
  }

  deposit(amount: BaseUnits): void {
    this.available += amount;
    this.total += amount;
  }

  withdraw(amount: BaseUnits): Result<void, InsufficientFundsError> {
    if (this.available < amount) {
      return err(new InsufficientFundsError({ available: this.available, requested: amount }));
    }

    this.available -= amount;
    this.total -= amount;
    return ok(undefined);
  }

  /**
   * Move funds from available to held. Not checked against `available`: the
   * disputed deposit may already have been spent, leaving `available` negative.
   */
  hold(amount: BaseUnits): void {
    this.available -= amount;
    this.held += amount;
  }

  release(amount: BaseUnits): void {
    this.available += amount;
    this.held -= amount;
  }

  /**
   * The held amount leaves the account. `available` is not touched, so the
   * client may end up owing money (negative `available` and `total`).
   */
  chargeback(amount: BaseUnits): void {
    this.held -= amount;
    this.total -= amount;
    this.locked = true;
  }

  snapshot(): BalanceSnapshot {
    return Object.freeze({
      available: this.available,
      held: this.held,
      total: this.total,
      locked: this.locked,
    });
  }
}
