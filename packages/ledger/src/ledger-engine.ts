import {
  type BaseUnits,
  baseUnitsToDecimal,
  type ClientId,
  InvariantViolationError,
  type TransactionId,
} from '@clearledger/core';
import { getLogger } from '@clearledger/logger';
import { err, ok, type Result } from 'neverthrow';

import { Balance } from './balance.js';
import {
  AccountLockedError,
  AmountIsNegativeError,
  ClientMismatchError,
  DisputedTransactionNotFoundError,
  DisputeWithdrawalNotSupportedError,
  DuplicateTransactionError,
  type LedgerError,
} from './errors.js';
import { transition } from './transaction-status.js';
import type {
  ClientBalance,
  DisputeTransaction,
  DisputeTransactionType,
  FundsTransaction,
  FundsTransactionType,
  Transaction,
  TransactionRecordView,
  TransactionStatus,
} from './types.js';

const logger = getLogger('LedgerEngine');

/**
 * What happens to deposits and withdrawals once a chargeback has locked an account.
 * - `record`: they are applied as usual; the lock is informational.
 * - `reject`: they fail with `AccountLockedError`. Disputes, resolves and
 *   chargebacks still apply so open disputes can settle.
 */
export type LockedAccountPolicy = 'record' | 'reject';

export interface LedgerEngineOptions {
  lockedAccountPolicy?: LockedAccountPolicy | undefined;
}

interface TransactionRecord {
  readonly id: TransactionId;
  readonly clientId: ClientId;
  readonly type: FundsTransactionType;
  readonly amount: BaseUnits;
  status: TransactionStatus;
}

const TARGET_STATUS: Record<DisputeTransactionType, TransactionStatus> = {
  dispute: 'disputed',
  resolve: 'resolved',
  chargeback: 'chargeback',
};

/**
 * Applies transactions to client balances, one at a time, in the order given.
 *
 * Owns every `Balance` and every deposit/withdrawal record; callers only ever get
 * frozen copies back. A failed transaction changes no balance and no record,
 * although the client's (empty) account is still opened on first sight.
 */
export class LedgerEngine {
  private readonly accounts = new Map<ClientId, Balance>();
  private readonly records = new Map<TransactionId, TransactionRecord>();
  private readonly lockedAccountPolicy: LockedAccountPolicy;

  constructor(options?: LedgerEngineOptions) {
    this.lockedAccountPolicy = options?.lockedAccountPolicy ?? 'record';
  }

  accept(transaction: Transaction): Result<void, LedgerError> {
    switch (transaction.type) {
      case 'deposit':
      case 'withdrawal':
        return this.applyFunds(transaction);
      case 'dispute':
      case 'resolve':
      case 'chargeback':
        return this.applyDispute(transaction);
    }
  }

  /**
   * Display copies of every client's balance, in no particular order.
   */
  balances(): readonly ClientBalance[] {
    return Object.freeze([...this.accounts.keys()].map((clientId) => this.toClientBalance(clientId)));
  }

  balanceOf(clientId: ClientId): ClientBalance | undefined {
    return this.accounts.has(clientId) ? this.toClientBalance(clientId) : undefined;
  }

  transaction(id: TransactionId): TransactionRecordView | undefined {
    const record = this.records.get(id);
    if (!record) return undefined;
    return Object.freeze({ ...record });
  }

  stats(): { clients: number; transactions: number } {
    return { clients: this.accounts.size, transactions: this.records.size };
  }

  private applyFunds(transaction: FundsTransaction): Result<void, LedgerError> {
    if (this.records.has(transaction.id)) {
      return err(new DuplicateTransactionError(transaction.id));
    }
    if (transaction.amount < 0n) {
      return err(new AmountIsNegativeError(transaction.id));
    }

    const account = this.accountFor(transaction.clientId);
    if (account.isLocked && this.lockedAccountPolicy === 'reject') {
      return err(new AccountLockedError(transaction.clientId, transaction.id));
    }

    if (transaction.type === 'deposit') {
      account.deposit(transaction.amount);
    } else {
      const withdrawResult = account.withdraw(transaction.amount);
      if (withdrawResult.isErr()) {
        return err(withdrawResult.error);
      }
    }

    this.insertRecord({
      id: transaction.id,
      clientId: transaction.clientId,
      type: transaction.type,
      amount: transaction.amount,
      status: 'valid',
    });
    return ok(undefined);
  }

  private applyDispute(transaction: DisputeTransaction): Result<void, LedgerError> {
    const record = this.records.get(transaction.id);
    if (!record) {
      return err(new DisputedTransactionNotFoundError(transaction.id));
    }
    if (record.clientId !== transaction.clientId) {
      return err(new ClientMismatchError(transaction.type, transaction.id, transaction.clientId, record.clientId));
    }
    if (transaction.type === 'dispute' && record.type === 'withdrawal') {
      return err(new DisputeWithdrawalNotSupportedError(record.id));
    }

    const statusResult = transition(record.status, TARGET_STATUS[transaction.type], record.id);
    if (statusResult.isErr()) {
      return err(statusResult.error);
    }

    const account = this.accountFor(record.clientId);
    switch (transaction.type) {
      case 'dispute':
        account.hold(record.amount);
        break;
      case 'resolve':
        account.release(record.amount);
        break;
      case 'chargeback':
        account.chargeback(record.amount);
        break;
    }

    logger.debug(
      { tx: record.id, client: record.clientId, from: record.status, to: statusResult.value },
      'Transaction status changed'
    );
    record.status = statusResult.value;
    return ok(undefined);
  }

  private accountFor(clientId: ClientId): Balance {
    let account = this.accounts.get(clientId);
    if (!account) {
      account = new Balance();
      this.accounts.set(clientId, account);
    }
    return account;
  }

  private insertRecord(record: TransactionRecord): void {
    // Duplicates are rejected before any balance is touched
    if (this.records.has(record.id)) {
      throw new InvariantViolationError('transaction id inserted twice', { transactionId: record.id });
    }
    this.records.set(record.id, record);
  }

  private toClientBalance(clientId: ClientId): ClientBalance {
    const snapshot = this.accountFor(clientId).snapshot();
    return Object.freeze({
      clientId,
      available: baseUnitsToDecimal(snapshot.available),
      held: baseUnitsToDecimal(snapshot.held),
      total: baseUnitsToDecimal(snapshot.total),
      locked: snapshot.locked,
    });
  }
}
