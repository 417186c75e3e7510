import { DomainError, type ClientId, type TransactionId } from '@clearledger/core';

import type { TransactionStatus } from './types.js';

export class DuplicateTransactionError extends DomainError {
  readonly code = 'DUPLICATE_TRANSACTION';

  constructor(public readonly transactionId: TransactionId) {
    super(`Duplicate transaction ${transactionId}`, { transactionId });
  }
}

export class InsufficientFundsError extends DomainError {
  readonly code = 'INSUFFICIENT_FUNDS';

  constructor(details?: Record<string, unknown>) {
    super('Insufficient funds', details);
  }
}

export class AmountIsNegativeError extends DomainError {
  readonly code = 'AMOUNT_IS_NEGATIVE';

  constructor(public readonly transactionId: TransactionId) {
    super(`Transaction ${transactionId} amount is negative`, { transactionId });
  }
}

export class DisputedTransactionNotFoundError extends DomainError {
  readonly code = 'DISPUTED_TRANSACTION_NOT_FOUND';

  constructor(public readonly transactionId: TransactionId) {
    super(`Disputed transaction ${transactionId} not found`, { transactionId });
  }
}

export class DisputeWithdrawalNotSupportedError extends DomainError {
  readonly code = 'DISPUTE_WITHDRAWAL_NOT_SUPPORTED';

  constructor(public readonly transactionId: TransactionId) {
    super(`Transaction ${transactionId} is a withdrawal; only deposits can be disputed`, { transactionId });
  }
}

/**
 * Operations that reference a transaction and must come from its owner.
 */
export type ReferencingOperation = 'dispute' | 'resolve' | 'chargeback';

const CLIENT_MISMATCH_CODES = {
  chargeback: 'CHARGEBACK_CLIENT_MISMATCH',
  dispute: 'DISPUTE_CLIENT_MISMATCH',
  resolve: 'RESOLVE_CLIENT_MISMATCH',
} as const satisfies Record<ReferencingOperation, string>;

export class ClientMismatchError extends DomainError {
  readonly code: (typeof CLIENT_MISMATCH_CODES)[ReferencingOperation];

  constructor(
    public readonly operation: ReferencingOperation,
    public readonly transactionId: TransactionId,
    public readonly clientId: ClientId,
    public readonly ownerId: ClientId
  ) {
    super(`Client ${clientId} cannot ${operation} transaction ${transactionId} owned by client ${ownerId}`, {
      clientId,
      operation,
      ownerId,
      transactionId,
    });
    this.code = CLIENT_MISMATCH_CODES[operation];
  }
}

export class InvalidTransitionError extends DomainError {
  readonly code = 'INVALID_TRANSITION';

  constructor(
    public readonly from: TransactionStatus,
    public readonly to: TransactionStatus,
    public readonly transactionId?: TransactionId | undefined
  ) {
    super(
      transactionId === undefined
        ? `Invalid transaction status transition ${from} -> ${to}`
        : `Invalid status transition ${from} -> ${to} for transaction ${transactionId}`,
      { from, to, transactionId }
    );
  }
}

export class AccountLockedError extends DomainError {
  readonly code = 'ACCOUNT_LOCKED';

  constructor(
    public readonly clientId: ClientId,
    public readonly transactionId: TransactionId
  ) {
    super(`Account of client ${clientId} is locked; transaction ${transactionId} refused`, {
      clientId,
      transactionId,
    });
  }
}

export type LedgerError =
  | AccountLockedError
  | AmountIsNegativeError
  | ClientMismatchError
  | DisputedTransactionNotFoundError
  | DisputeWithdrawalNotSupportedError
  | DuplicateTransactionError
  | InsufficientFundsError
  | InvalidTransitionError;

export type LedgerErrorCode = LedgerError['code'];
