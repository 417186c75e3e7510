import type { BaseUnits, ClientId, TransactionId } from '@clearledger/core';
import type { Decimal } from 'decimal.js';

/**
 * Transactions that move money and are kept on record.
 */
export type FundsTransactionType = 'deposit' | 'withdrawal';

/**
 * Transactions that act on an earlier funds transaction by id.
 */
export type DisputeTransactionType = 'dispute' | 'resolve' | 'chargeback';

export type TransactionType = FundsTransactionType | DisputeTransactionType;

export const TRANSACTION_TYPES = ['deposit', 'withdrawal', 'dispute', 'resolve', 'chargeback'] as const satisfies
  readonly TransactionType[];

export interface FundsTransaction {
  type: FundsTransactionType;
  id: TransactionId;
  clientId: ClientId;
  amount: BaseUnits;
}

/**
 * Dispute-family transactions carry no amount: they always act on the amount
 * stored with the referenced transaction.
 */
export interface DisputeTransaction {
  type: DisputeTransactionType;
  id: TransactionId;
  clientId: ClientId;
}

export type Transaction = FundsTransaction | DisputeTransaction;

export type TransactionStatus = 'valid' | 'disputed' | 'resolved' | 'chargeback';

export interface TransactionRecordView {
  readonly id: TransactionId;
  readonly clientId: ClientId;
  readonly type: FundsTransactionType;
  readonly amount: BaseUnits;
  readonly status: TransactionStatus;
}

export interface BalanceSnapshot {
  readonly available: BaseUnits;
  readonly held: BaseUnits;
  readonly total: BaseUnits;
  readonly locked: boolean;
}

/**
 * Display copy of one client's balance.
 */
export interface ClientBalance {
  readonly clientId: ClientId;
  readonly available: Decimal;
  readonly held: Decimal;
  readonly total: Decimal;
  readonly locked: boolean;
}
