export { Balance } from './balance.js';
export {
  AccountLockedError,
  AmountIsNegativeError,
  ClientMismatchError,
  DisputedTransactionNotFoundError,
  DisputeWithdrawalNotSupportedError,
  DuplicateTransactionError,
  InsufficientFundsError,
  InvalidTransitionError,
  type LedgerError,
  type LedgerErrorCode,
  type ReferencingOperation,
} from './errors.js';
export { LedgerEngine, type LedgerEngineOptions, type LockedAccountPolicy } from './ledger-engine.js';
export { canTransition, isTerminalStatus, transition } from './transaction-status.js';
export {
  type BalanceSnapshot,
  type ClientBalance,
  type DisputeTransaction,
  type DisputeTransactionType,
  type FundsTransaction,
  type FundsTransactionType,
  type Transaction,
  type TransactionRecordView,
  type TransactionStatus,
  TRANSACTION_TYPES,
  type TransactionType,
} from './types.js';
