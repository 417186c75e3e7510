import { err, ok, type Result } from 'neverthrow';

import { InvalidTransitionError } from './errors.js';
import type { TransactionStatus } from './types.js';

/**
 * Allowed status transitions. `resolved` and `chargeback` are terminal.
 */
const TRANSITIONS: Readonly<Record<TransactionStatus, readonly TransactionStatus[]>> = {
  valid: ['disputed'],
  disputed: ['resolved', 'chargeback'],
  resolved: [],
  chargeback: [],
};

export function canTransition(from: TransactionStatus, to: TransactionStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Single gate for every status change.
 */
export function transition(
  from: TransactionStatus,
  to: TransactionStatus,
  transactionId?: number
): Result<TransactionStatus, InvalidTransitionError> {
  if (!canTransition(from, to)) {
    return err(new InvalidTransitionError(from, to, transactionId));
  }
  return ok(to);
}

export function isTerminalStatus(status: TransactionStatus): boolean {
  return TRANSITIONS[status].length === 0;
}
