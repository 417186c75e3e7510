import { DomainError, type TransactionId } from '@clearledger/core';

export class MissingAmountError extends DomainError {
  readonly code = 'MISSING_AMOUNT';

  constructor(public readonly transactionId: TransactionId) {
    super('Amount is required but is missing', { transactionId });
  }
}

export class InvalidAmountError extends DomainError {
  readonly code = 'INVALID_AMOUNT';

  constructor(
    public readonly transactionId: TransactionId,
    public readonly amount: string,
    reason: string
  ) {
    super(`Invalid amount "${amount}": ${reason}`, { amount, transactionId });
  }
}

/**
 * A row that does not fit the record shape at all (unknown type, bad ids).
 * `rawTransactionId` is the unvalidated `tx` cell, kept for log lines.
 */
export class MalformedRecordError extends DomainError {
  readonly code = 'MALFORMED_RECORD';

  constructor(
    public readonly recordNumber: number,
    public readonly issues: string[],
    public readonly rawTransactionId: string | undefined
  ) {
    super(`Malformed record ${recordNumber}: ${issues.join('; ')}`, { issues, recordNumber });
  }
}

export type DecodeError = InvalidAmountError | MalformedRecordError | MissingAmountError;

export type DecodeErrorCode = DecodeError['code'];

/**
 * The input cannot be read as a transaction file at all. Thrown, since no
 * record after it can be trusted either.
 */
export class CsvHeaderError extends Error {
  constructor(
    message: string,
    public readonly header: readonly string[]
  ) {
    super(message);
    this.name = 'CsvHeaderError';
  }
}
