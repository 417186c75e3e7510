import { parseBaseUnits } from '@clearledger/core';
import type { Transaction } from '@clearledger/ledger';
import { err, ok, type Result } from 'neverthrow';

import { type DecodeError, InvalidAmountError, MalformedRecordError, MissingAmountError } from './errors.js';
import { RawTransactionRecordSchema } from './record-schema.js';

/**
 * Turn one mapped CSV row into a ledger transaction.
 *
 * Deposits and withdrawals need an amount that rounds (half-up, four decimals)
 * to at least one base unit. Disputes, resolves and chargebacks ignore any amount.
 */
export function decodeRecord(raw: Record<string, string | undefined>, recordNumber: number): Result<Transaction, DecodeError> {
  const parsed = RawTransactionRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    return err(new MalformedRecordError(recordNumber, issues, raw['tx']));
  }

  const { type, client, tx, amount } = parsed.data;

  if (type !== 'deposit' && type !== 'withdrawal') {
    return ok({ type, id: tx, clientId: client });
  }

  if (amount === undefined) {
    return err(new MissingAmountError(tx));
  }

  const unitsResult = parseBaseUnits(amount);
  if (unitsResult.isErr()) {
    return err(new InvalidAmountError(tx, amount, unitsResult.error.message));
  }
  if (unitsResult.value <= 0n) {
    return err(new InvalidAmountError(tx, amount, 'Amount is zero or negative'));
  }

  return ok({ type, id: tx, clientId: client, amount: unitsResult.value });
}
