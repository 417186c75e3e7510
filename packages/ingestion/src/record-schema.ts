import { ClientIdSchema, TransactionIdSchema } from '@clearledger/core';
import { TRANSACTION_TYPES } from '@clearledger/ledger';
import { z } from 'zod';

export const REQUIRED_COLUMNS = ['type', 'client', 'tx'] as const;

/**
 * One CSV row after header mapping. Cells are text; an empty `amount` cell is
 * the same as no amount column.
 */
export const RawTransactionRecordSchema = z.object({
  type: z.enum(TRANSACTION_TYPES),
  client: ClientIdSchema,
  tx: TransactionIdSchema,
  amount: z
    .string()
    .optional()
    .transform((val) => (val === '' ? undefined : val)),
});
