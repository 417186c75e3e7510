import { z } from 'zod';

const U16_MAX = 0xffff;
const U32_MAX = 0xffffffff;

export type ClientId = number;
export type TransactionId = number;

// CSV cells arrive as text; anything but plain digits is rejected before the range check
const UnsignedIntegerTextSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, 'Must be a non-negative integer')
  .transform((val) => Number(val));

export const ClientIdSchema = UnsignedIntegerTextSchema.pipe(
  z.number().int().max(U16_MAX, `Client id must be at most ${U16_MAX}`)
);

export const TransactionIdSchema = UnsignedIntegerTextSchema.pipe(
  z.number().int().max(U32_MAX, `Transaction id must be at most ${U32_MAX}`)
);
