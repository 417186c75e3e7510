import { LOCKED_ACCOUNT_POLICIES } from '@clearledger/env';
import { z } from 'zod';

export const VerboseFlagSchema = z.object({
  verbose: z.boolean().optional(),
});

/**
 * Process command options (the input path is a positional argument)
 */
export const ProcessCommandOptionsSchema = z
  .object({
    lockPolicy: z
      .enum(LOCKED_ACCOUNT_POLICIES, {
        errorMap: () => ({ message: `--lock-policy must be one of: ${LOCKED_ACCOUNT_POLICIES.join(', ')}` }),
      })
      .optional(),
  })
  .extend(VerboseFlagSchema.shape);
