import { LOG_LEVELS, type LogLevel } from '@clearledger/logger';
import { z } from 'zod';

export const LOCKED_ACCOUNT_POLICIES = ['record', 'reject'] as const;

export type LockedAccountPolicy = (typeof LOCKED_ACCOUNT_POLICIES)[number];

const envSchema = z.object({
  CLEARLEDGER_LOCKED_ACCOUNT_POLICY: z.enum(LOCKED_ACCOUNT_POLICIES).default('record'),
  CLEARLEDGER_LOG_FILE: z.string().trim().min(1).optional(),
  CLEARLEDGER_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

type ValidatedEnv = z.infer<typeof envSchema>;

let validatedEnv: ValidatedEnv | undefined;

/**
 * Validates environment variables on first access and caches the result.
 * @throws Error listing every invalid variable
 */
function validateEnv(): ValidatedEnv {
  if (!validatedEnv) {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
      const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
      throw new Error(`Environment validation failed:\n${errors}`);
    }
    validatedEnv = result.data;
  }
  return validatedEnv;
}

/** Forget the cached environment so the next read validates `process.env` again. */
export function resetEnvCache(): void {
  validatedEnv = undefined;
}

/**
 * How the ledger treats deposits and withdrawals on a locked account.
 * `record` keeps accepting them, `reject` refuses them.
 */
export function getLockedAccountPolicy(): LockedAccountPolicy {
  return validateEnv().CLEARLEDGER_LOCKED_ACCOUNT_POLICY;
}

export function getLogLevel(): LogLevel {
  return validateEnv().CLEARLEDGER_LOG_LEVEL;
}

/** Path of the JSON-lines log file, when file logging is enabled. */
export function getLogFilePath(): string | undefined {
  return validateEnv().CLEARLEDGER_LOG_FILE;
}

export function getNodeEnv(): ValidatedEnv['NODE_ENV'] {
  return validateEnv().NODE_ENV;
}
