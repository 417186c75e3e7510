/**
 * Semantic exit codes for the CLI.
 * Skipped records are not failures: a run that reaches the end of its input exits with SUCCESS.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error (catch-all, including unreadable or malformed CSV input) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Input file not found */
  NOT_FOUND: 4,

  /** Configuration error (invalid environment variables) */
  CONFIG_ERROR: 11,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

const ERROR_CODE_NAMES: Record<ExitCode, string> = {
  0: 'SUCCESS',
  1: 'GENERAL_ERROR',
  2: 'INVALID_ARGS',
  4: 'NOT_FOUND',
  11: 'CONFIG_ERROR',
};

export function exitCodeToErrorCode(exitCode: ExitCode): string {
  return ERROR_CODE_NAMES[exitCode];
}

/**
 * Exit the process with a specific exit code.
 * Use this instead of process.exit() for better tracking.
 */
export function exitWithCode(code: ExitCode): never {
  process.exit(code);
}
