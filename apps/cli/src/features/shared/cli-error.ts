import { flushLoggers } from '@clearledger/logger';
import pc from 'picocolors';

import { exitCodeToErrorCode, type ExitCode, exitWithCode } from './exit-codes.js';

/**
 * Tips shown after error messages, keyed by error code.
 */
const ERROR_TIPS: Record<string, string> = {
  INVALID_ARGS: 'Check your command arguments and try again. Run with --help for usage information.',
  NOT_FOUND: 'The input file was not found. Double-check the path and try again.',
  CONFIG_ERROR: 'Check the CLEARLEDGER_* environment variables.',
};

/**
 * A failure that ends the command, paired with the exit code it maps to.
 */
export class CliFailure extends Error {
  constructor(
    public readonly error: Error,
    public readonly exitCode: ExitCode
  ) {
    super(error.message);
    this.name = 'CliFailure';
  }
}

/**
 * Render a CLI error to stderr, with a contextual tip where one exists.
 */
export function formatCliError(error: Error, exitCode: ExitCode, showStack = false): string {
  let text = `\n${pc.red('✗')} Error: ${error.message}\n`;

  const tip = ERROR_TIPS[exitCodeToErrorCode(exitCode)];
  if (tip) {
    text += `\n${pc.dim(tip)}\n`;
  }

  if (showStack && error.stack) {
    text += `\n${pc.dim(error.stack)}\n\n`;
  }
  return text;
}

/**
 * Display a CLI error and exit.
 */
export function displayCliError(error: Error, exitCode: ExitCode): never {
  process.stderr.write(formatCliError(error, exitCode, process.env['NODE_ENV'] === 'development'));
  flushLoggers();
  exitWithCode(exitCode);
}
