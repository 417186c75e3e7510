import { getLockedAccountPolicy, type LockedAccountPolicy } from '@clearledger/env';
import { LedgerEngine } from '@clearledger/ledger';
import { flushLoggers, getLogger, type TextStream } from '@clearledger/logger';
import type { Command } from 'commander';
import { err, ok, type Result } from 'neverthrow';
import type { z } from 'zod';

import { CliFailure, displayCliError } from '../shared/cli-error.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { InputFileNotFoundError, openInputFile } from '../shared/file-utils.js';
import { configureCliLogger } from '../shared/logger-setup.js';
import { ProcessCommandOptionsSchema } from '../shared/schemas.js';

import { type ProcessSummary, ProcessHandler } from './process-handler.js';
import { formatProcessSummary, renderBalancesCsv } from './process-utils.js';

const logger = getLogger('ProcessCommand');

/**
 * Process command options validated by Zod at CLI boundary
 */
export type ProcessCommandOptions = z.infer<typeof ProcessCommandOptionsSchema>;

/**
 * Register the process command as the program's default action.
 */
export function registerProcessCommand(program: Command): void {
  program
    .argument('<file>', 'CSV file of transactions (type,client,tx,amount)')
    .option('--lock-policy <policy>', 'what to do with deposits and withdrawals on locked accounts: record | reject')
    .option('--verbose', 'log at debug level and finish with a run summary')
    .action(async (file: string, rawOptions: unknown) => {
      await executeProcessCommand(file, rawOptions);
    });
}

/**
 * Execute the process command.
 */
async function executeProcessCommand(file: string, rawOptions: unknown): Promise<void> {
  const isVerbose =
    typeof rawOptions === 'object' && rawOptions !== null && 'verbose' in rawOptions && rawOptions.verbose === true;

  try {
    configureCliLogger({ verbose: isVerbose });
  } catch (error) {
    displayCliError(error instanceof Error ? error : new Error(String(error)), ExitCodes.CONFIG_ERROR);
  }

  const result = await runProcessCommand(file, rawOptions, process.stdout);
  if (result.isErr()) {
    displayCliError(result.error.error, result.error.exitCode);
  }

  flushLoggers();
}

/**
 * Validate options, stream the file through the engine and write the balance table.
 * Returns the run summary, or the failure with the exit code it maps to.
 */
export async function runProcessCommand(
  file: string,
  rawOptions: unknown,
  stdout: TextStream
): Promise<Result<ProcessSummary, CliFailure>> {
  const validationResult = ProcessCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    const firstError = validationResult.error.issues[0];
    return err(new CliFailure(new Error(firstError?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS));
  }
  const options = validationResult.data;

  const policyResult = resolveLockedAccountPolicy(options.lockPolicy);
  if (policyResult.isErr()) {
    return err(new CliFailure(policyResult.error, ExitCodes.CONFIG_ERROR));
  }
  const lockedAccountPolicy = policyResult.value;

  const inputResult = await openInputFile(file);
  if (inputResult.isErr()) {
    const exitCode = inputResult.error instanceof InputFileNotFoundError ? ExitCodes.NOT_FOUND : ExitCodes.GENERAL_ERROR;
    return err(new CliFailure(inputResult.error, exitCode));
  }

  logger.debug({ file, lockedAccountPolicy }, 'Processing transactions');

  const handler = new ProcessHandler(new LedgerEngine({ lockedAccountPolicy }));
  const result = await handler.execute({ input: inputResult.value });
  if (result.isErr()) {
    return err(new CliFailure(result.error, ExitCodes.GENERAL_ERROR));
  }

  stdout.write(renderBalancesCsv(result.value.balances));

  if (options.verbose) {
    logger.info(formatProcessSummary(result.value));
  }

  return ok(result.value);
}

/**
 * The command-line flag wins over CLEARLEDGER_LOCKED_ACCOUNT_POLICY.
 */
function resolveLockedAccountPolicy(flag: LockedAccountPolicy | undefined): Result<LockedAccountPolicy, Error> {
  if (flag) {
    return ok(flag);
  }
  try {
    return ok(getLockedAccountPolicy());
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}
