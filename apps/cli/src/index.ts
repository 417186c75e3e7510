#!/usr/bin/env node
import { flushLoggers, getLogger } from '@clearledger/logger';
import { Command, CommanderError } from 'commander';

import { registerProcessCommand } from './features/process/process.js';
import { ExitCodes, exitWithCode } from './features/shared/exit-codes.js';

const logger = getLogger('CLI');
const program = new Command();

async function main() {
  program
    .name('clearledger')
    .description('Replay a CSV of client transactions and print the resulting account balances')
    .version('1.0.0')
    .exitOverride();

  registerProcessCommand(program);

  try {
    await program.parseAsync();
  } catch (error) {
    // commander has already printed its message; help and version exit cleanly
    if (error instanceof CommanderError) {
      exitWithCode(error.exitCode === 0 ? ExitCodes.SUCCESS : ExitCodes.INVALID_ARGS);
    }
    throw error;
  }
}

// Handle unhandled rejections
process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${String(reason)}`);
  flushLoggers();
  process.exit(ExitCodes.GENERAL_ERROR);
});

main().catch((error: unknown) => {
  logger.error({ error }, 'CLI failed');
  flushLoggers();
  process.stderr.write(`${String(error)}\n`);
  process.exit(ExitCodes.GENERAL_ERROR);
});
