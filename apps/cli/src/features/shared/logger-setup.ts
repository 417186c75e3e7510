import { getLogFilePath, getLogLevel } from '@clearledger/env';
import { ConsoleSink, FileSink, initLogger, type Sink } from '@clearledger/logger';

export interface CliLoggerOptions {
  verbose?: boolean | undefined;
}

/**
 * Point every logger at stderr (and the optional log file). `--verbose` forces
 * the debug level regardless of CLEARLEDGER_LOG_LEVEL.
 */
export function configureCliLogger(options: CliLoggerOptions): void {
  const sinks: Sink[] = [new ConsoleSink({ color: process.stderr.isTTY })];

  const logFile = getLogFilePath();
  if (logFile) {
    sinks.push(new FileSink({ path: logFile }));
  }

  initLogger({ level: options.verbose ? 'debug' : getLogLevel(), sinks });
}
