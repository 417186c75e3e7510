import type { Readable } from 'node:stream';

import type { DomainError } from '@clearledger/core';
import { readTransactions } from '@clearledger/ingestion';
import type { ClientBalance, LedgerEngine } from '@clearledger/ledger';
import { getLogger } from '@clearledger/logger';
import { err, ok, type Result } from 'neverthrow';

const logger = getLogger('ProcessHandler');

/**
 * Result of the process operation.
 */
export interface ProcessSummary {
  /** Data rows read from the input */
  records: number;

  /** Records the engine applied */
  accepted: number;

  /** Records skipped because they failed to decode or were refused by the engine */
  rejected: number;

  /** Skipped records counted by error code */
  rejectionsByCode: Record<string, number>;

  /** Final balances, in no particular order */
  balances: readonly ClientBalance[];
}

/**
 * Process handler parameters
 */
export interface ProcessHandlerParams {
  /** CSV transaction stream */
  input: Readable;
}

/**
 * Feeds a transaction stream through the decoder and the ledger engine, one
 * record at a time and strictly in input order.
 *
 * A record that fails is logged and skipped. Only a failure to read the input
 * itself ends the run with an error.
 */
export class ProcessHandler {
  constructor(private readonly engine: LedgerEngine) {}

  async execute(params: ProcessHandlerParams): Promise<Result<ProcessSummary, Error>> {
    const summary: ProcessSummary = {
      records: 0,
      accepted: 0,
      rejected: 0,
      rejectionsByCode: {},
      balances: [],
    };

    try {
      for await (const record of readTransactions(params.input)) {
        summary.records++;

        const decoded = record.result;
        if (decoded.isErr()) {
          this.skip(summary, record.rawTransactionId, decoded.error);
          continue;
        }

        const accepted = this.engine.accept(decoded.value);
        if (accepted.isErr()) {
          this.skip(summary, String(decoded.value.id), accepted.error);
          continue;
        }

        summary.accepted++;
      }
    } catch (error) {
      return err(error instanceof Error ? error : new Error(String(error)));
    }

    logger.debug({ accepted: summary.accepted, rejected: summary.rejected }, 'Input exhausted');
    return ok({ ...summary, balances: this.engine.balances() });
  }

  private skip(summary: ProcessSummary, tx: string | undefined, error: DomainError): void {
    summary.rejected++;
    summary.rejectionsByCode[error.code] = (summary.rejectionsByCode[error.code] ?? 0) + 1;
    logger.warn({ tx, code: error.code, error: error.message }, 'Ignoring transaction with error');
  }
}
