import type { Readable } from 'node:stream';

import type { Transaction } from '@clearledger/ledger';
import type { Result } from 'neverthrow';

import { readCsvRows } from './csv-reader.js';
import { decodeRecord } from './decoder.js';
import type { DecodeError } from './errors.js';

export interface DecodedRecord {
  recordNumber: number;
  /** The `tx` cell as written, for reporting records that failed to decode. */
  rawTransactionId: string | undefined;
  result: Result<Transaction, DecodeError>;
}

/**
 * Decoded transactions in input order. Records that fail to decode are yielded
 * as errors rather than skipped, so the caller decides what to do with them.
 */
export async function* readTransactions(input: Readable): AsyncGenerator<DecodedRecord> {
  for await (const row of readCsvRows(input)) {
    yield {
      recordNumber: row.recordNumber,
      rawTransactionId: row.cells['tx'],
      result: decodeRecord(row.cells, row.recordNumber),
    };
  }
}
