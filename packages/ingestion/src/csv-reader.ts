import type { Readable } from 'node:stream';

import { getLogger } from '@clearledger/logger';
import { parse } from 'csv-parse';

import { CsvHeaderError } from './errors.js';
import { REQUIRED_COLUMNS } from './record-schema.js';

const logger = getLogger('csv-reader');

export interface CsvRow {
  /** 1-based position among data rows (the header is not counted). */
  recordNumber: number;
  cells: Record<string, string | undefined>;
}

/**
 * Stream the rows of a transaction CSV, keyed by lower-cased header name.
 *
 * The whole file is never held in memory. A BOM, blank lines and whitespace
 * around cells are ignored; rows may be shorter than the header (dispute rows
 * usually have no amount cell).
 *
 * @throws CsvHeaderError when a required column is missing from the header
 */
export async function* readCsvRows(input: Readable): AsyncGenerator<CsvRow> {
  const parser = parse({
    bom: true,
    relax_column_count: true,
    skip_empty_lines: true,
    trim: true,
  });
  // pipe() does not forward source errors
  input.once('error', (error) => parser.destroy(error));
  input.pipe(parser);

  let header: string[] | undefined;
  let recordNumber = 0;

  try {
    for await (const row of parser) {
      if (!isStringRow(row)) {
        throw new Error(`Unexpected CSV parser output: ${typeof row}`);
      }

      if (!header) {
        const names = row.map((name) => name.toLowerCase());
        const missing = REQUIRED_COLUMNS.filter((column) => !names.includes(column));
        if (missing.length > 0) {
          throw new CsvHeaderError(`Missing required CSV column(s): ${missing.join(', ')}`, row);
        }
        logger.debug({ header: names }, 'CSV header accepted');
        header = names;
        continue;
      }

      recordNumber++;
      const cells: Record<string, string | undefined> = {};
      header.forEach((name, index) => {
        cells[name] = row[index];
      });
      yield { recordNumber, cells };
    }
  } finally {
    input.destroy();
  }
}

function isStringRow(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((cell) => typeof cell === 'string');
}
