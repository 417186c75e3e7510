export { type CsvRow, readCsvRows } from './csv-reader.js';
export { decodeRecord } from './decoder.js';
export {
  CsvHeaderError,
  type DecodeError,
  type DecodeErrorCode,
  InvalidAmountError,
  MalformedRecordError,
  MissingAmountError,
} from './errors.js';
export { RawTransactionRecordSchema, REQUIRED_COLUMNS } from './record-schema.js';
export { type DecodedRecord, readTransactions } from './transaction-source.js';
