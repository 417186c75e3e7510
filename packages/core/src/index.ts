export { DomainError, InvariantViolationError } from './errors/index.js';
export {
  AMOUNT_DECIMAL_PLACES,
  BASE_UNIT_SCALE,
  type BaseUnits,
  baseUnitsToDecimal,
  decimalToBaseUnits,
  formatAmount,
  MAX_AMOUNT,
  parseBaseUnits,
} from './utils/amount-utils.js';
export { type ClientId, ClientIdSchema, type TransactionId, TransactionIdSchema } from './schemas/identifiers.js';
