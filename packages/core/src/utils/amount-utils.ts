import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

/**
 * Amounts are stored as a bigint count of base units: 1/10 000ths of the
 * currency unit. Conversion to and from decimal text only happens at I/O edges.
 */
export type BaseUnits = bigint;

export const AMOUNT_DECIMAL_PLACES = 4;
export const BASE_UNIT_SCALE = 10n ** BigInt(AMOUNT_DECIMAL_PLACES);

/** Largest accepted amount magnitude, in currency units. */
export const MAX_AMOUNT = '1000000000000000';

const DECIMAL_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// Local clone so the global Decimal configuration of other libraries is left alone
const AmountDecimal = Decimal.clone({
  precision: 40,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -18,
  toExpPos: 30,
});

/**
 * Parse decimal text into base units, rounding half-up to four fractional digits.
 * Fails for anything that is not a finite number or whose magnitude exceeds `MAX_AMOUNT`.
 */
export function parseBaseUnits(value: string): Result<BaseUnits, Error> {
  const trimmed = value.trim();
  if (!trimmed) {
    return err(new Error('Amount is empty'));
  }

  // decimal.js also takes hex/binary/octal literals and Infinity; amounts are plain decimals only
  if (!DECIMAL_TEXT.test(trimmed)) {
    return err(new Error(`Amount is not a number: ${trimmed}`));
  }

  const decimal = new AmountDecimal(trimmed);
  // Must run before toFixed(0), which writes out every digit of the exponent
  if (decimal.abs().greaterThan(MAX_AMOUNT)) {
    return err(new Error(`Amount exceeds ${MAX_AMOUNT}`));
  }

  const scaled = decimal.times(BASE_UNIT_SCALE.toString()).toDecimalPlaces(0, Decimal.ROUND_HALF_UP);
  return ok(BigInt(scaled.toFixed(0)));
}

/**
 * Convert base units back to a display decimal.
 */
export function baseUnitsToDecimal(units: BaseUnits): Decimal {
  return new AmountDecimal(units.toString()).dividedBy(BASE_UNIT_SCALE.toString());
}

/**
 * Convert a display decimal (or decimal text) to base units.
 */
export function decimalToBaseUnits(value: Decimal | string): BaseUnits {
  const decimal = new AmountDecimal(value);
  return BigInt(decimal.times(BASE_UNIT_SCALE.toString()).toDecimalPlaces(0, Decimal.ROUND_HALF_UP).toFixed(0));
}

/**
 * Format an amount with at most four fractional digits, trailing zeros trimmed.
 * `100.5000` → `100.5`, `-50.0000` → `-50`.
 */
export function formatAmount(value: Decimal | BaseUnits): string {
  const decimal = typeof value === 'bigint' ? baseUnitsToDecimal(value) : value;
  const fixed = decimal.toFixed(AMOUNT_DECIMAL_PLACES, Decimal.ROUND_HALF_UP);
  const trimmed = fixed.replace(/\.?0+$/, '');
  return trimmed === '-0' ? '0' : trimmed;
}
