import { Decimal } from 'decimal.js';

/**
 * Number of fractional digits carried by every monetary amount, both on input
 * and in the balance report.
 */
export const AMOUNT_DECIMAL_PLACES = 4;

/** Integer digits an input amount may carry: amounts stay below 10^20. */
export const AMOUNT_INTEGER_DIGITS = 20;

// Input amounts have at most 20 integer and 4 fractional digits, and there are at
// most 2^32 deposits, so every balance fits in 34 significant digits and
// add/subtract never round.
Decimal.set({
  precision: 40,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -7,
  toExpPos: 21,
});

// Plain decimal notation only: decimal.js would otherwise accept hex, binary,
// exponents, NaN and Infinity.
const PLAIN_DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Try to parse a string to a Decimal. Empty and missing values parse to zero.
 */
export function tryParseDecimal(value: string | Decimal | undefined | null, out?: { value: Decimal }): boolean {
  if (value === undefined || value === null || value === '') {
    if (out) out.value = new Decimal(0);
    return true;
  }

  if (typeof value === 'string' && !PLAIN_DECIMAL_PATTERN.test(value.trim())) {
    return false;
  }

  try {
    const decimal = new Decimal(typeof value === 'string' ? value.trim() : value);
    if (out) out.value = decimal;
    return true;
  } catch {
    return false;
  }
}

/**
 * Parse a string to a Decimal with fallback to zero
 */
export function parseDecimal(value: string | Decimal | undefined | null): Decimal {
  const result = { value: new Decimal(0) };
  tryParseDecimal(value, result);
  return result.value;
}

/**
 * True when the value carries more fractional digits than the ledger keeps.
 */
export function exceedsAmountPrecision(decimal: Decimal, places = AMOUNT_DECIMAL_PLACES): boolean {
  return decimal.decimalPlaces() > places;
}

/**
 * True when the value has more integer digits than an input amount may carry.
 */
export function exceedsAmountMagnitude(decimal: Decimal, integerDigits = AMOUNT_INTEGER_DIGITS): boolean {
  return decimal.abs().greaterThanOrEqualTo(new Decimal(10).pow(integerDigits));
}

/**
 * Render a Decimal with a fixed number of fractional digits (no exponent notation).
 */
export function formatFixed(decimal: Decimal, places = AMOUNT_DECIMAL_PLACES): string {
  return decimal.toFixed(places);
}

export function isNegative(decimal: Decimal): boolean {
  return decimal.lessThan(0);
}
