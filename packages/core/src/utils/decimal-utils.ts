import { Decimal } from 'decimal.js';

// Configure Decimal.js for settlement amounts and percentage arithmetic.
// Rounding is half-up (away from zero) so 8/4 decimal place outputs are stable across magnitudes.
Decimal.set({
  maxE: 9e15, // Maximum exponent
  minE: -9e15, // Minimum exponent
  modulo: Decimal.ROUND_HALF_UP,
  precision: 28,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -7, // Use exponential notation for numbers smaller than 1e-7
  toExpPos: 21, // Use exponential notation for numbers larger than 1e+21
});

/** Number of decimal places kept for monetary amounts */
export const AMOUNT_DECIMAL_PLACES = 8;

/** Number of decimal places kept for percentages */
export const PERCENT_DECIMAL_PLACES = 4;

/**
 * Anything a caller may hand over as a decimal value.
 */
export type DecimalInput = Decimal | string | number | null | undefined;

/**
 * Try to parse a value to a finite Decimal.
 *
 * Unlike a zero fallback, missing values stay missing: null, undefined and empty
 * strings return false, as do NaN, Infinity and unparseable strings.
 */
export function tryParseDecimal(value: DecimalInput, out?: { value: Decimal }): boolean {
  if (value === undefined || value === null) {
    return false;
  }

  if (typeof value === 'string' && value.trim() === '') {
    return false;
  }

  try {
    const decimal = new Decimal(typeof value === 'string' ? value.trim() : value);
    if (!decimal.isFinite()) {
      return false;
    }
    if (out) out.value = decimal;
    return true;
  } catch {
    return false;
  }
}

/**
 * Parse a value to a finite Decimal, or undefined when it is missing or invalid
 */
export function parseFiniteDecimal(value: DecimalInput): Decimal | undefined {
  const result = { value: new Decimal(0) };
  return tryParseDecimal(value, result) ? result.value : undefined;
}

/**
 * Round half-up to a fixed number of decimal places
 */
export function roundDecimal(decimal: Decimal, decimalPlaces: number): Decimal {
  return decimal.toDecimalPlaces(decimalPlaces, Decimal.ROUND_HALF_UP);
}

/**
 * Round a monetary amount to 8 decimal places
 */
export function roundAmount(decimal: Decimal): Decimal {
  return roundDecimal(decimal, AMOUNT_DECIMAL_PLACES);
}

/**
 * Round a percentage to 4 decimal places
 */
export function roundPercent(decimal: Decimal): Decimal {
  return roundDecimal(decimal, PERCENT_DECIMAL_PLACES);
}

/**
 * Convert Decimal to string with appropriate precision for display
 */
export function formatDecimal(decimal: Decimal, maxDecimalPlaces = 8): string {
  const fixed = decimal.toFixed(maxDecimalPlaces);
  return fixed.includes('.') ? fixed.replace(/\.?0+$/, '') : fixed;
}
