import Decimal from 'decimal.js';

// Configure Decimal.js globally for financial precision
Decimal.set({
  precision: 20,           // 20 significant digits
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,         // No exponential notation for large numbers
  toExpNeg: -9e15,        // No exponential notation for small numbers
});

const ZERO = new Decimal(0);

// Thousands separators, whitespace and the currency symbols brokers put in exports.
const NUMERIC_NOISE = /[,\s₹$€£]/g;
const PLAIN_NUMBER = /^[-+]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Converts any number-like value to Decimal for financial calculations.
 * Handles JavaScript numbers, strings, and existing Decimal instances.
 */
export function toDecimal(value: number | string | Decimal): Decimal {
  return new Decimal(value);
}

/**
 * Lenient parse for values read from trade files.
 * Returns null when the value is not a number after stripping separators and currency symbols.
 */
export function parseDecimal(value: number | string): Decimal | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? new Decimal(value) : null;
  }
  const cleaned = value.replace(NUMERIC_NOISE, '');
  if (!PLAIN_NUMBER.test(cleaned)) {
    return null;
  }
  return new Decimal(cleaned);
}

/**
 * Converts Decimal back to JavaScript number for JSON serialization.
 * Rounds to 8 decimal places.
 */
export function toNumber(value: Decimal): number {
  return value.toDecimalPlaces(8).toNumber();
}

/** Rounds half-up to a fixed number of places. */
export function round(value: Decimal, places: number): Decimal {
  return value.toDecimalPlaces(places, Decimal.ROUND_HALF_UP);
}

/** Floors a residual at zero. */
export function clampToZero(value: Decimal): Decimal {
  return value.isNegative() ? ZERO : value;
}

/**
 * Division that yields zero for a zero divisor.
 * Averages over empty holdings are reported as zero, not as errors.
 */
export function divideOrZero(a: Decimal, b: Decimal): Decimal {
  if (b.isZero()) {
    return ZERO;
  }
  return a.dividedBy(b);
}
