import Decimal from 'decimal.js';

// Configure Decimal.js globally for financial precision
Decimal.set({
  precision: 20,           // 20 significant digits
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,         // No exponential notation for large numbers
  toExpNeg: -9e15,        // No exponential notation for small numbers
});

/**
 * Converts any number-like value to Decimal for ledger arithmetic.
 * Handles JavaScript numbers, strings, and existing Decimal instances.
 */
export function toDecimal(value: number | string | Decimal): Decimal {
  return new Decimal(value);
}

/**
 * Converts Decimal to a JSON number rounded to 2 decimal places.
 * Used for every money and percent field leaving the ledger.
 */
export function toMoney(value: Decimal): number {
  const rounded = value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toNumber();
  // normalizes -0
  return rounded === 0 ? 0 : rounded;
}

/**
 * Formats Decimal as a fixed 2-decimal string for CSV output.
 */
export function formatAmount(value: Decimal): string {
  const fixed = value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toFixed(2);
  return fixed === '-0.00' ? '0.00' : fixed;
}

/**
 * Safe addition of Decimal values.
 */
export function add(...values: Decimal[]): Decimal {
  return values.reduce((sum, val) => sum.plus(val), new Decimal(0));
}

/**
 * Safe division with zero check.
 */
export function divide(a: Decimal, b: Decimal | number): Decimal {
  const divisor = toDecimal(b);
  if (divisor.isZero()) {
    throw new Error('Division by zero');
  }
  return a.dividedBy(divisor);
}
