import Decimal from 'decimal.js';

// Configure Decimal.js globally for financial precision
Decimal.set({
  precision: 20,           // 20 significant digits
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,         // No exponential notation for large numbers
  toExpNeg: -9e15,        // No exponential notation for small numbers
});

export type DecimalLike = number | string | Decimal;

/**
 * Converts any number-like value to Decimal for financial calculations.
 * Handles JavaScript numbers, strings, and existing Decimal instances.
 */
export function toDecimal(value: DecimalLike): Decimal {
  return new Decimal(value);
}

/**
 * Rounds half-up to a fixed number of places and returns a plain number.
 * Money goes out at 2 places, quantities and prices at 6.
 */
export function roundTo(value: DecimalLike, places: number): number {
  return toDecimal(value).toDecimalPlaces(places, Decimal.ROUND_HALF_UP).toNumber();
}

/**
 * Sums a list of Decimal values. Takes an array rather than rest
 * parameters: lot queues can outgrow the engine's argument limit.
 */
export function sum(values: readonly DecimalLike[]): Decimal {
  return values.reduce<Decimal>((total, val) => total.plus(val), new Decimal(0));
}

/**
 * Division that yields `fallback` instead of throwing when the denominator is zero.
 */
export function safeDivide(
  numerator: DecimalLike,
  denominator: DecimalLike,
  fallback: DecimalLike = 0,
): Decimal {
  const d = toDecimal(denominator);
  if (d.isZero()) {
    return toDecimal(fallback);
  }
  return toDecimal(numerator).dividedBy(d);
}

/** |a - b| <= tolerance */
export function isApproximatelyEqual(
  a: DecimalLike,
  b: DecimalLike,
  tolerance: DecimalLike = 0.0001,
): boolean {
  return toDecimal(a).minus(b).abs().lessThanOrEqualTo(tolerance);
}

/**
 * Return on investment as a percentage.
 * calculateRoi(1000, 1500) -> 50, calculateRoi(0, x) -> 0
 */
export function calculateRoi(invested: DecimalLike, currentValue: DecimalLike): Decimal {
  const base = toDecimal(invested);
  if (base.isZero()) {
    return new Decimal(0);
  }
  return toDecimal(currentValue).minus(base).dividedBy(base).times(100);
}

/**
 * Scales a raw smallest-unit amount (wei, etc.) to a human quantity.
 * The sign is dropped: direction is carried by the transfer type.
 */
export function scaleRawAmount(raw: DecimalLike, decimals: number): Decimal {
  return toDecimal(raw).abs().dividedBy(new Decimal(10).pow(decimals));
}
