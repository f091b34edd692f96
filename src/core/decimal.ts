/**
 * Exact decimal helpers shared by the metrics and affordability engines.
 *
 * All arithmetic stays in full precision; rounding happens once, at the
 * presentation boundary, through {@link roundAmount}.
 */

import { Decimal } from 'decimal.js';

/**
 * Decimal constructor used throughout the engines.
 *
 * 34 significant digits keep (1 + r)^n for 40-year monthly schedules exact
 * well past the cent.
 */
export const Money = Decimal.clone({ precision: 34, rounding: Decimal.ROUND_HALF_UP });

export type Numeric = Decimal.Value;

export const ZERO = new Money(0);
export const ONE = new Money(1);
export const HUNDRED = new Money(100);
export const MONTHS_PER_YEAR = new Money(12);

/**
 * Convert a number, decimal string or Decimal into an engine Decimal.
 */
export function toMoney(value: Numeric): Decimal {
  return new Money(value);
}

/**
 * Sum a list of values exactly.
 */
export function sumMoney(values: Iterable<Numeric>): Decimal {
  let total = ZERO;
  for (const value of values) {
    total = total.plus(value);
  }
  return total;
}

/**
 * Divide, returning zero when the divisor is not positive.
 */
export function safeDivide(numerator: Numeric, divisor: Numeric): Decimal {
  const d = toMoney(divisor);
  if (d.lte(0)) return ZERO;
  return toMoney(numerator).div(d);
}

/**
 * Round to a fixed number of decimal places (half-up) and return a plain
 * number for serialization.
 *
 * @example
 * roundAmount(new Money('10.125'))    // 10.13
 * roundAmount(new Money('4.25'), 1)   // 4.3
 */
export function roundAmount(value: Numeric, places = 2): number {
  return toMoney(value).toDecimalPlaces(places, Decimal.ROUND_HALF_UP).toNumber();
}

/**
 * Format a value as US dollars with thousands separators, e.g. "$1,234.50".
 */
export function formatCurrency(value: Numeric): string {
  const rounded = toMoney(value).toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
  const sign = rounded.isNegative() && !rounded.isZero() ? '-' : '';
  const [whole, fraction] = rounded.abs().toFixed(2).split('.');
  const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  return `${sign}$${grouped}.${fraction}`;
}

export { Decimal };
