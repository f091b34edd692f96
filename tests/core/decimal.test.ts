/**
 * Unit tests for decimal helpers.
 */

import { describe, test, expect } from 'vitest';
import {
  Money,
  formatCurrency,
  roundAmount,
  safeDivide,
  sumMoney,
  toMoney,
} from '../../src/core/decimal.js';

describe('sumMoney', () => {
  test('adds without binary floating point error', () => {
    expect(sumMoney([0.1, 0.2]).equals(new Money('0.3'))).toBe(true);
  });

  test('accepts strings and decimals', () => {
    expect(sumMoney(['1234.56', toMoney(0.44), 5]).toNumber()).toBe(1240);
  });

  test('sums an empty list to zero', () => {
    expect(sumMoney([]).isZero()).toBe(true);
  });
});

describe('safeDivide', () => {
  test('divides by a positive divisor', () => {
    expect(safeDivide(10, 4).toNumber()).toBe(2.5);
  });

  test('returns zero for a zero or negative divisor', () => {
    expect(safeDivide(1, 0).isZero()).toBe(true);
    expect(safeDivide(1, -5).isZero()).toBe(true);
  });
});

describe('roundAmount', () => {
  test('rounds half up to cents', () => {
    expect(roundAmount(10.125)).toBe(10.13);
    expect(roundAmount('2.345')).toBe(2.35);
    expect(roundAmount(-2.345)).toBe(-2.35);
  });

  test('rounds to the requested places', () => {
    expect(roundAmount(new Money('4.25'), 1)).toBe(4.3);
    expect(roundAmount(1234.5, 0)).toBe(1235);
  });
});

describe('formatCurrency', () => {
  test('adds a dollar sign and thousands separators', () => {
    expect(formatCurrency(1234.5)).toBe('$1,234.50');
    expect(formatCurrency(1000000)).toBe('$1,000,000.00');
    expect(formatCurrency(999)).toBe('$999.00');
  });

  test('puts the sign before the dollar sign', () => {
    expect(formatCurrency(-1234567.891)).toBe('-$1,234,567.89');
  });

  test('does not print negative zero', () => {
    expect(formatCurrency(-0.001)).toBe('$0.00');
  });
});
