/**
 * Unit tests for date utilities.
 */

import { describe, test, expect } from 'vitest';
import {
  addDays,
  formatDate,
  getTrailingWindow,
  isWithinRange,
  parseDate,
  today,
} from '../../src/utils/date.js';

describe('parseDate and formatDate', () => {
  test('round-trip a calendar date', () => {
    expect(formatDate(parseDate('2024-02-29'))).toBe('2024-02-29');
  });

  test('reject a malformed string', () => {
    expect(() => parseDate('2024/01/15')).toThrow(
      'Invalid date format. Expected YYYY-MM-DD, got: 2024/01/15'
    );
  });

  test('reject a day that does not exist', () => {
    expect(() => parseDate('2023-02-29')).toThrow('Invalid calendar date: 2023-02-29');
  });
});

describe('addDays', () => {
  test('crosses month and year boundaries', () => {
    expect(addDays('2024-03-01', -1)).toBe('2024-02-29');
    expect(addDays('2023-12-31', 1)).toBe('2024-01-01');
  });
});

describe('today', () => {
  test('is a YYYY-MM-DD string', () => {
    expect(today()).toMatch(/^\d{4}-\d{2}-\d{2}$/);
  });
});

describe('getTrailingWindow', () => {
  test('counts 30 days per month', () => {
    expect(getTrailingWindow(3, '2024-04-30')).toEqual(['2024-01-31', '2024-04-30']);
    expect(getTrailingWindow(1, '2024-06-30')).toEqual(['2024-05-31', '2024-06-30']);
  });

  test('ends today by default', () => {
    expect(getTrailingWindow(3)[1]).toBe(today());
  });

  test('rejects a window that is not a positive whole number', () => {
    expect(() => getTrailingWindow(0, '2024-04-30')).toThrow(
      'Window must be a positive whole number of months, got 0'
    );
    expect(() => getTrailingWindow(1.5, '2024-04-30')).toThrow();
  });
});

describe('isWithinRange', () => {
  const range: [string, string] = ['2024-04-01', '2024-06-30'];

  test('includes both ends', () => {
    expect(isWithinRange('2024-04-01', range)).toBe(true);
    expect(isWithinRange('2024-06-30', range)).toBe(true);
  });

  test('excludes dates outside', () => {
    expect(isWithinRange('2024-03-31', range)).toBe(false);
    expect(isWithinRange('2024-07-01', range)).toBe(false);
  });
});
