/**
 * Unit tests for snapshot models.
 */

import { describe, test, expect } from 'vitest';
import {
  AccountSchema,
  FinancialProfileSchema,
  FinancialSnapshotSchema,
  MoneySchema,
  TransactionSchema,
  UNCATEGORIZED,
  classifyAccountType,
  getAccountDisplayName,
  getTransactionCategory,
  isLiquidAccount,
} from '../../src/models/index.js';

describe('MoneySchema', () => {
  test('accepts numbers and plain decimal strings', () => {
    expect(MoneySchema.parse(12.5)).toBe(12.5);
    expect(MoneySchema.parse('-1234.56')).toBe('-1234.56');
  });

  test('rejects formatted strings and non-finite numbers', () => {
    expect(MoneySchema.safeParse('$1,234').success).toBe(false);
    expect(MoneySchema.safeParse('1e5').success).toBe(false);
    expect(MoneySchema.safeParse(Infinity).success).toBe(false);
  });
});

describe('AccountSchema', () => {
  test('validates a minimal account', () => {
    const account = AccountSchema.parse({ id: 'a1', account_type: 'checking', balance: 100 });
    expect(account).toEqual({ id: 'a1', account_type: 'checking', balance: 100 });
  });

  test('rejects unknown fields', () => {
    const result = AccountSchema.safeParse({
      id: 'a1',
      account_type: 'checking',
      balance: 100,
      color: 'blue',
    });
    expect(result.success).toBe(false);
  });

  test('rejects an empty id', () => {
    expect(AccountSchema.safeParse({ id: '', account_type: 'checking', balance: 1 }).success).toBe(
      false
    );
  });
});

describe('account helpers', () => {
  test('classifyAccountType', () => {
    expect(classifyAccountType('Checking')).toBe('asset');
    expect(classifyAccountType('investment')).toBe('asset');
    expect(classifyAccountType('CREDIT')).toBe('liability');
    expect(classifyAccountType('loan')).toBe('liability');
    expect(classifyAccountType('property')).toBeUndefined();
  });

  test('isLiquidAccount', () => {
    expect(isLiquidAccount({ id: 'a', account_type: 'Savings', balance: 1 })).toBe(true);
    expect(isLiquidAccount({ id: 'a', account_type: 'investment', balance: 1 })).toBe(false);
  });

  test('getAccountDisplayName prefers name, then institution, then id', () => {
    expect(
      getAccountDisplayName({ id: 'a', account_type: 'x', balance: 0, name: 'Main', institution_name: 'Bank' })
    ).toBe('Main');
    expect(
      getAccountDisplayName({ id: 'a', account_type: 'x', balance: 0, institution_name: 'Bank' })
    ).toBe('Bank');
    expect(getAccountDisplayName({ id: 'a', account_type: 'x', balance: 0 })).toBe('a');
  });
});

describe('TransactionSchema', () => {
  const base = { id: 't1', account_id: 'a1', amount: -20, category: 'food' };

  test('requires a YYYY-MM-DD date', () => {
    expect(TransactionSchema.safeParse({ ...base, date: '2024-01-15' }).success).toBe(true);
    expect(TransactionSchema.safeParse({ ...base, date: '01/15/2024' }).success).toBe(false);
  });

  test('getTransactionCategory normalizes the category', () => {
    expect(getTransactionCategory({ ...base, date: '2024-01-15', category: ' Food ' })).toBe('food');
    expect(getTransactionCategory({ ...base, date: '2024-01-15', category: '' })).toBe(UNCATEGORIZED);
  });
});

describe('FinancialSnapshotSchema', () => {
  test('defaults accounts and transactions to empty lists', () => {
    expect(FinancialSnapshotSchema.parse({})).toEqual({ accounts: [], transactions: [] });
  });

  test('accepts a profile', () => {
    const snapshot = FinancialSnapshotSchema.parse({
      exported_at: '2024-06-30T12:00:00Z',
      profile: { monthly_debt_payment: '350.00', annual_income: 90000 },
    });
    expect(snapshot.profile).toEqual({ monthly_debt_payment: '350.00', annual_income: 90000 });
  });

  test('profile amounts cannot be negative', () => {
    expect(FinancialProfileSchema.safeParse({ monthly_debt_payment: -50 }).success).toBe(false);
    expect(
      FinancialProfileSchema.safeParse({ monthly_debt_payment: 0, annual_income: '-1000' }).success
    ).toBe(false);
    expect(FinancialProfileSchema.safeParse({ monthly_debt_payment: '0.00' }).success).toBe(true);
  });

  test('profile requires a monthly debt payment', () => {
    expect(FinancialProfileSchema.safeParse({ annual_income: 90000 }).success).toBe(false);
  });
});
