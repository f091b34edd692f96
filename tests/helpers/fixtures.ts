/**
 * Shared snapshot fixture for metrics, tools and server tests.
 *
 * With as_of 2024-06-30 and a 3-month window the range is
 * 2024-04-01..2024-06-30, which gives:
 *   assets 30000, liabilities 22500, net worth 7500, liquid cash 20000
 *   income 10500 / 3 = 3500, expenses 4800 / 3 = 1600
 *   estimated debt service 2500 × 0.03 + 20000 × 0.01 = 275
 */

import type { Account, FinancialSnapshot, Transaction } from '../../src/models/index.js';

export const AS_OF = '2024-06-30';

export const mockAccounts: Account[] = [
  { id: 'chk', account_type: 'checking', balance: 5000, name: 'Everyday Checking' },
  { id: 'sav', account_type: 'savings', balance: '15000.00', institution_name: 'Example Bank' },
  { id: 'inv', account_type: 'investment', balance: 10000 },
  { id: 'cc', account_type: 'credit', balance: -2500, credit_limit: 8000 },
  { id: 'car', account_type: 'Loan', balance: -20000 },
  { id: 'house', account_type: 'property', balance: 300000 },
];

export const mockTransactions: Transaction[] = [
  // Income inside the window
  { id: 't1', account_id: 'chk', date: '2024-06-15', amount: 3500, category: 'salary' },
  { id: 't2', account_id: 'chk', date: '2024-05-15', amount: 3500, category: 'Salary' },
  { id: 't3', account_id: 'chk', date: '2024-04-15', amount: '3500.00', category: 'paycheck' },
  // Income before the window
  { id: 't4', account_id: 'chk', date: '2024-03-15', amount: 3500, category: 'salary' },
  // Inflow that is not income
  { id: 't5', account_id: 'sav', date: '2024-06-01', amount: 500, category: 'transfer' },
  // Spending
  { id: 't6', account_id: 'chk', date: '2024-06-10', amount: -1200, category: 'rent' },
  { id: 't7', account_id: 'chk', date: '2024-05-10', amount: -1200, category: 'rent' },
  { id: 't8', account_id: 'chk', date: '2024-04-10', amount: -1200, category: 'rent' },
  { id: 't9', account_id: 'chk', date: '2024-06-20', amount: -300, category: 'groceries' },
  { id: 't10', account_id: 'chk', date: '2024-05-20', amount: -600, category: ' Groceries ' },
  { id: 't14', account_id: 'chk', date: '2024-04-01', amount: -300, category: 'dining' },
  // Outflows that are not spending
  { id: 't11', account_id: 'chk', date: '2024-06-25', amount: -1000, category: 'payment' },
  { id: 't12', account_id: 'chk', date: '2024-06-26', amount: -400, category: 'transfer' },
  // Spending before the window
  { id: 't13', account_id: 'chk', date: '2024-03-31', amount: -999, category: 'rent' },
];

export function createMockSnapshot(overrides: Partial<FinancialSnapshot> = {}): FinancialSnapshot {
  return {
    accounts: mockAccounts.map((account) => ({ ...account })),
    transactions: mockTransactions.map((txn) => ({ ...txn })),
    ...overrides,
  };
}
