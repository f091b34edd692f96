/**
 * Financial metrics derived from an account and transaction snapshot.
 *
 * Every function is pure and degrades to zero on empty or degenerate input:
 * a user with no accounts or no history is a valid state, not an error.
 */

import type { Account, FinancialSnapshot, Transaction } from '../models/index.js';
import {
  classifyAccountType,
  getTransactionCategory,
  isLiquidAccount,
} from '../models/index.js';
import { getTrailingWindow, isWithinRange, today } from '../utils/date.js';
import { type ClassificationPolicy, DEFAULT_CLASSIFICATION_POLICY } from './classification.js';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from './config.js';
import { Decimal, HUNDRED, ZERO, safeDivide, sumMoney, toMoney, type Numeric } from './decimal.js';

export interface AssetsAndLiabilities {
  assets: Decimal;
  liabilities: Decimal;
}

export interface WindowOptions {
  /** Trailing window length in months (30 days each). Default: 3 */
  windowMonths?: number;
  /** Last day of the window, YYYY-MM-DD. Default: today */
  asOf?: string;
}

export interface ClassifiedWindowOptions extends WindowOptions {
  policy?: ClassificationPolicy;
}

/**
 * Minimum-payment proxy rates used to estimate monthly debt service.
 */
export interface DebtServiceRates {
  credit: Numeric;
  loan: Numeric;
}

export const DEFAULT_DEBT_SERVICE_RATES: DebtServiceRates = {
  credit: DEFAULT_ENGINE_CONFIG.credit_payment_rate,
  loan: DEFAULT_ENGINE_CONFIG.loan_payment_rate,
};

export type BreakdownSign = 'expense' | 'income';

export interface CategoryShare {
  category: string;
  amount: Decimal;
  /** Share of the breakdown total, 0–100 */
  percentage: Decimal;
}

export interface FinancialMetrics {
  assets: Decimal;
  liabilities: Decimal;
  netWorth: Decimal;
  liquidCash: Decimal;
  monthlyIncome: Decimal;
  monthlyExpenses: Decimal;
  savingsRate: Decimal;
  emergencyBufferMonths: Decimal;
  monthlyDebtService: Decimal;
  dtiRatio: Decimal;
  expenseBreakdown: CategoryShare[];
  incomeBreakdown: CategoryShare[];
  window: [string, string];
  accountCount: number;
  transactionCount: number;
}

const DEFAULT_WINDOW_MONTHS = DEFAULT_ENGINE_CONFIG.window_months;

/**
 * Partition accounts into assets and liabilities.
 *
 * Checking, savings and investment balances are assets; credit and loan
 * balances count as |balance| liabilities whatever sign they were stored with.
 * Accounts of any other type are ignored.
 */
export function assetsAndLiabilities(accounts: readonly Account[]): AssetsAndLiabilities {
  let assets = ZERO;
  let liabilities = ZERO;

  for (const account of accounts) {
    const kind = classifyAccountType(account.account_type);
    if (kind === 'asset') {
      assets = assets.plus(account.balance);
    } else if (kind === 'liability') {
      liabilities = liabilities.plus(toMoney(account.balance).abs());
    }
  }

  return { assets, liabilities };
}

/**
 * Net worth: assets minus liabilities.
 */
export function netWorth(accounts: readonly Account[]): Decimal {
  const { assets, liabilities } = assetsAndLiabilities(accounts);
  return assets.minus(liabilities);
}

/**
 * Cash available immediately: checking plus savings balances.
 */
export function liquidCash(accounts: readonly Account[]): Decimal {
  return sumMoney(accounts.filter(isLiquidAccount).map((account) => account.balance));
}

/**
 * Transactions dated inside the trailing window.
 */
function inWindow(transactions: readonly Transaction[], options: WindowOptions): Transaction[] {
  const range = getTrailingWindow(options.windowMonths ?? DEFAULT_WINDOW_MONTHS, options.asOf);
  return transactions.filter((txn) => isWithinRange(txn.date, range));
}

/**
 * Average monthly income over the trailing window.
 *
 * Only inflows whose category the policy accepts as income are counted, so
 * positive transfers and refunds do not inflate the figure.
 */
export function monthlyIncome(
  transactions: readonly Transaction[],
  options: ClassifiedWindowOptions = {}
): Decimal {
  const policy = options.policy ?? DEFAULT_CLASSIFICATION_POLICY;
  const windowMonths = options.windowMonths ?? DEFAULT_WINDOW_MONTHS;

  const total = sumMoney(
    inWindow(transactions, options)
      .filter((txn) => toMoney(txn.amount).gt(0) && policy.isIncome(txn))
      .map((txn) => txn.amount)
  );

  return total.div(windowMonths);
}

/**
 * Average monthly expenses over the trailing window.
 *
 * Outflows the policy marks as non-spending (transfers, debt payments) are
 * left out so they are not counted twice.
 */
export function monthlyExpenses(
  transactions: readonly Transaction[],
  options: ClassifiedWindowOptions = {}
): Decimal {
  const policy = options.policy ?? DEFAULT_CLASSIFICATION_POLICY;
  const windowMonths = options.windowMonths ?? DEFAULT_WINDOW_MONTHS;

  const total = sumMoney(
    inWindow(transactions, options)
      .filter((txn) => toMoney(txn.amount).lt(0) && policy.isExpense(txn))
      .map((txn) => toMoney(txn.amount).abs())
  );

  return total.div(windowMonths);
}

/**
 * Savings rate as a percentage of income; 0 when income is not positive.
 */
export function savingsRate(income: Numeric, expenses: Numeric): Decimal {
  return safeDivide(toMoney(income).minus(expenses), income).times(HUNDRED);
}

/**
 * Months of expenses covered by liquid cash; 0 when expenses are not positive.
 */
export function emergencyBufferMonths(cash: Numeric, expenses: Numeric): Decimal {
  return safeDivide(cash, expenses);
}

/**
 * Estimated monthly debt service across credit and loan accounts.
 *
 * Real minimum-payment schedules are not modelled; a fixed share of each
 * balance stands in for them.
 */
export function estimatedMonthlyDebtService(
  accounts: readonly Account[],
  rates: DebtServiceRates = DEFAULT_DEBT_SERVICE_RATES
): Decimal {
  let total = ZERO;
  for (const account of accounts) {
    const type = account.account_type.toLowerCase();
    const balance = toMoney(account.balance).abs();
    if (type === 'credit') {
      total = total.plus(balance.times(rates.credit));
    } else if (type === 'loan') {
      total = total.plus(balance.times(rates.loan));
    }
  }
  return total;
}

/**
 * Debt-to-income ratio as a percentage; 0 when income is not positive.
 *
 * @param options.additionalMonthlyDebt - Recurring debt not visible as an
 *   account balance, e.g. from the financial profile
 */
export function dtiRatio(
  accounts: readonly Account[],
  income: Numeric,
  options: { additionalMonthlyDebt?: Numeric; rates?: DebtServiceRates } = {}
): Decimal {
  const debt = estimatedMonthlyDebtService(accounts, options.rates).plus(
    options.additionalMonthlyDebt ?? 0
  );
  return safeDivide(debt, income).times(HUNDRED);
}

/**
 * Group transactions of one sign by category.
 *
 * Amounts are magnitudes; percentages are full precision and sum to 100.
 * Results are sorted by amount descending, then category name. A zero total
 * yields an empty list.
 *
 * @param options - When given, only transactions inside the trailing window count
 */
export function categoryBreakdown(
  transactions: readonly Transaction[],
  sign: BreakdownSign,
  options?: WindowOptions
): CategoryShare[] {
  const scoped = options ? inWindow(transactions, options) : transactions;
  const totals = new Map<string, Decimal>();

  for (const txn of scoped) {
    const amount = toMoney(txn.amount);
    const matches = sign === 'expense' ? amount.lt(0) : amount.gt(0);
    if (!matches) continue;

    const category = getTransactionCategory(txn);
    totals.set(category, (totals.get(category) ?? ZERO).plus(amount.abs()));
  }

  const grandTotal = sumMoney(totals.values());
  if (grandTotal.isZero()) {
    return [];
  }

  return Array.from(totals.entries())
    .map(([category, amount]) => ({
      category,
      amount,
      percentage: amount.div(grandTotal).times(HUNDRED),
    }))
    .sort((a, b) => b.amount.comparedTo(a.amount) || a.category.localeCompare(b.category));
}

/**
 * Metrics calculator bound to a classification policy and configuration.
 */
export class MetricsCalculator {
  private readonly policy: ClassificationPolicy;
  private readonly config: EngineConfig;

  /**
   * @param options.policy - Income/expense classification (default lists when omitted)
   * @param options.config - Window length and debt-service proxy rates
   */
  constructor(
    options: { policy?: ClassificationPolicy; config?: EngineConfig } = {}
  ) {
    this.policy = options.policy ?? DEFAULT_CLASSIFICATION_POLICY;
    this.config = options.config ?? { ...DEFAULT_ENGINE_CONFIG };
  }

  get debtServiceRates(): DebtServiceRates {
    return {
      credit: this.config.credit_payment_rate,
      loan: this.config.loan_payment_rate,
    };
  }

  /**
   * Compute every dashboard metric from one snapshot.
   *
   * @param snapshot - Accounts, transactions and optional profile
   * @param options - Window overrides; defaults come from the configuration
   */
  computeAll(
    snapshot: Pick<FinancialSnapshot, 'accounts' | 'transactions' | 'profile'>,
    options: WindowOptions = {}
  ): FinancialMetrics {
    const window: ClassifiedWindowOptions = {
      windowMonths: options.windowMonths ?? this.config.window_months,
      asOf: options.asOf ?? today(),
      policy: this.policy,
    };
    const { accounts, transactions, profile } = snapshot;

    const { assets, liabilities } = assetsAndLiabilities(accounts);
    const cash = liquidCash(accounts);
    const income = monthlyIncome(transactions, window);
    const expenses = monthlyExpenses(transactions, window);
    const rates = this.debtServiceRates;
    const additionalMonthlyDebt = profile?.monthly_debt_payment ?? 0;

    return {
      assets,
      liabilities,
      netWorth: assets.minus(liabilities),
      liquidCash: cash,
      monthlyIncome: income,
      monthlyExpenses: expenses,
      savingsRate: savingsRate(income, expenses),
      emergencyBufferMonths: emergencyBufferMonths(cash, expenses),
      monthlyDebtService: estimatedMonthlyDebtService(accounts, rates).plus(additionalMonthlyDebt),
      dtiRatio: dtiRatio(accounts, income, { additionalMonthlyDebt, rates }),
      expenseBreakdown: categoryBreakdown(transactions, 'expense', window),
      incomeBreakdown: categoryBreakdown(transactions, 'income', window),
      window: getTrailingWindow(window.windowMonths ?? this.config.window_months, window.asOf),
      accountCount: accounts.length,
      transactionCount: transactions.length,
    };
  }
}
