/**
 * MCP tool definitions for financial metrics and home affordability.
 *
 * Tools that read the user's data go through the snapshot store; the
 * calculator tools work purely from their arguments.
 */

import { z } from 'zod';
import { FinancialSnapshotStore } from '../core/snapshot.js';
import { type EngineConfig, createEngineConfig, resolveSetting } from '../core/config.js';
import { type ClassificationPolicy } from '../core/classification.js';
import { type CategoryShare, MetricsCalculator, assetsAndLiabilities } from '../core/metrics.js';
import {
  type AffordabilityInput,
  type AffordabilityReport,
  type PaymentBreakdown,
  AffordabilityEngine,
} from '../core/affordability.js';
import {
  type Numeric,
  HUNDRED,
  MONTHS_PER_YEAR,
  Money,
  ZERO,
  roundAmount,
  toMoney,
} from '../core/decimal.js';
import { classifyAccountType, getAccountDisplayName } from '../models/index.js';
import { getCategoryLabel } from '../utils/categories.js';
import { parseDate } from '../utils/date.js';

// ============================================
// Argument Schemas
// ============================================

const dateArg = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD')
  .refine(
    (value) => {
      try {
        parseDate(value);
        return true;
      } catch {
        return false;
      }
    },
    { message: 'Not a calendar date' }
  );

const windowArgs = {
  window_months: z.number().int().min(1).max(24).optional(),
  as_of: dateArg.optional(),
};

/**
 * Loan terms as tools accept them: rates in percent, like a loan quote.
 */
const loanTermArgs = {
  down_payment_percent: z.number().min(0).max(100).optional(),
  interest_rate: z.number().min(0).max(20).optional(),
  loan_term_years: z.number().int().min(1).max(50).optional(),
  property_tax_rate: z.number().min(0).max(5).optional(),
  insurance_rate: z.number().min(0).max(5).optional(),
  hoa_monthly: z.number().min(0).optional(),
};

const LoanTermArgsSchema = z.object(loanTermArgs);
type LoanTermArgs = z.infer<typeof LoanTermArgsSchema>;

export const GetDashboardArgsSchema = z.object(windowArgs).strict();

export const GetAccountsArgsSchema = z
  .object({
    account_type: z.string().optional(),
  })
  .strict();

export const GetCategoryBreakdownArgsSchema = z
  .object({
    type: z.enum(['expense', 'income']).default('expense'),
    ...windowArgs,
  })
  .strict();

export const GetAffordabilityArgsSchema = z
  .object({
    ...loanTermArgs,
    monthly_debt_payments: z.number().min(0).optional(),
    ...windowArgs,
  })
  .strict();

export const CalculatePaymentBreakdownArgsSchema = z
  .object({
    home_price: z.number().min(0),
    ...loanTermArgs,
  })
  .strict();

export const CalculateMaxHomePriceArgsSchema = z
  .object({
    monthly_income: z.number().min(0),
    monthly_debt_payments: z.number().min(0).default(0),
    available_cash: z.number().optional(),
    monthly_expenses: z.number().min(0).optional(),
    ...loanTermArgs,
  })
  .strict();

export type GetDashboardArgs = z.input<typeof GetDashboardArgsSchema>;
export type GetAccountsArgs = z.input<typeof GetAccountsArgsSchema>;
export type GetCategoryBreakdownArgs = z.input<typeof GetCategoryBreakdownArgsSchema>;
export type GetAffordabilityArgs = z.input<typeof GetAffordabilityArgsSchema>;
export type CalculatePaymentBreakdownArgs = z.input<typeof CalculatePaymentBreakdownArgsSchema>;
export type CalculateMaxHomePriceArgs = z.input<typeof CalculateMaxHomePriceArgsSchema>;

// ============================================
// Presentation Helpers
// ============================================

/**
 * Message returned by data tools when the user has no accounts.
 */
export const NO_ACCOUNTS_MESSAGE = 'No accounts found. Add accounts to see financial metrics.';

function percentToFraction(percent: number | undefined): number | undefined {
  if (percent === undefined) return undefined;
  return toMoney(percent).div(HUNDRED).toNumber();
}

function fractionToPercent(fraction: Numeric): number {
  return roundAmount(toMoney(fraction).times(HUNDRED));
}

/**
 * Convert percent-based tool arguments to engine loan-term overrides.
 */
function toTermOverrides(args: LoanTermArgs): Pick<
  AffordabilityInput,
  | 'down_payment_fraction'
  | 'interest_rate'
  | 'loan_term_years'
  | 'property_tax_rate'
  | 'insurance_rate'
  | 'hoa_monthly'
> {
  return {
    down_payment_fraction: percentToFraction(args.down_payment_percent),
    interest_rate: percentToFraction(args.interest_rate),
    loan_term_years: args.loan_term_years,
    property_tax_rate: percentToFraction(args.property_tax_rate),
    insurance_rate: percentToFraction(args.insurance_rate),
    hoa_monthly: args.hoa_monthly,
  };
}

/**
 * Round a payment breakdown for display.
 */
export function presentBreakdown(breakdown: PaymentBreakdown): Record<
  'principal_interest' | 'property_tax' | 'insurance' | 'pmi' | 'hoa' | 'total',
  number
> {
  return {
    principal_interest: roundAmount(breakdown.principalInterest),
    property_tax: roundAmount(breakdown.propertyTax),
    insurance: roundAmount(breakdown.insurance),
    pmi: roundAmount(breakdown.pmi),
    hoa: roundAmount(breakdown.hoa),
    total: roundAmount(breakdown.total),
  };
}

function presentCategoryMap(shares: CategoryShare[]): Record<string, number> {
  return Object.fromEntries(shares.map((share) => [share.category, roundAmount(share.amount)]));
}

/**
 * Round an affordability report for display.
 */
export function presentAffordability(report: AffordabilityReport) {
  const { cashRequirements } = report;
  return {
    max_home_price: roundAmount(report.maxHomePrice),
    safe_home_price: roundAmount(report.safeHomePrice),
    cash_constrained_price:
      report.cashConstrainedPrice === undefined
        ? undefined
        : roundAmount(report.cashConstrainedPrice),
    recommended_range: {
      min: roundAmount(report.priceRange.min),
      max: roundAmount(report.priceRange.max),
    },
    max_monthly_payment: roundAmount(report.maxMonthlyPayment),
    down_payment: {
      percent: fractionToPercent(report.terms.downPaymentFraction),
      amount: roundAmount(report.downPaymentAmount),
    },
    loan: {
      amount: roundAmount(report.loanAmount),
      interest_rate: fractionToPercent(report.terms.annualRate),
      term_years: report.terms.termYears,
    },
    monthly_payment: presentBreakdown(report.breakdown),
    cash_requirements: {
      down_payment: roundAmount(cashRequirements.downPayment),
      closing_costs: roundAmount(cashRequirements.closingCosts),
      emergency_reserves: roundAmount(cashRequirements.reserves),
      total_needed: roundAmount(cashRequirements.totalNeeded),
      available:
        cashRequirements.available === undefined
          ? undefined
          : roundAmount(cashRequirements.available),
    },
    back_end_dti: roundAmount(report.backEndDti),
    converged: report.solver.converged,
    warnings: report.warnings,
    recommendations: report.recommendations,
  };
}

/**
 * Collection of MCP tools over the metrics and affordability engines.
 */
export class AffordabilityTools {
  private store: FinancialSnapshotStore;
  private config: EngineConfig;
  private metrics: MetricsCalculator;
  private engine: AffordabilityEngine;

  /**
   * @param store - Snapshot store backing the data tools
   * @param config - Engine configuration (defaults when omitted)
   * @param policy - Income/expense classification (default lists when omitted)
   */
  constructor(
    store: FinancialSnapshotStore,
    config: EngineConfig = createEngineConfig(),
    policy?: ClassificationPolicy
  ) {
    this.store = store;
    this.config = config;
    this.metrics = new MetricsCalculator({ policy, config });
    this.engine = new AffordabilityEngine(config);
  }

  /**
   * Dashboard metrics for the snapshot's user.
   *
   * Returns a "no data" message instead of zero-valued metrics when the user
   * has no accounts.
   */
  async getFinancialDashboard(options: GetDashboardArgs = {}) {
    const args = GetDashboardArgsSchema.parse(options);
    const snapshot = this.store.getSnapshot();

    if (snapshot.accounts.length === 0) {
      return {
        net_worth: 0,
        assets: 0,
        liabilities: 0,
        monthly_income: 0,
        monthly_expenses: 0,
        savings_rate: 0,
        emergency_buffer_months: 0,
        dti_ratio: 0,
        message: NO_ACCOUNTS_MESSAGE,
      };
    }

    const m = this.metrics.computeAll(snapshot, {
      windowMonths: args.window_months,
      asOf: args.as_of,
    });

    return {
      net_worth: roundAmount(m.netWorth),
      assets: roundAmount(m.assets),
      liabilities: roundAmount(m.liabilities),
      monthly_income: roundAmount(m.monthlyIncome),
      monthly_expenses: roundAmount(m.monthlyExpenses),
      savings_rate: roundAmount(m.savingsRate),
      emergency_buffer_months: roundAmount(m.emergencyBufferMonths),
      dti_ratio: roundAmount(m.dtiRatio),
      expense_breakdown: presentCategoryMap(m.expenseBreakdown),
      income_breakdown: presentCategoryMap(m.incomeBreakdown),
      period: { start_date: m.window[0], end_date: m.window[1] },
      account_count: m.accountCount,
      transaction_count: m.transactionCount,
    };
  }

  /**
   * Accounts with their classification and totals.
   */
  async getAccounts(options: GetAccountsArgs = {}) {
    const args = GetAccountsArgsSchema.parse(options);
    const accounts = this.store.getAccounts(args.account_type);
    const { assets, liabilities } = assetsAndLiabilities(accounts);

    return {
      count: accounts.length,
      total_assets: roundAmount(assets),
      total_liabilities: roundAmount(liabilities),
      accounts: accounts.map((account) => ({
        id: account.id,
        name: getAccountDisplayName(account),
        account_type: account.account_type,
        classification: classifyAccountType(account.account_type) ?? 'ignored',
        balance: roundAmount(account.balance),
      })),
    };
  }

  /**
   * Spending or income by category over the trailing window.
   */
  async getCategoryBreakdown(options: GetCategoryBreakdownArgs = {}) {
    const args = GetCategoryBreakdownArgsSchema.parse(options);
    const m = this.metrics.computeAll(this.store.getSnapshot(), {
      windowMonths: args.window_months,
      asOf: args.as_of,
    });
    const shares = args.type === 'income' ? m.incomeBreakdown : m.expenseBreakdown;

    return {
      type: args.type,
      period: { start_date: m.window[0], end_date: m.window[1] },
      total: roundAmount(shares.reduce((sum, share) => sum.plus(share.amount), toMoney(0))),
      categories: shares.map((share) => ({
        category: share.category,
        label: getCategoryLabel(share.category),
        amount: roundAmount(share.amount),
        percentage: roundAmount(share.percentage),
      })),
    };
  }

  /**
   * Affordability analysis driven by the user's own snapshot.
   *
   * Existing debt follows the precedence explicit argument > profile > 0.
   *
   * @throws Error if the user has no accounts
   */
  async getAffordability(options: GetAffordabilityArgs = {}) {
    const args = GetAffordabilityArgsSchema.parse(options);
    const snapshot = this.store.getSnapshot();

    if (snapshot.accounts.length === 0) {
      throw new Error('No accounts found. Add accounts to calculate affordability.');
    }

    const m = this.metrics.computeAll(snapshot, {
      windowMonths: args.window_months,
      asOf: args.as_of,
    });

    // Fall back to the profile's stated income when the history shows none
    let income = m.monthlyIncome;
    if (income.isZero() && snapshot.profile?.annual_income !== undefined) {
      income = toMoney(snapshot.profile.annual_income).div(MONTHS_PER_YEAR);
    }

    const existingDebt = toMoney(
      resolveSetting<Numeric>(args.monthly_debt_payments, snapshot.profile?.monthly_debt_payment, 0)
    );

    const report = this.engine.analyze({
      ...toTermOverrides(args),
      monthly_income: income,
      monthly_debt_payments: existingDebt,
      available_cash: m.assets,
      monthly_expenses: m.monthlyExpenses,
      current_dti_percent: m.dtiRatio,
      // Known only with spending on record; an overdraft counts as no buffer
      emergency_buffer_months: m.monthlyExpenses.gt(0)
        ? Money.max(ZERO, m.emergencyBufferMonths)
        : undefined,
    });

    return {
      ...presentAffordability(report),
      financial_health: {
        monthly_income: roundAmount(income),
        monthly_expenses: roundAmount(m.monthlyExpenses),
        monthly_debt: roundAmount(existingDebt),
        dti_ratio: roundAmount(m.dtiRatio),
        emergency_buffer_months: roundAmount(m.emergencyBufferMonths),
      },
    };
  }

  /**
   * Monthly payment for a given home price.
   */
  async calculatePaymentBreakdown(options: CalculatePaymentBreakdownArgs) {
    const args = CalculatePaymentBreakdownArgsSchema.parse(options);
    const overrides = toTermOverrides(args);
    const terms = this.engine.terms(overrides);
    const price = toMoney(args.home_price);
    const downPayment = price.times(terms.downPaymentFraction);

    return {
      home_price: roundAmount(price),
      down_payment: roundAmount(downPayment),
      loan_amount: roundAmount(price.minus(downPayment)),
      interest_rate: fractionToPercent(terms.annualRate),
      term_years: terms.termYears,
      monthly_payment: presentBreakdown(this.engine.paymentBreakdown(price, overrides)),
    };
  }

  /**
   * What-if affordability from stated income and debt, without a snapshot.
   */
  async calculateMaxHomePrice(options: CalculateMaxHomePriceArgs) {
    const args = CalculateMaxHomePriceArgsSchema.parse(options);
    const report = this.engine.analyze({
      ...toTermOverrides(args),
      monthly_income: args.monthly_income,
      monthly_debt_payments: args.monthly_debt_payments,
      available_cash: args.available_cash,
      monthly_expenses: args.monthly_expenses,
    });
    return presentAffordability(report);
  }

  /**
   * Effective configuration, for clients that want to show assumptions.
   */
  getConfig(): EngineConfig {
    return { ...this.config };
  }
}

/**
 * MCP tool schema definition.
 */
export interface ToolSchema {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, Record<string, unknown>>;
    required?: string[];
  };
  annotations?: {
    readOnlyHint?: boolean;
  };
}

const WINDOW_PROPERTIES = {
  window_months: {
    type: 'integer',
    description: 'Trailing window in months (30 days each) for income and expenses (default: 3)',
    minimum: 1,
    maximum: 24,
  },
  as_of: {
    type: 'string',
    description: 'Last day of the window (YYYY-MM-DD, default: today)',
    pattern: '^\\d{4}-\\d{2}-\\d{2}$',
  },
};

const LOAN_TERM_PROPERTIES = {
  down_payment_percent: {
    type: 'number',
    description: 'Down payment as a percent of price (default: 20)',
    minimum: 0,
    maximum: 100,
  },
  interest_rate: {
    type: 'number',
    description: 'Annual interest rate in percent (default: 7)',
    minimum: 0,
    maximum: 20,
  },
  loan_term_years: {
    type: 'integer',
    description: 'Loan term in years (default: 30)',
    minimum: 1,
    maximum: 50,
  },
  property_tax_rate: {
    type: 'number',
    description: 'Annual property tax in percent of price (default: 1.2)',
    minimum: 0,
    maximum: 5,
  },
  insurance_rate: {
    type: 'number',
    description: 'Annual homeowners insurance in percent of price (default: 0.5)',
    minimum: 0,
    maximum: 5,
  },
  hoa_monthly: {
    type: 'number',
    description: 'Monthly HOA fee (default: 0)',
    minimum: 0,
  },
};

/**
 * Create MCP tool schemas for all tools.
 *
 * All tools have readOnlyHint: true; none of them write data.
 */
export function createToolSchemas(): ToolSchema[] {
  return [
    {
      name: 'get_financial_dashboard',
      description:
        'Financial dashboard from the user snapshot: net worth, assets, liabilities, ' +
        'average monthly income and expenses, savings rate (%), emergency buffer (months), ' +
        'debt-to-income ratio (%), and expense/income totals by category.',
      inputSchema: {
        type: 'object',
        properties: { ...WINDOW_PROPERTIES },
      },
      annotations: { readOnlyHint: true },
    },
    {
      name: 'get_accounts',
      description:
        'List accounts with balances, each classified as asset, liability or ignored. ' +
        'Optionally filter by account type (checking, savings, investment, credit, loan).',
      inputSchema: {
        type: 'object',
        properties: {
          account_type: {
            type: 'string',
            description: 'Filter by account type (case-insensitive)',
          },
        },
      },
      annotations: { readOnlyHint: true },
    },
    {
      name: 'get_category_breakdown',
      description:
        'Spending or income grouped by category over the trailing window, ' +
        'with each category share of the total in percent, largest first.',
      inputSchema: {
        type: 'object',
        properties: {
          type: {
            type: 'string',
            enum: ['expense', 'income'],
            description: 'Which side of the ledger to break down (default: expense)',
            default: 'expense',
          },
          ...WINDOW_PROPERTIES,
        },
      },
      annotations: { readOnlyHint: true },
    },
    {
      name: 'get_affordability',
      description:
        'Maximum affordable home price for the user, from snapshot income, expenses and cash. ' +
        'Returns the safe price range, down payment, monthly payment breakdown ' +
        '(principal & interest, tax, insurance, PMI, HOA), cash needed, and warnings.',
      inputSchema: {
        type: 'object',
        properties: {
          ...LOAN_TERM_PROPERTIES,
          monthly_debt_payments: {
            type: 'number',
            description: 'Existing monthly debt payments (default: from financial profile, else 0)',
            minimum: 0,
          },
          ...WINDOW_PROPERTIES,
        },
      },
      annotations: { readOnlyHint: true },
    },
    {
      name: 'calculate_payment_breakdown',
      description:
        'Monthly housing payment for a given home price: principal & interest, ' +
        'property tax, insurance, PMI (below 20% down) and HOA.',
      inputSchema: {
        type: 'object',
        properties: {
          home_price: {
            type: 'number',
            description: 'Home purchase price',
            minimum: 0,
          },
          ...LOAN_TERM_PROPERTIES,
        },
        required: ['home_price'],
      },
      annotations: { readOnlyHint: true },
    },
    {
      name: 'calculate_max_home_price',
      description:
        'What-if affordability from a stated monthly income and debt, without reading the ' +
        'snapshot. Optionally include available cash and monthly expenses to check reserves.',
      inputSchema: {
        type: 'object',
        properties: {
          monthly_income: {
            type: 'number',
            description: 'Gross monthly income',
            minimum: 0,
          },
          monthly_debt_payments: {
            type: 'number',
            description: 'Existing monthly debt payments (default: 0)',
            minimum: 0,
          },
          available_cash: {
            type: 'number',
            description: 'Cash available for down payment, closing costs and reserves',
          },
          monthly_expenses: {
            type: 'number',
            description: 'Average monthly expenses, used to size reserves',
            minimum: 0,
          },
          ...LOAN_TERM_PROPERTIES,
        },
        required: ['monthly_income'],
      },
      annotations: { readOnlyHint: true },
    },
  ];
}
