/**
 * Home affordability: housing payment components for a given price, and the
 * inverse, the highest price a monthly budget sustains.
 *
 * The component functions are pure and permissive: they do not validate
 * ranges. {@link analyzeAffordability} is the validated entry point.
 */

import { z } from 'zod';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from './config.js';
import {
  Decimal,
  HUNDRED,
  Money,
  MONTHS_PER_YEAR,
  ONE,
  ZERO,
  formatCurrency,
  safeDivide,
  toMoney,
  type Numeric,
} from './decimal.js';
import { emergencyBufferMonths } from './metrics.js';
import { type SolverOptions, solveIncreasing } from './solver.js';

/**
 * Everything that shapes a monthly housing payment besides the price.
 */
export interface LoanTerms {
  /** Share of the price paid up front, 0–1 */
  downPaymentFraction: Numeric;
  /** Annual interest rate as a fraction, e.g. 0.07 */
  annualRate: Numeric;
  termYears: number;
  /** Annual property tax as a fraction of price */
  propertyTaxRate: Numeric;
  /** Annual homeowners insurance as a fraction of price */
  insuranceRate: Numeric;
  /** Annual PMI as a fraction of the loan amount */
  pmiRate: Numeric;
  hoaMonthly: Numeric;
  /** Down payment fraction at or above which no PMI is due. Default: 0.20 */
  pmiThreshold?: Numeric;
}

export interface PaymentBreakdown {
  principalInterest: Decimal;
  propertyTax: Decimal;
  insurance: Decimal;
  pmi: Decimal;
  hoa: Decimal;
  total: Decimal;
}

export interface MaxHomePriceResult {
  price: Decimal;
  /** Target payment minus the payment at `price` */
  residual: Decimal;
  iterations: number;
  converged: boolean;
}

export const DEFAULT_PMI_THRESHOLD = DEFAULT_ENGINE_CONFIG.pmi_down_payment_threshold;
export const DEFAULT_FRONT_END_DTI_LIMIT = DEFAULT_ENGINE_CONFIG.front_end_dti_limit;

/**
 * Maximum monthly housing payment under a front-end DTI ceiling.
 *
 * `max(0, income × dtiLimit − existingDebt)`
 */
export function maxMonthlyPayment(
  income: Numeric,
  existingDebt: Numeric,
  dtiLimit: Numeric = DEFAULT_FRONT_END_DTI_LIMIT
): Decimal {
  return Money.max(ZERO, toMoney(income).times(dtiLimit).minus(existingDebt));
}

/**
 * Monthly principal and interest on a fully amortizing loan.
 *
 * M = P·r(1+r)^n / ((1+r)^n − 1), with r the monthly rate and n the number
 * of payments. At a zero rate the payment is P / n.
 */
export function mortgagePayment(
  principal: Numeric,
  annualRate: Numeric,
  termYears: number
): Decimal {
  const p = toMoney(principal);
  const n = termYears * 12;
  const r = toMoney(annualRate).div(MONTHS_PER_YEAR);

  if (r.isZero()) {
    return p.div(n);
  }

  const growth = ONE.plus(r).pow(n);
  return p.times(r).times(growth).div(growth.minus(ONE));
}

/**
 * Monthly property tax: price × annual rate / 12.
 */
export function propertyTax(price: Numeric, rate: Numeric): Decimal {
  return toMoney(price).times(rate).div(MONTHS_PER_YEAR);
}

/**
 * Monthly homeowners insurance: price × annual rate / 12.
 */
export function insurance(price: Numeric, rate: Numeric): Decimal {
  return toMoney(price).times(rate).div(MONTHS_PER_YEAR);
}

/**
 * Monthly private mortgage insurance.
 *
 * Zero once the down payment reaches the threshold (20% by default); below
 * it, loan amount × annual PMI rate / 12. The cutoff is a hard step.
 */
export function pmi(
  loanAmount: Numeric,
  downPaymentFraction: Numeric,
  pmiRate: Numeric,
  threshold: Numeric = DEFAULT_PMI_THRESHOLD
): Decimal {
  if (toMoney(downPaymentFraction).gte(threshold)) {
    return ZERO;
  }
  return toMoney(loanAmount).times(pmiRate).div(MONTHS_PER_YEAR);
}

/**
 * Loan amount for a price: price × (1 − down payment fraction).
 */
export function loanAmountFor(price: Numeric, downPaymentFraction: Numeric): Decimal {
  return toMoney(price).times(ONE.minus(downPaymentFraction));
}

/**
 * Full monthly payment for a home price.
 *
 * `total` is exactly the sum of the five components.
 */
export function paymentBreakdown(price: Numeric, terms: LoanTerms): PaymentBreakdown {
  const loanAmount = loanAmountFor(price, terms.downPaymentFraction);

  const principalInterest = mortgagePayment(loanAmount, terms.annualRate, terms.termYears);
  const tax = propertyTax(price, terms.propertyTaxRate);
  const ins = insurance(price, terms.insuranceRate);
  const mortgageInsurance = pmi(
    loanAmount,
    terms.downPaymentFraction,
    terms.pmiRate,
    terms.pmiThreshold ?? DEFAULT_PMI_THRESHOLD
  );
  const hoa = toMoney(terms.hoaMonthly);

  return {
    principalInterest,
    propertyTax: tax,
    insurance: ins,
    pmi: mortgageInsurance,
    hoa,
    total: principalInterest.plus(tax).plus(ins).plus(mortgageInsurance).plus(hoa),
  };
}

/**
 * Solve for the highest price whose monthly payment meets the target.
 *
 * The payment grows monotonically with price, so a bracketing root finder
 * applies. A target at or below the HOA fee (the payment on a zero-price
 * home) yields price 0.
 */
export function solveMaxHomePrice(
  targetMonthlyPayment: Numeric,
  terms: LoanTerms,
  options: SolverOptions = {}
): MaxHomePriceResult {
  const result = solveIncreasing(
    (price) => paymentBreakdown(price, terms).total,
    targetMonthlyPayment,
    options
  );

  return {
    price: result.value,
    residual: result.residual,
    iterations: result.iterations,
    converged: result.converged,
  };
}

/**
 * Highest affordable price for a monthly payment budget.
 */
export function maxHomePrice(
  targetMonthlyPayment: Numeric,
  terms: LoanTerms,
  options: SolverOptions = {}
): Decimal {
  return solveMaxHomePrice(targetMonthlyPayment, terms, options).price;
}

// ============================================
// Validated analysis
// ============================================

/** A number, or an exact Decimal handed over by the metrics engine */
const amount = z.union([
  z.number().finite(),
  z.instanceof(Decimal).refine((value) => value.isFinite(), 'Expected a finite amount'),
]);
const nonNegative = amount.refine((value) => toMoney(value).gte(0), {
  message: 'Number must be greater than or equal to 0',
});
const fraction = z.number().min(0).max(1);

/**
 * Affordability request schema.
 *
 * Rates are fractions. Unset mortgage fields fall back to configuration.
 */
export const AffordabilityInputSchema = z
  .object({
    monthly_income: nonNegative,
    monthly_debt_payments: nonNegative.default(0),
    down_payment_fraction: fraction.optional(),
    interest_rate: fraction.optional(),
    loan_term_years: z.number().int().min(1).max(50).optional(),
    property_tax_rate: fraction.optional(),
    insurance_rate: fraction.optional(),
    hoa_monthly: nonNegative.optional(),

    // Household context from the metrics engine; each enables a check
    available_cash: amount.optional(),
    monthly_expenses: nonNegative.optional(),
    current_dti_percent: nonNegative.optional(),
    emergency_buffer_months: nonNegative.optional(),
  })
  .strict();

export type AffordabilityInput = z.input<typeof AffordabilityInputSchema>;

export interface CashRequirements {
  downPayment: Decimal;
  closingCosts: Decimal;
  reserves: Decimal;
  totalNeeded: Decimal;
  available?: Decimal;
}

export interface AffordabilityReport {
  terms: LoanTerms;
  maxMonthlyPayment: Decimal;
  maxHomePrice: Decimal;
  /** Highest price the available cash covers, when cash is known */
  cashConstrainedPrice?: Decimal;
  /** min(max price, cash-constrained price) */
  safeHomePrice: Decimal;
  priceRange: { min: Decimal; max: Decimal };
  downPaymentAmount: Decimal;
  loanAmount: Decimal;
  breakdown: PaymentBreakdown;
  cashRequirements: CashRequirements;
  /** (housing payment + existing debt) / income, percent */
  backEndDti: Decimal;
  solver: { converged: boolean; iterations: number; residual: Decimal };
  warnings: string[];
  recommendations: string[];
}

/**
 * Fill unset loan terms from configuration.
 */
export function resolveLoanTerms(
  input: Pick<
    AffordabilityInput,
    | 'down_payment_fraction'
    | 'interest_rate'
    | 'loan_term_years'
    | 'property_tax_rate'
    | 'insurance_rate'
    | 'hoa_monthly'
  >,
  config: EngineConfig
): LoanTerms {
  return {
    downPaymentFraction: input.down_payment_fraction ?? config.down_payment_fraction,
    annualRate: input.interest_rate ?? config.interest_rate,
    termYears: input.loan_term_years ?? config.loan_term_years,
    propertyTaxRate: input.property_tax_rate ?? config.property_tax_rate,
    insuranceRate: input.insurance_rate ?? config.insurance_rate,
    pmiRate: config.pmi_rate,
    hoaMonthly: input.hoa_monthly ?? config.hoa_monthly,
    pmiThreshold: config.pmi_down_payment_threshold,
  };
}

function percentLabel(value: Numeric): string {
  return `${toMoney(value).times(HUNDRED).toDecimalPlaces(2).toString()}%`;
}

/**
 * Complete affordability analysis.
 *
 * @throws ZodError when the input is out of range (negative income, down
 *   payment outside 0–1, and so on)
 */
export function analyzeAffordability(
  input: AffordabilityInput,
  config: EngineConfig = { ...DEFAULT_ENGINE_CONFIG },
  solverOptions: SolverOptions = {}
): AffordabilityReport {
  const parsed = AffordabilityInputSchema.parse(input);
  const terms = resolveLoanTerms(parsed, config);
  const income = toMoney(parsed.monthly_income);
  const existingDebt = toMoney(parsed.monthly_debt_payments);

  const budget = maxMonthlyPayment(income, existingDebt, config.front_end_dti_limit);
  const solved = solveMaxHomePrice(budget, terms, solverOptions);
  const price = solved.price;

  const breakdown = paymentBreakdown(price, terms);
  const downPaymentAmount = price.times(terms.downPaymentFraction);
  const loanAmount = price.minus(downPaymentAmount);

  const monthlyExpenses = toMoney(parsed.monthly_expenses ?? 0);
  const closingCosts = price.times(config.closing_cost_rate);
  const reserves = monthlyExpenses.times(config.reserve_months);
  const available =
    parsed.available_cash === undefined ? undefined : toMoney(parsed.available_cash);

  const cashRequirements: CashRequirements = {
    downPayment: downPaymentAmount,
    closingCosts,
    reserves,
    totalNeeded: downPaymentAmount.plus(closingCosts).plus(reserves),
    available,
  };

  // Price at which down payment + closing costs + reserves use up the cash
  let cashConstrainedPrice: Decimal | undefined;
  const upfrontRate = toMoney(terms.downPaymentFraction).plus(config.closing_cost_rate);
  if (available !== undefined && upfrontRate.gt(0)) {
    cashConstrainedPrice = Money.max(ZERO, available.minus(reserves).div(upfrontRate));
  }
  const safeHomePrice =
    cashConstrainedPrice === undefined ? price : Money.min(price, cashConstrainedPrice);

  const backEndDti = safeDivide(breakdown.total.plus(existingDebt), income).times(HUNDRED);

  const warnings: string[] = [];
  const recommendations: string[] = [];

  if (budget.lte(terms.hoaMonthly)) {
    warnings.push('Income after existing debt leaves no room for a housing payment');
    recommendations.push('Increase income or pay down existing debt before buying');
  }

  const pmiThreshold = terms.pmiThreshold ?? DEFAULT_PMI_THRESHOLD;
  if (toMoney(terms.downPaymentFraction).lt(pmiThreshold)) {
    warnings.push(
      `Down payment less than ${percentLabel(pmiThreshold)} requires PMI, increasing monthly costs`
    );
    recommendations.push(
      `Consider saving for a ${percentLabel(pmiThreshold)} down payment to avoid PMI`
    );
  }

  if (available !== undefined && available.lt(cashRequirements.totalNeeded)) {
    warnings.push(
      `Insufficient cash reserves. Need ${formatCurrency(cashRequirements.totalNeeded)}, ` +
        `have ${formatCurrency(available)}`
    );
    recommendations.push('Build emergency fund before purchasing');
  }

  const dti =
    parsed.current_dti_percent === undefined ? backEndDti : toMoney(parsed.current_dti_percent);
  if (dti.gt(config.dti_warning_percent)) {
    warnings.push(
      `DTI ratio (${dti.toFixed(1)}%) exceeds recommended ${config.dti_warning_percent}%`
    );
    recommendations.push('Reduce debt payments before purchasing');
  }

  const buffer =
    parsed.emergency_buffer_months !== undefined
      ? toMoney(parsed.emergency_buffer_months)
      : available !== undefined && monthlyExpenses.gt(0)
        ? emergencyBufferMonths(available, monthlyExpenses)
        : undefined;
  if (buffer !== undefined && buffer.lt(config.emergency_buffer_target_months)) {
    warnings.push(`Emergency fund covers only ${buffer.toFixed(1)} months`);
    recommendations.push(
      `Build ${config.emergency_buffer_target_months}+ months of emergency reserves`
    );
  }

  if (!solved.converged) {
    warnings.push('Maximum price estimate did not converge; treat it as approximate');
  }

  return {
    terms,
    maxMonthlyPayment: budget,
    maxHomePrice: price,
    cashConstrainedPrice,
    safeHomePrice,
    priceRange: { min: price.times(config.safe_range_floor), max: price },
    downPaymentAmount,
    loanAmount,
    breakdown,
    cashRequirements,
    backEndDti,
    solver: {
      converged: solved.converged,
      iterations: solved.iterations,
      residual: solved.residual,
    },
    warnings,
    recommendations,
  };
}

/**
 * Affordability engine bound to one configuration.
 */
export class AffordabilityEngine {
  constructor(
    private readonly config: EngineConfig = { ...DEFAULT_ENGINE_CONFIG },
    private readonly solverOptions: SolverOptions = {}
  ) {}

  /**
   * Loan terms with configuration defaults applied.
   */
  terms(overrides: Parameters<typeof resolveLoanTerms>[0] = {}): LoanTerms {
    return resolveLoanTerms(overrides, this.config);
  }

  maxMonthlyPayment(income: Numeric, existingDebt: Numeric): Decimal {
    return maxMonthlyPayment(income, existingDebt, this.config.front_end_dti_limit);
  }

  paymentBreakdown(
    price: Numeric,
    overrides: Parameters<typeof resolveLoanTerms>[0] = {}
  ): PaymentBreakdown {
    return paymentBreakdown(price, this.terms(overrides));
  }

  solveMaxHomePrice(
    targetMonthlyPayment: Numeric,
    overrides: Parameters<typeof resolveLoanTerms>[0] = {}
  ): MaxHomePriceResult {
    return solveMaxHomePrice(targetMonthlyPayment, this.terms(overrides), this.solverOptions);
  }

  analyze(input: AffordabilityInput): AffordabilityReport {
    return analyzeAffordability(input, this.config, this.solverOptions);
  }
}
