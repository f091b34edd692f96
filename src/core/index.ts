/**
 * Metrics and affordability engines.
 */

export { FinancialSnapshotStore, findSnapshotFile, SNAPSHOT_ENV_VAR } from './snapshot.js';
export {
  EngineConfigSchema,
  type EngineConfig,
  DEFAULT_ENGINE_CONFIG,
  createEngineConfig,
  loadEngineConfig,
  resolveSetting,
} from './config.js';
export {
  type ClassificationPolicy,
  createCategoryPolicy,
  DEFAULT_CLASSIFICATION_POLICY,
} from './classification.js';
export {
  MetricsCalculator,
  type FinancialMetrics,
  type CategoryShare,
  assetsAndLiabilities,
  netWorth,
  liquidCash,
  monthlyIncome,
  monthlyExpenses,
  savingsRate,
  emergencyBufferMonths,
  estimatedMonthlyDebtService,
  dtiRatio,
  categoryBreakdown,
} from './metrics.js';
export {
  AffordabilityEngine,
  AffordabilityInputSchema,
  type AffordabilityInput,
  type AffordabilityReport,
  type LoanTerms,
  type PaymentBreakdown,
  analyzeAffordability,
  maxMonthlyPayment,
  mortgagePayment,
  propertyTax,
  insurance,
  pmi,
  paymentBreakdown,
  maxHomePrice,
  solveMaxHomePrice,
} from './affordability.js';
export { solveIncreasing, type SolverOptions, type SolverResult } from './solver.js';
export { Money, toMoney, roundAmount, formatCurrency } from './decimal.js';
