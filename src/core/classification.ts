/**
 * Classification policy: which transactions count as income and which as
 * spending.
 *
 * The metrics engine never hardcodes category names; it asks a policy. The
 * default policy uses the allow/deny lists in utils/categories, and callers
 * can supply their own lists or predicates.
 */

import type { Transaction } from '../models/index.js';
import { getTransactionCategory } from '../models/index.js';
import {
  INCOME_CATEGORIES,
  NON_SPENDING_CATEGORIES,
  isIncomeCategory,
  isTransferCategory,
} from '../utils/categories.js';

export interface ClassificationPolicy {
  /** Whether a positive transaction counts toward monthly income. */
  isIncome(transaction: Transaction): boolean;
  /** Whether a negative transaction counts toward monthly expenses. */
  isExpense(transaction: Transaction): boolean;
}

/**
 * Build a policy from category lists. Without lists it is the default policy.
 *
 * @param options.incomeCategories - Categories counted as income
 * @param options.excludedExpenseCategories - Categories never counted as spending
 */
export function createCategoryPolicy(
  options: {
    incomeCategories?: Iterable<string>;
    excludedExpenseCategories?: Iterable<string>;
  } = {}
): ClassificationPolicy {
  if (options.incomeCategories === undefined && options.excludedExpenseCategories === undefined) {
    return {
      isIncome: (transaction) => isIncomeCategory(transaction.category),
      isExpense: (transaction) => !isTransferCategory(transaction.category),
    };
  }

  const income = normalizeSet(options.incomeCategories ?? INCOME_CATEGORIES);
  const excluded = normalizeSet(options.excludedExpenseCategories ?? NON_SPENDING_CATEGORIES);

  return {
    isIncome: (transaction) => income.has(getTransactionCategory(transaction)),
    isExpense: (transaction) => !excluded.has(getTransactionCategory(transaction)),
  };
}

/**
 * Policy used when the caller supplies none.
 */
export const DEFAULT_CLASSIFICATION_POLICY: ClassificationPolicy = createCategoryPolicy();

function normalizeSet(categories: Iterable<string>): Set<string> {
  return new Set(Array.from(categories, (category) => category.trim().toLowerCase()));
}
