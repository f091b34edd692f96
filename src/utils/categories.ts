/**
 * Default category vocabulary for income and expense classification.
 *
 * Categories arrive as free text from the data layer; every lookup here is
 * case-insensitive.
 */

/**
 * Categories whose inflows count as earned income.
 *
 * Kept as an explicit allow-list so that transfers and refunds landing in a
 * checking account are not mistaken for salary.
 */
export const INCOME_CATEGORIES: ReadonlySet<string> = new Set([
  'salary',
  'income',
  'paycheck',
  'deposit',
]);

/**
 * Categories whose outflows are moves of money rather than spending:
 * transfers between the user's own accounts and debt payments.
 */
export const NON_SPENDING_CATEGORIES: ReadonlySet<string> = new Set(['transfer', 'payment']);

/**
 * Check if a category represents earned income.
 */
export function isIncomeCategory(category: string | undefined): boolean {
  if (!category) return false;
  return INCOME_CATEGORIES.has(category.trim().toLowerCase());
}

/**
 * Check if a category is a transfer or debt payment.
 */
export function isTransferCategory(category: string | undefined): boolean {
  if (!category) return false;
  return NON_SPENDING_CATEGORIES.has(category.trim().toLowerCase());
}

/**
 * Human-readable label for a category key.
 *
 * @example
 * getCategoryLabel('dining_out')  // 'Dining Out'
 * getCategoryLabel('groceries')   // 'Groceries'
 */
export function getCategoryLabel(category: string): string {
  return category
    .trim()
    .split(/[_\s]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}
