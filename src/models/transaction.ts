/**
 * Transaction snapshot model.
 */

import { z } from 'zod';
import { MoneySchema } from './money.js';

/**
 * Transaction schema with validation.
 *
 * Positive amounts = inflows (income, refunds)
 * Negative amounts = outflows (spending, payments)
 */
export const TransactionSchema = z
  .object({
    // Required fields
    id: z.string().min(1),
    account_id: z.string().min(1),
    date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be in YYYY-MM-DD format'),
    amount: MoneySchema,
    category: z.string(),

    description: z.string().optional(),
  })
  .strict();

export type Transaction = z.infer<typeof TransactionSchema>;

/**
 * Category used when a transaction carries none.
 */
export const UNCATEGORIZED = 'uncategorized';

/**
 * Normalized category key for grouping and policy lookups.
 */
export function getTransactionCategory(transaction: Transaction): string {
  const category = transaction.category.trim().toLowerCase();
  return category || UNCATEGORIZED;
}
