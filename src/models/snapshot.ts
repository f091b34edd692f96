/**
 * Snapshot file model: one user's accounts, transactions and profile as
 * exported by the data layer.
 */

import { z } from 'zod';
import { AccountSchema } from './account.js';
import { TransactionSchema } from './transaction.js';
import { FinancialProfileSchema } from './profile.js';

export const FinancialSnapshotSchema = z
  .object({
    exported_at: z.string().optional(),
    accounts: z.array(AccountSchema).default([]),
    transactions: z.array(TransactionSchema).default([]),
    profile: FinancialProfileSchema.optional(),
  })
  .strict();

export type FinancialSnapshot = z.infer<typeof FinancialSnapshotSchema>;
