/**
 * Financial profile: figures the user enters by hand that account data
 * cannot show, such as student loans serviced elsewhere.
 */

import { z } from 'zod';
import { NonNegativeMoneySchema } from './money.js';

export const FinancialProfileSchema = z
  .object({
    monthly_debt_payment: NonNegativeMoneySchema,
    annual_income: NonNegativeMoneySchema.optional(),
  })
  .strict();

export type FinancialProfile = z.infer<typeof FinancialProfileSchema>;
