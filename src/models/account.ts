/**
 * Account snapshot model.
 *
 * Balances follow the data layer's sign convention: asset accounts are
 * positive, credit and loan accounts may be stored negative.
 */

import { z } from 'zod';
import { MoneySchema } from './money.js';

/**
 * Account types the metrics engine knows how to classify.
 */
export const ASSET_ACCOUNT_TYPES = ['checking', 'savings', 'investment'] as const;
export const LIABILITY_ACCOUNT_TYPES = ['credit', 'loan'] as const;
export const LIQUID_ACCOUNT_TYPES = ['checking', 'savings'] as const;

export type AssetAccountType = (typeof ASSET_ACCOUNT_TYPES)[number];
export type LiabilityAccountType = (typeof LIABILITY_ACCOUNT_TYPES)[number];
export type AccountType = AssetAccountType | LiabilityAccountType;

/**
 * Account schema with validation.
 *
 * account_type stays a free string: accounts of a type outside
 * {@link AccountType} are carried through but count as neither assets nor
 * liabilities.
 */
export const AccountSchema = z
  .object({
    // Required fields
    id: z.string().min(1),
    account_type: z.string(),
    balance: MoneySchema,

    // Optional details
    credit_limit: MoneySchema.optional(),
    name: z.string().optional(),
    institution_name: z.string().optional(),
  })
  .strict();

export type Account = z.infer<typeof AccountSchema>;

/**
 * Classify an account type, case-insensitively.
 *
 * @returns 'asset', 'liability', or undefined for unrecognised types
 */
export function classifyAccountType(accountType: string): 'asset' | 'liability' | undefined {
  const type = accountType.toLowerCase();
  if ((ASSET_ACCOUNT_TYPES as readonly string[]).includes(type)) return 'asset';
  if ((LIABILITY_ACCOUNT_TYPES as readonly string[]).includes(type)) return 'liability';
  return undefined;
}

/**
 * Whether the account holds cash that can be spent immediately.
 */
export function isLiquidAccount(account: Account): boolean {
  return (LIQUID_ACCOUNT_TYPES as readonly string[]).includes(account.account_type.toLowerCase());
}

/**
 * Get the best display name for an account.
 */
export function getAccountDisplayName(account: Account): string {
  return account.name ?? account.institution_name ?? account.id;
}
