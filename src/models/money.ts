/**
 * Shared schema for monetary values in snapshot data.
 */

import { z } from 'zod';

/**
 * A money amount as it arrives from the data layer.
 *
 * JSON numbers are accepted for convenience; decimal strings ("1234.56")
 * carry the exact value and are preferred by exporters that can produce them.
 */
export const MoneySchema = z.union([
  z.number().finite(),
  z.string().regex(/^-?\d+(\.\d+)?$/, 'Money strings must be plain decimals, e.g. "1234.56"'),
]);

/**
 * A money amount that cannot be negative, such as a stated income.
 */
export const NonNegativeMoneySchema = z.union([
  z.number().finite().min(0, 'Money must not be negative'),
  z.string().regex(/^\d+(\.\d+)?$/, 'Money must not be negative'),
]);

export type MoneyValue = z.infer<typeof MoneySchema>;
