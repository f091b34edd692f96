/**
 * Data models for account and transaction snapshots.
 */

export { MoneySchema, NonNegativeMoneySchema, type MoneyValue } from './money.js';

export {
  AccountSchema,
  type Account,
  type AccountType,
  type AssetAccountType,
  type LiabilityAccountType,
  ASSET_ACCOUNT_TYPES,
  LIABILITY_ACCOUNT_TYPES,
  LIQUID_ACCOUNT_TYPES,
  classifyAccountType,
  isLiquidAccount,
  getAccountDisplayName,
} from './account.js';

export {
  TransactionSchema,
  type Transaction,
  UNCATEGORIZED,
  getTransactionCategory,
} from './transaction.js';

export { FinancialProfileSchema, type FinancialProfile } from './profile.js';

export { FinancialSnapshotSchema, type FinancialSnapshot } from './snapshot.js';
