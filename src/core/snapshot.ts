/**
 * Read-only access to a user's financial snapshot.
 *
 * The data layer (accounts, transactions, profile) lives elsewhere and
 * exports a JSON snapshot; this store finds, validates and caches it so every
 * computation in a session sees the same data.
 */

import { existsSync, readFileSync, statSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import {
  FinancialSnapshotSchema,
  type Account,
  type FinancialProfile,
  type FinancialSnapshot,
  type Transaction,
} from '../models/index.js';

/** Environment variable naming the snapshot file. */
export const SNAPSHOT_ENV_VAR = 'HOME_AFFORDABILITY_SNAPSHOT';

/**
 * Find the snapshot file by checking known locations.
 * Returns the first existing file, or undefined if none found.
 */
export function findSnapshotFile(env: NodeJS.ProcessEnv = process.env): string | undefined {
  const home = homedir();

  const possiblePaths = [
    env[SNAPSHOT_ENV_VAR],
    join(home, '.home-affordability', 'snapshot.json'),
    join(home, '.config', 'home-affordability', 'snapshot.json'),
  ].filter((path): path is string => Boolean(path));

  for (const path of possiblePaths) {
    try {
      if (existsSync(path) && statSync(path).isFile()) {
        return path;
      }
    } catch (error) {
      console.log(`Skipping unreadable snapshot location ${path}:`, error);
    }
  }

  return undefined;
}

/**
 * Abstraction layer over the snapshot file.
 *
 * Parses lazily on first access and hands out copies, so callers can never
 * mutate the cached snapshot.
 */
export class FinancialSnapshotStore {
  private snapshotPath: string | undefined;
  private _snapshot: FinancialSnapshot | null = null;

  /**
   * @param snapshotPath - Path to the snapshot JSON file.
   *                       If undefined, searches the default locations.
   */
  constructor(snapshotPath?: string) {
    this.snapshotPath = snapshotPath === undefined ? findSnapshotFile() : snapshotPath;
  }

  /**
   * Build a store around an in-memory snapshot, e.g. one handed over by the
   * data layer directly.
   */
  static fromSnapshot(snapshot: unknown): FinancialSnapshotStore {
    const store = new FinancialSnapshotStore('');
    store.snapshotPath = undefined;
    store._snapshot = FinancialSnapshotSchema.parse(snapshot);
    return store;
  }

  /**
   * Check whether snapshot data can be read.
   */
  isAvailable(): boolean {
    if (this._snapshot !== null) return true;
    return this.snapshotPath !== undefined && existsSync(this.snapshotPath);
  }

  /**
   * Load and validate the snapshot file.
   *
   * @throws Error if no snapshot file exists, it is not JSON, or it fails validation
   */
  private load(): FinancialSnapshot {
    if (this._snapshot !== null) {
      return this._snapshot;
    }

    const path = this.snapshotPath;
    if (!path || !existsSync(path)) {
      throw new Error(
        'Snapshot not found. Export your accounts and transactions to a snapshot file ' +
          `and pass --snapshot <path> or set ${SNAPSHOT_ENV_VAR}.`
      );
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Snapshot file is not valid JSON (${path}): ${message}`);
    }

    const result = FinancialSnapshotSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new Error(`Snapshot file failed validation (${path}): ${issues}`);
    }

    this._snapshot = result.data;
    console.log(
      `Loaded snapshot from ${path}: ${result.data.accounts.length} accounts, ` +
        `${result.data.transactions.length} transactions`
    );
    return this._snapshot;
  }

  /**
   * Get all accounts, optionally filtered by account type (case-insensitive).
   */
  getAccounts(accountType?: string): Account[] {
    const accounts = this.load().accounts;
    if (!accountType) {
      return accounts.map((account) => ({ ...account }));
    }
    const typeLower = accountType.toLowerCase();
    return accounts
      .filter((account) => account.account_type.toLowerCase() === typeLower)
      .map((account) => ({ ...account }));
  }

  /**
   * Get all transactions.
   *
   * @returns Transactions sorted by date descending
   */
  getTransactions(): Transaction[] {
    return this.load()
      .transactions.map((txn) => ({ ...txn }))
      .sort((a, b) => b.date.localeCompare(a.date));
  }

  /**
   * Get the user's financial profile, if the snapshot carries one.
   */
  getProfile(): FinancialProfile | undefined {
    const profile = this.load().profile;
    return profile ? { ...profile } : undefined;
  }

  /**
   * Full snapshot copy for the metrics engine.
   */
  getSnapshot(): FinancialSnapshot {
    const snapshot = this.load();
    return {
      ...snapshot,
      accounts: this.getAccounts(),
      transactions: this.getTransactions(),
      profile: this.getProfile(),
    };
  }
}
