/**
 * End-to-end tests for the MCP server.
 *
 * Runs every tool against a snapshot and a config file read from disk.
 */

import { describe, test, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { HomeAffordabilityServer } from '../../src/server.js';
import { loadEngineConfig } from '../../src/core/config.js';
import { AS_OF, createMockSnapshot } from '../helpers/fixtures.js';

function parse(response: CallToolResult): Record<string, unknown> {
  const [item] = response.content;
  if (item?.type !== 'text') {
    throw new Error('Expected a text response');
  }
  const value: unknown = JSON.parse(item.text);
  if (typeof value !== 'object' || value === null) {
    throw new Error('Expected a JSON object');
  }
  return Object.fromEntries(Object.entries(value));
}

describe('HomeAffordabilityServer end to end', () => {
  let dir: string;
  let server: HomeAffordabilityServer;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'affordability-e2e-'));

    const snapshotPath = join(dir, 'snapshot.json');
    writeFileSync(
      snapshotPath,
      JSON.stringify(
        createMockSnapshot({
          exported_at: '2024-06-30T23:59:00Z',
          profile: { monthly_debt_payment: '250.00' },
        })
      )
    );

    const configPath = join(dir, 'config.json');
    writeFileSync(configPath, JSON.stringify({ reserve_months: 3 }));

    server = new HomeAffordabilityServer(snapshotPath, loadEngineConfig(configPath));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('get_financial_dashboard', async () => {
    const result = parse(await server.handleCallTool('get_financial_dashboard', { as_of: AS_OF }));

    expect(result.net_worth).toBe(7500);
    // (275 estimated + 250 profile) / 3500
    expect(result.dti_ratio).toBe(15);
  });

  test('get_accounts', async () => {
    const result = parse(await server.handleCallTool('get_accounts', { account_type: 'savings' }));
    expect(result.count).toBe(1);
    expect(result.total_assets).toBe(15000);
  });

  test('get_category_breakdown', async () => {
    const result = parse(
      await server.handleCallTool('get_category_breakdown', { type: 'income', as_of: AS_OF })
    );
    expect(result.total).toBe(11000);
  });

  test('get_affordability uses the profile debt and configured reserves', async () => {
    const result = parse(await server.handleCallTool('get_affordability', { as_of: AS_OF }));

    // 0.28 × 3500 − 250
    expect(result.max_monthly_payment).toBe(730);
    // 3 months × 1600
    expect(result.cash_requirements).toMatchObject({ emergency_reserves: 4800, available: 30000 });
  });

  test('calculate_payment_breakdown', async () => {
    const result = parse(
      await server.handleCallTool('calculate_payment_breakdown', { home_price: 250000 })
    );
    expect(result.monthly_payment).toMatchObject({ total: 1684.77 });
  });

  test('calculate_max_home_price', async () => {
    const result = parse(
      await server.handleCallTool('calculate_max_home_price', {
        monthly_income: 5000,
        monthly_debt_payments: 300,
        available_cash: 60000,
        monthly_expenses: 2000,
      })
    );

    expect(result.max_monthly_payment).toBe(1100);
    expect(result.warnings).toEqual([]);
  });
});
