/**
 * Unit tests for the MCP server request handlers.
 */

import { describe, test, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { HomeAffordabilityServer, formatToolError } from '../../src/server.js';
import { FinancialSnapshotStore } from '../../src/core/snapshot.js';
import { createEngineConfig } from '../../src/core/config.js';
import { AffordabilityTools } from '../../src/tools/tools.js';
import { AS_OF, createMockSnapshot } from '../helpers/fixtures.js';

function textOf(response: CallToolResult): string {
  const [item] = response.content;
  if (item?.type !== 'text') {
    throw new Error('Expected a text response');
  }
  return item.text;
}

function withSnapshot(snapshot: unknown): HomeAffordabilityServer {
  const server = new HomeAffordabilityServer('/nonexistent/snapshot.json');
  const store = FinancialSnapshotStore.fromSnapshot(snapshot);
  server._injectForTesting(store, new AffordabilityTools(store));
  return server;
}

describe('HomeAffordabilityServer', () => {
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  describe('handleListTools', () => {
    test('lists the six read-only tools', () => {
      const { tools } = new HomeAffordabilityServer('/nonexistent/snapshot.json').handleListTools();

      expect(tools).toHaveLength(6);
      expect(tools.every((tool) => tool.annotations?.readOnlyHint === true)).toBe(true);
      expect(tools.map((tool) => tool.name)).toContain('get_affordability');
    });
  });

  describe('handleCallTool without a snapshot', () => {
    let server: HomeAffordabilityServer;

    beforeEach(() => {
      server = new HomeAffordabilityServer('/nonexistent/snapshot.json');
    });

    test('explains how to provide a snapshot for data tools', async () => {
      for (const name of [
        'get_financial_dashboard',
        'get_accounts',
        'get_category_breakdown',
        'get_affordability',
      ]) {
        const response = await server.handleCallTool(name, {});
        expect(response.isError).toBeUndefined();
        expect(textOf(response)).toMatch(/^Snapshot not available\./);
      }
    });

    test('still serves the calculator tools', async () => {
      const response = await server.handleCallTool('calculate_payment_breakdown', {
        home_price: 250000,
      });
      const result = JSON.parse(textOf(response));

      expect(response.isError).toBeUndefined();
      expect(result.monthly_payment.total).toBe(1684.77);
    });

    test('applies the configuration it was started with', async () => {
      const custom = new HomeAffordabilityServer(
        '/nonexistent/snapshot.json',
        createEngineConfig({ front_end_dti_limit: 0.36 })
      );
      const response = await custom.handleCallTool('calculate_max_home_price', {
        monthly_income: 5000,
        monthly_debt_payments: 300,
      });

      expect(JSON.parse(textOf(response)).max_monthly_payment).toBe(1500);
    });
  });

  describe('handleCallTool with a snapshot', () => {
    test('returns the dashboard as JSON', async () => {
      const server = withSnapshot(createMockSnapshot());
      const response = await server.handleCallTool('get_financial_dashboard', { as_of: AS_OF });
      const result = JSON.parse(textOf(response));

      expect(result.net_worth).toBe(7500);
      expect(result.savings_rate).toBe(54.29);
    });

    test('applies argument defaults', async () => {
      const server = withSnapshot(createMockSnapshot());
      const response = await server.handleCallTool('get_category_breakdown', { as_of: AS_OF });
      const result = JSON.parse(textOf(response));
      expect(result.type).toBe('expense');
    });

    test('reports tool failures as errors', async () => {
      const server = withSnapshot({ accounts: [], transactions: [] });
      const response = await server.handleCallTool('get_affordability', {});

      expect(response.isError).toBe(true);
      expect(textOf(response)).toBe(
        'Error: No accounts found. Add accounts to calculate affordability.'
      );
      expect(errorSpy).toHaveBeenCalledWith(
        'Tool get_affordability failed:',
        'No accounts found. Add accounts to calculate affordability.'
      );
    });
  });

  describe('argument validation', () => {
    let server: HomeAffordabilityServer;

    beforeEach(() => {
      server = new HomeAffordabilityServer('/nonexistent/snapshot.json');
    });

    test('rejects out-of-range values', async () => {
      const response = await server.handleCallTool('calculate_payment_breakdown', {
        home_price: -5,
      });

      expect(response.isError).toBe(true);
      expect(textOf(response)).toMatch(/^Error: Invalid arguments: home_price: /);
    });

    test('rejects unknown arguments', async () => {
      const response = await server.handleCallTool('calculate_payment_breakdown', {
        home_price: 1,
        price: 2,
      });

      expect(response.isError).toBe(true);
      expect(textOf(response)).toMatch(/^Error: Invalid arguments: \(arguments\): /);
    });

    test('rejects a missing required argument', async () => {
      const response = await server.handleCallTool('calculate_max_home_price');
      expect(response.isError).toBe(true);
      expect(textOf(response)).toMatch(/^Error: Invalid arguments: monthly_income: /);
    });

    test('rejects unknown tools', async () => {
      const response = await server.handleCallTool('delete_everything', {});

      expect(response.isError).toBe(true);
      expect(textOf(response)).toBe('Unknown tool: delete_everything');
    });
  });
});

describe('formatToolError', () => {
  test('joins validation issues with their paths', () => {
    const schema = z.object({ a: z.number(), b: z.object({ c: z.string() }) });
    const result = schema.safeParse({ a: 'x', b: { c: 1 } });
    if (result.success) throw new Error('expected failure');

    expect(formatToolError(result.error)).toBe(
      'Invalid arguments: a: Expected number, received string; b.c: Expected string, received number'
    );
  });

  test('uses the message of other errors', () => {
    expect(formatToolError(new Error('boom'))).toBe('boom');
    expect(formatToolError('plain')).toBe('plain');
  });
});
