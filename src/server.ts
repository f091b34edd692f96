/**
 * MCP server for household metrics and home affordability.
 *
 * Exposes the metrics and affordability engines through the Model Context Protocol.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  CallToolResult,
  ListToolsRequestSchema,
  Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { ZodError } from 'zod';
import { FinancialSnapshotStore } from './core/snapshot.js';
import { type EngineConfig, createEngineConfig } from './core/config.js';
import { AffordabilityTools, createToolSchemas } from './tools/index.js';
import {
  CalculateMaxHomePriceArgsSchema,
  CalculatePaymentBreakdownArgsSchema,
  GetAccountsArgsSchema,
  GetAffordabilityArgsSchema,
  GetCategoryBreakdownArgsSchema,
  GetDashboardArgsSchema,
} from './tools/tools.js';

// Read version from package.json
import { createRequire } from 'module';
const require = createRequire(import.meta.url);
const { version: SERVER_VERSION } = require('../package.json') as { version: string };

/**
 * Tools that read the user's snapshot and need it to be present.
 */
const SNAPSHOT_TOOLS: ReadonlySet<string> = new Set([
  'get_financial_dashboard',
  'get_accounts',
  'get_category_breakdown',
  'get_affordability',
]);

/**
 * Flatten an error into a single user-facing line.
 */
export function formatToolError(error: unknown): string {
  if (error instanceof ZodError) {
    const issues = error.issues
      .map((issue) => `${issue.path.join('.') || '(arguments)'}: ${issue.message}`)
      .join('; ');
    return `Invalid arguments: ${issues}`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * MCP server for household metrics and home affordability.
 */
export class HomeAffordabilityServer {
  private store: FinancialSnapshotStore;
  private tools: AffordabilityTools;
  private server: Server;

  /**
   * Initialize the MCP server.
   *
   * @param snapshotPath - Optional path to the snapshot JSON file.
   *                       If undefined, searches the default locations.
   * @param config - Engine configuration (defaults when omitted)
   */
  constructor(snapshotPath?: string, config: EngineConfig = createEngineConfig()) {
    this.store = new FinancialSnapshotStore(snapshotPath);
    this.tools = new AffordabilityTools(this.store, config);
    this.server = new Server(
      {
        name: 'home-affordability-mcp',
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.registerHandlers();
  }

  /**
   * Handle list tools request.
   * Exposed for testing purposes.
   */
  handleListTools(): { tools: Tool[] } {
    const schemas = createToolSchemas();
    const tools: Tool[] = schemas.map((schema) => ({
      name: schema.name,
      description: schema.description,
      inputSchema: schema.inputSchema,
      annotations: schema.annotations,
    }));

    return { tools };
  }

  /**
   * Handle tool call request.
   * Exposed for testing purposes.
   *
   * @param name - Tool name
   * @param typedArgs - Tool arguments
   */
  async handleCallTool(
    name: string,
    typedArgs?: Record<string, unknown>
  ): Promise<CallToolResult> {
    if (SNAPSHOT_TOOLS.has(name) && !this.store.isAvailable()) {
      return {
        content: [
          {
            type: 'text' as const,
            text:
              'Snapshot not available. Export your accounts and transactions to a snapshot ' +
              'file and start the server with --snapshot <path>.',
          },
        ],
      };
    }

    const args = typedArgs ?? {};

    try {
      let result: unknown;

      // Route to appropriate tool handler
      switch (name) {
        case 'get_financial_dashboard':
          result = await this.tools.getFinancialDashboard(GetDashboardArgsSchema.parse(args));
          break;

        case 'get_accounts':
          result = await this.tools.getAccounts(GetAccountsArgsSchema.parse(args));
          break;

        case 'get_category_breakdown':
          result = await this.tools.getCategoryBreakdown(
            GetCategoryBreakdownArgsSchema.parse(args)
          );
          break;

        case 'get_affordability':
          result = await this.tools.getAffordability(GetAffordabilityArgsSchema.parse(args));
          break;

        case 'calculate_payment_breakdown':
          result = await this.tools.calculatePaymentBreakdown(
            CalculatePaymentBreakdownArgsSchema.parse(args)
          );
          break;

        case 'calculate_max_home_price':
          result = await this.tools.calculateMaxHomePrice(
            CalculateMaxHomePriceArgsSchema.parse(args)
          );
          break;

        default:
          return {
            content: [
              {
                type: 'text' as const,
                text: `Unknown tool: ${name}`,
              },
            ],
            isError: true,
          };
      }

      // Format response
      return {
        content: [
          {
            type: 'text' as const,
            text: JSON.stringify(result, null, 2),
          },
        ],
      };
    } catch (error) {
      console.error(`Tool ${name} failed:`, formatToolError(error));

      return {
        content: [
          {
            type: 'text' as const,
            text: `Error: ${formatToolError(error)}`,
          },
        ],
        isError: true,
      };
    }
  }

  /**
   * Inject store and tools for testing.
   * @internal
   */
  _injectForTesting(store: FinancialSnapshotStore, tools: AffordabilityTools): void {
    this.store = store;
    this.tools = tools;
  }

  /**
   * Register MCP protocol handlers.
   */
  private registerHandlers(): void {
    // List available tools - delegates to handleListTools
    this.server.setRequestHandler(ListToolsRequestSchema, () => this.handleListTools());

    // Handle tool calls - delegates to handleCallTool
    this.server.setRequestHandler(CallToolRequestSchema, (request) => {
      const { name, arguments: typedArgs } = request.params;
      return this.handleCallTool(name, typedArgs);
    });
  }

  /**
   * Run the MCP server using stdio transport.
   */
  async run(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);

    // Handle process signals for graceful shutdown
    process.on('SIGINT', () => {
      void this.server.close().then(() => process.exit(0));
    });

    process.on('SIGTERM', () => {
      void this.server.close().then(() => process.exit(0));
    });
  }
}

/**
 * Run the home affordability MCP server.
 *
 * @param snapshotPath - Optional path to the snapshot JSON file.
 * @param config - Engine configuration (defaults when omitted)
 */
export async function runServer(snapshotPath?: string, config?: EngineConfig): Promise<void> {
  const server = new HomeAffordabilityServer(snapshotPath, config);
  await server.run();
}
