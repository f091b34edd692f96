/**
 * MCP tools for metrics and affordability.
 */

export {
  AffordabilityTools,
  createToolSchemas,
  presentAffordability,
  presentBreakdown,
  NO_ACCOUNTS_MESSAGE,
  type ToolSchema,
} from './tools.js';
