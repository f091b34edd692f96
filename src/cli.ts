#!/usr/bin/env node
/**
 * CLI entry point for the home affordability MCP server.
 */

import { loadEngineConfig } from './core/config.js';
import { runServer } from './server.js';

interface CliOptions {
  snapshotPath?: string;
  configPath?: string;
  verbose: boolean;
  help: boolean;
}

const USAGE = `
Home Affordability MCP Server - Financial metrics and home affordability through MCP

Usage:
  home-affordability-mcp [options]

Options:
  --snapshot <path>   Path to the accounts/transactions snapshot JSON file
                      (default: $HOME_AFFORDABILITY_SNAPSHOT, then ~/.home-affordability/snapshot.json)
  --config <path>     JSON file overriding default rates and policy limits
  --verbose, -v       Enable verbose logging
  --help, -h          Show this help message

Environment:
  The server uses stdio transport and logs to stderr.
`;

/**
 * Parse command-line arguments.
 */
function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { verbose: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--snapshot' && i + 1 < args.length) {
      options.snapshotPath = args[i + 1];
      i++;
    } else if (arg === '--config' && i + 1 < args.length) {
      options.configPath = args[i + 1];
      i++;
    } else if (arg === '--verbose' || arg === '-v') {
      options.verbose = true;
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    }
  }

  return options;
}

/**
 * Configure logging.
 */
function configureLogging(verbose: boolean): void {
  // stdout carries the MCP protocol, so everything goes to stderr
  const originalError = console.error;

  if (verbose) {
    console.log = (...args: unknown[]) => {
      originalError('[LOG]', new Date().toISOString(), ...args);
    };
    console.error = (...args: unknown[]) => {
      originalError('[ERROR]', new Date().toISOString(), ...args);
    };
  } else {
    // In non-verbose mode, suppress console.log but keep console.error
    console.log = () => {};
  }
}

/**
 * Main entry point.
 */
async function main(): Promise<void> {
  const { snapshotPath, configPath, verbose, help } = parseArgs(process.argv.slice(2));

  if (help) {
    console.error(USAGE);
    process.exit(0);
  }

  configureLogging(verbose);

  try {
    const config = loadEngineConfig(configPath);

    if (verbose) {
      console.log('Starting Home Affordability MCP Server...');
      console.log(
        snapshotPath ? `Using snapshot: ${snapshotPath}` : 'Using default snapshot location'
      );
      if (configPath) {
        console.log(`Using config: ${configPath}`);
      }
    }

    await runServer(snapshotPath, config);
  } catch (error) {
    console.error('Server error:', error);
    process.exit(1);
  }
}

// Handle unhandled rejections
process.on('unhandledRejection', (error) => {
  console.error('Unhandled rejection:', error);
  process.exit(1);
});

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
