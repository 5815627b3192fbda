#!/usr/bin/env node
/**
 * CLI entry point for the MCP server
 *
 * Usage:
 *   mdm-mcp-server                       # settings from the environment / .env
 *   mdm-mcp-server --config ./config.json
 */

import 'dotenv/config';
import { loadConfig } from './config.js';
import { Logger } from './logger.js';
import { createLogger, runServer } from './server.js';

function configPathFromArgs(args: string[]): string | undefined {
  const index = args.indexOf('--config');
  if (index === -1) return undefined;
  const value = args[index + 1];
  if (!value) {
    throw new Error('Usage: mdm-mcp-server [--config <config.json>]');
  }
  return value;
}

async function main(): Promise<void> {
  let logger = new Logger();

  try {
    const config = await loadConfig({ configPath: configPathFromArgs(process.argv.slice(2)) });
    logger = createLogger(config);
    await runServer(config, logger);
  } catch (error) {
    logger.error('Failed to start server', { error });
    process.exit(1);
  }
}

void main();
