#!/usr/bin/env node

/**
 * SQL gatekeeper entry point
 * Loads the connection registry and serves MCP over stdio
 */

import { Command } from 'commander';
import { createMySQLClientFactory } from './clients/mysql-client.js';
import { getConfigPath, loadConfig } from './config/config.js';
import { ConnectionManager } from './connection-manager.js';
import { logger, parseLogLevel } from './logger.js';
import { MCPServer } from './mcp-server.js';
import { createTools } from './tools/index.js';

const VERSION = '1.0.0';

type CliOptions = {
  config?: string;
  logLevel?: string;
};

async function main(): Promise<void> {
  const program = new Command()
    .name('sql-gatekeeper')
    .description('MCP server exposing policy-gated access to named MySQL connections')
    .version(VERSION)
    .option('-c, --config <path>', 'path to the connections config file')
    .option('--log-level <level>', 'DEBUG, INFO, WARN or ERROR');

  program.parse(process.argv);
  const options = program.opts<CliOptions>();

  logger.setLevel(parseLogLevel(options.logLevel ?? process.env.LOG_LEVEL));

  const configPath = getConfigPath(options.config);
  const registry = await loadConfig(configPath);
  logger.info('Loaded configuration', { path: configPath, connections: registry.size });

  const manager = new ConnectionManager(registry, createMySQLClientFactory());
  const server = new MCPServer(createTools(manager), { name: 'sql-gatekeeper', version: VERSION });

  let shuttingDown = false;
  const shutdown = async (reason: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info('Shutting down', { reason });
    server.cancelAll();
    await manager.close();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('Shutdown failed', error);
          process.exit(1);
        }
      );
    });
  }

  logger.info('MCP server listening on stdio', { version: VERSION });
  await server.listen(process.stdin, process.stdout);
  await shutdown('stdin closed');
}

main().catch((error: unknown) => {
  logger.error('Fatal error', error);
  process.exit(1);
});
