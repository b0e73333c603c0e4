/**
 * SQL gatekeeper - policy-gated MySQL access for MCP clients
 * Main exports for programmatic usage
 */

export * from './types.js';
export * from './errors.js';
export { BaseDatabaseClient, decodeRow, normalizeValue } from './clients/base-client.js';
export { MySQLClient, createMySQLClientFactory } from './clients/mysql-client.js';
export type { MySQLClientOptions } from './clients/mysql-client.js';
export { getConfigPath, loadConfig, parseConfig, expandEnvVar } from './config/config.js';
export { ConnectionManager, UNSAFE_WARNING } from './connection-manager.js';
export { Logger, LogLevel, logger, parseLogLevel } from './logger.js';
export { MCPServer, ErrorCodes } from './mcp-server.js';
export { createTools } from './tools/index.js';
export type { Tool, ToolContext } from './tools/index.js';
export { QueryClassifier } from './validators/query-classifier.js';
