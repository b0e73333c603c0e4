/**
 * Read tools: mysql_select, plus the older catch-all mysql_query
 */

import type { ConnectionManager } from '../connection-manager.js';
import { QueryClassifier } from '../validators/query-classifier.js';
import {
  connectionProperty,
  connectionSqlArgs,
  parseArgs,
  sqlProperty,
  type Tool,
} from './registry.js';

export function readTools(manager: ConnectionManager): Tool[] {
  return [
    {
      definition: {
        name: 'mysql_select',
        description:
          'Execute a SELECT query against the MySQL database. Only SELECT queries are allowed. Safe for auto-accept in MCP clients.',
        inputSchema: {
          type: 'object',
          properties: {
            connection: connectionProperty,
            sql: sqlProperty('The SELECT query to execute'),
          },
          required: ['connection', 'sql'],
        },
      },
      run: async (args, { signal }) => {
        const { connection, sql } = parseArgs(connectionSqlArgs, args);
        QueryClassifier.validateType(sql, 'SELECT');
        return manager.executeQuery(connection, sql, { signal });
      },
    },
    {
      definition: {
        name: 'mysql_query',
        description: `[DEPRECATED] Execute a SQL query against the MySQL database.

Prefer the specific tools instead:
- mysql_select: For SELECT queries (safe for auto-accept)
- mysql_insert, mysql_update, mysql_delete: For single-type writes
- mysql_alter: For ALTER TABLE queries
- mysql_execute: For INSERT/UPDATE/DELETE combined
- mysql_execute_unsafe: For queries blocked by safety checks

For read-only connections, only SELECT/SHOW/DESCRIBE/EXPLAIN queries are allowed.`,
        inputSchema: {
          type: 'object',
          properties: {
            connection: connectionProperty,
            sql: sqlProperty('The SQL query to execute'),
          },
          required: ['connection', 'sql'],
        },
      },
      run: async (args, { signal }) => {
        const { connection, sql } = parseArgs(connectionSqlArgs, args);
        return manager.executeQuery(connection, sql, { signal });
      },
    },
  ];
}
