/**
 * Write tools
 *
 * One tool per statement type so an MCP client can auto-accept by risk.
 */

import type { ConnectionManager } from '../connection-manager.js';
import type { QueryType } from '../types.js';
import { toWireWriteResult } from './format.js';
import {
  connectionProperty,
  connectionSqlArgs,
  parseArgs,
  sqlProperty,
  type Tool,
} from './registry.js';

interface WriteToolEntry {
  name: string;
  description: string;
  sqlDescription: string;
  allowedTypes: QueryType[];
}

const WRITE_TOOLS: WriteToolEntry[] = [
  {
    name: 'mysql_insert',
    description:
      'Execute an INSERT query against the MySQL database. Only INSERT queries are allowed. Medium risk - consider before auto-accepting.',
    sqlDescription: 'The INSERT query to execute',
    allowedTypes: ['INSERT'],
  },
  {
    name: 'mysql_update',
    description:
      'Execute an UPDATE query against the MySQL database. Only UPDATE queries are allowed. High risk - do not auto-accept.',
    sqlDescription: 'The UPDATE query to execute',
    allowedTypes: ['UPDATE'],
  },
  {
    name: 'mysql_delete',
    description:
      'Execute a DELETE query against the MySQL database. Only DELETE queries are allowed. High risk - do not auto-accept.',
    sqlDescription: 'The DELETE query to execute',
    allowedTypes: ['DELETE'],
  },
  {
    name: 'mysql_execute',
    description:
      'Execute an INSERT, UPDATE, or DELETE query against the MySQL database. High risk - do not auto-accept.',
    sqlDescription: 'The INSERT, UPDATE, or DELETE query to execute',
    allowedTypes: ['INSERT', 'UPDATE', 'DELETE'],
  },
];

function sqlToolSchema(sqlDescription: string) {
  return {
    type: 'object' as const,
    properties: {
      connection: connectionProperty,
      sql: sqlProperty(sqlDescription),
    },
    required: ['connection', 'sql'],
  };
}

export function writeTools(manager: ConnectionManager): Tool[] {
  const typed = WRITE_TOOLS.map((entry): Tool => ({
    definition: {
      name: entry.name,
      description: entry.description,
      inputSchema: sqlToolSchema(entry.sqlDescription),
    },
    run: async (args, { signal }) => {
      const { connection, sql } = parseArgs(connectionSqlArgs, args);
      return toWireWriteResult(await manager.executeWrite(connection, sql, entry.allowedTypes, { signal }));
    },
  }));

  const alter: Tool = {
    definition: {
      name: 'mysql_alter',
      description:
        'Execute an ALTER TABLE query against the MySQL database. Only ALTER queries are allowed. High risk - do not auto-accept. Still blocks DROP DATABASE, CREATE DATABASE, GRANT, REVOKE.',
      inputSchema: sqlToolSchema('The ALTER query to execute'),
    },
    run: async (args, { signal }) => {
      const { connection, sql } = parseArgs(connectionSqlArgs, args);
      return toWireWriteResult(await manager.executeAlter(connection, sql, { signal }));
    },
  };

  return [...typed, alter];
}
