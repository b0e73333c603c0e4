/**
 * Schema inspection tools
 *
 * Each builds a SHOW/DESCRIBE statement and sends it through the normal
 * query gate, so read-only and sensitive checks still apply.
 */

import { z } from 'zod';
import type { ConnectionManager } from '../connection-manager.js';
import type { QueryResult } from '../types.js';
import {
  connectionProperty,
  databaseProperty,
  optionalString,
  parseArgs,
  qualifiedName,
  quoteIdentifier,
  requiredString,
  type Tool,
} from './registry.js';

const listTablesArgs = z.object({
  connection: requiredString('connection'),
  database: optionalString('database'),
});

export const tableArgs = z.object({
  connection: requiredString('connection'),
  table: requiredString('table'),
  database: optionalString('database'),
});

/**
 * Collects every string cell, row by row in column order.
 */
export function stringValues(result: QueryResult): string[] {
  const values: string[] = [];
  for (const row of result.rows) {
    for (const column of result.columns) {
      const value = row[column];
      if (typeof value === 'string') {
        values.push(value);
      }
    }
  }
  return values;
}

export function schemaTools(manager: ConnectionManager): Tool[] {
  return [
    {
      definition: {
        name: 'list_databases',
        description: 'List all accessible databases',
        inputSchema: {
          type: 'object',
          properties: { connection: connectionProperty },
          required: ['connection'],
        },
      },
      run: async (args, { signal }) => {
        const { connection } = parseArgs(z.object({ connection: requiredString('connection') }), args);
        return stringValues(await manager.executeQuery(connection, 'SHOW DATABASES', { signal }));
      },
    },
    {
      definition: {
        name: 'list_tables',
        description: 'List all tables in a database',
        inputSchema: {
          type: 'object',
          properties: { connection: connectionProperty, database: databaseProperty },
          required: ['connection'],
        },
      },
      run: async (args, { signal }) => {
        const { connection, database } = parseArgs(listTablesArgs, args);
        const sql = database ? `SHOW TABLES FROM ${quoteIdentifier(database)}` : 'SHOW TABLES';
        return stringValues(await manager.executeQuery(connection, sql, { signal }));
      },
    },
    {
      definition: {
        name: 'describe_table',
        description: 'Get the schema/structure of a table including columns, types, and keys',
        inputSchema: {
          type: 'object',
          properties: {
            connection: connectionProperty,
            table: { type: 'string', description: 'Table name to describe' },
            database: databaseProperty,
          },
          required: ['connection', 'table'],
        },
      },
      run: async (args, { signal }) => {
        const { connection, table, database } = parseArgs(tableArgs, args);
        const result = await manager.executeQuery(
          connection,
          `DESCRIBE ${qualifiedName(table, database)}`,
          { signal }
        );
        return result.rows;
      },
    },
  ];
}
