import type { ConnectionManager } from '../connection-manager.js';
import type { ColumnValue, ResultRow } from '../types.js';
import { tableArgs } from './schema.js';
import {
  connectionProperty,
  databaseProperty,
  parseArgs,
  qualifiedName,
  type Tool,
} from './registry.js';

export interface IndexInfo {
  name: string;
  unique: boolean;
  columns: string[];
}

function isZero(value: ColumnValue | undefined): boolean {
  return value === 0 || value === '0' || value === 0n;
}

/**
 * Folds SHOW INDEX rows (one per indexed column) into one entry per index,
 * in the order the indexes first appear.
 */
export function groupIndexes(rows: readonly ResultRow[]): IndexInfo[] {
  const indexes = new Map<string, IndexInfo>();

  for (const row of rows) {
    const keyName = row['Key_name'];
    if (typeof keyName !== 'string' || keyName === '') continue;

    let index = indexes.get(keyName);
    if (!index) {
      index = { name: keyName, unique: isZero(row['Non_unique']), columns: [] };
      indexes.set(keyName, index);
    }

    const column = row['Column_name'];
    if (typeof column === 'string' && column !== '') {
      index.columns.push(column);
    }
  }

  return Array.from(indexes.values());
}

export function indexTools(manager: ConnectionManager): Tool[] {
  return [
    {
      definition: {
        name: 'get_indexes',
        description: 'Get indexes for a table including index name, columns, and uniqueness',
        inputSchema: {
          type: 'object',
          properties: {
            connection: connectionProperty,
            table: { type: 'string', description: 'Table name to get indexes for' },
            database: databaseProperty,
          },
          required: ['connection', 'table'],
        },
      },
      run: async (args, { signal }) => {
        const { connection, table, database } = parseArgs(tableArgs, args);
        const result = await manager.executeQuery(
          connection,
          `SHOW INDEX FROM ${qualifiedName(table, database)}`,
          { signal }
        );
        return groupIndexes(result.rows);
      },
    },
  ];
}
