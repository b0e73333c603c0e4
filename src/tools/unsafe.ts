import type { ConnectionManager } from '../connection-manager.js';
import { toWireUnsafeResult } from './format.js';
import {
  connectionProperty,
  connectionSqlArgs,
  parseArgs,
  sqlProperty,
  type Tool,
} from './registry.js';

export function unsafeTools(manager: ConnectionManager): Tool[] {
  return [
    {
      definition: {
        name: 'mysql_execute_unsafe',
        description: `DANGEROUS: Execute ANY SQL query, bypassing statement-level safety checks.

This tool bypasses:
- Dangerous query blocking (DROP, TRUNCATE, CREATE, GRANT, REVOKE)
- Sensitive query blocking (SHOW GRANTS, mysql.user access)

This tool does NOT bypass:
- Read-only connection restrictions (that's a configuration choice)

NEVER auto-accept this tool. Always review queries carefully.`,
        inputSchema: {
          type: 'object',
          properties: {
            connection: connectionProperty,
            sql: sqlProperty('The SQL query to execute (any type allowed)'),
          },
          required: ['connection', 'sql'],
        },
      },
      run: async (args, { signal }) => {
        const { connection, sql } = parseArgs(connectionSqlArgs, args);
        return toWireUnsafeResult(await manager.executeUnsafe(connection, sql, { signal }));
      },
    },
  ];
}
