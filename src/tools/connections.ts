import type { ConnectionManager } from '../connection-manager.js';
import type { Tool } from './registry.js';

export function connectionsTools(manager: ConnectionManager): Tool[] {
  return [
    {
      definition: {
        name: 'list_connections',
        description: 'List all configured database connections with their read-only status',
        inputSchema: { type: 'object', properties: {} },
      },
      run: async () => manager.listConnections(),
    },
  ];
}
