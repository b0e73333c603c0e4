/**
 * Fixed tool table. Every tool receives the manager explicitly.
 */

import type { ConnectionManager } from '../connection-manager.js';
import { connectionsTools } from './connections.js';
import { indexTools } from './indexes.js';
import { readTools } from './read.js';
import type { Tool } from './registry.js';
import { schemaTools } from './schema.js';
import { unsafeTools } from './unsafe.js';
import { writeTools } from './write.js';

export type { Tool, ToolContext } from './registry.js';

export function createTools(manager: ConnectionManager): Tool[] {
  return [
    ...connectionsTools(manager),
    ...readTools(manager),
    ...writeTools(manager),
    ...unsafeTools(manager),
    ...schemaTools(manager),
    ...indexTools(manager),
  ];
}
