/**
 * Tool registry types and argument helpers shared by every tool module
 */

import { z } from 'zod';
import { InvalidArgumentsError } from '../errors.js';
import type { MCPTool } from '../types.js';

export interface ToolContext {
  signal: AbortSignal;
}

export interface Tool {
  definition: MCPTool;
  run(args: Record<string, unknown>, context: ToolContext): Promise<unknown>;
}

export function requiredString(field: string) {
  const message = `${field} parameter is required`;
  return z.string({ required_error: message, invalid_type_error: message }).min(1, message);
}

export function optionalString(field: string) {
  return z.string({ invalid_type_error: `${field} parameter must be a string` }).optional();
}

export const connectionSqlArgs = z.object({
  connection: requiredString('connection'),
  sql: requiredString('sql'),
});

export function parseArgs<T extends z.ZodTypeAny>(schema: T, args: Record<string, unknown>): z.output<T> {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    throw new InvalidArgumentsError(parsed.error.issues[0]?.message ?? 'invalid arguments');
  }
  return parsed.data;
}

export const connectionProperty = {
  type: 'string',
  description: 'The named connection to use (from config)',
};

export const databaseProperty = {
  type: 'string',
  description: 'Database name (uses connection default if not provided)',
};

export function sqlProperty(description: string) {
  return { type: 'string', description };
}

/**
 * Back-quotes a MySQL identifier, doubling any embedded back-quote.
 */
export function quoteIdentifier(name: string): string {
  return `\`${name.replace(/`/g, '``')}\``;
}

export function qualifiedName(table: string, database?: string): string {
  return database ? `${quoteIdentifier(database)}.${quoteIdentifier(table)}` : quoteIdentifier(table);
}
