/**
 * Configuration loading
 *
 * Reads the JSON connection file once at startup and turns it into an
 * immutable registry of connection policies.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError, describeError } from '../errors.js';
import type { ConnectionPolicy, ConnectionRegistry } from '../types.js';

export const CONFIG_PATH_ENV = 'SQL_GATEKEEPER_CONFIG';
export const DEFAULT_CONFIG_PATH = './config.json';
export const DEFAULT_PORT = 3306;
export const DEFAULT_MAX_ROWS = 1000;

const connectionSchema = z.object({
  host: z.string().default(''),
  port: z.number().int().min(0).max(65535).optional(),
  user: z.string().default(''),
  password: z.string().default(''),
  database: z.string().default(''),
  read_only: z.boolean().default(false),
  max_rows: z.number().int().min(0).optional(),
});

const configSchema = z.object({
  connections: z.record(connectionSchema).default({}),
});

type Env = Readonly<Record<string, string | undefined>>;

const ENV_REFERENCE = /^\$\{([^}]+)\}$/;

/**
 * Replaces a value of the exact form `${NAME}` with that environment
 * variable. Unset variables expand to an empty string; anything else is
 * returned untouched.
 */
export function expandEnvVar(value: string, env: Env = process.env): string {
  const match = ENV_REFERENCE.exec(value);
  if (!match) return value;
  return env[match[1]] ?? '';
}

/**
 * Config path precedence: explicit flag, then environment, then default.
 */
export function getConfigPath(flagValue?: string, env: Env = process.env): string {
  if (flagValue) return flagValue;

  const fromEnv = env[CONFIG_PATH_ENV];
  if (fromEnv) return fromEnv;

  return DEFAULT_CONFIG_PATH;
}

export function parseConfig(raw: unknown, env: Env = process.env): ConnectionRegistry {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ConfigError(`failed to parse config file: ${where}${issue.message}`, parsed.error);
  }

  const entries = Object.entries(parsed.data.connections);
  if (entries.length === 0) {
    throw new ConfigError('no connections defined in config');
  }

  const registry = new Map<string, ConnectionPolicy>();
  for (const [name, conn] of entries) {
    const policy: ConnectionPolicy = Object.freeze({
      host: expandEnvVar(conn.host, env),
      port: conn.port || DEFAULT_PORT,
      user: expandEnvVar(conn.user, env),
      password: expandEnvVar(conn.password, env),
      database: expandEnvVar(conn.database, env),
      readOnly: conn.read_only,
      maxRows: conn.max_rows || DEFAULT_MAX_ROWS,
    });

    for (const field of ['host', 'user', 'database'] as const) {
      if (policy[field] === '') {
        throw new ConfigError(`connection '${name}': ${field} is required`);
      }
    }

    registry.set(name, policy);
  }

  return registry;
}

export async function loadConfig(path: string, env: Env = process.env): Promise<ConnectionRegistry> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigError(`failed to read config file: ${describeError(error)}`, error);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`failed to parse config file: ${describeError(error)}`, error);
  }

  return parseConfig(raw, env);
}
