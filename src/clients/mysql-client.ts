/**
 * MySQL Database Client
 * One mysql2 pool per named connection, sized for a tool server
 */

import mysql from 'mysql2';
import type { Pool, PoolConnection, PoolOptions, ResultSetHeader, RowDataPacket } from 'mysql2';
import { BaseDatabaseClient } from './base-client.js';
import { ExecutionFailureError, QueryCancelledError, describeError } from '../errors.js';
import { logger } from '../logger.js';
import type {
  ConnectionPolicy,
  ExecResult,
  ExecuteOptions,
  RowHandlers,
} from '../types.js';

export interface MySQLClientOptions {
  /** Per-statement and connect timeout in milliseconds */
  timeoutMs?: number;
  connectionLimit?: number;
  maxIdle?: number;
}

export const DEFAULT_POOL_LIMITS = {
  connectionLimit: 5,
  maxIdle: 2,
} as const;

export class MySQLClient extends BaseDatabaseClient {
  private pool: Pool | null = null;

  constructor(
    name: string,
    policy: ConnectionPolicy,
    private readonly options: MySQLClientOptions = {}
  ) {
    super(name, policy);
  }

  async connect(): Promise<void> {
    if (this.connected) {
      return;
    }

    const poolConfig: PoolOptions = {
      host: this.policy.host,
      port: this.policy.port,
      user: this.policy.user,
      password: this.policy.password,
      database: this.policy.database,
      waitForConnections: true,
      connectionLimit: this.options.connectionLimit ?? DEFAULT_POOL_LIMITS.connectionLimit,
      maxIdle: this.options.maxIdle ?? DEFAULT_POOL_LIMITS.maxIdle,
      queueLimit: 0,
      enableKeepAlive: true,
      keepAliveInitialDelay: 0,
      connectTimeout: this.normalizeTimeout(this.options.timeoutMs),
      supportBigNumbers: true,
    };

    const pool = mysql.createPool(poolConfig);

    // Test connection
    try {
      await probe(pool);
    } catch (error) {
      await pool
        .promise()
        .end()
        .catch((closeError: unknown) => {
          logger.warn('Failed to close pool after failed probe', {
            connection: this.name,
            error: describeError(closeError),
          });
        });
      throw error;
    }

    this.pool = pool;
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    const pool = this.pool;
    this.pool = null;
    this.connected = false;

    if (pool) {
      await pool.promise().end();
    }
  }

  async ping(): Promise<void> {
    await probe(this.requirePool());
  }

  /**
   * Runs a statement through the exec path. Cancellation is honoured only
   * before dispatch: once sent, the statement's real outcome is reported.
   */
  async execute(sql: string, options: ExecuteOptions = {}): Promise<ExecResult> {
    const pool = this.requirePool();

    if (options.signal?.aborted) {
      throw new QueryCancelledError();
    }

    try {
      const [result] = await pool.promise().query<ResultSetHeader | RowDataPacket[]>({
        sql,
        timeout: this.normalizeTimeout(this.options.timeoutMs),
      });

      // A row-returning statement sent down the exec path changes nothing
      if (Array.isArray(result)) {
        return { affectedRows: 0 };
      }

      return result.insertId > 0
        ? { affectedRows: result.affectedRows, insertId: result.insertId }
        : { affectedRows: result.affectedRows };
    } catch (error) {
      throw ExecutionFailureError.wrap(error);
    }
  }

  /**
   * Streams on a dedicated pooled connection. When the caller stops early or
   * cancels, that connection is destroyed so the server stops sending and the
   * connection never goes back to the pool mid-result.
   */
  protected async streamRows(sql: string, handlers: RowHandlers, signal?: AbortSignal): Promise<void> {
    const pool = this.requirePool();

    if (signal?.aborted) {
      throw new QueryCancelledError();
    }

    const conn = await acquire(pool).catch((error: unknown) => {
      throw ExecutionFailureError.wrap(error);
    });

    if (signal?.aborted) {
      conn.release();
      throw new QueryCancelledError();
    }

    return new Promise<void>((resolve, reject) => {
      let settled = false;

      const settle = (error?: Error): void => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener('abort', onAbort);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      const abandon = (error?: Error): void => {
        if (settled) return;
        conn.destroy();
        settle(error);
      };

      const onAbort = (): void => abandon(new QueryCancelledError());
      signal?.addEventListener('abort', onAbort, { once: true });

      const query = conn.query({
        sql,
        rowsAsArray: true,
        timeout: this.normalizeTimeout(this.options.timeoutMs),
      });

      query.on('fields', (fields: unknown) => {
        if (!settled) handlers.onFields(fieldNames(fields));
      });

      // Statements without a result set report an OK packet here instead of rows
      query.on('result', (row: unknown) => {
        if (settled || !Array.isArray(row)) return;
        if (!handlers.onRow(row)) {
          abandon();
        }
      });

      // Stays attached after an early stop: the destroyed connection may still report
      query.on('error', (error: unknown) => {
        if (settled) {
          logger.debug('Error after result stream was abandoned', {
            connection: this.name,
            error: describeError(error),
          });
          return;
        }

        if (isFatal(error)) {
          conn.destroy();
        } else {
          conn.release();
        }
        settle(ExecutionFailureError.wrap(error));
      });

      query.on('end', () => {
        if (settled) return;
        conn.release();
        settle();
      });
    });
  }

  private requirePool(): Pool {
    this.ensureConnected();

    if (!this.pool) {
      throw new ExecutionFailureError(`connection '${this.name}' has no open pool`);
    }

    return this.pool;
  }
}

async function probe(pool: Pool): Promise<void> {
  const conn = await pool.promise().getConnection();
  try {
    await conn.ping();
  } finally {
    conn.release();
  }
}

function acquire(pool: Pool): Promise<PoolConnection> {
  return new Promise((resolve, reject) => {
    pool.getConnection((error, conn) => {
      if (error) {
        reject(error);
      } else {
        resolve(conn);
      }
    });
  });
}

function isFatal(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'fatal' in error && error.fatal === true;
}

function fieldNames(fields: unknown): string[] {
  if (!Array.isArray(fields)) return [];

  return fields.map((field: unknown, index: number) =>
    typeof field === 'object' && field !== null && 'name' in field && typeof field.name === 'string'
      ? field.name
      : `column_${index + 1}`
  );
}

export function createMySQLClientFactory(options: MySQLClientOptions = {}) {
  return (name: string, policy: ConnectionPolicy): MySQLClient => new MySQLClient(name, policy, options);
}
