/**
 * Base Database Client Abstract Class
 * Row collection, row capping and value normalization shared by all clients
 */

import { ExecutionFailureError, ResultDecodeError } from '../errors.js';
import type {
  ColumnValue,
  ConnectionPolicy,
  DatabaseClient,
  ExecResult,
  ExecuteOptions,
  JsonValue,
  QueryOptions,
  QueryResult,
  ResultRow,
  RowHandlers,
} from '../types.js';

export abstract class BaseDatabaseClient implements DatabaseClient {
  protected readonly policy: ConnectionPolicy;
  protected connected: boolean = false;

  constructor(
    protected readonly name: string,
    policy: ConnectionPolicy
  ) {
    this.policy = policy;
  }

  abstract connect(): Promise<void>;
  abstract disconnect(): Promise<void>;
  abstract ping(): Promise<void>;
  abstract execute(sql: string, options?: ExecuteOptions): Promise<ExecResult>;

  /**
   * Streams a result set into `handlers`. Resolves at the end of the result
   * set, or as soon as `onRow` returns false, in which case no further rows
   * may be read.
   */
  protected abstract streamRows(sql: string, handlers: RowHandlers, signal?: AbortSignal): Promise<void>;

  isConnected(): boolean {
    return this.connected;
  }

  /**
   * Runs a row-returning statement. Streaming stops once `maxRows` rows have
   * been collected, whether or not more remain.
   */
  async query(sql: string, options: QueryOptions = {}): Promise<QueryResult> {
    this.ensureConnected();

    const maxRows = this.normalizeMaxRows(options.maxRows ?? this.policy.maxRows);
    let columns: string[] = [];
    const rows: ResultRow[] = [];
    let decodeError: ResultDecodeError | undefined;

    await this.streamRows(
      sql,
      {
        onFields: names => {
          columns = names;
        },
        onRow: values => {
          if (decodeError || rows.length >= maxRows) return false;
          try {
            rows.push(decodeRow(columns, values));
          } catch (error) {
            decodeError =
              error instanceof ResultDecodeError ? error : new ResultDecodeError(String(error));
            return false;
          }
          return rows.length < maxRows;
        },
      },
      options.signal
    );

    if (decodeError) {
      throw decodeError;
    }

    return { columns, rows, count: rows.length };
  }

  /**
   * Validates max rows and applies default
   */
  protected normalizeMaxRows(maxRows?: number): number {
    const defaultMaxRows = 1000;

    if (!maxRows) return defaultMaxRows;
    if (maxRows < 0 || !Number.isFinite(maxRows)) return defaultMaxRows;

    return Math.floor(maxRows);
  }

  /**
   * Validates query timeout and applies default
   */
  protected normalizeTimeout(timeout?: number): number {
    const defaultTimeout = 30000; // 30 seconds
    const maxTimeout = 300000; // 5 minutes

    if (!timeout) return defaultTimeout;
    if (timeout < 0) return defaultTimeout;
    if (timeout > maxTimeout) return maxTimeout;

    return timeout;
  }

  /**
   * Ensures connection is established before operation
   */
  protected ensureConnected(): void {
    if (!this.connected) {
      throw new ExecutionFailureError(
        `connection '${this.name}' is not open. Call connect() first.`
      );
    }
  }
}

/**
 * Builds a row keyed by column name. Later duplicates of a column name
 * overwrite earlier ones.
 */
export function decodeRow(columns: readonly string[], values: readonly unknown[]): ResultRow {
  if (values.length !== columns.length) {
    throw new ResultDecodeError(`row has ${values.length} values for ${columns.length} columns`);
  }

  // fromEntries defines own properties, so a column named __proto__ stays data
  return Object.fromEntries(
    columns.map((column, index): [string, ColumnValue] => [column, normalizeValue(values[index], column)])
  );
}

export function normalizeValue(value: unknown, column = '?'): ColumnValue {
  if (value === null || value === undefined) return null;

  if (Buffer.isBuffer(value)) return value.toString('utf8');
  if (value instanceof Uint8Array) return Buffer.from(value).toString('utf8');

  switch (typeof value) {
    case 'string':
    case 'number':
    case 'bigint':
    case 'boolean':
      return value;
    case 'object':
      if (value instanceof Date) return value;
      return toJsonValue(value, column);
    default:
      throw new ResultDecodeError(`column '${column}' has unsupported value of type ${typeof value}`);
  }
}

function toJsonValue(value: unknown, column: string): JsonValue {
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return value;
    case 'object':
      if (value === null) {
        return null;
      }
      if (Array.isArray(value)) {
        return value.map(item => toJsonValue(item, column));
      }
      if (value instanceof Date) {
        return value.toISOString();
      }
      if (Buffer.isBuffer(value)) {
        return value.toString('utf8');
      }
      return Object.fromEntries(
        Object.entries(value).map(([key, item]) => [key, toJsonValue(item, column)])
      );
    default:
      throw new ResultDecodeError(`column '${column}' has unsupported value of type ${typeof value}`);
  }
}
