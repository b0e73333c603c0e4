/**
 * Connection Manager
 *
 * Owns one pooled client per configured connection name and applies the
 * safety gate of each execution mode before a statement reaches the driver.
 */

import {
  ConnectionFailureError,
  DangerousOperationError,
  QueryCancelledError,
  ReadOnlyViolationError,
  SensitiveAccessError,
  UnknownConnectionError,
  describeError,
} from './errors.js';
import { Logger, logger as defaultLogger } from './logger.js';
import { QueryClassifier } from './validators/query-classifier.js';
import type {
  ConnectionPolicy,
  ConnectionRegistry,
  ConnectionSummary,
  DatabaseClient,
  DatabaseClientFactory,
  ExecuteOptions,
  QueryResult,
  QueryType,
  UnsafeResult,
  WriteResult,
} from './types.js';

export const UNSAFE_WARNING =
  'UNSAFE EXECUTION: This query bypassed safety checks. Ensure you understand the implications.';

export interface ResolvedConnection {
  client: DatabaseClient;
  policy: ConnectionPolicy;
}

export interface ConnectionManagerOptions {
  logger?: Logger;
}

export class ConnectionManager {
  private readonly clients = new Map<string, DatabaseClient>();
  private readonly pending = new Map<string, Promise<DatabaseClient>>();
  private readonly logger: Logger;

  constructor(
    private readonly registry: ConnectionRegistry,
    private readonly createClient: DatabaseClientFactory,
    options: ConnectionManagerOptions = {}
  ) {
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Returns a live client for `name`. A cached client is reused when its
   * probe succeeds; otherwise it is replaced, with at most one open sequence
   * in flight per name.
   */
  async getConnection(name: string): Promise<ResolvedConnection> {
    const policy = this.registry.get(name);
    if (!policy) {
      throw new UnknownConnectionError(name);
    }

    const existing = this.clients.get(name);
    if (existing && (await this.isAlive(name, existing))) {
      return { client: existing, policy };
    }

    return { client: await this.reconnect(name, policy, existing), policy };
  }

  listConnections(): ConnectionSummary[] {
    return Array.from(this.registry, ([name, policy]) => ({
      name,
      read_only: policy.readOnly,
    }));
  }

  /**
   * Runs a row-returning statement, capped at the connection's max_rows.
   */
  async executeQuery(name: string, sql: string, options: ExecuteOptions = {}): Promise<QueryResult> {
    const { client, policy } = await this.getConnection(name);

    if (policy.readOnly && !QueryClassifier.isReadOnlyType(QueryClassifier.detectType(sql))) {
      throw this.blocked(name, sql, new ReadOnlyViolationError(readOnlyMessage(name, 'write')));
    }

    if (!policy.readOnly && QueryClassifier.isDangerousText(sql)) {
      throw this.blocked(
        name,
        sql,
        new DangerousOperationError(
          'dangerous operations (DROP, ALTER, TRUNCATE, CREATE, GRANT, REVOKE) are not allowed'
        )
      );
    }

    if (QueryClassifier.isSensitiveText(sql)) {
      throw this.blocked(name, sql, new SensitiveAccessError());
    }

    return this.runQuery(name, client, policy, sql, options);
  }

  /**
   * Runs an INSERT/UPDATE/DELETE style statement. When `allowedTypes` is
   * non-empty the statement must be one of them.
   */
  async executeWrite(
    name: string,
    sql: string,
    allowedTypes: QueryType[] = [],
    options: ExecuteOptions = {}
  ): Promise<WriteResult> {
    const { client, policy } = await this.getConnection(name);

    if (allowedTypes.length > 0) {
      QueryClassifier.validateType(sql, ...allowedTypes);
    }

    if (policy.readOnly) {
      throw this.blocked(name, sql, new ReadOnlyViolationError(readOnlyMessage(name, 'write')));
    }

    if (QueryClassifier.isDangerousType(QueryClassifier.detectType(sql))) {
      throw this.blocked(
        name,
        sql,
        new DangerousOperationError(
          'dangerous operations (DROP, TRUNCATE, CREATE, GRANT, REVOKE) are not allowed. Use mysql_execute_unsafe if you need to bypass this check'
        )
      );
    }

    if (QueryClassifier.isSensitiveText(sql)) {
      throw this.blocked(name, sql, new SensitiveAccessError());
    }

    return this.runWrite(name, client, sql, options);
  }

  /**
   * Runs an ALTER statement. Phrases such as DROP DATABASE stay blocked even
   * behind a leading ALTER.
   */
  async executeAlter(name: string, sql: string, options: ExecuteOptions = {}): Promise<WriteResult> {
    const { client, policy } = await this.getConnection(name);

    QueryClassifier.validateType(sql, 'ALTER');

    if (policy.readOnly) {
      throw this.blocked(name, sql, new ReadOnlyViolationError(readOnlyMessage(name, 'ALTER')));
    }

    const phrase = QueryClassifier.findAlterBlockedPhrase(sql);
    if (phrase) {
      throw this.blocked(
        name,
        sql,
        new DangerousOperationError(
          `operation '${phrase}' is not allowed even with mysql_alter. Use mysql_execute_unsafe if absolutely necessary`
        )
      );
    }

    if (QueryClassifier.isSensitiveText(sql)) {
      throw this.blocked(name, sql, new SensitiveAccessError());
    }

    const { rowsAffected } = await this.runWrite(name, client, sql, options);
    return { rowsAffected };
  }

  /**
   * Runs any statement the connection's read-only flag permits. The
   * dangerous and sensitive checks only feed `skippedCheck`.
   */
  async executeUnsafe(name: string, sql: string, options: ExecuteOptions = {}): Promise<UnsafeResult> {
    const { client, policy } = await this.getConnection(name);
    const queryType = QueryClassifier.detectType(sql);
    const readOnlyType = QueryClassifier.isReadOnlyType(queryType);

    if (policy.readOnly && !readOnlyType) {
      throw this.blocked(
        name,
        sql,
        new ReadOnlyViolationError(`${readOnlyMessage(name, 'write')} (even with unsafe mode)`)
      );
    }

    const skippedChecks: string[] = [];
    if (QueryClassifier.isDangerousText(sql)) {
      skippedChecks.push('dangerous query blocking');
    }
    if (QueryClassifier.isSensitiveText(sql)) {
      skippedChecks.push('sensitive query blocking');
    }
    const skippedCheck = skippedChecks.length > 0 ? skippedChecks.join(', ') : 'none';

    this.logger.warn('Unsafe execution', { connection: name, queryType, skippedCheck });

    if (readOnlyType) {
      const queryResult = await this.runQuery(name, client, policy, sql, options);
      return { warning: UNSAFE_WARNING, skippedCheck, queryResult };
    }

    const writeResult = await this.runWrite(name, client, sql, options);
    return { warning: UNSAFE_WARNING, skippedCheck, writeResult };
  }

  /**
   * Closes every pooled client and empties the pool.
   */
  async close(): Promise<void> {
    const open = Array.from(this.clients);
    this.clients.clear();

    await Promise.all(open.map(([name, client]) => this.closeClient(name, client)));
    this.logger.info('Closed all connections', { count: open.length });
  }

  private async runQuery(
    name: string,
    client: DatabaseClient,
    policy: ConnectionPolicy,
    sql: string,
    options: ExecuteOptions
  ): Promise<QueryResult> {
    throwIfCancelled(options.signal);
    this.logger.debug('Executing query', { connection: name, maxRows: policy.maxRows });
    return client.query(sql, { maxRows: policy.maxRows, signal: options.signal });
  }

  private async runWrite(
    name: string,
    client: DatabaseClient,
    sql: string,
    options: ExecuteOptions
  ): Promise<WriteResult> {
    throwIfCancelled(options.signal);
    this.logger.debug('Executing statement', { connection: name });

    const { affectedRows, insertId } = await client.execute(sql, { signal: options.signal });
    return insertId === undefined
      ? { rowsAffected: affectedRows }
      : { rowsAffected: affectedRows, lastInsertId: insertId };
  }

  private reconnect(
    name: string,
    policy: ConnectionPolicy,
    stale: DatabaseClient | undefined
  ): Promise<DatabaseClient> {
    const inFlight = this.pending.get(name);
    if (inFlight) {
      return inFlight;
    }

    const attempt = this.establish(name, policy, stale).finally(() => {
      this.pending.delete(name);
    });
    this.pending.set(name, attempt);
    return attempt;
  }

  private async establish(
    name: string,
    policy: ConnectionPolicy,
    stale: DatabaseClient | undefined
  ): Promise<DatabaseClient> {
    // Another caller may have repaired the entry since `stale` was read
    const current = this.clients.get(name);
    if (current && current !== stale && (await this.isAlive(name, current))) {
      return current;
    }

    const dead = this.clients.get(name);
    if (dead) {
      this.clients.delete(name);
      this.logger.warn('Replacing dead connection', { connection: name });
      await this.closeClient(name, dead);
    }

    const client = this.createClient(name, policy);
    try {
      await client.connect();
    } catch (error) {
      await this.closeClient(name, client);
      throw new ConnectionFailureError(name, error);
    }

    this.clients.set(name, client);
    this.logger.info('Connection established', {
      connection: name,
      host: policy.host,
      port: policy.port,
      database: policy.database,
      readOnly: policy.readOnly,
    });
    return client;
  }

  private async isAlive(name: string, client: DatabaseClient): Promise<boolean> {
    try {
      await client.ping();
      return true;
    } catch (error) {
      this.logger.debug('Liveness probe failed', { connection: name, error: describeError(error) });
      return false;
    }
  }

  private async closeClient(name: string, client: DatabaseClient): Promise<void> {
    try {
      await client.disconnect();
    } catch (error) {
      this.logger.warn('Failed to close connection', { connection: name, error: describeError(error) });
    }
  }

  private blocked<E extends Error>(name: string, sql: string, error: E): E {
    this.logger.warn('Statement blocked', {
      connection: name,
      queryType: QueryClassifier.detectType(sql),
      reason: error.message,
    });
    return error;
  }
}

function readOnlyMessage(name: string, operation: 'write' | 'ALTER'): string {
  return `connection '${name}' is read-only, ${operation} operations are not allowed`;
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new QueryCancelledError();
  }
}
