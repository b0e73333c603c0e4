import { EventEmitter } from 'node:events';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { MySQLClient, createMySQLClientFactory } from '../../src/clients/mysql-client.js';
import { ExecutionFailureError, QueryCancelledError } from '../../src/errors.js';
import { makePolicy } from '../helpers/fake-client.js';

const { createPool } = vi.hoisted(() => ({ createPool: vi.fn() }));

vi.mock('mysql2', () => ({ default: { createPool } }));

interface ScriptedResultSet {
  fields?: unknown[];
  rows?: unknown[];
  /** Emitted after the rows instead of `end` */
  error?: Error;
  errorDelayMs?: number;
  /** Never emit `end` after the rows */
  hang?: boolean;
}

function fakePool(resultSet: ScriptedResultSet = {}) {
  const connection = { ping: vi.fn(async () => undefined), release: vi.fn() };
  const promisePool = {
    getConnection: vi.fn(async () => connection),
    query: vi.fn(async (): Promise<unknown[]> => [{ affectedRows: 1, insertId: 0 }]),
    end: vi.fn(async () => undefined),
  };
  const streamConnection = {
    query: vi.fn(() => {
      const query = new EventEmitter();
      setImmediate(() => {
        query.emit('fields', resultSet.fields ?? []);
        for (const row of resultSet.rows ?? []) {
          query.emit('result', row);
        }
        const { error } = resultSet;
        if (error) {
          setTimeout(() => query.emit('error', error), resultSet.errorDelayMs ?? 0);
        } else if (!resultSet.hang) {
          query.emit('end');
        }
      });
      return query;
    }),
    release: vi.fn(),
    destroy: vi.fn(),
  };
  const pool = {
    promise: () => promisePool,
    getConnection: vi.fn((callback: (error: Error | null, conn: typeof streamConnection) => void) => {
      setImmediate(() => callback(null, streamConnection));
    }),
  };

  createPool.mockReturnValue(pool);
  return { pool, promisePool, connection, streamConnection };
}

describe('MySQLClient', () => {
  beforeEach(() => {
    createPool.mockReset();
  });

  describe('connect', () => {
    it('creates a bounded pool and probes it once', async () => {
      const { connection } = fakePool();
      const client = new MySQLClient('main', makePolicy());

      await client.connect();

      expect(createPool).toHaveBeenCalledWith(
        expect.objectContaining({
          host: 'localhost',
          port: 3306,
          user: 'tester',
          password: 'test-secret',
          database: 'app',
          connectionLimit: 5,
          maxIdle: 2,
          connectTimeout: 30000,
        })
      );
      expect(connection.ping).toHaveBeenCalledTimes(1);
      expect(connection.release).toHaveBeenCalledTimes(1);
      expect(client.isConnected()).toBe(true);
    });

    it('closes the pool when the probe fails', async () => {
      const { connection, promisePool } = fakePool();
      connection.ping.mockRejectedValueOnce(new Error('ECONNREFUSED'));
      const client = new MySQLClient('main', makePolicy());

      await expect(client.connect()).rejects.toThrow('ECONNREFUSED');

      expect(promisePool.end).toHaveBeenCalledTimes(1);
      expect(connection.release).toHaveBeenCalledTimes(1);
      expect(client.isConnected()).toBe(false);
    });

    it('honours pool and timeout options, clamping the timeout', async () => {
      fakePool();
      const client = createMySQLClientFactory({ connectionLimit: 10, maxIdle: 4, timeoutMs: 900000 })(
        'main',
        makePolicy()
      );

      await client.connect();

      expect(createPool).toHaveBeenCalledWith(
        expect.objectContaining({ connectionLimit: 10, maxIdle: 4, connectTimeout: 300000 })
      );
    });
  });

  describe('query', () => {
    it('streams rows into records and stops at the cap', async () => {
      const { streamConnection } = fakePool({
        fields: [{ name: 'id' }, { name: 'name' }],
        rows: [
          [1, 'a'],
          [2, Buffer.from('b')],
          [3, 'c'],
        ],
      });
      const client = new MySQLClient('main', makePolicy({ maxRows: 2 }));
      await client.connect();

      const result = await client.query('SELECT id, name FROM t');

      expect(result).toEqual({
        columns: ['id', 'name'],
        rows: [
          { id: 1, name: 'a' },
          { id: 2, name: 'b' },
        ],
        count: 2,
      });
      expect(streamConnection.query).toHaveBeenCalledWith({
        sql: 'SELECT id, name FROM t',
        rowsAsArray: true,
        timeout: 30000,
      });
      expect(streamConnection.destroy).toHaveBeenCalledTimes(1);
      expect(streamConnection.release).not.toHaveBeenCalled();
    });

    it('returns the capped rows even when the rest of the stream never finishes', async () => {
      fakePool({ fields: [{ name: 'id' }], rows: [[1], [2], [3]], hang: true });
      const client = new MySQLClient('main', makePolicy({ maxRows: 2 }));
      await client.connect();

      await expect(client.query('SELECT id FROM big')).resolves.toEqual({
        columns: ['id'],
        rows: [{ id: 1 }, { id: 2 }],
        count: 2,
      });
    });

    it('ignores a driver error that arrives after the cap was reached', async () => {
      const { streamConnection } = fakePool({
        fields: [{ name: 'id' }],
        rows: [[1], [2], [3], [4], [5]],
        error: new Error('Query inactivity timeout'),
        errorDelayMs: 20,
      });
      const client = new MySQLClient('main', makePolicy({ maxRows: 2 }));
      await client.connect();

      const result = await client.query('SELECT id FROM big');
      await new Promise(resolve => setTimeout(resolve, 40));

      expect(result).toEqual({ columns: ['id'], rows: [{ id: 1 }, { id: 2 }], count: 2 });
      expect(streamConnection.destroy).toHaveBeenCalledTimes(1);
    });

    it('returns the connection to the pool after a complete result set', async () => {
      const { streamConnection } = fakePool({ fields: [{ name: 'id' }], rows: [[1]] });
      const client = new MySQLClient('main', makePolicy({ maxRows: 5 }));
      await client.connect();

      await client.query('SELECT id FROM t');

      expect(streamConnection.release).toHaveBeenCalledTimes(1);
      expect(streamConnection.destroy).not.toHaveBeenCalled();
    });

    it('names columns the driver left unnamed', async () => {
      fakePool({ fields: [{}], rows: [[7]] });
      const client = new MySQLClient('main', makePolicy());
      await client.connect();

      await expect(client.query('SELECT 7')).resolves.toEqual({
        columns: ['column_1'],
        rows: [{ column_1: 7 }],
        count: 1,
      });
    });

    it('ignores OK packets from statements without a result set', async () => {
      fakePool({ rows: [{ affectedRows: 0 }] });
      const client = new MySQLClient('main', makePolicy());
      await client.connect();

      await expect(client.query('DO 1')).resolves.toEqual({ columns: [], rows: [], count: 0 });
    });

    it('wraps driver errors and releases the connection', async () => {
      const { streamConnection } = fakePool({ error: new Error("Table 'app.t' doesn't exist") });
      const client = new MySQLClient('main', makePolicy());
      await client.connect();

      await expect(client.query('SELECT * FROM t')).rejects.toThrow(
        "query execution failed: Table 'app.t' doesn't exist"
      );
      expect(streamConnection.release).toHaveBeenCalledTimes(1);
    });

    it('destroys the connection on a fatal driver error', async () => {
      const { streamConnection } = fakePool({
        error: Object.assign(new Error('Connection lost'), { fatal: true }),
      });
      const client = new MySQLClient('main', makePolicy());
      await client.connect();

      await expect(client.query('SELECT * FROM t')).rejects.toThrow('query execution failed: Connection lost');
      expect(streamConnection.destroy).toHaveBeenCalledTimes(1);
      expect(streamConnection.release).not.toHaveBeenCalled();
    });

    it('refuses to run before connect', async () => {
      const client = new MySQLClient('main', makePolicy());

      await expect(client.query('SELECT 1')).rejects.toThrow("connection 'main' is not open. Call connect() first.");
    });

    it('does not take a connection when the signal already aborted', async () => {
      const { pool } = fakePool();
      const client = new MySQLClient('main', makePolicy());
      await client.connect();
      const controller = new AbortController();
      controller.abort();

      await expect(client.query('SELECT 1', { signal: controller.signal })).rejects.toThrow(QueryCancelledError);
      expect(pool.getConnection).not.toHaveBeenCalled();
    });

    it('gives the connection back when cancelled while waiting for it', async () => {
      const { streamConnection } = fakePool();
      const client = new MySQLClient('main', makePolicy());
      await client.connect();
      const controller = new AbortController();

      const pending = client.query('SELECT 1', { signal: controller.signal });
      controller.abort();

      await expect(pending).rejects.toThrow(QueryCancelledError);
      expect(streamConnection.release).toHaveBeenCalledTimes(1);
      expect(streamConnection.query).not.toHaveBeenCalled();
    });

    it('drops the connection when cancelled mid-stream', async () => {
      const { streamConnection } = fakePool({ fields: [{ name: 'id' }], rows: [[1]], hang: true });
      const client = new MySQLClient('main', makePolicy());
      await client.connect();
      const controller = new AbortController();
      setTimeout(() => controller.abort(), 10);

      await expect(client.query('SELECT SLEEP(10)', { signal: controller.signal })).rejects.toThrow(
        QueryCancelledError
      );
      expect(streamConnection.destroy).toHaveBeenCalledTimes(1);
    });
  });

  describe('execute', () => {
    it('reports affected rows without a zero insert id', async () => {
      const { promisePool } = fakePool();
      promisePool.query.mockResolvedValueOnce([{ affectedRows: 3, insertId: 0 }]);
      const client = new MySQLClient('main', makePolicy());
      await client.connect();

      await expect(client.execute('UPDATE t SET x = 1')).resolves.toEqual({ affectedRows: 3 });
      expect(promisePool.query).toHaveBeenCalledWith({ sql: 'UPDATE t SET x = 1', timeout: 30000 });
    });

    it('reports the insert id when there is one', async () => {
      const { promisePool } = fakePool();
      promisePool.query.mockResolvedValueOnce([{ affectedRows: 1, insertId: 9 }]);
      const client = new MySQLClient('main', makePolicy());
      await client.connect();

      await expect(client.execute('INSERT INTO t VALUES (1)')).resolves.toEqual({ affectedRows: 1, insertId: 9 });
    });

    it('reports no change for a row-returning statement', async () => {
      const { promisePool } = fakePool();
      promisePool.query.mockResolvedValueOnce([[{ id: 1 }]]);
      const client = new MySQLClient('main', makePolicy());
      await client.connect();

      await expect(client.execute('SELECT 1')).resolves.toEqual({ affectedRows: 0 });
    });

    it('reports the real result of a write cancelled after dispatch', async () => {
      const { promisePool } = fakePool();
      const controller = new AbortController();
      promisePool.query.mockImplementationOnce(async () => {
        controller.abort();
        return [{ affectedRows: 1, insertId: 0 }];
      });
      const client = new MySQLClient('main', makePolicy());
      await client.connect();

      await expect(
        client.execute('UPDATE t SET x = 1', { signal: controller.signal })
      ).resolves.toEqual({ affectedRows: 1 });
    });

    it('does not send a write whose signal already aborted', async () => {
      const { promisePool } = fakePool();
      const client = new MySQLClient('main', makePolicy());
      await client.connect();
      const controller = new AbortController();
      controller.abort();

      await expect(client.execute('UPDATE t SET x = 1', { signal: controller.signal })).rejects.toThrow(
        QueryCancelledError
      );
      expect(promisePool.query).not.toHaveBeenCalled();
    });

    it('wraps driver errors and keeps the cause', async () => {
      const { promisePool } = fakePool();
      const driverError = new Error('Duplicate entry');
      promisePool.query.mockRejectedValueOnce(driverError);
      const client = new MySQLClient('main', makePolicy());
      await client.connect();

      const error = await client.execute('INSERT INTO t VALUES (1)').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ExecutionFailureError);
      expect(error instanceof Error && error.message).toBe('query execution failed: Duplicate entry');
      expect(error instanceof Error && error.cause).toBe(driverError);
    });
  });

  describe('ping and disconnect', () => {
    it('probes a fresh connection from the pool', async () => {
      const { connection } = fakePool();
      const client = new MySQLClient('main', makePolicy());
      await client.connect();

      await client.ping();

      expect(connection.ping).toHaveBeenCalledTimes(2);
    });

    it('ends the pool', async () => {
      const { promisePool } = fakePool();
      const client = new MySQLClient('main', makePolicy());
      await client.connect();

      await client.disconnect();

      expect(promisePool.end).toHaveBeenCalledTimes(1);
      expect(client.isConnected()).toBe(false);
      await expect(client.ping()).rejects.toThrow(ExecutionFailureError);
    });
  });
});
