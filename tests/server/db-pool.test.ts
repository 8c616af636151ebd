import { describe, it, expect, vi, beforeEach } from 'vitest';

const { mockClient, mockPool, MockPool } = vi.hoisted(() => {
  const mockClient = {
    query: vi.fn(),
    release: vi.fn(),
  };
  const mockPool = {
    connect: vi.fn().mockResolvedValue(mockClient),
    query: vi.fn(),
    on: vi.fn(),
    end: vi.fn(),
  };
  const MockPool = vi.fn(function () { return mockPool; });
  return { mockClient, mockPool, MockPool };
});

vi.mock('pg', () => ({
  Pool: MockPool,
}));

import { Pool } from 'pg';
import { createPool, healthCheck, PgQueryExecutor } from '../../src/server/db/pool';

const PID_ROW = { rows: [{ pid: 4242 }], rowCount: 1 };

beforeEach(() => {
  vi.clearAllMocks();
  vi.spyOn(console, 'error').mockImplementation(() => {});
  mockClient.query.mockReset();
  mockPool.query.mockReset();
  mockPool.connect.mockReset();
  mockPool.connect.mockResolvedValue(mockClient);
  mockPool.query.mockResolvedValue({ rows: [], rowCount: 0 });
  mockClient.query.mockResolvedValue({ rows: [], rowCount: 0 });
});

describe('createPool', () => {
  const config = {
    host: 'db.internal',
    port: 6543,
    user: 'reader',
    password: 'test-password',
    database: 'shop',
    schema: 'public',
    poolMax: 4,
  };

  it('should configure the pool from the database settings', () => {
    createPool(config);

    expect(MockPool).toHaveBeenCalledWith({
      host: 'db.internal',
      port: 6543,
      user: 'reader',
      password: 'test-password',
      database: 'shop',
      max: 4,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
    });
  });

  it('should log idle client errors instead of crashing', () => {
    createPool(config);

    expect(mockPool.on).toHaveBeenCalledWith('error', expect.any(Function));
    const handler = mockPool.on.mock.calls[0][1];
    handler(new Error('connection terminated'));
    expect(console.error).toHaveBeenCalledWith('[DB] Idle client error:', 'connection terminated');
  });
});

describe('PgQueryExecutor', () => {
  it('should run the statement in a read-only transaction', async () => {
    const rows = [{ id: 1, total: 12.5 }];
    mockClient.query
      .mockResolvedValueOnce(undefined) // BEGIN READ ONLY
      .mockResolvedValueOnce(undefined) // statement_timeout
      .mockResolvedValueOnce(PID_ROW) // pg_backend_pid
      .mockResolvedValueOnce({ rows, rowCount: 1 }) // statement
      .mockResolvedValueOnce(undefined); // COMMIT

    const executor = new PgQueryExecutor(new Pool());
    const result = await executor.execute('SELECT id, total FROM orders');

    expect(result).toEqual({ ok: true, rows, rowCount: 1, elapsedMillis: expect.any(Number) });
    expect(mockClient.query.mock.calls.map((call) => call[0])).toEqual([
      'BEGIN READ ONLY',
      'SELECT set_config($1, $2, true)',
      'SELECT pg_backend_pid() AS pid',
      'SELECT id, total FROM orders',
      'COMMIT',
    ]);
    expect(mockClient.release).toHaveBeenCalledOnce();
  });

  it('should set the statement timeout from the options', async () => {
    const executor = new PgQueryExecutor(new Pool());
    await executor.execute('SELECT 1', { timeoutMs: 2500 });

    expect(mockClient.query.mock.calls[1]).toEqual([
      'SELECT set_config($1, $2, true)',
      ['statement_timeout', '2500ms'],
    ]);
  });

  it('should fall back to the default timeout', async () => {
    const executor = new PgQueryExecutor(new Pool(), 7000);
    await executor.execute('SELECT 1');

    expect(mockClient.query.mock.calls[1]).toEqual([
      'SELECT set_config($1, $2, true)',
      ['statement_timeout', '7000ms'],
    ]);
  });

  it('should ROLLBACK and return a failure on query error', async () => {
    mockClient.query
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce(PID_ROW)
      .mockRejectedValueOnce(new Error('relation "missing" does not exist'));

    const executor = new PgQueryExecutor(new Pool());
    const result = await executor.execute('SELECT * FROM missing');

    expect(result).toEqual({
      ok: false,
      kind: 'ExecutionFailure',
      message: 'relation "missing" does not exist',
    });
    expect(mockClient.query).toHaveBeenLastCalledWith('ROLLBACK');
    expect(mockClient.release).toHaveBeenCalledOnce();
    expect(console.error).toHaveBeenCalledWith(
      '[QUERY] Execution failed: relation "missing" does not exist\n  SQL: SELECT * FROM missing',
    );
  });

  it('should still release the client when ROLLBACK fails', async () => {
    mockClient.query
      .mockRejectedValueOnce(new Error('BEGIN failed'))
      .mockRejectedValueOnce(new Error('connection lost'));

    const executor = new PgQueryExecutor(new Pool());
    const result = await executor.execute('SELECT 1');

    expect(result).toEqual({ ok: false, kind: 'ExecutionFailure', message: 'BEGIN failed' });
    expect(console.error).toHaveBeenCalledWith('[QUERY] ROLLBACK failed:', 'connection lost');
    expect(mockClient.release).toHaveBeenCalledOnce();
  });

  it('should return a failure when no connection is available', async () => {
    mockPool.connect.mockRejectedValueOnce(new Error('ECONNREFUSED'));

    const executor = new PgQueryExecutor(new Pool());
    const result = await executor.execute('SELECT 1');

    expect(result).toEqual({ ok: false, kind: 'ExecutionFailure', message: 'ECONNREFUSED' });
    expect(mockClient.release).not.toHaveBeenCalled();
  });

  it('should default rowCount to the number of rows', async () => {
    mockClient.query
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce(PID_ROW)
      .mockResolvedValueOnce({ rows: [{ id: 1 }, { id: 2 }], rowCount: null });

    const executor = new PgQueryExecutor(new Pool());
    const result = await executor.execute('SELECT id FROM orders');

    expect(result.ok && result.rowCount).toBe(2);
  });

  describe('cancellation', () => {
    it('should not connect when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      const executor = new PgQueryExecutor(new Pool());
      const result = await executor.execute('SELECT 1', { signal: controller.signal });

      expect(result).toEqual({
        ok: false,
        kind: 'ExecutionFailure',
        message: 'Query cancelled before execution',
      });
      expect(mockPool.connect).not.toHaveBeenCalled();
    });

    it('should cancel the backend when the signal aborts mid-query', async () => {
      const controller = new AbortController();
      mockClient.query.mockImplementation(async (text: string) => {
        if (text === 'SELECT pg_backend_pid() AS pid') return PID_ROW;
        if (text === 'SELECT id FROM orders') {
          controller.abort();
          throw new Error('canceling statement due to user request');
        }
        return { rows: [], rowCount: 0 };
      });

      const executor = new PgQueryExecutor(new Pool());
      const result = await executor.execute('SELECT id FROM orders', { signal: controller.signal });

      expect(result).toEqual({
        ok: false,
        kind: 'ExecutionFailure',
        message: 'canceling statement due to user request',
      });
      expect(mockPool.query).toHaveBeenCalledWith('SELECT pg_cancel_backend($1)', [4242]);
      expect(mockClient.release).toHaveBeenCalledOnce();
    });
  });
});

describe('healthCheck', () => {
  it('should return true when the pool is healthy', async () => {
    mockPool.query.mockResolvedValueOnce({ rows: [{ '?column?': 1 }] });

    expect(await healthCheck(new Pool())).toBe(true);
    expect(mockPool.query).toHaveBeenCalledWith('SELECT 1');
  });

  it('should return false when the pool is unreachable', async () => {
    mockPool.query.mockRejectedValueOnce(new Error('ECONNREFUSED'));

    expect(await healthCheck(new Pool())).toBe(false);
  });
});
