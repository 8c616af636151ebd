/**
 * Database connection pool and query executor.
 *
 * Every candidate statement runs on its own pooled client inside a
 * READ ONLY transaction with a per-statement timeout. The client is
 * released unconditionally, and an aborted request cancels its backend.
 */

import { Pool, type PoolClient } from 'pg';

import type { ExecutionOutcome } from '../../shared/types';
import { QUERY_TIMEOUT_MS } from '../../shared/constants';
import type { DatabaseConfig } from '../lib/config';
import { errorMessage } from '../lib/errors';

// ---------------------------------------------------------------------------
// Pool initialisation
// ---------------------------------------------------------------------------

export function createPool(config: DatabaseConfig): Pool {
  const pool = new Pool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    max: config.poolMax,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  });
  // An idle client losing its connection must not crash the process.
  pool.on('error', (error) => {
    console.error('[DB] Idle client error:', error.message);
  });
  return pool;
}

// ---------------------------------------------------------------------------
// Query execution
// ---------------------------------------------------------------------------

export interface ExecuteOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface QueryExecutor {
  execute(sql: string, options?: ExecuteOptions): Promise<ExecutionOutcome>;
}

function failure(message: string): ExecutionOutcome {
  return { ok: false, kind: 'ExecutionFailure', message };
}

export class PgQueryExecutor implements QueryExecutor {
  constructor(
    private readonly pool: Pool,
    private readonly defaultTimeoutMs: number = QUERY_TIMEOUT_MS,
  ) {}

  /**
   * Run a validated statement. Driver errors are returned as
   * `ExecutionFailure`, never thrown, and never retried.
   */
  async execute(sql: string, options: ExecuteOptions = {}): Promise<ExecutionOutcome> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const { signal } = options;
    if (signal?.aborted) {
      return failure('Query cancelled before execution');
    }

    const start = Date.now();
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      return this.fail(sql, error);
    }

    let backendPid: number | null = null;
    const cancel = () => {
      if (backendPid === null) return;
      const pid = backendPid;
      this.pool.query('SELECT pg_cancel_backend($1)', [pid]).catch((error: unknown) => {
        console.error(`[QUERY] Failed to cancel backend ${pid}:`, errorMessage(error));
      });
    };
    signal?.addEventListener('abort', cancel, { once: true });

    try {
      await client.query('BEGIN READ ONLY');
      await client.query('SELECT set_config($1, $2, true)', ['statement_timeout', `${Number(timeoutMs)}ms`]);
      const pidResult = await client.query<{ pid: number }>('SELECT pg_backend_pid() AS pid');
      backendPid = pidResult.rows[0]?.pid ?? null;
      if (signal?.aborted) {
        throw new Error('Query cancelled');
      }

      const result = await client.query<Record<string, unknown>>(sql);
      await client.query('COMMIT');

      return {
        ok: true,
        rows: result.rows,
        rowCount: result.rowCount ?? result.rows.length,
        elapsedMillis: Date.now() - start,
      };
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        console.error('[QUERY] ROLLBACK failed:', errorMessage(rollbackError));
      });
      return this.fail(sql, error);
    } finally {
      signal?.removeEventListener('abort', cancel);
      client.release();
    }
  }

  private fail(sql: string, error: unknown): ExecutionOutcome {
    const message = errorMessage(error);
    console.error(`[QUERY] Execution failed: ${message}\n  SQL: ${sql}`);
    return failure(message);
  }
}

// ---------------------------------------------------------------------------
// Health check
// ---------------------------------------------------------------------------

/**
 * Lightweight connectivity check for readiness probes.
 */
export async function healthCheck(pool: Pool): Promise<boolean> {
  try {
    await pool.query('SELECT 1');
    return true;
  } catch {
    return false;
  }
}
