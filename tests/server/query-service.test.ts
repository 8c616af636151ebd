import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const { mockClient, mockPool } = vi.hoisted(() => {
  const mockClient = {
    query: vi.fn(),
    release: vi.fn(),
  };
  const mockPool = {
    connect: vi.fn(),
    query: vi.fn(),
    on: vi.fn(),
    end: vi.fn(),
  };
  return { mockClient, mockPool };
});

vi.mock('pg', () => ({
  Pool: function () { return mockPool; },
}));

import { createQueryService } from '../../src/index';
import { DEFAULT_ACCESS_POLICY_PATH, type ServiceConfig } from '../../src/server/lib/config';
import { SchemaUnavailableError } from '../../src/server/lib/errors';
import type { LLMProvider } from '../../src/server/llm';
import type { AuditSink } from '../../src/server/middleware/audit';
import type { AuditRecord } from '../../src/shared/types';

const config: ServiceConfig = {
  database: {
    host: 'localhost',
    port: 5432,
    user: 'reader',
    password: 'test-password',
    database: 'northwind',
    schema: 'public',
    poolMax: 2,
  },
  queryTimeoutMs: 5000,
  maxRows: 100,
  accessPolicyPath: DEFAULT_ACCESS_POLICY_PATH,
};

const ORDER_ROWS = [{ order_id: 10643, freight: 29.46 }];

function answerIntrospection() {
  mockPool.query.mockImplementation(async (text: string) => {
    if (text.includes('FOREIGN KEY')) {
      return {
        rows: [
          { table_name: 'orders', column_name: 'customer_id', foreign_table_name: 'customers', foreign_column_name: 'customer_id' },
        ],
      };
    }
    if (text.includes('information_schema.columns')) {
      return {
        rows: [
          { table_name: 'customers', column_name: 'customer_id' },
          { table_name: 'customers', column_name: 'company_name' },
          { table_name: 'orders', column_name: 'order_id' },
          { table_name: 'orders', column_name: 'customer_id' },
          { table_name: 'orders', column_name: 'freight' },
        ],
      };
    }
    if (text.includes('information_schema.tables')) {
      return { rows: [{ table_name: 'customers' }, { table_name: 'orders' }] };
    }
    return { rows: [], rowCount: 0 };
  });
}

function fakeProvider(reply: Record<string, unknown>) {
  const complete = vi.fn<LLMProvider['complete']>().mockResolvedValue({
    text: JSON.stringify(reply),
    model: 'test-model',
  });
  const provider: LLMProvider = { name: 'anthropic', complete };
  return provider;
}

function fakeAudit() {
  const write = vi.fn<(record: AuditRecord) => Promise<void>>().mockResolvedValue(undefined);
  const audit: AuditSink = { write };
  return { audit, write };
}

beforeEach(() => {
  mockPool.query.mockReset();
  mockPool.connect.mockReset();
  mockPool.end.mockReset();
  mockClient.query.mockReset();
  mockClient.release.mockReset();
  mockPool.connect.mockResolvedValue(mockClient);
  mockPool.end.mockResolvedValue(undefined);
  vi.spyOn(console, 'info').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createQueryService', () => {
  it('should load the policy and catalogue at startup', async () => {
    answerIntrospection();

    const service = await createQueryService({ config, provider: fakeProvider({}) });

    expect(service.catalog.tableNames()).toEqual(['customers', 'orders']);
    expect([...service.policy.rbac.keys()]).toEqual(['admin', 'employee', 'customer']);
    expect(console.info).toHaveBeenCalledWith('[STARTUP] Schema "public" loaded: 2 tables, 3 roles');
  });

  it('should refuse to start when the schema cannot be loaded', async () => {
    mockPool.query.mockRejectedValue(new Error('ECONNREFUSED'));

    await expect(createQueryService({ config, provider: fakeProvider({}) })).rejects.toThrow(
      SchemaUnavailableError,
    );
    expect(mockPool.end).toHaveBeenCalledOnce();
  });

  it('should answer a question end-to-end for a filtered role', async () => {
    answerIntrospection();
    mockClient.query.mockImplementation(async (text: string) =>
      text.startsWith('SELECT * FROM (') ? { rows: ORDER_ROWS, rowCount: 1 } : { rows: [], rowCount: 0 },
    );
    const { audit, write } = fakeAudit();
    const provider = fakeProvider({ sql: 'SELECT order_id, freight FROM orders', explanation: 'Freight per order.' });

    const service = await createQueryService({ config, provider, audit });
    const result = await service.agent.processQuestion(
      { question: 'What did I pay for shipping?' },
      { role: 'customer', subjectId: 'ALFKI', displayName: 'Maria' },
    );

    const expectedSql =
      "SELECT * FROM (SELECT order_id, freight FROM orders WHERE orders.customer_id = 'ALFKI') AS _inner LIMIT 100";
    expect(result).toEqual({
      status: 'ok',
      sql: expectedSql,
      rows: ORDER_ROWS,
      rowCount: 1,
      elapsedMillis: expect.any(Number),
      explanation: 'Freight per order.',
    });
    expect(mockClient.query).toHaveBeenCalledWith('SELECT set_config($1, $2, true)', [
      'statement_timeout',
      '5000ms',
    ]);
    expect(write).toHaveBeenCalledWith(expect.objectContaining({ verdict: 'executed', statement: expectedSql }));
  });

  it('should deny tables outside the role grant', async () => {
    answerIntrospection();
    const provider = fakeProvider({ sql: 'SELECT company_name FROM customers' });

    const service = await createQueryService({ config, provider, audit: fakeAudit().audit });
    const result = await service.agent.processQuestion(
      { question: 'Which companies are there?' },
      { role: 'customer', subjectId: 'ALFKI', displayName: 'Maria' },
    );

    expect(result).toEqual({
      status: 'denied',
      reason: 'UnauthorizedTable',
      message: 'Unauthorized access to table: customers',
    });
    expect(mockPool.connect).not.toHaveBeenCalled();
  });

  it('should expose a health check and close the pool', async () => {
    answerIntrospection();

    const service = await createQueryService({ config, provider: fakeProvider({}) });

    expect(await service.healthCheck()).toBe(true);
    await service.close();
    expect(mockPool.end).toHaveBeenCalledOnce();
  });
});
