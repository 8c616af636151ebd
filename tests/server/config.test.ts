import { describe, it, expect } from 'vitest';

import { DEFAULT_ACCESS_POLICY_PATH, loadServiceConfig } from '../../src/server/lib/config';
import { ConfigError } from '../../src/server/lib/errors';

describe('loadServiceConfig', () => {
  it('should fall back to defaults for an empty environment', () => {
    expect(loadServiceConfig({})).toEqual({
      database: {
        host: 'localhost',
        port: 5432,
        user: 'nl2sql_reader',
        password: '',
        database: 'northwind',
        schema: 'public',
        poolMax: 10,
      },
      queryTimeoutMs: 10_000,
      maxRows: 500,
      accessPolicyPath: DEFAULT_ACCESS_POLICY_PATH,
    });
  });

  it('should read every setting from the environment', () => {
    const config = loadServiceConfig({
      PG_HOST: 'db.internal',
      PG_PORT: '6543',
      PG_USER: 'reader',
      PG_PASSWORD: 'test-password',
      PG_DATABASE: 'shop',
      PG_SCHEMA: 'sales',
      PG_POOL_MAX: '3',
      QUERY_TIMEOUT_MS: '2500',
      MAX_ROWS: '50',
      ACCESS_POLICY_PATH: '/etc/nl2sql/policy.yaml',
    });

    expect(config).toEqual({
      database: {
        host: 'db.internal',
        port: 6543,
        user: 'reader',
        password: 'test-password',
        database: 'shop',
        schema: 'sales',
        poolMax: 3,
      },
      queryTimeoutMs: 2500,
      maxRows: 50,
      accessPolicyPath: '/etc/nl2sql/policy.yaml',
    });
  });

  it('should treat blank integers as unset', () => {
    expect(loadServiceConfig({ MAX_ROWS: '  ' }).maxRows).toBe(500);
  });

  it.each(['abc', '0', '-5', '1.5'])('should reject MAX_ROWS=%s', (raw) => {
    expect(() => loadServiceConfig({ MAX_ROWS: raw })).toThrow(
      new ConfigError(`MAX_ROWS must be a positive integer (got "${raw}")`),
    );
  });

  it('should return a frozen object', () => {
    const config = loadServiceConfig({});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.database)).toBe(true);
  });

  it('should point the default policy at the bundled file', () => {
    expect(DEFAULT_ACCESS_POLICY_PATH.endsWith('config/access-policy.yaml')).toBe(true);
  });
});
