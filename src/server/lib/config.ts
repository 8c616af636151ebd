/**
 * Service configuration, read once from the environment.
 */

import { fileURLToPath } from 'node:url';

import { MAX_ROWS, QUERY_TIMEOUT_MS } from '../../shared/constants';
import { ConfigError } from './errors';

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  /** Schema the catalogue is introspected from. */
  schema: string;
  poolMax: number;
}

export interface ServiceConfig {
  database: DatabaseConfig;
  queryTimeoutMs: number;
  maxRows: number;
  accessPolicyPath: string;
}

/** Policy shipped with the repository, used when ACCESS_POLICY_PATH is unset. */
export const DEFAULT_ACCESS_POLICY_PATH = fileURLToPath(
  new URL('../../../config/access-policy.yaml', import.meta.url),
);

type Env = Record<string, string | undefined>;

function readInteger(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer (got "${raw}")`);
  }
  return value;
}

export function loadServiceConfig(env: Env = process.env): ServiceConfig {
  return Object.freeze({
    database: Object.freeze({
      host: env.PG_HOST || 'localhost',
      port: readInteger(env, 'PG_PORT', 5432),
      user: env.PG_USER || 'nl2sql_reader',
      password: env.PG_PASSWORD || '',
      database: env.PG_DATABASE || 'northwind',
      schema: env.PG_SCHEMA || 'public',
      poolMax: readInteger(env, 'PG_POOL_MAX', 10),
    }),
    queryTimeoutMs: readInteger(env, 'QUERY_TIMEOUT_MS', QUERY_TIMEOUT_MS),
    maxRows: readInteger(env, 'MAX_ROWS', MAX_ROWS),
    accessPolicyPath: env.ACCESS_POLICY_PATH || DEFAULT_ACCESS_POLICY_PATH,
  });
}
