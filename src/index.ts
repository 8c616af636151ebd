/**
 * Service bootstrap and public exports.
 */

import type { Pool } from 'pg';

import { Nl2SqlAgent, SqlGenerator } from './server/agents/nl2sql-agent';
import { QueryPipeline } from './server/agents/query-pipeline';
import { createPool, healthCheck, PgQueryExecutor } from './server/db/pool';
import { loadSchemaCatalog, type SchemaCatalog } from './server/db/schema-catalog';
import { loadAccessPolicy } from './server/lib/access-policy';
import { loadServiceConfig, type ServiceConfig } from './server/lib/config';
import type { LLMProvider } from './server/llm';
import { PostgresAuditSink, type AuditSink } from './server/middleware/audit';
import type { AccessPolicy } from './shared/types';

export interface QueryService {
  config: ServiceConfig;
  pool: Pool;
  catalog: SchemaCatalog;
  policy: AccessPolicy;
  pipeline: QueryPipeline;
  agent: Nl2SqlAgent;
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}

export interface QueryServiceOptions {
  config?: ServiceConfig;
  /** Defaults to the provider selected by LLM_PROVIDER. */
  provider?: LLMProvider;
  /** Defaults to the `audit_log` table. */
  audit?: AuditSink;
}

/**
 * Build a ready-to-serve service: configuration, pool, policy and schema
 * catalogue are loaded once here and shared read-only afterwards.
 *
 * @throws PolicyConfigError, ConfigError or SchemaUnavailableError; the
 *         service must not start in that case.
 */
export async function createQueryService(options: QueryServiceOptions = {}): Promise<QueryService> {
  const config = options.config ?? loadServiceConfig();
  const policy = loadAccessPolicy(config.accessPolicyPath);

  const pool = createPool(config.database);
  let catalog: SchemaCatalog;
  try {
    catalog = await loadSchemaCatalog(pool, config.database.schema);
  } catch (error) {
    await pool.end();
    throw error;
  }

  const pipeline = new QueryPipeline({
    catalog,
    policy,
    executor: new PgQueryExecutor(pool, config.queryTimeoutMs),
    audit: options.audit ?? new PostgresAuditSink(pool),
    timeoutMs: config.queryTimeoutMs,
    maxRows: config.maxRows,
  });
  const generator = new SqlGenerator({
    catalog,
    policy,
    provider: options.provider,
    maxRows: config.maxRows,
  });

  console.info(
    `[STARTUP] Schema "${config.database.schema}" loaded: ${catalog.tableNames().length} tables, ` +
      `${policy.rbac.size} roles`,
  );

  return {
    config,
    pool,
    catalog,
    policy,
    pipeline,
    agent: new Nl2SqlAgent(generator, pipeline),
    healthCheck: () => healthCheck(pool),
    close: () => pool.end(),
  };
}

export { Nl2SqlAgent, SqlGenerator, buildSystemPrompt, parseGeneratorReply } from './server/agents/nl2sql-agent';
export type { GeneratorOutcome } from './server/agents/nl2sql-agent';
export { QueryPipeline, denialMessage } from './server/agents/query-pipeline';
export { createPool, healthCheck, PgQueryExecutor } from './server/db/pool';
export type { ExecuteOptions, QueryExecutor } from './server/db/pool';
export { SchemaCatalog, buildSchemaCatalog, describeSchema, loadSchemaCatalog } from './server/db/schema-catalog';
export { buildAccessPolicy, loadAccessPolicy } from './server/lib/access-policy';
export { loadServiceConfig } from './server/lib/config';
export type { DatabaseConfig, ServiceConfig } from './server/lib/config';
export {
  ConfigError,
  GenerationError,
  PolicyConfigError,
  SchemaUnavailableError,
} from './server/lib/errors';
export { applyRowFilter, formatSubjectId, renderRowFilter } from './server/lib/row-filter';
export { tokenize } from './server/lib/sql-tokenizer';
export type { SqlToken, TokenKind } from './server/lib/sql-tokenizer';
export { createLLMProvider, getLLMProvider, resetProvider } from './server/llm';
export type { LLMProvider, LLMProviderName, LLMSettings } from './server/llm';
export {
  ConsoleAuditSink,
  PostgresAuditSink,
  auditSensitiveAccess,
  findSensitiveColumns,
  logSecurityEvent,
} from './server/middleware/audit';
export type { AuditSink } from './server/middleware/audit';
export { authorize } from './server/validators/authorization-validator';
export { findInjectionPattern, hasInjectionPattern } from './server/validators/injection-screener';
export { extractReferences } from './server/validators/statement-extractor';
export { verifySelectStatement } from './server/validators/sql-validator';
export * from './shared/types';
export * from './shared/constants';
