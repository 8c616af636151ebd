/**
 * Query pipeline.
 *
 * Sequences a candidate statement through the authorization and safety
 * layers and, only if every layer agrees, the executor:
 *
 *  1. Authorization validator (read-only check, injection screen, grants)
 *  2. Row filter for the caller's role
 *  3. Statement guard on the real parse tree (single SELECT, table grants,
 *     row limit)
 *  4. Sensitive-column audit (best effort)
 *  5. Execution in a read-only transaction
 *
 * The pipeline holds no per-request state; the catalogue and policy it is
 * constructed with are shared read-only by every in-flight request.
 */

import type {
  AccessPolicy,
  DenialReason,
  Identity,
  PipelineResult,
} from '../../shared/types';
import { DENIAL_MESSAGES, MAX_ROWS, QUERY_TIMEOUT_MS } from '../../shared/constants';
import type { SchemaCatalog } from '../db/schema-catalog';
import type { QueryExecutor } from '../db/pool';
import { errorMessage } from '../lib/errors';
import { applyRowFilter } from '../lib/row-filter';
import {
  auditSensitiveAccess,
  logSecurityEvent,
  recordAudit,
  type AuditSink,
} from '../middleware/audit';
import { authorize } from '../validators/authorization-validator';
import { extractReferences } from '../validators/statement-extractor';
import { verifySelectStatement } from '../validators/sql-validator';

export interface QueryPipelineDeps {
  catalog: SchemaCatalog;
  policy: AccessPolicy;
  executor: QueryExecutor;
  audit?: AuditSink;
  timeoutMs?: number;
  maxRows?: number;
}

export interface ProcessOptions {
  signal?: AbortSignal;
}

/** Stable user-facing text for a denial. */
export function denialMessage(reason: DenialReason, detail: string): string {
  switch (reason) {
    case 'UnauthorizedTable':
    case 'UnauthorizedColumn':
      return `${DENIAL_MESSAGES[reason]}: ${detail}`;
    default:
      return DENIAL_MESSAGES[reason];
  }
}

export class QueryPipeline {
  private readonly catalog: SchemaCatalog;
  private readonly policy: AccessPolicy;
  private readonly executor: QueryExecutor;
  private readonly audit: AuditSink | undefined;
  private readonly timeoutMs: number;
  private readonly maxRows: number;

  constructor(deps: QueryPipelineDeps) {
    this.catalog = deps.catalog;
    this.policy = deps.policy;
    this.executor = deps.executor;
    this.audit = deps.audit;
    this.timeoutMs = deps.timeoutMs ?? QUERY_TIMEOUT_MS;
    this.maxRows = deps.maxRows ?? MAX_ROWS;
  }

  /**
   * Authorize, filter, verify and execute a candidate statement for
   * `identity`. Never throws for an expected condition.
   */
  async processCandidate(
    sql: string,
    identity: Identity,
    options: ProcessOptions = {},
  ): Promise<PipelineResult> {
    const verdict = authorize(sql, identity, this.catalog, this.policy, { audit: this.audit });
    if (verdict.status === 'denied') {
      return {
        status: 'denied',
        reason: verdict.reason,
        message: denialMessage(verdict.reason, verdict.detail),
      };
    }

    const filtered = applyRowFilter(sql, identity, this.policy.rls);

    // Second opinion on the grants, from the real parse tree.
    const guard = await verifySelectStatement(filtered, {
      maxRows: this.maxRows,
      allowedTables: new Set(this.policy.rbac.get(identity.role)?.keys()),
      schemaName: this.catalog.schemaName,
    });
    if (!guard.ok) {
      if (guard.kind === 'parse') {
        console.error(`[QUERY] Statement rejected by parser: ${guard.message}\n  SQL: ${filtered}`);
        this.recordFailure(identity, filtered, guard.message);
        return { status: 'error', kind: 'ExecutionFailure', message: guard.message };
      }
      const detail = guard.errors.join('; ');
      logSecurityEvent(identity, filtered, guard.reason, detail, this.audit);
      return {
        status: 'denied',
        reason: guard.reason,
        message: denialMessage(guard.reason, detail),
      };
    }

    try {
      auditSensitiveAccess(
        identity,
        filtered,
        // The candidate, not the filtered statement: the row filter's own
        // columns are not a read by the caller.
        extractReferences(sql, this.catalog),
        this.policy.sensitiveColumns,
        this.audit,
      );
    } catch (error) {
      console.error('[DATA ACCESS] Sensitive-column audit failed:', errorMessage(error));
    }

    const outcome = await this.executor.execute(guard.sql, {
      timeoutMs: this.timeoutMs,
      signal: options.signal,
    });

    if (!outcome.ok) {
      this.recordFailure(identity, guard.sql, outcome.message);
      return { status: 'error', kind: 'ExecutionFailure', message: outcome.message };
    }

    recordAudit(this.audit, {
      timestamp: new Date(),
      identity,
      statement: guard.sql,
      verdict: 'executed',
      elapsedMillis: outcome.elapsedMillis,
    });

    return {
      status: 'ok',
      sql: guard.sql,
      rows: outcome.rows,
      rowCount: outcome.rowCount,
      elapsedMillis: outcome.elapsedMillis,
    };
  }

  private recordFailure(identity: Identity, statement: string, message: string): void {
    recordAudit(this.audit, {
      timestamp: new Date(),
      identity,
      statement,
      verdict: 'failed',
      reason: message,
    });
  }
}
