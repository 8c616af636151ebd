/**
 * Audit logging middleware.
 *
 * Every pipeline outcome (denial, execution, failure, sensitive-column
 * read) produces an audit record. Records are written fire-and-forget:
 * a slow or broken audit sink never delays or fails the primary flow.
 */

import type { Pool } from 'pg';

import type {
  AuditRecord,
  ColumnReference,
  DenialReason,
  ExtractedReferences,
  Identity,
  SensitiveColumnSet,
} from '../../shared/types';

// ---------------------------------------------------------------------------
// Sinks
// ---------------------------------------------------------------------------

export interface AuditSink {
  write(record: AuditRecord): Promise<void>;
}

const INSERT_SQL = `
  INSERT INTO audit_log (occurred_at, role, subject_id, display_name, statement, verdict, reason, elapsed_ms)
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
`;

function consoleShape(record: AuditRecord) {
  return {
    role: record.identity.role,
    subject: record.identity.subjectId,
    verdict: record.verdict,
    reason: record.reason,
    statement: record.statement,
    elapsedMs: record.elapsedMillis,
  };
}

/**
 * Writes audit records to the `audit_log` table; falls back to the console
 * when the insert fails.
 */
export class PostgresAuditSink implements AuditSink {
  constructor(private readonly pool: Pool) {}

  async write(record: AuditRecord): Promise<void> {
    try {
      await this.pool.query(INSERT_SQL, [
        record.timestamp,
        record.identity.role,
        String(record.identity.subjectId),
        record.identity.displayName,
        record.statement,
        record.verdict,
        record.reason ?? null,
        record.elapsedMillis ?? null,
      ]);
    } catch (dbError) {
      try {
        console.error('Failed to write audit record to DB, falling back to console:', dbError);
        console.log('[AUDIT]', consoleShape(record));
      } catch {
        // Swallow: audit must never break the primary flow
      }
    }
  }
}

/** Audit sink for deployments without an audit table. */
export class ConsoleAuditSink implements AuditSink {
  async write(record: AuditRecord): Promise<void> {
    console.log('[AUDIT]', consoleShape(record));
  }
}

/**
 * Hand a record to the sink without awaiting it. A sink that rejects or
 * throws is reported on stderr and otherwise ignored.
 */
export function recordAudit(sink: AuditSink | undefined, record: AuditRecord): void {
  if (!sink) return;
  let pending: Promise<void>;
  try {
    pending = sink.write(record);
  } catch (error) {
    process.stderr.write(`[AUDIT] sink threw on write: ${String(error)}\n`);
    return;
  }
  pending.catch((error: unknown) => {
    process.stderr.write(`[AUDIT] sink rejected record: ${String(error)}\n`);
  });
}

// ---------------------------------------------------------------------------
// Security events
// ---------------------------------------------------------------------------

/** Log a denial and forward it to the audit sink. */
export function logSecurityEvent(
  identity: Identity,
  statement: string,
  reason: DenialReason,
  detail: string,
  sink?: AuditSink,
): void {
  console.warn(
    `[SECURITY] ${reason} - user: ${identity.subjectId}, role: ${identity.role}, detail: ${detail}`,
  );
  recordAudit(sink, {
    timestamp: new Date(),
    identity,
    statement,
    verdict: 'denied',
    reason: detail ? `${reason}: ${detail}` : reason,
  });
}

// ---------------------------------------------------------------------------
// Sensitive-column reads
// ---------------------------------------------------------------------------

/**
 * Sensitive columns among `columns`, as sorted `table.column` strings.
 * Unqualified references match a sensitive column of the same name in any
 * table.
 */
export function findSensitiveColumns(
  columns: readonly ColumnReference[],
  sensitive: SensitiveColumnSet,
): string[] {
  const hits = new Set<string>();
  for (const { table, column } of columns) {
    if (table) {
      if (sensitive.get(table)?.has(column)) hits.add(`${table}.${column}`);
      continue;
    }
    for (const [sensitiveTable, sensitiveColumns] of sensitive) {
      if (sensitiveColumns.has(column)) hits.add(`${sensitiveTable}.${column}`);
    }
  }
  return [...hits].sort();
}

/**
 * Record an authorized read of sensitive columns. Returns the columns that
 * triggered the record (empty when none did).
 */
export function auditSensitiveAccess(
  identity: Identity,
  statement: string,
  references: ExtractedReferences,
  sensitive: SensitiveColumnSet,
  sink?: AuditSink,
): string[] {
  const hits = findSensitiveColumns(references.columns, sensitive);
  if (hits.length === 0) return hits;

  console.info(
    `[DATA ACCESS] user: ${identity.subjectId}, role: ${identity.role}, columns: ${hits.join(', ')}`,
  );
  recordAudit(sink, {
    timestamp: new Date(),
    identity,
    statement,
    verdict: 'sensitive-access',
    reason: hits.join(', '),
  });
  return hits;
}
