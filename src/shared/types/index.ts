/**
 * Shared TypeScript type definitions for the guarded NL2SQL pipeline.
 *
 * Keep this file free of runtime dependencies.
 */

// ---------------------------------------------------------------------------
// Identity
// ---------------------------------------------------------------------------

/** The caller, as supplied per request by the authentication provider. */
export interface Identity {
  role: string;
  subjectId: string | number;
  displayName: string;
}

// ---------------------------------------------------------------------------
// Schema catalogue
// ---------------------------------------------------------------------------

/** A foreign key from a child table to its parent, first column of the key. */
export interface ForeignKeyRelationship {
  childTable: string;
  childColumn: string;
  parentTable: string;
  parentColumn: string;
}

/** Raw rows returned by the introspection queries. */
export interface ColumnRow {
  table_name: string;
  column_name: string;
}

export interface ForeignKeyRow {
  table_name: string;
  column_name: string;
  foreign_table_name: string;
  foreign_column_name: string;
}

// ---------------------------------------------------------------------------
// Access policy
// ---------------------------------------------------------------------------

/** role -> table -> allowed columns. A missing role has zero access. */
export type RbacPolicy = ReadonlyMap<string, ReadonlyMap<string, ReadonlySet<string>>>;

/** role -> row-filter template containing the `{user_id}` placeholder. */
export type RlsPolicy = ReadonlyMap<string, string>;

/** table -> columns whose reads are audited. */
export type SensitiveColumnSet = ReadonlyMap<string, ReadonlySet<string>>;

/** Static policy loaded at startup and shared by every request. */
export interface AccessPolicy {
  readonly rbac: RbacPolicy;
  readonly rls: RlsPolicy;
  readonly injectionPatterns: readonly RegExp[];
  readonly sensitiveColumns: SensitiveColumnSet;
}

// ---------------------------------------------------------------------------
// Statement analysis
// ---------------------------------------------------------------------------

/** A column read by a statement. `table` is empty for unqualified references. */
export interface ColumnReference {
  table: string;
  column: string;
}

export interface ExtractedReferences {
  /** Catalogue tables named in FROM/JOIN clauses. */
  tables: ReadonlySet<string>;
  columns: readonly ColumnReference[];
  /** FROM/JOIN targets that are neither catalogue tables nor CTE names. */
  unresolvedTables: ReadonlySet<string>;
}

// ---------------------------------------------------------------------------
// Verdicts and results
// ---------------------------------------------------------------------------

export type DenialReason =
  | 'ForbiddenQueryType'
  | 'InjectionSuspected'
  | 'UnauthorizedTable'
  | 'UnauthorizedColumn';

export type AuthorizationVerdict =
  | { status: 'authorized' }
  | { status: 'denied'; reason: DenialReason; detail: string };

export type ExecutionOutcome =
  | {
      ok: true;
      rows: Record<string, unknown>[];
      rowCount: number;
      elapsedMillis: number;
    }
  | { ok: false; kind: 'ExecutionFailure'; message: string };

/** Result of the AST check that runs right before execution. */
export type GuardResult =
  | { ok: true; sql: string; tablesReferenced: string[]; functionsUsed: string[] }
  | { ok: false; kind: 'parse'; message: string }
  | { ok: false; kind: 'violation'; reason: DenialReason; errors: string[] };

/** Outcome of `processCandidate`. */
export type PipelineResult =
  | {
      status: 'ok';
      sql: string;
      rows: Record<string, unknown>[];
      rowCount: number;
      elapsedMillis: number;
    }
  | { status: 'denied'; reason: DenialReason; message: string }
  | { status: 'error'; kind: 'ExecutionFailure'; message: string };

// ---------------------------------------------------------------------------
// Question entry point
// ---------------------------------------------------------------------------

/** Payload sent by the client when submitting a natural-language question. */
export interface ChatRequest {
  question: string;
}

export type ChatResponse =
  | (PipelineResult & { explanation?: string })
  | { status: 'clarification'; message: string }
  | { status: 'refusal'; message: string }
  | { status: 'unauthenticated'; message: string }
  | { status: 'invalid'; message: string }
  | { status: 'error'; kind: 'GenerationFailure'; message: string };

// ---------------------------------------------------------------------------
// Audit types
// ---------------------------------------------------------------------------

export type AuditVerdict = 'denied' | 'executed' | 'failed' | 'sensitive-access';

/** A single audit record, written fire-and-forget to the audit sink. */
export interface AuditRecord {
  timestamp: Date;
  identity: Identity;
  statement: string;
  verdict: AuditVerdict;
  reason?: string;
  elapsedMillis?: number;
}
