/**
 * Shared constants for the guarded NL2SQL pipeline.
 *
 * Security-critical block-lists, keyword sets and default limits used
 * across server-side modules.
 */

// ---------------------------------------------------------------------------
// SQL security block-lists
// ---------------------------------------------------------------------------

/** PostgreSQL functions that must never appear in generated queries. */
export const BLOCKED_FUNCTIONS = new Set([
  'pg_read_file', 'pg_read_binary_file', 'pg_ls_dir', 'pg_stat_file',
  'lo_import', 'lo_export', 'lo_get', 'lo_put',
  'dblink', 'dblink_exec', 'dblink_connect',
  'copy', 'pg_copy_from', 'pg_copy_to',
  'set_config', 'current_setting',
  'pg_terminate_backend', 'pg_cancel_backend',
  'pg_reload_conf', 'pg_rotate_logfile',
  'txid_current', 'pg_advisory_lock',
  'pg_sleep', 'query_to_xml',
]);

/** Schema names and relation-name prefixes that indicate system catalogues. */
export const BLOCKED_SCHEMAS = new Set(['pg_catalog', 'information_schema', 'pg_toast']);
export const BLOCKED_TABLE_PREFIX = 'pg_';

/**
 * Patterns used when the access policy file does not list its own.
 * Evaluated case-insensitively against the raw statement.
 */
export const DEFAULT_INJECTION_PATTERNS = [
  '--|#',
  ';(?!\\s*$)',
  '\\b(DROP|DELETE|INSERT|UPDATE|ALTER|EXEC|TRUNCATE|GRANT|REVOKE|COPY)\\b',
  '\\bUNION\\b(?!(\\s+(ALL\\s+)?SELECT))',
  '\\bOR\\s+1\\s*=\\s*1\\b',
];

// ---------------------------------------------------------------------------
// Row-level security
// ---------------------------------------------------------------------------

/** Placeholder substituted with the caller's subject id in RLS templates. */
export const USER_ID_PLACEHOLDER = '{user_id}';

// ---------------------------------------------------------------------------
// Query limits
// ---------------------------------------------------------------------------

/** Maximum number of rows returned by any single query. */
export const MAX_ROWS = 500;

/** Per-query execution timeout in milliseconds. */
export const QUERY_TIMEOUT_MS = 10_000;

/** Maximum length of a user-submitted question (characters). */
export const MAX_QUESTION_LENGTH = 1_000;

// ---------------------------------------------------------------------------
// Denial messages
// ---------------------------------------------------------------------------

/** Stable, user-facing text for each denial reason. */
export const DENIAL_MESSAGES = {
  ForbiddenQueryType: 'Forbidden query type. Only SELECT queries are allowed.',
  InjectionSuspected: 'Potential SQL injection detected.',
  UnauthorizedTable: 'Unauthorized access to table',
  UnauthorizedColumn: 'Unauthorized access to column',
} as const;
