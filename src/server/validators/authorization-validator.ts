/**
 * Authorization validator.
 *
 * Accepts or rejects a candidate statement for an identity, short-circuiting
 * on the first failure:
 *
 *  1. read-only check (SELECT / WITH)
 *  2. injection pattern screen
 *  3. reference extraction
 *  4. table grants
 *  5. qualified column grants
 *  6. unqualified column grants (any allowed table suffices)
 *
 * Every denial is logged as a security event before it is returned.
 */

import type {
  AccessPolicy,
  AuthorizationVerdict,
  DenialReason,
  Identity,
} from '../../shared/types';
import type { SchemaCatalog } from '../db/schema-catalog';
import { tokenize } from '../lib/sql-tokenizer';
import { logSecurityEvent, type AuditSink } from '../middleware/audit';
import { hasInjectionPattern } from './injection-screener';
import { extractReferences } from './statement-extractor';

const NO_GRANTS: ReadonlyMap<string, ReadonlySet<string>> = new Map();

export interface AuthorizeOptions {
  /** Receives a record for every denial. */
  audit?: AuditSink;
}

/**
 * Authorize `sql` for `identity` against the catalogue and the policy's
 * grants and injection patterns.
 */
export function authorize(
  sql: string,
  identity: Identity,
  catalog: SchemaCatalog,
  policy: Pick<AccessPolicy, 'rbac' | 'injectionPatterns'>,
  options: AuthorizeOptions = {},
): AuthorizationVerdict {
  const deny = (reason: DenialReason, detail: string): AuthorizationVerdict => {
    logSecurityEvent(identity, sql, reason, detail, options.audit);
    return { status: 'denied', reason, detail };
  };

  const tokens = tokenize(sql);
  const leading = tokens[0];
  if (!leading || leading.kind !== 'keyword' || (leading.value !== 'SELECT' && leading.value !== 'WITH')) {
    return deny('ForbiddenQueryType', leading ? leading.value : 'empty statement');
  }

  if (hasInjectionPattern(sql, policy.injectionPatterns)) {
    return deny('InjectionSuspected', 'statement matched an injection pattern');
  }

  const references = extractReferences(tokens, catalog);
  const allowed = policy.rbac.get(identity.role) ?? NO_GRANTS;

  if (allowed.size === 0) {
    const first = [...references.tables, ...references.unresolvedTables][0];
    return deny('UnauthorizedTable', first ?? `no tables granted to role "${identity.role}"`);
  }

  for (const table of [...references.tables, ...references.unresolvedTables]) {
    if (!allowed.has(table)) {
      return deny('UnauthorizedTable', table);
    }
  }

  for (const { table, column } of references.columns) {
    if (!table) continue;
    if (!allowed.get(table)?.has(column)) {
      return deny('UnauthorizedColumn', `${table}.${column}`);
    }
  }

  for (const { table, column } of references.columns) {
    if (table) continue;
    // Permissive: one allowed table carrying the column is enough, even if
    // a disallowed table has a column of the same name.
    const granted = [...allowed.values()].some((columns) => columns.has(column));
    if (!granted) {
      return deny('UnauthorizedColumn', column);
    }
  }

  return { status: 'authorized' };
}
