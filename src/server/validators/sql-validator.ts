/**
 * Statement guard built on PostgreSQL's own parser (libpg-query WASM).
 *
 * Runs on the final, row-filtered statement right before execution and
 * re-checks on the real parse tree what the token-level validator decided:
 *
 *  1. Drop comments and trailing semicolons
 *  2. Parse SQL into an AST via libpg-query
 *  3. Exactly one statement, and it is a plain SELECT (no SELECT INTO,
 *     no data-modifying CTE)
 *  4. No call to a blocked server function
 *  5. No relation in a system schema
 *  6. Every relation that is not a CTE in scope is granted to the caller
 *  7. Enforce a row limit when none is present
 */

import type { GuardResult } from '../../shared/types';
import {
  BLOCKED_FUNCTIONS,
  BLOCKED_SCHEMAS,
  BLOCKED_TABLE_PREFIX,
  MAX_ROWS,
} from '../../shared/constants';
import { errorMessage } from '../lib/errors';
import { tokenize } from '../lib/sql-tokenizer';

// ---------------------------------------------------------------------------
// Lazy-load the WASM parser
// ---------------------------------------------------------------------------

type Parser = (sql: string) => Promise<unknown>;

let parser: Parser | null = null;

async function getParser(): Promise<Parser> {
  if (!parser) {
    const pgQuery = await import('libpg-query');
    parser = pgQuery.parse;
  }
  return parser;
}

// ---------------------------------------------------------------------------
// AST helpers
// ---------------------------------------------------------------------------

type AstNode = Record<string, unknown>;

function isRecord(value: unknown): value is AstNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Depth-first visit of every `{ NodeType: {...} }` pair in the tree. */
function walk(node: unknown, visit: (type: string, body: AstNode) => void): void {
  if (Array.isArray(node)) {
    for (const item of node) walk(item, visit);
    return;
  }
  if (!isRecord(node)) return;

  for (const [key, value] of Object.entries(node)) {
    if (isRecord(value)) visit(key, value);
    walk(value, visit);
  }
}

function stringValue(node: unknown): string {
  if (!isRecord(node) || !isRecord(node.String)) return '';
  const { sval } = node.String;
  return typeof sval === 'string' ? sval : '';
}

/** Comments out, whitespace collapsed, trailing semicolons dropped. */
function normalise(sql: string): string {
  const tokens = tokenize(sql);
  let count = tokens.length;
  while (count > 0 && tokens[count - 1].kind === 'semicolon') count--;

  let result = '';
  for (let i = 0; i < count; i++) {
    if (i > 0 && tokens[i].start > tokens[i - 1].end) result += ' ';
    result += sql.slice(tokens[i].start, tokens[i].end);
  }
  return result;
}

function withClauseOf(node: AstNode): AstNode | null {
  const clause = node.withClause;
  if (!isRecord(clause)) return null;
  return isRecord(clause.WithClause) ? clause.WithClause : clause;
}

function cteName(entry: unknown): string | null {
  const cte = isRecord(entry) && isRecord(entry.CommonTableExpr) ? entry.CommonTableExpr : null;
  return cte && typeof cte.ctename === 'string' ? cte.ctename : null;
}

/**
 * Relations read by the tree, skipping references to a CTE in scope. A
 * non-recursive CTE is visible to the CTEs after it and to its query; a
 * recursive one also to its own body.
 */
function collectRelations(node: unknown, scope: ReadonlySet<string>, out: Set<string>): void {
  if (Array.isArray(node)) {
    for (const item of node) collectRelations(item, scope, out);
    return;
  }
  if (!isRecord(node)) return;

  let inner = scope;
  const clause = withClauseOf(node);
  if (clause) {
    const ctes: unknown[] = Array.isArray(clause.ctes) ? clause.ctes : [];
    const names = ctes.map(cteName).filter((name): name is string => name !== null);
    const recursive = clause.recursive === true;
    ctes.forEach((entry, i) => {
      const visible = recursive ? names : names.slice(0, i);
      collectRelations(entry, new Set([...scope, ...visible]), out);
    });
    inner = new Set([...scope, ...names]);
  }

  for (const [key, value] of Object.entries(node)) {
    if (key === 'withClause' && clause) continue;
    if (key === 'RangeVar' && isRecord(value)) {
      const schema = typeof value.schemaname === 'string' ? value.schemaname : '';
      const relname = typeof value.relname === 'string' ? value.relname : '';
      if (schema || !inner.has(relname)) out.add(schema ? `${schema}.${relname}` : relname);
      continue;
    }
    collectRelations(value, inner, out);
  }
}

function topLevelStatements(ast: unknown): unknown[] {
  if (!isRecord(ast) || !Array.isArray(ast.stmts)) return [];
  return ast.stmts.map((entry) => (isRecord(entry) ? entry.stmt : undefined));
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export interface GuardOptions {
  maxRows?: number;
  /**
   * Tables the caller may read. When set, every relation outside it is an
   * `UnauthorizedTable` violation.
   */
  allowedTables?: ReadonlySet<string>;
  /** Schema whose qualified names count as catalogue tables. */
  schemaName?: string;
}

/**
 * Verify that `rawSql` is a single, read-only SELECT before it is executed.
 *
 * @returns The statement to run (possibly wrapped in a LIMIT), or the
 *          reason it must not run.
 */
export async function verifySelectStatement(
  rawSql: string,
  options: GuardOptions = {},
): Promise<GuardResult> {
  const maxRows = options.maxRows ?? MAX_ROWS;

  const sql = normalise(rawSql);
  if (!sql) {
    return { ok: false, kind: 'parse', message: 'Empty SQL after stripping comments' };
  }

  let ast: unknown;
  try {
    const parse = await getParser();
    ast = await parse(sql);
  } catch (parseError: unknown) {
    return { ok: false, kind: 'parse', message: `SQL parse error: ${errorMessage(parseError)}` };
  }

  const stmts = topLevelStatements(ast);
  if (stmts.length === 0) {
    return { ok: false, kind: 'parse', message: 'No valid SQL statement found' };
  }
  if (stmts.length > 1) {
    return {
      ok: false,
      kind: 'violation',
      reason: 'ForbiddenQueryType',
      errors: ['Multiple statements are not permitted'],
    };
  }

  const stmt = stmts[0];
  const select = isRecord(stmt) && isRecord(stmt.SelectStmt) ? stmt.SelectStmt : null;
  if (!select) {
    const stmtType = isRecord(stmt) ? Object.keys(stmt)[0] : 'unknown';
    return {
      ok: false,
      kind: 'violation',
      reason: 'ForbiddenQueryType',
      errors: [`Only SELECT statements are permitted (got ${stmtType})`],
    };
  }

  const forbidden: string[] = [];
  const blockedCalls: string[] = [];
  const systemRelations: string[] = [];
  const tables = new Set<string>();
  const functions = new Set<string>();

  if (select.intoClause !== undefined) {
    forbidden.push('SELECT INTO is not permitted');
  }

  walk(stmt, (type, body) => {
    switch (type) {
      case 'InsertStmt':
      case 'UpdateStmt':
      case 'DeleteStmt':
      case 'MergeStmt':
        forbidden.push(`Data-modifying statement ${type} is not permitted`);
        break;
      case 'RangeVar': {
        const schema = typeof body.schemaname === 'string' ? body.schemaname.toLowerCase() : '';
        const relname = typeof body.relname === 'string' ? body.relname.toLowerCase() : '';
        const fullName = schema ? `${schema}.${relname}` : relname;
        tables.add(fullName);
        if (BLOCKED_SCHEMAS.has(schema) || relname.startsWith(BLOCKED_TABLE_PREFIX)) {
          systemRelations.push(`Access to system table '${fullName}' is not permitted`);
        }
        break;
      }
      case 'FuncCall': {
        const parts = Array.isArray(body.funcname) ? body.funcname.map(stringValue) : [];
        const name = parts.join('.').toLowerCase();
        if (!name) break;
        functions.add(name);
        const bare = parts[parts.length - 1].toLowerCase();
        if (BLOCKED_FUNCTIONS.has(name) || BLOCKED_FUNCTIONS.has(bare)) {
          blockedCalls.push(`Function '${name}' is not permitted`);
        }
        break;
      }
    }
  });

  if (forbidden.length > 0) {
    return { ok: false, kind: 'violation', reason: 'ForbiddenQueryType', errors: forbidden };
  }
  if (blockedCalls.length > 0) {
    return { ok: false, kind: 'violation', reason: 'InjectionSuspected', errors: blockedCalls };
  }
  if (systemRelations.length > 0) {
    return { ok: false, kind: 'violation', reason: 'UnauthorizedTable', errors: systemRelations };
  }

  const { allowedTables } = options;
  if (allowedTables) {
    const schemaName = options.schemaName ?? 'public';
    const relations = new Set<string>();
    collectRelations(stmt, new Set(), relations);
    const ungranted = [...relations].filter((relation) => {
      const dot = relation.indexOf('.');
      const schema = dot === -1 ? null : relation.slice(0, dot);
      const name = dot === -1 ? relation : relation.slice(dot + 1);
      return (schema !== null && schema !== schemaName) || !allowedTables.has(name);
    });
    if (ungranted.length > 0) {
      return {
        ok: false,
        kind: 'violation',
        reason: 'UnauthorizedTable',
        errors: ungranted.map((relation) => `Table '${relation}' is not granted`),
      };
    }
  }

  const hasLimit = select.limitCount !== undefined && select.limitCount !== null;
  return {
    ok: true,
    sql: hasLimit ? sql : `SELECT * FROM (${sql}) AS _inner LIMIT ${maxRows}`,
    tablesReferenced: [...tables],
    functionsUsed: [...functions],
  };
}
