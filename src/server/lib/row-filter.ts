/**
 * Row-level security rewriter.
 *
 * Adds the caller's row-filter predicate to an authorized statement. The
 * rewrite is idempotent: a statement whose top-level WHERE clause already
 * carries every conjunct of the predicate (qualified or unqualified) is
 * returned unchanged.
 *
 * When a branch binds the predicate's table to an alias (`FROM orders o`),
 * the qualifier is rewritten to that alias, since PostgreSQL no longer
 * accepts the table name there.
 */

import type { Identity, RlsPolicy } from '../../shared/types';
import { USER_ID_PLACEHOLDER } from '../../shared/constants';
import { isKeyword, isNameToken, tokenize, type SqlToken } from './sql-tokenizer';

/** Clauses the predicate must precede. */
const TAIL_CLAUSES = ['GROUP', 'HAVING', 'WINDOW', 'ORDER', 'LIMIT', 'OFFSET', 'FETCH', 'FOR'];
const SET_OPERATORS = ['UNION', 'INTERSECT', 'EXCEPT'];

interface Edit {
  at: number;
  text: string;
}

/** The predicate as it is spliced into one branch. */
interface BranchFilter {
  tokens: readonly SqlToken[];
  text: string;
}

/** Names a table is bound to in a FROM clause; null for the bare name. */
type Bindings = Map<string, Array<string | null>>;

/** Numeric ids are emitted bare, anything else as a quoted literal. */
export function formatSubjectId(subjectId: string | number): string {
  if (typeof subjectId === 'number' && Number.isFinite(subjectId)) return String(subjectId);
  const text = String(subjectId);
  if (/^\d+$/.test(text)) return text;
  return `'${text.replaceAll("'", "''")}'`;
}

/** The concrete predicate for an identity, or null when its role has none. */
export function renderRowFilter(identity: Identity, rls: RlsPolicy): string | null {
  const template = rls.get(identity.role);
  if (template === undefined) return null;
  return template.replaceAll(USER_ID_PLACEHOLDER, formatSubjectId(identity.subjectId)).trim();
}

// ---------------------------------------------------------------------------
// Token helpers
// ---------------------------------------------------------------------------

/** Paren depth at which each token sits. */
function depths(tokens: readonly SqlToken[]): number[] {
  const result: number[] = [];
  let depth = 0;
  for (const token of tokens) {
    if (token.kind === 'close_paren') depth = Math.max(0, depth - 1);
    result.push(depth);
    if (token.kind === 'open_paren') depth++;
  }
  return result;
}

function hasTopLevel(tokens: readonly SqlToken[], word: string): boolean {
  const level = depths(tokens);
  return tokens.some((token, i) => level[i] === 0 && isKeyword(token, word));
}

/** Split on top-level AND, leaving the AND of `x BETWEEN a AND b` alone. */
function splitConjuncts(tokens: readonly SqlToken[]): SqlToken[][] {
  const level = depths(tokens);
  const parts: SqlToken[][] = [[]];
  let between = false;
  tokens.forEach((token, i) => {
    if (level[i] === 0 && isKeyword(token, 'BETWEEN')) between = true;
    if (level[i] === 0 && isKeyword(token, 'AND')) {
      if (between) {
        between = false;
      } else {
        parts.push([]);
        return;
      }
    }
    parts[parts.length - 1].push(token);
  });
  return parts.filter((part) => part.length > 0).map(stripParens);
}

/** Remove parentheses that wrap the whole token list. */
function stripParens(tokens: SqlToken[]): SqlToken[] {
  let current = tokens;
  while (
    current.length >= 2 &&
    current[0].kind === 'open_paren' &&
    current[current.length - 1].kind === 'close_paren'
  ) {
    const level = depths(current);
    // The opening paren must close at the very end.
    const closesEarly = current.slice(1, -1).some((_, i) => level[i + 1] === 0);
    if (closesEarly) break;
    current = current.slice(1, -1);
  }
  return current;
}

function sameTokens(a: readonly SqlToken[], b: readonly SqlToken[]): boolean {
  return a.length === b.length && a.every((token, i) => token.kind === b[i].kind && token.value === b[i].value);
}

/** `t.col = 1` -> `col = 1`; other shapes are returned as is. */
function withoutQualifier(tokens: readonly SqlToken[]): readonly SqlToken[] {
  if (tokens.length > 3 && tokens[1].kind === 'dot' && tokens[0].kind !== 'dot') {
    return tokens.slice(2);
  }
  return tokens;
}

function predicateConjuncts(predicate: readonly SqlToken[]): SqlToken[][] {
  if (hasTopLevel(predicate, 'OR')) return [stripParens([...predicate])];
  return splitConjuncts(predicate);
}

// ---------------------------------------------------------------------------
// Rewriter
// ---------------------------------------------------------------------------

/** [start, end) token ranges of the top-level set-operation branches. */
function branches(tokens: readonly SqlToken[], level: readonly number[]): Array<[number, number]> {
  const ranges: Array<[number, number]> = [];
  let start = 0;
  for (let i = 0; i < tokens.length; i++) {
    if (level[i] === 0 && isKeyword(tokens[i], ...SET_OPERATORS)) {
      ranges.push([start, i]);
      start = isKeyword(tokens[i + 1], 'ALL', 'DISTINCT') ? i + 2 : i + 1;
    }
  }
  ranges.push([start, tokens.length]);
  return ranges.filter(([from, to]) => to > from);
}

function findTopLevel(
  tokens: readonly SqlToken[],
  level: readonly number[],
  from: number,
  to: number,
  words: string[],
): number {
  for (let i = from; i < to; i++) {
    if (level[i] === 0 && isKeyword(tokens[i], ...words)) return i;
  }
  return -1;
}

/** The branch's FROM keyword, skipping `IS DISTINCT FROM`. */
function findFromClause(tokens: readonly SqlToken[], level: readonly number[], from: number, to: number): number {
  for (let i = from; i < to; i++) {
    if (level[i] === 0 && isKeyword(tokens[i], 'FROM') && !isKeyword(tokens[i - 1], 'DISTINCT')) return i;
  }
  return -1;
}

/** First top-level clause the predicate must precede. `WITHIN GROUP` is not one. */
function findTail(tokens: readonly SqlToken[], level: readonly number[], from: number, to: number): number {
  for (let i = from; i < to; i++) {
    if (level[i] !== 0 || !isKeyword(tokens[i], ...TAIL_CLAUSES)) continue;
    const previous = tokens[i - 1];
    if (isKeyword(tokens[i], 'GROUP') && previous?.kind === 'identifier' && previous.value === 'within') {
      continue;
    }
    return i;
  }
  return -1;
}

/**
 * Tables of the branch's top-level FROM clause and the names they are bound
 * to. Derived tables and parenthesised joins bind nothing.
 */
function fromBindings(
  sql: string,
  tokens: readonly SqlToken[],
  level: readonly number[],
  fromKeyword: number,
  to: number,
): Bindings {
  const bindings: Bindings = new Map();
  let expectItem = true;
  for (let i = fromKeyword + 1; i < to; i++) {
    const token = tokens[i];
    if (level[i] !== 0) continue;
    if (isKeyword(token, 'WHERE', ...TAIL_CLAUSES)) break;
    if (token.kind === 'comma' || isKeyword(token, 'JOIN')) {
      expectItem = true;
      continue;
    }
    if (!expectItem || isKeyword(token, 'LATERAL')) continue;
    if (!isNameToken(token)) {
      expectItem = false;
      continue;
    }

    // schema.table keeps the table part
    let table = token.value;
    let j = i;
    while (tokens[j + 1]?.kind === 'dot' && isNameToken(tokens[j + 2])) {
      table = tokens[j + 2].value;
      j += 2;
    }
    let next = j + 1;
    if (isKeyword(tokens[next], 'AS')) next++;
    const alias = tokens[next];
    const bound = isNameToken(alias) ? sql.slice(alias.start, alias.end) : null;

    bindings.set(table, [...(bindings.get(table) ?? []), bound]);
    expectItem = false;
    i = bound === null ? j : next;
  }
  return bindings;
}

/** Rewrite `table.` qualifiers to the single alias the branch binds them to. */
function filterForBranch(rendered: string, predicate: readonly SqlToken[], bindings: Bindings): BranchFilter {
  let text = '';
  let copied = 0;
  predicate.forEach((token, i) => {
    if (!isNameToken(token) || predicate[i + 1]?.kind !== 'dot' || predicate[i - 1]?.kind === 'dot') return;
    const bound = bindings.get(token.value);
    if (!bound || bound.length !== 1) return;
    const alias = bound[0];
    if (alias === null) return;
    text += rendered.slice(copied, token.start) + alias;
    copied = token.end;
  });
  text += rendered.slice(copied);

  const tokens = copied === 0 ? predicate : tokenize(text);
  return { tokens, text: hasTopLevel(tokens, 'OR') ? `(${text})` : text };
}

function branchEdits(
  sql: string,
  tokens: readonly SqlToken[],
  level: readonly number[],
  [from, to]: [number, number],
  rendered: string,
  renderedTokens: readonly SqlToken[],
): Edit[] {
  const where = findTopLevel(tokens, level, from, to, ['WHERE']);
  const fromKeyword = findFromClause(tokens, level, from, where === -1 ? to : where);
  const tailStart = where !== -1 ? where + 1 : fromKeyword !== -1 ? fromKeyword + 1 : from;
  const tail = findTail(tokens, level, tailStart, to);

  const bindings: Bindings =
    fromKeyword === -1 ? new Map() : fromBindings(sql, tokens, level, fromKeyword, to);
  const { tokens: predicate, text: predicateText } = filterForBranch(rendered, renderedTokens, bindings);

  if (where === -1) {
    if (tail !== -1) return [{ at: tokens[tail].start, text: `WHERE ${predicateText} ` }];
    return [{ at: tokens[to - 1].end, text: ` WHERE ${predicateText}` }];
  }

  const conditionEnd = tail === -1 ? to : tail;
  const condition = tokens.slice(where + 1, conditionEnd);
  if (condition.length === 0) {
    return [{ at: tokens[where].end, text: ` ${predicateText}` }];
  }

  const hasOr = hasTopLevel(condition, 'OR');
  if (!hasOr) {
    const present = splitConjuncts(condition);
    const satisfied = predicateConjuncts(predicate).every((wanted) =>
      present.some(
        (have) => sameTokens(have, wanted) || sameTokens(have, withoutQualifier(wanted)),
      ),
    );
    if (satisfied) return [];
  }

  const last = condition[condition.length - 1];
  if (hasOr) {
    return [
      { at: condition[0].start, text: '(' },
      { at: last.end, text: `) AND ${predicateText}` },
    ];
  }
  return [{ at: last.end, text: ` AND ${predicateText}` }];
}

/**
 * Apply the identity's row filter to `sql`.
 *
 * Roles without a template pass through unchanged. A trailing `;` is
 * dropped from rewritten statements.
 */
export function applyRowFilter(sql: string, identity: Identity, rls: RlsPolicy): string {
  const rendered = renderRowFilter(identity, rls);
  if (rendered === null || rendered === '') return sql;

  const all = tokenize(sql);
  let count = all.length;
  while (count > 0 && all[count - 1].kind === 'semicolon') count--;
  if (count === 0) return sql;

  const tokens = all.slice(0, count);
  const statement = sql.slice(0, tokens[count - 1].end);
  const level = depths(tokens);

  const renderedTokens = tokenize(rendered);
  const edits = branches(tokens, level).flatMap((range) =>
    branchEdits(statement, tokens, level, range, rendered, renderedTokens),
  );
  if (edits.length === 0) return sql;

  let result = statement;
  for (const edit of edits.sort((a, b) => b.at - a.at)) {
    result = result.slice(0, edit.at) + edit.text + result.slice(edit.at);
  }
  return result;
}
