/**
 * Lexer for PostgreSQL-flavoured SQL.
 *
 * Produces the significant tokens of a statement (whitespace and comments
 * are dropped) together with their source offsets, so later passes can both
 * classify identifiers and splice text back into the original statement.
 * Malformed input never throws: an unterminated string or quoted identifier
 * simply runs to the end of the text.
 */

export type TokenKind =
  | 'keyword'
  | 'identifier'
  | 'quoted_identifier'
  | 'string'
  | 'number'
  | 'parameter'
  | 'operator'
  | 'comma'
  | 'dot'
  | 'open_paren'
  | 'close_paren'
  | 'semicolon';

export interface SqlToken {
  kind: TokenKind;
  /**
   * Normalised value: upper case for keywords, lower case for unquoted
   * identifiers, unescaped content for quoted identifiers, raw text otherwise.
   */
  value: string;
  start: number;
  end: number;
}

/**
 * Reserved words that can never be a bare table or column name.
 * Context-dependent words (FIRST, LAST, ROWS, OVER, FILTER, ...) are left out
 * on purpose and lexed as identifiers.
 */
export const SQL_KEYWORDS = new Set([
  'ALL', 'ALTER', 'AND', 'ANY', 'AS', 'ASC', 'BETWEEN', 'BY', 'CASE', 'CAST',
  'CREATE', 'CROSS', 'DELETE', 'DESC', 'DISTINCT', 'DROP', 'ELSE', 'END',
  'EXCEPT', 'EXISTS', 'FALSE', 'FETCH', 'FOR', 'FROM', 'FULL', 'GRANT',
  'GROUP', 'HAVING', 'ILIKE', 'IN', 'INNER', 'INSERT', 'INTERSECT', 'INTO',
  'IS', 'JOIN', 'LATERAL', 'LEFT', 'LIKE', 'LIMIT', 'MATERIALIZED', 'NATURAL',
  'NOT', 'NULL', 'OFFSET', 'ON', 'OR', 'ORDER', 'OUTER', 'RECURSIVE',
  'RETURNING', 'REVOKE', 'RIGHT', 'SELECT', 'SET', 'SIMILAR', 'SOME', 'TABLE',
  'THEN', 'TRUE', 'TRUNCATE', 'UNION', 'UPDATE', 'USING', 'VALUES', 'WHEN',
  'WHERE', 'WINDOW', 'WITH',
]);

const WORD_START = /[A-Za-z_\u0080-\uffff]/;
const WORD = /[A-Za-z0-9_$\u0080-\uffff]*/y;
const NUMBER = /(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/y;
const DOLLAR_TAG = /\$(?:[A-Za-z_][A-Za-z0-9_]*)?\$/y;
const OPERATOR_CHARS = '+-/<>=~!@#%^&|`?:';
const STRING_PREFIXES = new Set(['e', 'n', 'b', 'x']);

function readQuoted(sql: string, from: number, quote: string, backslashEscapes: boolean): { content: string; end: number } {
  let content = '';
  let i = from + 1;
  while (i < sql.length) {
    const ch = sql[i];
    if (backslashEscapes && ch === '\\' && i + 1 < sql.length) {
      content += sql[i + 1];
      i += 2;
      continue;
    }
    if (ch === quote) {
      if (sql[i + 1] === quote) {
        content += quote;
        i += 2;
        continue;
      }
      return { content, end: i + 1 };
    }
    content += ch;
    i++;
  }
  return { content, end: sql.length };
}

function matchAt(pattern: RegExp, sql: string, at: number): string | null {
  pattern.lastIndex = at;
  const match = pattern.exec(sql);
  return match ? match[0] : null;
}

/**
 * Split a SQL string into significant tokens.
 */
export function tokenize(sql: string): SqlToken[] {
  const tokens: SqlToken[] = [];
  let i = 0;

  const push = (kind: TokenKind, value: string, start: number, end: number) => {
    tokens.push({ kind, value, start, end });
    i = end;
  };

  while (i < sql.length) {
    const ch = sql[i];
    const next = sql[i + 1];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    // Comments
    if (ch === '-' && next === '-') {
      const newline = sql.indexOf('\n', i);
      i = newline === -1 ? sql.length : newline + 1;
      continue;
    }
    if (ch === '/' && next === '*') {
      const close = sql.indexOf('*/', i + 2);
      i = close === -1 ? sql.length : close + 2;
      continue;
    }

    if (ch === "'") {
      const { content, end } = readQuoted(sql, i, "'", false);
      push('string', content, i, end);
      continue;
    }

    if (ch === '"') {
      const { content, end } = readQuoted(sql, i, '"', false);
      push('quoted_identifier', content, i, end);
      continue;
    }

    if (ch === '$') {
      if (next !== undefined && /\d/.test(next)) {
        const digits = matchAt(/\$\d+/y, sql, i) ?? '$';
        push('parameter', digits, i, i + digits.length);
        continue;
      }
      const tag = matchAt(DOLLAR_TAG, sql, i);
      if (tag) {
        const close = sql.indexOf(tag, i + tag.length);
        const end = close === -1 ? sql.length : close + tag.length;
        const content = sql.slice(i + tag.length, close === -1 ? sql.length : close);
        push('string', content, i, end);
        continue;
      }
    }

    if (/\d/.test(ch) || (ch === '.' && next !== undefined && /\d/.test(next))) {
      const number = matchAt(NUMBER, sql, i) ?? ch;
      push('number', number, i, i + number.length);
      continue;
    }

    if (WORD_START.test(ch)) {
      const word = ch + (matchAt(WORD, sql, i + 1) ?? '');
      const end = i + word.length;
      const lower = word.toLowerCase();

      // Prefixed string literals: E'...', N'...', B'...', X'...'
      if (sql[end] === "'" && STRING_PREFIXES.has(lower)) {
        const { content, end: stringEnd } = readQuoted(sql, end, "'", lower === 'e');
        push('string', content, i, stringEnd);
        continue;
      }

      const upper = word.toUpperCase();
      if (SQL_KEYWORDS.has(upper)) {
        push('keyword', upper, i, end);
      } else {
        push('identifier', lower, i, end);
      }
      continue;
    }

    switch (ch) {
      case ',':
        push('comma', ch, i, i + 1);
        continue;
      case '.':
        push('dot', ch, i, i + 1);
        continue;
      case '(':
        push('open_paren', ch, i, i + 1);
        continue;
      case ')':
        push('close_paren', ch, i, i + 1);
        continue;
      case ';':
        push('semicolon', ch, i, i + 1);
        continue;
      case '*':
        push('operator', ch, i, i + 1);
        continue;
    }

    if (OPERATOR_CHARS.includes(ch)) {
      let end = i + 1;
      while (
        end < sql.length &&
        OPERATOR_CHARS.includes(sql[end]) &&
        !(sql[end] === '-' && sql[end + 1] === '-') &&
        !(sql[end] === '/' && sql[end + 1] === '*')
      ) {
        end++;
      }
      push('operator', sql.slice(i, end), i, end);
      continue;
    }

    push('operator', ch, i, i + 1);
  }

  return tokens;
}

/** True for tokens that can name a table or column. */
export function isNameToken(
  token: SqlToken | undefined,
): token is SqlToken & { kind: 'identifier' | 'quoted_identifier' } {
  return token !== undefined && (token.kind === 'identifier' || token.kind === 'quoted_identifier');
}

/** True when `token` is the keyword `word` (upper case). */
export function isKeyword(token: SqlToken | undefined, ...words: string[]): boolean {
  return token !== undefined && token.kind === 'keyword' && words.includes(token.value);
}
