/**
 * Statement extractor.
 *
 * Recovers the tables and (table, column) pairs a SQL statement reads by
 * running a small state machine over the token stream. A spurious
 * reference only costs a denial; a missed one is a grant bypass, so when in
 * doubt a name is recorded.
 *
 * Rules:
 *  - function names are skipped, their arguments are not
 *  - only targets of FROM / JOIN / TABLE (and comma-separated FROM lists)
 *    are relations; FROM inside a call (EXTRACT(x FROM y)) is not
 *  - a parenthesis opening SELECT / WITH / VALUES / TABLE is a subquery,
 *    even as a call argument (ARRAY(SELECT ...))
 *  - a CTE name is visible only inside the parenthesis level that declares
 *    it, and only after its body unless the WITH is RECURSIVE
 *  - table aliases are tracked so `o.total` resolves to `orders.total`; an
 *    alias bound more than once resolves to every binding
 *  - `*` and `t.*` expand to every catalogue column of the tables involved
 *  - output aliases (AS x) and cast targets (::type) are not columns
 */

import type { ColumnReference, ExtractedReferences } from '../../shared/types';
import type { SchemaCatalog } from '../db/schema-catalog';
import { isKeyword, isNameToken, tokenize, type SqlToken } from '../lib/sql-tokenizer';

type FromState = 'none' | 'expectItem' | 'afterItem' | 'expectAlias' | 'condition';
type CteState = 'none' | 'expectName' | 'afterName';
type FrameKind = 'statement' | 'subquery' | 'function' | 'group';

/** Parser state for one parenthesis level. */
interface Frame {
  kind: FrameKind;
  from: FromState;
  inFrom: boolean;
  cte: CteState;
  /** Relation the next alias binds to; null for derived tables and CTEs. */
  lastRelation: string | null;
  /** Opened in FROM-item position (subquery, table function, join group). */
  fromItem: boolean;
  /** CTE names declared at this level. */
  cteNames: Set<string>;
  recursive: boolean;
  /** Declared CTE whose body has not closed yet. */
  pendingCte: string | null;
  /** Set on the frame of a CTE body: the name it defines in the parent. */
  cteBody: string | null;
}

/** Keywords that close a FROM clause. */
const CLAUSE_END = new Set([
  'WHERE', 'GROUP', 'HAVING', 'ORDER', 'LIMIT', 'OFFSET', 'FETCH', 'WINDOW',
  'FOR', 'UNION', 'INTERSECT', 'EXCEPT', 'RETURNING', 'INTO', 'VALUES', 'SET',
]);

function newFrame(kind: FrameKind, fromItem: boolean, cteBody: string | null = null): Frame {
  const joinGroup = kind === 'group' && fromItem;
  return {
    kind,
    from: joinGroup ? 'expectItem' : 'none',
    inFrom: joinGroup,
    cte: 'none',
    lastRelation: null,
    fromItem,
    cteNames: new Set(),
    recursive: false,
    pendingCte: null,
    cteBody,
  };
}

class ReferenceCollector {
  private readonly frames: Frame[] = [newFrame('statement', false)];
  private readonly tables = new Set<string>();
  private readonly unresolved = new Set<string>();
  private readonly aliases = new Map<string, Set<string | null>>();
  /** Column chains in source order; a trailing '*' marks a wildcard. */
  private readonly candidates: string[][] = [];
  private derivedRelations = 0;
  private cteCount = 0;
  private pendingFunction = false;

  constructor(
    private readonly tokens: readonly SqlToken[],
    private readonly catalog: SchemaCatalog,
  ) {}

  run(): ExtractedReferences {
    let i = 0;
    while (i < this.tokens.length) {
      i = this.step(i);
    }
    return {
      tables: this.tables,
      columns: this.resolveColumns(),
      unresolvedTables: this.unresolved,
    };
  }

  private get frame(): Frame {
    return this.frames[this.frames.length - 1];
  }

  private step(i: number): number {
    const token = this.tokens[i];
    switch (token.kind) {
      case 'keyword':
        this.onKeyword(token.value);
        return i + 1;
      case 'identifier':
      case 'quoted_identifier':
        return this.onName(i);
      case 'open_paren':
        this.onOpenParen(i);
        return i + 1;
      case 'close_paren':
        this.onCloseParen();
        return i + 1;
      case 'comma':
        this.onComma();
        return i + 1;
      case 'operator':
        if (token.value === '*') this.onStar(i);
        return i + 1;
      default:
        return i + 1;
    }
  }

  private onKeyword(word: string): void {
    const frame = this.frame;

    if (word === 'SELECT') {
      frame.cte = 'none';
      frame.inFrom = false;
      frame.from = 'none';
      return;
    }
    if (frame.kind === 'function') return;

    switch (word) {
      case 'WITH':
        if (!frame.inFrom) {
          frame.cte = 'expectName';
          frame.recursive = false;
        }
        return;
      case 'RECURSIVE':
        if (frame.cte === 'expectName') frame.recursive = true;
        return;
      case 'FROM':
      case 'JOIN':
      case 'TABLE':
        frame.inFrom = true;
        frame.from = 'expectItem';
        return;
      case 'ON':
      case 'USING':
        frame.from = 'condition';
        return;
      case 'AS':
        if (frame.from === 'afterItem') frame.from = 'expectAlias';
        return;
      case 'LATERAL':
        return;
    }

    if (CLAUSE_END.has(word)) {
      frame.inFrom = false;
      frame.from = 'none';
    } else if (frame.from === 'afterItem' || frame.from === 'expectAlias') {
      // LEFT / INNER / NATURAL ... before the next JOIN
      frame.from = 'condition';
    }
  }

  private onName(i: number): number {
    const parts = [this.tokens[i].value];
    let j = i + 1;
    while (this.tokens[j]?.kind === 'dot') {
      const part = this.tokens[j + 1];
      if (isNameToken(part)) {
        parts.push(part.value);
      } else if (part?.kind === 'keyword') {
        parts.push(part.value.toLowerCase());
      } else if (part?.kind === 'operator' && part.value === '*') {
        parts.push('*');
        j += 2;
        break;
      } else {
        j += 1;
        break;
      }
      j += 2;
    }

    const frame = this.frame;
    const previous = this.tokens[i - 1];

    // Before the call check: `name (a, b) AS (...)` is a column list.
    if (frame.kind !== 'function' && frame.cte === 'expectName' && !frame.inFrom) {
      this.declareCte(parts[parts.length - 1]);
      return j;
    }

    if (this.tokens[j]?.kind === 'open_paren') {
      this.pendingFunction = true;
      return j;
    }

    if (frame.kind !== 'function') {
      if (frame.from === 'expectItem') {
        this.addRelation(parts);
        frame.from = 'afterItem';
        return j;
      }
      if ((frame.from === 'afterItem' || frame.from === 'expectAlias') && parts.length === 1) {
        this.bindAlias(parts[0], frame.lastRelation);
        frame.from = 'condition';
        return j;
      }
    }

    if (isKeyword(previous, 'AS')) return j;
    if (previous?.kind === 'operator' && previous.value === '::') return j;

    this.candidates.push(parts);
    return j;
  }

  private onOpenParen(i: number): void {
    const parent = this.frame;
    let kind: FrameKind;
    if (isKeyword(this.tokens[i + 1], 'SELECT', 'WITH', 'VALUES', 'TABLE')) {
      kind = 'subquery';
    } else if (this.pendingFunction || isKeyword(this.tokens[i - 1], 'CAST')) {
      kind = 'function';
    } else {
      kind = 'group';
    }
    this.pendingFunction = false;

    const fromItem = parent.kind !== 'function' && parent.from === 'expectItem';
    const cteBody =
      parent.cte === 'afterName' && isKeyword(this.tokens[i - 1], 'AS', 'MATERIALIZED')
        ? parent.pendingCte
        : null;
    this.frames.push(newFrame(kind, fromItem, cteBody));
  }

  private onCloseParen(): void {
    if (this.frames.length === 1) return;
    const closed = this.frames.pop();
    if (closed?.cteBody) {
      this.frame.cteNames.add(closed.cteBody);
      this.frame.pendingCte = null;
    }
    if (closed?.fromItem) {
      const parent = this.frame;
      parent.from = 'afterItem';
      parent.lastRelation = null;
      this.derivedRelations++;
    }
  }

  private onComma(): void {
    const frame = this.frame;
    if (frame.kind === 'function') return;
    if (frame.inFrom) {
      frame.from = 'expectItem';
    } else if (frame.cte === 'afterName') {
      frame.cte = 'expectName';
    }
  }

  private onStar(i: number): void {
    if (this.frame.kind === 'function') return;
    const previous = this.tokens[i - 1];
    if (isKeyword(previous, 'SELECT', 'DISTINCT', 'ALL') || previous?.kind === 'comma') {
      this.candidates.push(['*']);
    }
  }

  private declareCte(name: string): void {
    const frame = this.frame;
    if (frame.recursive) {
      frame.cteNames.add(name);
    } else {
      frame.pendingCte = name;
    }
    frame.cte = 'afterName';
    this.cteCount++;
  }

  /** True when `name` is a CTE visible from the current level. */
  private isCteInScope(name: string): boolean {
    return this.frames.some((frame) => frame.cteNames.has(name));
  }

  private bindAlias(alias: string, relation: string | null): void {
    const bindings = this.aliases.get(alias);
    if (bindings) {
      bindings.add(relation);
    } else {
      this.aliases.set(alias, new Set([relation]));
    }
  }

  private addRelation(parts: string[]): void {
    const frame = this.frame;
    const name = parts[parts.length - 1];
    const schema = parts.length > 1 ? parts[parts.length - 2] : null;

    if (schema === null && this.isCteInScope(name)) {
      frame.lastRelation = null;
      this.derivedRelations++;
      return;
    }
    if ((schema === null || schema === this.catalog.schemaName) && this.catalog.hasTable(name)) {
      this.tables.add(name);
      frame.lastRelation = name;
      return;
    }
    this.unresolved.add(parts.join('.'));
    frame.lastRelation = null;
  }

  /**
   * Tables a qualifier may stand for; null marks a derived table or CTE.
   * Every alias binding counts, and so does a referenced table of the same
   * name, since nested scopes can shadow one another.
   */
  private resolveQualifier(qualifier: string): Array<string | null> {
    const bindings = this.aliases.get(qualifier);
    if (!bindings) return [this.catalog.hasTable(qualifier) ? qualifier : null];
    const targets = new Set(bindings);
    if (this.tables.has(qualifier)) targets.add(qualifier);
    return [...targets];
  }

  private resolveColumns(): ColumnReference[] {
    const found = new Map<string, ColumnReference>();
    const add = (table: string, column: string) => {
      found.set(`${table}\u0000${column}`, { table, column });
    };
    const addAll = (table: string) => {
      for (const column of this.catalog.columnsOf(table)) add(table, column);
    };

    const soleTable =
      this.tables.size === 1 &&
      this.unresolved.size === 0 &&
      this.cteCount === 0 &&
      this.derivedRelations === 0
        ? [...this.tables][0]
        : null;

    for (const parts of this.candidates) {
      const column = parts[parts.length - 1];

      if (parts.length === 1) {
        if (column === '*') {
          for (const table of this.tables) addAll(table);
          continue;
        }
        // Whole-row reference: SELECT o FROM orders o
        if (this.aliases.has(column) || this.tables.has(column)) {
          for (const rowSource of this.resolveQualifier(column)) {
            if (rowSource !== null) addAll(rowSource);
          }
        }

        if (soleTable !== null && this.catalog.hasColumn(soleTable, column)) {
          add(soleTable, column);
        } else if (this.catalog.hasColumnAnywhere(column)) {
          add('', column);
        }
        continue;
      }

      for (const table of this.resolveQualifier(parts[parts.length - 2])) {
        if (column === '*') {
          if (table !== null) addAll(table);
        } else if (table !== null) {
          if (this.catalog.hasColumn(table, column)) add(table, column);
        } else if (this.catalog.hasColumnAnywhere(column)) {
          add('', column);
        }
      }
    }

    return [...found.values()];
  }
}

/**
 * Extract the table and column references of a statement.
 *
 * Accepts raw SQL or the output of `tokenize` so callers that already
 * lexed the statement do not pay for it twice.
 */
export function extractReferences(
  sql: string | readonly SqlToken[],
  catalog: SchemaCatalog,
): ExtractedReferences {
  const tokens = typeof sql === 'string' ? tokenize(sql) : sql;
  return new ReferenceCollector(tokens, catalog).run();
}
