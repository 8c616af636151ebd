/**
 * Schema catalogue.
 *
 * Introspects the target database once at startup and exposes the
 * table -> column lists and foreign-key relationships every authorization
 * decision depends on. The catalogue is immutable for the lifetime of the
 * process; call `loadSchemaCatalog` again to rebuild it.
 */

import type { Pool } from 'pg';

import type {
  ColumnRow,
  ForeignKeyRelationship,
  ForeignKeyRow,
  RbacPolicy,
} from '../../shared/types';
import { SchemaUnavailableError } from '../lib/errors';

const TABLES_SQL = `
  SELECT table_name
  FROM information_schema.tables
  WHERE table_schema = $1
    AND table_type IN ('BASE TABLE', 'VIEW')
  ORDER BY table_name
`;

const COLUMNS_SQL = `
  SELECT table_name, column_name
  FROM information_schema.columns
  WHERE table_schema = $1
  ORDER BY table_name, ordinal_position
`;

const FOREIGN_KEYS_SQL = `
  SELECT
    tc.table_name,
    kcu.column_name,
    ccu.table_name  AS foreign_table_name,
    ccu.column_name AS foreign_column_name
  FROM information_schema.table_constraints AS tc
  JOIN information_schema.key_column_usage AS kcu
    ON tc.constraint_name = kcu.constraint_name
   AND tc.table_schema = kcu.table_schema
  JOIN information_schema.constraint_column_usage AS ccu
    ON ccu.constraint_name = tc.constraint_name
   AND ccu.table_schema = tc.table_schema
  WHERE tc.constraint_type = 'FOREIGN KEY'
    AND tc.table_schema = $1
  ORDER BY tc.table_name, kcu.ordinal_position
`;

export class SchemaCatalog {
  readonly schemaName: string;
  private readonly tables: ReadonlyMap<string, readonly string[]>;
  private readonly columnSets: ReadonlyMap<string, ReadonlySet<string>>;
  readonly relationships: readonly ForeignKeyRelationship[];

  constructor(
    schemaName: string,
    tables: Iterable<[string, readonly string[]]>,
    relationships: readonly ForeignKeyRelationship[] = [],
  ) {
    this.schemaName = schemaName;

    const tableMap = new Map<string, readonly string[]>();
    const columnSets = new Map<string, ReadonlySet<string>>();
    for (const [table, columns] of tables) {
      tableMap.set(table, Object.freeze([...columns]));
      columnSets.set(table, new Set(columns));
    }
    this.tables = tableMap;
    this.columnSets = columnSets;
    this.relationships = Object.freeze(relationships.map((r) => Object.freeze({ ...r })));
    Object.freeze(this);
  }

  /** Table names in catalogue order. */
  tableNames(): string[] {
    return [...this.tables.keys()];
  }

  hasTable(table: string): boolean {
    return this.tables.has(table);
  }

  /** Ordered column list of a table, empty when the table is unknown. */
  columnsOf(table: string): readonly string[] {
    return this.tables.get(table) ?? [];
  }

  hasColumn(table: string, column: string): boolean {
    return this.columnSets.get(table)?.has(column) ?? false;
  }

  /** True when any table in the catalogue has a column with this name. */
  hasColumnAnywhere(column: string): boolean {
    for (const columns of this.columnSets.values()) {
      if (columns.has(column)) return true;
    }
    return false;
  }

  /** The first foreign key linking `childTable` to `parentTable`, if any. */
  findRelationship(childTable: string, parentTable: string): ForeignKeyRelationship | undefined {
    return this.relationships.find(
      (r) => r.childTable === childTable && r.parentTable === parentTable,
    );
  }

  /**
   * The subset of the catalogue a role may see: allowed tables only, each
   * restricted to its allowed columns, plus the relationships between them.
   * A role without grants gets an empty catalogue.
   */
  filterForRole(role: string, rbac: RbacPolicy): SchemaCatalog {
    const allowed = rbac.get(role);
    if (!allowed) return new SchemaCatalog(this.schemaName, []);

    const visible: Array<[string, string[]]> = [];
    for (const [table, columns] of this.tables) {
      const allowedColumns = allowed.get(table);
      if (!allowedColumns) continue;
      visible.push([table, columns.filter((c) => allowedColumns.has(c))]);
    }

    const visibleTables = new Set(visible.map(([table]) => table));
    const relationships = this.relationships.filter(
      (r) => visibleTables.has(r.childTable) && visibleTables.has(r.parentTable),
    );
    return new SchemaCatalog(this.schemaName, visible, relationships);
  }
}

/**
 * Build a catalogue from raw introspection rows.
 *
 * Tables without column rows are kept with an empty column list. For
 * composite foreign keys only the first column pair is recorded.
 */
export function buildSchemaCatalog(
  schemaName: string,
  tableNames: readonly string[],
  columnRows: readonly ColumnRow[],
  foreignKeyRows: readonly ForeignKeyRow[],
): SchemaCatalog {
  const tables = new Map<string, string[]>(tableNames.map((t) => [t, []]));
  for (const row of columnRows) {
    const columns = tables.get(row.table_name);
    if (columns) columns.push(row.column_name);
  }

  const seen = new Set<string>();
  const relationships: ForeignKeyRelationship[] = [];
  for (const fk of foreignKeyRows) {
    const key = `${fk.table_name}->${fk.foreign_table_name}`;
    if (seen.has(key)) continue;
    seen.add(key);
    relationships.push({
      childTable: fk.table_name,
      childColumn: fk.column_name,
      parentTable: fk.foreign_table_name,
      parentColumn: fk.foreign_column_name,
    });
  }

  return new SchemaCatalog(schemaName, tables, relationships);
}

/**
 * Introspect the live database.
 *
 * Throws `SchemaUnavailableError` when the database cannot be reached; there
 * is no degraded mode.
 */
export async function loadSchemaCatalog(pool: Pool, schemaName = 'public'): Promise<SchemaCatalog> {
  try {
    const [tablesResult, columnsResult, fksResult] = await Promise.all([
      pool.query<{ table_name: string }>(TABLES_SQL, [schemaName]),
      pool.query<ColumnRow>(COLUMNS_SQL, [schemaName]),
      pool.query<ForeignKeyRow>(FOREIGN_KEYS_SQL, [schemaName]),
    ]);

    return buildSchemaCatalog(
      schemaName,
      tablesResult.rows.map((r) => r.table_name),
      columnsResult.rows,
      fksResult.rows,
    );
  } catch (error) {
    throw new SchemaUnavailableError(
      `Failed to introspect schema "${schemaName}"`,
      { cause: error },
    );
  }
}

/**
 * Render the catalogue as SQL comments for an LLM system prompt.
 */
export function describeSchema(catalog: SchemaCatalog): string {
  const lines: string[] = [];
  for (const table of catalog.tableNames()) {
    lines.push(`-- Table: ${table}`);
    for (const column of catalog.columnsOf(table)) {
      lines.push(`--   ${column}`);
    }
    for (const fk of catalog.relationships.filter((r) => r.childTable === table)) {
      lines.push(`--   FK: ${fk.childColumn} -> ${fk.parentTable}(${fk.parentColumn})`);
    }
    lines.push('');
  }
  return lines.join('\n');
}
