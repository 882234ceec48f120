/**
 * Schema analyzer
 *
 * Reads tables, columns, uniques and foreign keys from a live database catalog.
 * The reverse-mapping engine only depends on the SchemaAnalyzer interface.
 */

import {
  ColumnInfo,
  DbType,
  QualifiedName,
  ReferenceAction,
  ReferenceInfo,
  TableInfo,
  UniqueDefInfo,
  UniqueField,
  showQualifiedName,
} from './db-schema-types.js';
import { DbDialect, postgresDialect } from './db-dialect.js';
import { SchemaAnalysisError } from './errors.js';

export interface SchemaAnalyzer {
  readonly dialect: DbDialect;
  listTables(schema?: string): Promise<string[]>;
  /** Resolves to undefined when the table does not exist */
  analyzeTable(name: QualifiedName): Promise<TableInfo | undefined>;
  getCurrentSchema(): Promise<string | undefined>;
}

export interface PostgresQueryResult {
  rows: Array<Record<string, unknown>>;
}

export type PostgresQueryFn = (sql: string, params?: unknown[]) => Promise<PostgresQueryResult>;

const CURRENT_SCHEMA_QUERY = `SELECT current_schema() AS schema_name`;

const TABLES_QUERY = `
  SELECT c.relname AS table_name
  FROM pg_class c
  JOIN pg_namespace n ON n.oid = c.relnamespace
  WHERE n.nspname = COALESCE($1::text, current_schema())
    AND c.relkind IN ('r', 'p')
    AND NOT c.relispartition
  ORDER BY c.relname
`;

const TABLE_QUERY = `
  SELECT c.oid AS table_oid, n.nspname AS schema_name
  FROM pg_class c
  JOIN pg_namespace n ON n.oid = c.relnamespace
  WHERE n.nspname = COALESCE($1::text, current_schema())
    AND c.relname = $2
    AND c.relkind IN ('r', 'p')
`;

const COLUMNS_QUERY = `
  SELECT
    a.attname AS column_name,
    NOT a.attnotnull AS is_nullable,
    t.typname AS udt_name,
    format_type(a.atttypid, a.atttypmod) AS formatted_type,
    a.atttypmod AS type_modifier,
    pg_get_expr(d.adbin, d.adrelid) AS column_default,
    a.attidentity <> '' AS is_identity
  FROM pg_attribute a
  JOIN pg_type t ON t.oid = a.atttypid
  LEFT JOIN pg_attrdef d ON d.adrelid = a.attrelid AND d.adnum = a.attnum
  WHERE a.attrelid = $1
    AND a.attnum > 0
    AND NOT a.attisdropped
  ORDER BY a.attnum
`;

const CONSTRAINTS_QUERY = `
  SELECT
    con.conname AS constraint_name,
    con.contype AS constraint_type,
    ARRAY(
      SELECT a.attname::text
      FROM unnest(con.conkey) WITH ORDINALITY AS k(attnum, ord)
      JOIN pg_attribute a ON a.attrelid = con.conrelid AND a.attnum = k.attnum
      ORDER BY k.ord
    ) AS column_names
  FROM pg_constraint con
  WHERE con.conrelid = $1
    AND con.contype IN ('p', 'u')
  ORDER BY con.conname
`;

// unique indexes that do not back a constraint; expression keys have indkey = 0 and no attribute
const INDEXES_QUERY = `
  SELECT
    i.relname AS index_name,
    ARRAY(
      SELECT a.attname::text
      FROM generate_series(0, ix.indnkeyatts - 1) AS k(n)
      LEFT JOIN pg_attribute a ON a.attrelid = ix.indrelid AND a.attnum = ix.indkey[k.n] AND ix.indkey[k.n] <> 0
      ORDER BY k.n
    ) AS key_columns,
    ARRAY(
      SELECT CASE WHEN ix.indkey[k.n] = 0 THEN pg_get_indexdef(ix.indexrelid, k.n + 1, true) END
      FROM generate_series(0, ix.indnkeyatts - 1) AS k(n)
      ORDER BY k.n
    ) AS key_expressions
  FROM pg_index ix
  JOIN pg_class i ON i.oid = ix.indexrelid
  WHERE ix.indrelid = $1
    AND ix.indisunique
    AND ix.indpred IS NULL
    AND NOT EXISTS (SELECT 1 FROM pg_constraint con WHERE con.conindid = ix.indexrelid)
  ORDER BY i.relname
`;

const FOREIGN_KEYS_QUERY = `
  SELECT
    con.conname AS constraint_name,
    fn.nspname AS parent_schema,
    ft.relname AS parent_table,
    ARRAY(
      SELECT a.attname::text
      FROM unnest(con.conkey) WITH ORDINALITY AS k(attnum, ord)
      JOIN pg_attribute a ON a.attrelid = con.conrelid AND a.attnum = k.attnum
      ORDER BY k.ord
    ) AS child_columns,
    ARRAY(
      SELECT a.attname::text
      FROM unnest(con.confkey) WITH ORDINALITY AS k(attnum, ord)
      JOIN pg_attribute a ON a.attrelid = con.confrelid AND a.attnum = k.attnum
      ORDER BY k.ord
    ) AS parent_columns,
    con.confdeltype AS on_delete,
    con.confupdtype AS on_update
  FROM pg_constraint con
  JOIN pg_class ft ON ft.oid = con.confrelid
  JOIN pg_namespace fn ON fn.oid = ft.relnamespace
  WHERE con.conrelid = $1
    AND con.contype = 'f'
  ORDER BY con.conname
`;

const REFERENCE_ACTIONS: Record<string, ReferenceAction> = {
  a: 'no action',
  r: 'restrict',
  c: 'cascade',
  n: 'set null',
  d: 'set default',
};

const PRIMITIVE_TYPES: Record<string, DbType> = {
  int4: { kind: 'int32' },
  int8: { kind: 'int64' },
  float8: { kind: 'real' },
  bool: { kind: 'bool' },
  date: { kind: 'date' },
  time: { kind: 'time' },
  timestamp: { kind: 'timestamp' },
  timestamptz: { kind: 'timestampZoned' },
  bytea: { kind: 'blob' },
};

/**
 * varchar without a length is the dialect's string type; any other type keeps its formatted name
 */
export function readPostgresType(udtName: string, formattedType: string, typeModifier: number): DbType {
  if (udtName === 'varchar' && typeModifier < 0) {
    return { kind: 'string' };
  }
  return PRIMITIVE_TYPES[udtName] ?? { kind: 'other', typeName: formattedType };
}

function readString(row: Record<string, unknown>, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') {
    throw new SchemaAnalysisError(`Expected text in column ${column}, got ${String(value)}`);
  }
  return value;
}

function readOptionalString(row: Record<string, unknown>, column: string): string | undefined {
  const value = row[column];
  return value === null || value === undefined ? undefined : readString(row, column);
}

function readBoolean(row: Record<string, unknown>, column: string): boolean {
  const value = row[column];
  if (typeof value !== 'boolean') {
    throw new SchemaAnalysisError(`Expected boolean in column ${column}, got ${String(value)}`);
  }
  return value;
}

function readNumber(row: Record<string, unknown>, column: string): number {
  const value = row[column];
  if (typeof value !== 'number') {
    throw new SchemaAnalysisError(`Expected number in column ${column}, got ${String(value)}`);
  }
  return value;
}

function readArray<T>(
  row: Record<string, unknown>,
  column: string,
  isItem: (item: unknown) => item is T
): T[] {
  const value = row[column];
  if (!Array.isArray(value) || !value.every(isItem)) {
    throw new SchemaAnalysisError(`Expected array in column ${column}`);
  }
  return value;
}

const isString = (item: unknown): item is string => typeof item === 'string';
const isOptionalString = (item: unknown): item is string | null => item === null || typeof item === 'string';

export class PostgresSchemaAnalyzer implements SchemaAnalyzer {
  readonly dialect: DbDialect = postgresDialect;
  private readonly query: PostgresQueryFn;

  constructor(query: PostgresQueryFn) {
    this.query = query;
  }

  async getCurrentSchema(): Promise<string | undefined> {
    const result = await this.run('Failed to read current schema', CURRENT_SCHEMA_QUERY);
    const [row] = result.rows;
    return row === undefined ? undefined : readOptionalString(row, 'schema_name');
  }

  async listTables(schema?: string): Promise<string[]> {
    const result = await this.run(`Failed to list tables of schema ${schema ?? '(current)'}`, TABLES_QUERY, [
      schema ?? null,
    ]);
    return result.rows.map(row => readString(row, 'table_name'));
  }

  async analyzeTable(name: QualifiedName): Promise<TableInfo | undefined> {
    const failure = `Failed to analyze table ${showQualifiedName(name)}`;
    const tableResult = await this.run(failure, TABLE_QUERY, [name.schema ?? null, name.name]);
    const [tableRow] = tableResult.rows;
    if (tableRow === undefined) {
      return undefined;
    }

    this.log(`🔬 Analyzing table ${showQualifiedName(name)}`);
    const oid = tableRow.table_oid;
    const schema = name.schema ?? readString(tableRow, 'schema_name');

    const columns = (await this.run(failure, COLUMNS_QUERY, [oid])).rows.map(row => ({
      column: this.readColumn(row),
      isIdentity: readBoolean(row, 'is_identity'),
    }));
    const constraintRows = (await this.run(failure, CONSTRAINTS_QUERY, [oid])).rows;
    const indexRows = (await this.run(failure, INDEXES_QUERY, [oid])).rows;
    const foreignKeyRows = (await this.run(failure, FOREIGN_KEYS_QUERY, [oid])).rows;

    const isAutoIncremented = (columnName: string): boolean =>
      columns.some(
        ({ column, isIdentity }) =>
          column.name === columnName && (isIdentity || (column.defaultValue?.startsWith('nextval(') ?? false))
      );

    const uniques: UniqueDefInfo[] = [
      ...constraintRows.map((row): UniqueDefInfo => {
        const columnNames = readArray(row, 'column_names', isString);
        const [only] = columnNames;
        const isPrimary = readString(row, 'constraint_type') === 'p';
        const autoIncremented = isPrimary && columnNames.length === 1 && only !== undefined && isAutoIncremented(only);
        return {
          name: readString(row, 'constraint_name'),
          type: autoIncremented ? 'primaryAuto' : isPrimary ? 'primary' : 'constraint',
          fields: columnNames.map((column): UniqueField => ({ column })),
        };
      }),
      ...indexRows.map(row => this.readIndex(row)),
    ];

    return {
      name: { schema, name: name.name },
      columns: columns.map(({ column }) => column),
      uniques,
      references: foreignKeyRows.map(row => this.readReference(row)),
    };
  }

  private readColumn(row: Record<string, unknown>): ColumnInfo {
    const column: ColumnInfo = {
      name: readString(row, 'column_name'),
      nullable: readBoolean(row, 'is_nullable'),
      type: readPostgresType(
        readString(row, 'udt_name'),
        readString(row, 'formatted_type'),
        readNumber(row, 'type_modifier')
      ),
    };
    const defaultValue = readOptionalString(row, 'column_default');
    if (defaultValue !== undefined) {
      column.defaultValue = defaultValue;
    }
    return column;
  }

  private readIndex(row: Record<string, unknown>): UniqueDefInfo {
    const name = readString(row, 'index_name');
    const columns = readArray(row, 'key_columns', isOptionalString);
    const expressions = readArray(row, 'key_expressions', isOptionalString);
    return {
      name,
      type: 'index',
      fields: columns.map((column, i): UniqueField => {
        if (column !== null) return { column };
        const expression = expressions[i];
        if (expression === null || expression === undefined) {
          throw new SchemaAnalysisError(`Index ${name} has a key with neither a column nor an expression`);
        }
        return { expression };
      }),
    };
  }

  private readReference(row: Record<string, unknown>): ReferenceInfo {
    const childColumns = readArray(row, 'child_columns', isString);
    const parentColumns = readArray(row, 'parent_columns', isString);
    if (childColumns.length !== parentColumns.length) {
      throw new SchemaAnalysisError(`Foreign key ${readString(row, 'constraint_name')} has mismatched column lists`);
    }

    const reference: ReferenceInfo = {
      name: readString(row, 'constraint_name'),
      referencedTable: { schema: readString(row, 'parent_schema'), name: readString(row, 'parent_table') },
      columns: childColumns.map((child, i) => ({ child, parent: parentColumns[i] ?? child })),
    };
    const onDelete = REFERENCE_ACTIONS[readString(row, 'on_delete')];
    const onUpdate = REFERENCE_ACTIONS[readString(row, 'on_update')];
    if (onDelete !== undefined) reference.onDelete = onDelete;
    if (onUpdate !== undefined) reference.onUpdate = onUpdate;
    return reference;
  }

  private async run(failure: string, sql: string, params?: unknown[]): Promise<PostgresQueryResult> {
    try {
      return await this.query(sql, params);
    } catch (error) {
      this.logError(failure, error);
      throw new SchemaAnalysisError(failure, error instanceof Error ? error : undefined);
    }
  }

  /**
   * Log progress messages; stdout is left to the generated output
   */
  private log(message: string): void {
    const timestamp = new Date().toISOString();
    console.error(`[${timestamp}] ${message}`);
  }

  private logError(message: string, error: unknown): void {
    const timestamp = new Date().toISOString();
    console.error(`[${timestamp}] ❌ ${message}: ${String(error)}`);
  }
}
