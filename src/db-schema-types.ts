/**
 * Type definitions for database schema representation
 * Produced by a schema analyzer and consumed by the reverse-mapping engine
 */

export interface QualifiedName {
  schema?: string;
  name: string;
}

export type DbType =
  | { kind: 'string' }
  | { kind: 'int32' }
  | { kind: 'int64' }
  | { kind: 'real' }
  | { kind: 'bool' }
  | { kind: 'date' }
  | { kind: 'time' }
  | { kind: 'timestamp' }
  | { kind: 'timestampZoned' }
  | { kind: 'blob' }
  | { kind: 'other'; typeName: string }; // dialect-specific type, e.g. "character varying(255)"

export interface ColumnInfo {
  name: string;
  nullable: boolean;
  type: DbType;
  defaultValue?: string;
}

/**
 * Ordered by rank: constraint < index < primary < primaryAuto.
 * primaryAuto is a single-column auto-incrementing primary key.
 */
export type UniqueType = 'constraint' | 'index' | 'primary' | 'primaryAuto';

export type UniqueField = { column: string } | { expression: string };

export interface UniqueDefInfo {
  name?: string;
  type: UniqueType;
  fields: UniqueField[];
}

export type ReferenceAction = 'no action' | 'restrict' | 'cascade' | 'set null' | 'set default';

export interface ReferencedColumn {
  child: string;
  parent: string;
}

export interface ReferenceInfo {
  name?: string;
  referencedTable: QualifiedName;
  columns: ReferencedColumn[];
  onDelete?: ReferenceAction;
  onUpdate?: ReferenceAction;
}

export interface TableInfo {
  name: QualifiedName;
  columns: ColumnInfo[];
  uniques: UniqueDefInfo[];
  references: ReferenceInfo[];
}

/**
 * Tables keyed by tableKey(), iterated in key order
 */
export type TableClosureMap = Map<string, TableInfo>;

export function tableKey(name: QualifiedName): string {
  return name.schema === undefined ? name.name : `${name.schema}.${name.name}`;
}

export function showQualifiedName(name: QualifiedName): string {
  return name.schema === undefined ? `"${name.name}"` : `"${name.schema}"."${name.name}"`;
}

/**
 * Build a closure map with keys in sorted order
 */
export function toTableMap(tables: Iterable<TableInfo>): TableClosureMap {
  const sorted = Array.from(tables).sort((a, b) => compareStrings(tableKey(a.name), tableKey(b.name)));
  return new Map(sorted.map(table => [tableKey(table.name), table]));
}

export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function dbTypeEquals(a: DbType, b: DbType): boolean {
  if (a.kind === 'other' && b.kind === 'other') {
    return a.typeName === b.typeName;
  }
  return a.kind === b.kind;
}

export function uniqueColumns(unique: UniqueDefInfo): string[] {
  const columns: string[] = [];
  for (const field of unique.fields) {
    if ('column' in field) columns.push(field.column);
  }
  return columns;
}

const UNIQUE_TYPE_RANK: Record<UniqueType, number> = {
  constraint: 0,
  index: 1,
  primary: 2,
  primaryAuto: 3,
};

export function compareUniqueTypes(a: UniqueType, b: UniqueType): number {
  return UNIQUE_TYPE_RANK[a] - UNIQUE_TYPE_RANK[b];
}

function uniqueFieldKey(field: UniqueField): string {
  return 'column' in field ? `c:${field.column}` : `e:${field.expression}`;
}

function sortedFieldKeys(fields: UniqueField[]): string[] {
  return fields.map(uniqueFieldKey).sort(compareStrings);
}

/**
 * Element by element; a list sorts before any longer list it is a prefix of
 */
export function compareStringLists(a: string[], b: string[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const order = compareStrings(a[i] ?? '', b[i] ?? '');
    if (order !== 0) return order;
  }
  return a.length - b.length;
}

export function sameUniqueFields(a: UniqueField[], b: UniqueField[]): boolean {
  return compareStringLists(sortedFieldKeys(a), sortedFieldKeys(b)) === 0;
}

export function uniqueEquals(a: UniqueDefInfo, b: UniqueDefInfo): boolean {
  return (
    a.name === b.name &&
    a.type === b.type &&
    compareStringLists(a.fields.map(uniqueFieldKey), b.fields.map(uniqueFieldKey)) === 0
  );
}

/**
 * Total order on uniques: field set, then type, then declared name (unnamed first)
 */
export function compareUniques(a: UniqueDefInfo, b: UniqueDefInfo): number {
  return (
    compareStringLists(sortedFieldKeys(a.fields), sortedFieldKeys(b.fields)) ||
    compareUniqueTypes(a.type, b.type) ||
    compareOptionalStrings(a.name, b.name) ||
    compareStringLists(a.fields.map(uniqueFieldKey), b.fields.map(uniqueFieldKey))
  );
}

export function compareOptionalStrings(a: string | undefined, b: string | undefined): number {
  if (a === b) return 0;
  if (a === undefined) return -1;
  if (b === undefined) return 1;
  return compareStrings(a, b);
}
