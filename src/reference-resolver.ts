/**
 * Reference resolution
 *
 * Decides how the columns of a foreign key are represented in a generated record:
 * a typed key to a mapped parent, or plain values when the parent is not mapped or
 * the nullability of child and parent columns does not allow a faithful key.
 */

import {
  ColumnInfo,
  ReferenceAction,
  ReferenceInfo,
  TableClosureMap,
  TableInfo,
  UniqueDefInfo,
  compareUniques,
  sameUniqueFields,
  tableKey,
  uniqueColumns,
  uniqueEquals,
} from './db-schema-types.js';
import type { DbDialect } from './db-dialect.js';
import type { ReverseNamingStyle } from './naming-style.js';
import { AmbiguousColumnReferenceError, MultipleAutoKeysError, findOne } from './errors.js';

/**
 * match: child and parent nullability are equal column by column
 * optional: a single nullable child column; the key is wrapped in an optional type
 * mismatch: no faithful key can be built
 */
export type NullabilityMatch = 'match' | 'optional' | 'mismatch';

export type ResolvedReference =
  | { kind: 'unmapped'; reference: ReferenceInfo; childColumns: ColumnInfo[] }
  | {
      kind: 'autoKey';
      reference: ReferenceInfo;
      childColumns: ColumnInfo[];
      parent: TableInfo;
      parentColumns: ColumnInfo[];
      nullability: NullabilityMatch;
    }
  | {
      kind: 'uniqueKey';
      reference: ReferenceInfo;
      childColumns: ColumnInfo[];
      parent: TableInfo;
      parentColumns: ColumnInfo[];
      unique: UniqueDefInfo;
      nullability: NullabilityMatch;
    };

export type ColumnGroup =
  | { kind: 'column'; column: ColumnInfo }
  | { kind: 'reference'; resolved: ResolvedReference };

export function getColumns(table: TableInfo, names: string[]): ColumnInfo[] {
  return names.map(name => findOne('column', (c: ColumnInfo) => c.name, name, table.columns));
}

/**
 * Columns of the table's auto-incrementing primary key
 */
export function autoKeyColumns(table: TableInfo): string[] {
  return table.uniques.filter(u => u.type === 'primaryAuto').flatMap(uniqueColumns);
}

/**
 * The single auto key column, or undefined when the table has none
 */
export function autoKeyColumn(table: TableInfo): string | undefined {
  const columns = autoKeyColumns(table);
  if (columns.length > 1) {
    throw new MultipleAutoKeysError(table.name, columns);
  }
  return columns[0];
}

/**
 * Non-auto uniques ordered by (sorted fields, type, name); positions in this list number the unique names
 */
export function tableUniqueDefs(table: TableInfo): UniqueDefInfo[] {
  return table.uniques.filter(u => u.type !== 'primaryAuto').sort(compareUniques);
}

export function findReference(table: TableInfo, column: string): ReferenceInfo | undefined {
  const references = table.references.filter(r => r.columns.some(c => c.child === column));
  if (references.length > 1) {
    throw new AmbiguousColumnReferenceError(table.name, column, references.length);
  }
  return references[0];
}

export function referenceMatchesUnique(reference: ReferenceInfo, unique: UniqueDefInfo): boolean {
  return sameUniqueFields(
    reference.columns.map(c => ({ column: c.parent })),
    unique.fields
  );
}

export function chooseReferencedUnique(
  style: ReverseNamingStyle,
  parent: TableInfo,
  reference: ReferenceInfo
): UniqueDefInfo {
  const candidates = parent.uniques.filter(u => referenceMatchesUnique(reference, u));
  return style.mkChooseReferencedUnique(parent.name, candidates);
}

export function compareNullability(childColumns: ColumnInfo[], parentColumns: ColumnInfo[]): NullabilityMatch {
  const sameNulls =
    childColumns.length === parentColumns.length &&
    childColumns.every((c, i) => c.nullable === parentColumns[i]?.nullable);
  if (sameNulls) return 'match';
  // only non-composite keys are wrapped
  if (childColumns.length === 1 && childColumns.every(c => c.nullable)) return 'optional';
  return 'mismatch';
}

export function resolveReference(
  style: ReverseNamingStyle,
  tables: TableClosureMap,
  table: TableInfo,
  reference: ReferenceInfo
): ResolvedReference {
  const childColumns = getColumns(
    table,
    reference.columns.map(c => c.child)
  );
  const parent = tables.get(tableKey(reference.referencedTable));
  if (!parent) {
    return { kind: 'unmapped', reference, childColumns };
  }

  const parentColumns = getColumns(
    parent,
    reference.columns.map(c => c.parent)
  );
  const nullability = compareNullability(childColumns, parentColumns);
  const unique = chooseReferencedUnique(style, parent, reference);
  if (unique.type === 'primaryAuto') {
    return { kind: 'autoKey', reference, childColumns, parent, parentColumns, nullability };
  }
  return { kind: 'uniqueKey', reference, childColumns, parent, parentColumns, unique, nullability };
}

/**
 * Walks the table's columns in order, skipping the auto key and consuming the columns of each reference together
 */
export function groupColumns(style: ReverseNamingStyle, tables: TableClosureMap, table: TableInfo): ColumnGroup[] {
  const idColumns = new Set(autoKeyColumns(table));
  const consumed = new Set<string>();
  const groups: ColumnGroup[] = [];

  for (const column of table.columns) {
    if (idColumns.has(column.name) || consumed.has(column.name)) continue;

    const reference = findReference(table, column.name);
    if (!reference) {
      groups.push({ kind: 'column', column });
      continue;
    }

    const resolved = resolveReference(style, tables, table, reference);
    for (const child of resolved.childColumns) {
      consumed.add(child.name);
    }
    groups.push({ kind: 'reference', resolved });
  }

  return groups;
}

/**
 * Uniques of the parent that some reference in the closure uses as a typed key.
 * Unused uniques get neither a key definition nor a phantom type.
 */
export function usedUniqueKeys(
  style: ReverseNamingStyle,
  tables: TableClosureMap,
  parent: TableInfo
): UniqueDefInfo[] {
  const parentKey = tableKey(parent.name);
  const used: UniqueDefInfo[] = [];

  for (const table of tables.values()) {
    for (const reference of table.references) {
      if (tableKey(reference.referencedTable) !== parentKey) continue;
      const resolved = resolveReference(style, tables, table, reference);
      if (resolved.kind !== 'uniqueKey' || resolved.nullability === 'mismatch') continue;
      if (!used.some(u => uniqueEquals(u, resolved.unique))) {
        used.push(resolved.unique);
      }
    }
  }

  return used.sort(compareUniques);
}

export interface ReferenceActions {
  onDelete?: ReferenceAction;
  onUpdate?: ReferenceAction;
}

/**
 * Actions that differ from the dialect defaults
 */
export function referenceActions(dialect: DbDialect, reference: ReferenceInfo): ReferenceActions {
  const actions: ReferenceActions = {};
  if (reference.onDelete !== undefined && reference.onDelete !== dialect.defaultReferenceOnDelete) {
    actions.onDelete = reference.onDelete;
  }
  if (reference.onUpdate !== undefined && reference.onUpdate !== dialect.defaultReferenceOnUpdate) {
    actions.onUpdate = reference.onUpdate;
  }
  return actions;
}
