/**
 * Mapping generation
 *
 * The generated settings describe the database structure exactly, so applying them
 * to the same schema produces no migration. They are verbose; see mapping-minimizer.
 */

import { ColumnInfo, TableClosureMap, TableInfo, UniqueDefInfo, dbTypeEquals, uniqueEquals } from './db-schema-types.js';
import { DbDialect, getDefaultAutoKeyType } from './db-dialect.js';
import type { ReverseNamingStyle } from './naming-style.js';
import {
  ResolvedReference,
  autoKeyColumn,
  groupColumns,
  referenceActions,
  tableUniqueDefs,
  usedUniqueKeys,
} from './reference-resolver.js';
import type {
  ConstructorMapping,
  EntityMapping,
  FieldMapping,
  ReferenceMapping,
  UniqueKeyMapping,
  UniqueMapping,
} from './mapping-types.js';
import { NotFoundInCollectionError } from './errors.js';

/**
 * Returns the mapping of every table in the map, keyed like the map
 */
export function generateMapping(
  style: ReverseNamingStyle,
  dialect: DbDialect,
  tables: TableClosureMap
): Map<string, EntityMapping> {
  const result = new Map<string, EntityMapping>();
  for (const [key, table] of tables) {
    result.set(key, generateEntityMapping(style, dialect, tables, table));
  }
  return result;
}

export function generateEntityMapping(
  style: ReverseNamingStyle,
  dialect: DbDialect,
  tables: TableClosureMap,
  table: TableInfo
): EntityMapping {
  const keyColumn = autoKeyColumn(table);
  const uniqueDefs = tableUniqueDefs(table);

  const constructorMapping: ConstructorMapping = {
    name: style.mkConstructorName(table.name),
  };
  if (keyColumn !== undefined) {
    constructorMapping.keyDbName = keyColumn;
  }
  constructorMapping.fields = groupColumns(style, tables, table).map(group =>
    group.kind === 'column'
      ? columnField(style.mkFieldName(table.name, group.column.name), group.column)
      : referenceField(style, dialect, table, group.resolved)
  );
  constructorMapping.uniques = uniqueDefs.map(
    (unique, index): UniqueMapping => ({
      name: style.mkUniqueName(table.name, index, unique),
      type: unique.type,
      fields: unique.fields.map(field =>
        'column' in field ? style.mkFieldName(table.name, field.column) : { expr: field.expression }
      ),
    })
  );

  const entity: EntityMapping = {
    entity: style.mkEntityName(table.name),
    dbName: table.name.name,
  };
  if (table.name.schema !== undefined) {
    entity.schema = table.name.schema;
  }
  if (keyColumn === undefined) {
    entity.autoKey = null;
  }
  entity.keys = uniqueKeyMappings(style, tables, table, uniqueDefs, keyColumn === undefined);
  entity.constructors = [constructorMapping];
  return entity;
}

/**
 * Keys are created only for referenced uniques. Without an auto key, the canonical one becomes the default.
 */
function uniqueKeyMappings(
  style: ReverseNamingStyle,
  tables: TableClosureMap,
  table: TableInfo,
  uniqueDefs: UniqueDefInfo[],
  withoutAutoKey: boolean
): UniqueKeyMapping[] {
  const uniqueKeys = usedUniqueKeys(style, tables, table);
  const defaultUnique =
    withoutAutoKey && uniqueKeys.length > 0 ? style.mkChooseReferencedUnique(table.name, uniqueKeys) : undefined;

  return uniqueKeys.map(unique => {
    const index = uniqueDefs.findIndex(u => uniqueEquals(u, unique));
    if (index < 0) {
      throw new NotFoundInCollectionError('unique', style.mkUniqueKeyPhantomName(table.name, unique));
    }
    const key: UniqueKeyMapping = { name: style.mkUniqueName(table.name, index, unique) };
    if (defaultUnique !== undefined && uniqueEquals(unique, defaultUnique)) {
      key.default = true;
    }
    return key;
  });
}

function columnField(name: string, column: ColumnInfo): FieldMapping {
  const field: FieldMapping = { name, dbName: column.name };
  if (column.type.kind === 'other') {
    field.type = column.type.typeName;
  }
  if (column.defaultValue !== undefined) {
    field.default = column.defaultValue;
  }
  return field;
}

function referenceField(
  style: ReverseNamingStyle,
  dialect: DbDialect,
  table: TableInfo,
  resolved: ResolvedReference
): FieldMapping {
  const name = style.mkKeyFieldName(table.name, resolved.reference);
  const actions = referenceActions(dialect, resolved.reference);

  if (resolved.kind === 'autoKey') {
    const [column] = resolved.childColumns;
    const field: FieldMapping = { name };
    if (column !== undefined) {
      field.dbName = column.name;
      if (!dbTypeEquals(column.type, getDefaultAutoKeyType(dialect))) {
        field.type = dialect.showSqlType(column.type);
      }
      if (column.defaultValue !== undefined) {
        field.default = column.defaultValue;
      }
    }
    return withReference(field, actions);
  }

  if (resolved.kind === 'uniqueKey' && resolved.nullability !== 'mismatch') {
    // embedded key fields are named after the parent's columns
    const parentColumns = resolved.parentColumns;
    const embeddedType = resolved.childColumns.map((child, i): FieldMapping => {
      const parent = parentColumns[i] ?? child;
      const field: FieldMapping = { name: parent.name, dbName: child.name };
      if (!dbTypeEquals(child.type, parent.type)) {
        field.type = dialect.showSqlType(child.type);
      }
      if (child.defaultValue !== undefined) {
        field.default = child.defaultValue;
      }
      return field;
    });
    return withReference({ name, embeddedType }, actions);
  }

  // the parent is not mapped, or nullability prevents a typed key
  const parentReference: ReferenceMapping = {
    table: resolved.reference.referencedTable.name,
    columns: resolved.reference.columns.map(c => c.parent),
  };
  if (resolved.reference.referencedTable.schema !== undefined) {
    parentReference.schema = resolved.reference.referencedTable.schema;
  }

  const [only] = resolved.childColumns;
  if (resolved.childColumns.length === 1 && only !== undefined) {
    return withReference(columnField(name, only), { ...parentReference, ...actions });
  }
  return withReference(
    {
      name,
      embeddedType: resolved.childColumns.map((child, i) => columnField(`val${i}`, child)),
    },
    { ...parentReference, ...actions }
  );
}

function withReference(field: FieldMapping, reference: ReferenceMapping): FieldMapping {
  if (Object.keys(reference).length > 0) {
    field.reference = reference;
  }
  return field;
}
