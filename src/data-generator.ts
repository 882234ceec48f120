/**
 * Datatype generation
 * Builds a declaration per table plus the phantom types that parametrise its unique keys.
 */

import { ColumnInfo, TableClosureMap, TableInfo } from './db-schema-types.js';
import type { ReverseNamingStyle } from './naming-style.js';
import { ResolvedReference, groupColumns, usedUniqueKeys } from './reference-resolver.js';
import { MkType, NativeIntWidth, TypeExpr, defaultMkType } from './type-mapping.js';

export interface DataCodegenConfig {
  /**
   * Phantoms can be generated here or by whatever consumes the mappings later.
   * Turn this off when the declarations would collide.
   */
  generateUniqueKeysPhantoms: boolean;
  /** Type of a plain column, usually derived from its nullability and logical type */
  mkType: MkType;
}

export function defaultDataCodegenConfig(nativeIntWidth: NativeIntWidth = 64): DataCodegenConfig {
  return {
    generateUniqueKeysPhantoms: true,
    mkType: defaultMkType(nativeIntWidth),
  };
}

export interface FieldDeclaration {
  name: string;
  type: TypeExpr;
}

export interface DataDeclaration {
  entityName: string;
  constructorName: string;
  fields: FieldDeclaration[];
}

/**
 * Marker type: `<name>` stands for a unique key of `<entityName>`
 */
export interface UniquePhantomDeclaration {
  name: string;
  entityName: string;
}

export interface GeneratedData {
  declaration: DataDeclaration;
  phantoms: UniquePhantomDeclaration[];
}

/**
 * Returns the declaration of every table in the map, keyed like the map
 */
export function generateData(
  config: DataCodegenConfig,
  style: ReverseNamingStyle,
  tables: TableClosureMap
): Map<string, GeneratedData> {
  const result = new Map<string, GeneratedData>();
  for (const [key, table] of tables) {
    result.set(key, generateTableData(config, style, tables, table));
  }
  return result;
}

export function generateTableData(
  config: DataCodegenConfig,
  style: ReverseNamingStyle,
  tables: TableClosureMap,
  table: TableInfo
): GeneratedData {
  const fields = groupColumns(style, tables, table).map((group): FieldDeclaration => {
    if (group.kind === 'column') {
      return { name: style.mkFieldName(table.name, group.column.name), type: config.mkType(group.column) };
    }
    return {
      name: style.mkKeyFieldName(table.name, group.resolved.reference),
      type: referenceType(config, style, group.resolved),
    };
  });

  const entityName = style.mkEntityName(table.name);
  const phantoms = config.generateUniqueKeysPhantoms
    ? usedUniqueKeys(style, tables, table).map(unique => ({
        name: style.mkUniqueKeyPhantomName(table.name, unique),
        entityName,
      }))
    : [];

  return {
    declaration: {
      entityName,
      constructorName: style.mkConstructorName(table.name),
      fields,
    },
    phantoms,
  };
}

function referenceType(config: DataCodegenConfig, style: ReverseNamingStyle, resolved: ResolvedReference): TypeExpr {
  if (resolved.kind === 'unmapped' || resolved.nullability === 'mismatch') {
    return notMappedRefType(config, resolved.childColumns);
  }

  const entity = style.mkEntityName(resolved.parent.name);
  const keyType: TypeExpr =
    resolved.kind === 'autoKey'
      ? { kind: 'autoKey', entity }
      : { kind: 'uniqueKey', entity, phantom: style.mkUniqueKeyPhantomName(resolved.parent.name, resolved.unique) };

  return resolved.nullability === 'optional' ? { kind: 'optional', inner: keyType } : keyType;
}

function notMappedRefType(config: DataCodegenConfig, columns: ColumnInfo[]): TypeExpr {
  const [only] = columns;
  if (columns.length === 1 && only !== undefined) {
    return config.mkType(only);
  }
  return { kind: 'tuple', items: columns.map(config.mkType) };
}
