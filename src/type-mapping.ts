/**
 * Logical column types to declaration types
 */

import { ColumnInfo, DbType } from './db-schema-types.js';

export type PrimitiveType =
  | 'string'
  | 'int' // the target platform's native integer, when it fits in a number
  | 'int32'
  | 'int64'
  | 'double'
  | 'boolean'
  | 'day'
  | 'timeOfDay'
  | 'utcTime'
  | 'zonedTime'
  | 'bytes';

export type TypeExpr =
  | { kind: 'primitive'; name: PrimitiveType }
  | { kind: 'optional'; inner: TypeExpr }
  | { kind: 'tuple'; items: TypeExpr[] }
  | { kind: 'autoKey'; entity: string }
  | { kind: 'uniqueKey'; entity: string; phantom: string };

/**
 * Width in bits of the target platform's native integer
 */
export type NativeIntWidth = 32 | 64;

export type MkType = (column: ColumnInfo) => TypeExpr;

function primitive(name: PrimitiveType): TypeExpr {
  return { kind: 'primitive', name };
}

function nullableType(column: ColumnInfo, type: TypeExpr): TypeExpr {
  return column.nullable ? { kind: 'optional', inner: type } : type;
}

/**
 * 64-bit columns stay `int64` at either width; only a 32-bit native integer fits in a number.
 */
export function primitiveFor(type: DbType, nativeIntWidth: NativeIntWidth): PrimitiveType {
  switch (type.kind) {
    case 'string':
      return 'string';
    case 'int32':
      return nativeIntWidth === 32 ? 'int' : 'int32';
    case 'int64':
      return 'int64';
    case 'real':
      return 'double';
    case 'bool':
      return 'boolean';
    case 'date':
      return 'day';
    case 'time':
      return 'timeOfDay';
    case 'timestamp':
      return 'utcTime';
    case 'timestampZoned':
      return 'zonedTime';
    case 'blob':
    case 'other':
      return 'bytes';
  }
}

/**
 * Maps the column's logical type; nullable columns become optional
 */
export function defaultMkType(nativeIntWidth: NativeIntWidth = 64): MkType {
  return column => nullableType(column, primitive(primitiveFor(column.type, nativeIntWidth)));
}

/**
 * Uses SQLite type affinity to pick a type for dialect-specific column types
 */
export function sqliteMkType(nativeIntWidth: NativeIntWidth = 64): MkType {
  return column => {
    if (column.type.kind !== 'other') {
      return nullableType(column, primitive(primitiveFor(column.type, nativeIntWidth)));
    }
    return nullableType(column, primitive(affinityType(column.type.typeName)));
  };
}

export function affinityType(typeName: string): PrimitiveType {
  const upper = typeName.toUpperCase();
  const contains = (parts: string[]) => parts.some(part => upper.includes(part));

  if (contains(['INT'])) return 'int';
  if (contains(['CHAR', 'CLOB', 'TEXT'])) return 'string';
  if (contains(['BLOB']) || typeName.length === 0) return 'bytes';
  if (contains(['REAL', 'FLOA', 'DOUB'])) return 'double';
  return 'bytes';
}
