/**
 * Database dialect descriptors
 * The engine asks the dialect for the SQL spelling of logical types, the type of a
 * synthetic auto key and the referential actions a foreign key gets when none are declared.
 */

import { DbType, ReferenceAction } from './db-schema-types.js';

export interface DbDialect {
  name: string;
  defaultAutoKeyType: DbType;
  defaultReferenceOnDelete?: ReferenceAction;
  defaultReferenceOnUpdate?: ReferenceAction;
  showSqlType(type: DbType): string;
}

export function getDefaultAutoKeyType(dialect: DbDialect): DbType {
  return dialect.defaultAutoKeyType;
}

export const postgresDialect: DbDialect = {
  name: 'postgres',
  defaultAutoKeyType: { kind: 'int64' },
  defaultReferenceOnDelete: 'no action',
  defaultReferenceOnUpdate: 'no action',
  showSqlType(type: DbType): string {
    switch (type.kind) {
      case 'string':
        return 'VARCHAR';
      case 'int32':
        return 'INT4';
      case 'int64':
        return 'INT8';
      case 'real':
        return 'DOUBLE PRECISION';
      case 'bool':
        return 'BOOLEAN';
      case 'date':
        return 'DATE';
      case 'time':
        return 'TIME';
      case 'timestamp':
        return 'TIMESTAMP';
      case 'timestampZoned':
        return 'TIMESTAMP WITH TIME ZONE';
      case 'blob':
        return 'BYTEA';
      case 'other':
        return type.typeName;
    }
  },
};
