/**
 * Table builders shared by the unit tests
 */

import type {
  ColumnInfo,
  DbType,
  ReferenceInfo,
  TableInfo,
  UniqueDefInfo,
  UniqueType,
} from '../db-schema-types.js';
import { toTableMap } from '../db-schema-types.js';

export function column(name: string, type: DbType['kind'] = 'string', nullable = false): ColumnInfo {
  if (type === 'other') {
    return { name, nullable, type: { kind: 'other', typeName: 'jsonb' } };
  }
  return { name, nullable, type: { kind: type } };
}

export function unique(type: UniqueType, columns: string[], name?: string): UniqueDefInfo {
  const result: UniqueDefInfo = { type, fields: columns.map(c => ({ column: c })) };
  if (name !== undefined) result.name = name;
  return result;
}

export function reference(table: string, columns: Array<[string, string]>, schema = 'public'): ReferenceInfo {
  return {
    referencedTable: { schema, name: table },
    columns: columns.map(([child, parent]) => ({ child, parent })),
  };
}

export function table(
  name: string,
  parts: { columns: ColumnInfo[]; uniques?: UniqueDefInfo[]; references?: ReferenceInfo[] },
  schema = 'public'
): TableInfo {
  return {
    name: { schema, name },
    columns: parts.columns,
    uniques: parts.uniques ?? [],
    references: parts.references ?? [],
  };
}

/**
 * customers(id auto) <- orders(id auto, customer_id, note?)
 */
export function customersAndOrders() {
  const customers = table('customers', {
    columns: [column('id', 'int64'), column('name')],
    uniques: [unique('primaryAuto', ['id'], 'customers_pkey')],
  });
  const orders = table('orders', {
    columns: [column('id', 'int64'), column('customer_id', 'int64'), column('note', 'string', true)],
    uniques: [unique('primaryAuto', ['id'], 'orders_pkey')],
    references: [reference('customers', [['customer_id', 'id']])],
  });
  return { customers, orders, tables: toTableMap([customers, orders]) };
}
