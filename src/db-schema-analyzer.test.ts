/**
 * Tests for PostgresSchemaAnalyzer
 *
 * Catalog rows are served by a stubbed query function in the order the analyzer issues its queries.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Mock, MockInstance } from 'vitest';
import type { PostgresQueryFn } from './db-schema-analyzer.js';
import { PostgresSchemaAnalyzer, readPostgresType } from './db-schema-analyzer.js';
import { SchemaAnalysisError } from './errors.js';
import { toTableMap } from './db-schema-types.js';
import { defaultReverseNamingStyle } from './naming-style.js';
import { defaultDataCodegenConfig, generateTableData } from './data-generator.js';
import { column, reference, table, unique } from './test/fixtures.js';

describe('readPostgresType', () => {
  it('maps catalog types to logical types', () => {
    expect(readPostgresType('int8', 'bigint', -1)).toEqual({ kind: 'int64' });
    expect(readPostgresType('timestamptz', 'timestamp with time zone', -1)).toEqual({ kind: 'timestampZoned' });
    expect(readPostgresType('varchar', 'character varying', -1)).toEqual({ kind: 'string' });
  });

  it('keeps the formatted name of other types', () => {
    expect(readPostgresType('varchar', 'character varying(20)', 24)).toEqual({
      kind: 'other',
      typeName: 'character varying(20)',
    });
    expect(readPostgresType('numeric', 'numeric(10,2)', 655366)).toEqual({ kind: 'other', typeName: 'numeric(10,2)' });
  });
});

describe('PostgresSchemaAnalyzer', () => {
  let query: Mock<PostgresQueryFn>;
  let analyzer: PostgresSchemaAnalyzer;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    query = vi.fn<PostgresQueryFn>();
    analyzer = new PostgresSchemaAnalyzer(query);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it('reads the current schema', async () => {
    query.mockResolvedValueOnce({ rows: [{ schema_name: 'public' }] });

    expect(await analyzer.getCurrentSchema()).toBe('public');
  });

  it('lists tables of the current schema when none is given', async () => {
    query.mockResolvedValueOnce({ rows: [{ table_name: 'customers' }, { table_name: 'orders' }] });

    expect(await analyzer.listTables()).toEqual(['customers', 'orders']);
    expect(query.mock.calls[0]?.[1]).toEqual([null]);
  });

  it('returns undefined for a missing table', async () => {
    query.mockResolvedValueOnce({ rows: [] });

    expect(await analyzer.analyzeTable({ schema: 'public', name: 'missing' })).toBeUndefined();
    expect(query).toHaveBeenCalledTimes(1);
    expect(query.mock.calls[0]?.[1]).toEqual(['public', 'missing']);
  });

  it('reads columns, uniques and foreign keys of a table', async () => {
    query
      .mockResolvedValueOnce({ rows: [{ table_oid: 16384, schema_name: 'public' }] })
      .mockResolvedValueOnce({
        rows: [
          {
            column_name: 'id',
            is_nullable: false,
            udt_name: 'int8',
            formatted_type: 'bigint',
            type_modifier: -1,
            column_default: "nextval('orders_id_seq'::regclass)",
            is_identity: false,
          },
          {
            column_name: 'customer_id',
            is_nullable: true,
            udt_name: 'int4',
            formatted_type: 'integer',
            type_modifier: -1,
            column_default: null,
            is_identity: false,
          },
          {
            column_name: 'code',
            is_nullable: false,
            udt_name: 'varchar',
            formatted_type: 'character varying(20)',
            type_modifier: 24,
            column_default: null,
            is_identity: false,
          },
        ],
      })
      .mockResolvedValueOnce({
        rows: [
          { constraint_name: 'orders_pkey', constraint_type: 'p', column_names: ['id'] },
          { constraint_name: 'orders_code_key', constraint_type: 'u', column_names: ['code'] },
        ],
      })
      .mockResolvedValueOnce({
        rows: [
          {
            index_name: 'orders_lower_code_idx',
            key_columns: [null],
            key_expressions: ['lower(code::text)'],
          },
        ],
      })
      .mockResolvedValueOnce({
        rows: [
          {
            constraint_name: 'orders_customer_id_fkey',
            parent_schema: 'public',
            parent_table: 'customers',
            child_columns: ['customer_id'],
            parent_columns: ['id'],
            on_delete: 'c',
            on_update: 'a',
          },
        ],
      });

    const table = await analyzer.analyzeTable({ name: 'orders' });

    expect(table).toEqual({
      name: { schema: 'public', name: 'orders' },
      columns: [
        {
          name: 'id',
          nullable: false,
          type: { kind: 'int64' },
          defaultValue: "nextval('orders_id_seq'::regclass)",
        },
        { name: 'customer_id', nullable: true, type: { kind: 'int32' } },
        { name: 'code', nullable: false, type: { kind: 'other', typeName: 'character varying(20)' } },
      ],
      uniques: [
        { name: 'orders_pkey', type: 'primaryAuto', fields: [{ column: 'id' }] },
        { name: 'orders_code_key', type: 'constraint', fields: [{ column: 'code' }] },
        { name: 'orders_lower_code_idx', type: 'index', fields: [{ expression: 'lower(code::text)' }] },
      ],
      references: [
        {
          name: 'orders_customer_id_fkey',
          referencedTable: { schema: 'public', name: 'customers' },
          columns: [{ child: 'customer_id', parent: 'id' }],
          onDelete: 'cascade',
          onUpdate: 'no action',
        },
      ],
    });
    expect(query).toHaveBeenCalledTimes(5);
    expect(query.mock.calls[0]?.[1]).toEqual([null, 'orders']);
    expect(query.mock.calls.slice(1).map(call => call[1])).toEqual([[16384], [16384], [16384], [16384]]);
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('🔬 Analyzing table "orders"'));
  });

  it('reads index columns by attribute name so keyword columns match references', async () => {
    query
      .mockResolvedValueOnce({ rows: [{ table_oid: 2, schema_name: 'public' }] })
      .mockResolvedValueOnce({
        rows: [
          {
            column_name: 'id',
            is_nullable: false,
            udt_name: 'int8',
            formatted_type: 'bigint',
            type_modifier: -1,
            column_default: "nextval('accounts_id_seq'::regclass)",
            is_identity: false,
          },
          {
            column_name: 'user',
            is_nullable: false,
            udt_name: 'varchar',
            formatted_type: 'character varying',
            type_modifier: -1,
            column_default: null,
            is_identity: false,
          },
        ],
      })
      .mockResolvedValueOnce({
        rows: [{ constraint_name: 'accounts_pkey', constraint_type: 'p', column_names: ['id'] }],
      })
      .mockResolvedValueOnce({
        rows: [{ index_name: 'accounts_user_idx', key_columns: ['user'], key_expressions: [null] }],
      })
      .mockResolvedValueOnce({ rows: [] });

    const accounts = await analyzer.analyzeTable({ schema: 'public', name: 'accounts' });
    if (!accounts) throw new Error('accounts not found');
    const logins = table('logins', {
      columns: [column('id', 'int64'), column('account_user')],
      uniques: [unique('primaryAuto', ['id'], 'logins_pkey')],
      references: [reference('accounts', [['account_user', 'user']])],
    });
    const generated = generateTableData(
      defaultDataCodegenConfig(),
      defaultReverseNamingStyle,
      toTableMap([accounts, logins]),
      logins
    );

    expect(accounts.uniques).toContainEqual({ name: 'accounts_user_idx', type: 'index', fields: [{ column: 'user' }] });
    expect(query.mock.calls[3]?.[0]).toContain('LEFT JOIN pg_attribute a ON a.attrelid = ix.indrelid');
    expect(generated.declaration.fields).toEqual([
      {
        name: 'loginsAccount_user',
        type: { kind: 'uniqueKey', entity: 'Accounts', phantom: 'Accounts_user_idx' },
      },
    ]);
  });

  it('rejects an index key with neither a column nor an expression', async () => {
    query
      .mockResolvedValueOnce({ rows: [{ table_oid: 3, schema_name: 'public' }] })
      .mockResolvedValueOnce({ rows: [] })
      .mockResolvedValueOnce({ rows: [] })
      .mockResolvedValueOnce({ rows: [{ index_name: 'broken_idx', key_columns: [null], key_expressions: [null] }] })
      .mockResolvedValueOnce({ rows: [] });

    await expect(analyzer.analyzeTable({ schema: 'public', name: 'broken' })).rejects.toThrow(
      'Index broken_idx has a key with neither a column nor an expression'
    );
  });

  it('keeps a composite primary key without auto increment', async () => {
    const column = (name: string) => ({
      column_name: name,
      is_nullable: false,
      udt_name: 'int4',
      formatted_type: 'integer',
      type_modifier: -1,
      column_default: null,
      is_identity: true,
    });
    query
      .mockResolvedValueOnce({ rows: [{ table_oid: 1, schema_name: 'public' }] })
      .mockResolvedValueOnce({ rows: [column('year'), column('no')] })
      .mockResolvedValueOnce({
        rows: [{ constraint_name: 'shipments_pkey', constraint_type: 'p', column_names: ['year', 'no'] }],
      })
      .mockResolvedValueOnce({ rows: [] })
      .mockResolvedValueOnce({ rows: [] });

    const table = await analyzer.analyzeTable({ schema: 'public', name: 'shipments' });

    expect(table?.uniques).toEqual([
      { name: 'shipments_pkey', type: 'primary', fields: [{ column: 'year' }, { column: 'no' }] },
    ]);
  });

  it('wraps query failures', async () => {
    const failure = new Error('connection refused');
    query.mockRejectedValueOnce(failure);

    const error = await analyzer.listTables('app').catch(e => e);

    expect(error).toBeInstanceOf(SchemaAnalysisError);
    expect(error.message).toBe('Failed to list tables of schema app');
    expect(error.cause).toBe(failure);
    expect(errorSpy).toHaveBeenCalledWith(
      expect.stringContaining('❌ Failed to list tables of schema app: Error: connection refused')
    );
  });

  it('rejects rows with unexpected values', async () => {
    query
      .mockResolvedValueOnce({ rows: [{ table_oid: 1, schema_name: 'public' }] })
      .mockResolvedValueOnce({
        rows: [
          {
            column_name: 'id',
            is_nullable: 'YES',
            udt_name: 'int4',
            formatted_type: 'integer',
            type_modifier: -1,
            column_default: null,
            is_identity: false,
          },
        ],
      });

    await expect(analyzer.analyzeTable({ schema: 'public', name: 'bad' })).rejects.toThrow(
      'Expected boolean in column is_nullable, got YES'
    );
  });
});
