import { describe, it, expect } from 'vitest';
import { toTableMap } from './db-schema-types.js';
import { defaultReverseNamingStyle } from './naming-style.js';
import { defaultDataCodegenConfig, generateData } from './data-generator.js';
import { showData, showType } from './data-printer.js';
import { column, table } from './test/fixtures.js';

describe('showType', () => {
  it('renders primitives', () => {
    expect(showType({ kind: 'primitive', name: 'int' })).toBe('number');
    expect(showType({ kind: 'primitive', name: 'int64' })).toBe('bigint');
    expect(showType({ kind: 'primitive', name: 'utcTime' })).toBe('Date');
    expect(showType({ kind: 'primitive', name: 'bytes' })).toBe('Buffer');
  });

  it('renders keys, optionals and tuples', () => {
    expect(showType({ kind: 'optional', inner: { kind: 'autoKey', entity: 'Customers' } })).toBe(
      'AutoKey<Customers> | null'
    );
    expect(showType({ kind: 'uniqueKey', entity: 'Customers', phantom: 'CustomersEmail' })).toBe(
      'Key<Customers, Unique<CustomersEmail>>'
    );
    expect(
      showType({
        kind: 'tuple',
        items: [
          { kind: 'primitive', name: 'int32' },
          { kind: 'optional', inner: { kind: 'primitive', name: 'string' } },
        ],
      })
    ).toBe('[number, string | null]');
  });
});

describe('showData', () => {
  it('prints an interface followed by its phantom types', () => {
    const output = showData({
      declaration: {
        entityName: 'Customers',
        constructorName: 'Customers',
        fields: [
          { name: 'customersEmail', type: { kind: 'primitive', name: 'string' } },
          { name: 'customersBorn', type: { kind: 'optional', inner: { kind: 'primitive', name: 'day' } } },
        ],
      },
      phantoms: [{ name: 'Customers_email_key', entityName: 'Customers' }],
    });

    expect(output).toBe(
      [
        'export interface Customers {',
        '  customersEmail: string;',
        '  customersBorn: Date | null;',
        '}',
        '',
        'export type Customers_email_key = UniqueMarker<Customers>;',
      ].join('\n')
    );
  });

  it('aliases the entity when its name differs from the constructor', () => {
    const output = showData({
      declaration: { entityName: 'Audit', constructorName: 'AuditEntry', fields: [] },
      phantoms: [],
    });

    expect(output).toBe('export type Audit = AuditEntry;\n\nexport interface AuditEntry {}');
  });

  it('declares 64-bit columns as bigint at either native integer width', () => {
    const tables = toTableMap([table('counters', { columns: [column('small', 'int32'), column('big', 'int64')] })]);
    const expected = ['export interface Counters {', '  countersSmall: number;', '  countersBig: bigint;', '}'].join('\n');

    for (const width of [64, 32] as const) {
      const generated = generateData(defaultDataCodegenConfig(width), defaultReverseNamingStyle, tables).get(
        'public.counters'
      );
      if (!generated) throw new Error('no declaration for public.counters');

      expect(showData(generated)).toBe(expected);
    }
  });
});
