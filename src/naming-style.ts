/**
 * Naming styles
 *
 * ReverseNamingStyle supplies the names of the generated declarations and mappings.
 * The generated identifiers may conflict with each other or with reserved words; if that
 * happens, adjust the style. NamingStyle is the forward convention that derives database
 * names from declared names and serves as the baseline when minimizing mappings.
 */

import {
  QualifiedName,
  ReferenceInfo,
  UniqueDefInfo,
  compareUniques,
  compareOptionalStrings,
  uniqueColumns,
} from './db-schema-types.js';
import { EmptyUniqueCandidateSetError } from './errors.js';

export interface ReverseNamingStyle {
  /** Name of the datatype. */
  mkEntityName(table: QualifiedName): string;
  /** Name of the constructor. */
  mkConstructorName(table: QualifiedName): string;
  /** Name of the field for a plain column. */
  mkFieldName(table: QualifiedName, column: string): string;
  /** Name of the field holding a reference, for one-column and composite keys alike. */
  mkKeyFieldName(table: QualifiedName, reference: ReferenceInfo): string;
  /**
   * There can be several uniques with the same columns (one primary key and multiple
   * constraints and indexes). Must return the same member regardless of list order.
   */
  mkChooseReferencedUnique(table: QualifiedName, uniques: UniqueDefInfo[]): UniqueDefInfo;
  /** Name of the phantom type that parametrises a unique key. */
  mkUniqueKeyPhantomName(table: QualifiedName, unique: UniqueDefInfo): string;
  /** Name of the unique in the mapping. index is the unique's position among the table's sorted uniques. */
  mkUniqueName(table: QualifiedName, index: number, unique: UniqueDefInfo): string;
}

export function filterIdentifier(name: string): string {
  return name.replace(/[^\p{L}\p{N}_]/gu, '');
}

export function firstUpper(name: string): string {
  const filtered = filterIdentifier(name);
  return filtered.charAt(0).toUpperCase() + filtered.slice(1);
}

export function firstLower(name: string): string {
  const filtered = filterIdentifier(name);
  return filtered.charAt(0).toLowerCase() + filtered.slice(1);
}

/**
 * customer_id -> customerId
 */
export function camelize(name: string): string {
  const [head = '', ...rest] = name.split(/[^\p{L}\p{N}]+/u).filter(part => part.length > 0);
  return head + rest.map(firstUpper).join('');
}

function isPrimary(unique: UniqueDefInfo): boolean {
  return unique.type === 'primary' || unique.type === 'primaryAuto';
}

/**
 * Sort by declared name, then try primary keys, constraints and indexes in that order
 */
export function chooseUniqueByPreference(table: QualifiedName, uniques: UniqueDefInfo[]): UniqueDefInfo {
  const sorted = [...uniques].sort(
    (a, b) => compareOptionalStrings(a.name, b.name) || compareUniques(a, b)
  );
  const [chosen] = [
    ...sorted.filter(isPrimary),
    ...sorted.filter(u => u.type === 'constraint'),
    ...sorted.filter(u => u.type === 'index'),
  ];
  if (chosen === undefined) {
    throw new EmptyUniqueCandidateSetError(table);
  }
  return chosen;
}

export const defaultReverseNamingStyle: ReverseNamingStyle = {
  mkEntityName: table => firstUpper(table.name),
  mkConstructorName: table => firstUpper(table.name),
  mkFieldName: (table, column) => firstLower(table.name) + firstUpper(column),
  mkKeyFieldName: (table, reference) => {
    const childColumns = reference.columns.map(c => c.child);
    return firstLower(table.name) + firstUpper(childColumns.join(''));
  },
  mkChooseReferencedUnique: chooseUniqueByPreference,
  mkUniqueKeyPhantomName: (table, unique) =>
    // a table cannot reference an expression index, so only columns are named
    firstUpper(unique.name ?? filterIdentifier(table.name) + uniqueColumns(unique).map(firstUpper).join('')),
  mkUniqueName: (table, index, unique) =>
    unique.name ?? `${filterIdentifier(table.name)}${uniqueColumns(unique).map(firstUpper).join('')}${index}`,
};

/**
 * Same decisions as the default style, with snake_case table and column names camel-cased
 */
export const camelCaseReverseNamingStyle: ReverseNamingStyle = {
  ...defaultReverseNamingStyle,
  mkEntityName: table => firstUpper(camelize(table.name)),
  mkConstructorName: table => firstUpper(camelize(table.name)),
  mkFieldName: (table, column) => firstLower(camelize(table.name)) + firstUpper(camelize(column)),
  mkKeyFieldName: (table, reference) =>
    firstLower(camelize(table.name)) + reference.columns.map(c => firstUpper(camelize(c.child))).join(''),
  mkUniqueKeyPhantomName: (table, unique) =>
    firstUpper(
      unique.name === undefined
        ? camelize(table.name) + uniqueColumns(unique).map(c => firstUpper(camelize(c))).join('')
        : camelize(unique.name)
    ),
};

export interface NamingStyle {
  mkDbEntityName(entityName: string): string;
  mkDbConstrName(entityName: string, constrName: string, constrIndex: number): string;
  mkDbConstrAutoKeyName(entityName: string, constrName: string, constrIndex: number): string;
  mkDbFieldName(
    entityName: string,
    constrName: string,
    constrIndex: number,
    fieldName: string,
    fieldIndex: number
  ): string;
}

/**
 * ordersCustomerId -> orders_customer_id
 */
export function toUnderscore(name: string): string {
  return name.replace(/([\p{Ll}\p{N}])(\p{Lu})/gu, '$1_$2').toLowerCase();
}

/**
 * Database names equal the declared names; the auto key column is "id"
 */
export const suffixNamingStyle: NamingStyle = {
  mkDbEntityName: entityName => entityName,
  mkDbConstrName: (_entityName, constrName) => constrName,
  mkDbConstrAutoKeyName: () => 'id',
  mkDbFieldName: (_entityName, _constrName, _constrIndex, fieldName) => fieldName,
};

/**
 * Like suffixNamingStyle with every database name in lower case, words separated by underscores
 */
export const lowerCaseSuffixNamingStyle: NamingStyle = {
  mkDbEntityName: entityName => toUnderscore(entityName),
  mkDbConstrName: (_entityName, constrName) => toUnderscore(constrName),
  mkDbConstrAutoKeyName: () => 'id',
  mkDbFieldName: (_entityName, _constrName, _constrIndex, fieldName) => toUnderscore(fieldName),
};
