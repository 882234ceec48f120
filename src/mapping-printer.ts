/**
 * Mapping printer
 * Pretty-prints mapping settings as JSON with a fixed key order, so re-generated files diff cleanly.
 */

import type { EntityMapping } from './mapping-types.js';
import { compareStrings } from './db-schema-types.js';

export const MAPPING_KEY_ORDER = [
  'entity',
  'name',
  'dbName',
  'schema',
  'autoKey',
  'keyDbName',
  'type',
  'embeddedType',
  'columns',
  'keys',
  'fields',
  'uniques',
];

function compareKeys(a: string, b: string): number {
  const rankA = MAPPING_KEY_ORDER.indexOf(a);
  const rankB = MAPPING_KEY_ORDER.indexOf(b);
  if (rankA >= 0 && rankB >= 0) return rankA - rankB;
  if (rankA >= 0) return -1;
  if (rankB >= 0) return 1;
  return compareStrings(a, b);
}

/**
 * Copies the value with object keys in canonical order; undefined members are dropped
 */
export function orderKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(orderKeys);
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, member]) => member !== undefined)
      .sort(([a], [b]) => compareKeys(a, b));
    return Object.fromEntries(entries.map(([key, member]) => [key, orderKeys(member)]));
  }
  return value;
}

export function showMappings(mappings: EntityMapping[]): string {
  return JSON.stringify(orderKeys(mappings), null, 4);
}
