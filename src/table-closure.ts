/**
 * Table closure
 * Collects tables from a schema and follows their foreign keys until every
 * referenced table that passes the filter is part of the map.
 */

import { QualifiedName, TableClosureMap, TableInfo, tableKey, toTableMap, compareStrings } from './db-schema-types.js';
import type { SchemaAnalyzer } from './db-schema-analyzer.js';
import { DanglingReferenceError } from './errors.js';

/**
 * Decides if a reference to the table is followed. Use it to keep audit or system tables out of the mapping.
 */
export type TableFilter = (name: QualifiedName) => boolean;

export type TableFetcher = (name: QualifiedName) => Promise<TableInfo | undefined>;

/**
 * Looks for references to tables not contained in the passed map. Each missing table
 * that passes the filter is fetched and added, and its own references are processed the same way.
 *
 * The result is sorted by table key, so it does not depend on the order tables were discovered in.
 */
export async function followReferencedTables(
  include: TableFilter,
  tables: TableClosureMap,
  fetch: TableFetcher
): Promise<TableClosureMap> {
  const checked: TableClosureMap = new Map();
  let frontier: TableClosureMap = new Map(tables);

  while (frontier.size > 0) {
    const missing = new Map<string, QualifiedName>();
    for (const table of frontier.values()) {
      for (const reference of table.references) {
        const key = tableKey(reference.referencedTable);
        if (
          include(reference.referencedTable) &&
          !checked.has(key) &&
          !frontier.has(key) &&
          !missing.has(key)
        ) {
          missing.set(key, reference.referencedTable);
        }
      }
    }

    const discovered: TableClosureMap = new Map();
    for (const key of Array.from(missing.keys()).sort(compareStrings)) {
      const name = missing.get(key);
      if (name === undefined) continue;
      const table = await fetch(name);
      if (!table) {
        throw new DanglingReferenceError(name);
      }
      discovered.set(key, table);
    }

    for (const [key, table] of frontier) {
      checked.set(key, table);
    }
    frontier = discovered;
  }

  return toTableMap(checked.values());
}

/**
 * Returns tables from the schema (the analyzer's current schema when omitted) and the tables they reference.
 *
 * When called several times with different filters, call followReferencedTables on the
 * merged map afterwards so that no dependencies are missing.
 */
export async function collectTables(
  analyzer: SchemaAnalyzer,
  include: TableFilter,
  schema?: string
): Promise<TableClosureMap> {
  const resolvedSchema = schema ?? (await analyzer.getCurrentSchema());
  const names = (await analyzer.listTables(resolvedSchema))
    .map((name): QualifiedName => ({ schema: resolvedSchema, name }))
    .filter(include);

  const tables: TableInfo[] = [];
  for (const name of names) {
    const table = await analyzer.analyzeTable(name);
    if (!table) {
      throw new DanglingReferenceError(name);
    }
    tables.push(table);
  }

  return followReferencedTables(include, toTableMap(tables), name => analyzer.analyzeTable(name));
}
