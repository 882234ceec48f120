/**
 * Reverse-mapping engine: table closure, naming styles, reference resolution,
 * declaration and mapping generation, and mapping minimization
 */

export * from './db-schema-types.js';
export * from './errors.js';
export * from './db-dialect.js';
export * from './db-schema-analyzer.js';
export * from './table-closure.js';
export * from './naming-style.js';
export * from './reference-resolver.js';
export * from './type-mapping.js';
export * from './data-generator.js';
export * from './data-printer.js';
export * from './mapping-types.js';
export * from './mapping-generator.js';
export * from './mapping-minimizer.js';
export * from './mapping-printer.js';
export { ConfigError, parseDatabaseUrl, resolveInspectorOptions, makeTableFilter } from './config.js';
export type { DatabaseConfig, InspectorArgs, InspectorOptions } from './config.js';
