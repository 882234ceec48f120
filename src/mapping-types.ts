/**
 * Type definitions for mapping settings
 * Unset (undefined) values fall back to the defaults of the naming convention the mapping is applied with.
 */

import type { ReferenceAction, UniqueType } from './db-schema-types.js';

export interface ReferenceMapping {
  /** Parent table and columns, given only when the parent is not a mapped entity */
  table?: string;
  schema?: string;
  columns?: string[];
  onDelete?: ReferenceAction;
  onUpdate?: ReferenceAction;
}

export interface FieldMapping {
  name: string;
  dbName?: string;
  /** Explicit column type, when the default for the declared type would differ */
  type?: string;
  embeddedType?: FieldMapping[];
  default?: string;
  reference?: ReferenceMapping;
}

export type UniqueFieldMapping = string | { expr: string };

export interface UniqueMapping {
  name: string;
  type?: UniqueType;
  fields: UniqueFieldMapping[];
}

export interface UniqueKeyMapping {
  name: string;
  /** The key used by the entity when it has no auto key */
  default?: true;
}

export interface ConstructorMapping {
  name: string;
  dbName?: string;
  /** Column of the auto key */
  keyDbName?: string;
  fields?: FieldMapping[];
  uniques?: UniqueMapping[];
}

export interface EntityMapping {
  entity: string;
  dbName?: string;
  schema?: string;
  /** null: the entity has no auto key. undefined: the default auto key. */
  autoKey?: null;
  keys?: UniqueKeyMapping[];
  constructors?: ConstructorMapping[];
}
