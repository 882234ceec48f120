/**
 * Mapping minimization
 *
 * The mappings created by generateMapping contain a lot of settings. minimizeMapping makes
 * them compact by removing the settings that the naming convention would produce anyway for
 * the declared datatype. applyDefaults does the opposite, so that
 * applyDefaults(minimizeMapping(m)) equals applyDefaults(m).
 */

import type { DataDeclaration } from './data-generator.js';
import type { NamingStyle } from './naming-style.js';
import type { ConstructorMapping, EntityMapping, FieldMapping } from './mapping-types.js';
import { NotFoundInCollectionError, findOne } from './errors.js';

export interface FieldDefaults {
  name: string;
  dbName: string;
}

export interface ConstructorDefaults {
  name: string;
  dbName: string;
  keyDbName: string;
  fields: FieldDefaults[];
}

export interface EntityDefaults {
  entity: string;
  dbName: string;
  constructors: ConstructorDefaults[];
}

/**
 * Settings the naming convention assigns to the declared datatype
 */
export function entityDefaults(style: NamingStyle, declaration: DataDeclaration): EntityDefaults {
  const { entityName, constructorName } = declaration;
  return {
    entity: entityName,
    dbName: style.mkDbEntityName(entityName),
    constructors: [
      {
        name: constructorName,
        dbName: style.mkDbConstrName(entityName, constructorName, 0),
        keyDbName: style.mkDbConstrAutoKeyName(entityName, constructorName, 0),
        fields: declaration.fields.map((field, fieldIndex) => ({
          name: field.name,
          dbName: style.mkDbFieldName(entityName, constructorName, 0, field.name, fieldIndex),
        })),
      },
    ],
  };
}

export function minimizeMapping(
  style: NamingStyle,
  declaration: DataDeclaration,
  mapping: EntityMapping
): EntityMapping {
  const defaults = entityDefaults(style, declaration);
  const result: EntityMapping = { entity: mapping.entity };

  if (mapping.dbName !== undefined && mapping.dbName !== defaults.dbName) {
    result.dbName = mapping.dbName;
  }
  if (mapping.schema !== undefined) {
    result.schema = mapping.schema;
  }
  if (mapping.autoKey !== undefined) {
    result.autoKey = mapping.autoKey;
  }
  if (mapping.keys !== undefined && mapping.keys.length > 0) {
    result.keys = mapping.keys;
  }

  const constructors = (mapping.constructors ?? []).flatMap((constructorMapping, index) => {
    const constructorDefaults = defaults.constructors[index];
    if (constructorDefaults === undefined) {
      throw new NotFoundInCollectionError('constructor', constructorMapping.name);
    }
    return subtractConstructor(constructorDefaults, constructorMapping) ?? [];
  });
  if (constructors.length > 0) {
    result.constructors = constructors;
  }

  return result;
}

/**
 * Returns undefined when nothing differs from the defaults
 */
function subtractConstructor(
  defaults: ConstructorDefaults,
  mapping: ConstructorMapping
): ConstructorMapping | undefined {
  const result: ConstructorMapping = { name: mapping.name };

  if (mapping.dbName !== undefined && mapping.dbName !== defaults.dbName) {
    result.dbName = mapping.dbName;
  }
  if (mapping.keyDbName !== undefined && mapping.keyDbName !== defaults.keyDbName) {
    result.keyDbName = mapping.keyDbName;
  }

  const fields = (mapping.fields ?? []).flatMap(field => {
    const fieldDefaults = findOne('field', (f: FieldDefaults) => f.name, field.name, defaults.fields);
    return subtractField(fieldDefaults, field) ?? [];
  });
  if (fields.length > 0) {
    result.fields = fields;
  }
  if (mapping.uniques !== undefined && mapping.uniques.length > 0) {
    result.uniques = mapping.uniques;
  }

  const notEmpty =
    result.dbName !== undefined ||
    result.keyDbName !== undefined ||
    result.fields !== undefined ||
    result.uniques !== undefined;
  return notEmpty ? result : undefined;
}

function subtractField(defaults: FieldDefaults, mapping: FieldMapping): FieldMapping | undefined {
  const result: FieldMapping = { name: mapping.name };

  if (mapping.dbName !== undefined && mapping.dbName !== defaults.dbName) {
    result.dbName = mapping.dbName;
  }
  if (mapping.type !== undefined) {
    result.type = mapping.type;
  }
  if (mapping.embeddedType !== undefined) {
    result.embeddedType = mapping.embeddedType;
  }
  if (mapping.default !== undefined) {
    result.default = mapping.default;
  }
  if (mapping.reference !== undefined) {
    result.reference = mapping.reference;
  }

  const notEmpty =
    result.dbName !== undefined ||
    result.type !== undefined ||
    result.embeddedType !== undefined ||
    result.default !== undefined ||
    result.reference !== undefined;
  return notEmpty ? result : undefined;
}

/**
 * Fills every unset setting from the naming convention
 */
export function applyDefaults(style: NamingStyle, declaration: DataDeclaration, mapping: EntityMapping): EntityMapping {
  const defaults = entityDefaults(style, declaration);
  const constructors = mapping.constructors ?? [];
  constructors.forEach((constructorMapping, index) => {
    if (defaults.constructors[index] === undefined) {
      throw new NotFoundInCollectionError('constructor', constructorMapping.name);
    }
  });
  const hasAutoKey = mapping.autoKey !== null;

  return {
    entity: mapping.entity,
    dbName: mapping.dbName ?? defaults.dbName,
    schema: mapping.schema,
    autoKey: mapping.autoKey,
    keys: mapping.keys ?? [],
    constructors: defaults.constructors.map((constructorDefaults, index) =>
      fillConstructor(constructorDefaults, constructors[index], hasAutoKey)
    ),
  };
}

function fillConstructor(
  defaults: ConstructorDefaults,
  mapping: ConstructorMapping | undefined,
  hasAutoKey: boolean
): ConstructorMapping {
  const fields = mapping?.fields ?? [];
  for (const field of fields) {
    findOne('field', (f: FieldDefaults) => f.name, field.name, defaults.fields);
  }

  return {
    name: mapping?.name ?? defaults.name,
    dbName: mapping?.dbName ?? defaults.dbName,
    // an entity without an auto key has no auto key column
    keyDbName: mapping?.keyDbName ?? (hasAutoKey ? defaults.keyDbName : undefined),
    fields: defaults.fields.map(fieldDefaults => {
      const field = fields.find(f => f.name === fieldDefaults.name);
      return {
        name: fieldDefaults.name,
        dbName: field?.dbName ?? fieldDefaults.dbName,
        type: field?.type,
        embeddedType: field?.embeddedType,
        default: field?.default,
        reference: field?.reference,
      };
    }),
    uniques: mapping?.uniques ?? [],
  };
}
