/**
 * Declaration printer
 * Renders generated datatypes as TypeScript declarations. Key types (AutoKey, Key, Unique,
 * UniqueMarker) are expected from the ORM runtime the mappings are used with.
 */

import type { GeneratedData } from './data-generator.js';
import type { PrimitiveType, TypeExpr } from './type-mapping.js';

const PRIMITIVE_TYPES: Record<PrimitiveType, string> = {
  string: 'string',
  int: 'number',
  int32: 'number',
  int64: 'bigint',
  double: 'number',
  boolean: 'boolean',
  day: 'Date',
  timeOfDay: 'string',
  utcTime: 'Date',
  zonedTime: 'Date',
  bytes: 'Buffer',
};

export function showType(type: TypeExpr): string {
  switch (type.kind) {
    case 'primitive':
      return PRIMITIVE_TYPES[type.name];
    case 'optional':
      return `${showType(type.inner)} | null`;
    case 'tuple':
      return `[${type.items.map(showType).join(', ')}]`;
    case 'autoKey':
      return `AutoKey<${type.entity}>`;
    case 'uniqueKey':
      return `Key<${type.entity}, Unique<${type.phantom}>>`;
  }
}

export function showData(generated: GeneratedData): string {
  const { declaration, phantoms } = generated;
  const blocks: string[] = [];

  if (declaration.entityName !== declaration.constructorName) {
    blocks.push(`export type ${declaration.entityName} = ${declaration.constructorName};`);
  }

  const fields = declaration.fields.map(field => `  ${field.name}: ${showType(field.type)};`);
  blocks.push(
    fields.length > 0
      ? `export interface ${declaration.constructorName} {\n${fields.join('\n')}\n}`
      : `export interface ${declaration.constructorName} {}`
  );

  for (const phantom of phantoms) {
    blocks.push(`export type ${phantom.name} = UniqueMarker<${phantom.entityName}>;`);
  }

  return blocks.join('\n\n');
}
