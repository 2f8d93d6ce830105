import { HashType, includesField } from '@typeweave/core';
import type { FieldFilter, SchemaType } from '@typeweave/core';
import type { Model, ModelStatic } from 'sequelize';
import { typeForAttribute } from './mappers/AttributeMapper.js';

/**
 * Derive a closed Hash from a Sequelize model, one field per attribute.
 *
 * @throws SchemaDefinitionError when an attribute's data type has no counterpart
 */
export function fromModel(model: ModelStatic<Model>, filter: FieldFilter = {}): HashType {
  const fields: Record<string, SchemaType> = {};
  for (const [name, column] of Object.entries(model.getAttributes())) {
    if (!includesField(name, filter)) continue;
    fields[name] = typeForAttribute(name, column);
  }
  return new HashType(fields, { additionalProperties: false });
}
