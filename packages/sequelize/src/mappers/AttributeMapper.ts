import {
  ArrayType,
  BooleanType,
  DateTimeType,
  DateType,
  EmailType,
  FloatType,
  HashType,
  IntegerType,
  OptionalType,
  StringType,
  UuidType,
} from '@typeweave/core';
import type { SchemaType } from '@typeweave/core';
import type { ModelAttributeColumnOptions } from 'sequelize';
import type { DataTypeShape } from './DataTypeMapper.js';
import { describeDataType, familyOf } from './DataTypeMapper.js';
import type { AttributeValidators } from './ValidatorMapper.js';
import { readValidators } from './ValidatorMapper.js';
import { enumPattern } from '../utils/enumPattern.js';

const NO_VALIDATORS: AttributeValidators = { email: false, uuid: false };

/**
 * Map one model attribute to a schema type.
 *
 * The field is Optional when the column accepts NULL or the database fills it
 * in: a `defaultValue`, `autoIncrement`, or a timestamp Sequelize manages.
 */
export function typeForAttribute(name: string, column: ModelAttributeColumnOptions): SchemaType {
  const shape = describeDataType(column.type, name);
  const base = typeForShape(shape, readValidators(column.validate), name);
  const described = typeof column.comment === 'string' ? base.describe(column.comment) : base;
  return isOptionalColumn(column) ? new OptionalType(described) : described;
}

function isOptionalColumn(column: ModelAttributeColumnOptions): boolean {
  return (
    column.allowNull !== false ||
    column.defaultValue !== undefined ||
    column.autoIncrement === true ||
    ('_autoGenerated' in column && column._autoGenerated === true)
  );
}

function typeForShape(shape: DataTypeShape, validators: AttributeValidators, name: string): SchemaType {
  const lengths = {
    minLength: validators.minLength,
    maxLength: smallest(shape.length, validators.maxLength),
  };
  const range = { minimum: validators.minimum, maximum: validators.maximum };

  switch (familyOf(shape, name)) {
    case 'string':
      if (validators.email) return new EmailType(lengths);
      if (validators.uuid) return new UuidType(lengths);
      return new StringType(lengths);
    case 'enum':
      return new StringType({ ...lengths, pattern: enumPattern(shape.values ?? []) });
    case 'uuid':
      return new UuidType(lengths);
    case 'integer':
      return new IntegerType(range);
    case 'float':
      return new FloatType(range);
    case 'boolean':
      return new BooleanType();
    case 'date':
      return new DateType();
    case 'datetime':
      return new DateTimeType();
    case 'json':
      return new HashType();
    case 'array':
      return new ArrayType(shape.element ? typeForShape(shape.element, NO_VALIDATORS, name) : new StringType());
  }
}

function smallest(a: number | undefined, b: number | undefined): number | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return Math.min(a, b);
}
