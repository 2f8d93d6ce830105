import { SchemaDefinitionError, isPlainObject } from '@typeweave/core';

/** The parts of a Sequelize data type that affect the derived schema. */
export interface DataTypeShape {
  /** Upper-case type key, e.g. `'STRING'`, `'DOUBLE PRECISION'`. */
  readonly key: string;
  /** Declared length for STRING and CHAR. */
  readonly length?: number;
  /** Allowed values for ENUM. */
  readonly values?: readonly string[];
  /** Element type for ARRAY. */
  readonly element?: DataTypeShape;
}

export type TypeFamily = 'string' | 'enum' | 'uuid' | 'integer' | 'float' | 'boolean' | 'date' | 'datetime' | 'json' | 'array';

const FAMILIES: ReadonlyMap<string, TypeFamily> = new Map<string, TypeFamily>([
  ['STRING', 'string'],
  ['VARCHAR', 'string'],
  ['TEXT', 'string'],
  ['CHAR', 'string'],
  ['CITEXT', 'string'],
  ['ENUM', 'enum'],
  ['UUID', 'uuid'],
  ['UUIDV1', 'uuid'],
  ['UUIDV4', 'uuid'],
  ['INTEGER', 'integer'],
  ['INT', 'integer'],
  ['BIGINT', 'integer'],
  ['SMALLINT', 'integer'],
  ['MEDIUMINT', 'integer'],
  ['TINYINT', 'integer'],
  ['FLOAT', 'float'],
  ['DOUBLE', 'float'],
  ['DOUBLE PRECISION', 'float'],
  ['REAL', 'float'],
  ['DECIMAL', 'float'],
  ['NUMBER', 'float'],
  ['BOOLEAN', 'boolean'],
  ['DATEONLY', 'date'],
  ['DATE', 'datetime'],
  ['JSON', 'json'],
  ['JSONB', 'json'],
  ['ARRAY', 'array'],
]);

const SQL_TYPE = /^([A-Za-z][A-Za-z ]*?)\s*(?:\(\s*(\d+)\s*\))?$/;

/**
 * Read a Sequelize data type: a DataTypes instance, a DataTypes constructor,
 * or a raw SQL type string such as `'VARCHAR(20)'`.
 *
 * @throws SchemaDefinitionError when `type` is none of these
 */
export function describeDataType(type: unknown, attribute: string): DataTypeShape {
  if (typeof type === 'string') {
    const match = SQL_TYPE.exec(type.trim());
    const name = match?.[1];
    if (!match || !name) {
      throw new SchemaDefinitionError(`Attribute '${attribute}' has an unreadable data type '${type}'`);
    }
    const digits = match[2];
    return { key: name.toUpperCase(), length: digits === undefined ? undefined : Number(digits) };
  }

  if ((typeof type !== 'object' && typeof type !== 'function') || type === null) {
    throw new SchemaDefinitionError(`Attribute '${attribute}' has no data type`);
  }
  if (!('key' in type) || typeof type.key !== 'string') {
    throw new SchemaDefinitionError(`Attribute '${attribute}' has no data type`);
  }

  const key = type.key.toUpperCase();
  const options = 'options' in type && isPlainObject(type.options) ? type.options : {};
  const length = options['length'];

  return {
    key,
    length: typeof length === 'number' ? length : undefined,
    values: 'values' in type ? stringValues(type.values) : undefined,
    element: key === 'ARRAY' && 'type' in type && type.type !== undefined ? describeDataType(type.type, attribute) : undefined,
  };
}

/** @throws SchemaDefinitionError for data types with no counterpart */
export function familyOf(shape: DataTypeShape, attribute: string): TypeFamily {
  const family = FAMILIES.get(shape.key);
  if (!family) {
    throw new SchemaDefinitionError(`Unsupported Sequelize data type '${shape.key}' for attribute '${attribute}'`);
  }
  return family;
}

function stringValues(values: unknown): readonly string[] | undefined {
  if (!Array.isArray(values)) return undefined;
  const items: readonly unknown[] = values;
  return items.filter((item): item is string => typeof item === 'string');
}
