import { isPlainObject, typeOf } from '../model/values.js';
import { SchemaDefinitionError } from '../errors/SchemaErrors.js';
import type { SchemaType } from '../types/BaseType.js';
import { StringType } from '../types/StringType.js';
import { EmailType } from '../types/EmailType.js';
import { UuidType } from '../types/UuidType.js';
import { IntegerType } from '../types/IntegerType.js';
import { FloatType } from '../types/FloatType.js';
import { BooleanType } from '../types/BooleanType.js';
import { DateType } from '../types/DateType.js';
import { DateTimeType } from '../types/DateTimeType.js';
import { ArrayType } from '../types/ArrayType.js';
import { HashType } from '../types/HashType.js';
import { OptionalType } from '../types/OptionalType.js';
import type { NumericOptions } from '../types/NumericType.js';
import { isStringFormat } from './formats.js';

/** Restricts which source fields end up in a derived schema. `except` wins over `only`. */
export interface FieldFilter {
  readonly only?: readonly string[];
  readonly except?: readonly string[];
}

export function includesField(name: string, filter: FieldFilter = {}): boolean {
  if (filter.only && !filter.only.includes(name)) return false;
  if (filter.except?.includes(name)) return false;
  return true;
}

/**
 * Guess a type from one sample value.
 * Unknown shapes, strings and absent values all fall back to String.
 */
export function inferType(value: unknown): SchemaType {
  if (typeof value === 'number') return Number.isInteger(value) ? new IntegerType() : new FloatType();
  if (typeof value === 'bigint') return new IntegerType();
  if (typeof value === 'boolean') return new BooleanType();
  if (value instanceof Date) return new DateTimeType();
  if (Array.isArray(value)) {
    const items: readonly unknown[] = value;
    return new ArrayType(items.length === 0 ? new StringType() : inferType(items[0]));
  }
  if (isPlainObject(value)) return new HashType();
  return new StringType();
}

/** Derive a Hash from a plain object of sample values, one field per key. */
export function fromValues(record: unknown, filter: FieldFilter = {}): HashType {
  if (!isPlainObject(record)) {
    throw new SchemaDefinitionError(`Expected plain object, got ${typeOf(record)}`);
  }
  return hashFromEntries(Object.entries(record), filter);
}

/**
 * Derive a Hash from a class instance's own enumerable properties, or from a
 * Map with string keys.
 */
export function fromStruct(instance: unknown, filter: FieldFilter = {}): HashType {
  if (instance instanceof Map) {
    const entries: [string, unknown][] = [];
    for (const [key, value] of instance) {
      if (typeof key !== 'string') {
        throw new SchemaDefinitionError(`Map keys must be strings, got ${typeOf(key)}`);
      }
      entries.push([key, value]);
    }
    return hashFromEntries(entries, filter);
  }

  if (
    typeof instance !== 'object' ||
    instance === null ||
    Array.isArray(instance) ||
    instance instanceof Date ||
    isPlainObject(instance)
  ) {
    throw new SchemaDefinitionError(`Expected a class instance or Map, got ${typeOf(instance)}`);
  }
  return hashFromEntries(Object.entries(instance), filter);
}

function hashFromEntries(entries: readonly [string, unknown][], filter: FieldFilter): HashType {
  const fields: Record<string, SchemaType> = {};
  for (const [name, value] of entries) {
    if (includesField(name, filter)) fields[name] = inferType(value);
  }
  return new HashType(fields);
}

/**
 * Derive a Hash from a JSON Schema object document.
 *
 * Properties missing from `required` become Optional. Nested object schemas
 * with `properties` are derived recursively.
 *
 * @throws SchemaDefinitionError when the root is not `type: 'object'`
 */
export function fromJsonSchema(document: unknown, filter: FieldFilter = {}): HashType {
  if (!isPlainObject(document) || document['type'] !== 'object') {
    throw new SchemaDefinitionError('JSON Schema must be an object type');
  }
  return objectFromJsonSchema(document, filter);
}

function objectFromJsonSchema(node: Readonly<Record<string, unknown>>, filter: FieldFilter): HashType {
  const declared = node['properties'];
  const properties: Readonly<Record<string, unknown>> = isPlainObject(declared) ? declared : {};
  const required = stringList(node['required']);
  const fields: Record<string, SchemaType> = {};

  for (const [name, fieldSchema] of Object.entries(properties)) {
    if (!includesField(name, filter)) continue;
    fields[name] = fieldFromJsonSchema(fieldSchema, required.includes(name));
  }

  return new HashType(fields, { additionalProperties: node['additionalProperties'] !== false });
}

function fieldFromJsonSchema(schema: unknown, required: boolean): SchemaType {
  const node: Readonly<Record<string, unknown>> = isPlainObject(schema) ? schema : {};
  const description = node['description'];
  const base = typeFromJsonSchema(node);
  const described = typeof description === 'string' ? base.describe(description) : base;
  return required ? described : new OptionalType(described);
}

function typeFromJsonSchema(node: Readonly<Record<string, unknown>>): SchemaType {
  switch (node['type']) {
    case 'string':
      return stringFromJsonSchema(node);
    case 'integer':
      return new IntegerType(numericKeywords(node));
    case 'number':
      return new FloatType(numericKeywords(node));
    case 'boolean':
      return new BooleanType();
    case 'array': {
      const items = node['items'];
      const itemType = items === undefined ? new StringType() : fieldFromJsonSchema(items, true);
      return new ArrayType(itemType, {
        minItems: numberKeyword(node, 'minItems'),
        maxItems: numberKeyword(node, 'maxItems'),
        uniqueItems: node['uniqueItems'] === true ? true : undefined,
      });
    }
    case 'object':
      return isPlainObject(node['properties']) ? objectFromJsonSchema(node, {}) : new HashType();
    default:
      return new StringType();
  }
}

function stringFromJsonSchema(node: Readonly<Record<string, unknown>>): SchemaType {
  const lengths = { minLength: numberKeyword(node, 'minLength'), maxLength: numberKeyword(node, 'maxLength') };
  const format = node['format'];

  switch (format) {
    case 'email':
      return new EmailType(lengths);
    case 'uuid':
      return new UuidType(lengths);
    case 'date':
      return new DateType();
    case 'date-time':
      return new DateTimeType();
    default:
      return new StringType({
        ...lengths,
        pattern: patternKeyword(node),
        format: isStringFormat(format) ? format : undefined,
      });
  }
}

function numericKeywords(node: Readonly<Record<string, unknown>>): NumericOptions {
  return {
    minimum: numberKeyword(node, 'minimum'),
    maximum: numberKeyword(node, 'maximum'),
    exclusiveMinimum: numberKeyword(node, 'exclusiveMinimum'),
    exclusiveMaximum: numberKeyword(node, 'exclusiveMaximum'),
    multipleOf: numberKeyword(node, 'multipleOf'),
  };
}

function numberKeyword(node: Readonly<Record<string, unknown>>, key: string): number | undefined {
  const value = node[key];
  return typeof value === 'number' ? value : undefined;
}

function patternKeyword(node: Readonly<Record<string, unknown>>): RegExp | undefined {
  const source = node['pattern'];
  if (typeof source !== 'string') return undefined;
  try {
    return new RegExp(source);
  } catch (error) {
    throw new SchemaDefinitionError(
      `Invalid pattern '${source}': ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  const items: readonly unknown[] = value;
  return items.filter((item): item is string => typeof item === 'string');
}
