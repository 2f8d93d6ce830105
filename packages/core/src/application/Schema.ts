import type { ValidationResult } from '../domain/model/ValidationResult.js';
import { isPlainObject, typeOf } from '../domain/model/values.js';
import { SchemaDefinitionError, SchemaValidationError } from '../domain/errors/SchemaErrors.js';
import type { BaseType, CoerceOptions, SchemaType, TypeMetadata } from '../domain/types/BaseType.js';
import { isSchemaType } from '../domain/types/BaseType.js';
import { StringType } from '../domain/types/StringType.js';
import { EmailType } from '../domain/types/EmailType.js';
import { UuidType } from '../domain/types/UuidType.js';
import { IntegerType } from '../domain/types/IntegerType.js';
import { FloatType } from '../domain/types/FloatType.js';
import { BooleanType } from '../domain/types/BooleanType.js';
import { DateType } from '../domain/types/DateType.js';
import { DateTimeType } from '../domain/types/DateTimeType.js';
import { ArrayType } from '../domain/types/ArrayType.js';
import type { FieldOptions } from '../domain/types/ObjectType.js';
import { ObjectType } from '../domain/types/ObjectType.js';

/** Type names accepted in shorthand definitions. */
export type PrimitiveName = 'string' | 'integer' | 'float' | 'boolean' | 'date' | 'datetime' | 'uuid' | 'email';

/**
 * Shorthand for a schema type: a primitive name, a one-element array of a
 * definition, a record of field definitions, or a type instance. A record whose
 * only key is `type` and whose value is a primitive name stands for that primitive.
 */
export type SchemaDefinition = PrimitiveName | SchemaType | readonly SchemaDefinition[] | DefinitionRecord;

export interface DefinitionRecord {
  readonly [field: string]: SchemaDefinition;
}

const PRIMITIVES: ReadonlyMap<string, () => SchemaType> = new Map<string, () => SchemaType>([
  ['string', () => new StringType()],
  ['integer', () => new IntegerType()],
  ['float', () => new FloatType()],
  ['boolean', () => new BooleanType()],
  ['date', () => new DateType()],
  ['datetime', () => new DateTimeType()],
  ['uuid', () => new UuidType()],
  ['email', () => new EmailType()],
]);

function fromDefinition(definition: SchemaDefinition): SchemaType {
  return resolve(definition);
}

// Takes `unknown` so malformed definitions from untyped callers fail the same way.
function resolve(definition: unknown): SchemaType {
  if (isSchemaType(definition)) return definition;

  if (typeof definition === 'string') {
    const factory = PRIMITIVES.get(definition);
    if (!factory) throw new SchemaDefinitionError(`Unknown type name '${definition}'`);
    return factory();
  }

  if (Array.isArray(definition)) {
    const items: readonly unknown[] = definition;
    if (items.length !== 1) {
      throw new SchemaDefinitionError(`Array definitions take exactly one item type, got ${items.length}`);
    }
    return new ArrayType(resolve(items[0]));
  }

  if (isPlainObject(definition)) {
    const named = namedPrimitive(definition);
    if (named) return named;

    let object = new ObjectType();
    for (const [name, field] of Object.entries(definition)) {
      object = object.field(name, resolve(field));
    }
    return object;
  }

  throw new SchemaDefinitionError(`Unsupported schema definition: ${typeOf(definition)}`);
}

// `{ type: 'integer' }` names a primitive rather than a record with a `type` field.
function namedPrimitive(definition: Readonly<Record<string, unknown>>): SchemaType | undefined {
  const keys = Object.keys(definition);
  if (keys.length !== 1 || keys[0] !== 'type') return undefined;
  const { type } = definition;
  return typeof type === 'string' ? PRIMITIVES.get(type)?.() : undefined;
}

/** Builder handed to `Schema.define()`; fields take shorthand definitions. */
export class DefinitionBuilder {
  private current = new ObjectType();

  field(name: string, definition: SchemaDefinition, options?: FieldOptions): this {
    this.current = this.current.field(name, fromDefinition(definition), options);
    return this;
  }

  requiredField(name: string, definition: SchemaDefinition, metadata?: TypeMetadata): this {
    this.current = this.current.requiredField(name, fromDefinition(definition), metadata);
    return this;
  }

  optionalField(name: string, definition: SchemaDefinition, metadata?: TypeMetadata): this {
    this.current = this.current.optionalField(name, fromDefinition(definition), metadata);
    return this;
  }

  build(): ObjectType {
    return this.current;
  }
}

/** Entry points for validating and coercing against a type or a shorthand definition. */
export const Schema = {
  validate(value: unknown, type: SchemaType): ValidationResult {
    return type.validate(value);
  },

  coerce<TOutput>(value: unknown, type: BaseType<TOutput>, options?: CoerceOptions): TOutput {
    return type.coerce(value, options);
  },

  /**
   * Return `value` unchanged when it satisfies `type`.
   * @throws SchemaValidationError listing every problem otherwise
   */
  validateOrThrow<TValue>(value: TValue, type: SchemaType): TValue {
    const result = type.validate(value);
    if (!result.valid) throw new SchemaValidationError(result.errors);
    return value;
  },

  fromDefinition,

  define(build: (builder: DefinitionBuilder) => void): ObjectType {
    const builder = new DefinitionBuilder();
    build(builder);
    return builder.build();
  },
} as const;
