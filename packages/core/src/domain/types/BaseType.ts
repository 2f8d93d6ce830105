import type { JsonSchema, JsonSchemaType } from '../model/JsonSchema.js';
import type { ValidationIssue, ValidationResult } from '../model/ValidationResult.js';
import { invalidResult, issue, validResult } from '../model/ValidationResult.js';
import { isNil } from '../model/values.js';
import { ValidationError } from '../errors/ValidationError.js';
import { CoercionError } from '../errors/CoercionError.js';

/** Discriminant carried by every concrete type. */
export type TypeKind =
  | 'string'
  | 'email'
  | 'uuid'
  | 'integer'
  | 'float'
  | 'boolean'
  | 'date'
  | 'datetime'
  | 'array'
  | 'hash'
  | 'object'
  | 'optional';

/**
 * How permissive coercion is.
 *
 * - `lenient` (default): floats truncate to integers, bare values are boxed into
 *   one-element arrays, unrecognised non-string values coerce to `true` for booleans.
 * - `strict`: each of those raises a `CoercionError` instead.
 */
export type CoercionPolicy = 'lenient' | 'strict';

export interface CoerceOptions {
  readonly policy?: CoercionPolicy;
}

/** Descriptive annotations. They never change validation or coercion. */
export interface TypeMetadata {
  readonly description?: string;
  readonly example?: unknown;
  readonly [key: string]: unknown;
}

export interface BaseConstraints {
  readonly optional?: boolean;
}

/**
 * Abstract contract shared by every schema type.
 *
 * Instances are immutable: constraints and metadata are frozen at construction,
 * and `withMetadata()` returns a new instance. `validate()` and `coerce()` are
 * pure functions of the instance and their input, so one schema can be shared
 * across concurrent callers.
 *
 * Subclasses plug into four points: `validateType`, `validateConstraints`,
 * `coerceValue` and `applyConstraintsToSchema`.
 */
export abstract class BaseType<TOutput = unknown, TConstraints extends BaseConstraints = BaseConstraints> {
  abstract readonly kind: TypeKind;
  /** Name used in messages and by `toString()`. */
  abstract readonly typeName: string;
  readonly constraints: Readonly<TConstraints>;
  readonly metadata: Readonly<TypeMetadata>;

  protected constructor(constraints: TConstraints, metadata: TypeMetadata = {}) {
    this.constraints = Object.freeze({ ...constraints });
    this.metadata = Object.freeze({ ...metadata });
  }

  /**
   * Validate a value, collecting every problem in one pass.
   * Never throws for a well-formed schema.
   */
  validate(value: unknown): ValidationResult {
    const issues = this.check(value);
    if (issues.length === 0) return validResult();

    return invalidResult(
      issues,
      new ValidationError(
        value,
        this,
        issues.map((i) => i.message),
      ),
    );
  }

  /**
   * Issue-level form of `validate()`. Composite types call it on their children
   * and re-anchor the returned issues under the field name or index.
   */
  check(value: unknown): readonly ValidationIssue[] {
    if (isNil(value)) {
      return this.isRequired() ? [issue('REQUIRED', `Value is required but got ${String(value)}`)] : [];
    }

    // Both phases run so the caller sees every problem at once.
    return [...this.validateType(value), ...this.validateConstraints(value)];
  }

  /**
   * Convert a value to this type's native representation.
   * @throws CoercionError when the value cannot be converted
   */
  coerce(value: unknown, options: CoerceOptions = {}): TOutput {
    if (isNil(value)) {
      throw new CoercionError(value, this.typeName, `Required value cannot be ${String(value)}`);
    }
    return this.coerceValue(value, options);
  }

  isRequired(): boolean {
    return this.constraints.optional !== true;
  }

  isOptional(): boolean {
    return !this.isRequired();
  }

  toJsonSchema(): JsonSchema {
    const schema: JsonSchema = { type: this.jsonType() };
    if (this.metadata.description !== undefined) schema.description = this.metadata.description;
    if (this.metadata.example !== undefined) schema.example = this.metadata.example;
    this.applyConstraintsToSchema(schema);
    return schema;
  }

  /** Return a copy of this type with `metadata` merged over the current annotations. */
  abstract withMetadata(metadata: TypeMetadata): BaseType<TOutput, TConstraints>;

  describe(text: string): BaseType<TOutput, TConstraints> {
    return this.withMetadata({ description: text });
  }

  example(value: unknown): BaseType<TOutput, TConstraints> {
    return this.withMetadata({ example: value });
  }

  toString(): string {
    return `${this.typeName}${this.formatConstraints()}`;
  }

  protected validateType(_value: unknown): ValidationIssue[] {
    return [];
  }

  protected validateConstraints(_value: unknown): ValidationIssue[] {
    return [];
  }

  protected abstract coerceValue(value: unknown, options: CoerceOptions): TOutput;

  protected abstract jsonType(): JsonSchemaType;

  protected applyConstraintsToSchema(_schema: JsonSchema): void {
    // No constraint keywords by default.
  }

  protected mergeMetadata(metadata: TypeMetadata): TypeMetadata {
    return { ...this.metadata, ...metadata };
  }

  protected formatConstraints(constraints: object = this.constraints): string {
    const parts = Object.entries(constraints)
      .filter(([key, value]) => key !== 'optional' && value !== undefined)
      .map(([key, value]: [string, unknown]) => `${key}: ${String(value)}`);
    return parts.length === 0 ? '' : `(${parts.join(', ')})`;
  }
}

/** Any schema type, whatever it coerces to. */
export type SchemaType = BaseType<unknown>;

/** The TypeScript type a schema coerces to. */
export type Infer<T> = T extends BaseType<infer TOutput> ? TOutput : never;

/** Whether a value is a schema type instance. */
export function isSchemaType(value: unknown): value is SchemaType {
  return value instanceof BaseType;
}
