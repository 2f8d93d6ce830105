import type { JsonSchema, JsonSchemaType } from '../model/JsonSchema.js';
import type { ValidationIssue } from '../model/ValidationResult.js';
import { issue, nestIssue } from '../model/ValidationResult.js';
import { isNil, isPlainObject, typeOf } from '../model/values.js';
import { CoercionError } from '../errors/CoercionError.js';
import type { BaseConstraints, CoerceOptions, SchemaType, TypeMetadata } from './BaseType.js';
import { BaseType } from './BaseType.js';
import { parseJsonText, rethrowNested } from './coercion.js';

/** Field name to field type. Insertion order is the declaration order. */
export type FieldMap = Readonly<Record<string, SchemaType>>;

export interface StructConstraints extends BaseConstraints {
  readonly additionalProperties?: boolean;
}

/** Read an own property, so inherited keys such as `constructor` never count as fields. */
export function ownField(record: Readonly<Record<string, unknown>>, name: string): unknown {
  return Object.hasOwn(record, name) ? record[name] : undefined;
}

// Plain assignment of `__proto__` would replace the prototype instead of adding a key.
function defineField(target: Record<string, unknown>, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Shared behaviour of Hash and Object: a record with declared fields.
 *
 * Inputs must be plain objects (or JSON text parsing to one). Fields whose
 * value is absent are left out of the coerced result unless required.
 */
export abstract class StructType extends BaseType<Record<string, unknown>, StructConstraints> {
  readonly fields: FieldMap;

  protected constructor(fields: FieldMap, constraints: StructConstraints, metadata?: TypeMetadata) {
    super(constraints, metadata);
    this.fields = Object.freeze({ ...fields });
  }

  /** Whether keys without a declared field are allowed (validation) and kept (coercion). */
  get additionalProperties(): boolean {
    return this.constraints.additionalProperties !== false;
  }

  override toString(): string {
    const entries = Object.entries(this.fields).map(([name, type]) => `${name}: ${type.toString()}`);
    return entries.length === 0 ? this.typeName : `${this.typeName}{${entries.join(', ')}}`;
  }

  /** Whether undeclared keys survive coercion. */
  protected abstract keepsUnknownFields(): boolean;

  protected override validateType(value: unknown): ValidationIssue[] {
    return isPlainObject(value) ? [] : [issue('TYPE_MISMATCH', `Expected object, got ${typeOf(value)}`)];
  }

  protected override validateConstraints(value: unknown): ValidationIssue[] {
    if (!isPlainObject(value)) return [];

    const issues: ValidationIssue[] = [];
    for (const [name, type] of Object.entries(this.fields)) {
      for (const child of type.check(ownField(value, name))) {
        issues.push(nestIssue(child, name, `Field '${name}'`));
      }
    }
    return issues;
  }

  protected override coerceValue(value: unknown, options: CoerceOptions): Record<string, unknown> {
    if (typeof value === 'string') {
      const parsed = parseJsonText(value, this.typeName);
      if (!isPlainObject(parsed)) {
        throw new CoercionError(value, this.typeName, `JSON string did not parse to ${this.kind}`);
      }
      return this.coerceRecord(parsed, options);
    }
    if (!isPlainObject(value)) {
      throw new CoercionError(value, this.typeName, `Value cannot be converted to ${this.kind}`);
    }
    return this.coerceRecord(value, options);
  }

  protected override jsonType(): JsonSchemaType {
    return 'object';
  }

  protected override applyConstraintsToSchema(schema: JsonSchema): void {
    const names = Object.keys(this.fields);
    if (names.length > 0) {
      schema.properties = Object.fromEntries(
        Object.entries(this.fields).map(([name, type]) => [name, type.toJsonSchema()]),
      );
      const required = names.filter((name) => this.fields[name]?.isRequired() === true);
      if (required.length > 0) schema.required = required;
    }
    schema.additionalProperties = this.additionalProperties;
  }

  private coerceRecord(record: Record<string, unknown>, options: CoerceOptions): Record<string, unknown> {
    const result: Record<string, unknown> = {};

    for (const [name, type] of Object.entries(this.fields)) {
      const fieldValue = ownField(record, name);
      if (isNil(fieldValue) && !type.isRequired()) continue;
      try {
        defineField(result, name, type.coerce(fieldValue, options));
      } catch (error) {
        rethrowNested(error, record, this.typeName, `Field '${name}'`);
      }
    }

    if (this.keepsUnknownFields()) {
      for (const key of Object.keys(record)) {
        if (!Object.hasOwn(this.fields, key)) defineField(result, key, record[key]);
      }
    }
    return result;
  }
}
