import type { JsonSchema, JsonSchemaType } from '../model/JsonSchema.js';
import type { ValidationIssue } from '../model/ValidationResult.js';
import type { Nil } from '../model/values.js';
import { isNil } from '../model/values.js';
import type { BaseConstraints, CoerceOptions, TypeMetadata } from './BaseType.js';
import { BaseType } from './BaseType.js';

/**
 * Admits `null` and `undefined` in addition to whatever `inner` admits.
 * Absent values pass validation and are returned unchanged by `coerce`.
 */
export class OptionalType<TInner = unknown> extends BaseType<TInner | Nil, BaseConstraints> {
  readonly kind = 'optional' as const;
  readonly typeName = 'Optional';
  readonly inner: BaseType<TInner>;

  constructor(inner: BaseType<TInner>) {
    super({ optional: true });
    this.inner = inner;
  }

  override check(value: unknown): readonly ValidationIssue[] {
    return isNil(value) ? [] : this.inner.check(value);
  }

  override coerce(value: unknown, options: CoerceOptions = {}): TInner | Nil {
    if (isNil(value)) return value;
    return this.inner.coerce(value, options);
  }

  /** Annotations live on the wrapped type, so the schema stays the inner one. */
  withMetadata(metadata: TypeMetadata): OptionalType<TInner> {
    return new OptionalType(this.inner.withMetadata(metadata));
  }

  override toJsonSchema(): JsonSchema {
    return this.inner.toJsonSchema();
  }

  override toString(): string {
    return `Optional[${this.inner.toString()}]`;
  }

  protected override coerceValue(value: unknown, options: CoerceOptions): TInner {
    return this.inner.coerce(value, options);
  }

  protected override jsonType(): JsonSchemaType {
    return this.inner.toJsonSchema().type;
  }
}
