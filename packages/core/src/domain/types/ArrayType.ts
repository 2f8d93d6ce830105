import type { JsonSchema, JsonSchemaType } from '../model/JsonSchema.js';
import type { ValidationIssue } from '../model/ValidationResult.js';
import { issue, nestIssue } from '../model/ValidationResult.js';
import { deepEqual, typeOf } from '../model/values.js';
import { CoercionError } from '../errors/CoercionError.js';
import type { BaseConstraints, CoerceOptions, TypeMetadata } from './BaseType.js';
import { BaseType } from './BaseType.js';
import { assertCount, assertOrdered } from './constraints.js';
import { parseJsonText, rethrowNested } from './coercion.js';

export interface ArrayConstraints extends BaseConstraints {
  readonly minItems?: number;
  readonly maxItems?: number;
  readonly uniqueItems?: boolean;
}

export type ArrayOptions = Omit<ArrayConstraints, 'optional'>;

/** Homogeneous list whose items all conform to `itemType`. */
export class ArrayType<TItem = unknown> extends BaseType<TItem[], ArrayConstraints> {
  readonly kind = 'array' as const;
  readonly typeName = 'Array';
  readonly itemType: BaseType<TItem>;

  constructor(itemType: BaseType<TItem>, options: ArrayOptions = {}, metadata?: TypeMetadata) {
    assertCount('Array', 'minItems', options.minItems);
    assertCount('Array', 'maxItems', options.maxItems);
    assertOrdered('Array', ['minItems', options.minItems], ['maxItems', options.maxItems]);
    super(options, metadata);
    this.itemType = itemType;
  }

  withMetadata(metadata: TypeMetadata): ArrayType<TItem> {
    return new ArrayType(this.itemType, this.constraints, this.mergeMetadata(metadata));
  }

  override toString(): string {
    return `Array[${this.itemType.toString()}]${this.formatConstraints()}`;
  }

  protected override validateType(value: unknown): ValidationIssue[] {
    return Array.isArray(value) ? [] : [issue('TYPE_MISMATCH', `Expected array, got ${typeOf(value)}`)];
  }

  protected override validateConstraints(value: unknown): ValidationIssue[] {
    if (!Array.isArray(value)) return [];

    const { minItems, maxItems, uniqueItems } = this.constraints;
    const items: readonly unknown[] = value;
    const issues: ValidationIssue[] = [];

    if (minItems !== undefined && items.length < minItems) {
      issues.push(issue('ITEM_COUNT', `Array length ${items.length} is below minimum ${minItems}`));
    }
    if (maxItems !== undefined && items.length > maxItems) {
      issues.push(issue('ITEM_COUNT', `Array length ${items.length} exceeds maximum ${maxItems}`));
    }
    if (uniqueItems === true && hasDuplicates(items)) {
      issues.push(issue('DUPLICATE_VALUE', 'Array contains duplicate items but must be unique'));
    }

    items.forEach((item, index) => {
      for (const child of this.itemType.check(item)) {
        issues.push(nestIssue(child, index, `Item at index ${index}`));
      }
    });
    return issues;
  }

  protected override coerceValue(value: unknown, options: CoerceOptions): TItem[] {
    if (Array.isArray(value)) return this.coerceItems(value, value, options);

    if (typeof value === 'string') {
      const parsed = parseJsonText(value, this.typeName);
      if (!Array.isArray(parsed)) {
        throw new CoercionError(value, this.typeName, 'JSON string did not parse to array');
      }
      return this.coerceItems(parsed, value, options);
    }

    if (options.policy === 'strict') {
      throw new CoercionError(value, this.typeName, 'Value is not an array');
    }
    // Lenient: a single value becomes a one-element list.
    return this.coerceItems([value], value, options);
  }

  protected override jsonType(): JsonSchemaType {
    return 'array';
  }

  protected override applyConstraintsToSchema(schema: JsonSchema): void {
    const { minItems, maxItems, uniqueItems } = this.constraints;
    schema.items = this.itemType.toJsonSchema();
    if (minItems !== undefined) schema.minItems = minItems;
    if (maxItems !== undefined) schema.maxItems = maxItems;
    if (uniqueItems === true) schema.uniqueItems = true;
  }

  private coerceItems(items: readonly unknown[], original: unknown, options: CoerceOptions): TItem[] {
    return items.map((item, index) => {
      try {
        return this.itemType.coerce(item, options);
      } catch (error) {
        return rethrowNested(error, original, this.typeName, `Item at index ${index}`);
      }
    });
  }
}

function hasDuplicates(items: readonly unknown[]): boolean {
  return items.some((item, index) => items.slice(0, index).some((earlier) => deepEqual(earlier, item)));
}
