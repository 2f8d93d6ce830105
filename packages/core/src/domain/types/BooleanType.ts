import type { JsonSchemaType } from '../model/JsonSchema.js';
import type { ValidationIssue } from '../model/ValidationResult.js';
import { issue } from '../model/ValidationResult.js';
import { typeOf } from '../model/values.js';
import { CoercionError } from '../errors/CoercionError.js';
import type { BaseConstraints, CoerceOptions, TypeMetadata } from './BaseType.js';
import { BaseType } from './BaseType.js';

const TRUE_WORDS = new Set(['true', 'yes', 'on', '1']);
const FALSE_WORDS = new Set(['false', 'no', 'off', '0']);

/** `true` or `false`, with the usual textual spellings accepted by `coerce`. */
export class BooleanType extends BaseType<boolean, BaseConstraints> {
  readonly kind = 'boolean' as const;
  readonly typeName = 'Boolean';

  constructor(metadata?: TypeMetadata) {
    super({}, metadata);
  }

  withMetadata(metadata: TypeMetadata): BooleanType {
    return new BooleanType(this.mergeMetadata(metadata));
  }

  protected override validateType(value: unknown): ValidationIssue[] {
    if (typeof value === 'boolean') return [];
    return [issue('TYPE_MISMATCH', `Expected boolean (true or false), got ${typeOf(value)}`)];
  }

  protected override coerceValue(value: unknown, options: CoerceOptions): boolean {
    if (typeof value === 'boolean') return value;
    if (value === 1) return true;
    if (value === 0) return false;

    if (typeof value === 'string') {
      const word = value.trim().toLowerCase();
      if (TRUE_WORDS.has(word)) return true;
      if (FALSE_WORDS.has(word)) return false;
      throw new CoercionError(value, this.typeName, `Cannot convert '${value}' to boolean`);
    }

    if (options.policy === 'strict') {
      throw new CoercionError(value, this.typeName, 'Value is not a recognised boolean representation');
    }
    // Lenient: any other present value is truthy.
    return true;
  }

  protected override jsonType(): JsonSchemaType {
    return 'boolean';
  }
}
