import type { JsonSchemaType } from '../model/JsonSchema.js';
import type { ValidationIssue } from '../model/ValidationResult.js';
import { issue } from '../model/ValidationResult.js';
import { formatValue, isValidDate, typeOf } from '../model/values.js';
import { CoercionError } from '../errors/CoercionError.js';
import type { CoerceOptions, TypeMetadata } from './BaseType.js';
import type { NumericOptions } from './NumericType.js';
import { NumericType } from './NumericType.js';

const INTEGER_TEXT = /^[+-]?\d+$/;

/** Whole numbers within the safe integer range. */
export class IntegerType extends NumericType {
  readonly kind = 'integer' as const;
  readonly typeName = 'Integer';

  constructor(options: NumericOptions = {}, metadata?: TypeMetadata) {
    super('Integer', options, metadata);
  }

  withMetadata(metadata: TypeMetadata): IntegerType {
    return new IntegerType(this.constraints, this.mergeMetadata(metadata));
  }

  protected override validateType(value: unknown): ValidationIssue[] {
    return Number.isInteger(value) ? [] : [issue('TYPE_MISMATCH', `Expected integer, got ${typeOf(value)}`)];
  }

  protected override coerceValue(value: unknown, options: CoerceOptions): number {
    if (typeof value === 'number') {
      if (!Number.isFinite(value)) throw new CoercionError(value, this.typeName, 'Value is not a finite number');
      if (Number.isInteger(value)) return value;
      if (options.policy === 'strict') {
        throw new CoercionError(value, this.typeName, 'Value has a fractional part');
      }
      const truncated = Math.trunc(value);
      return truncated === 0 ? 0 : truncated;
    }

    if (typeof value === 'string') {
      const text = value.trim();
      if (!INTEGER_TEXT.test(text)) {
        throw new CoercionError(value, this.typeName, `invalid value for integer: ${formatValue(value)}`);
      }
      return this.safe(Number(text), value);
    }

    if (typeof value === 'boolean') return value ? 1 : 0;
    if (typeof value === 'bigint') return this.safe(Number(value), value);
    if (isValidDate(value)) return Math.floor(value.getTime() / 1000);

    throw new CoercionError(value, this.typeName, 'Value cannot be converted to integer');
  }

  protected override jsonType(): JsonSchemaType {
    return 'integer';
  }

  private safe(result: number, original: unknown): number {
    if (!Number.isSafeInteger(result)) {
      throw new CoercionError(original, this.typeName, 'Value is outside the safe integer range');
    }
    return result === 0 ? 0 : result;
  }
}
