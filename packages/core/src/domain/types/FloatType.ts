import type { JsonSchemaType } from '../model/JsonSchema.js';
import type { ValidationIssue } from '../model/ValidationResult.js';
import { issue } from '../model/ValidationResult.js';
import { formatValue, isValidDate, typeOf } from '../model/values.js';
import { CoercionError } from '../errors/CoercionError.js';
import type { TypeMetadata } from './BaseType.js';
import type { NumericOptions } from './NumericType.js';
import { NumericType } from './NumericType.js';

const DECIMAL_TEXT = /^[+-]?(?:\d+(?:\.\d+)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Finite floating-point numbers; integers are accepted as-is. */
export class FloatType extends NumericType {
  readonly kind = 'float' as const;
  readonly typeName = 'Float';

  constructor(options: NumericOptions = {}, metadata?: TypeMetadata) {
    super('Float', options, metadata);
  }

  withMetadata(metadata: TypeMetadata): FloatType {
    return new FloatType(this.constraints, this.mergeMetadata(metadata));
  }

  protected override validateType(value: unknown): ValidationIssue[] {
    if (typeof value === 'number' && Number.isFinite(value)) return [];
    return [issue('TYPE_MISMATCH', `Expected number (float or integer), got ${typeOf(value)}`)];
  }

  protected override coerceValue(value: unknown): number {
    if (typeof value === 'number') {
      if (!Number.isFinite(value)) throw new CoercionError(value, this.typeName, 'Value is not a finite number');
      return value;
    }

    if (typeof value === 'string') {
      const text = value.trim();
      const parsed = DECIMAL_TEXT.test(text) ? Number(text) : Number.NaN;
      if (!Number.isFinite(parsed)) {
        throw new CoercionError(value, this.typeName, `invalid value for float: ${formatValue(value)}`);
      }
      return parsed;
    }

    if (typeof value === 'boolean') return value ? 1 : 0;
    if (typeof value === 'bigint') return Number(value);
    if (isValidDate(value)) return value.getTime() / 1000;

    throw new CoercionError(value, this.typeName, 'Value cannot be converted to float');
  }

  protected override jsonType(): JsonSchemaType {
    return 'number';
  }
}
