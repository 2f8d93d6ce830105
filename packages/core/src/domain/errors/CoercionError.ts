import { formatValue } from '../model/values.js';

/**
 * Raised when a value cannot be converted to a type's native representation.
 *
 * Coercion is all-or-nothing: the first failure aborts the whole conversion.
 * Nested failures are re-raised by the enclosing composite with the field or
 * index prepended to `reason`, and the original error kept as `cause`.
 */
export class CoercionError extends Error {
  readonly value: unknown;
  /** Name of the type the value was being converted to (e.g. `'Integer'`). */
  readonly targetType: string;
  readonly reason: string | undefined;

  constructor(value: unknown, targetType: string, reason?: string, options?: { cause?: unknown }) {
    super(CoercionError.buildMessage(value, targetType, reason), options);
    this.name = 'CoercionError';
    this.value = value;
    this.targetType = targetType;
    this.reason = reason;
  }

  private static buildMessage(value: unknown, targetType: string, reason: string | undefined): string {
    const base = `Cannot coerce ${formatValue(value)} to ${targetType}`;
    return reason ? `${base}: ${reason}` : base;
  }
}
