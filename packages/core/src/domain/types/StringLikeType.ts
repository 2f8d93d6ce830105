import type { JsonSchema, JsonSchemaType } from '../model/JsonSchema.js';
import type { ValidationIssue } from '../model/ValidationResult.js';
import { issue } from '../model/ValidationResult.js';
import { isValidDate, typeOf } from '../model/values.js';
import { CoercionError } from '../errors/CoercionError.js';
import type { StringFormat } from '../services/formats.js';
import { checkFormat } from '../services/formats.js';
import type { BaseConstraints, TypeMetadata } from './BaseType.js';
import { BaseType } from './BaseType.js';
import { assertCount, assertOrdered } from './constraints.js';

export interface StringConstraints extends BaseConstraints {
  /** Minimum length in characters (code points). */
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly pattern?: RegExp;
  readonly format?: StringFormat;
}

/** Constraints accepted from callers; `optional` is only ever set by `Types.optional()`. */
export type StringOptions = Omit<StringConstraints, 'optional'>;

/** Shared behaviour of the string-backed types: String, Email and UUID. */
export abstract class StringLikeType extends BaseType<string, StringConstraints> {
  protected constructor(constraints: StringConstraints, metadata?: TypeMetadata) {
    assertCount('String', 'minLength', constraints.minLength);
    assertCount('String', 'maxLength', constraints.maxLength);
    assertOrdered('String', ['minLength', constraints.minLength], ['maxLength', constraints.maxLength]);
    super(constraints, metadata);
  }

  protected override validateType(value: unknown): ValidationIssue[] {
    return typeof value === 'string' ? [] : [issue('TYPE_MISMATCH', `Expected string, got ${typeOf(value)}`)];
  }

  protected override validateConstraints(value: unknown): ValidationIssue[] {
    if (typeof value !== 'string') return [];
    return [...this.validateLength(value), ...this.validatePattern(value), ...this.validateFormat(value)];
  }

  protected validateLength(value: string): ValidationIssue[] {
    const { minLength, maxLength } = this.constraints;
    const length = [...value].length;
    const issues: ValidationIssue[] = [];

    if (minLength !== undefined && length < minLength) {
      issues.push(issue('LENGTH', `String length ${length} is below minimum ${minLength}`));
    }
    if (maxLength !== undefined && length > maxLength) {
      issues.push(issue('LENGTH', `String length ${length} exceeds maximum ${maxLength}`));
    }
    return issues;
  }

  protected validatePattern(value: string): ValidationIssue[] {
    const { pattern } = this.constraints;
    if (pattern === undefined || pattern.test(value)) return [];
    return [issue('PATTERN_MISMATCH', `String '${value}' does not match pattern ${String(pattern)}`)];
  }

  protected validateFormat(value: string): ValidationIssue[] {
    const { format } = this.constraints;
    if (format === undefined) return [];
    const message = checkFormat(value, format);
    return message === null ? [] : [issue('FORMAT_MISMATCH', message)];
  }

  protected override coerceValue(value: unknown): string {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
      return String(value);
    }
    if (typeof value === 'symbol') return value.description ?? '';
    if (value instanceof Date) {
      if (!isValidDate(value)) throw new CoercionError(value, this.typeName, 'Invalid date');
      return value.toISOString();
    }
    if (hasOwnToString(value)) {
      try {
        return String(value);
      } catch (error) {
        throw new CoercionError(value, this.typeName, 'Value has no string representation', { cause: error });
      }
    }
    throw new CoercionError(value, this.typeName, 'Value has no string representation');
  }

  protected override jsonType(): JsonSchemaType {
    return 'string';
  }

  protected override applyConstraintsToSchema(schema: JsonSchema): void {
    const { minLength, maxLength, pattern, format } = this.constraints;
    if (minLength !== undefined) schema.minLength = minLength;
    if (maxLength !== undefined) schema.maxLength = maxLength;
    if (pattern !== undefined) schema.pattern = pattern.source;
    if (format !== undefined) schema.format = format;
  }
}

/** Objects whose `toString` is a function other than the plain-object default. */
function hasOwnToString(value: unknown): boolean {
  if (typeof value !== 'object' || value === null) return false;
  const { toString } = value;
  return typeof toString === 'function' && toString !== Object.prototype.toString;
}
