import { formatValue } from '../model/values.js';

/** Anything that names itself for messages; every schema type does. */
export interface NamedType {
  toString(): string;
}

/**
 * Carrier for a failed validation: the offending value, the type it was
 * checked against and every message produced.
 */
export class ValidationError extends Error {
  readonly value: unknown;
  readonly type: NamedType;
  readonly errors: readonly string[];

  constructor(value: unknown, type: NamedType, errors: readonly string[] = []) {
    super(ValidationError.buildMessage(value, type, errors));
    this.name = 'ValidationError';
    this.value = value;
    this.type = type;
    this.errors = errors;
  }

  private static buildMessage(value: unknown, type: NamedType, errors: readonly string[]): string {
    const base = `Validation failed for value ${formatValue(value)} against type ${type.toString()}`;
    if (errors.length === 0) return base;
    return `${base}:\n${errors.map((e) => `  - ${e}`).join('\n')}`;
  }
}
