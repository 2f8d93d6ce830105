import type { JsonSchema, JsonSchemaType } from '../model/JsonSchema.js';
import type { ValidationIssue } from '../model/ValidationResult.js';
import { issue } from '../model/ValidationResult.js';
import { isValidDate, typeOf } from '../model/values.js';
import type { DateFormatMatcher } from '../services/dates.js';
import { compileDateFormat } from '../services/dates.js';
import type { BaseConstraints, TypeMetadata } from './BaseType.js';
import { BaseType } from './BaseType.js';

/** `iso8601`, `rfc3339`, or a custom `strftime`-style pattern such as `%d/%m/%Y`. */
export type DateFormat = 'iso8601' | 'rfc3339' | (string & {});

export interface TemporalConstraints extends BaseConstraints {
  readonly format?: DateFormat;
}

export type TemporalOptions = Omit<TemporalConstraints, 'optional'>;

/**
 * Shared behaviour of Date and DateTime.
 *
 * The `format` constraint only applies to string inputs during validation.
 * Coercion parses leniently whatever the format says.
 */
export abstract class TemporalType extends BaseType<Date, TemporalConstraints> {
  private readonly matcher: DateFormatMatcher | undefined;

  protected constructor(constraints: TemporalConstraints, metadata?: TypeMetadata) {
    super(constraints, metadata);
    const { format } = constraints;
    this.matcher = format === undefined || isNamedFormat(format) ? undefined : compileDateFormat(format);
  }

  /** Noun used in messages, e.g. `date` or `datetime`. */
  protected abstract readonly noun: string;

  /** Pattern a string must match under the `iso8601` and `rfc3339` formats. */
  protected abstract readonly isoPattern: RegExp;

  protected abstract parse(text: string): Date | null;

  protected override validateType(value: unknown): ValidationIssue[] {
    if (isValidDate(value)) return [];
    if (typeof value === 'string' && this.parse(value) !== null) return [];
    return [issue('TYPE_MISMATCH', `Expected Date or ${this.noun} string, got ${typeOf(value)}`)];
  }

  protected override validateConstraints(value: unknown): ValidationIssue[] {
    const { format } = this.constraints;
    if (format === undefined || typeof value !== 'string') return [];

    if (this.matcher) {
      return this.matcher(value) ? [] : [issue('FORMAT_MISMATCH', `${this.typeName} does not match format ${format}`)];
    }
    if (this.isoPattern.test(value)) return [];
    return [issue('FORMAT_MISMATCH', this.namedFormatMessage(format === 'rfc3339' ? 'RFC3339' : 'ISO8601'))];
  }

  protected abstract namedFormatMessage(label: string): string;

  protected override jsonType(): JsonSchemaType {
    return 'string';
  }

  protected abstract defaultJsonFormat(): string;

  protected override applyConstraintsToSchema(schema: JsonSchema): void {
    schema.format = this.constraints.format ?? this.defaultJsonFormat();
  }
}

function isNamedFormat(format: string): boolean {
  return format === 'iso8601' || format === 'rfc3339';
}
