import { isValidDate } from '../model/values.js';
import { CoercionError } from '../errors/CoercionError.js';
import { ISO_DATE_PATTERN, parseCalendarDate, toCalendarDate } from '../services/dates.js';
import type { TypeMetadata } from './BaseType.js';
import type { TemporalOptions } from './TemporalType.js';
import { TemporalType } from './TemporalType.js';

/**
 * A calendar day. Coerced values are `Date` objects at midnight UTC.
 * Integers are read as Unix timestamps in seconds.
 */
export class DateType extends TemporalType {
  readonly kind = 'date' as const;
  readonly typeName = 'Date';
  protected readonly noun = 'date';
  protected readonly isoPattern = ISO_DATE_PATTERN;

  constructor(options: TemporalOptions = {}, metadata?: TypeMetadata) {
    super(options, metadata);
  }

  withMetadata(metadata: TypeMetadata): DateType {
    return new DateType(this.constraints, this.mergeMetadata(metadata));
  }

  protected override parse(text: string): Date | null {
    return parseCalendarDate(text);
  }

  protected override namedFormatMessage(label: string): string {
    return `Date must be in ${label} format (YYYY-MM-DD)`;
  }

  protected override defaultJsonFormat(): string {
    return 'date';
  }

  protected override coerceValue(value: unknown): Date {
    if (value instanceof Date) {
      if (!isValidDate(value)) throw new CoercionError(value, this.typeName, 'Invalid date');
      return toCalendarDate(value);
    }

    if (typeof value === 'string') {
      const parsed = parseCalendarDate(value);
      if (parsed === null) throw new CoercionError(value, this.typeName, `invalid date: '${value}'`);
      return parsed;
    }

    if (typeof value === 'number' && Number.isInteger(value)) {
      return toCalendarDate(new Date(value * 1000));
    }

    throw new CoercionError(value, this.typeName, 'Value cannot be converted to Date');
  }
}
