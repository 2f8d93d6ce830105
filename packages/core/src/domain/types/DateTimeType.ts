import { isValidDate } from '../model/values.js';
import { CoercionError } from '../errors/CoercionError.js';
import { ISO_DATETIME_PATTERN, parseDateTime } from '../services/dates.js';
import type { TypeMetadata } from './BaseType.js';
import type { TemporalOptions } from './TemporalType.js';
import { TemporalType } from './TemporalType.js';

/** A point in time. Integers are read as Unix timestamps in seconds. */
export class DateTimeType extends TemporalType {
  readonly kind = 'datetime' as const;
  readonly typeName = 'DateTime';
  protected readonly noun = 'datetime';
  protected readonly isoPattern = ISO_DATETIME_PATTERN;

  constructor(options: TemporalOptions = {}, metadata?: TypeMetadata) {
    super(options, metadata);
  }

  withMetadata(metadata: TypeMetadata): DateTimeType {
    return new DateTimeType(this.constraints, this.mergeMetadata(metadata));
  }

  protected override parse(text: string): Date | null {
    return parseDateTime(text);
  }

  protected override namedFormatMessage(label: string): string {
    return `DateTime must be in ${label} format`;
  }

  protected override defaultJsonFormat(): string {
    return 'date-time';
  }

  protected override coerceValue(value: unknown): Date {
    if (value instanceof Date) {
      if (!isValidDate(value)) throw new CoercionError(value, this.typeName, 'Invalid date');
      return value;
    }

    if (typeof value === 'string') {
      const parsed = parseDateTime(value);
      if (parsed === null) throw new CoercionError(value, this.typeName, `invalid date: '${value}'`);
      return parsed;
    }

    if (typeof value === 'number' && Number.isInteger(value)) {
      return new Date(value * 1000);
    }

    throw new CoercionError(value, this.typeName, 'Value cannot be converted to DateTime');
  }
}
