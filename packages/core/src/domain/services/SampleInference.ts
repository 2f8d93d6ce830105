import { isNil, isPlainObject, isValidDate, typeOf } from '../model/values.js';
import { SchemaDefinitionError } from '../errors/SchemaErrors.js';
import type { SchemaType } from '../types/BaseType.js';
import { StringType } from '../types/StringType.js';
import { EmailType } from '../types/EmailType.js';
import { UuidType } from '../types/UuidType.js';
import { IntegerType } from '../types/IntegerType.js';
import { FloatType } from '../types/FloatType.js';
import { BooleanType } from '../types/BooleanType.js';
import { DateType } from '../types/DateType.js';
import { DateTimeType } from '../types/DateTimeType.js';
import { ArrayType } from '../types/ArrayType.js';
import { HashType } from '../types/HashType.js';
import { OptionalType } from '../types/OptionalType.js';
import type { FieldFilter } from './AutoDerivation.js';
import { includesField } from './AutoDerivation.js';
import { EMAIL_PATTERN, UUID_PATTERN } from './formats.js';
import { ISO_DATE_PATTERN, ISO_DATETIME_PATTERN, parseCalendarDate, parseDateTime } from './dates.js';

export interface InferenceOptions extends FieldFilter {
  /** Only the first `maxRecords` samples are analysed. Default: 1000. */
  readonly maxRecords?: number;
  /** Promote strings to Email, UUID, Date or DateTime when every sample matches. Default: true. */
  readonly detectFormats?: boolean;
}

type ObservedKind = 'integer' | 'float' | 'boolean' | 'datetime' | 'string' | 'array' | 'object';

type DetectedFormat = 'uuid' | 'email' | 'date' | 'datetime';

// Checked in this order; the first one every sample satisfies wins.
const FORMAT_DETECTORS: readonly (readonly [DetectedFormat, (value: string) => boolean])[] = [
  ['uuid', (v) => UUID_PATTERN.test(v)],
  ['email', (v) => EMAIL_PATTERN.test(v)],
  ['date', (v) => ISO_DATE_PATTERN.test(v) && parseCalendarDate(v) !== null],
  ['datetime', (v) => ISO_DATETIME_PATTERN.test(v) && parseDateTime(v) !== null],
];

/** Accumulates every non-absent value seen at one position. */
class ValueShape {
  observations = 0;
  private readonly kinds = new Set<ObservedKind>();
  private formats: Set<DetectedFormat> | undefined;
  private items: ValueShape | undefined;
  private record: RecordShape | undefined;

  observe(value: unknown): void {
    if (isNil(value)) return;
    this.observations++;

    if (typeof value === 'number') {
      this.kinds.add(Number.isInteger(value) ? 'integer' : 'float');
    } else if (typeof value === 'bigint') {
      this.kinds.add('integer');
    } else if (typeof value === 'boolean') {
      this.kinds.add('boolean');
    } else if (isValidDate(value)) {
      this.kinds.add('datetime');
    } else if (typeof value === 'string') {
      this.kinds.add('string');
      this.observeString(value);
    } else if (Array.isArray(value)) {
      this.kinds.add('array');
      this.items ??= new ValueShape();
      for (const item of value) this.items.observe(item);
    } else if (isPlainObject(value)) {
      this.kinds.add('object');
      this.record ??= new RecordShape();
      this.record.observe(value);
    } else {
      this.kinds.add('string');
      this.formats = new Set();
    }
  }

  toType(detectFormats: boolean): SchemaType {
    const kinds = [...this.kinds];
    if (kinds.length === 0) return new StringType();
    if (kinds.every((kind) => kind === 'integer' || kind === 'float')) {
      return kinds.includes('float') ? new FloatType() : new IntegerType();
    }
    if (kinds.length > 1) return new StringType();

    switch (kinds[0]) {
      case 'boolean':
        return new BooleanType();
      case 'datetime':
        return new DateTimeType();
      case 'array':
        return new ArrayType(this.items?.toType(detectFormats) ?? new StringType());
      case 'object':
        return this.record?.toType(detectFormats, {}) ?? new HashType();
      default:
        return detectFormats ? this.formattedString() : new StringType();
    }
  }

  private observeString(value: string): void {
    const matching = FORMAT_DETECTORS.filter(([, test]) => test(value)).map(([format]) => format);
    if (this.formats === undefined) {
      this.formats = new Set(matching);
      return;
    }
    for (const format of this.formats) {
      if (!matching.includes(format)) this.formats.delete(format);
    }
  }

  private formattedString(): SchemaType {
    const format = FORMAT_DETECTORS.map(([name]) => name).find((name) => this.formats?.has(name) === true);
    switch (format) {
      case 'uuid':
        return new UuidType();
      case 'email':
        return new EmailType();
      case 'date':
        return new DateType();
      case 'datetime':
        return new DateTimeType();
      default:
        return new StringType();
    }
  }
}

/** Accumulates field shapes across many records. */
class RecordShape {
  private records = 0;
  private readonly fields = new Map<string, ValueShape>();

  observe(record: Readonly<Record<string, unknown>>): void {
    this.records++;
    for (const [name, value] of Object.entries(record)) {
      let shape = this.fields.get(name);
      if (!shape) {
        shape = new ValueShape();
        this.fields.set(name, shape);
      }
      shape.observe(value);
    }
  }

  toType(detectFormats: boolean, filter: FieldFilter): HashType {
    const fields: Record<string, SchemaType> = {};
    for (const [name, shape] of this.fields) {
      if (!includesField(name, filter)) continue;
      const type = shape.toType(detectFormats);
      // Missing or absent in at least one record.
      fields[name] = shape.observations < this.records ? new OptionalType(type) : type;
    }
    return new HashType(fields);
  }
}

/**
 * Derive a Hash from many sample records by merging what each one shows.
 *
 * Integer and Float samples merge to Float; any other disagreement falls back
 * to String. A key that is missing or absent in any record becomes Optional.
 * Nested objects merge field by field.
 *
 * @throws SchemaDefinitionError when a sample is not a plain object
 */
export function fromSamples(records: Iterable<unknown>, options: InferenceOptions = {}): HashType {
  const maxRecords = options.maxRecords ?? 1000;
  const detectFormats = options.detectFormats ?? true;
  const shape = new RecordShape();

  let index = 0;
  for (const record of records) {
    if (index >= maxRecords) break;
    if (!isPlainObject(record)) {
      throw new SchemaDefinitionError(`Sample at index ${index} must be a plain object, got ${typeOf(record)}`);
    }
    shape.observe(record);
    index++;
  }

  return shape.toType(detectFormats, options);
}
