import type { BaseType, TypeMetadata } from './BaseType.js';
import { StringType } from './StringType.js';
import type { StringOptions } from './StringLikeType.js';
import { EmailType } from './EmailType.js';
import type { EmailOptions } from './EmailType.js';
import { UuidType } from './UuidType.js';
import type { UuidOptions } from './UuidType.js';
import { IntegerType } from './IntegerType.js';
import { FloatType } from './FloatType.js';
import type { NumericOptions } from './NumericType.js';
import { BooleanType } from './BooleanType.js';
import { DateType } from './DateType.js';
import { DateTimeType } from './DateTimeType.js';
import type { TemporalOptions } from './TemporalType.js';
import { ArrayType } from './ArrayType.js';
import type { ArrayOptions } from './ArrayType.js';
import { HashType } from './HashType.js';
import type { HashOptions } from './HashType.js';
import type { FieldMap } from './StructType.js';
import { ObjectBuilder, ObjectType } from './ObjectType.js';
import { OptionalType } from './OptionalType.js';

/** Closed union of the concrete types; switch on `kind` to handle each. */
export type AnyType =
  | StringType
  | EmailType
  | UuidType
  | IntegerType
  | FloatType
  | BooleanType
  | DateType
  | DateTimeType
  | ArrayType
  | HashType
  | ObjectType
  | OptionalType;

/**
 * Factory namespace for schema types.
 *
 * @example
 * const User = Types.hash({
 *   name: Types.string({ minLength: 1 }),
 *   age: Types.optional(Types.integer({ minimum: 0 })),
 * });
 */
export const Types = {
  string: (options?: StringOptions, metadata?: TypeMetadata): StringType => new StringType(options, metadata),
  email: (options?: EmailOptions, metadata?: TypeMetadata): EmailType => new EmailType(options, metadata),
  uuid: (options?: UuidOptions, metadata?: TypeMetadata): UuidType => new UuidType(options, metadata),
  integer: (options?: NumericOptions, metadata?: TypeMetadata): IntegerType => new IntegerType(options, metadata),
  float: (options?: NumericOptions, metadata?: TypeMetadata): FloatType => new FloatType(options, metadata),
  boolean: (metadata?: TypeMetadata): BooleanType => new BooleanType(metadata),
  date: (options?: TemporalOptions, metadata?: TypeMetadata): DateType => new DateType(options, metadata),
  datetime: (options?: TemporalOptions, metadata?: TypeMetadata): DateTimeType =>
    new DateTimeType(options, metadata),
  array: <TItem>(itemType: BaseType<TItem>, options?: ArrayOptions, metadata?: TypeMetadata): ArrayType<TItem> =>
    new ArrayType(itemType, options, metadata),
  hash: (fields?: FieldMap, options?: HashOptions, metadata?: TypeMetadata): HashType =>
    new HashType(fields, options, metadata),
  optional: <TInner>(type: BaseType<TInner>): OptionalType<TInner> => new OptionalType(type),
  object: (build?: (builder: ObjectBuilder) => void): ObjectType => {
    const builder = new ObjectBuilder();
    build?.(builder);
    return builder.build();
  },
} as const;

