// Main entry points
export { Types } from './domain/types/Types.js';
export type { AnyType } from './domain/types/Types.js';
export { Schema, DefinitionBuilder } from './application/Schema.js';
export type { PrimitiveName, SchemaDefinition, DefinitionRecord } from './application/Schema.js';
export { SchemaGuard } from './application/SchemaGuard.js';
export type { SchemaGuardOptions, GuardResult, GuardAccepted, GuardRejected } from './application/SchemaGuard.js';

// Type classes
export { BaseType, isSchemaType } from './domain/types/BaseType.js';
export type {
  SchemaType,
  Infer,
  TypeKind,
  TypeMetadata,
  BaseConstraints,
  CoerceOptions,
  CoercionPolicy,
} from './domain/types/BaseType.js';
export { StringLikeType } from './domain/types/StringLikeType.js';
export type { StringConstraints, StringOptions } from './domain/types/StringLikeType.js';
export { StringType } from './domain/types/StringType.js';
export { EmailType } from './domain/types/EmailType.js';
export type { EmailOptions } from './domain/types/EmailType.js';
export { UuidType } from './domain/types/UuidType.js';
export type { UuidOptions } from './domain/types/UuidType.js';
export { NumericType } from './domain/types/NumericType.js';
export type { NumericConstraints, NumericOptions } from './domain/types/NumericType.js';
export { IntegerType } from './domain/types/IntegerType.js';
export { FloatType } from './domain/types/FloatType.js';
export { BooleanType } from './domain/types/BooleanType.js';
export { TemporalType } from './domain/types/TemporalType.js';
export type { DateFormat, TemporalConstraints, TemporalOptions } from './domain/types/TemporalType.js';
export { DateType } from './domain/types/DateType.js';
export { DateTimeType } from './domain/types/DateTimeType.js';
export { ArrayType } from './domain/types/ArrayType.js';
export type { ArrayConstraints, ArrayOptions } from './domain/types/ArrayType.js';
export { StructType } from './domain/types/StructType.js';
export type { FieldMap, StructConstraints } from './domain/types/StructType.js';
export { HashType } from './domain/types/HashType.js';
export type { HashOptions } from './domain/types/HashType.js';
export { ObjectType, ObjectBuilder } from './domain/types/ObjectType.js';
export type { FieldOptions } from './domain/types/ObjectType.js';
export { OptionalType } from './domain/types/OptionalType.js';

// Domain model
export type { JsonSchema, JsonSchemaType } from './domain/model/JsonSchema.js';
export type {
  ValidationResult,
  ValidationIssue,
  ValidationIssueCode,
  IssuePath,
} from './domain/model/ValidationResult.js';
export { validResult, invalidResult, issuesWithCode } from './domain/model/ValidationResult.js';
export type { Nil } from './domain/model/values.js';
export { isNil, isPlainObject, typeOf } from './domain/model/values.js';

// Errors
export { CoercionError } from './domain/errors/CoercionError.js';
export { ValidationError } from './domain/errors/ValidationError.js';
export { SchemaDefinitionError, SchemaValidationError } from './domain/errors/SchemaErrors.js';

// Domain services
export { fromValues, fromJsonSchema, fromStruct, inferType, includesField } from './domain/services/AutoDerivation.js';
export type { FieldFilter } from './domain/services/AutoDerivation.js';
export { fromSamples } from './domain/services/SampleInference.js';
export type { InferenceOptions } from './domain/services/SampleInference.js';
export { checkFormat, isStringFormat, STRING_FORMATS } from './domain/services/formats.js';
export type { StringFormat } from './domain/services/formats.js';
export { compileDateFormat } from './domain/services/dates.js';
export type { DateFormatMatcher } from './domain/services/dates.js';

// Application internals (for @typeweave/samples and other extension packages)
export { EventBus } from './application/EventBus.js';
export type { EventBusOptions, HandlerErrorListener } from './application/EventBus.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  RejectionStage,
  ValueAcceptedEvent,
  ValueRejectedEvent,
  SampleAnalyzedEvent,
} from './domain/events/DomainEvents.js';
