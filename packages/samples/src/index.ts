// Main entry points
export { inferSchema, parserFor, sniffParser } from './inferSchema.js';
export type { SampleSchemaOptions } from './inferSchema.js';
export { InferSchema } from './application/usecases/InferSchema.js';
export type { InferSchemaOptions } from './application/usecases/InferSchema.js';

// Domain model
export type { InferenceResult } from './domain/model/InferenceResult.js';
export type { SampleRecord } from './domain/model/SampleRecord.js';
export { isBlankRecord } from './domain/model/SampleRecord.js';

// Domain ports
export type { SampleSource, SourceMetadata } from './domain/ports/SampleSource.js';
export type { SampleParser, ParserOptions } from './domain/ports/SampleParser.js';

// Infrastructure adapters
export { CsvParser } from './infrastructure/parsers/CsvParser.js';
export type { CsvParserOptions } from './infrastructure/parsers/CsvParser.js';
export { JsonParser } from './infrastructure/parsers/JsonParser.js';
export type { JsonParserOptions, JsonFormat } from './infrastructure/parsers/JsonParser.js';
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { detectMimeType } from './infrastructure/detectMimeType.js';
