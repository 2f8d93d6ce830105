import type { InferenceResult } from './domain/model/InferenceResult.js';
import type { SampleParser } from './domain/ports/SampleParser.js';
import type { SampleSource } from './domain/ports/SampleSource.js';
import type { InferSchemaOptions } from './application/usecases/InferSchema.js';
import { InferSchema } from './application/usecases/InferSchema.js';
import { CsvParser } from './infrastructure/parsers/CsvParser.js';
import { JsonParser } from './infrastructure/parsers/JsonParser.js';

export interface SampleSchemaOptions extends InferSchemaOptions {
  /** Parser for the source's content. Default: chosen from the source's MIME type. */
  readonly parser?: SampleParser;
}

/** Bytes read from an untyped source to guess its format. */
const SNIFF_BYTES = 4096;

function builtInParser(mimeType: string | undefined): SampleParser | undefined {
  switch (mimeType) {
    case 'text/csv':
      return new CsvParser();
    case 'text/tab-separated-values':
      return new CsvParser({ delimiter: '\t' });
    case 'application/json':
      return new JsonParser({ format: 'auto' });
    case 'application/x-ndjson':
      return new JsonParser({ format: 'ndjson' });
    default:
      return undefined;
  }
}

/**
 * Pick a parser from a source's MIME type.
 * @throws Error when the MIME type has no built-in parser
 */
export function parserFor(source: SampleSource): SampleParser {
  const mimeType = source.metadata().mimeType;
  const parser = builtInParser(mimeType);
  if (!parser) {
    throw new Error(`No parser for MIME type '${mimeType ?? 'unknown'}'; pass one in the options`);
  }
  return parser;
}

/**
 * Pick a parser from the first bytes of a source: JSON when they open an
 * array or object, CSV with a detected delimiter otherwise.
 * @throws Error when the source is empty
 */
export async function sniffParser(source: SampleSource): Promise<SampleParser> {
  const text = (await source.sample(SNIFF_BYTES)).toString('utf-8').trimStart();
  if (text === '') {
    throw new Error('Cannot detect the format of an empty source; pass a parser in the options');
  }

  if (text.startsWith('[') || text.startsWith('{')) {
    const { delimiter } = new JsonParser().detect(text);
    return new JsonParser({ format: delimiter === '\n' ? 'ndjson' : 'array' });
  }
  return new CsvParser(new CsvParser().detect(text));
}

/**
 * Infer a schema from the first records of a sample source. The parser comes
 * from the options, the source's MIME type, or a sniff of its first bytes.
 */
export async function inferSchema(source: SampleSource, options: SampleSchemaOptions = {}): Promise<InferenceResult> {
  const { parser, ...inference } = options;
  const resolved = parser ?? builtInParser(source.metadata().mimeType) ?? (await sniffParser(source));
  return new InferSchema(source, resolved, inference).execute();
}
