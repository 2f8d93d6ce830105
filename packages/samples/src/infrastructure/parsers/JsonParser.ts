import { isPlainObject } from '@typeweave/core';
import type { SampleParser, ParserOptions } from '../../domain/ports/SampleParser.js';
import type { SampleRecord } from '../../domain/model/SampleRecord.js';

export type JsonFormat = 'array' | 'ndjson' | 'auto';

export interface JsonParserOptions {
  /** 'array' for a JSON array of objects, 'ndjson' for newline-delimited JSON. Default: 'auto'. */
  readonly format?: JsonFormat;
  readonly encoding?: BufferEncoding;
}

/** JSON parser adapter for JSON arrays and NDJSON. Nested objects and arrays are kept as parsed. */
export class JsonParser implements SampleParser {
  private readonly format: JsonFormat;
  private readonly encoding: BufferEncoding;

  constructor(options?: JsonParserOptions) {
    this.format = options?.format ?? 'auto';
    this.encoding = options?.encoding ?? 'utf-8';
  }

  *parse(data: string | Buffer): Iterable<SampleRecord> {
    const content = typeof data === 'string' ? data : data.toString(this.encoding);
    const trimmed = content.trim();

    if (trimmed === '') return;

    const format = this.format === 'auto' ? this.detectFormat(trimmed) : this.format;

    if (format === 'array') {
      yield* this.parseArray(trimmed);
    } else {
      yield* this.parseNdjson(trimmed);
    }
  }

  detect(sample: string | Buffer): ParserOptions {
    const content = typeof sample === 'string' ? sample : sample.toString(this.encoding);
    const format = this.detectFormat(content.trim());

    return {
      encoding: this.encoding,
      delimiter: format === 'ndjson' ? '\n' : undefined,
      hasHeader: false,
    };
  }

  private detectFormat(content: string): 'array' | 'ndjson' {
    return content.startsWith('[') ? 'array' : 'ndjson';
  }

  private *parseArray(content: string): Iterable<SampleRecord> {
    const parsed = parseJson(content, 'JsonParser: invalid JSON');

    if (!Array.isArray(parsed)) {
      throw new Error('JsonParser: expected a JSON array of objects');
    }

    const items: readonly unknown[] = parsed;
    for (const [index, item] of items.entries()) {
      if (!isPlainObject(item)) {
        throw new Error(`JsonParser: item at index ${index} must be a plain object`);
      }
      yield item;
    }
  }

  private *parseNdjson(content: string): Iterable<SampleRecord> {
    const lines = content.split('\n');

    for (const [index, line] of lines.entries()) {
      const trimmedLine = line.trim();
      if (trimmedLine === '') continue;

      const lineNumber = index + 1;
      const parsed = parseJson(trimmedLine, `JsonParser: invalid JSON on line ${lineNumber}`);
      if (!isPlainObject(parsed)) {
        throw new Error(`JsonParser: line ${lineNumber} must be a plain object`);
      }
      yield parsed;
    }
  }
}

function parseJson(text: string, context: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new Error(`${context}: ${detail}`, { cause: error });
  }
}
