import Papa from 'papaparse';
import type { SampleParser, ParserOptions } from '../../domain/ports/SampleParser.js';
import type { SampleRecord } from '../../domain/model/SampleRecord.js';
import { isBlankRecord } from '../../domain/model/SampleRecord.js';

export interface CsvParserOptions extends ParserOptions {
  /**
   * Let PapaParse turn numeric, boolean and ISO date-time cells into numbers,
   * booleans and Dates, and empty cells into `null`. Default: `true`.
   */
  readonly dynamicTyping?: boolean;
}

const CANDIDATE_DELIMITERS = [',', ';', '\t', '|'];

/**
 * CSV parser adapter using PapaParse. Supports delimiter detection and header mapping.
 * Without a header row, columns are named `column1`, `column2`, ...
 */
export class CsvParser implements SampleParser {
  private readonly delimiter: string | undefined;
  private readonly encoding: BufferEncoding;
  private readonly hasHeader: boolean;
  private readonly dynamicTyping: boolean;

  constructor(options?: CsvParserOptions) {
    this.delimiter = options?.delimiter;
    this.encoding = options?.encoding ?? 'utf-8';
    this.hasHeader = options?.hasHeader ?? true;
    this.dynamicTyping = options?.dynamicTyping ?? true;
  }

  *parse(data: string | Buffer): Iterable<SampleRecord> {
    const content = typeof data === 'string' ? data : data.toString(this.encoding);
    const delimiter = this.delimiter ?? this.detect(content).delimiter;

    if (this.hasHeader) {
      const result = Papa.parse<Record<string, unknown>>(content, {
        header: true,
        delimiter,
        skipEmptyLines: true,
        dynamicTyping: this.dynamicTyping,
        transformHeader: (header) => header.trim(),
      });
      for (const row of result.data) {
        if (!isBlankRecord(row)) yield row;
      }
      return;
    }

    const result = Papa.parse<unknown[]>(content, {
      header: false,
      delimiter,
      skipEmptyLines: true,
      dynamicTyping: this.dynamicTyping,
    });
    for (const row of result.data) {
      const record = Object.fromEntries(row.map((value, index) => [`column${index + 1}`, value]));
      if (!isBlankRecord(record)) yield record;
    }
  }

  /** Pick the candidate delimiter that splits the first lines into the most columns. */
  detect(sample: string | Buffer): ParserOptions {
    const content = typeof sample === 'string' ? sample : sample.toString(this.encoding);
    const firstLines = content.split('\n').slice(0, 5).join('\n');

    let bestDelimiter = ',';
    let maxColumns = 0;

    for (const delimiter of CANDIDATE_DELIMITERS) {
      const result = Papa.parse<string[]>(firstLines, { delimiter, header: false });
      const firstRow = result.data[0];
      if (firstRow && firstRow.length > maxColumns) {
        maxColumns = firstRow.length;
        bestDelimiter = delimiter;
      }
    }

    return {
      delimiter: bestDelimiter,
      encoding: this.encoding,
      hasHeader: this.hasHeader,
    };
  }
}
