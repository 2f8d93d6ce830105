import type { SampleRecord } from '../model/SampleRecord.js';

/** Auto-detected or configured parser options. */
export interface ParserOptions {
  /** Column delimiter character (e.g. `','`, `';'`, `'\t'`). */
  readonly delimiter?: string;
  readonly encoding?: BufferEncoding;
  /** Whether the first row contains column headers. */
  readonly hasHeader?: boolean;
}

/**
 * Port for turning raw text into sample records.
 *
 * `parse()` receives the whole text of a source and yields records lazily, so
 * inference can stop after the records it needs.
 */
export interface SampleParser {
  parse(data: string | Buffer): Iterable<SampleRecord>;
  /** Auto-detect parser options from a small sample of data. */
  detect?(sample: string | Buffer): ParserOptions;
}
