/** Metadata about a sample source, used for content-type detection. */
export interface SourceMetadata {
  readonly fileName?: string;
  readonly fileSize?: number;
  readonly mimeType?: string;
}

/**
 * Port for reading sample data from any origin (file, buffer, stream).
 *
 * `sample()` takes `maxBytes` rather than a record count: record boundaries are
 * unknown until a parser has seen the bytes.
 */
export interface SampleSource {
  /** Yield data chunks as strings or Buffers. */
  read(): AsyncIterable<string | Buffer>;
  /** Return up to the first `maxBytes` bytes, used to sniff the format of untyped sources. */
  sample(maxBytes?: number): Promise<Buffer>;
  metadata(): SourceMetadata;
}
