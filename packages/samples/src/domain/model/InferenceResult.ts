import type { HashType } from '@typeweave/core';

/** Outcome of inferring a schema from a sample source. */
export interface InferenceResult {
  /** Hash describing every field seen in the analysed records. */
  readonly schema: HashType;
  /** Number of records fed to inference (at most `maxRecords`). */
  readonly recordsAnalyzed: number;
  /** Field names in the order they were first seen. */
  readonly fields: readonly string[];
}
