import { fromSamples } from '@typeweave/core';
import type { EventBus, InferenceOptions } from '@typeweave/core';
import type { InferenceResult } from '../../domain/model/InferenceResult.js';
import type { SampleRecord } from '../../domain/model/SampleRecord.js';
import type { SampleParser } from '../../domain/ports/SampleParser.js';
import type { SampleSource } from '../../domain/ports/SampleSource.js';

export interface InferSchemaOptions extends InferenceOptions {
  /** Bus to publish `sample:analyzed` on. */
  readonly eventBus?: EventBus;
}

/** Use case: read a source, parse its first records and infer a Hash from them. */
export class InferSchema {
  constructor(
    private readonly source: SampleSource,
    private readonly parser: SampleParser,
    private readonly options: InferSchemaOptions = {},
  ) {}

  async execute(): Promise<InferenceResult> {
    const records = await this.readRecords(this.options.maxRecords ?? 1000);
    const schema = fromSamples(records, this.options);
    const fields = Object.keys(schema.fields);

    this.options.eventBus?.emit({
      type: 'sample:analyzed',
      recordsAnalyzed: records.length,
      fields: fields.length,
      timestamp: Date.now(),
    });

    return { schema, recordsAnalyzed: records.length, fields };
  }

  // Chunks are joined before parsing so no record is split across a chunk boundary.
  private async readRecords(maxRecords: number): Promise<SampleRecord[]> {
    const chunks: Buffer[] = [];
    for await (const chunk of this.source.read()) {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk);
    }

    const records: SampleRecord[] = [];
    if (maxRecords <= 0) return records;
    for (const record of this.parser.parse(Buffer.concat(chunks))) {
      records.push(record);
      if (records.length >= maxRecords) break;
    }
    return records;
  }
}
