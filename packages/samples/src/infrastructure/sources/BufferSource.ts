import type { SampleSource, SourceMetadata } from '../../domain/ports/SampleSource.js';
import { detectMimeType } from '../detectMimeType.js';

/** Sample source over an in-memory string or Buffer. */
export class BufferSource implements SampleSource {
  private readonly content: string;
  private readonly meta: SourceMetadata;

  constructor(data: string | Buffer, metadata?: Partial<SourceMetadata>) {
    this.content = typeof data === 'string' ? data : data.toString('utf-8');
    const fileName = metadata?.fileName ?? 'buffer-input';
    this.meta = {
      fileName,
      fileSize: Buffer.byteLength(this.content, 'utf-8'),
      mimeType: metadata?.mimeType ?? detectMimeType(fileName),
    };
  }

  async *read(): AsyncIterable<string> {
    yield await Promise.resolve(this.content);
  }

  sample(maxBytes?: number): Promise<Buffer> {
    const bytes = Buffer.from(this.content, 'utf-8');
    if (maxBytes === undefined) return Promise.resolve(bytes);
    return Promise.resolve(bytes.subarray(0, Math.max(0, maxBytes)));
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}
