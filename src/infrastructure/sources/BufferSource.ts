import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

export interface BufferSourceOptions {
  /** Name for metadata. Default: `'buffer-input'`. */
  readonly name?: string;
  /** Split the content into chunks of this many characters. Default: one chunk. */
  readonly chunkSize?: number;
}

/** Data source over in-memory text, e.g. a capture already loaded or a test fixture. */
export class BufferSource implements DataSource {
  private readonly content: string;
  private readonly meta: SourceMetadata;
  private readonly chunkSize: number;

  constructor(data: string | Buffer, options?: BufferSourceOptions) {
    this.content = typeof data === 'string' ? data : data.toString('utf-8');
    this.chunkSize = options?.chunkSize ?? Math.max(this.content.length, 1);
    if (!Number.isInteger(this.chunkSize) || this.chunkSize < 1) {
      throw new Error('BufferSource: chunkSize must be a positive integer');
    }
    this.meta = {
      name: options?.name ?? 'buffer-input',
      size: this.content.length,
      kind: 'static',
    };
  }

  async *read(signal?: AbortSignal): AsyncIterable<string> {
    for (let offset = 0; offset < this.content.length; offset += this.chunkSize) {
      if (signal?.aborted) return;
      yield await Promise.resolve(this.content.slice(offset, offset + this.chunkSize));
    }
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}
