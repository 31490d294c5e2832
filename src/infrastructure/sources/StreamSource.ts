import { StringDecoder } from 'node:string_decoder';
import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

export interface StreamSourceOptions {
  /** Name for metadata. Default: 'stream-input'. */
  readonly name?: string;
  /** Whether the stream is a live feed. Default: `'live'`. */
  readonly kind?: SourceMetadata['kind'];
  /** Encoding for converting Buffer chunks to string. Default: 'utf-8'. */
  readonly encoding?: BufferEncoding;
}

/**
 * Data source that wraps an `AsyncIterable` or `ReadableStream`, e.g. a socket
 * bridged from a serial server or a child process's stdout.
 *
 * The stop signal is observed between chunks. Byte chunks go through one
 * decoder, so a character split across chunks is decoded whole.
 */
export class StreamSource implements DataSource {
  private readonly stream: AsyncIterable<string | Uint8Array> | ReadableStream<string | Uint8Array>;
  private readonly meta: SourceMetadata;
  private readonly encoding: BufferEncoding;
  private consumed = false;

  constructor(
    stream: AsyncIterable<string | Uint8Array> | ReadableStream<string | Uint8Array>,
    options?: StreamSourceOptions,
  ) {
    this.stream = stream;
    this.encoding = options?.encoding ?? 'utf-8';
    this.meta = {
      name: options?.name ?? 'stream-input',
      kind: options?.kind ?? 'live',
    };
  }

  async *read(signal?: AbortSignal): AsyncIterable<string> {
    if (this.consumed) {
      throw new Error('StreamSource: stream has already been consumed. Streams can only be read once.');
    }
    this.consumed = true;

    const iterable = this.isReadableStream(this.stream) ? this.fromReadableStream(this.stream) : this.stream;

    const decoder = new StringDecoder(this.encoding);
    for await (const chunk of iterable) {
      if (signal?.aborted) return;
      const text = typeof chunk === 'string' ? chunk : decoder.write(Buffer.from(chunk));
      if (text.length > 0) yield text;
    }

    const rest = decoder.end();
    if (rest.length > 0) yield rest;
  }

  metadata(): SourceMetadata {
    return this.meta;
  }

  private isReadableStream(
    stream: AsyncIterable<string | Uint8Array> | ReadableStream<string | Uint8Array>,
  ): stream is ReadableStream<string | Uint8Array> {
    return 'getReader' in stream && typeof stream.getReader === 'function';
  }

  private async *fromReadableStream(stream: ReadableStream<string | Uint8Array>): AsyncIterable<string | Uint8Array> {
    const reader = stream.getReader();
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        yield value;
      }
    } finally {
      reader.releaseLock();
    }
  }
}
