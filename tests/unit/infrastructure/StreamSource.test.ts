import { describe, it, expect } from 'vitest';
import { StreamSource } from '../../../src/infrastructure/sources/StreamSource.js';
import { collect, fromChunks } from '../../helpers/frames.js';

async function* bytes(chunks: readonly string[]): AsyncIterable<Uint8Array> {
  for (const chunk of chunks) {
    yield await Promise.resolve(new TextEncoder().encode(chunk));
  }
}

describe('StreamSource', () => {
  it('should yield string chunks from an async iterable', async () => {
    const source = new StreamSource(fromChunks(['TOTDEV;', '2;']));

    expect(await collect(source.read())).toEqual(['TOTDEV;', '2;']);
  });

  it('should decode byte chunks', async () => {
    const source = new StreamSource(bytes(['CHAIN;', '1;']));

    expect(await collect(source.read())).toEqual(['CHAIN;', '1;']);
  });

  it('should decode a character split across byte chunks', async () => {
    // 'µ' is 0xC2 0xB5 in UTF-8.
    const chunks = (async function* () {
      yield await Promise.resolve(Uint8Array.of(0x54, 0xc2));
      yield await Promise.resolve(Uint8Array.of(0xb5, 0x3b));
    })();

    expect(await collect(new StreamSource(chunks).read())).toEqual(['T', '\u00B5;']);
  });

  it('should read from a web ReadableStream', async () => {
    const stream = new ReadableStream<string>({
      start(controller) {
        controller.enqueue('DEV;');
        controller.enqueue('1;');
        controller.close();
      },
    });

    expect(await collect(new StreamSource(stream).read())).toEqual(['DEV;', '1;']);
  });

  it('should stop at the next chunk once the signal is aborted', async () => {
    const controller = new AbortController();
    const source = new StreamSource(fromChunks(['a', 'b', 'c']));
    const seen: string[] = [];

    for await (const chunk of source.read(controller.signal)) {
      seen.push(chunk);
      controller.abort();
    }

    expect(seen).toEqual(['a']);
  });

  it('should refuse to be read twice', async () => {
    const source = new StreamSource(fromChunks(['a']));
    await collect(source.read());

    await expect(collect(source.read())).rejects.toThrow('stream has already been consumed');
  });

  it('should describe itself as a live source by default', () => {
    expect(new StreamSource(fromChunks([])).metadata()).toEqual({ name: 'stream-input', kind: 'live' });
    expect(new StreamSource(fromChunks([]), { name: 'pipe', kind: 'static' }).metadata()).toEqual({
      name: 'pipe',
      kind: 'static',
    });
  });
});
