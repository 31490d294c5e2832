import { describe, it, expect } from 'vitest';
import { BufferSource } from '../../../src/infrastructure/sources/BufferSource.js';
import { collect } from '../../helpers/frames.js';

describe('BufferSource', () => {
  it('should yield its content as a single chunk by default', async () => {
    const source = new BufferSource('TOTDEV;2;ENDData');

    expect(await collect(source.read())).toEqual(['TOTDEV;2;ENDData']);
  });

  it('should accept a Buffer', async () => {
    const source = new BufferSource(Buffer.from('CHAIN;1;', 'utf-8'));

    expect(await collect(source.read())).toEqual(['CHAIN;1;']);
  });

  it('should split content into chunks of the configured size', async () => {
    const source = new BufferSource('abcdefg', { chunkSize: 3 });

    expect(await collect(source.read())).toEqual(['abc', 'def', 'g']);
  });

  it('should be readable more than once', async () => {
    const source = new BufferSource('abc');

    await collect(source.read());
    expect(await collect(source.read())).toEqual(['abc']);
  });

  it('should yield nothing once the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    expect(await collect(new BufferSource('abc').read(controller.signal))).toEqual([]);
  });

  it('should describe itself as a static source', () => {
    expect(new BufferSource('abcdefg', { name: 'capture.log' }).metadata()).toEqual({
      name: 'capture.log',
      size: 7,
      kind: 'static',
    });
  });

  it('should reject a non-positive chunk size', () => {
    expect(() => new BufferSource('abc', { chunkSize: 0 })).toThrow('chunkSize must be a positive integer');
  });
});
