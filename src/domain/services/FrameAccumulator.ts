import type { RawFrame } from '../model/Frame.js';
import { FRAME_TERMINATOR } from '../model/FrameLayout.js';

const LINE_BREAKS = /[\r\n]/g;

/**
 * Domain service that cuts a stream of text chunks into raw frames.
 *
 * No I/O and no validation. Frame boundaries come from the
 * terminator only: line breaks are removed as text arrives, so a frame (or
 * the terminator itself) may be split across any number of chunks or lines.
 */
export class FrameAccumulator {
  private buffer = '';
  private emitted = 0;

  constructor(private readonly terminator: string = FRAME_TERMINATOR) {
    if (terminator.length === 0) {
      throw new Error('Frame terminator must not be empty');
    }
  }

  /** Append a chunk and return the text of every frame it completes, in order. */
  push(chunk: string): string[] {
    this.buffer += chunk.replace(LINE_BREAKS, '');

    const frames: string[] = [];
    let start = 0;
    let end = this.buffer.indexOf(this.terminator, start);

    while (end !== -1) {
      frames.push(this.buffer.slice(start, end));
      start = end + this.terminator.length;
      end = this.buffer.indexOf(this.terminator, start);
    }

    if (start > 0) {
      this.buffer = this.buffer.slice(start);
    }
    this.emitted += frames.length;
    return frames;
  }

  /** Length of buffered text not yet closed by a terminator. */
  get pending(): number {
    return this.buffer.length;
  }

  /** Number of frames cut so far. */
  get frameCount(): number {
    return this.emitted;
  }

  /** End of input: drop the unterminated remainder and return its length. */
  finish(): number {
    const dropped = this.buffer.length;
    this.buffer = '';
    return dropped;
  }

  /**
   * Cut an async stream of chunks into indexed raw frames.
   *
   * Indices are 1-based and continue from frames already cut by this instance.
   */
  async *frames(chunks: AsyncIterable<string>): AsyncIterable<RawFrame> {
    for await (const chunk of chunks) {
      const base = this.emitted;
      const texts = this.push(chunk);
      for (let i = 0; i < texts.length; i++) {
        yield { index: base + i + 1, text: texts[i] ?? '' };
      }
    }
    this.finish();
  }
}
