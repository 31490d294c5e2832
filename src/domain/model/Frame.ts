import type { FrameValidationError } from './ValidationResult.js';

/** Text between two terminators, before tokenization. */
export interface RawFrame {
  /** 1-based ordinal among all attempted frames of the run. */
  readonly index: number;
  readonly text: string;
}

/** Validated section values keyed by section name, in frame order. */
export type ParsedFrame = ReadonlyMap<string, readonly number[]>;

/** Flat output record: column name to value, in schema order. */
export type FrameRecord = Readonly<Record<string, number>>;

export interface RejectedFrame {
  readonly frameIndex: number;
  readonly error: FrameValidationError;
}

export interface AcceptedFrame {
  readonly frameIndex: number;
  readonly record: FrameRecord;
}
