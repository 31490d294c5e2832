import type { CaptureStatus } from './CaptureStatus.js';
import type { AcceptedFrame, RejectedFrame } from './Frame.js';
import type { FailureReason } from './CaptureError.js';

export type ErrorPolicy = 'lenient' | 'strict';

/** Why a run ended early without failing. */
export type StopReason = 'max-frames' | 'duration' | 'manual';

/** Most recent frame rejection, kept for progress reporting. */
export interface FrameDiagnostic {
  readonly frameIndex: number;
  readonly section: string;
  readonly message: string;
}

/** Real-time counters for an in-flight capture. */
export interface CaptureProgress {
  /** Frames cut from the stream so far, valid or not. */
  readonly attemptedFrames: number;
  readonly acceptedFrames: number;
  readonly rejectedFrames: number;
  readonly elapsedMs: number;
  /** Remaining time before the duration bound, when one is set. */
  readonly remainingMs?: number;
  readonly maxFrames?: number;
  readonly lastDiagnostic?: FrameDiagnostic;
}

export interface CaptureFailure {
  readonly reason: FailureReason;
  readonly message: string;
}

/** Final outcome returned by `start()`. */
export interface CaptureSummary {
  readonly status: CaptureStatus;
  readonly attempted: number;
  readonly accepted: number;
  readonly rejected: number;
  /** UTF-16 characters of unterminated text dropped at end of input, counted after line breaks are removed. */
  readonly discardedChars: number;
  readonly elapsedMs: number;
  readonly stopReason?: StopReason;
  readonly failure?: CaptureFailure;
  readonly lastDiagnostic?: FrameDiagnostic;
}

/** Result of calling `preview()`. */
export interface PreviewResult {
  readonly accepted: readonly AcceptedFrame[];
  readonly rejected: readonly RejectedFrame[];
  readonly totalSampled: number;
  readonly columns: readonly string[];
}
