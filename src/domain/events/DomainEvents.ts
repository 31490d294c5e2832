import type { CaptureProgress, CaptureSummary, StopReason } from '../model/Capture.js';
import type { FailureReason } from '../model/CaptureError.js';
import type { FaultNameOrigin } from '../model/FaultNameTable.js';
import type { FrameRecord } from '../model/Frame.js';
import type { FrameValidationError } from '../model/ValidationResult.js';
import type { SourceMetadata } from '../ports/DataSource.js';

/** Emitted when `start()` is called. */
export interface CaptureStartedEvent {
  readonly type: 'capture:started';
  readonly captureId: string;
  readonly source: SourceMetadata;
  readonly timestamp: number;
}

/** Emitted once the fault column names are decided, before any frame is emitted. */
export interface FaultsResolvedEvent {
  readonly type: 'faults:resolved';
  readonly captureId: string;
  readonly origin: FaultNameOrigin;
  readonly count: number;
  /** Why generated names are used, when `origin` is `'fallback'`. */
  readonly note?: string;
  readonly timestamp: number;
}

/** Emitted when the output schema is built (exactly once per run). */
export interface SchemaBuiltEvent {
  readonly type: 'schema:built';
  readonly captureId: string;
  readonly columns: readonly string[];
  readonly timestamp: number;
}

/** Emitted after a record has been written to the sink. */
export interface FrameAcceptedEvent {
  readonly type: 'frame:accepted';
  readonly captureId: string;
  /** Attempted-frame ordinal. The record's `frame_index` counts accepted frames only. */
  readonly frameIndex: number;
  readonly record: FrameRecord;
  readonly timestamp: number;
}

/** Emitted for every frame that fails validation, in both error policies. */
export interface FrameRejectedEvent {
  readonly type: 'frame:rejected';
  readonly captureId: string;
  readonly frameIndex: number;
  readonly error: FrameValidationError;
  readonly timestamp: number;
}

/** Emitted after each chunk and each frame with updated counters. */
export interface CaptureProgressEvent {
  readonly type: 'capture:progress';
  readonly captureId: string;
  readonly progress: CaptureProgress;
  readonly timestamp: number;
}

/** Emitted when a bound or `stop()` ends the run cleanly. */
export interface CaptureStoppedEvent {
  readonly type: 'capture:stopped';
  readonly captureId: string;
  readonly reason: StopReason;
  readonly summary: CaptureSummary;
  readonly timestamp: number;
}

/** Emitted when the source is exhausted and every frame has been handled. */
export interface CaptureCompletedEvent {
  readonly type: 'capture:completed';
  readonly captureId: string;
  readonly summary: CaptureSummary;
  readonly timestamp: number;
}

/** Emitted when the run ends on a fatal error (strict rejection, sink, source). */
export interface CaptureFailedEvent {
  readonly type: 'capture:failed';
  readonly captureId: string;
  readonly reason: FailureReason;
  readonly error: string;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | CaptureStartedEvent
  | FaultsResolvedEvent
  | SchemaBuiltEvent
  | FrameAcceptedEvent
  | FrameRejectedEvent
  | CaptureProgressEvent
  | CaptureStoppedEvent
  | CaptureCompletedEvent
  | CaptureFailedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
