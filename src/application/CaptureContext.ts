import { randomUUID } from 'node:crypto';
import type { CaptureProgress, CaptureSummary, ErrorPolicy, FrameDiagnostic, StopReason, CaptureFailure } from '../domain/model/Capture.js';
import type { CaptureStatus } from '../domain/model/CaptureStatus.js';
import type { FaultNameTable } from '../domain/model/FaultNameTable.js';
import type { OutputSchema } from '../domain/model/OutputSchema.js';
import type { DataSource } from '../domain/ports/DataSource.js';
import { canTransition } from '../domain/model/CaptureStatus.js';
import { FrameValidator } from '../domain/services/FrameValidator.js';
import { FaultNameResolver } from '../domain/services/FaultNameResolver.js';
import { SchemaBuilder } from '../domain/services/SchemaBuilder.js';
import { EventBus } from './EventBus.js';

export interface CaptureSettings {
  readonly errorPolicy: ErrorPolicy;
  readonly maxFrames?: number;
  readonly durationMs?: number;
  readonly clock: () => number;
}

/**
 * Mutable state shared by the use cases of a single capture run.
 *
 * Internal: `ChainCapture` owns one instance and hands it to each use case.
 * The fault table and schema are decided at most once and never replaced.
 */
export class CaptureContext {
  readonly validator = new FrameValidator();
  readonly schemaBuilder = new SchemaBuilder();
  readonly eventBus = new EventBus();
  readonly captureId: string;

  source: DataSource | null = null;
  status: CaptureStatus = 'CREATED';

  attempted = 0;
  accepted = 0;
  rejected = 0;
  discardedChars = 0;
  lastDiagnostic?: FrameDiagnostic;
  startedAt?: number;
  stopReason?: StopReason;
  failure?: CaptureFailure;

  faults: FaultNameTable | null = null;
  schema: OutputSchema | null = null;
  abortController: AbortController | null = null;

  constructor(
    readonly settings: CaptureSettings,
    readonly faultNames: FaultNameResolver,
  ) {
    this.captureId = randomUUID();
  }

  transitionTo(newStatus: CaptureStatus): void {
    if (!canTransition(this.status, newStatus)) {
      throw new Error(`Invalid state transition: ${this.status} → ${newStatus}`);
    }
    this.status = newStatus;
  }

  assertSourceConfigured(): DataSource {
    if (!this.source) {
      throw new Error('Source must be configured. Call .from(source) first.');
    }
    return this.source;
  }

  /** Ask the running capture to stop cleanly. The first reason wins. */
  requestStop(reason: StopReason): void {
    this.stopReason ??= reason;
    this.abortController?.abort();
  }

  get stopRequested(): boolean {
    return this.abortController?.signal.aborted ?? false;
  }

  elapsedMs(): number {
    return this.startedAt === undefined ? 0 : Math.max(0, this.settings.clock() - this.startedAt);
  }

  durationExceeded(): boolean {
    const limit = this.settings.durationMs;
    return limit !== undefined && this.elapsedMs() >= limit;
  }

  frameLimitReached(): boolean {
    const limit = this.settings.maxFrames;
    return limit !== undefined && this.attempted >= limit;
  }

  buildProgress(): CaptureProgress {
    const elapsed = this.elapsedMs();
    const limit = this.settings.durationMs;

    return {
      attemptedFrames: this.attempted,
      acceptedFrames: this.accepted,
      rejectedFrames: this.rejected,
      elapsedMs: elapsed,
      remainingMs: limit === undefined ? undefined : Math.max(0, limit - elapsed),
      maxFrames: this.settings.maxFrames,
      lastDiagnostic: this.lastDiagnostic,
    };
  }

  buildSummary(): CaptureSummary {
    return {
      status: this.status,
      attempted: this.attempted,
      accepted: this.accepted,
      rejected: this.rejected,
      discardedChars: this.discardedChars,
      elapsedMs: this.elapsedMs(),
      stopReason: this.status === 'STOPPED' ? this.stopReason : undefined,
      failure: this.failure,
      lastDiagnostic: this.lastDiagnostic,
    };
  }

  /** Decide the fault table (once) and announce it. */
  async resolveFaults(): Promise<FaultNameTable> {
    if (this.faults) return this.faults;

    const table = await this.faultNames.resolve();
    this.faults = table;
    this.eventBus.emit({
      type: 'faults:resolved',
      captureId: this.captureId,
      origin: table.origin,
      count: table.columns.length,
      note: table.note,
      timestamp: Date.now(),
    });
    return table;
  }

  /** Build the output schema on first use; later calls return the same instance. */
  ensureSchema(faults: FaultNameTable): OutputSchema {
    if (this.schema) return this.schema;

    const schema = this.schemaBuilder.build(faults);
    this.schema = schema;
    this.eventBus.emit({
      type: 'schema:built',
      captureId: this.captureId,
      columns: schema.columns,
      timestamp: Date.now(),
    });
    return schema;
  }
}
