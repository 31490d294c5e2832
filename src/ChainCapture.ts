import type { CaptureSummary, ErrorPolicy, PreviewResult } from './domain/model/Capture.js';
import type { DataSource } from './domain/ports/DataSource.js';
import type { FaultNameProvider } from './domain/ports/FaultNameProvider.js';
import type { RecordSink } from './domain/ports/RecordSink.js';
import type { EventType, EventPayload } from './domain/events/DomainEvents.js';
import { FaultNameResolver } from './domain/services/FaultNameResolver.js';
import { CaptureContext } from './application/CaptureContext.js';
import { StartCapture } from './application/usecases/StartCapture.js';
import { PreviewCapture } from './application/usecases/PreviewCapture.js';
import { StopCapture } from './application/usecases/StopCapture.js';
import { GetCaptureStatus } from './application/usecases/GetCaptureStatus.js';
import type { CaptureStatusResult } from './application/usecases/GetCaptureStatus.js';

/** Configuration for a capture run. */
export interface ChainCaptureConfig {
  /** `'lenient'` skips invalid frames, `'strict'` ends the run on the first one. Default: `'lenient'`. */
  readonly errorPolicy?: ErrorPolicy;
  /** Source of fault column names. Without one, `fault_001`…`fault_187` are used. */
  readonly faultNames?: FaultNameProvider;
  /** Stop cleanly after this many frames have been cut from the stream (valid or not). */
  readonly maxFrames?: number;
  /** Stop cleanly once this much time has elapsed since `start()`. */
  readonly durationMs?: number;
  /** Millisecond clock used for the duration bound and elapsed times. Default: `Date.now`. */
  readonly clock?: () => number;
}

/**
 * Facade over the capture lifecycle: read → cut frames → validate → write.
 *
 * @example
 * ```typescript
 * const capture = new ChainCapture({ errorPolicy: 'strict' });
 * capture.from(new FilePathSource('bms.log'));
 * const summary = await capture.start(new CsvFileSink('bms.csv'));
 * ```
 */
export class ChainCapture {
  private readonly ctx: CaptureContext;

  constructor(config: ChainCaptureConfig = {}) {
    if (config.maxFrames !== undefined && (!Number.isInteger(config.maxFrames) || config.maxFrames < 1)) {
      throw new Error('maxFrames must be a positive integer');
    }
    if (config.durationMs !== undefined && !(config.durationMs > 0)) {
      throw new Error('durationMs must be greater than 0');
    }

    this.ctx = new CaptureContext(
      {
        errorPolicy: config.errorPolicy ?? 'lenient',
        maxFrames: config.maxFrames,
        durationMs: config.durationMs,
        clock: config.clock ?? Date.now,
      },
      new FaultNameResolver(config.faultNames),
    );
  }

  from(source: DataSource): this {
    this.ctx.source = source;
    return this;
  }

  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  preview(maxFrames = 10): Promise<PreviewResult> {
    return new PreviewCapture(this.ctx).execute(maxFrames);
  }

  /**
   * Run the capture to the end of the source, a bound, or a fatal error.
   *
   * Fatal errors do not reject: the returned summary has status `'FAILED'`
   * and a `failure` describing the reason.
   */
  start(sink: RecordSink): Promise<CaptureSummary> {
    return new StartCapture(this.ctx).execute(sink);
  }

  /** Request a clean stop of a running capture. */
  stop(): void {
    new StopCapture(this.ctx).execute();
  }

  getStatus(): CaptureStatusResult {
    return new GetCaptureStatus(this.ctx).execute();
  }

  getCaptureId(): string {
    return new GetCaptureStatus(this.ctx).getCaptureId();
  }
}
