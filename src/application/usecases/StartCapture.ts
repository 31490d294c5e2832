import type { CaptureSummary } from '../../domain/model/Capture.js';
import type { FaultNameTable } from '../../domain/model/FaultNameTable.js';
import type { FrameRecord, RawFrame } from '../../domain/model/Frame.js';
import type { OutputSchema } from '../../domain/model/OutputSchema.js';
import type { FrameValidationError } from '../../domain/model/ValidationResult.js';
import type { DataSource } from '../../domain/ports/DataSource.js';
import type { RecordSink } from '../../domain/ports/RecordSink.js';
import { CaptureError, toErrorMessage } from '../../domain/model/CaptureError.js';
import { FrameAccumulator } from '../../domain/services/FrameAccumulator.js';
import type { CaptureContext } from '../CaptureContext.js';

/**
 * Use case: run the capture pipeline from source to sink.
 *
 * Chunks are read, cut into frames, validated and written strictly in
 * arrival order, one frame at a time. Only the accumulator's unterminated
 * remainder is held between chunks.
 */
export class StartCapture {
  private sinkOpened = false;

  constructor(private readonly ctx: CaptureContext) {}

  async execute(sink: RecordSink): Promise<CaptureSummary> {
    const source = this.ctx.assertSourceConfigured();
    this.assertCanStart();

    this.ctx.transitionTo('RUNNING');
    this.ctx.abortController = new AbortController();
    this.ctx.startedAt = this.ctx.settings.clock();
    this.ctx.attempted = 0;
    this.ctx.accepted = 0;
    this.ctx.rejected = 0;
    this.ctx.discardedChars = 0;
    this.ctx.lastDiagnostic = undefined;
    this.sinkOpened = false;

    this.ctx.eventBus.emit({
      type: 'capture:started',
      captureId: this.ctx.captureId,
      source: source.metadata(),
      timestamp: Date.now(),
    });

    const timer = this.armDurationTimer();
    try {
      const faults = await this.ctx.resolveFaults();
      await this.pump(source, sink, faults, this.ctx.abortController.signal);

      // A run with no accepted frame still produces a header-only table.
      await this.openSink(sink, faults);
      await this.closeSink(sink);

      this.finish();
    } catch (error) {
      await this.fail(error, sink);
    } finally {
      if (timer) clearTimeout(timer);
    }

    return this.ctx.buildSummary();
  }

  private assertCanStart(): void {
    if (this.ctx.status !== 'PREVIEWED' && this.ctx.status !== 'CREATED') {
      throw new Error(`Cannot start capture from status '${this.ctx.status}'`);
    }
  }

  private armDurationTimer(): NodeJS.Timeout | undefined {
    const limit = this.ctx.settings.durationMs;
    if (limit === undefined) return undefined;
    return setTimeout(() => {
      this.ctx.requestStop('duration');
    }, limit);
  }

  /** Returns `true` once the run must stop taking new input. */
  private boundReached(): boolean {
    if (this.ctx.durationExceeded()) {
      this.ctx.requestStop('duration');
    }
    return this.ctx.stopRequested;
  }

  private async pump(source: DataSource, sink: RecordSink, faults: FaultNameTable, signal: AbortSignal): Promise<void> {
    const accumulator = new FrameAccumulator();
    const chunks = source.read(signal)[Symbol.asyncIterator]();
    let exhausted = false;

    try {
      while (!this.boundReached()) {
        const next = await this.nextChunk(chunks);
        if (next.done) {
          exhausted = true;
          return;
        }
        // A chunk that arrives after a bound was hit is not turned into frames.
        if (this.boundReached()) return;

        for (const text of accumulator.push(next.value)) {
          this.ctx.attempted++;
          await this.handleFrame({ index: this.ctx.attempted, text }, sink, faults);

          if (this.ctx.frameLimitReached()) {
            this.ctx.requestStop('max-frames');
            return;
          }
        }

        this.emitProgress();
      }
    } finally {
      this.ctx.discardedChars = accumulator.finish();
      if (!exhausted) {
        await chunks.return?.();
      }
    }
  }

  private async nextChunk(chunks: AsyncIterator<string>): Promise<IteratorResult<string>> {
    try {
      return await chunks.next();
    } catch (error) {
      // Sources may tear down with an abort error once a stop was requested.
      if (this.ctx.stopRequested) return { done: true, value: undefined };
      throw new CaptureError('source', `Failed to read from source: ${toErrorMessage(error)}`, { cause: error });
    }
  }

  private async handleFrame(frame: RawFrame, sink: RecordSink, faults: FaultNameTable): Promise<void> {
    const result = this.ctx.validator.validate(frame.text);
    if (!result.isValid) {
      this.reject(frame.index, result.errors[0]);
      return;
    }

    const schema = await this.openSink(sink, faults);

    let record: FrameRecord;
    let values: number[];
    try {
      // Rows are numbered by accepted frame; the attempted index stays in diagnostics and events.
      record = this.ctx.schemaBuilder.toRecord(schema, this.ctx.accepted + 1, result.parsed, faults);
      values = this.ctx.schemaBuilder.toRow(schema, record);
    } catch (error) {
      throw new CaptureError('schema-conformance', `Frame #${String(frame.index)}: ${toErrorMessage(error)}`, {
        cause: error,
      });
    }

    try {
      await sink.write(values);
    } catch (error) {
      throw new CaptureError('sink-write', `Failed to write frame #${String(frame.index)}: ${toErrorMessage(error)}`, {
        cause: error,
      });
    }

    this.ctx.accepted++;
    this.ctx.eventBus.emit({
      type: 'frame:accepted',
      captureId: this.ctx.captureId,
      frameIndex: frame.index,
      record,
      timestamp: Date.now(),
    });
  }

  private reject(frameIndex: number, error: FrameValidationError): void {
    this.ctx.rejected++;
    this.ctx.lastDiagnostic = { frameIndex, section: error.section, message: error.message };

    this.ctx.eventBus.emit({
      type: 'frame:rejected',
      captureId: this.ctx.captureId,
      frameIndex,
      error,
      timestamp: Date.now(),
    });

    if (this.ctx.settings.errorPolicy === 'strict') {
      throw new CaptureError('strict-validation', `Frame #${String(frameIndex)} rejected: ${error.message}`);
    }
  }

  private async openSink(sink: RecordSink, faults: FaultNameTable): Promise<OutputSchema> {
    let schema: OutputSchema;
    try {
      schema = this.ctx.ensureSchema(faults);
    } catch (error) {
      throw new CaptureError('schema-conformance', toErrorMessage(error), { cause: error });
    }

    if (!this.sinkOpened) {
      try {
        await sink.open(schema.columns);
      } catch (error) {
        throw new CaptureError('sink-write', `Failed to open output: ${toErrorMessage(error)}`, { cause: error });
      }
      this.sinkOpened = true;
    }
    return schema;
  }

  private async closeSink(sink: RecordSink): Promise<void> {
    if (!this.sinkOpened) return;
    this.sinkOpened = false;
    try {
      await sink.close();
    } catch (error) {
      throw new CaptureError('sink-write', `Failed to close output: ${toErrorMessage(error)}`, { cause: error });
    }
  }

  private emitProgress(): void {
    if (!this.ctx.eventBus.hasListeners('capture:progress')) return;
    this.ctx.eventBus.emit({
      type: 'capture:progress',
      captureId: this.ctx.captureId,
      progress: this.ctx.buildProgress(),
      timestamp: Date.now(),
    });
  }

  private finish(): void {
    if (this.ctx.stopRequested && this.ctx.stopReason) {
      this.ctx.transitionTo('STOPPED');
      this.ctx.eventBus.emit({
        type: 'capture:stopped',
        captureId: this.ctx.captureId,
        reason: this.ctx.stopReason,
        summary: this.ctx.buildSummary(),
        timestamp: Date.now(),
      });
      return;
    }

    this.ctx.transitionTo('COMPLETED');
    this.ctx.eventBus.emit({
      type: 'capture:completed',
      captureId: this.ctx.captureId,
      summary: this.ctx.buildSummary(),
      timestamp: Date.now(),
    });
  }

  private async fail(error: unknown, sink: RecordSink): Promise<void> {
    const failure =
      error instanceof CaptureError ? error : new CaptureError('internal', toErrorMessage(error), { cause: error });
    let message = failure.message;

    // Rows already written stay in the output.
    try {
      await this.closeSink(sink);
    } catch (closeError) {
      message = `${message}; ${toErrorMessage(closeError)}`;
    }

    this.ctx.failure = { reason: failure.reason, message };
    this.ctx.transitionTo('FAILED');
    this.ctx.eventBus.emit({
      type: 'capture:failed',
      captureId: this.ctx.captureId,
      reason: failure.reason,
      error: message,
      timestamp: Date.now(),
    });
  }
}
