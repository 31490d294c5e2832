import type { PreviewResult } from '../../domain/model/Capture.js';
import type { AcceptedFrame, RejectedFrame } from '../../domain/model/Frame.js';
import { FrameAccumulator } from '../../domain/services/FrameAccumulator.js';
import type { CaptureContext } from '../CaptureContext.js';

/** Use case: validate the first frames of the source without writing anything. */
export class PreviewCapture {
  constructor(private readonly ctx: CaptureContext) {}

  async execute(maxFrames = 10): Promise<PreviewResult> {
    const source = this.ctx.assertSourceConfigured();
    this.ctx.transitionTo('PREVIEWING');

    const accepted: AcceptedFrame[] = [];
    const rejected: RejectedFrame[] = [];
    let columns: readonly string[] = [];
    let sampled = 0;

    try {
      const faults = await this.ctx.resolveFaults();
      const schema = this.ctx.ensureSchema(faults);
      columns = schema.columns;

      const controller = new AbortController();
      const accumulator = new FrameAccumulator();

      for await (const frame of accumulator.frames(source.read(controller.signal))) {
        if (sampled >= maxFrames) break;
        sampled++;

        const result = this.ctx.validator.validate(frame.text);
        if (result.isValid) {
          const record = this.ctx.schemaBuilder.toRecord(schema, accepted.length + 1, result.parsed, faults);
          accepted.push({ frameIndex: frame.index, record });
        } else {
          rejected.push({ frameIndex: frame.index, error: result.errors[0] });
        }

        if (sampled >= maxFrames) {
          controller.abort();
          break;
        }
      }
    } catch (error) {
      this.ctx.transitionTo('FAILED');
      throw error;
    }

    this.ctx.transitionTo('PREVIEWED');

    return { accepted, rejected, totalSampled: sampled, columns };
  }
}
