import type { CaptureStatus } from '../../domain/model/CaptureStatus.js';
import type { CaptureProgress } from '../../domain/model/Capture.js';
import type { CaptureContext } from '../CaptureContext.js';

/** Result of querying capture status. */
export interface CaptureStatusResult {
  readonly status: CaptureStatus;
  readonly progress: CaptureProgress;
  /** Output columns, once the schema has been built. */
  readonly columns?: readonly string[];
}

/** Use case: query the current state and counters of a capture. */
export class GetCaptureStatus {
  constructor(private readonly ctx: CaptureContext) {}

  execute(): CaptureStatusResult {
    return {
      status: this.ctx.status,
      progress: this.ctx.buildProgress(),
      columns: this.ctx.schema?.columns,
    };
  }

  getCaptureId(): string {
    return this.ctx.captureId;
  }
}
