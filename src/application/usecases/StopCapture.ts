import type { CaptureContext } from '../CaptureContext.js';

/** Use case: end a running capture cleanly. Frames already validated are still written. */
export class StopCapture {
  constructor(private readonly ctx: CaptureContext) {}

  execute(): void {
    if (this.ctx.status !== 'RUNNING') {
      throw new Error(`Cannot stop capture from status '${this.ctx.status}'`);
    }
    this.ctx.requestStop('manual');
  }
}
