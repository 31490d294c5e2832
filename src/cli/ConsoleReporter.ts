import type { StopReason } from '../domain/model/Capture.js';
import type { ChainCapture } from '../ChainCapture.js';

export interface ConsoleReporterOptions {
  /** Receives complete output text, e.g. `process.stderr.write`. */
  readonly write: (text: string) => void;
  /** Show a single-line live progress display. */
  readonly progress: boolean;
  /** Minimum time between two progress redraws. Default: 500. */
  readonly intervalMs?: number;
  readonly clock?: () => number;
}

const STOP_DESCRIPTIONS: Record<StopReason, string> = {
  'max-frames': 'frame limit reached',
  duration: 'duration elapsed',
  manual: 'interrupted',
};

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

/** Turns capture events into `[INFO]`/`[WARN]`/`[ERROR]` lines. */
export class ConsoleReporter {
  private readonly intervalMs: number;
  private readonly clock: () => number;
  private lastDraw = -Infinity;
  private lineOpen = false;

  constructor(private readonly options: ConsoleReporterOptions) {
    this.intervalMs = options.intervalMs ?? 500;
    this.clock = options.clock ?? Date.now;
  }

  attach(capture: ChainCapture): void {
    capture
      .on('faults:resolved', (event) => {
        if (event.origin === 'extracted') {
          this.line(`[INFO] Using ${String(event.count)} fault names from firmware source`);
        } else {
          this.line(`[WARN] ${event.note ?? 'Fault names unavailable'}; using generated fault column names`);
        }
      })
      .on('frame:rejected', (event) => {
        this.line(`[WARN] Skipped frame #${String(event.frameIndex)}: ${event.error.message}`);
      })
      .on('capture:progress', (event) => {
        if (!this.options.progress) return;
        const now = this.clock();
        if (now - this.lastDraw < this.intervalMs) return;
        this.lastDraw = now;

        const { progress } = event;
        const parts = [`frames=${String(progress.attemptedFrames)}`, `elapsed=${seconds(progress.elapsedMs)}`];
        if (progress.remainingMs !== undefined) parts.push(`remaining=${seconds(progress.remainingMs)}`);
        if (progress.maxFrames !== undefined) {
          parts.push(`target=${String(progress.attemptedFrames)}/${String(progress.maxFrames)}`);
        }
        this.options.write(`\r[INFO] Capturing... ${parts.join(', ')}`);
        this.lineOpen = true;
      })
      .on('capture:stopped', (event) => {
        this.line(`[INFO] Capture stopped: ${STOP_DESCRIPTIONS[event.reason]}`);
      })
      .on('capture:failed', (event) => {
        this.line(`[ERROR] ${event.error}`);
      });
  }

  /** Write a full line, ending any open progress line first. */
  line(text: string): void {
    this.endProgressLine();
    this.options.write(`${text}\n`);
  }

  endProgressLine(): void {
    if (!this.lineOpen) return;
    this.lineOpen = false;
    this.options.write('\n');
  }
}
