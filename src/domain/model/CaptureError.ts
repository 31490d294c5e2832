export type FailureReason = 'strict-validation' | 'sink-write' | 'source' | 'schema-conformance' | 'internal';

/** Fatal pipeline error. The run ends as `FAILED` with this reason. */
export class CaptureError extends Error {
  readonly reason: FailureReason;

  constructor(reason: FailureReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CaptureError';
    this.reason = reason;
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
