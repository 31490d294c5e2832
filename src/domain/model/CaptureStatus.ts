export const CaptureStatus = {
  CREATED: 'CREATED',
  PREVIEWING: 'PREVIEWING',
  PREVIEWED: 'PREVIEWED',
  RUNNING: 'RUNNING',
  COMPLETED: 'COMPLETED',
  STOPPED: 'STOPPED',
  FAILED: 'FAILED',
} as const;

export type CaptureStatus = (typeof CaptureStatus)[keyof typeof CaptureStatus];

const VALID_TRANSITIONS: Record<CaptureStatus, readonly CaptureStatus[]> = {
  [CaptureStatus.CREATED]: [CaptureStatus.PREVIEWING, CaptureStatus.RUNNING],
  [CaptureStatus.PREVIEWING]: [CaptureStatus.PREVIEWED, CaptureStatus.FAILED],
  [CaptureStatus.PREVIEWED]: [CaptureStatus.RUNNING],
  [CaptureStatus.RUNNING]: [CaptureStatus.COMPLETED, CaptureStatus.STOPPED, CaptureStatus.FAILED],
  [CaptureStatus.COMPLETED]: [],
  [CaptureStatus.STOPPED]: [],
  [CaptureStatus.FAILED]: [],
};

export function canTransition(from: CaptureStatus, to: CaptureStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminal(status: CaptureStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}
