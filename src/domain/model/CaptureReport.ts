/** A row read back from a capture CSV, keyed by header. */
export type CaptureRow = Readonly<Record<string, string>>;

export interface Range {
  readonly min: number;
  readonly max: number;
}

/** Aggregates for one device of the chain. */
export interface DeviceReport {
  readonly chainId: number;
  readonly deviceId: number;
  readonly frames: number;
  readonly firstFrameIndex: number;
  readonly lastFrameIndex: number;
  readonly cellVoltage?: Range;
  readonly current?: Range;
  readonly packVoltage?: Range;
}

export interface CaptureReport {
  readonly totalRows: number;
  readonly devices: readonly DeviceReport[];
}
