import type { CaptureReport, CaptureRow, DeviceReport, Range } from '../model/CaptureReport.js';

export const REQUIRED_REPORT_COLUMNS = ['frame_index', 'chain_id', 'device_id', 'current_a'] as const;

const CELL_VOLTAGE_COLUMN = /^vcell(\d+)_v$/;

export interface SummarizeOptions {
  readonly chainId?: number;
  readonly deviceId?: number;
}

interface DeviceAccumulator {
  chainId: number;
  deviceId: number;
  frames: number;
  firstFrameIndex: number;
  lastFrameIndex: number;
  cellVoltage?: Range;
  current?: Range;
  packVoltage?: Range;
}

function parseId(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return /^[+-]?\d+$/.test(trimmed) ? Number(trimmed) : undefined;
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const num = Number(value);
  return Number.isFinite(num) ? num : undefined;
}

function widen(range: Range | undefined, value: number | undefined): Range | undefined {
  if (value === undefined) return range;
  if (!range) return { min: value, max: value };
  return { min: Math.min(range.min, value), max: Math.max(range.max, value) };
}

/**
 * Domain service that aggregates capture rows per (chain, device).
 *
 * Rows whose chain or device id is not an integer are ignored, as are rows
 * outside the optional chain/device filters.
 */
export class CaptureSummarizer {
  constructor(private readonly columns: readonly string[]) {
    const missing = REQUIRED_REPORT_COLUMNS.filter((column) => !columns.includes(column));
    if (missing.length > 0) {
      throw new Error(`Required columns are missing: ${missing.join(', ')}`);
    }
  }

  summarize(rows: Iterable<CaptureRow>, options: SummarizeOptions = {}): CaptureReport {
    const cellColumns = this.columns
      .filter((column) => CELL_VOLTAGE_COLUMN.test(column))
      .sort((a, b) => this.cellNumber(a) - this.cellNumber(b));
    const devices = new Map<string, DeviceAccumulator>();
    let totalRows = 0;

    for (const row of rows) {
      const chainId = parseId(row['chain_id']);
      const deviceId = parseId(row['device_id']);
      if (chainId === undefined || deviceId === undefined) continue;
      if (options.chainId !== undefined && chainId !== options.chainId) continue;
      if (options.deviceId !== undefined && deviceId !== options.deviceId) continue;

      totalRows++;
      const frameIndex = parseNumber(row['frame_index']) ?? totalRows;
      const key = `${String(chainId)}:${String(deviceId)}`;
      let device = devices.get(key);
      if (!device) {
        device = { chainId, deviceId, frames: 0, firstFrameIndex: frameIndex, lastFrameIndex: frameIndex };
        devices.set(key, device);
      }

      device.frames++;
      device.lastFrameIndex = frameIndex;
      for (const column of cellColumns) {
        device.cellVoltage = widen(device.cellVoltage, parseNumber(row[column]));
      }
      device.current = widen(device.current, parseNumber(row['current_a']));
      device.packVoltage = widen(device.packVoltage, parseNumber(row['pack_voltage_v']));
    }

    const reports: DeviceReport[] = [...devices.values()]
      .sort((a, b) => a.chainId - b.chainId || a.deviceId - b.deviceId)
      .map((device) => ({ ...device }));

    return { totalRows, devices: reports };
  }

  private cellNumber(column: string): number {
    const match = CELL_VOLTAGE_COLUMN.exec(column);
    return match ? Number(match[1]) : Number.MAX_SAFE_INTEGER;
  }
}
