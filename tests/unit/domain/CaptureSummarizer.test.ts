import { describe, it, expect } from 'vitest';
import { CaptureSummarizer } from '../../../src/domain/services/CaptureSummarizer.js';
import type { CaptureRow } from '../../../src/domain/model/CaptureReport.js';

const COLUMNS = ['frame_index', 'chain_id', 'device_id', 'current_a', 'pack_voltage_v', 'vcell1_v', 'vcell2_v'];

const ROWS: CaptureRow[] = [
  {
    frame_index: '1',
    chain_id: '1',
    device_id: '2',
    current_a: '-1.5',
    pack_voltage_v: '50',
    vcell1_v: '3.6',
    vcell2_v: '3.7',
  },
  {
    frame_index: '2',
    chain_id: '1',
    device_id: '1',
    current_a: '0.5',
    pack_voltage_v: '49',
    vcell1_v: '3.5',
    vcell2_v: '3.65',
  },
  {
    frame_index: '3',
    chain_id: '1',
    device_id: '2',
    current_a: '-0.5',
    pack_voltage_v: '51',
    vcell1_v: 'nan',
    vcell2_v: '3.8',
  },
  {
    frame_index: '4',
    chain_id: 'x',
    device_id: '1',
    current_a: '1',
    pack_voltage_v: '1',
    vcell1_v: '1',
    vcell2_v: '1',
  },
];

describe('CaptureSummarizer', () => {
  it('should require the identifying columns', () => {
    expect(() => new CaptureSummarizer(['frame_index', 'chain_id'])).toThrow(
      'Required columns are missing: device_id, current_a',
    );
  });

  it('should aggregate rows per chain and device, sorted by id', () => {
    const report = new CaptureSummarizer(COLUMNS).summarize(ROWS);

    expect(report.totalRows).toBe(3);
    expect(report.devices).toEqual([
      {
        chainId: 1,
        deviceId: 1,
        frames: 1,
        firstFrameIndex: 2,
        lastFrameIndex: 2,
        cellVoltage: { min: 3.5, max: 3.65 },
        current: { min: 0.5, max: 0.5 },
        packVoltage: { min: 49, max: 49 },
      },
      {
        chainId: 1,
        deviceId: 2,
        frames: 2,
        firstFrameIndex: 1,
        lastFrameIndex: 3,
        cellVoltage: { min: 3.6, max: 3.8 },
        current: { min: -1.5, max: -0.5 },
        packVoltage: { min: 50, max: 51 },
      },
    ]);
  });

  it('should apply the device filter', () => {
    const report = new CaptureSummarizer(COLUMNS).summarize(ROWS, { deviceId: 2 });

    expect(report.totalRows).toBe(2);
    expect(report.devices.map((device) => device.deviceId)).toEqual([2]);
  });

  it('should apply the chain filter', () => {
    const report = new CaptureSummarizer(COLUMNS).summarize(ROWS, { chainId: 9 });

    expect(report).toEqual({ totalRows: 0, devices: [] });
  });
});
