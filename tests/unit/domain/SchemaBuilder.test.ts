import { describe, it, expect } from 'vitest';
import { SchemaBuilder } from '../../../src/domain/services/SchemaBuilder.js';
import { FrameValidator } from '../../../src/domain/services/FrameValidator.js';
import { extractedFaultTable, fallbackFaultTable } from '../../../src/domain/model/FaultNameTable.js';
import { scalarColumn } from '../../../src/domain/model/SectionDefinition.js';
import type { ParsedFrame } from '../../../src/domain/model/Frame.js';
import { frameText } from '../../helpers/frames.js';

const faults = fallbackFaultTable('test');

function parse(text: string): ParsedFrame {
  const result = new FrameValidator().validate(text);
  if (!result.isValid) throw new Error(result.errors[0].message);
  return result.parsed;
}

describe('SchemaBuilder', () => {
  const builder = new SchemaBuilder();

  describe('build()', () => {
    it('should lay out frame_index, section columns and fault columns in frame order', () => {
      const { columns } = builder.build(faults);

      expect(columns).toHaveLength(255);
      expect(columns.slice(0, 5)).toEqual(['frame_index', 'total_devices', 'chain_id', 'device_id', 'soc_cell1']);
      expect(columns[17]).toBe('soc_cell14');
      expect(columns[18]).toBe('vcell1_v');
      expect(columns[32]).toBe('temp_cell1_raw');
      expect(columns[46]).toBe('bal_cell1');
      expect(columns.slice(60, 67)).toEqual([
        'current_a',
        'pack_voltage_v',
        'vref_v',
        'vuv_threshold_v',
        'vov_threshold_v',
        'gput_threshold_v',
        'gpot_threshold_v',
      ]);
      expect(columns[67]).toBe('fault_001');
      expect(columns[253]).toBe('fault_187');
      expect(columns[254]).toBe('vtref_v');
    });

    it('should return a frozen schema', () => {
      const schema = builder.build(faults);

      expect(Object.isFrozen(schema)).toBe(true);
      expect(Object.isFrozen(schema.columns)).toBe(true);
    });

    it('should use extracted fault names without the device prefix', () => {
      const names = Array.from({ length: 187 }, (_, i) => `AEK_POW_BMS63CHAIN_FLAG_${String(i + 1)}`);

      const { columns } = builder.build(extractedFaultTable(names));

      expect(columns[67]).toBe('fault_001_FLAG_1');
      expect(columns[253]).toBe('fault_187_FLAG_187');
    });

    it('should refuse a fault table of the wrong size', () => {
      expect(() => builder.build(fallbackFaultTable('short', 3))).toThrow(
        "Fault table has 3 names, section 'FAULTS' carries 187",
      );
    });

    it('should refuse duplicate column names', () => {
      const custom = new SchemaBuilder([
        { name: 'A', label: 'A', count: 1, valueType: 'integer', columns: scalarColumn('x') },
        { name: 'B', label: 'B', count: 1, valueType: 'integer', columns: scalarColumn('x') },
      ]);

      expect(() => custom.build(faults)).toThrow('Duplicate output columns: x');
    });
  });

  describe('toRecord()', () => {
    it('should flatten a parsed frame into a record whose keys follow the schema', () => {
      const schema = builder.build(faults);

      const record = builder.toRecord(schema, 7, parse(frameText()), faults);

      expect(Object.keys(record)).toEqual(schema.columns);
      expect(record['frame_index']).toBe(7);
      expect(record['total_devices']).toBe(2);
      expect(record['soc_cell14']).toBe(93);
      expect(record['vcell3_v']).toBe(3.603);
      expect(record['temp_cell1_raw']).toBe(20.5);
      expect(record['bal_cell2']).toBe(1);
      expect(record['current_a']).toBe(-1.25);
      expect(record['fault_005']).toBe(1);
      expect(record['fault_006']).toBe(0);
      expect(record['vtref_v']).toBe(2.55);
    });

    it('should fail when the parsed frame lacks a section', () => {
      const schema = builder.build(faults);
      const parsed = new Map(parse(frameText()));
      parsed.delete('VTREF');

      expect(() => builder.toRecord(schema, 1, parsed, faults)).toThrow(
        'Record does not match output schema (missing: vtref_v; unexpected: none)',
      );
    });
  });

  describe('toRow()', () => {
    it('should return values in column order', () => {
      const schema = builder.build(faults);
      const record = builder.toRecord(schema, 3, parse(frameText()), faults);

      const row = builder.toRow(schema, record);

      expect(row).toHaveLength(255);
      expect(row.slice(0, 4)).toEqual([3, 2, 1, 1]);
      expect(row[254]).toBe(2.55);
    });
  });

  describe('assertConforms()', () => {
    it('should reject unexpected columns', () => {
      const schema = { columns: ['frame_index', 'a'] };

      expect(() => builder.assertConforms(schema, { frame_index: 1, a: 2, b: 3 })).toThrow(
        'Record does not match output schema (missing: none; unexpected: b)',
      );
    });

    it('should reject columns in a different order', () => {
      const schema = { columns: ['frame_index', 'a'] };

      expect(() => builder.assertConforms(schema, { a: 2, frame_index: 1 })).toThrow(
        'Record does not match output schema',
      );
    });
  });
});
