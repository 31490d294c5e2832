import type { SectionDefinition } from './SectionDefinition.js';
import { scalarColumn, indexedColumns } from './SectionDefinition.js';

/** Cells monitored by one device in the chain. */
export const CELL_COUNT = 14;

/** Fault flags transmitted per frame. */
export const FAULT_COUNT = 187;

export const FRAME_TERMINATOR = 'ENDData';
export const FIELD_DELIMITER = ';';

export const FRAME_INDEX_COLUMN = 'frame_index';

/**
 * Fixed frame layout sent by the device firmware, in transmission order.
 *
 * The validator walks this table once per frame; the schema builder derives
 * the output columns from it.
 */
export const FRAME_SECTIONS: readonly SectionDefinition[] = [
  { name: 'TOTDEV', label: 'TOTDEV', count: 1, valueType: 'integer', columns: scalarColumn('total_devices') },
  { name: 'CHAIN', label: 'CHAIN', count: 1, valueType: 'integer', columns: scalarColumn('chain_id') },
  { name: 'DEV', label: 'DEV', count: 1, valueType: 'integer', columns: scalarColumn('device_id') },
  {
    name: 'SOC',
    label: 'SOC',
    count: CELL_COUNT,
    valueType: 'integer',
    columns: indexedColumns((n) => `soc_cell${String(n)}`),
  },
  {
    name: 'Vcell',
    label: 'Vcell:',
    count: CELL_COUNT,
    valueType: 'decimal',
    columns: indexedColumns((n) => `vcell${String(n)}_v`),
  },
  {
    name: 'TEMP',
    label: 'TEMP:',
    count: CELL_COUNT,
    valueType: 'decimal',
    columns: indexedColumns((n) => `temp_cell${String(n)}_raw`),
  },
  {
    name: 'BAL',
    label: 'BAL:',
    count: CELL_COUNT,
    valueType: 'integer',
    columns: indexedColumns((n) => `bal_cell${String(n)}`),
  },
  { name: 'Curr', label: 'Curr:', count: 1, valueType: 'decimal', columns: scalarColumn('current_a') },
  { name: 'totV', label: 'totV:', count: 1, valueType: 'decimal', columns: scalarColumn('pack_voltage_v') },
  { name: 'Vref', label: 'Vref:', count: 1, valueType: 'decimal', columns: scalarColumn('vref_v') },
  { name: 'VUV', label: 'VUV:', count: 1, valueType: 'decimal', columns: scalarColumn('vuv_threshold_v') },
  { name: 'VOV', label: 'VOV:', count: 1, valueType: 'decimal', columns: scalarColumn('vov_threshold_v') },
  { name: 'GPUT', label: 'GPUT:', count: 1, valueType: 'decimal', columns: scalarColumn('gput_threshold_v') },
  { name: 'GPOT', label: 'GPOT:', count: 1, valueType: 'decimal', columns: scalarColumn('gpot_threshold_v') },
  { name: 'FAULTS', label: 'FAULTS:', count: FAULT_COUNT, valueType: 'integer', columns: { kind: 'faults' } },
  { name: 'VTREF', label: 'VTREF', count: 1, valueType: 'decimal', columns: scalarColumn('vtref_v') },
];

/** Total value tokens in a well-formed frame (labels excluded). */
export function expectedValueCount(sections: readonly SectionDefinition[] = FRAME_SECTIONS): number {
  return sections.reduce((sum, section) => sum + section.count, 0);
}
