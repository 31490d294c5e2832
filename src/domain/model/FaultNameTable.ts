import { FAULT_COUNT } from './FrameLayout.js';

export type FaultNameOrigin = 'extracted' | 'fallback';

/** Ordered fault column names; all extracted or all generated, never mixed. */
export interface FaultNameTable {
  readonly columns: readonly string[];
  readonly origin: FaultNameOrigin;
  /** Why extraction was not used, when `origin` is `'fallback'`. */
  readonly note?: string;
}

const DEVICE_PREFIX = 'AEK_POW_BMS63CHAIN_';

function faultOrdinal(position: number): string {
  return `fault_${String(position).padStart(3, '0')}`;
}

export function fallbackFaultTable(note: string, count = FAULT_COUNT): FaultNameTable {
  const columns = Array.from({ length: count }, (_, i) => faultOrdinal(i + 1));
  return Object.freeze({ columns: Object.freeze(columns), origin: 'fallback' as const, note });
}

export function extractedFaultTable(names: readonly string[]): FaultNameTable {
  const columns = names.map((name, i) => {
    const bare = name.startsWith(DEVICE_PREFIX) ? name.slice(DEVICE_PREFIX.length) : name;
    return `${faultOrdinal(i + 1)}_${bare}`;
  });
  return Object.freeze({ columns: Object.freeze(columns), origin: 'extracted' as const });
}
