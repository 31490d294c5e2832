import Papa from 'papaparse';
import type { CaptureRow } from '../../domain/model/CaptureReport.js';

export interface CaptureTable {
  readonly columns: readonly string[];
  readonly rows: readonly CaptureRow[];
}

/** Reads a capture CSV back into its header and string-valued rows. */
export class CaptureCsvParser {
  parse(data: string | Buffer): CaptureTable {
    const content = (typeof data === 'string' ? data : data.toString('utf-8')).replace(/^\uFEFF/, '');

    const result = Papa.parse<Record<string, string>>(content, {
      header: true,
      skipEmptyLines: true,
      dynamicTyping: false,
    });

    const columns = result.meta.fields ?? [];
    const rows = result.data.filter((row) => !this.isEmptyRow(row));
    return { columns, rows };
  }

  private isEmptyRow(row: Record<string, string>): boolean {
    return Object.values(row).every((v) => v === undefined || v === '');
  }
}
