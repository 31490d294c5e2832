import { mkdir, open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { dirname } from 'node:path';
import Papa from 'papaparse';
import type { RecordSink } from '../../domain/ports/RecordSink.js';
import { formatCell } from './formatCell.js';

const BYTE_ORDER_MARK = '\uFEFF';
const ROW_END = '\r\n';

/**
 * Record sink that streams rows into a UTF-8 CSV file.
 *
 * Each row is written with one awaited write as soon as it arrives, so rows
 * already written survive a later failure. The file is truncated on open.
 */
export class CsvFileSink implements RecordSink {
  private handle: FileHandle | null = null;
  private columnCount = 0;
  private rows = 0;

  constructor(readonly path: string) {}

  async open(columns: readonly string[]): Promise<void> {
    if (this.handle) {
      throw new Error(`CsvFileSink: ${this.path} is already open`);
    }
    await mkdir(dirname(this.path), { recursive: true });
    this.handle = await open(this.path, 'w');
    this.columnCount = columns.length;
    this.rows = 0;
    await this.handle.write(BYTE_ORDER_MARK + this.encode([...columns]));
  }

  async write(values: readonly number[]): Promise<void> {
    const handle = this.requireOpen();
    if (values.length !== this.columnCount) {
      throw new Error(
        `CsvFileSink: row has ${String(values.length)} values, header has ${String(this.columnCount)} columns`,
      );
    }
    await handle.write(this.encode(values.map(formatCell)));
    this.rows++;
  }

  async close(): Promise<void> {
    const handle = this.handle;
    if (!handle) return;
    this.handle = null;
    await handle.close();
  }

  /** Data rows written since `open()`. */
  get rowCount(): number {
    return this.rows;
  }

  private requireOpen(): FileHandle {
    if (!this.handle) {
      throw new Error('CsvFileSink: open() must be called before write()');
    }
    return this.handle;
  }

  private encode(cells: string[]): string {
    return Papa.unparse([cells], { newline: ROW_END }) + ROW_END;
  }
}
