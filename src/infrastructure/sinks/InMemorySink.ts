import type { RecordSink } from '../../domain/ports/RecordSink.js';

/** Record sink that keeps the header and rows in memory. */
export class InMemorySink implements RecordSink {
  columns: readonly string[] = [];
  readonly rows: number[][] = [];
  opened = false;
  closed = false;

  open(columns: readonly string[]): Promise<void> {
    this.columns = [...columns];
    this.opened = true;
    return Promise.resolve();
  }

  write(values: readonly number[]): Promise<void> {
    if (!this.opened || this.closed) {
      return Promise.reject(new Error('InMemorySink: not open'));
    }
    this.rows.push([...values]);
    return Promise.resolve();
  }

  close(): Promise<void> {
    this.closed = true;
    return Promise.resolve();
  }

  /** Rows as objects keyed by column name. */
  records(): Record<string, number>[] {
    return this.rows.map((row) => Object.fromEntries(this.columns.map((column, i) => [column, row[i] ?? NaN])));
  }
}
