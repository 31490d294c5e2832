/**
 * Destination for accepted frame records.
 *
 * The pipeline calls `open()` exactly once with the run's schema, `write()`
 * once per accepted record in arrival order, and `close()` at the end of the
 * run. A rejected promise from any of them ends the run.
 */
export interface RecordSink {
  open(columns: readonly string[]): Promise<void>;
  write(values: readonly number[]): Promise<void>;
  close(): Promise<void>;
}
