/** Run-wide ordered output columns. Frozen once built. */
export interface OutputSchema {
  readonly columns: readonly string[];
}
