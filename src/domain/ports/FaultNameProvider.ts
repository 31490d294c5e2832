/** Supplies raw fault-flag names in transmission order. An empty list means none were found. */
export interface FaultNameProvider {
  names(): Promise<readonly string[]>;
  /** Short description used in diagnostics, e.g. the file path. */
  describe(): string;
}
