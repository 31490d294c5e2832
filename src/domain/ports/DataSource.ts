export interface SourceMetadata {
  readonly name?: string;
  readonly size?: number;
  /** `'static'` for captured logs, `'live'` for streaming connections. */
  readonly kind: 'static' | 'live';
}

export interface DataSource {
  /** Yield text chunks in arrival order. Stops early once `signal` is aborted. */
  read(signal?: AbortSignal): AsyncIterable<string>;
  metadata(): SourceMetadata;
}
