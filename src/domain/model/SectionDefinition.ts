export type SectionValueType = 'integer' | 'decimal';

/** How a section's values map onto output columns. */
export type SectionColumns =
  | { readonly kind: 'scalar'; readonly column: string }
  | { readonly kind: 'indexed'; readonly column: (position: number) => string }
  | { readonly kind: 'faults' };

export interface SectionDefinition {
  /** Section name used in diagnostics. */
  readonly name: string;
  /** Literal token that opens the section in a frame. */
  readonly label: string;
  /** Exact number of value tokens following the label. */
  readonly count: number;
  readonly valueType: SectionValueType;
  readonly columns: SectionColumns;
}

export function scalarColumn(column: string): SectionColumns {
  return { kind: 'scalar', column };
}

/** Columns named per 1-based position, e.g. `vcell3_v`. */
export function indexedColumns(column: (position: number) => string): SectionColumns {
  return { kind: 'indexed', column };
}
