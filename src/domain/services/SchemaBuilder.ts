import type { SectionDefinition } from '../model/SectionDefinition.js';
import type { FaultNameTable } from '../model/FaultNameTable.js';
import type { OutputSchema } from '../model/OutputSchema.js';
import type { FrameRecord, ParsedFrame } from '../model/Frame.js';
import { FRAME_SECTIONS, FRAME_INDEX_COLUMN } from '../model/FrameLayout.js';

/** Derives the output columns from the section table and turns parsed frames into flat records. */
export class SchemaBuilder {
  constructor(private readonly sections: readonly SectionDefinition[] = FRAME_SECTIONS) {}

  build(faults: FaultNameTable): OutputSchema {
    const columns: string[] = [FRAME_INDEX_COLUMN];
    for (const section of this.sections) {
      columns.push(...this.sectionColumns(section, faults));
    }

    const duplicates = columns.filter((column, i) => columns.indexOf(column) !== i);
    if (duplicates.length > 0) {
      throw new Error(`Duplicate output columns: ${duplicates.join(', ')}`);
    }

    return Object.freeze({ columns: Object.freeze(columns) });
  }

  toRecord(schema: OutputSchema, frameIndex: number, parsed: ParsedFrame, faults: FaultNameTable): FrameRecord {
    const record: Record<string, number> = { [FRAME_INDEX_COLUMN]: frameIndex };

    for (const section of this.sections) {
      const values = parsed.get(section.name) ?? [];
      const names = this.sectionColumns(section, faults);
      names.forEach((name, i) => {
        const value = values[i];
        if (value !== undefined) record[name] = value;
      });
    }

    this.assertConforms(schema, record);
    return record;
  }

  /** Values of a conforming record in column order. */
  toRow(schema: OutputSchema, record: FrameRecord): number[] {
    return schema.columns.map((column) => {
      const value = record[column];
      if (value === undefined) {
        throw new Error(`Record has no value for column '${column}'`);
      }
      return value;
    });
  }

  /** Throw when a record's columns differ from the schema in name or order. */
  assertConforms(schema: OutputSchema, record: FrameRecord): void {
    const keys = Object.keys(record);
    const mismatch =
      keys.length !== schema.columns.length || schema.columns.some((column, i) => keys[i] !== column);

    if (mismatch) {
      const missing = schema.columns.filter((column) => !(column in record));
      const extra = keys.filter((key) => !schema.columns.includes(key));
      throw new Error(
        `Record does not match output schema (missing: ${missing.join(', ') || 'none'}; unexpected: ${extra.join(', ') || 'none'})`,
      );
    }
  }

  private sectionColumns(section: SectionDefinition, faults: FaultNameTable): readonly string[] {
    switch (section.columns.kind) {
      case 'scalar':
        return [section.columns.column];
      case 'indexed': {
        const name = section.columns.column;
        return Array.from({ length: section.count }, (_, i) => name(i + 1));
      }
      case 'faults':
        if (faults.columns.length !== section.count) {
          throw new Error(
            `Fault table has ${String(faults.columns.length)} names, section '${section.name}' carries ${String(section.count)}`,
          );
        }
        return faults.columns;
    }
  }
}
