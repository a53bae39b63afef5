import { LogicalField, SchemaMapper } from '../../schema/schema-mapper';
import { RawSheet } from '../interfaces/table-source.interface';

export interface NormalizedTable<T> {
  records: T[];
  /** Logical fields present in the sheet */
  fields: LogicalField[];
  warnings: string[];
  droppedRows: number;
}

export function presentFields(
  mapper: SchemaMapper,
  candidates: readonly LogicalField[],
): LogicalField[] {
  return candidates.filter((field) => mapper.has(field));
}

/**
 * Empty result for a sheet that lacks required columns. Loading continues;
 * metrics depending on the table will report themselves as skipped.
 */
export function missingColumnsResult<T>(
  sheet: RawSheet,
  fields: LogicalField[],
  missing: readonly string[],
): NormalizedTable<T> {
  return {
    records: [],
    fields,
    warnings: [
      `Sheet '${sheet.title}' is missing required column(s): ${missing.join(', ')}`,
    ],
    droppedRows: sheet.rows.length,
  };
}

export function droppedRowsWarning(
  sheet: RawSheet,
  dropped: number,
  reason: string,
): string[] {
  return dropped > 0
    ? [`Sheet '${sheet.title}': dropped ${dropped} row(s) ${reason}`]
    : [];
}
