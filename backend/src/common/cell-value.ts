/**
 * A single spreadsheet cell as delivered by a table source.
 * CSV sources only produce strings; workbook sources also yield numbers and booleans.
 */
export type CellValue = string | number | boolean | Date | null;

export type RawRow = Record<string, CellValue>;

/**
 * Render a cell as trimmed text. Null and undefined become ''.
 */
export function cellText(value: CellValue | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? '' : value.toISOString();
  }
  return String(value).trim();
}
