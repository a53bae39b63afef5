import { Injectable, Logger } from '@nestjs/common';
import { read, utils, WorkBook } from 'xlsx';
import { CellValue, RawRow, cellText } from '../../common/cell-value';
import {
  RawSheet,
  SourceUnavailableError,
  TableSource,
} from '../interfaces/table-source.interface';
import { ReferenceReader, formatError, toExportUrl } from '../reference-reader';

function toCellValue(value: unknown): CellValue {
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }
  return null;
}

/**
 * Turn a header row into unique, non-empty column names.
 * Blank headers become "Column N"; repeats get a numeric suffix.
 */
export function buildHeader(cells: readonly unknown[]): string[] {
  const seen = new Map<string, number>();
  return cells.map((cell, index) => {
    const base = cellText(toCellValue(cell)) || `Column ${index + 1}`;
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    return count === 0 ? base : `${base} (${count + 1})`;
  });
}

/**
 * Convert every worksheet of a workbook. The first non-blank row of each
 * sheet is its header; fully blank rows are skipped.
 */
export function parseWorkbook(workbook: WorkBook): RawSheet[] {
  return workbook.SheetNames.map((title) => {
    const matrix = utils.sheet_to_json<unknown[]>(workbook.Sheets[title], {
      header: 1,
      raw: true,
      defval: null,
      blankrows: false,
    });

    if (matrix.length === 0) {
      return { title, header: [], rows: [] };
    }

    const header = buildHeader(matrix[0]);
    const rows = matrix.slice(1).map((cells) => {
      const row: RawRow = {};
      header.forEach((column, index) => {
        row[column] = toCellValue(cells[index]);
      });
      return row;
    });

    return { title, header, rows };
  });
}

/**
 * Excel Workbook Source Strategy
 *
 * Handles .xlsx/.xls files (local or remote) and Google Sheets links, which
 * are fetched through their xlsx export so that every month tab arrives in one
 * request. Cells keep their native types: numbers stay numbers, dates arrive
 * as spreadsheet serials and are converted by the normalizers.
 */
@Injectable()
export class XlsxWorkbookSource implements TableSource {
  private readonly logger = new Logger(XlsxWorkbookSource.name);

  readonly name = 'xlsx-workbook';
  readonly description = 'Excel workbook or Google Sheets xlsx export';

  constructor(private readonly reader: ReferenceReader) {}

  canHandle(reference: string): boolean {
    const path = reference.split(/[?#]/)[0];
    if (/\.xlsx?$/i.test(path)) return true;
    return (
      reference.startsWith('https://docs.google.com/spreadsheets/') &&
      !/format=csv/i.test(reference)
    );
  }

  async load(reference: string): Promise<RawSheet[]> {
    const url = toExportUrl(reference, 'xlsx');
    const buffer = await this.reader.read(url, this.name);

    let workbook: WorkBook;
    try {
      workbook = read(buffer, { type: 'buffer' });
    } catch (error) {
      throw new SourceUnavailableError(
        this.name,
        reference,
        `Unreadable workbook: ${formatError(error)}`,
        error instanceof Error ? error : undefined,
      );
    }

    const sheets = parseWorkbook(workbook);
    this.logger.log(
      `Loaded ${sheets.length} sheet(s) from ${reference}: ${sheets.map((s) => s.title).join(', ')}`,
    );
    return sheets;
  }
}
