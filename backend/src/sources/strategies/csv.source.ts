import { Injectable, Logger } from '@nestjs/common';
import { Readable } from 'node:stream';
import csvParser from 'csv-parser';
import { RawRow } from '../../common/cell-value';
import { RawSheet, TableSource } from '../interfaces/table-source.interface';
import { ReferenceReader, toExportUrl } from '../reference-reader';

/**
 * Sheet title for a CSV reference: the file name without extension.
 */
export function csvTitle(reference: string): string {
  const path = reference.split(/[?#]/)[0];
  const file = path.split('/').pop() ?? path;
  return file.replace(/\.csv$/i, '') || 'csv';
}

/**
 * Parse a CSV buffer with csv-parser. Headers are trimmed; a UTF-8 BOM is dropped.
 */
export async function parseCsvBuffer(
  buffer: Buffer,
  title: string,
): Promise<RawSheet> {
  let header: string[] = [];
  const rows: RawRow[] = [];

  const stream = Readable.from(buffer).pipe(
    csvParser({
      mapHeaders: ({ header: name }) => name.replace(/^\uFEFF/, '').trim(),
    }),
  );
  stream.on('headers', (names: string[]) => {
    header = names;
  });

  for await (const row of stream) {
    rows.push(row as Record<string, string>);
  }

  return { title, header, rows };
}

/**
 * CSV Source Strategy
 *
 * Handles single-table CSV files and Google Sheets `format=csv` export links.
 * Every cell arrives as a string.
 */
@Injectable()
export class CsvTableSource implements TableSource {
  private readonly logger = new Logger(CsvTableSource.name);

  readonly name = 'csv';
  readonly description = 'CSV file or Google Sheets CSV export';

  constructor(private readonly reader: ReferenceReader) {}

  canHandle(reference: string): boolean {
    const path = reference.split(/[?#]/)[0];
    return /\.csv$/i.test(path) || /[?&]format=csv/i.test(reference);
  }

  async load(reference: string): Promise<RawSheet[]> {
    const buffer = await this.reader.read(toExportUrl(reference, 'csv'), this.name);
    const sheet = await parseCsvBuffer(buffer, csvTitle(reference));
    this.logger.log(`Read ${sheet.rows.length} rows from ${reference}`);
    return [sheet];
  }
}
