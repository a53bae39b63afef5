import { Injectable, Logger } from '@nestjs/common';
import { readFile } from 'node:fs/promises';
import { SourceUnavailableError } from './interfaces/table-source.interface';

const GOOGLE_SHEET_PATTERN =
  /^https:\/\/docs\.google\.com\/spreadsheets\/d\/([\w-]+)/;

export function isRemoteReference(reference: string): boolean {
  return /^https?:\/\//i.test(reference);
}

/**
 * Rewrite a Google Sheets share/edit link into its export URL.
 * Other references are returned unchanged.
 */
export function toExportUrl(reference: string, format: 'xlsx' | 'csv'): string {
  const match = GOOGLE_SHEET_PATTERN.exec(reference);
  if (!match || reference.includes('/export?')) {
    return reference;
  }
  const gid = /[#&?]gid=(\d+)/.exec(reference);
  const gidParam = format === 'csv' && gid ? `&gid=${gid[1]}` : '';
  return `https://docs.google.com/spreadsheets/d/${match[1]}/export?format=${format}${gidParam}`;
}

/**
 * Reads the raw bytes behind a source reference: HTTP(S) URLs are fetched,
 * anything else is read as a local path. No retries.
 */
@Injectable()
export class ReferenceReader {
  private readonly logger = new Logger(ReferenceReader.name);

  async read(reference: string, sourceName: string): Promise<Buffer> {
    if (isRemoteReference(reference)) {
      return this.fetchRemote(reference, sourceName);
    }

    try {
      return await readFile(reference);
    } catch (error) {
      throw new SourceUnavailableError(
        sourceName,
        reference,
        `Cannot read file ${reference}: ${formatError(error)}`,
        error instanceof Error ? error : undefined,
      );
    }
  }

  private async fetchRemote(url: string, sourceName: string): Promise<Buffer> {
    this.logger.debug(`Fetching ${url}`);

    let response: Response;
    try {
      response = await fetch(url);
    } catch (error) {
      throw new SourceUnavailableError(
        sourceName,
        url,
        `Request failed: ${formatError(error)}`,
        error instanceof Error ? error : undefined,
      );
    }

    if (!response.ok) {
      throw new SourceUnavailableError(
        sourceName,
        url,
        `HTTP ${response.status}: ${response.statusText}`,
      );
    }

    try {
      return Buffer.from(await response.arrayBuffer());
    } catch (error) {
      throw new SourceUnavailableError(
        sourceName,
        url,
        `Failed to read body: ${formatError(error)}`,
        error instanceof Error ? error : undefined,
      );
    }
  }
}

export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
