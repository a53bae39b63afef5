import { RawRow } from '../../common/cell-value';

/**
 * One worksheet (or one CSV file) as loaded from a source.
 */
export interface RawSheet {
  /** Worksheet title, or the file name for single-sheet sources */
  title: string;
  /** Column names in sheet order */
  header: string[];
  rows: RawRow[];
}

/**
 * TableSource Interface - Strategy Pattern for spreadsheet access
 *
 * Each source format (xlsx workbook, CSV export, ...) implements this
 * interface. The data loader picks the first registered source whose
 * `canHandle()` accepts a configured reference.
 *
 * Usage:
 * ```typescript
 * const source = sources.find((s) => s.canHandle(reference));
 * const sheets = source ? await source.load(reference) : [];
 * ```
 */
export interface TableSource {
  /**
   * Unique identifier used in logs and load summaries.
   * Examples: 'xlsx-workbook', 'csv'
   */
  readonly name: string;

  /** Human-readable description of the format */
  readonly description: string;

  /**
   * Decide from the reference alone (URL or path) whether this source applies.
   * Must not perform I/O.
   */
  canHandle(reference: string): boolean;

  /**
   * Fetch and parse every sheet behind the reference.
   * @throws SourceUnavailableError when the reference cannot be read or parsed
   */
  load(reference: string): Promise<RawSheet[]>;
}

/**
 * Custom error for unreachable or unreadable sources.
 */
export class SourceUnavailableError extends Error {
  constructor(
    public readonly sourceName: string,
    public readonly reference: string,
    message: string,
    public readonly originalError?: Error,
  ) {
    super(`[${sourceName}] ${message}`);
    this.name = 'SourceUnavailableError';
  }
}

/** Injection token for the ordered list of registered sources */
export const TABLE_SOURCES = Symbol('TABLE_SOURCES');
