import { CellValue, RawRow } from '../common/cell-value';
import {
  ColumnAliasesSchema,
  DASHBOARD_CONFIG,
} from '../config/dashboard.config';

/**
 * Logical fields the loaders and metrics ask for, independent of how any
 * particular spreadsheet spells its headers.
 */
export const LOGICAL_FIELDS = ColumnAliasesSchema.keyof().options;
export type LogicalField = (typeof LOGICAL_FIELDS)[number];

export type ColumnAliases = Readonly<Record<LogicalField, readonly string[]>>;

export const COLUMN_ALIASES: ColumnAliases = DASHBOARD_CONFIG.columnAliases;

/**
 * Outcome of a column lookup. Callers must handle `absent` explicitly;
 * lookups never throw for a missing column.
 */
export type ColumnMatch =
  | { kind: 'found'; field: string; column: string }
  | { kind: 'absent'; field: string; tried: readonly string[] };

/**
 * Raised when code asks for a logical field that has no alias list.
 * This is a programming error, not a data problem.
 */
export class UnknownFieldError extends Error {
  constructor(public readonly field: string) {
    super(
      `Unknown field name: ${field}. Valid names: ${LOGICAL_FIELDS.join(', ')}`,
    );
    this.name = 'UnknownFieldError';
  }
}

export function isLogicalField(name: string): name is LogicalField {
  return LOGICAL_FIELDS.some((field) => field === name);
}

/**
 * Normalize a header or alias for comparison.
 *
 * Case-folded; underscores and hyphens read as spaces; any other punctuation
 * dropped; whitespace collapsed. "mainline." and "Mainline" compare equal, as
 * do "Sensor_Name" and "sensor name".
 */
export function normalizeColumnName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[_-]+/g, ' ')
    .replace(/[^\p{L}\p{N}\s]+/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Find the first candidate present in `header`.
 *
 * Candidates are tried in order. When several headers normalize to the same
 * candidate the smallest header name (code-point order) is returned, so the
 * result depends on neither column order nor column casing.
 */
export function findColumn(
  header: readonly string[],
  candidates: readonly string[],
  field: string = candidates[0] ?? '',
): ColumnMatch {
  for (const candidate of candidates) {
    const target = normalizeColumnName(candidate);
    if (target === '') continue;

    let best: string | null = null;
    for (const column of header) {
      if (normalizeColumnName(column) !== target) continue;
      if (best === null || column < best) {
        best = column;
      }
    }

    if (best !== null) {
      return { kind: 'found', field, column: best };
    }
  }

  return { kind: 'absent', field, tried: candidates };
}

/**
 * SchemaMapper - resolves logical fields against one table's header.
 *
 * The header is copied and frozen at construction; resolutions are cached
 * per instance. One mapper is created per loaded sheet.
 *
 * @example
 * const mapper = new SchemaMapper(['Name', 'Vacuum', 'Last Communication']);
 * mapper.column('sensor_name'); // 'Name'
 * mapper.validateRequired(['sensor_name', 'latitude']);
 * // { valid: false, missing: ['latitude'] }
 */
export class SchemaMapper {
  readonly header: readonly string[];
  private readonly cache = new Map<LogicalField, ColumnMatch>();

  constructor(
    header: readonly string[],
    private readonly aliases: ColumnAliases = COLUMN_ALIASES,
  ) {
    this.header = Object.freeze([...header]);
  }

  resolve(field: LogicalField): ColumnMatch {
    const cached = this.cache.get(field);
    if (cached) return cached;

    const match = findColumn(this.header, this.aliases[field], field);
    this.cache.set(field, match);
    return match;
  }

  /**
   * Resolve a field given by name at run time (e.g. from a query string).
   * @throws UnknownFieldError when the name is not a logical field
   */
  resolveByName(name: string): ColumnMatch {
    if (!isLogicalField(name)) {
      throw new UnknownFieldError(name);
    }
    return this.resolve(name);
  }

  column(field: LogicalField): string | null {
    const match = this.resolve(field);
    return match.kind === 'found' ? match.column : null;
  }

  /**
   * Read a logical field from a row of this table; null when the column is absent.
   */
  value(row: RawRow, field: LogicalField): CellValue {
    const column = this.column(field);
    if (column === null) return null;
    return row[column] ?? null;
  }

  has(field: LogicalField): boolean {
    return this.resolve(field).kind === 'found';
  }

  /**
   * Every logical field present in this header, mapped to its column.
   */
  resolveAll(): Partial<Record<LogicalField, string>> {
    const resolved: Partial<Record<LogicalField, string>> = {};
    for (const field of LOGICAL_FIELDS) {
      const column = this.column(field);
      if (column !== null) {
        resolved[field] = column;
      }
    }
    return resolved;
  }

  validateRequired(fields: readonly LogicalField[]): {
    valid: boolean;
    missing: LogicalField[];
  } {
    const missing = fields.filter((field) => !this.has(field));
    return { valid: missing.length === 0, missing };
  }
}
