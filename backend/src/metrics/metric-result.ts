import { LogicalField } from '../schema/schema-mapper';
import {
  DashboardSnapshot,
  TableName,
} from '../sources/dto/dashboard-snapshot.dto';

/**
 * Outcome of a metric: computed data, or a skip naming the columns the
 * loaded tables lack. A skipped metric is not an error.
 */
export type MetricResult<T> =
  | { status: 'ok'; data: T }
  | { status: 'skipped'; missing: string[]; note: string };

const TABLES: readonly TableName[] = ['vacuum', 'personnel', 'repairs'];

export type FieldRequirements = Partial<Record<TableName, readonly LogicalField[]>>;

/**
 * Required fields absent from the snapshot, as `table.field`.
 */
export function missingFields(
  snapshot: DashboardSnapshot,
  requirements: FieldRequirements,
): string[] {
  const missing: string[] = [];
  for (const table of TABLES) {
    const present = snapshot.fields[table];
    for (const field of requirements[table] ?? []) {
      if (!present.includes(field)) {
        missing.push(`${table}.${field}`);
      }
    }
  }
  return missing;
}

export function ok<T>(data: T): MetricResult<T> {
  return { status: 'ok', data };
}

export function skipped<T>(metric: string, missing: string[]): MetricResult<T> {
  return {
    status: 'skipped',
    missing,
    note: `${metric} needs column(s) that the loaded sheets do not provide: ${missing.join(', ')}`,
  };
}
