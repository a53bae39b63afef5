import { VacuumReading } from '../sources/dto/vacuum-reading.dto';
import { PersonnelRecord } from '../sources/dto/personnel-record.dto';

/** A vacuum reading whose value is present */
export type MeasuredReading = VacuumReading & { vacuumInches: number };

export function isMeasured(reading: VacuumReading): reading is MeasuredReading {
  return reading.vacuumInches !== null;
}

export function measuredReadings(readings: readonly VacuumReading[]): MeasuredReading[] {
  return readings.filter(isMeasured);
}

/**
 * Group items by key, keeping first-seen key order.
 */
export function groupBy<T>(
  items: readonly T[],
  keyOf: (item: T) => string,
): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

/**
 * Readings grouped per sensor (upper-cased name) in timestamp order.
 */
export function readingsBySensor(
  readings: readonly MeasuredReading[],
): Map<string, MeasuredReading[]> {
  const groups = groupBy(readings, (r) => r.sensorName.toUpperCase());
  for (const group of groups.values()) {
    group.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  }
  return groups;
}

/**
 * True when the repairs-needed cell holds a note ('' and '0' mean none).
 */
export function hasRepairNote(record: PersonnelRecord): boolean {
  const note = record.repairsNeeded.trim();
  return note !== '' && note !== '0';
}

/** Job descriptions that count as line maintenance for cross-checks */
const MAINTENANCE_PATTERN = /maint|repair|fix|leak/i;

export function isMaintenanceWork(record: PersonnelRecord): boolean {
  return MAINTENANCE_PATTERN.test(record.jobCode);
}

export function uniqueCount(values: Iterable<string>): number {
  return new Set(values).size;
}
