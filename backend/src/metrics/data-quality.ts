import { DASHBOARD_CONFIG } from '../config/dashboard.config';
import { MS_PER_HOUR, dayKey } from '../common/date-utils';
import { mean, sum } from '../common/number-utils';
import { PersonnelRecord } from '../sources/dto/personnel-record.dto';
import { VacuumReading } from '../sources/dto/vacuum-reading.dto';
import {
  MeasuredReading,
  groupBy,
  hasRepairNote,
  isMaintenanceWork,
  measuredReadings,
  readingsBySensor,
} from './metric-utils';

export type AlertIssue =
  | 'Repairs Needed'
  | 'Excessive Hours'
  | 'Rapid Vac Drop'
  | 'Location Mismatch'
  | 'Zero Impact';

export type AlertSeverity = 'HIGH' | 'MEDIUM' | 'LOW';

export interface DataQualityAlert {
  /** YYYY-MM-DD */
  date: string;
  /** 'System' for alerts raised from sensor data */
  employee: string;
  issue: AlertIssue;
  severity: AlertSeverity;
  details: string;
  site: string;
}

const SEVERITY_RANK: Record<AlertSeverity, number> = { HIGH: 0, MEDIUM: 1, LOW: 2 };

export function detectRepairsNeeded(
  personnel: readonly PersonnelRecord[],
): DataQualityAlert[] {
  return personnel.filter(hasRepairNote).map((record): DataQualityAlert => {
    const note = record.repairsNeeded.trim();
    const location = record.mainline || 'Unknown';
    return {
      date: dayKey(record.date),
      employee: record.employeeName,
      issue: 'Repairs Needed',
      severity: 'HIGH',
      details: `${record.site} - ${location}: ${note}`,
      site: record.site,
    };
  });
}

export function detectExcessiveHours(
  personnel: readonly PersonnelRecord[],
): DataQualityAlert[] {
  const { excessiveDailyHours, severeDailyHours } = DASHBOARD_CONFIG.personnel;
  const alerts: DataQualityAlert[] = [];

  const days = groupBy(personnel, (r) => `${r.employeeName}|${dayKey(r.date)}`);
  for (const records of days.values()) {
    const hours = sum(records.map((r) => r.hours));
    if (hours <= excessiveDailyHours) continue;

    const [first] = records;
    alerts.push({
      date: dayKey(first.date),
      employee: first.employeeName,
      issue: 'Excessive Hours',
      severity: hours > severeDailyHours ? 'HIGH' : 'MEDIUM',
      details: `${hours.toFixed(1)} hours worked in one day at ${first.site}`,
      site: first.site,
    });
  }
  return alerts;
}

interface ReadingChange {
  reading: MeasuredReading;
  sensorName: string;
  change: number;
}

/**
 * Readings that fell by more than the margin beyond the average change
 * between consecutive readings across every sensor. Only pairs of readings at
 * most a day apart are compared.
 */
export function detectRapidDrops(vacuum: readonly VacuumReading[]): DataQualityAlert[] {
  const { rapidDropMargin, rapidDropHighMargin, rapidDropWindowHours } =
    DASHBOARD_CONFIG.quality;

  const changes: ReadingChange[] = [];
  for (const [sensorName, readings] of readingsBySensor(measuredReadings(vacuum))) {
    for (let i = 1; i < readings.length; i++) {
      const gapHours =
        (readings[i].timestamp.getTime() - readings[i - 1].timestamp.getTime()) /
        MS_PER_HOUR;
      if (gapHours > 0 && gapHours <= rapidDropWindowHours) {
        changes.push({
          reading: readings[i],
          sensorName,
          change: readings[i].vacuumInches - readings[i - 1].vacuumInches,
        });
      }
    }
  }

  const average = mean(changes.map((c) => c.change));
  if (average === null) return [];

  return changes
    .filter((c) => c.change < average - rapidDropMargin)
    .map(({ reading, sensorName, change }): DataQualityAlert => ({
      date: dayKey(reading.timestamp),
      employee: 'System',
      issue: 'Rapid Vac Drop',
      severity: Math.abs(change - average) >= rapidDropHighMargin ? 'HIGH' : 'MEDIUM',
      details:
        `${reading.site} - ${sensorName}: Dropped ${Math.abs(change).toFixed(1)}" ` +
        `(avg drop: ${Math.abs(average).toFixed(1)}"), now at ${reading.vacuumInches.toFixed(1)}"`,
      site: reading.site,
    }));
}

/**
 * Maintenance logged at one site on a day when only another site's sensors
 * reported.
 */
export function detectLocationMismatches(
  personnel: readonly PersonnelRecord[],
  vacuum: readonly VacuumReading[],
): DataQualityAlert[] {
  const readingsByDay = groupBy(vacuum, (r) => dayKey(r.timestamp));
  const alerts: DataQualityAlert[] = [];

  for (const record of personnel) {
    if (!isMaintenanceWork(record) || record.site === 'UNKNOWN') continue;

    const date = dayKey(record.date);
    const dayReadings = readingsByDay.get(date) ?? [];
    const sites = [...new Set(dayReadings.map((r) => r.site))];
    if (sites.length === 0 || sites.includes(record.site)) continue;

    const otherSite = sites[0];
    const sensorCount = new Set(
      dayReadings
        .filter((r) => r.site === otherSite)
        .map((r) => r.sensorName.toUpperCase()),
    ).size;

    alerts.push({
      date,
      employee: record.employeeName,
      issue: 'Location Mismatch',
      severity: 'MEDIUM',
      details: `Timesheet: ${record.site}, Sensors worked: ${otherSite} (${sensorCount} sensors)`,
      site: record.site,
    });
  }
  return alerts;
}

/**
 * Half a day or more of maintenance at a site that reported no vacuum that
 * day. Nothing is flagged when no vacuum data is loaded at all.
 */
export function detectZeroImpact(
  personnel: readonly PersonnelRecord[],
  vacuum: readonly VacuumReading[],
): DataQualityAlert[] {
  if (vacuum.length === 0) return [];
  const { zeroImpactMinHours, zeroImpactMediumHours } = DASHBOARD_CONFIG.quality;
  const reported = new Set(vacuum.map((r) => `${dayKey(r.timestamp)}|${r.site}`));

  return personnel
    .filter(
      (r) =>
        isMaintenanceWork(r) &&
        r.hours >= zeroImpactMinHours &&
        !reported.has(`${dayKey(r.date)}|${r.site}`),
    )
    .map((record): DataQualityAlert => ({
      date: dayKey(record.date),
      employee: record.employeeName,
      issue: 'Zero Impact',
      severity: record.hours >= zeroImpactMediumHours ? 'MEDIUM' : 'LOW',
      details: `${record.hours} hours logged, no vacuum data found for ${record.site}`,
      site: record.site,
    }));
}

/**
 * Every data-quality check, most severe first.
 */
export function dataQualityAlerts(
  personnel: readonly PersonnelRecord[],
  vacuum: readonly VacuumReading[],
): DataQualityAlert[] {
  const alerts = [
    ...detectRepairsNeeded(personnel),
    ...detectExcessiveHours(personnel),
    ...detectRapidDrops(vacuum),
    ...detectLocationMismatches(personnel, vacuum),
    ...detectZeroImpact(personnel, vacuum),
  ];
  return alerts.sort((a, b) => SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity]);
}
