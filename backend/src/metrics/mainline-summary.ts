import { DASHBOARD_CONFIG } from '../config/dashboard.config';
import { mean, round, sum } from '../common/number-utils';
import { PersonnelRecord } from '../sources/dto/personnel-record.dto';
import { VacuumReading } from '../sources/dto/vacuum-reading.dto';
import {
  groupBy,
  hasRepairNote,
  measuredReadings,
  readingsBySensor,
  uniqueCount,
} from './metric-utils';
import { VacuumStatus, vacuumStatus } from './vacuum-status';

export interface MainlineSummary {
  mainline: string;
  site: string;
  averageVacuum: number;
  minVacuum: number;
  maxVacuum: number;
  readingCount: number;
  lastReading: Date;
  totalHours: number;
  employeeCount: number;
  tapsPutIn: number;
  tapsRemoved: number;
  repairs: number;
  lastActivity: Date | null;
  status: VacuumStatus;
  /** Below Fair, or nobody has worked the line */
  needsAttention: boolean;
}

/**
 * Per-sensor vacuum statistics joined with the work logged on the same
 * mainline. Sorted by average vacuum, worst first.
 */
export function mainlineSummary(
  vacuum: readonly VacuumReading[],
  personnel: readonly PersonnelRecord[],
): MainlineSummary[] {
  const work = groupBy(
    personnel.filter((r) => r.mainline !== ''),
    (r) => r.mainline,
  );

  const summaries: MainlineSummary[] = [];
  for (const [mainline, readings] of readingsBySensor(measuredReadings(vacuum))) {
    const values = readings.map((r) => r.vacuumInches);
    const latest = readings[readings.length - 1];
    const average = mean(values) ?? 0;
    const records = work.get(mainline) ?? [];
    const employeeCount = uniqueCount(records.map((r) => r.employeeName));

    let lastActivity: Date | null = null;
    for (const record of records) {
      if (!lastActivity || record.date > lastActivity) {
        lastActivity = record.date;
      }
    }

    summaries.push({
      mainline,
      site: latest.site,
      averageVacuum: round(average),
      minVacuum: Math.min(...values),
      maxVacuum: Math.max(...values),
      readingCount: values.length,
      lastReading: latest.timestamp,
      totalHours: round(sum(records.map((r) => r.hours))),
      employeeCount,
      tapsPutIn: sum(records.map((r) => r.tapsPutIn)),
      tapsRemoved: sum(records.map((r) => r.tapsRemoved)),
      repairs: records.filter(hasRepairNote).length,
      lastActivity,
      status: vacuumStatus(average),
      needsAttention: average < DASHBOARD_CONFIG.vacuum.fair || employeeCount === 0,
    });
  }

  return summaries.sort(
    (a, b) => a.averageVacuum - b.averageVacuum || a.mainline.localeCompare(b.mainline),
  );
}
