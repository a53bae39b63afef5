import { dayKey } from '../common/date-utils';
import { round, sum } from '../common/number-utils';
import { isTappingJob } from '../classifiers/job-code.classifier';
import { PersonnelRecord } from '../sources/dto/personnel-record.dto';
import { groupBy, uniqueCount } from './metric-utils';

export const HOURS_GROUPINGS = ['employee', 'day', 'site'] as const;
export type HoursGrouping = (typeof HOURS_GROUPINGS)[number];

export interface HoursGroup {
  key: string;
  hours: number;
  entries: number;
  tapsPutIn: number;
  tapsRemoved: number;
}

const KEY_OF: Record<HoursGrouping, (record: PersonnelRecord) => string> = {
  employee: (record) => record.employeeName,
  day: (record) => dayKey(record.date),
  site: (record) => record.site,
};

/**
 * Hours, entries and taps summed per employee, day or site.
 * Days come back in calendar order; employees and sites by hours, most first.
 */
export function groupHours(
  records: readonly PersonnelRecord[],
  by: HoursGrouping,
): HoursGroup[] {
  const groups: HoursGroup[] = [];
  for (const [key, group] of groupBy(records, KEY_OF[by])) {
    groups.push({
      key,
      hours: round(sum(group.map((r) => r.hours))),
      entries: group.length,
      tapsPutIn: sum(group.map((r) => r.tapsPutIn)),
      tapsRemoved: sum(group.map((r) => r.tapsRemoved)),
    });
  }

  if (by === 'day') {
    return groups.sort((a, b) => a.key.localeCompare(b.key));
  }
  return groups.sort((a, b) => b.hours - a.hours || a.key.localeCompare(b.key));
}

export interface DailyTaps {
  date: string;
  taps: number;
  hours: number;
  tappers: number;
  tapsPerHour: number;
}

/**
 * Taps put in per day, counting only tapping job codes.
 */
export function tapsPerDay(records: readonly PersonnelRecord[]): DailyTaps[] {
  const tapping = records.filter((r) => isTappingJob(r.jobCode));

  const days: DailyTaps[] = [];
  for (const [date, group] of groupBy(tapping, (r) => dayKey(r.date))) {
    const taps = sum(group.map((r) => r.tapsPutIn));
    const hours = sum(group.map((r) => r.hours));
    days.push({
      date,
      taps,
      hours: round(hours),
      tappers: uniqueCount(group.map((r) => r.employeeName)),
      tapsPerHour: hours > 0 ? round(taps / hours, 1) : 0,
    });
  }
  return days.sort((a, b) => a.date.localeCompare(b.date));
}
