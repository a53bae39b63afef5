import { DASHBOARD_CONFIG } from '../config/dashboard.config';
import { dayKey, startOfWeek } from '../common/date-utils';
import { round, sum } from '../common/number-utils';
import { PersonnelRecord } from '../sources/dto/personnel-record.dto';
import { groupBy } from './metric-utils';

export interface WeeklyHours {
  employeeName: string;
  /** Monday of the week, YYYY-MM-DD */
  weekStart: string;
  hours: number;
  overtime: boolean;
  overtimeHours: number;
}

/**
 * Hours per employee per Monday-to-Sunday week.
 * A week is overtime only when its hours are strictly above the threshold.
 */
export function weeklyHours(
  records: readonly PersonnelRecord[],
  threshold: number = DASHBOARD_CONFIG.personnel.overtimeWeeklyHours,
): WeeklyHours[] {
  const groups = groupBy(
    records,
    (r) => `${r.employeeName}\u0000${dayKey(startOfWeek(r.date))}`,
  );

  const weeks: WeeklyHours[] = [];
  for (const group of groups.values()) {
    const hours = round(sum(group.map((r) => r.hours)));
    weeks.push({
      employeeName: group[0].employeeName,
      weekStart: dayKey(startOfWeek(group[0].date)),
      hours,
      overtime: hours > threshold,
      overtimeHours: hours > threshold ? round(hours - threshold) : 0,
    });
  }

  return weeks.sort(
    (a, b) =>
      a.weekStart.localeCompare(b.weekStart) ||
      a.employeeName.localeCompare(b.employeeName),
  );
}

export function overtimeWeeks(
  records: readonly PersonnelRecord[],
  threshold?: number,
): WeeklyHours[] {
  return weeklyHours(records, threshold).filter((week) => week.overtime);
}
