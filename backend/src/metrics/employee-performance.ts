import { DASHBOARD_CONFIG } from '../config/dashboard.config';
import { round, sum } from '../common/number-utils';
import { PersonnelRecord } from '../sources/dto/personnel-record.dto';
import { groupBy, hasRepairNote, uniqueCount } from './metric-utils';

export interface EmployeePerformance {
  employeeName: string;
  employeeId: string;
  totalHours: number;
  mainlinesVisited: number;
  tapsPutIn: number;
  tapsRemoved: number;
  repairs: number;
  /** null when no mainline was recorded */
  hoursPerMainline: number | null;
  /** Mainlines visited per hour, scaled by the efficiency multiplier */
  efficiencyScore: number;
}

const { minHoursForRanking, efficiencyMultiplier, topPerformersCount } =
  DASHBOARD_CONFIG.personnel;

/**
 * Totals per employee with at least `minHours` logged, busiest first.
 */
export function employeePerformance(
  records: readonly PersonnelRecord[],
  minHours: number = minHoursForRanking,
): EmployeePerformance[] {
  const employees: EmployeePerformance[] = [];

  for (const [employeeName, group] of groupBy(records, (r) => r.employeeName)) {
    const totalHours = sum(group.map((r) => r.hours));
    if (totalHours < minHours) continue;

    const mainlinesVisited = uniqueCount(
      group.map((r) => r.mainline).filter((mainline) => mainline !== ''),
    );

    employees.push({
      employeeName,
      employeeId: group.find((r) => r.employeeId !== '')?.employeeId ?? '',
      totalHours: round(totalHours),
      mainlinesVisited,
      tapsPutIn: sum(group.map((r) => r.tapsPutIn)),
      tapsRemoved: sum(group.map((r) => r.tapsRemoved)),
      repairs: group.filter(hasRepairNote).length,
      hoursPerMainline:
        mainlinesVisited > 0 ? round(totalHours / mainlinesVisited, 1) : null,
      efficiencyScore:
        totalHours > 0
          ? round((mainlinesVisited / totalHours) * efficiencyMultiplier)
          : 0,
    });
  }

  return employees.sort(
    (a, b) => b.totalHours - a.totalHours || a.employeeName.localeCompare(b.employeeName),
  );
}

export function topPerformers(
  employees: readonly EmployeePerformance[],
  count: number = topPerformersCount,
): EmployeePerformance[] {
  return [...employees]
    .sort((a, b) => b.efficiencyScore - a.efficiencyScore)
    .slice(0, count);
}

/** Lowest efficiency first, for coaching */
export function bottomPerformers(
  employees: readonly EmployeePerformance[],
  count: number = topPerformersCount,
): EmployeePerformance[] {
  return [...employees]
    .sort((a, b) => a.efficiencyScore - b.efficiencyScore)
    .slice(0, count);
}
