import { Injectable, Logger } from '@nestjs/common';
import { getCurrentDate } from '../common/date-utils';
import {
  ApprovalCounts,
  ApprovalRow,
  countApprovals,
  prepareApprovalRows,
} from '../sources/approval-overlay';
import { DataLoaderService } from '../sources/data-loader.service';
import { DashboardSnapshot } from '../sources/dto/dashboard-snapshot.dto';
import { PersonnelRecord } from '../sources/dto/personnel-record.dto';
import { DailyTrend, dailyTrends } from './daily-trends';
import { DataQualityAlert, dataQualityAlerts } from './data-quality';
import {
  EmployeePerformance,
  bottomPerformers,
  employeePerformance,
  topPerformers,
} from './employee-performance';
import { LeakAlert, detectLeaks } from './leak-detection';
import { MainlineSummary, mainlineSummary } from './mainline-summary';
import {
  FieldRequirements,
  MetricResult,
  missingFields,
  ok,
  skipped,
} from './metric-result';
import { WeeklyHours, weeklyHours } from './overtime';
import { OverviewMetrics, overviewMetrics } from './overview';
import { DailyTaps, HoursGroup, HoursGrouping, groupHours, tapsPerDay } from './personnel-hours';
import { ProblemArea, problemAreas } from './problem-areas';
import { RepairCost, repairCosts } from './repair-costs';
import { EffectivenessReport, repairEffectiveness } from './repair-effectiveness';
import { RepairNoteEntry, repairNotes } from './repair-notes';
import { TapProgressReport, seasonFor, tapProgress } from './tap-progress';
import { SensorStatus, latestSensorStatus } from './vacuum-status';

const VACUUM_SERIES: FieldRequirements = {
  vacuum: ['sensor_name', 'vacuum_reading', 'timestamp'],
};
const TIMESHEET: FieldRequirements = { personnel: ['date', 'hours'] };

export interface PerformanceReport {
  employees: EmployeePerformance[];
  top: EmployeePerformance[];
  bottom: EmployeePerformance[];
}

export interface ApprovalsReport {
  counts: ApprovalCounts;
  records: PersonnelRecord[];
}

export interface OvertimeReport {
  weeks: WeeklyHours[];
  overtimeWeeks: number;
}

/**
 * MetricsService - runs the metric functions over the cached snapshot
 *
 * Every metric declares the logical columns it reads. When a loaded table
 * lacks one of them the metric is reported as skipped instead of computed.
 */
@Injectable()
export class MetricsService {
  private readonly logger = new Logger(MetricsService.name);

  constructor(private readonly dataLoader: DataLoaderService) {}

  private async run<T>(
    metric: string,
    requirements: FieldRequirements,
    compute: (snapshot: DashboardSnapshot, now: Date) => T,
  ): Promise<MetricResult<T>> {
    const snapshot = await this.dataLoader.getSnapshot();
    const missing = missingFields(snapshot, requirements);
    if (missing.length > 0) {
      this.logger.warn(`Skipping ${metric}: missing ${missing.join(', ')}`);
      return skipped(metric, missing);
    }
    return ok(compute(snapshot, getCurrentDate()));
  }

  vacuumStatus(): Promise<MetricResult<SensorStatus[]>> {
    return this.run('Vacuum status', VACUUM_SERIES, (s) => latestSensorStatus(s.vacuum));
  }

  dailyTrends(days: number): Promise<MetricResult<DailyTrend[]>> {
    return this.run('Daily trends', VACUUM_SERIES, (s, now) =>
      dailyTrends(s.vacuum, days, now),
    );
  }

  leaks(): Promise<MetricResult<LeakAlert[]>> {
    return this.run('Leak detection', VACUUM_SERIES, (s) => detectLeaks(s.vacuum));
  }

  overview(): Promise<MetricResult<OverviewMetrics>> {
    return this.run('Overview', {}, (s, now) => overviewMetrics(s.vacuum, s.personnel, now));
  }

  mainlines(): Promise<MetricResult<MainlineSummary[]>> {
    return this.run('Mainline summary', VACUUM_SERIES, (s) =>
      mainlineSummary(s.vacuum, s.personnel),
    );
  }

  problemAreas(): Promise<MetricResult<ProblemArea[]>> {
    return this.run('Problem areas', VACUUM_SERIES, (s, now) =>
      problemAreas(mainlineSummary(s.vacuum, s.personnel), now),
    );
  }

  hours(by: HoursGrouping): Promise<MetricResult<HoursGroup[]>> {
    return this.run('Hours', TIMESHEET, (s) => groupHours(s.personnel, by));
  }

  tapsPerDay(): Promise<MetricResult<DailyTaps[]>> {
    return this.run(
      'Taps per day',
      { personnel: ['date', 'job_code', 'taps_put_in'] },
      (s) => tapsPerDay(s.personnel),
    );
  }

  overtime(): Promise<MetricResult<OvertimeReport>> {
    return this.run('Overtime', TIMESHEET, (s) => {
      const weeks = weeklyHours(s.personnel);
      return { weeks, overtimeWeeks: weeks.filter((w) => w.overtime).length };
    });
  }

  performance(): Promise<MetricResult<PerformanceReport>> {
    return this.run(
      'Employee performance',
      { personnel: ['hours', 'mainline'] },
      (s) => {
        const employees = employeePerformance(s.personnel);
        return {
          employees,
          top: topPerformers(employees),
          bottom: bottomPerformers(employees),
        };
      },
    );
  }

  approvals(): Promise<MetricResult<ApprovalsReport>> {
    return this.run('Approvals', TIMESHEET, (s) => ({
      counts: countApprovals(s.personnel),
      records: s.personnel,
    }));
  }

  /**
   * Approvals-tab rows for the records with the given keys, or for every
   * record still pending when no keys are given.
   */
  prepareApprovals(
    approvedBy: string,
    keys?: readonly string[],
  ): Promise<MetricResult<ApprovalRow[]>> {
    return this.run('Approval rows', TIMESHEET, (s, now) => {
      const wanted = keys ? new Set(keys) : null;
      const records = s.personnel.filter((r) =>
        wanted ? wanted.has(r.key) : r.approval !== 'approved',
      );
      this.logger.log(`Prepared ${records.length} approval row(s) for ${approvedBy}`);
      return prepareApprovalRows(records, approvedBy, now);
    });
  }

  effectiveness(): Promise<MetricResult<EffectivenessReport>> {
    return this.run(
      'Repair effectiveness',
      { personnel: ['date', 'mainline'], vacuum: ['sensor_name', 'vacuum_reading', 'timestamp'] },
      (s) => repairEffectiveness(s.personnel, s.vacuum),
    );
  }

  repairNotes(): Promise<MetricResult<RepairNoteEntry[]>> {
    return this.run('Repair notes', { personnel: ['date', 'repairs_needed'] }, (s) =>
      repairNotes(s.personnel),
    );
  }

  repairCosts(): Promise<MetricResult<RepairCost[]>> {
    return this.run(
      'Repair costs',
      { personnel: ['date', 'hours', 'mainline', 'rate'], repairs: ['mainline', 'date_found'] },
      (s, now) => repairCosts(s.repairs, s.personnel, now),
    );
  }

  qualityAlerts(): Promise<MetricResult<DataQualityAlert[]>> {
    return this.run('Data-quality alerts', TIMESHEET, (s) =>
      dataQualityAlerts(s.personnel, s.vacuum),
    );
  }

  /**
   * @param season - Season year (the spring it ends in); defaults to the current one
   */
  tapProgress(season?: number): Promise<MetricResult<TapProgressReport>> {
    return this.run(
      'Tap progress',
      { personnel: ['date', 'mainline', 'taps_put_in'] },
      (s, now) => tapProgress(s.personnel, season ?? seasonFor(now)),
    );
  }
}
