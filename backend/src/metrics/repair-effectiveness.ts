import { DASHBOARD_CONFIG } from '../config/dashboard.config';
import { addDays, addHours, dayKey } from '../common/date-utils';
import { mean, round } from '../common/number-utils';
import { PersonnelRecord } from '../sources/dto/personnel-record.dto';
import { VacuumReading } from '../sources/dto/vacuum-reading.dto';
import { MeasuredReading, groupBy, measuredReadings, readingsBySensor } from './metric-utils';

export type MatchMethod = 'clock' | 'daily';

export interface RepairEffect {
  employeeName: string;
  date: string;
  mainline: string;
  jobCode: string;
  hours: number;
  vacuumBefore: number;
  vacuumAfter: number;
  /** after - before; positive means vacuum went up */
  improvement: number;
  beforeMethod: MatchMethod;
  afterMethod: MatchMethod;
  success: boolean;
}

export interface EffectivenessStats {
  totalWorkSessions: number;
  matched: number;
  noMatch: number;
  noBefore: number;
  noAfter: number;
  personnelMainlines: number;
  vacuumMainlines: number;
  matchingMainlines: number;
}

export interface EffectivenessReport {
  results: RepairEffect[];
  stats: EffectivenessStats;
}

export interface EffectivenessOptions {
  toleranceMinutes: number;
  afterClockOutHours: number;
  fallbackDays: number;
  /** Readings at or below this are sensor dropouts */
  validReadingFloor: number;
}

const DEFAULT_OPTIONS: EffectivenessOptions = {
  ...DASHBOARD_CONFIG.effectiveness,
  validReadingFloor: DASHBOARD_CONFIG.vacuum.validReadingFloor,
};

interface MainlineReadings {
  readings: MeasuredReading[];
  dailyMeans: Map<string, number>;
}

function indexMainline(readings: MeasuredReading[]): MainlineReadings {
  const dailyMeans = new Map<string, number>();
  for (const [day, group] of groupBy(readings, (r) => dayKey(r.timestamp))) {
    dailyMeans.set(day, mean(group.map((r) => r.vacuumInches)) ?? 0);
  }
  return { readings, dailyMeans };
}

/**
 * Value of the reading closest to `target`, if within the tolerance.
 * The earlier reading wins a tie.
 */
function closestReading(
  readings: readonly MeasuredReading[],
  target: Date,
  toleranceMs: number,
): number | null {
  let best: MeasuredReading | null = null;
  let bestDistance = Infinity;
  for (const reading of readings) {
    const distance = Math.abs(reading.timestamp.getTime() - target.getTime());
    if (distance < bestDistance) {
      best = reading;
      bestDistance = distance;
    }
  }
  return best && bestDistance <= toleranceMs ? best.vacuumInches : null;
}

/**
 * Mean of the first day, stepping 1..maxDays away from `day` in `direction`,
 * that has readings.
 */
function nearbyDailyMean(
  index: MainlineReadings,
  day: Date,
  direction: 1 | -1,
  maxDays: number,
): number | null {
  for (let step = 1; step <= maxDays; step++) {
    const value = index.dailyMeans.get(dayKey(addDays(day, direction * step)));
    if (value !== undefined) return value;
  }
  return null;
}

/**
 * Compare vacuum on a mainline before and after each work session on it.
 *
 * With clock-in and clock-out times the readings closest to clock-in and to
 * one hour after clock-out are used, each within the tolerance. Otherwise (or
 * when no reading is close enough) the daily mean of the day before the work
 * date is used, falling back to two days before; likewise after.
 *
 * Work without a mainline is not a session. A session counts as a success when
 * vacuum went up.
 */
export function repairEffectiveness(
  personnel: readonly PersonnelRecord[],
  vacuum: readonly VacuumReading[],
  options: EffectivenessOptions = DEFAULT_OPTIONS,
): EffectivenessReport {
  const valid = measuredReadings(vacuum).filter(
    (r) => r.vacuumInches > options.validReadingFloor,
  );
  const byMainline = new Map<string, MainlineReadings>();
  for (const [mainline, readings] of readingsBySensor(valid)) {
    byMainline.set(mainline, indexMainline(readings));
  }

  const sessions = personnel.filter((r) => r.mainline !== '');
  const personnelMainlines = new Set(sessions.map((r) => r.mainline));
  const toleranceMs = options.toleranceMinutes * 60 * 1000;

  const results: RepairEffect[] = [];
  let noMatch = 0;
  let noBefore = 0;
  let noAfter = 0;

  for (const work of sessions) {
    const index = byMainline.get(work.mainline);
    if (!index) {
      noMatch++;
      continue;
    }

    let before: number | null = null;
    let after: number | null = null;
    let beforeMethod: MatchMethod = 'daily';
    let afterMethod: MatchMethod = 'daily';

    if (work.clockIn && work.clockOut) {
      before = closestReading(index.readings, work.clockIn, toleranceMs);
      after = closestReading(
        index.readings,
        addHours(work.clockOut, options.afterClockOutHours),
        toleranceMs,
      );
      if (before !== null) beforeMethod = 'clock';
      if (after !== null) afterMethod = 'clock';
    }

    before ??= nearbyDailyMean(index, work.date, -1, options.fallbackDays);
    after ??= nearbyDailyMean(index, work.date, 1, options.fallbackDays);

    if (before === null) {
      noBefore++;
      continue;
    }
    if (after === null) {
      noAfter++;
      continue;
    }

    const improvement = after - before;
    results.push({
      employeeName: work.employeeName,
      date: dayKey(work.date),
      mainline: work.mainline,
      jobCode: work.jobCode,
      hours: work.hours,
      vacuumBefore: round(before),
      vacuumAfter: round(after),
      improvement: round(improvement),
      beforeMethod,
      afterMethod,
      success: improvement > 0,
    });
  }

  const vacuumMainlines = [...byMainline.keys()];
  return {
    results,
    stats: {
      totalWorkSessions: sessions.length,
      matched: results.length,
      noMatch,
      noBefore,
      noAfter,
      personnelMainlines: personnelMainlines.size,
      vacuumMainlines: vacuumMainlines.length,
      matchingMainlines: vacuumMainlines.filter((m) => personnelMainlines.has(m)).length,
    },
  };
}
