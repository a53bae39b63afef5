import { DASHBOARD_CONFIG } from '../config/dashboard.config';
import { addDays, addHours } from '../common/date-utils';
import { mean, round } from '../common/number-utils';
import { VacuumReading } from '../sources/dto/vacuum-reading.dto';
import { MeasuredReading, measuredReadings, readingsBySensor } from './metric-utils';

export type LeakType = 'Sudden Leak' | 'Gradual Degradation';
export type LeakSeverity = 'Critical' | 'High' | 'Medium';

export interface LeakAlert {
  sensorName: string;
  type: LeakType;
  currentVacuum: number;
  /** Recent maximum for sudden leaks, early-period mean for degradation */
  previousVacuum: number;
  drop: number;
  /** Window the drop was measured over, e.g. '6h' or '7d' */
  timePeriod: string;
  severity: LeakSeverity;
  detectedAt: Date;
  /** 1 for sudden leaks, 2 for degradation */
  priority: 1 | 2;
}

export type LeakOptions = typeof DASHBOARD_CONFIG.leaks;

function since(readings: readonly MeasuredReading[], cutoff: Date): MeasuredReading[] {
  return readings.filter((r) => r.timestamp.getTime() >= cutoff.getTime());
}

function suddenLeak(
  sensorName: string,
  latest: MeasuredReading,
  readings: readonly MeasuredReading[],
  options: LeakOptions,
): LeakAlert | null {
  const recent = since(readings, addHours(latest.timestamp, -options.suddenWindowHours));
  if (recent.length < 2) return null;

  const peak = Math.max(...recent.map((r) => r.vacuumInches));
  const drop = peak - latest.vacuumInches;
  if (drop < options.suddenDrop) return null;

  return {
    sensorName,
    type: 'Sudden Leak',
    currentVacuum: latest.vacuumInches,
    previousVacuum: peak,
    drop: round(drop),
    timePeriod: `${options.suddenWindowHours}h`,
    severity: drop > options.suddenCriticalDrop ? 'Critical' : 'High',
    detectedAt: latest.timestamp,
    priority: 1,
  };
}

function gradualDegradation(
  sensorName: string,
  latest: MeasuredReading,
  readings: readonly MeasuredReading[],
  options: LeakOptions,
): LeakAlert | null {
  const window = since(readings, addDays(latest.timestamp, -options.gradualWindowDays));
  if (window.length < options.gradualMinReadings) return null;

  const early = window.slice(0, Math.floor(window.length / 4));
  const earlyMean = mean(early.map((r) => r.vacuumInches));
  if (earlyMean === null) return null;

  const drop = earlyMean - latest.vacuumInches;
  if (drop < options.gradualDrop) return null;

  return {
    sensorName,
    type: 'Gradual Degradation',
    currentVacuum: latest.vacuumInches,
    previousVacuum: round(earlyMean),
    drop: round(drop),
    timePeriod: `${options.gradualWindowDays}d`,
    severity: drop < options.gradualHighDrop ? 'Medium' : 'High',
    detectedAt: latest.timestamp,
    priority: 2,
  };
}

/**
 * Flag sensors whose latest reading fell sharply within the last few hours,
 * or drifted down over the last week. A sensor flagged as a sudden leak is
 * not also reported as degrading.
 *
 * Sorted by priority, then largest drop first.
 */
export function detectLeaks(
  vacuum: readonly VacuumReading[],
  options: LeakOptions = DASHBOARD_CONFIG.leaks,
): LeakAlert[] {
  const alerts: LeakAlert[] = [];

  for (const [sensorName, readings] of readingsBySensor(measuredReadings(vacuum))) {
    if (readings.length < 2) continue;
    const latest = readings[readings.length - 1];

    const alert =
      suddenLeak(sensorName, latest, readings, options) ??
      gradualDegradation(sensorName, latest, readings, options);
    if (alert) alerts.push(alert);
  }

  return alerts.sort((a, b) => a.priority - b.priority || b.drop - a.drop);
}
