import { addDays, dayKey, startOfUtcDay } from '../common/date-utils';
import { mean, round } from '../common/number-utils';
import { VacuumReading } from '../sources/dto/vacuum-reading.dto';
import { groupBy, measuredReadings, uniqueCount } from './metric-utils';

export interface DailyTrend {
  date: string;
  averageVacuum: number;
  minVacuum: number;
  maxVacuum: number;
  activeSensors: number;
}

/**
 * Per-day vacuum statistics from `days` days before today onwards.
 */
export function dailyTrends(
  readings: readonly VacuumReading[],
  days: number,
  now: Date,
): DailyTrend[] {
  const cutoff = addDays(startOfUtcDay(now), -days);
  const recent = measuredReadings(readings).filter((r) => r.timestamp >= cutoff);

  const trends: DailyTrend[] = [];
  for (const [date, group] of groupBy(recent, (r) => dayKey(r.timestamp))) {
    const values = group.map((r) => r.vacuumInches);
    trends.push({
      date,
      averageVacuum: round(mean(values) ?? 0),
      minVacuum: Math.min(...values),
      maxVacuum: Math.max(...values),
      activeSensors: uniqueCount(group.map((r) => r.sensorName.toUpperCase())),
    });
  }
  return trends.sort((a, b) => a.date.localeCompare(b.date));
}
