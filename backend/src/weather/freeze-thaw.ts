import { DASHBOARD_CONFIG } from '../config/dashboard.config';
import { addDays, dayKey } from '../common/date-utils';
import { mean, round } from '../common/number-utils';
import { VacuumReading } from '../sources/dto/vacuum-reading.dto';
import { groupBy, measuredReadings } from '../metrics/metric-utils';
import { DailyWeather } from './weather.client';

export type FreezeThawLabel = 'CRITICAL' | 'UPCOMING' | 'LOW PRIORITY' | 'UNKNOWN';
export type SapFlowCategory = 'Excellent' | 'Good' | 'Fair' | 'Poor';
export type FreezeDropStatus = 'LIKELY LEAK' | 'WATCH' | 'OK';

export interface SapFlowLikelihood {
  score: number;
  category: SapFlowCategory;
}

export interface FreezeThawStatus {
  status: FreezeThawLabel;
  description: string;
  isFreezeThaw: boolean;
  tomorrowFreezeThaw: boolean;
  today: DailyWeather | null;
  tomorrow: DailyWeather | null;
  sapFlow: SapFlowLikelihood | null;
}

export interface FreezeDrop {
  sensorName: string;
  averageDrop: number;
  freezeDaysWithDrop: number;
  totalFreezeDays: number;
  dropRate: number;
  latestVacuum: number;
  status: FreezeDropStatus;
}

const { freezingF, dropThreshold, likelyLeakRate, watchRate } = DASHBOARD_CONFIG.freezeThaw;

/** Below freezing overnight and above it during the day */
export function isFreezeThawDay(day: Pick<DailyWeather, 'high' | 'low'>): boolean {
  return day.low < freezingF && day.high > freezingF;
}

/**
 * Likelihood (0-100) that sap runs on a day.
 */
export function sapFlowLikelihood(day: DailyWeather): SapFlowLikelihood {
  let score = isFreezeThawDay(day) ? 40 : 0;

  const swing = day.high - day.low;
  if (swing >= 15 && swing <= 25) score += 30;

  // nights near 25°F and days near 45°F run best
  const lowScore = Math.max(0, 20 - Math.abs(day.low - 25) * 2);
  const highScore = Math.max(0, 20 - Math.abs(day.high - 45) * 2);
  score += (lowScore + highScore) / 2;

  if (day.precipitation >= 0.5) score -= 10;
  score = Math.min(100, Math.max(0, score));

  let category: SapFlowCategory = 'Poor';
  if (score >= 70) category = 'Excellent';
  else if (score >= 50) category = 'Good';
  else if (score >= 30) category = 'Fair';

  return { score: round(score, 1), category };
}

const fahrenheit = (value: number) => `${value.toFixed(0)}°F`;

/**
 * Monitoring priority from today's and tomorrow's forecast.
 */
export function freezeThawStatus(
  today: DailyWeather | null,
  tomorrow: DailyWeather | null,
): FreezeThawStatus {
  if (!today) {
    return {
      status: 'UNKNOWN',
      description: 'Weather data unavailable',
      isFreezeThaw: false,
      tomorrowFreezeThaw: false,
      today: null,
      tomorrow,
      sapFlow: null,
    };
  }

  const isFreezeThaw = isFreezeThawDay(today);
  const tomorrowFreezeThaw = tomorrow !== null && isFreezeThawDay(tomorrow);
  const base = { isFreezeThaw, tomorrowFreezeThaw, today, tomorrow, sapFlow: sapFlowLikelihood(today) };

  if (isFreezeThaw) {
    return {
      ...base,
      status: 'CRITICAL',
      description:
        `Freeze/thaw transition: low ${fahrenheit(today.low)}, high ${fahrenheit(today.high)}. ` +
        'Vacuum drops today point to open or leaking lines.',
    };
  }
  if (tomorrow && tomorrowFreezeThaw) {
    return {
      ...base,
      status: 'UPCOMING',
      description:
        `Freeze/thaw expected tomorrow: low ${fahrenheit(tomorrow.low)}, high ${fahrenheit(tomorrow.high)}.`,
    };
  }
  return {
    ...base,
    status: 'LOW PRIORITY',
    description:
      `No freeze/thaw cycle today or tomorrow. Today: low ${fahrenheit(today.low)}, high ${fahrenheit(today.high)}.`,
  };
}

/**
 * Sensors whose daily mean vacuum fell on freeze/thaw days.
 *
 * Each freeze/thaw day a sensor reported is compared with its mean the day
 * before; a fall of at least `threshold` inches counts as a drop. Sensors are
 * ordered by the share of freeze/thaw days with a drop.
 */
export function freezeEventDrops(
  readings: readonly VacuumReading[],
  weather: readonly DailyWeather[],
  threshold: number = dropThreshold,
): FreezeDrop[] {
  const freezeDays = new Set(weather.filter(isFreezeThawDay).map((d) => d.date));
  if (freezeDays.size === 0) return [];

  const results: FreezeDrop[] = [];
  const bySensor = groupBy(measuredReadings(readings), (r) => r.sensorName.toUpperCase());

  for (const [sensorName, sensorReadings] of bySensor) {
    const dailyMeans = new Map<string, number>();
    for (const [day, group] of groupBy(sensorReadings, (r) => dayKey(r.timestamp))) {
      dailyMeans.set(day, mean(group.map((r) => r.vacuumInches)) ?? 0);
    }
    if (dailyMeans.size < 2) continue;

    const days = [...dailyMeans.keys()].sort();
    const drops: number[] = [];
    let checked = 0;
    for (const day of days) {
      if (!freezeDays.has(day)) continue;
      checked++;
      const prior = dailyMeans.get(dayKey(addDays(new Date(`${day}T00:00:00.000Z`), -1)));
      const current = dailyMeans.get(day);
      if (prior === undefined || current === undefined) continue;
      if (prior - current >= threshold) drops.push(prior - current);
    }
    if (checked === 0) continue;

    const dropRate = drops.length / checked;
    let status: FreezeDropStatus = 'OK';
    if (dropRate >= likelyLeakRate) status = 'LIKELY LEAK';
    else if (dropRate >= watchRate) status = 'WATCH';

    results.push({
      sensorName,
      averageDrop: round(mean(drops) ?? 0, 1),
      freezeDaysWithDrop: drops.length,
      totalFreezeDays: checked,
      dropRate: round(dropRate),
      latestVacuum: round(dailyMeans.get(days[days.length - 1]) ?? 0, 1),
      status,
    });
  }

  return results.sort((a, b) => b.dropRate - a.dropRate);
}
