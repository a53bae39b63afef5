import { DASHBOARD_CONFIG } from '../config/dashboard.config';
import { dayKey } from '../common/date-utils';
import { mean, round, sum } from '../common/number-utils';
import { PersonnelRecord } from '../sources/dto/personnel-record.dto';
import { VacuumReading } from '../sources/dto/vacuum-reading.dto';
import {
  hasRepairNote,
  measuredReadings,
  readingsBySensor,
  uniqueCount,
} from './metric-utils';

export interface OverviewMetrics {
  /** Mean of every reading; null without readings */
  averageVacuum: number | null;
  /** Sensors reporting today */
  activeSensors: number;
  /** Sensors whose latest reading is below Fair */
  problemSensors: number;
  employeesToday: number;
  hoursToday: number;
  repairsToday: number;
}

export function overviewMetrics(
  vacuum: readonly VacuumReading[],
  personnel: readonly PersonnelRecord[],
  now: Date,
): OverviewMetrics {
  const today = dayKey(now);
  const readings = measuredReadings(vacuum);
  const average = mean(readings.map((r) => r.vacuumInches));

  let problemSensors = 0;
  for (const sensorReadings of readingsBySensor(readings).values()) {
    const latest = sensorReadings[sensorReadings.length - 1];
    if (latest.vacuumInches < DASHBOARD_CONFIG.vacuum.fair) {
      problemSensors++;
    }
  }

  const todaysWork = personnel.filter((r) => dayKey(r.date) === today);

  return {
    averageVacuum: average === null ? null : round(average),
    activeSensors: uniqueCount(
      readings
        .filter((r) => dayKey(r.timestamp) === today)
        .map((r) => r.sensorName.toUpperCase()),
    ),
    problemSensors,
    employeesToday: uniqueCount(todaysWork.map((r) => r.employeeName)),
    hoursToday: round(sum(todaysWork.map((r) => r.hours))),
    repairsToday: todaysWork.filter(hasRepairNote).length,
  };
}
