import { DASHBOARD_CONFIG } from '../config/dashboard.config';
import { classifySensorName } from '../classifiers/sensor.classifier';
import {
  extractConductorSystem,
  sugarbushFor,
} from '../classifiers/conductor.classifier';
import { VacuumReading } from '../sources/dto/vacuum-reading.dto';
import { measuredReadings, readingsBySensor } from './metric-utils';

export type VacuumStatus = 'Excellent' | 'Fair' | 'Poor' | 'Critical';

export interface VacuumThresholds {
  excellent: number;
  fair: number;
  critical: number;
}

/**
 * Status band for a reading in inches of mercury.
 * Excellent >= 20, Fair >= 15, Poor >= 12, Critical below.
 */
export function vacuumStatus(
  inches: number,
  thresholds: VacuumThresholds = DASHBOARD_CONFIG.vacuum,
): VacuumStatus {
  if (inches >= thresholds.excellent) return 'Excellent';
  if (inches >= thresholds.fair) return 'Fair';
  if (inches >= thresholds.critical) return 'Poor';
  return 'Critical';
}

export function statusColor(status: VacuumStatus): string {
  return DASHBOARD_CONFIG.statusColors[status];
}

export interface SensorStatus {
  sensorName: string;
  site: string;
  conductor: string;
  sugarbush: string;
  vacuumInches: number;
  timestamp: Date;
  status: VacuumStatus;
  color: string;
}

/**
 * Latest reading of every valid maple sensor, worst first.
 * Birch, relay and inactive sensors and readings without a value are left out.
 */
export function latestSensorStatus(
  readings: readonly VacuumReading[],
): SensorStatus[] {
  const maple = measuredReadings(readings).filter(
    (r) => classifySensorName(r.sensorName).kind === 'valid',
  );

  const statuses: SensorStatus[] = [];
  for (const sensorReadings of readingsBySensor(maple).values()) {
    const latest = sensorReadings[sensorReadings.length - 1];
    const status = vacuumStatus(latest.vacuumInches);
    statuses.push({
      sensorName: latest.sensorName,
      site: latest.site,
      conductor: extractConductorSystem(latest.sensorName),
      sugarbush: sugarbushFor(latest.sensorName),
      vacuumInches: latest.vacuumInches,
      timestamp: latest.timestamp,
      status,
      color: statusColor(status),
    });
  }

  return statuses.sort(
    (a, b) =>
      a.vacuumInches - b.vacuumInches || a.sensorName.localeCompare(b.sensorName),
  );
}
