import {
  DASHBOARD_CONFIG,
  SensorExclusionReason,
} from '../config/dashboard.config';

export type SensorClassification =
  | { kind: 'valid'; prefix: string }
  | { kind: 'excluded'; reason: SensorExclusionReason; prefix: string }
  | { kind: 'unrecognized' };

/** 2-4 uppercase letters followed by a digit, e.g. RHAS13, MPC5 */
const SENSOR_PATTERN = /^([A-Z]{2,4})\d/;

/**
 * Classify a vacuum sensor name.
 *
 * - Names starting with a lowercase "b" are birch sensors.
 * - Names not shaped like a maple sensor are unrecognized.
 * - A maple-shaped name whose letter prefix is in the excluded table carries
 *   that table's reason (relay, inactive, birch).
 */
export function classifySensorName(
  name: string,
  excludedPrefixes: Readonly<
    Record<string, SensorExclusionReason>
  > = DASHBOARD_CONFIG.excludedSensorPrefixes,
): SensorClassification {
  const trimmed = name.trim();

  if (trimmed.startsWith('b')) {
    const lead = /^[A-Za-z]+/.exec(trimmed);
    return { kind: 'excluded', reason: 'birch', prefix: lead ? lead[0] : 'b' };
  }

  const match = SENSOR_PATTERN.exec(trimmed);
  if (!match) {
    return { kind: 'unrecognized' };
  }

  const prefix = match[1];
  const reason: SensorExclusionReason | undefined = Object.prototype.hasOwnProperty.call(
    excludedPrefixes,
    prefix,
  )
    ? excludedPrefixes[prefix]
    : undefined;

  if (reason) {
    return { kind: 'excluded', reason, prefix };
  }
  return { kind: 'valid', prefix };
}

export function isMapleSensor(name: string): boolean {
  return classifySensorName(name).kind === 'valid';
}
