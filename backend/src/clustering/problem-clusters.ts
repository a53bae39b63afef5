import { clustersDbscan } from '@turf/clusters-dbscan';
import { distance } from '@turf/distance';
import { featureCollection, point } from '@turf/helpers';
import { DASHBOARD_CONFIG } from '../config/dashboard.config';
import { mean, round } from '../common/number-utils';
import { isMapleSensor } from '../classifiers/sensor.classifier';
import { VacuumReading } from '../sources/dto/vacuum-reading.dto';
import { VacuumStatus, vacuumStatus } from '../metrics/vacuum-status';

export interface ClusterOptions {
  /** Neighbourhood radius in meters */
  radiusMeters: number;
  minSensors: number;
  /** Sensors averaging below this many inches are problem sensors */
  threshold: number;
}

export interface SensorPosition {
  sensorName: string;
  site: string;
  latitude: number;
  longitude: number;
  averageVacuum: number;
  readingCount: number;
  status: VacuumStatus;
}

export interface ProblemCluster {
  clusterId: number;
  sensorCount: number;
  sensors: string[];
  averageVacuum: number;
  minVacuum: number;
  maxVacuum: number;
  center: { latitude: number; longitude: number };
  /** Largest distance between two members, meters */
  spreadMeters: number;
  members: SensorPosition[];
}

export interface MapBounds {
  minLatitude: number;
  maxLatitude: number;
  minLongitude: number;
  maxLongitude: number;
}

export interface ClusterReport {
  parameters: ClusterOptions;
  clusters: ProblemCluster[];
  /** Problem sensors with no cluster */
  noise: SensorPosition[];
  /** Extent of every problem sensor, padded; null when there are none */
  bounds: MapBounds | null;
}

type Coordinates = Pick<SensorPosition, 'latitude' | 'longitude'>;

function isPlausible(latitude: number, longitude: number): boolean {
  const box = DASHBOARD_CONFIG.coordinateBounds;
  if (latitude === 0 && longitude === 0) return false;
  return (
    latitude >= box.minLatitude &&
    latitude <= box.maxLatitude &&
    longitude >= box.minLongitude &&
    longitude <= box.maxLongitude
  );
}

interface SensorAccumulator {
  first: VacuumReading;
  /** Latest reading with plausible coordinates */
  latest: VacuumReading | null;
  values: number[];
}

/**
 * Mean vacuum and last known position of every maple sensor that reported
 * plausible coordinates. Positions come from the sensor's latest reading
 * that carries them.
 */
export function sensorPositions(readings: readonly VacuumReading[]): SensorPosition[] {
  const bySensor = new Map<string, SensorAccumulator>();

  for (const reading of readings) {
    if (!isMapleSensor(reading.sensorName)) continue;
    const key = reading.sensorName.toUpperCase();
    const entry = bySensor.get(key) ?? { first: reading, latest: null, values: [] };
    bySensor.set(key, entry);

    if (reading.vacuumInches !== null) {
      entry.values.push(reading.vacuumInches);
    }
    const { latitude, longitude } = reading;
    if (
      latitude !== null &&
      longitude !== null &&
      isPlausible(latitude, longitude) &&
      (!entry.latest || reading.timestamp >= entry.latest.timestamp)
    ) {
      entry.latest = reading;
    }
  }

  const positions: SensorPosition[] = [];
  for (const { latest, values, first } of bySensor.values()) {
    const average = mean(values);
    if (!latest || latest.latitude === null || latest.longitude === null || average === null) {
      continue;
    }
    positions.push({
      sensorName: first.sensorName,
      site: latest.site,
      latitude: latest.latitude,
      longitude: latest.longitude,
      averageVacuum: round(average),
      readingCount: values.length,
      status: vacuumStatus(average),
    });
  }
  return positions;
}

function distanceMeters(a: Coordinates, b: Coordinates): number {
  return distance(point([a.longitude, a.latitude]), point([b.longitude, b.latitude]), {
    units: 'meters',
  });
}

function spreadOf(members: readonly SensorPosition[]): number {
  let spread = 0;
  for (let i = 0; i < members.length; i++) {
    for (let j = i + 1; j < members.length; j++) {
      spread = Math.max(spread, distanceMeters(members[i], members[j]));
    }
  }
  return round(spread, 1);
}

function summarizeCluster(members: SensorPosition[]): ProblemCluster {
  const values = members.map((m) => m.averageVacuum);
  return {
    clusterId: 0,
    sensorCount: members.length,
    sensors: members.map((m) => m.sensorName),
    averageVacuum: round(mean(values) ?? 0),
    minVacuum: Math.min(...values),
    maxVacuum: Math.max(...values),
    center: {
      latitude: mean(members.map((m) => m.latitude)) ?? 0,
      longitude: mean(members.map((m) => m.longitude)) ?? 0,
    },
    spreadMeters: spreadOf(members),
    members,
  };
}

/**
 * Extent of the given positions, padded by a fraction of each span.
 * A zero span is padded by a fixed number of degrees instead.
 */
export function mapBounds(positions: readonly Coordinates[]): MapBounds | null {
  if (positions.length === 0) return null;
  const { boundsPadding, degenerateBoundsPadding } = DASHBOARD_CONFIG.clustering;

  const latitudes = positions.map((p) => p.latitude);
  const longitudes = positions.map((p) => p.longitude);
  const pad = (min: number, max: number): [number, number] => {
    const span = max - min;
    const padding = span > 0 ? span * boundsPadding : degenerateBoundsPadding;
    return [min - padding, max + padding];
  };

  const [minLatitude, maxLatitude] = pad(Math.min(...latitudes), Math.max(...latitudes));
  const [minLongitude, maxLongitude] = pad(Math.min(...longitudes), Math.max(...longitudes));
  return { minLatitude, maxLatitude, minLongitude, maxLongitude };
}

/**
 * Group nearby problem sensors with DBSCAN over great-circle distance.
 *
 * Problem sensors that fall in no cluster are returned as noise. Clusters
 * are ordered by mean vacuum, worst first, and numbered from 1 in that order.
 */
export function findProblemClusters(
  readings: readonly VacuumReading[],
  options: ClusterOptions,
): ClusterReport {
  const problems = sensorPositions(readings).filter(
    (p) => p.averageVacuum < options.threshold,
  );
  const report: ClusterReport = {
    parameters: options,
    clusters: [],
    noise: [],
    bounds: mapBounds(problems),
  };
  if (problems.length === 0) return report;

  const clustered = clustersDbscan(
    featureCollection(problems.map((p) => point([p.longitude, p.latitude]))),
    options.radiusMeters,
    { units: 'meters', minPoints: options.minSensors },
  );

  const members = new Map<number, SensorPosition[]>();
  clustered.features.forEach((feature, index) => {
    const sensor = problems[index];
    const clusterId = feature.properties?.cluster;
    if (clusterId === undefined || feature.properties?.dbscan === 'noise') {
      report.noise.push(sensor);
      return;
    }
    members.set(clusterId, [...(members.get(clusterId) ?? []), sensor]);
  });

  report.clusters = [...members.values()]
    .map(summarizeCluster)
    .sort((a, b) => a.averageVacuum - b.averageVacuum)
    .map((cluster, index) => ({ ...cluster, clusterId: index + 1 }));
  return report;
}
