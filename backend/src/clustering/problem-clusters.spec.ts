import { findProblemClusters, mapBounds, sensorPositions } from './problem-clusters';
import { makeReading } from '../../test/utils/mock-data';

function at(sensorName: string, latitude: number | null, longitude: number | null, vacuumInches: number) {
  return makeReading({ sensorName, latitude, longitude, vacuumInches });
}

const OPTIONS = { radiusMeters: 500, minSensors: 2, threshold: 15 };

describe('problem clusters', () => {
  const neighbourhood = [
    at('RHAS13', 43.4267, -73.7123, 10),
    at('RHAS13', 43.4267, -73.7123, 12),
    at('RHAS14', 43.4277, -73.7123, 13),
    at('MPC5', 43.4267, -73.711, 9),
    at('GCW1', 43.5, -73.7123, 8),
  ];

  describe('sensorPositions', () => {
    it('should skip sensors without plausible coordinates or maple names', () => {
      const positions = sensorPositions([
        ...neighbourhood,
        at('LH2', 0, 0, 8),
        at('FH3', null, -73.7, 8),
        at('SW4', 50, -73.7, 8),
        at('REL1', 43.4267, -73.7123, 5),
        at('bRH1', 43.4267, -73.7123, 5),
      ]);

      expect(positions.map((p) => [p.sensorName, p.averageVacuum, p.readingCount])).toEqual([
        ['RHAS13', 11, 2],
        ['RHAS14', 13, 1],
        ['MPC5', 9, 1],
        ['GCW1', 8, 1],
      ]);
    });

    it('should place a sensor at its latest known position', () => {
      const [position] = sensorPositions([
        makeReading({ latitude: 43.1, longitude: -73.1, timestamp: '2025-03-02T08:00:00Z' }),
        makeReading({ latitude: 43.2, longitude: -73.2, timestamp: '2025-03-01T08:00:00Z' }),
        makeReading({ latitude: null, longitude: null, timestamp: '2025-03-03T08:00:00Z' }),
      ]);

      expect(position.latitude).toBe(43.1);
      expect(position.longitude).toBe(-73.1);
      expect(position.readingCount).toBe(3);
    });
  });

  describe('findProblemClusters', () => {
    it('should cluster nearby problem sensors and report the rest as noise', () => {
      const report = findProblemClusters(
        [...neighbourhood, at('DM7', 43.4268, -73.7122, 18)],
        OPTIONS,
      );

      expect(report.clusters).toHaveLength(1);
      const [cluster] = report.clusters;
      expect(cluster.clusterId).toBe(1);
      expect(cluster.sensors).toEqual(['RHAS13', 'RHAS14', 'MPC5']);
      expect(cluster.sensorCount).toBe(3);
      expect(cluster.averageVacuum).toBe(11);
      expect(cluster.minVacuum).toBe(9);
      expect(cluster.maxVacuum).toBe(13);
      expect(cluster.center.latitude).toBeCloseTo(43.42703, 5);
      expect(cluster.center.longitude).toBeCloseTo(-73.71187, 5);
      expect(cluster.spreadMeters).toBeGreaterThan(150);
      expect(cluster.spreadMeters).toBeLessThan(156);

      expect(report.noise.map((n) => n.sensorName)).toEqual(['GCW1']);
      expect(report.parameters).toEqual(OPTIONS);
    });

    it('should number clusters worst first', () => {
      const report = findProblemClusters(
        [
          ...neighbourhood.slice(0, 4),
          at('DMA1', 43.5, -73.7123, 5),
          at('DMA2', 43.5005, -73.7123, 7),
          at('DMA3', 43.5, -73.7115, 6),
        ],
        OPTIONS,
      );

      expect(report.clusters.map((c) => [c.clusterId, c.averageVacuum, c.sensors])).toEqual([
        [1, 6, ['DMA1', 'DMA2', 'DMA3']],
        [2, 11, ['RHAS13', 'RHAS14', 'MPC5']],
      ]);
      expect(report.noise).toEqual([]);
    });

    it('should report everything as noise when clusters need more sensors', () => {
      const report = findProblemClusters(neighbourhood, { ...OPTIONS, minSensors: 5 });

      expect(report.clusters).toEqual([]);
      expect(report.noise).toHaveLength(4);
    });

    it('should return an empty report without problem sensors', () => {
      const report = findProblemClusters([at('RHAS13', 43.4267, -73.7123, 20)], OPTIONS);

      expect(report).toEqual({ parameters: OPTIONS, clusters: [], noise: [], bounds: null });
    });
  });

  describe('mapBounds', () => {
    it('should pad the extent by a tenth of each span', () => {
      const bounds = mapBounds([
        { latitude: 43.4, longitude: -73.8 },
        { latitude: 43.5, longitude: -73.6 },
      ]);

      expect(bounds?.minLatitude).toBeCloseTo(43.39, 6);
      expect(bounds?.maxLatitude).toBeCloseTo(43.51, 6);
      expect(bounds?.minLongitude).toBeCloseTo(-73.82, 6);
      expect(bounds?.maxLongitude).toBeCloseTo(-73.58, 6);
    });

    it('should pad a single point by a fixed amount', () => {
      const bounds = mapBounds([{ latitude: 43.4, longitude: -73.8 }]);

      expect(bounds?.minLatitude).toBeCloseTo(43.39, 6);
      expect(bounds?.maxLongitude).toBeCloseTo(-73.79, 6);
    });

    it('should return null without positions', () => {
      expect(mapBounds([])).toBeNull();
    });
  });
});
