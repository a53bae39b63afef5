import { detectLeaks } from './leak-detection';
import { makeReading } from '../../test/utils/mock-data';

/** Readings 12 hours apart from 2025-03-01T00:00Z */
function twiceDaily(sensorName: string, values: number[]) {
  return values.map((vacuumInches, i) =>
    makeReading({
      sensorName,
      vacuumInches,
      timestamp: new Date(Date.UTC(2025, 2, 1, i * 12)).toISOString(),
    }),
  );
}

const DEGRADING = [20, 20, 20, 18, 18, 18, 17, 17, 17, 16, 16, 16];

describe('detectLeaks', () => {
  it('should flag sudden drops before gradual degradation', () => {
    const vacuum = [
      ...twiceDaily('GCW1', DEGRADING),
      makeReading({ sensorName: 'RHAS13', vacuumInches: 20, timestamp: '2025-03-05T06:00:00Z' }),
      makeReading({ sensorName: 'RHAS13', vacuumInches: 18, timestamp: '2025-03-05T08:00:00Z' }),
      makeReading({ sensorName: 'RHAS13', vacuumInches: 11, timestamp: '2025-03-05T10:00:00Z' }),
      makeReading({ sensorName: 'MPC5', vacuumInches: 19, timestamp: '2025-03-05T06:00:00Z' }),
      makeReading({ sensorName: 'MPC5', vacuumInches: null, timestamp: '2025-03-05T07:00:00Z' }),
      makeReading({ sensorName: 'MPC5', vacuumInches: 13, timestamp: '2025-03-05T09:00:00Z' }),
      makeReading({ sensorName: 'LH2', vacuumInches: 20, timestamp: '2025-03-05T06:00:00Z' }),
      makeReading({ sensorName: 'LH2', vacuumInches: 19, timestamp: '2025-03-05T09:00:00Z' }),
      makeReading({ sensorName: 'BR4', vacuumInches: 5, timestamp: '2025-03-05T09:00:00Z' }),
    ];

    const leaks = detectLeaks(vacuum);

    expect(leaks.map((l) => [l.sensorName, l.type, l.drop, l.severity])).toEqual([
      ['RHAS13', 'Sudden Leak', 9, 'Critical'],
      ['MPC5', 'Sudden Leak', 6, 'High'],
      ['GCW1', 'Gradual Degradation', 4, 'Medium'],
    ]);
    expect(leaks[2]).toEqual({
      sensorName: 'GCW1',
      type: 'Gradual Degradation',
      currentVacuum: 16,
      previousVacuum: 20,
      drop: 4,
      timePeriod: '7d',
      severity: 'Medium',
      detectedAt: new Date('2025-03-06T12:00:00.000Z'),
      priority: 2,
    });
  });

  it('should report a sensor once when both checks fire', () => {
    const vacuum = [
      ...twiceDaily('GCW1', DEGRADING),
      makeReading({ sensorName: 'GCW1', vacuumInches: 10, timestamp: '2025-03-06T13:00:00Z' }),
    ];

    const leaks = detectLeaks(vacuum);

    expect(leaks).toHaveLength(1);
    expect(leaks[0]).toMatchObject({
      type: 'Sudden Leak',
      previousVacuum: 16,
      drop: 6,
      timePeriod: '6h',
      severity: 'High',
    });
  });

  it('should need ten readings in the week for degradation', () => {
    const vacuum = twiceDaily('GCW1', DEGRADING.slice(3));

    expect(detectLeaks(vacuum)).toEqual([]);
  });
});
