import { overviewMetrics } from './overview';
import { makeReading, makeRecord } from '../../test/utils/mock-data';

describe('overviewMetrics', () => {
  const now = new Date('2025-03-05T15:00:00.000Z');

  it('should summarise today across both tables', () => {
    const vacuum = [
      makeReading({ sensorName: 'RHAS13', vacuumInches: 16, timestamp: '2025-03-04T08:00:00Z' }),
      makeReading({ sensorName: 'RHAS13', vacuumInches: 20, timestamp: '2025-03-05T08:00:00Z' }),
      makeReading({ sensorName: 'MPC5', vacuumInches: 10, timestamp: '2025-03-05T09:00:00Z' }),
      makeReading({ sensorName: 'GCW1', vacuumInches: 14, timestamp: '2025-03-01T09:00:00Z' }),
      makeReading({ sensorName: 'GCW1', vacuumInches: null, timestamp: '2025-03-05T09:00:00Z' }),
    ];
    const personnel = [
      makeRecord({ employeeName: 'Alex Tapper', date: '2025-03-05', hours: 8, repairsNeeded: 'leak at tee' }),
      makeRecord({ employeeName: 'Sam Reed', date: '2025-03-05', hours: 4.5, repairsNeeded: '0' }),
      makeRecord({ employeeName: 'Alex Tapper', date: '2025-03-05', hours: 1 }),
      makeRecord({ employeeName: 'Kim Lowe', date: '2025-03-04', hours: 8, repairsNeeded: 'broken drop' }),
    ];

    expect(overviewMetrics(vacuum, personnel, now)).toEqual({
      averageVacuum: 15,
      activeSensors: 2,
      problemSensors: 2,
      employeesToday: 2,
      hoursToday: 13.5,
      repairsToday: 1,
    });
  });

  it('should report no average without readings', () => {
    expect(overviewMetrics([], [], now)).toEqual({
      averageVacuum: null,
      activeSensors: 0,
      problemSensors: 0,
      employeesToday: 0,
      hoursToday: 0,
      repairsToday: 0,
    });
  });
});
