import {
  bottomPerformers,
  employeePerformance,
  topPerformers,
} from './employee-performance';
import { makeRecord } from '../../test/utils/mock-data';

describe('employee performance', () => {
  const records = [
    makeRecord({ employeeName: 'Alex Tapper', employeeId: '', mainline: 'RHAS13', date: '2025-03-01', hours: 4 }),
    makeRecord({ employeeName: 'Alex Tapper', employeeId: 'E7', mainline: 'MPC5', date: '2025-03-02', hours: 4 }),
    makeRecord({ employeeName: 'Alex Tapper', employeeId: 'E7', mainline: 'RHAS13', date: '2025-03-03', hours: 2 }),
    makeRecord({ employeeName: 'Sam Reed', mainline: 'MPC5', hours: 6 }),
    makeRecord({ employeeName: 'Kim Lowe', mainline: 'GCW1', hours: 3 }),
    makeRecord({ employeeName: 'Jo Park', mainline: '', hours: 5 }),
  ];

  it('should total work per employee and drop those under the minimum hours', () => {
    const performance = employeePerformance(records);

    expect(performance.map((p) => p.employeeName)).toEqual(['Alex Tapper', 'Sam Reed', 'Jo Park']);
    expect(performance[0]).toMatchObject({
      employeeId: 'E7',
      totalHours: 10,
      mainlinesVisited: 2,
      hoursPerMainline: 5,
      efficiencyScore: 2,
    });
    expect(performance[1].efficiencyScore).toBe(1.67);
    expect(performance[2]).toMatchObject({ mainlinesVisited: 0, hoursPerMainline: null, efficiencyScore: 0 });
  });

  it('should rank top and bottom performers by efficiency', () => {
    const performance = employeePerformance(records);

    expect(topPerformers(performance, 2).map((p) => p.employeeName)).toEqual([
      'Alex Tapper',
      'Sam Reed',
    ]);
    expect(bottomPerformers(performance, 1).map((p) => p.employeeName)).toEqual(['Jo Park']);
  });

  it('should accept a lower minimum', () => {
    expect(employeePerformance(records, 0).map((p) => p.employeeName)).toContain('Kim Lowe');
  });
});
