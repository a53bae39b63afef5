import { classifyTapProgress, seasonFor, tapProgress } from './tap-progress';
import { makeRecord } from '../../test/utils/mock-data';

describe('tap progress', () => {
  describe('seasonFor', () => {
    it('should roll over on December 1', () => {
      expect(seasonFor(new Date('2025-11-30T23:00:00Z'))).toBe(2025);
      expect(seasonFor(new Date('2025-12-01T00:00:00Z'))).toBe(2026);
      expect(seasonFor(new Date('2026-03-15T00:00:00Z'))).toBe(2026);
    });
  });

  describe('classifyTapProgress', () => {
    it.each([
      [200, 0, 'Not started'],
      [0, 12, 'New tapping'],
      [0, 0, ''],
      [200, 189, 'Significantly less'],
      [100, 95, 'On track'],
      [100, 99, 'On target'],
      [100, 101, 'On target'],
      [100, 105, 'On track'],
      [100, 106, 'Significantly more'],
    ])('should rate %d -> %d as "%s"', (previous, current, expected) => {
      expect(classifyTapProgress(previous, current)).toBe(expected);
    });
  });

  describe('tapProgress', () => {
    const personnel = [
      makeRecord({ mainline: 'RHAS13', date: '2024-11-30', tapsPutIn: 999 }),
      makeRecord({ mainline: 'RHAS13', date: '2025-02-10', tapsPutIn: 100 }),
      makeRecord({ mainline: 'RHAS14', date: '2025-01-05', tapsPutIn: 200 }),
      makeRecord({ mainline: 'MPC5', date: '2025-03-01', tapsPutIn: 50 }),
      makeRecord({ mainline: 'MPC6', date: '2025-02-01', tapsPutIn: 0 }),
      makeRecord({ mainline: 'RHAS13', date: '2025-12-15', tapsPutIn: 60, employeeName: 'Sam Reed' }),
      makeRecord({ mainline: 'RHAS13', date: '2026-01-10', tapsPutIn: 40 }),
      makeRecord({ mainline: 'MPC5', date: '2025-12-20', tapsPutIn: 52, tapsRemoved: 3, employeeName: 'Kim Lowe' }),
      makeRecord({ mainline: 'MPC6', date: '2026-01-02', tapsPutIn: 10 }),
      makeRecord({ mainline: 'RHAS15', date: '2026-01-03', tapsPutIn: 0 }),
      makeRecord({ mainline: '', date: '2026-01-03', tapsPutIn: 30 }),
    ];

    it('should compare each mainline with the season before', () => {
      const report = tapProgress(personnel, 2026);

      expect(report.season).toBe(2026);
      expect(report.previousSeason).toBe(2025);
      expect(
        report.mainlines.map((m) => [m.mainline, m.previousTaps, m.tapsPutIn, m.percentOfPrevious, m.status]),
      ).toEqual([
        ['MPC5', 50, 52, 104, 'On track'],
        ['MPC6', 0, 10, null, 'New tapping'],
        ['RHAS13', 100, 100, 100, 'On target'],
        ['RHAS14', 200, 0, null, 'Not started'],
        ['RHAS15', 0, 0, null, ''],
      ]);
      expect(report.statusCounts).toEqual({
        'On track': 1,
        'New tapping': 1,
        'On target': 1,
        'Not started': 1,
      });
    });

    it('should list this season\'s tappers and removals', () => {
      const report = tapProgress(personnel, 2026);
      const byName = new Map(report.mainlines.map((m) => [m.mainline, m]));

      expect(byName.get('RHAS13')?.tappers).toEqual(['Alex Tapper', 'Sam Reed']);
      expect(byName.get('RHAS13')?.conductorSystem).toBe('RHAS');
      expect(byName.get('MPC5')?.tapsRemoved).toBe(3);
      expect(byName.get('RHAS15')?.tappers).toEqual([]);
    });
  });
});
