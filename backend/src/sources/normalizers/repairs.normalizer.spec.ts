import { normalizeRepairsSheet } from './repairs.normalizer';
import { createSheet } from '../../../test/utils/sheet-builder';

describe('normalizeRepairsSheet', () => {
  const header = ['Repair ID', 'mainline.', 'Date Found', 'Date Resolved', 'Description'];

  it('should normalize tickets and keep open ones', () => {
    const sheet = createSheet('Repairs', header, [
      ['R-7', 'rhas13', '2/10/2025 14:20', '2/12/2025', 'Squirrel chew'],
      ['R-8', 'MPC2', '', '', ''],
      ['', '', '', '', ''],
    ]);

    const result = normalizeRepairsSheet(sheet);

    expect(result.records).toEqual([
      {
        repairId: 'R-7',
        mainline: 'RHAS13',
        dateFound: new Date('2025-02-10T00:00:00.000Z'),
        dateResolved: new Date('2025-02-12T00:00:00.000Z'),
        description: 'Squirrel chew',
      },
      {
        repairId: 'R-8',
        mainline: 'MPC2',
        dateFound: null,
        dateResolved: null,
        description: '',
      },
    ]);
    expect(result.warnings).toEqual([
      "Sheet 'Repairs': dropped 1 row(s) without an id or mainline",
    ]);
  });

  it('should report missing required columns', () => {
    const sheet = createSheet('Repairs', ['Repair ID', 'Description'], [['R-1', 'x']]);

    expect(normalizeRepairsSheet(sheet).warnings).toEqual([
      "Sheet 'Repairs' is missing required column(s): mainline, date_found",
    ]);
  });
});
