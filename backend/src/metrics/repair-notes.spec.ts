import { repairNotes } from './repair-notes';
import { makeRecord } from '../../test/utils/mock-data';

describe('repairNotes', () => {
  it('should parse repair text from both columns, newest first', () => {
    const entries = repairNotes([
      makeRecord({ date: '2025-03-02', repairsNeeded: 'spinseal reweld @mid' }),
      makeRecord({ date: '2025-03-04', repairsNeeded: '0', notes: 'Tree on mainline, complete' }),
      makeRecord({ date: '2025-03-05', notes: 'tapped the whole line' }),
      makeRecord({ date: '2025-03-03' }),
    ]);

    expect(entries).toEqual([
      {
        date: '2025-03-04',
        employeeName: 'Alex Tapper',
        mainline: 'RHAS13',
        site: 'NY',
        text: 'Tree on mainline, complete',
        status: 'Complete',
        issues: ['Tree Damage'],
        location: 'Mainline',
      },
      {
        date: '2025-03-02',
        employeeName: 'Alex Tapper',
        mainline: 'RHAS13',
        site: 'NY',
        text: 'spinseal reweld @mid',
        status: null,
        issues: ['Spinseal Reweld'],
        location: 'Middle',
      },
    ]);
  });

  it('should join the repairs-needed and notes text', () => {
    const [entry] = repairNotes([
      makeRecord({ repairsNeeded: 'broken lateral', notes: 'not complete' }),
    ]);

    expect(entry.text).toBe('broken lateral not complete');
    expect(entry.status).toBe('Not Complete');
    expect(entry.issues).toEqual(['Broken Equipment']);
  });
});
