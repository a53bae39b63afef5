import {
  parseCompletionStatus,
  parseIssueTypes,
  parseLocation,
  parseRepairNote,
} from './repair-notes.parser';

describe('repair-notes.parser', () => {
  describe('parseCompletionStatus', () => {
    it('should check "not complete" before "complete"', () => {
      expect(parseCompletionStatus('repair NOT complete, back tmrw')).toBe('Not Complete');
      expect(parseCompletionStatus('line complete')).toBe('Complete');
      expect(parseCompletionStatus('walked line')).toBeNull();
    });
  });

  describe('parseIssueTypes', () => {
    it('should detect spinseal variants and their state', () => {
      expect(parseIssueTypes('spenseal needs reweld')).toEqual(['Spinseal Reweld']);
      expect(parseIssueTypes('spin seal broken')).toEqual(['Spinseal Broken']);
      expect(parseIssueTypes('check spn sl')).toEqual(['Spinseal Issue']);
    });

    it('should report multiple issues in a fixed order', () => {
      expect(parseIssueTypes('tree on line, broken tee, antenna down')).toEqual([
        'Tree Damage',
        'Monitor Antenna',
        'Broken Equipment',
      ]);
    });

    it('should default to General Repair', () => {
      expect(parseIssueTypes('fixed leak')).toEqual(['General Repair']);
    });
  });

  describe('parseLocation', () => {
    it('should collect position and component hints', () => {
      expect(parseLocation('leak @mid by the monitor')).toBe('Middle, Monitor');
      expect(parseLocation('at the end of mainline')).toBe('Mainline, Near End');
    });

    it('should ignore "top" next to stainless', () => {
      expect(parseLocation('at top need stainless')).toBeNull();
      expect(parseLocation('fixed leak at top')).toBe('Top');
    });
  });

  describe('parseRepairNote', () => {
    it('should parse repair text', () => {
      expect(parseRepairNote('Spinseal reweld @btm - complete')).toEqual({
        status: 'Complete',
        issues: ['Spinseal Reweld'],
        location: 'Bottom',
      });
    });

    it('should skip text without repair keywords', () => {
      expect(parseRepairNote('tapped 200')).toBeNull();
      expect(parseRepairNote('   ')).toBeNull();
    });
  });
});
