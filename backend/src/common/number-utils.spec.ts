import { parseNumber, toNumber, round, mean, sum } from './number-utils';

describe('number-utils', () => {
  describe('parseNumber', () => {
    it('should parse numbers and numeric strings', () => {
      expect(parseNumber(18.5)).toBe(18.5);
      expect(parseNumber(' 21.25 ')).toBe(21.25);
      expect(parseNumber('$1,250.50')).toBe(1250.5);
      expect(parseNumber('-3')).toBe(-3);
    });

    it('should return null for non-numeric cells', () => {
      expect(parseNumber('')).toBeNull();
      expect(parseNumber('n/a')).toBeNull();
      expect(parseNumber(null)).toBeNull();
      expect(parseNumber(undefined)).toBeNull();
      expect(parseNumber(true)).toBeNull();
      expect(parseNumber(Number.NaN)).toBeNull();
    });
  });

  describe('toNumber', () => {
    it('should coerce unparseable values to 0', () => {
      expect(toNumber('abc')).toBe(0);
      expect(toNumber('')).toBe(0);
      expect(toNumber('7.5')).toBe(7.5);
    });
  });

  it('should round, sum and average', () => {
    expect(round(2.346, 2)).toBe(2.35);
    expect(round(14.26, 1)).toBe(14.3);
    expect(sum([1, 2, 3.5])).toBe(6.5);
    expect(mean([10, 20])).toBe(15);
    expect(mean([])).toBeNull();
  });
});
