import { BadRequestException } from '@nestjs/common';
import { parseChoiceParam, parseNumberParam } from './query-params';

describe('query params', () => {
  describe('parseNumberParam', () => {
    it('should fall back when the parameter is absent or blank', () => {
      expect(parseNumberParam('days', undefined, 7)).toBe(7);
      expect(parseNumberParam('days', ' ', 7)).toBe(7);
    });

    it('should parse numbers within range', () => {
      expect(parseNumberParam('days', '30', 7, { min: 1, max: 365, integer: true })).toBe(30);
      expect(parseNumberParam('threshold', '12.5', 15)).toBe(12.5);
    });

    it('should reject values that are not numbers', () => {
      expect(() => parseNumberParam('days', 'abc', 7)).toThrow(BadRequestException);
      expect(() => parseNumberParam('days', '2.5', 7, { integer: true })).toThrow(
        'Invalid days: 2.5 (expected an integer)',
      );
    });

    it('should reject values out of range', () => {
      expect(() => parseNumberParam('radius', '0', 500, { min: 1, max: 10000 })).toThrow(
        'Invalid radius: 0 (expected 1 to 10000)',
      );
    });
  });

  describe('parseChoiceParam', () => {
    const choices = ['employee', 'day', 'site'] as const;

    it('should return the matching choice or the fallback', () => {
      expect(parseChoiceParam('groupBy', 'day', choices, 'employee')).toBe('day');
      expect(parseChoiceParam('groupBy', undefined, choices, 'employee')).toBe('employee');
    });

    it('should reject unknown choices', () => {
      expect(() => parseChoiceParam('groupBy', 'week', choices, 'employee')).toThrow(
        'Invalid groupBy: week (expected one of employee, day, site)',
      );
    });
  });
});
