import { describe, it, expect } from 'vitest';
import { assertDate, assertDateTime } from '../../src/utils/validation.js';
import { ValidationError } from '../../src/errors/index.js';

describe('validation', () => {
  describe('assertDate', () => {
    it('should return well-formed dates unchanged', () => {
      expect(assertDate('oldest', '2024-12-15')).toBe('2024-12-15');
    });

    it('should only check the shape, not whether the date exists', () => {
      expect(assertDate('oldest', '2024-13-45')).toBe('2024-13-45');
    });

    it('should throw a ValidationError naming the field', () => {
      expect(() => assertDate('newest', '12/15/2024')).toThrow(ValidationError);
      expect(() => assertDate('newest', '12/15/2024')).toThrow('newest must be YYYY-MM-DD');
    });

    it('should reject a trailing newline', () => {
      expect(() => assertDate('oldest', '2024-12-15\n')).toThrow('oldest must be YYYY-MM-DD');
    });
  });

  describe('assertDateTime', () => {
    it('should accept local datetimes without offset', () => {
      expect(assertDateTime('start_date_local', '2024-12-15T06:30:00')).toBe('2024-12-15T06:30:00');
    });

    it('should reject offsets and fractional seconds', () => {
      expect(() => assertDateTime('start_date_local', '2024-12-15T06:30:00Z')).toThrow(
        'start_date_local must be YYYY-MM-DDTHH:MM:SS'
      );
      expect(() => assertDateTime('start_date_local', '2024-12-15T06:30:00.5')).toThrow(ValidationError);
    });

    it('should record the rejected input on the error', () => {
      try {
        assertDateTime('start_date_local', 'tomorrow 7am');
        expect.fail('expected a ValidationError');
      } catch (error) {
        expect(error).toMatchObject({
          field: 'start_date_local',
          expectedFormat: 'YYYY-MM-DDTHH:MM:SS',
          input: 'tomorrow 7am',
          category: 'validation',
        });
      }
    });
  });
});
