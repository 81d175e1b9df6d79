import { describe, expect, it } from 'vitest';

import { endOfDay, formatDate, parseIsoDate } from '../src/utils/date-util';

describe('date-util', () => {
  describe('parseIsoDate()', () => {
    it('parses a calendar date as midnight UTC', () => {
      expect(parseIsoDate('2025-01-31')?.toISOString()).toBe(
        '2025-01-31T00:00:00.000Z',
      );
    });

    it('ignores surrounding whitespace', () => {
      expect(parseIsoDate(' 2024-02-29 ')?.toISOString()).toBe(
        '2024-02-29T00:00:00.000Z',
      );
    });

    it('rejects malformed input', () => {
      for (const value of ['2025-1-31', '2025/01/31', '31-01-2025', 'tomorrow', '']) {
        expect(parseIsoDate(value)).toBeNull();
      }
    });

    it('rejects dates that do not exist', () => {
      expect(parseIsoDate('2025-02-29')).toBeNull();
      expect(parseIsoDate('2025-13-01')).toBeNull();
      expect(parseIsoDate('2025-04-31')).toBeNull();
    });
  });

  it('endOfDay() returns the last millisecond of the day', () => {
    const end = endOfDay(new Date('2025-01-31T00:00:00Z'));
    expect(end.toISOString()).toBe('2025-01-31T23:59:59.999Z');
    expect(formatDate(end)).toBe('2025-01-31');
  });

  it('formatDate() prints the UTC date', () => {
    expect(formatDate(new Date('2025-03-09T23:30:00-02:00'))).toBe('2025-03-10');
  });
});
