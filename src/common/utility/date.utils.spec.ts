import { parseCalendarDate, parseTimestamp, toIsoDate } from './date.utils';

describe('date utils', () => {
  describe('parseCalendarDate', () => {
    it('parses YYYY-MM-DD as UTC midnight', () => {
      expect(parseCalendarDate('2021-01-01')?.toISOString()).toBe('2021-01-01T00:00:00.000Z');
    });

    it('rejects impossible and differently formatted dates', () => {
      expect(parseCalendarDate('2021-02-30')).toBeNull();
      expect(parseCalendarDate('2021/01/01')).toBeNull();
      expect(parseCalendarDate('yesterday')).toBeNull();
    });
  });

  describe('parseTimestamp', () => {
    it('reads SQL-style timestamps without offset as UTC', () => {
      expect(parseTimestamp('2021-01-15 10:30:00')?.toISOString()).toBe(
        '2021-01-15T10:30:00.000Z',
      );
    });

    it('honours an explicit offset', () => {
      expect(parseTimestamp('2021-01-15T10:30:00+02:00')?.toISOString()).toBe(
        '2021-01-15T08:30:00.000Z',
      );
    });

    it('accepts a bare date', () => {
      expect(parseTimestamp('2021-01-15')?.toISOString()).toBe('2021-01-15T00:00:00.000Z');
    });

    it('returns null for unparseable values', () => {
      expect(parseTimestamp('not a date')).toBeNull();
      expect(parseTimestamp('   ')).toBeNull();
    });
  });

  it('formats a date as its UTC calendar day', () => {
    expect(toIsoDate(new Date('2021-03-04T23:59:00Z'))).toBe('2021-03-04');
  });
});
