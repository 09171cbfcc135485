import { DateTime } from 'luxon';

export const CALENDAR_DATE_FORMAT = 'yyyy-MM-dd';

/**
 * Parses a `YYYY-MM-DD` calendar date into the UTC midnight instant of that day.
 * Returns null for anything else, including impossible dates like 2021-02-30.
 */
export function parseCalendarDate(value: string): Date | null {
  const parsed = DateTime.fromFormat(value.trim(), CALENDAR_DATE_FORMAT, {
    zone: 'utc',
  });
  return parsed.isValid ? parsed.toJSDate() : null;
}

/**
 * Parses an ISO-8601 or SQL-style timestamp. Values without an offset are read as UTC.
 */
export function parseTimestamp(value: string): Date | null {
  const text = value.trim();
  if (!text) return null;

  const iso = DateTime.fromISO(text, { zone: 'utc' });
  if (iso.isValid) return iso.toJSDate();

  const sql = DateTime.fromSQL(text, { zone: 'utc' });
  if (sql.isValid) return sql.toJSDate();

  return null;
}

export function toIsoDate(date: Date): string {
  return DateTime.fromJSDate(date, { zone: 'utc' }).toFormat(CALENDAR_DATE_FORMAT);
}
