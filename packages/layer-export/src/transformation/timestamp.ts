/**
 * Timestamp conversion
 *
 * Sources hand back wall-clock values (SQLite text, DBF dates). They are
 * kept as `LocalDateTime` and formatted without any zone arithmetic.
 */

import type { LocalDateTime } from '../core/types.js';

const ISO_TEXT =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?(Z|[+-]\d{2}(?::?\d{2})?)?$/;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Format as ISO-8601 `YYYY-MM-DDTHH:MM:SS`, followed by the fraction and
 * zone designator exactly as the source stored them
 */
export function formatTimestamp(ts: LocalDateTime): string {
  const date = `${pad(ts.year, 4)}-${pad(ts.month, 2)}-${pad(ts.day, 2)}`;
  const time = `${pad(ts.hour, 2)}:${pad(ts.minute, 2)}:${pad(ts.second, 2)}`;
  const fraction = ts.fraction ? `.${ts.fraction}` : '';
  return `${date}T${time}${fraction}${ts.offset ?? ''}`;
}

/**
 * Parse ISO date or date-time text as stored by SQLite.
 *
 * Fraction digits and a trailing `Z` or offset are kept as written, not
 * applied. Returns null for text that is not a calendar-valid date.
 */
export function parseTimestampText(text: string): LocalDateTime | null {
  const match = ISO_TEXT.exec(text.trim());
  if (!match) return null;

  const [, year, month, day, hour, minute, second, fraction, offset] = match;
  const ts: LocalDateTime = {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: hour ? Number(hour) : 0,
    minute: minute ? Number(minute) : 0,
    second: second ? Number(second) : 0,
    ...(fraction ? { fraction } : {}),
    ...(offset ? { offset } : {}),
  };

  return isValidTimestamp(ts) ? ts : null;
}

/**
 * Read the local wall-clock fields of a JS Date; milliseconds become a
 * three-digit fraction when non-zero
 */
export function fromDate(date: Date): LocalDateTime {
  const millisecond = date.getMilliseconds();
  return {
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate(),
    hour: date.getHours(),
    minute: date.getMinutes(),
    second: date.getSeconds(),
    ...(millisecond > 0 ? { fraction: pad(millisecond, 3) } : {}),
  };
}

function isValidTimestamp(ts: LocalDateTime): boolean {
  if (ts.month < 1 || ts.month > 12) return false;
  const daysInMonth = new Date(Date.UTC(ts.year, ts.month, 0)).getUTCDate();
  return (
    ts.day >= 1 &&
    ts.day <= daysInMonth &&
    ts.hour <= 23 &&
    ts.minute <= 59 &&
    ts.second <= 59
  );
}
