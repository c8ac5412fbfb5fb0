import { describe, it, expect } from 'vitest';
import { formatTimestamp, parseTimestampText, fromDate } from './timestamp.js';

describe('formatTimestamp', () => {
  it('formats date and time', () => {
    expect(
      formatTimestamp({ year: 2024, month: 1, day: 1, hour: 0, minute: 0, second: 0 })
    ).toBe('2024-01-01T00:00:00');
  });

  it('writes the stored fraction and offset back out', () => {
    expect(
      formatTimestamp({
        year: 2023, month: 11, day: 9, hour: 14, minute: 5, second: 7, fraction: '040', offset: 'Z',
      })
    ).toBe('2023-11-09T14:05:07.040Z');
  });
});

describe('parseTimestampText', () => {
  it('parses a bare date as midnight', () => {
    expect(parseTimestampText('2024-02-29')).toEqual({
      year: 2024, month: 2, day: 29, hour: 0, minute: 0, second: 0,
    });
  });

  it('keeps a UTC offset without converting', () => {
    const parsed = parseTimestampText('2024-06-30T23:15:00+03:00');
    expect(parsed?.offset).toBe('+03:00');
    expect(parsed && formatTimestamp(parsed)).toBe('2024-06-30T23:15:00+03:00');
  });

  it('accepts a space separator and keeps Z', () => {
    const parsed = parseTimestampText('2022-12-31 08:30:00Z');
    expect(parsed && formatTimestamp(parsed)).toBe('2022-12-31T08:30:00Z');
  });

  it('keeps every stored fraction digit', () => {
    const micro = parseTimestampText('2024-06-30T23:15:00.123456');
    expect(micro && formatTimestamp(micro)).toBe('2024-06-30T23:15:00.123456');

    const short = parseTimestampText('2024-06-30 23:15:00.0004-0500');
    expect(short && formatTimestamp(short)).toBe('2024-06-30T23:15:00.0004-0500');
  });

  it('rejects text that is not a calendar date', () => {
    expect(parseTimestampText('2023-02-29')).toBeNull();
    expect(parseTimestampText('yesterday')).toBeNull();
  });
});

describe('fromDate', () => {
  it('reads local wall-clock fields', () => {
    const date = new Date(2021, 4, 17, 9, 45, 12);
    expect(formatTimestamp(fromDate(date))).toBe('2021-05-17T09:45:12');
  });

  it('adds milliseconds only when present', () => {
    const date = new Date(2021, 4, 17, 9, 45, 12, 7);
    expect(formatTimestamp(fromDate(date))).toBe('2021-05-17T09:45:12.007');
  });
});
