import { describe, it, expect } from 'vitest';
import {
  compactDate,
  dayMonthYear,
  eachDay,
  fileStamp,
  isIsoDate,
  localToUtcIso,
  normalizeHhmm,
  parseLocalHhmm,
  rangeEndingToday,
  utcToLocal,
} from '../../src/utils/date.js';

describe('date helpers', () => {
  it('should validate calendar dates', () => {
    expect(isIsoDate('2024-02-29')).toBe(true);
    expect(isIsoDate('2023-02-29')).toBe(false);
    expect(isIsoDate('2024-5-1')).toBe(false);
  });

  it('should normalize 24h times', () => {
    expect(normalizeHhmm('9:05')).toBe('09:05');
    expect(normalizeHhmm('23:59')).toBe('23:59');
    expect(normalizeHhmm('24:00')).toBeNull();
  });

  it('should find clock times in free text', () => {
    expect(parseLocalHhmm('Post Time: 7:00 PM')).toBe('19:00');
    expect(parseLocalHhmm('12:15 AM start')).toBe('00:15');
    expect(parseLocalHhmm('12:30 PM')).toBe('12:30');
    expect(parseLocalHhmm('off at 14:05')).toBe('14:05');
    expect(parseLocalHhmm('TBA')).toBeNull();
  });

  it('should keep the meridiem when digits follow it directly', () => {
    expect(parseLocalHhmm('10:15 PM1Late Show')).toBe('22:15');
    expect(parseLocalHhmm('Post Time: 9:05AM2Early Bird')).toBe('09:05');
    expect(parseLocalHhmm('7:00 Pmarket')).toBe('07:00');
  });

  it('should convert between local and UTC across DST', () => {
    expect(localToUtcIso('2024-05-01', '14:05', 'Europe/London')).toBe('2024-05-01T13:05:00.000Z');
    expect(localToUtcIso('2024-01-15', '14:05', 'Europe/London')).toBe('2024-01-15T14:05:00.000Z');
    expect(localToUtcIso('2024-05-01', '14:05', 'Mars/Base')).toBeNull();
    expect(utcToLocal('2024-05-01T20:00:00Z', 'America/Los_Angeles')).toEqual({ date: '2024-05-01', time: '13:00' });
    expect(utcToLocal('2024-05-01T14:30:00.000Z', 'Australia/Sydney')).toEqual({ date: '2024-05-02', time: '00:30' });
  });

  it('should enumerate ranges', () => {
    expect(eachDay({ start: '2024-02-28', end: '2024-03-01' })).toEqual(['2024-02-28', '2024-02-29', '2024-03-01']);
    expect(eachDay({ start: '2024-03-02', end: '2024-03-01' })).toEqual([]);
    expect(rangeEndingToday(3, '2024-05-01')).toEqual({ start: '2024-04-29', end: '2024-05-01' });
  });

  it('should format dates for URLs and file names', () => {
    expect(compactDate('2024-05-01')).toBe('20240501');
    expect(dayMonthYear('2024-05-01')).toBe('01/05/2024');
    expect(fileStamp('2024-05-01T13:05:09.000Z')).toBe('20240501_130509');
  });
});
