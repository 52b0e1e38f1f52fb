import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';
import timezone from 'dayjs/plugin/timezone.js';
import type { DateRange } from '../types/adapter.js';

dayjs.extend(utc);
dayjs.extend(timezone);

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const HHMM = /^(\d{1,2}):(\d{2})$/;

/** Returns today's date as YYYY-MM-DD in the given zone (process zone by default). */
export function todayDateString(tz?: string): string {
  return (tz ? dayjs().tz(tz) : dayjs()).format('YYYY-MM-DD');
}

/** True for a real calendar date in 'YYYY-MM-DD' form. */
export function isIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return (
    date.getUTCFullYear() === Number(y) &&
    date.getUTCMonth() === Number(m) - 1 &&
    date.getUTCDate() === Number(d)
  );
}

/** Validates and zero-pads a 24h time, e.g. '9:05' → '09:05'. */
export function normalizeHhmm(value: string): string | null {
  const match = HHMM.exec(value.trim());
  if (!match) return null;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) return null;
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

/**
 * Finds the first 'H:MM' / 'HH:MM' in free text, honouring an AM/PM suffix,
 * and returns it as 24h 'HH:MM'. The suffix may run straight into digits, as
 * it does in text scraped across element boundaries ('10:15 PM1 Late Show').
 */
export function parseLocalHhmm(text: string | null | undefined): string | null {
  if (!text) return null;
  const match = /\b(\d{1,2}):(\d{2})(?!\d)\s*([AaPp][Mm](?![A-Za-z]))?/.exec(text);
  if (!match) return null;
  let hour = Number(match[1]);
  const minutes = Number(match[2]);
  const meridiem = (match[3] ?? '').toUpperCase();
  if (meridiem === 'AM') hour = hour === 12 ? 0 : hour;
  else if (meridiem === 'PM') hour = hour === 12 ? 12 : hour + 12;
  if (hour > 23 || minutes > 59) return null;
  return `${String(hour).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

export function isValidTimeZone(tz: string): boolean {
  if (!tz) return false;
  try {
    new Intl.DateTimeFormat('en-GB', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

/** Local wall-clock date + time in `tz` → ISO-8601 UTC string, or null if any part is invalid. */
export function localToUtcIso(date: string, time: string, tz: string): string | null {
  const hhmm = normalizeHhmm(time);
  if (!isIsoDate(date) || !hhmm || !isValidTimeZone(tz)) return null;
  return dayjs.tz(`${date} ${hhmm}`, tz).utc().toISOString();
}

/** ISO-8601 instant → local `{ date, time }` in `tz`. */
export function utcToLocal(utcIso: string, tz: string): { date: string; time: string } | null {
  const instant = dayjs.utc(utcIso);
  if (!instant.isValid() || !isValidTimeZone(tz)) return null;
  const local = instant.tz(tz);
  return { date: local.format('YYYY-MM-DD'), time: local.format('HH:mm') };
}

/** Every date in the range, inclusive. Empty when start > end or either end is malformed. */
export function eachDay(range: DateRange): string[] {
  if (!isIsoDate(range.start) || !isIsoDate(range.end)) return [];
  const days: string[] = [];
  let cursor = dayjs.utc(range.start);
  const end = dayjs.utc(range.end);
  while (!cursor.isAfter(end, 'day')) {
    days.push(cursor.format('YYYY-MM-DD'));
    cursor = cursor.add(1, 'day');
  }
  return days;
}

/** Range covering the last `daysBack` days up to and including today. */
export function rangeEndingToday(daysBack: number, today = todayDateString()): DateRange {
  const start = dayjs.utc(today).subtract(Math.max(0, daysBack - 1), 'day');
  return { start: start.format('YYYY-MM-DD'), end: today };
}

/** '2024-05-01' → '20240501' */
export function compactDate(date: string): string {
  return date.replace(/-/g, '');
}

/** '2024-05-01' → '01/05/2024' */
export function dayMonthYear(date: string): string {
  const [y, m, d] = date.split('-');
  return `${d ?? ''}/${m ?? ''}/${y ?? ''}`;
}

/** ISO instant → 'YYYYMMDD_HHmmss' in UTC, for file names. */
export function fileStamp(iso: string): string {
  return dayjs.utc(iso).format('YYYYMMDD_HHmmss');
}
