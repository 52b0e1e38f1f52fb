import type { DedupKey } from '../types/race.js';
import { computeRaceId } from './dedup.js';

export type CourseNormalizer = (raw: string) => string;

export interface CourseNormalizerOptions {
  /** Whole tokens some sources append and others don't, dropped after splitting. */
  noiseTokens?: readonly string[];
}

/**
 * Builds the course-name canonicalizer shared by the aggregator, the
 * form-guide directory and the enricher.
 *
 * 'Ffos-Las', ' ffos las ', 'Ffos Las (AW)' all become 'ffos las'.
 */
export function createCourseNormalizer(options: CourseNormalizerOptions = {}): CourseNormalizer {
  const noise = new Set((options.noiseTokens ?? []).map((t) => t.toLowerCase().trim()).filter(Boolean));

  return (raw: string): string =>
    raw
      .toLowerCase()
      .replace(/\([^)]*\)/g, ' ')
      .replace(/[-_]/g, ' ')
      .replace(/[.'’]/g, '')
      .split(/\s+/)
      .filter((token) => token && !noise.has(token))
      .join(' ');
}

export const normalizeCourse: CourseNormalizer = createCourseNormalizer();

/**
 * Floors 'HH:MM' to the start of its `bucketMinutes` bucket: '14:07' → '14:05'.
 * Input that is not a clock time is returned unchanged.
 */
export function roundTime(hhmm: string, bucketMinutes = 5): string {
  if (!Number.isInteger(bucketMinutes) || bucketMinutes <= 0) {
    throw new RangeError(`bucketMinutes must be a positive integer, got ${bucketMinutes}`);
  }
  const match = /^(\d{1,2}):(\d{2})$/.exec(hhmm.trim());
  if (!match) return hhmm;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) return hhmm;
  const floored = Math.floor(minutes / bucketMinutes) * bucketMinutes;
  return `${String(hours).padStart(2, '0')}:${String(floored).padStart(2, '0')}`;
}

export function buildKey(
  course: string,
  date: string,
  time: string,
  raceNumber: string | number | null,
  options: { bucketMinutes?: number; normalizer?: CourseNormalizer } = {},
): DedupKey {
  const normalize = options.normalizer ?? normalizeCourse;
  return {
    course: normalize(course),
    date,
    time: roundTime(time, options.bucketMinutes ?? 5),
    raceNumber: raceNumber === null || raceNumber === '' ? null : String(raceNumber),
  };
}

export function dedupKeyToString(key: DedupKey): string {
  return [key.course, key.date, key.time, key.raceNumber ?? ''].join('|');
}

export function raceIdForKey(key: DedupKey): string {
  return computeRaceId(dedupKeyToString(key));
}
