import type { FormGuideMeeting } from '../types/adapter.js';
import type { Race } from '../types/race.js';
import { utcToLocal } from '../utils/date.js';
import { logger } from '../utils/logger.js';
import { normalizeCourse, type CourseNormalizer } from './normalizer.js';

/**
 * (normalized course, local date) → form guide URL, kept in insertion order
 * so the substring fallback is deterministic.
 */
export class FormGuideDirectory {
  private readonly entries = new Map<string, { course: string; date: string; url: string }>();

  constructor(readonly sourceTag: string) {}

  private static keyOf(course: string, date: string): string {
    return `${course}|${date}`;
  }

  /** First entry for a key wins; later duplicates are ignored. */
  set(normalizedCourse: string, date: string, url: string): void {
    const key = FormGuideDirectory.keyOf(normalizedCourse, date);
    if (!this.entries.has(key)) this.entries.set(key, { course: normalizedCourse, date, url });
  }

  get(normalizedCourse: string, date: string): string | null {
    return this.entries.get(FormGuideDirectory.keyOf(normalizedCourse, date))?.url ?? null;
  }

  *onDate(date: string): IterableIterator<{ course: string; url: string }> {
    for (const entry of this.entries.values()) {
      if (entry.date === date) yield { course: entry.course, url: entry.url };
    }
  }

  get size(): number {
    return this.entries.size;
  }
}

const LINK_DATE = /\/(\d{4}-\d{2}-\d{2})/;

/** Builds the directory from feed meetings; meetings without a dated link are skipped. */
export function buildFormGuideDirectory(
  meetings: FormGuideMeeting[],
  sourceTag: string,
  normalizer: CourseNormalizer = normalizeCourse,
): FormGuideDirectory {
  const directory = new FormGuideDirectory(sourceTag);
  for (const meeting of meetings) {
    const date = LINK_DATE.exec(meeting.link)?.[1];
    const course = normalizer(meeting.course);
    if (!date || !course) continue;
    directory.set(course, date, meeting.link);
  }
  return directory;
}

/** Containment in either direction: 'ascot' ~ 'ascot racecourse'. */
export function substringMatch(a: string, b: string): boolean {
  if (!a || !b) return false;
  return a.includes(b) || b.includes(a);
}

/** Exact key first, then the first same-day entry whose course name contains (or is contained in) ours. */
export function findFormGuideUrl(
  directory: FormGuideDirectory,
  normalizedCourse: string,
  date: string,
): string | null {
  const exact = directory.get(normalizedCourse, date);
  if (exact) return exact;

  for (const entry of directory.onDate(date)) {
    if (substringMatch(normalizedCourse, entry.course)) return entry.url;
  }
  return null;
}

/**
 * Attaches form guide links in place. A race that already has one is left
 * alone, so running this twice changes nothing. Returns how many races were
 * linked by this call.
 */
export function enrich(
  races: Race[],
  directory: FormGuideDirectory,
  normalizer: CourseNormalizer = normalizeCourse,
): number {
  if (directory.size === 0) return 0;

  let linked = 0;
  for (const race of races) {
    if (race.formGuideUrl) continue;

    const local = utcToLocal(race.utcDatetime, race.timezoneName);
    if (!local) continue;

    const url = findFormGuideUrl(directory, normalizer(race.course), local.date);
    if (!url) continue;

    race.formGuideUrl = url;
    race.dataSources.form = directory.sourceTag;
    linked++;
  }

  logger.debug({ linked, directorySize: directory.size }, 'Form guide enrichment done');
  return linked;
}
