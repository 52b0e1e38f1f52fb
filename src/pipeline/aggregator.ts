import type { DedupKey, RawRace, Race } from '../types/race.js';
import { MalformedRecordError } from '../types/errors.js';
import { localToUtcIso, normalizeHhmm, isIsoDate } from '../utils/date.js';
import { logger } from '../utils/logger.js';
import { buildKey, dedupKeyToString, normalizeCourse, raceIdForKey, type CourseNormalizer } from './normalizer.js';
import { rankRunners } from './odds.js';

export interface AggregateOptions {
  bucketMinutes?: number;
  normalizer?: CourseNormalizer;
}

export interface AggregateResult {
  races: Race[];
  /** Raw records dropped for missing course, date, time or zone. */
  skipped: number;
}

interface KeyedRace {
  raw: RawRace;
  key: DedupKey;
  utcDatetime: string;
}

/**
 * Checks the fields a record needs to be keyed and converted to UTC.
 * Returns the problem instead of throwing so the caller can count it.
 */
export function validateRawRace(raw: RawRace): MalformedRecordError | null {
  if (!raw.course?.trim()) return new MalformedRecordError(raw.sourceId, 'course');
  if (!isIsoDate(raw.date)) return new MalformedRecordError(raw.sourceId, 'date');
  if (!normalizeHhmm(raw.time)) return new MalformedRecordError(raw.sourceId, 'time');
  if (!localToUtcIso(raw.date, raw.time, raw.timezoneName)) {
    return new MalformedRecordError(raw.sourceId, 'timezoneName');
  }
  return null;
}

/**
 * Dedup key for a raw record. Built from the UTC instant so sources that
 * publish in different local zones still collide on the same race.
 */
function keyRawRace(raw: RawRace, utcDatetime: string, options: AggregateOptions): DedupKey {
  return buildKey(raw.course, utcDatetime.slice(0, 10), utcDatetime.slice(11, 16), raw.raceNumber, {
    bucketMinutes: options.bucketMinutes,
    normalizer: options.normalizer,
  });
}

/** Single-source record → canonical race. A field copy; no merge logic. */
export function liftRace(raw: RawRace, key: DedupKey, utcDatetime: string): Race {
  const runners = raw.runners.map((r) => ({ name: r.name, oddsString: r.oddsString }));
  const { favorite, secondFavorite } = rankRunners(runners);

  return {
    id: raceIdForKey(key),
    course: raw.course.trim(),
    country: raw.country,
    discipline: raw.discipline,
    raceNumber: raw.raceNumber,
    fieldSize: raw.fieldSize,
    timeLocal: normalizeHhmm(raw.time) ?? raw.time,
    timezoneName: raw.timezoneName,
    utcDatetime,
    favorite,
    secondFavorite,
    allRunners: runners,
    raceUrl: raw.raceUrl,
    grade: raw.grade,
    distance: raw.distance,
    surface: raw.surface,
    dataSources: { ...raw.dataSources },
    formGuideUrl: null,
    valueScore: 0,
  };
}

function firstPresent<T>(primary: T | null | undefined, secondary: T | null | undefined): T | null {
  if (primary !== null && primary !== undefined && primary !== '') return primary;
  if (secondary !== null && secondary !== undefined && secondary !== '') return secondary;
  return null;
}

/**
 * Merges two records of the same race. `a` arrived first.
 *
 * The side with more provenance groups is primary (ties go to `a`); scalar
 * fields are primary-first, the field size never shrinks, and the longer
 * runner list is kept whole rather than interleaved.
 */
export function mergeRaces(a: Race, b: Race): Race {
  const bIsPrimary = Object.keys(b.dataSources).length > Object.keys(a.dataSources).length;
  const primary = bIsPrimary ? b : a;
  const secondary = bIsPrimary ? a : b;

  const allRunners =
    secondary.allRunners.length > primary.allRunners.length ? secondary.allRunners : primary.allRunners;

  const ranked = rankRunners(allRunners);
  const favourites = [ranked, primary, secondary].find((side) => side.favorite !== null) ?? ranked;

  return {
    id: primary.id,
    course: firstPresent(primary.course, secondary.course) ?? '',
    country: firstPresent(primary.country, secondary.country) ?? '',
    discipline: primary.discipline,
    raceNumber: firstPresent(primary.raceNumber, secondary.raceNumber),
    fieldSize: Math.max(primary.fieldSize, secondary.fieldSize),
    timeLocal: firstPresent(primary.timeLocal, secondary.timeLocal) ?? '',
    timezoneName: firstPresent(primary.timezoneName, secondary.timezoneName) ?? 'UTC',
    utcDatetime: firstPresent(primary.utcDatetime, secondary.utcDatetime) ?? '',
    favorite: favourites.favorite,
    secondFavorite: favourites.secondFavorite,
    allRunners,
    raceUrl: firstPresent(primary.raceUrl, secondary.raceUrl) ?? '',
    grade: firstPresent(primary.grade, secondary.grade),
    distance: firstPresent(primary.distance, secondary.distance),
    surface: firstPresent(primary.surface, secondary.surface),
    dataSources: { ...secondary.dataSources, ...primary.dataSources },
    formGuideUrl: firstPresent(primary.formGuideUrl, secondary.formGuideUrl),
    valueScore: primary.valueScore,
  };
}

/**
 * Groups raw records by dedup key and folds each bucket left to right in
 * arrival order. Malformed records are dropped before grouping.
 *
 * For buckets of three or more the primary choice depends on fold order:
 * the accumulated race carries the union of provenance groups, so it tends
 * to stay primary.
 */
export function aggregate(rawRaces: RawRace[], options: AggregateOptions = {}): AggregateResult {
  const opts = { ...options, normalizer: options.normalizer ?? normalizeCourse };
  const buckets = new Map<string, KeyedRace[]>();
  const skippedBySource: Record<string, number> = {};
  let skipped = 0;

  for (const raw of rawRaces) {
    const utcDatetime = validateRawRace(raw) ? null : localToUtcIso(raw.date, raw.time, raw.timezoneName);
    if (!utcDatetime) {
      skipped++;
      skippedBySource[raw.sourceId] = (skippedBySource[raw.sourceId] ?? 0) + 1;
      continue;
    }

    const key = keyRawRace(raw, utcDatetime, opts);
    const id = dedupKeyToString(key);
    const bucket = buckets.get(id);
    if (bucket) bucket.push({ raw, key, utcDatetime });
    else buckets.set(id, [{ raw, key, utcDatetime }]);
  }

  if (skipped > 0) {
    logger.warn({ skipped, bySource: skippedBySource }, 'Dropped malformed race records');
  }

  const races: Race[] = [];
  for (const bucket of buckets.values()) {
    let merged: Race | null = null;
    for (const { raw, key, utcDatetime } of bucket) {
      const lifted = liftRace(raw, key, utcDatetime);
      merged = merged ? mergeRaces(merged, lifted) : lifted;
    }
    if (merged) races.push(merged);
  }

  logger.debug({ raw: rawRaces.length, merged: races.length, skipped }, 'Aggregated race records');
  return { races, skipped };
}
