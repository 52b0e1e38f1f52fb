import fs from 'node:fs';
import { z } from 'zod';
import { isValidTimeZone } from '../utils/date.js';
import { createCourseNormalizer, type CourseNormalizer } from './normalizer.js';

const zoneName = z.string().refine(isValidTimeZone, { message: 'Unknown IANA time zone' });

const referenceSchema = z.object({
  noiseTokens: z.array(z.string()).default([]),
  countryTimezones: z.record(zoneName).default({}),
  trackTimezones: z.record(zoneName).default({}),
});

export type ReferenceData = z.infer<typeof referenceSchema>;

export function parseReferenceData(input: unknown): ReferenceData {
  return referenceSchema.parse(input);
}

export function loadReferenceData(filePath: string): ReferenceData {
  return parseReferenceData(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
}

/**
 * Track → zone lookup with a country fallback, then UTC.
 * Track keys are hyphenated normalized course names ('santa-anita').
 */
export class TimezoneResolver {
  private readonly tracks: ReadonlyMap<string, string>;
  private readonly countries: ReadonlyMap<string, string>;

  constructor(
    data: Pick<ReferenceData, 'trackTimezones' | 'countryTimezones'>,
    private readonly normalize: CourseNormalizer,
  ) {
    this.tracks = new Map(Object.entries(data.trackTimezones));
    this.countries = new Map(Object.entries(data.countryTimezones).map(([k, v]) => [k.toUpperCase(), v]));
  }

  resolve(course: string, country: string): string {
    const key = this.normalize(course).replace(/ /g, '-');
    return this.tracks.get(key) ?? this.forCountry(country);
  }

  forCountry(country: string): string {
    return this.countries.get(country.toUpperCase()) ?? 'UTC';
  }
}

export interface ReferenceContext {
  normalizer: CourseNormalizer;
  timezones: TimezoneResolver;
}

/** One normalizer instance for the whole run, so adapters, aggregator and enricher agree on keys. */
export function createReferenceContext(data: ReferenceData): ReferenceContext {
  const normalizer = createCourseNormalizer({ noiseTokens: data.noiseTokens });
  return { normalizer, timezones: new TimezoneResolver(data, normalizer) };
}
