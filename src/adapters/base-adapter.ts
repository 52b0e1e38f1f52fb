import * as cheerio from 'cheerio';
import type { AdapterResult, DateRange, PageFetcher, SourceAdapter, SourceAdapterConfig } from '../types/adapter.js';
import { SourceUnavailableError } from '../types/errors.js';
import type { DataSources, Discipline, RawRace, Runner } from '../types/race.js';
import type { TimezoneResolver } from '../pipeline/reference-data.js';
import { eachDay } from '../utils/date.js';
import { logger } from '../utils/logger.js';

/** Races read from one page plus the fragments on it that could not be read. */
export interface ParsedPage {
  races: RawRace[];
  skipped: number;
}

/** Links read from an index page plus the hrefs on it that did not resolve. */
export interface ParsedLinks<T = string> {
  links: T[];
  skipped: number;
}

/** Per-call bookkeeping for one `fetchRaces` run. */
export interface FetchRun {
  signal?: AbortSignal;
  requested: number;
  received: number;
  skipped: number;
}

export interface RaceFields {
  course: string;
  date: string;
  time: string;
  discipline: Discipline;
  country: string;
  runners: Runner[];
  raceUrl: string;
  raceNumber?: number | null;
  fieldSize?: number;
  /** Defaults to the track/country lookup. */
  timezoneName?: string;
  grade?: string | null;
  distance?: string | null;
  surface?: string | null;
  /** Field groups this source supplies; each is tagged with the adapter's source tag. */
  groups: string[];
}

export abstract class BaseAdapter implements SourceAdapter {
  abstract readonly config: SourceAdapterConfig;

  constructor(
    protected readonly fetcher: PageFetcher,
    protected readonly timezones: TimezoneResolver,
  ) {}

  /** Walks the source's pages for the range. Throwing marks the whole source unavailable. */
  protected abstract collect(range: DateRange, run: FetchRun): Promise<RawRace[]>;

  async fetchRaces(range: DateRange, signal?: AbortSignal): Promise<AdapterResult> {
    const sourceId = this.config.id;
    const log = logger.child({ adapter: sourceId });
    const run: FetchRun = { signal, requested: 0, received: 0, skipped: 0 };

    try {
      const races = await this.collect(range, run);

      if (run.requested > 0 && run.received === 0 && !signal?.aborted) {
        log.warn({ requested: run.requested }, 'No page could be fetched');
        return this.unavailable(new SourceUnavailableError(sourceId, `${this.config.name}: no page could be fetched`), run);
      }

      if (run.skipped > 0) log.debug({ skipped: run.skipped }, 'Skipped unreadable fragments');
      log.info({ count: races.length, pages: run.received }, 'Fetched races');
      return { sourceId, races, error: null, skippedFragments: run.skipped };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.warn({ err: message }, 'Source failed');
      return this.unavailable(new SourceUnavailableError(sourceId, `${this.config.name}: ${message}`, { cause: err }), run);
    }
  }

  private unavailable(error: SourceUnavailableError, run: FetchRun): AdapterResult {
    return { sourceId: this.config.id, races: [], error, skippedFragments: run.skipped };
  }

  /** Null on any failure, and without a request once the run is aborted. */
  protected async fetchPage(url: string, run: FetchRun): Promise<string | null> {
    if (run.signal?.aborted) return null;
    run.requested++;
    const body = await this.fetcher.fetchText(url, { signal: run.signal });
    if (body !== null) run.received++;
    return body;
  }

  protected load(html: string) {
    return cheerio.load(html);
  }

  protected days(range: DateRange): string[] {
    return eachDay(range);
  }

  /** Null when the href does not resolve against the base URL. */
  protected absoluteUrl(href: string): string | null {
    try {
      return new URL(href, this.config.baseUrl).toString();
    } catch (err) {
      logger.debug({ adapter: this.config.id, href, err: err instanceof Error ? err.message : String(err) }, 'Unresolvable link');
      return null;
    }
  }

  protected dataSources(groups: string[]): DataSources {
    return Object.fromEntries(groups.map((group) => [group, this.config.sourceTag]));
  }

  protected makeRace(fields: RaceFields): RawRace {
    return {
      sourceId: this.config.id,
      course: fields.course,
      date: fields.date,
      time: fields.time,
      timezoneName: fields.timezoneName ?? this.timezones.resolve(fields.course, fields.country),
      raceNumber: fields.raceNumber ?? null,
      fieldSize: fields.fieldSize ?? fields.runners.length,
      runners: fields.runners,
      discipline: fields.discipline,
      country: fields.country,
      raceUrl: fields.raceUrl,
      dataSources: this.dataSources(fields.groups),
      grade: fields.grade ?? null,
      distance: fields.distance ?? null,
      surface: fields.surface ?? null,
    };
  }
}

/** 'santa-anita' → 'Santa Anita' */
export function titleFromSlug(slug: string): string {
  return slug
    .split('-')
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/** Collapses whitespace in scraped text. */
export function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
