import type { Discipline, RawRace } from './race.js';

export interface DateRange {
  /** 'YYYY-MM-DD', inclusive */
  start: string;
  /** 'YYYY-MM-DD', inclusive */
  end: string;
}

export interface SourceAdapterConfig {
  id: string;
  name: string;
  baseUrl: string;
  /** Provenance tag written into `dataSources`, e.g. 'ATR' */
  sourceTag: string;
  disciplines: Discipline[];
}

export interface AdapterResult {
  sourceId: string;
  races: RawRace[];
  /** Set when the source could not be reached at all; `races` is then empty. */
  error: Error | null;
  /** Page fragments that could not be turned into a race. */
  skippedFragments: number;
}

export interface SourceAdapter {
  readonly config: SourceAdapterConfig;

  /**
   * Fetch every race the source lists for the date range.
   * Never rejects: an unreachable source resolves with an empty list and an error.
   */
  fetchRaces(range: DateRange, signal?: AbortSignal): Promise<AdapterResult>;
}

/** The slice of the HTTP client adapters depend on. */
export interface PageFetcher {
  fetchText(url: string, init?: { signal?: AbortSignal; headers?: Record<string, string> }): Promise<string | null>;
}

/** One meeting entry from a form guide directory feed. */
export interface FormGuideMeeting {
  course: string;
  /** Dated link, e.g. '.../form-guide/2024-05-01/ascot.pdf' */
  link: string;
}

export interface FormGuideFeed {
  readonly sourceTag: string;
  /** Rejects when the feed cannot be read; the scan carries on without links. */
  fetchMeetings(range: DateRange, signal?: AbortSignal): Promise<FormGuideMeeting[]>;
}
