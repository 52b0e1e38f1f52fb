export type Discipline = 'thoroughbred' | 'greyhound' | 'harness';

/** Field group → provenance tag of the source that supplied it, e.g. `{ odds: 'ATR' }`. */
export type DataSources = Record<string, string>;

export interface Runner {
  name: string;
  /** Raw odds notation as published: '5/2', 'EVS', '3.5', 'SP', ... */
  oddsString: string | null;
}

export interface RankedRunner extends Runner {
  oddsFractional: number;
}

/** One race as read from a single source. Minimal normalization. */
export interface RawRace {
  sourceId: string;
  course: string;
  /** Local date at the course, e.g. '2024-05-01' */
  date: string;
  /** Local off time, 24h 'HH:MM' */
  time: string;
  /** IANA zone the source's date/time are expressed in */
  timezoneName: string;
  raceNumber: number | null;
  fieldSize: number;
  runners: Runner[];
  discipline: Discipline;
  country: string;
  raceUrl: string;
  dataSources: DataSources;
  grade: string | null;
  distance: string | null;
  surface: string | null;
}

export interface DedupKey {
  course: string;
  date: string;
  time: string;
  raceNumber: string | null;
}

/** After aggregation: merged across sources, enriched and scored. */
export interface Race {
  id: string;
  course: string;
  country: string;
  discipline: Discipline;
  raceNumber: number | null;
  fieldSize: number;
  timeLocal: string;
  timezoneName: string;
  /** ISO-8601 UTC, e.g. '2024-05-01T13:05:00.000Z' */
  utcDatetime: string;
  favorite: RankedRunner | null;
  secondFavorite: RankedRunner | null;
  allRunners: Runner[];
  raceUrl: string;
  grade: string | null;
  distance: string | null;
  surface: string | null;
  dataSources: DataSources;
  formGuideUrl: string | null;
  valueScore: number;
}
