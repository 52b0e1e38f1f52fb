import type { Discipline, Race } from './race.js';

export interface RaceQuery {
  /** Local race date 'YYYY-MM-DD' */
  date?: string;
  discipline?: Discipline;
  limit: number;
}

export interface StoredRaceSummary {
  id: string;
  course: string;
  country: string;
  discipline: Discipline;
  utcDatetime: string;
  timeLocal: string;
  timezoneName: string;
  fieldSize: number;
  valueScore: number;
  formGuideUrl: string | null;
}

export interface RaceStore {
  saveRaces(races: Race[]): Promise<number>;
  listRaces(query: RaceQuery): Promise<StoredRaceSummary[]>;
  getRace(id: string): Promise<Race | null>;
  ping(): Promise<boolean>;
}
