import type { Sql } from 'postgres';
import { parseOdds } from '../pipeline/odds.js';
import type { Discipline, RankedRunner, Race } from '../types/race.js';
import type { RaceQuery, RaceStore, StoredRaceSummary } from '../types/store.js';
import { utcToLocal } from '../utils/date.js';
import { logger } from '../utils/logger.js';

interface RaceRow {
  id: string;
  course: string;
  country: string;
  discipline: Discipline;
  race_number: number | null;
  field_size: number;
  time_local: string;
  timezone_name: string;
  utc_datetime: string;
  favorite_name: string | null;
  favorite_odds: string | null;
  second_favorite_name: string | null;
  second_favorite_odds: string | null;
  race_url: string;
  form_guide_url: string | null;
  grade: string | null;
  distance: string | null;
  surface: string | null;
  data_sources: Record<string, string>;
  value_score: number;
}

interface RunnerRow {
  name: string;
  odds_string: string | null;
}

function ranked(name: string | null, odds: string | null): RankedRunner | null {
  if (!name) return null;
  return { name, oddsString: odds, oddsFractional: parseOdds(odds) };
}

function toSummary(row: RaceRow): StoredRaceSummary {
  return {
    id: row.id,
    course: row.course,
    country: row.country,
    discipline: row.discipline,
    utcDatetime: row.utc_datetime,
    timeLocal: row.time_local,
    timezoneName: row.timezone_name,
    fieldSize: row.field_size,
    valueScore: row.value_score,
    formGuideUrl: row.form_guide_url,
  };
}

function toRace(row: RaceRow, runners: RunnerRow[]): Race {
  return {
    id: row.id,
    course: row.course,
    country: row.country,
    discipline: row.discipline,
    raceNumber: row.race_number,
    fieldSize: row.field_size,
    timeLocal: row.time_local,
    timezoneName: row.timezone_name,
    utcDatetime: row.utc_datetime,
    favorite: ranked(row.favorite_name, row.favorite_odds),
    secondFavorite: ranked(row.second_favorite_name, row.second_favorite_odds),
    allRunners: runners.map((r) => ({ name: r.name, oddsString: r.odds_string })),
    raceUrl: row.race_url,
    grade: row.grade,
    distance: row.distance,
    surface: row.surface,
    dataSources: row.data_sources,
    formGuideUrl: row.form_guide_url,
    valueScore: row.value_score,
  };
}

/**
 * Races keyed by their stable id. Re-saving a race replaces its runners,
 * keeps an existing form guide link and unions provenance.
 */
export class PostgresRaceStore implements RaceStore {
  constructor(private readonly sql: Sql) {}

  async saveRaces(races: Race[]): Promise<number> {
    if (races.length === 0) return 0;

    await this.sql.begin(async (tx) => {
      for (const race of races) {
        const localDate = utcToLocal(race.utcDatetime, race.timezoneName)?.date ?? race.utcDatetime.slice(0, 10);
        await tx`
          INSERT INTO races (
            id, course, country, discipline, race_number, field_size, time_local, timezone_name,
            utc_datetime, local_date, favorite_name, favorite_odds, second_favorite_name, second_favorite_odds,
            race_url, form_guide_url, grade, distance, surface, data_sources, value_score
          ) VALUES (
            ${race.id}, ${race.course}, ${race.country}, ${race.discipline}, ${race.raceNumber},
            ${race.fieldSize}, ${race.timeLocal}, ${race.timezoneName}, ${race.utcDatetime}, ${localDate},
            ${race.favorite?.name ?? null}, ${race.favorite?.oddsString ?? null},
            ${race.secondFavorite?.name ?? null}, ${race.secondFavorite?.oddsString ?? null},
            ${race.raceUrl}, ${race.formGuideUrl}, ${race.grade}, ${race.distance}, ${race.surface},
            ${tx.json(race.dataSources)}, ${race.valueScore}
          )
          ON CONFLICT (id) DO UPDATE SET
            course = EXCLUDED.course,
            country = EXCLUDED.country,
            discipline = EXCLUDED.discipline,
            race_number = EXCLUDED.race_number,
            field_size = EXCLUDED.field_size,
            time_local = EXCLUDED.time_local,
            timezone_name = EXCLUDED.timezone_name,
            utc_datetime = EXCLUDED.utc_datetime,
            local_date = EXCLUDED.local_date,
            favorite_name = EXCLUDED.favorite_name,
            favorite_odds = EXCLUDED.favorite_odds,
            second_favorite_name = EXCLUDED.second_favorite_name,
            second_favorite_odds = EXCLUDED.second_favorite_odds,
            race_url = EXCLUDED.race_url,
            form_guide_url = COALESCE(races.form_guide_url, EXCLUDED.form_guide_url),
            grade = EXCLUDED.grade,
            distance = EXCLUDED.distance,
            surface = EXCLUDED.surface,
            data_sources = races.data_sources || EXCLUDED.data_sources,
            value_score = EXCLUDED.value_score,
            updated_at = NOW()
        `;

        await tx`DELETE FROM runners WHERE race_id = ${race.id}`;
        for (const [position, runner] of race.allRunners.entries()) {
          await tx`
            INSERT INTO runners (race_id, position, name, odds_string)
            VALUES (${race.id}, ${position}, ${runner.name}, ${runner.oddsString})
          `;
        }
      }
    });

    logger.debug({ count: races.length }, 'Races saved');
    return races.length;
  }

  async listRaces(query: RaceQuery): Promise<StoredRaceSummary[]> {
    const rows = await this.sql<RaceRow[]>`
      SELECT ${this.columns()}
      FROM races
      WHERE true
      ${query.date ? this.sql`AND local_date = ${query.date}` : this.sql``}
      ${query.discipline ? this.sql`AND discipline = ${query.discipline}` : this.sql``}
      ORDER BY value_score DESC, utc_datetime ASC
      LIMIT ${query.limit}
    `;
    return rows.map(toSummary);
  }

  async getRace(id: string): Promise<Race | null> {
    const [row] = await this.sql<RaceRow[]>`SELECT ${this.columns()} FROM races WHERE id = ${id}`;
    if (!row) return null;
    const runners = await this.sql<RunnerRow[]>`
      SELECT name, odds_string FROM runners WHERE race_id = ${id} ORDER BY position
    `;
    return toRace(row, runners);
  }

  async ping(): Promise<boolean> {
    try {
      await this.sql`SELECT 1 AS ok`;
      return true;
    } catch (err) {
      logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'Race store unreachable');
      return false;
    }
  }

  private columns() {
    return this.sql`
      id, course, country, discipline, race_number, field_size, time_local, timezone_name,
      to_char(utc_datetime AT TIME ZONE 'UTC', 'YYYY-MM-DD"T"HH24:MI:SS.MS"Z"') AS utc_datetime,
      favorite_name, favorite_odds, second_favorite_name, second_favorite_odds,
      race_url, form_guide_url, grade, distance, surface, data_sources, value_score
    `;
  }
}
