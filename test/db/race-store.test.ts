import { describe, it, expect } from 'vitest';
import type { Sql } from 'postgres';
import { PostgresRaceStore } from '../../src/db/race-store.js';
import { makeRace } from '../helpers/races.js';

interface RecordedQuery {
  text: string;
  values: unknown[];
}

/** Tagged-template stand-in for postgres.js that records each query instead of running it. */
function recordingSql() {
  const queries: RecordedQuery[] = [];
  const tx = Object.assign(
    (strings: TemplateStringsArray, ...values: unknown[]) => {
      queries.push({ text: strings.join('$').replace(/\s+/g, ' ').trim(), values });
      return Promise.resolve([]);
    },
    { json: (value: unknown) => ({ json: value }) },
  );
  const sql = Object.assign(tx, {
    begin: async (work: (transaction: typeof tx) => Promise<unknown>) => work(tx),
  });
  return { sql: sql as unknown as Sql, queries };
}

describe('PostgresRaceStore', () => {
  it('should upsert each race with bound parameters and replace its runners', async () => {
    const { sql, queries } = recordingSql();
    const race = makeRace();

    expect(await new PostgresRaceStore(sql).saveRaces([race])).toBe(1);

    expect(queries).toHaveLength(5);
    expect(queries[0]?.text.startsWith('INSERT INTO races (')).toBe(true);
    expect(queries[0]?.values.slice(0, 10)).toEqual([
      'race-1',
      'Ascot',
      'GB',
      'thoroughbred',
      null,
      3,
      '14:05',
      'Europe/London',
      '2024-05-01T13:05:00.000Z',
      '2024-05-01',
    ]);
    expect(queries[0]?.values[19]).toEqual({ json: { course: 'ATR', runners: 'ATR', odds: 'ATR' } });
    expect(queries[1]).toEqual({ text: 'DELETE FROM runners WHERE race_id = $', values: ['race-1'] });
    expect(queries.slice(2).map((q) => q.values)).toEqual([
      ['race-1', 0, 'Alpha', '2/1'],
      ['race-1', 1, 'Bravo', '4/1'],
      ['race-1', 2, 'Charlie', '8/1'],
    ]);
  });

  it('should not open a transaction for an empty batch', async () => {
    const { sql, queries } = recordingSql();

    expect(await new PostgresRaceStore(sql).saveRaces([])).toBe(0);
    expect(queries).toEqual([]);
  });
});
