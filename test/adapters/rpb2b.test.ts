import { describe, it, expect } from 'vitest';
import { Rpb2bAdapter } from '../../src/adapters/rpb2b.js';
import { SourceUnavailableError } from '../../src/types/errors.js';
import { FakeFetcher, referenceContext } from '../helpers/fakes.js';
import { loadFixture, loadJsonFixture } from '../helpers/fixture-loader.js';

const DAILY = 'https://backend-us-racecards.widget.rpb2b.com/v2/racecards/daily/2024-05-01';
const RANGE = { start: '2024-05-01', end: '2024-05-01' };

describe('Rpb2bAdapter', () => {
  const { timezones } = referenceContext();
  const adapter = new Rpb2bAdapter(new FakeFetcher(), timezones);

  it('should convert UTC start times to the track zone', () => {
    const page = adapter.parseDaily(loadJsonFixture('rpb2b', 'daily.json'));

    expect(page.races.map((r) => [r.course, r.date, r.time, r.timezoneName])).toEqual([
      ['Santa Anita', '2024-05-01', '13:00', 'America/Los_Angeles'],
      ['Woodbine', '2024-05-01', '19:15', 'America/Toronto'],
    ]);
  });

  it('should carry the runner count without runners', () => {
    const [race] = adapter.parseDaily(loadJsonFixture('rpb2b', 'daily.json')).races;

    expect(race).toMatchObject({
      sourceId: 'rpb2b-us',
      raceNumber: null,
      fieldSize: 8,
      runners: [],
      country: 'US',
      grade: 'Maiden Special Weight',
      distance: '6f',
      raceUrl: 'https://www.skysports.com/racing/racecards/santa-anita/2024-05-01',
      dataSources: { course: 'RPB2B', fieldSize: 'RPB2B' },
    });
  });

  it('should skip bad meetings and races', () => {
    const page = adapter.parseDaily(loadJsonFixture('rpb2b', 'daily.json'));
    expect(page.skipped).toBe(3);
    expect(page.races[1]?.country).toBe('CA');
  });

  it('should reject a payload that is not a meeting list', () => {
    expect(() => adapter.parseDaily({ error: 'maintenance' })).toThrow();
  });

  it('should mark the source unavailable on an unreadable payload', async () => {
    const fetcher = new FakeFetcher({ [DAILY]: '{"error":"maintenance"}' });
    const result = await new Rpb2bAdapter(fetcher, timezones).fetchRaces(RANGE);

    expect(result.races).toEqual([]);
    expect(result.error).toBeInstanceOf(SourceUnavailableError);
    expect(result.skippedFragments).toBe(1);
  });

  it('should keep the days that parse when another day is unreadable', async () => {
    const fetcher = new FakeFetcher({
      [DAILY]: loadFixture('rpb2b', 'daily.json'),
      'https://backend-us-racecards.widget.rpb2b.com/v2/racecards/daily/2024-05-02': '<html>challenge</html>',
    });
    const result = await new Rpb2bAdapter(fetcher, timezones).fetchRaces({ start: '2024-05-01', end: '2024-05-02' });

    expect(result.error).toBeNull();
    expect(result.races.map((r) => r.course)).toEqual(['Santa Anita', 'Woodbine']);
    expect(result.skippedFragments).toBe(4);
  });

  it('should fetch one payload per day', async () => {
    const fetcher = new FakeFetcher({ [DAILY]: loadFixture('rpb2b', 'daily.json') });
    const result = await new Rpb2bAdapter(fetcher, timezones).fetchRaces(RANGE);

    expect(fetcher.requested).toEqual([DAILY]);
    expect(result.races).toHaveLength(2);
    expect(result.skippedFragments).toBe(3);
  });
});
