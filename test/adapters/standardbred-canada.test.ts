import { describe, it, expect } from 'vitest';
import { StandardbredCanadaAdapter } from '../../src/adapters/standardbred-canada.js';
import { FakeFetcher, referenceContext } from '../helpers/fakes.js';
import { loadFixture } from '../helpers/fixture-loader.js';

const MOHAWK = 'https://standardbredcanada.ca/racing/entries/woodbine-mohawk-park/2024-05-01';

describe('StandardbredCanadaAdapter', () => {
  const { timezones } = referenceContext();
  const adapter = new StandardbredCanadaAdapter(new FakeFetcher(), timezones);

  it('should keep entries links for the requested day only', () => {
    expect(adapter.parseIndex(loadFixture('standardbred-canada', 'entries-index.html'), '2024-05-01')).toEqual({
      links: [MOHAWK],
      skipped: 0,
    });
  });

  it('should read one race per section', () => {
    const page = adapter.parseEntries(loadFixture('standardbred-canada', 'entries-mohawk.html'), MOHAWK, '2024-05-01');

    expect(page.skipped).toBe(1);
    expect(page.races).toHaveLength(1);
    expect(page.races[0]).toMatchObject({
      course: 'Woodbine Mohawk Park',
      time: '19:00',
      timezoneName: 'America/Toronto',
      raceNumber: 1,
      country: 'CA',
      fieldSize: 2,
      raceUrl: MOHAWK,
      dataSources: { course: 'StandardbredCanada', runners: 'StandardbredCanada' },
    });
    expect(page.races[0]?.runners.map((r) => r.name)).toEqual(['Maple Leaf Rag', 'Northern Lights']);
  });

  it('should fall back to the URL slug for the course', () => {
    const page = adapter.parseEntries(
      '<section id="race-3"><p>10:15 PM</p><table><tr><td>1</td><td>Late Show</td></tr></table></section>',
      MOHAWK,
      '2024-05-01',
    );
    expect(page.races[0]?.course).toBe('Woodbine Mohawk Park');
    expect(page.races[0]?.time).toBe('22:15');
    expect(page.races[0]?.raceNumber).toBe(3);
  });

  it('should read an evening post time written straight before the entries table', () => {
    const page = adapter.parseEntries(
      '<h1>Woodbine Mohawk Park</h1><section id="race-4">Post Time: 9:40 PM<table><tr><td>1</td><td>Night Owl</td></tr></table></section>',
      MOHAWK,
      '2024-05-01',
    );
    expect(page.skipped).toBe(0);
    expect(page.races[0]?.time).toBe('21:40');
  });

  it('should fetch the day index and each meeting', async () => {
    const fetcher = new FakeFetcher({
      'https://standardbredcanada.ca/racing/entries/date/2024-05-01': loadFixture('standardbred-canada', 'entries-index.html'),
      [MOHAWK]: loadFixture('standardbred-canada', 'entries-mohawk.html'),
    });
    const result = await new StandardbredCanadaAdapter(fetcher, timezones).fetchRaces({
      start: '2024-05-01',
      end: '2024-05-01',
    });

    expect(fetcher.requested).toEqual(['https://standardbredcanada.ca/racing/entries/date/2024-05-01', MOHAWK]);
    expect(result.races).toHaveLength(1);
    expect(result.skippedFragments).toBe(1);
  });
});
