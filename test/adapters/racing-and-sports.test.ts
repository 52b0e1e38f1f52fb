import { describe, it, expect } from 'vitest';
import { RACING_AND_SPORTS_FEED_URL, RacingAndSportsFeed, parseFormGuideFeed } from '../../src/adapters/racing-and-sports.js';
import { FakeFetcher } from '../helpers/fakes.js';
import { loadFixture, loadJsonFixture } from '../helpers/fixture-loader.js';

const RANGE = { start: '2024-05-01', end: '2024-05-01' };

describe('parseFormGuideFeed', () => {
  it('should flatten meetings and prefer the PDF link', () => {
    expect(parseFormGuideFeed(loadJsonFixture('racing-and-sports', 'todays-racing.json'))).toEqual([
      { course: 'Flemington', link: 'https://form.test/2024-05-01/flemington.pdf' },
      { course: 'Randwick', link: 'https://form.test/pre/2024-05-01/randwick' },
    ]);
  });

  it('should reject a payload of the wrong shape', () => {
    expect(() => parseFormGuideFeed({ Countries: [] })).toThrow();
  });
});

describe('RacingAndSportsFeed', () => {
  it('should read the feed URL', async () => {
    const fetcher = new FakeFetcher({
      [RACING_AND_SPORTS_FEED_URL]: loadFixture('racing-and-sports', 'todays-racing.json'),
    });
    const feed = new RacingAndSportsFeed(fetcher);

    expect(feed.sourceTag).toBe('R&S');
    expect(await feed.fetchMeetings(RANGE)).toHaveLength(2);
  });

  it('should reject when the feed cannot be fetched', async () => {
    const feed = new RacingAndSportsFeed(new FakeFetcher(), 'https://form.test/feed.json');
    await expect(feed.fetchMeetings(RANGE)).rejects.toThrow('Form guide feed unavailable: https://form.test/feed.json');
  });
});
