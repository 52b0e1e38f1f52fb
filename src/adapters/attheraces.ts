import { BaseAdapter, cleanText, type FetchRun, type ParsedPage } from './base-adapter.js';
import type { DateRange, SourceAdapterConfig } from '../types/adapter.js';
import type { RawRace, Runner } from '../types/race.js';
import { compactDate } from '../utils/date.js';

/** Market-movers tab name → country code. */
const REGIONS = {
  uk: 'GB',
  ireland: 'IE',
  usa: 'US',
  france: 'FR',
  saf: 'ZA',
  aus: 'AU',
} as const;

export type AtrRegion = keyof typeof REGIONS;

const REGION_ORDER: AtrRegion[] = ['uk', 'ireland', 'usa', 'france', 'saf', 'aus'];

const RACE_TIME = /^(\d{2}:\d{2})/;

/**
 * At The Races market movers.
 *
 * One AJAX tab per region and day (`/ajax/marketmovers/tabs/{region}/{YYYYMMDD}`).
 * Each meeting is a `.panel` with an `<h2>` course header; each race is a
 * table whose `<caption>` starts with the off time, one row per runner:
 * horse name in the first cell, current price in the second.
 */
export class AtTheRacesAdapter extends BaseAdapter {
  readonly config: SourceAdapterConfig = {
    id: 'attheraces',
    name: 'At The Races',
    baseUrl: 'https://www.attheraces.com',
    sourceTag: 'ATR',
    disciplines: ['thoroughbred'],
  };

  protected async collect(range: DateRange, run: FetchRun): Promise<RawRace[]> {
    const jobs = this.days(range).flatMap((date) =>
      REGION_ORDER.map(async (region) => {
        const url = `${this.config.baseUrl}/ajax/marketmovers/tabs/${region}/${compactDate(date)}`;
        const html = await this.fetchPage(url, run);
        if (!html) return [];
        const page = this.parseMarketMovers(html, region, date);
        run.skipped += page.skipped;
        return page.races;
      }),
    );
    return (await Promise.all(jobs)).flat();
  }

  parseMarketMovers(html: string, region: AtrRegion, date: string): ParsedPage {
    const $ = this.load(html);
    const country = REGIONS[region];
    const races: RawRace[] = [];
    let skipped = 0;
    let currentCourse = '';

    $('h2, caption').each((_i, el) => {
      const $el = $(el);
      if (el.tagName === 'h2') {
        currentCourse = cleanText($el.text());
        return;
      }

      const time = RACE_TIME.exec(cleanText($el.text()))?.[1];
      if (!time) return;

      const course = cleanText($el.closest('.panel').find('h2').first().text()) || currentCourse;
      const $table = $el.closest('table');
      const $rows = $table.find('tbody tr').length > 0 ? $table.find('tbody tr') : $table.find('tr');

      const runners: Runner[] = [];
      $rows.each((_j, row) => {
        const cells = $(row).find('td, th');
        if (cells.length < 2) return;
        const name = cleanText(cells.eq(0).text());
        if (name) runners.push({ name, oddsString: cleanText(cells.eq(1).text()) || null });
      });

      if (!course || runners.length === 0) {
        skipped++;
        return;
      }

      races.push(
        this.makeRace({
          course,
          date,
          time,
          discipline: 'thoroughbred',
          country,
          runners,
          raceUrl: this.racecardUrl(course, date, time),
          groups: ['course', 'runners', 'odds'],
        }),
      );
    });

    return { races, skipped };
  }

  racecardUrl(course: string, date: string, time: string): string {
    const slug = course.trim().toLowerCase().replace(/\s+/g, '-');
    return `${this.config.baseUrl}/racecard/${encodeURIComponent(slug)}/${date}/${time.replace(':', '')}`;
  }
}
