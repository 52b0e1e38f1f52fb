import { BaseAdapter, cleanText, type FetchRun, type ParsedLinks, type ParsedPage } from './base-adapter.js';
import type { DateRange, SourceAdapterConfig } from '../types/adapter.js';
import type { RawRace, Runner } from '../types/race.js';
import { dayMonthYear, parseLocalHhmm } from '../utils/date.js';

const RACE_HEADING = /race\s*(\d+)/i;

/**
 * Harness Racing Australia fields.
 *
 * The per-day fields index links every meeting; a meeting page has the
 * track in its `<h1>` and one `table.raceFieldTable` per race, headed by a
 * line like "Race 3 - 7:42 PM - PACE 2150m". Fields carry no prices.
 */
export class HarnessAustraliaAdapter extends BaseAdapter {
  readonly config: SourceAdapterConfig = {
    id: 'harness-australia',
    name: 'Harness Racing Australia',
    baseUrl: 'https://www.harness.org.au',
    sourceTag: 'HRA',
    disciplines: ['harness'],
  };

  protected async collect(range: DateRange, run: FetchRun): Promise<RawRace[]> {
    const perDay = await Promise.all(
      this.days(range).map(async (date) => {
        const index = await this.fetchPage(this.indexUrl(date), run);
        if (!index) return [];

        const meetings = this.parseIndex(index);
        run.skipped += meetings.skipped;

        const pages = await Promise.all(
          meetings.links.map(async (url) => {
            const html = await this.fetchPage(url, run);
            if (!html) return [];
            const page = this.parseMeeting(html, url, date);
            run.skipped += page.skipped;
            return page.races;
          }),
        );
        return pages.flat();
      }),
    );
    return perDay.flat();
  }

  indexUrl(date: string): string {
    return `${this.config.baseUrl}/racing/fields/?firstDate=${encodeURIComponent(dayMonthYear(date))}&submit=DISPLAY`;
  }

  parseIndex(html: string): ParsedLinks {
    const $ = this.load(html);
    const found = new Set<string>();
    let skipped = 0;
    $('a[href*="/racing/fields/race-fields/"]').each((_i, el) => {
      const href = $(el).attr('href');
      if (!href) return;
      const url = this.absoluteUrl(href);
      if (url) found.add(url);
      else skipped++;
    });
    return { links: [...found].sort(), skipped };
  }

  parseMeeting(html: string, url: string, date: string): ParsedPage {
    const $ = this.load(html);
    const course = cleanText($('h1').first().text()) || cleanText($('.breadcrumbs li').last().text());
    const races: RawRace[] = [];
    let skipped = 0;

    $('table.raceFieldTable').each((_i, table) => {
      const $table = $(table);
      const heading = cleanText($table.find('caption, thead .raceTitle').first().text());
      const time = parseLocalHhmm(heading);
      const raceNumber = Number(RACE_HEADING.exec(heading)?.[1] ?? NaN);

      const runners: Runner[] = [];
      $table.find('tbody tr').each((_j, row) => {
        const cells = $(row).find('td');
        if (cells.length < 2) return;
        const name = cleanText(cells.eq(1).text());
        if (name) runners.push({ name, oddsString: null });
      });

      if (!course || !time || runners.length === 0) {
        skipped++;
        return;
      }

      const distance = /\b(\d{3,4}m)\b/.exec(heading)?.[1] ?? null;
      races.push(
        this.makeRace({
          course,
          date,
          time,
          discipline: 'harness',
          country: 'AU',
          runners,
          raceNumber: Number.isInteger(raceNumber) ? raceNumber : null,
          raceUrl: Number.isInteger(raceNumber) ? `${url}#race${raceNumber}` : url,
          distance,
          groups: ['course', 'runners'],
        }),
      );
    });

    return { races, skipped };
  }
}
