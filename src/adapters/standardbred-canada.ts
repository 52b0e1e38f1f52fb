import { BaseAdapter, cleanText, titleFromSlug, type FetchRun, type ParsedLinks, type ParsedPage } from './base-adapter.js';
import type { DateRange, SourceAdapterConfig } from '../types/adapter.js';
import type { RawRace, Runner } from '../types/race.js';
import { parseLocalHhmm } from '../utils/date.js';

const MEETING_PATH = /^\/racing\/entries\/([a-z0-9-]+)\/(\d{4}-\d{2}-\d{2})$/;

export class StandardbredCanadaAdapter extends BaseAdapter {
  readonly config: SourceAdapterConfig = {
    id: 'standardbred-canada',
    name: 'Standardbred Canada',
    baseUrl: 'https://standardbredcanada.ca',
    sourceTag: 'StandardbredCanada',
    disciplines: ['harness'],
  };

  protected async collect(range: DateRange, run: FetchRun): Promise<RawRace[]> {
    const perDay = await Promise.all(
      this.days(range).map(async (date) => {
        const index = await this.fetchPage(`${this.config.baseUrl}/racing/entries/date/${date}`, run);
        if (!index) return [];

        const meetings = this.parseIndex(index, date);
        run.skipped += meetings.skipped;

        const pages = await Promise.all(
          meetings.links.map(async (url) => {
            const html = await this.fetchPage(url, run);
            if (!html) return [];
            const page = this.parseEntries(html, url, date);
            run.skipped += page.skipped;
            return page.races;
          }),
        );
        return pages.flat();
      }),
    );
    return perDay.flat();
  }

  /** Entries pages for the given day only. */
  parseIndex(html: string, date: string): ParsedLinks {
    const $ = this.load(html);
    const found = new Set<string>();
    let skipped = 0;
    $('a[href]').each((_i, el) => {
      const href = $(el).attr('href') ?? '';
      if (MEETING_PATH.exec(href)?.[2] !== date) return;
      const url = this.absoluteUrl(href);
      if (url) found.add(url);
      else skipped++;
    });
    return { links: [...found].sort(), skipped };
  }

  /**
   * One `section[id^="race-"]` per race; the post time is the first clock
   * time in the section's text outside the entries table, and the horse name
   * is the second cell.
   */
  parseEntries(html: string, url: string, date: string): ParsedPage {
    const $ = this.load(html);
    const slug = MEETING_PATH.exec(new URL(url).pathname)?.[1];
    const course = cleanText($('h1').first().text()) || (slug ? titleFromSlug(slug) : '');
    const races: RawRace[] = [];
    let skipped = 0;

    $('section[id^="race-"], div[id^="race-"]').each((_i, section) => {
      const $section = $(section);
      const raceNumber = Number(/^race-(\d+)$/i.exec($section.attr('id') ?? '')?.[1] ?? NaN);
      const time =
        parseLocalHhmm(cleanText($section.children().not('table').text())) ?? parseLocalHhmm(cleanText($section.text()));

      const runners: Runner[] = [];
      $section.find('tr').each((_j, row) => {
        const cells = $(row).find('td');
        if (cells.length < 2) return;
        const name = cleanText(cells.eq(1).text());
        if (name) runners.push({ name, oddsString: null });
      });

      if (!course || !time || runners.length === 0) {
        skipped++;
        return;
      }

      races.push(
        this.makeRace({
          course,
          date,
          time,
          discipline: 'harness',
          country: 'CA',
          runners,
          raceNumber: Number.isInteger(raceNumber) ? raceNumber : null,
          raceUrl: url,
          groups: ['course', 'runners'],
        }),
      );
    });

    return { races, skipped };
  }
}
