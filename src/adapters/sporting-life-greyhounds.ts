import { BaseAdapter, cleanText, titleFromSlug, type FetchRun, type ParsedLinks } from './base-adapter.js';
import type { DateRange, SourceAdapterConfig } from '../types/adapter.js';
import type { RawRace, Runner } from '../types/race.js';

const MEETING_PATH = /^\/greyhounds\/racecards\/([a-z0-9-]+)\/(\d{4}-\d{2}-\d{2})$/;
const RACE_PATH = /^\/greyhounds\/racecards\/([a-z0-9-]+)\/(\d{4}-\d{2}-\d{2})\/(\d{3,4})$/;

/**
 * Sporting Life greyhound racecards (UK and Ireland tracks).
 *
 * The index lists today's meetings as `/greyhounds/racecards/{track}/{date}`,
 * each meeting page links its races as `.../{date}/{HHMM}`, and a race page
 * is a table of traps: trap, greyhound, form..., price in the last cell.
 */
export class SportingLifeGreyhoundsAdapter extends BaseAdapter {
  readonly config: SourceAdapterConfig = {
    id: 'sportinglife-greyhounds',
    name: 'Sporting Life Greyhounds',
    baseUrl: 'https://www.sportinglife.com',
    sourceTag: 'SportingLife',
    disciplines: ['greyhound'],
  };

  protected async collect(range: DateRange, run: FetchRun): Promise<RawRace[]> {
    const index = await this.fetchPage(`${this.config.baseUrl}/greyhounds/racecards`, run);
    if (!index) return [];

    const days = new Set(this.days(range));
    const listed = this.parseIndex(index);
    run.skipped += listed.skipped;
    const meetings = listed.links.filter((m) => days.has(m.date));

    const raceUrls = (
      await Promise.all(
        meetings.map(async (meeting) => {
          const html = await this.fetchPage(meeting.url, run);
          if (!html) return [];
          const races = this.parseMeeting(html);
          run.skipped += races.skipped;
          return races.links;
        }),
      )
    ).flat();

    const races = await Promise.all(
      raceUrls.map(async (url) => {
        const html = await this.fetchPage(url, run);
        if (!html) return null;
        const race = this.parseRace(html, url);
        if (!race) run.skipped++;
        return race;
      }),
    );
    return races.filter((race): race is RawRace => race !== null);
  }

  /** Meeting links on the racecards index, de-duplicated and sorted. */
  parseIndex(html: string): ParsedLinks<{ url: string; date: string }> {
    const $ = this.load(html);
    const found = new Map<string, string>();
    let skipped = 0;
    $('a[href]').each((_i, el) => {
      const href = $(el).attr('href') ?? '';
      const date = MEETING_PATH.exec(href)?.[2];
      if (!date) return;
      const url = this.absoluteUrl(href);
      if (url) found.set(url, date);
      else skipped++;
    });
    const links = [...found.entries()].sort(([a], [b]) => a.localeCompare(b)).map(([url, date]) => ({ url, date }));
    return { links, skipped };
  }

  parseMeeting(html: string): ParsedLinks {
    const $ = this.load(html);
    const found = new Set<string>();
    let skipped = 0;
    $('a[href]').each((_i, el) => {
      const href = $(el).attr('href') ?? '';
      if (!RACE_PATH.test(href)) return;
      const url = this.absoluteUrl(href);
      if (url) found.add(url);
      else skipped++;
    });
    return { links: [...found].sort(), skipped };
  }

  /** Course, date and time come from the URL; runners from the trap table. */
  parseRace(html: string, url: string): RawRace | null {
    const [, slug, date, digits] = RACE_PATH.exec(new URL(url).pathname) ?? [];
    if (!slug || !date || !digits) return null;
    const hhmm = digits.padStart(4, '0');
    const time = `${hhmm.slice(0, 2)}:${hhmm.slice(2)}`;

    const $ = this.load(html);
    const runners: Runner[] = [];
    $('tbody tr').each((_i, row) => {
      const cells = $(row).find('td');
      if (cells.length < 2) return;
      const name = cleanText(cells.eq(1).text());
      if (!name) return;
      const odds = cells.length >= 3 ? cleanText(cells.last().text()) : '';
      runners.push({ name, oddsString: odds || null });
    });
    if (runners.length === 0) return null;

    const grade = cleanText($('.race-grade').first().text()) || null;
    const distance = cleanText($('.race-distance').first().text()) || null;

    return this.makeRace({
      course: titleFromSlug(slug),
      date,
      time,
      discipline: 'greyhound',
      country: 'GB',
      runners,
      raceUrl: url,
      timezoneName: this.timezones.forCountry('GB'),
      grade,
      distance,
      groups: ['course', 'runners', 'odds'],
    });
  }
}
