import { z } from 'zod';
import { BaseAdapter, type FetchRun, type ParsedPage } from './base-adapter.js';
import type { DateRange, SourceAdapterConfig } from '../types/adapter.js';
import type { RawRace } from '../types/race.js';
import { utcToLocal } from '../utils/date.js';
import { logger } from '../utils/logger.js';

const raceSchema = z.object({
  datetimeUtc: z.string(),
  numberOfRunners: z.number().int().nonnegative(),
  raceTitle: z.string().nullish(),
  distance: z.string().nullish(),
});

const meetingSchema = z.object({
  name: z.string().min(1),
  countryCode: z.string().min(1),
  races: z.array(z.unknown()).default([]),
});

/**
 * North American racecards widget API. One JSON array of meetings per day;
 * start times are UTC and only the runner count is published, no names or
 * prices.
 */
export class Rpb2bAdapter extends BaseAdapter {
  readonly config: SourceAdapterConfig = {
    id: 'rpb2b-us',
    name: 'RPB2B US Racecards',
    baseUrl: 'https://backend-us-racecards.widget.rpb2b.com',
    sourceTag: 'RPB2B',
    disciplines: ['thoroughbred'],
  };

  protected async collect(range: DateRange, run: FetchRun): Promise<RawRace[]> {
    let readDays = 0;
    let unreadableDays = 0;

    const perDay = await Promise.all(
      this.days(range).map(async (date) => {
        const url = `${this.config.baseUrl}/v2/racecards/daily/${date}`;
        const body = await this.fetchPage(url, run);
        if (!body) return [];

        const page = this.readDaily(body, url);
        if (!page) {
          unreadableDays++;
          run.skipped++;
          return [];
        }
        readDays++;
        run.skipped += page.skipped;
        return page.races;
      }),
    );

    if (unreadableDays > 0 && readDays === 0) {
      throw new Error(`no readable daily payload (${unreadableDays} unreadable)`);
    }
    return perDay.flat();
  }

  /** Null for a day whose body is not JSON or not a meeting list; the other days still count. */
  private readDaily(body: string, url: string): ParsedPage | null {
    try {
      return this.parseDaily(JSON.parse(body));
    } catch (err) {
      logger.debug({ url, err: err instanceof Error ? err.message : String(err) }, 'Unreadable daily payload');
      return null;
    }
  }

  /** Throws when the payload is not a meeting list at all; bad meetings and races are skipped. */
  parseDaily(payload: unknown): ParsedPage {
    const meetings = z.array(z.unknown()).parse(payload);
    const races: RawRace[] = [];
    let skipped = 0;

    for (const item of meetings) {
      const meeting = meetingSchema.safeParse(item);
      if (!meeting.success) {
        skipped++;
        continue;
      }
      const { name, countryCode } = meeting.data;
      const timezoneName = this.timezones.resolve(name, countryCode);

      for (const raceItem of meeting.data.races) {
        const race = raceSchema.safeParse(raceItem);
        const local = race.success ? utcToLocal(race.data.datetimeUtc, timezoneName) : null;
        if (!race.success || !local) {
          skipped++;
          continue;
        }

        races.push(
          this.makeRace({
            course: name,
            date: local.date,
            time: local.time,
            timezoneName,
            discipline: 'thoroughbred',
            country: countryCode.toUpperCase(),
            runners: [],
            fieldSize: race.data.numberOfRunners,
            raceUrl: `https://www.skysports.com/racing/racecards/${name.toLowerCase().replace(/\s+/g, '-')}/${local.date}`,
            grade: race.data.raceTitle ?? null,
            distance: race.data.distance ?? null,
            groups: ['course', 'fieldSize'],
          }),
        );
      }
    }

    return { races, skipped };
  }
}
