import { z } from 'zod';
import type { DateRange, FormGuideFeed, FormGuideMeeting, PageFetcher } from '../types/adapter.js';

export const RACING_AND_SPORTS_FEED_URL = 'https://www.racingandsports.com.au/todays-racing-json-v2';

const meetingSchema = z.object({
  Course: z.string().nullish(),
  PDFUrl: z.string().nullish(),
  PreMeetingUrl: z.string().nullish(),
});

const feedSchema = z.array(
  z.object({
    Countries: z
      .array(z.object({ Meetings: z.array(z.unknown()).default([]) }))
      .default([]),
  }),
);

/**
 * Flattens the discipline → country → meeting tree. The PDF form guide is
 * preferred; meetings with neither link are dropped.
 */
export function parseFormGuideFeed(payload: unknown): FormGuideMeeting[] {
  const meetings: FormGuideMeeting[] = [];
  for (const discipline of feedSchema.parse(payload)) {
    for (const country of discipline.Countries) {
      for (const item of country.Meetings) {
        const meeting = meetingSchema.safeParse(item);
        if (!meeting.success) continue;
        const course = meeting.data.Course?.trim();
        const link = meeting.data.PDFUrl || meeting.data.PreMeetingUrl;
        if (course && link) meetings.push({ course, link });
      }
    }
  }
  return meetings;
}

/** Today's Racing & Sports meetings, used to attach form guide links. */
export class RacingAndSportsFeed implements FormGuideFeed {
  readonly sourceTag = 'R&S';

  constructor(
    private readonly fetcher: PageFetcher,
    private readonly url = RACING_AND_SPORTS_FEED_URL,
  ) {}

  /** The feed only covers today; the range is not sent. */
  async fetchMeetings(_range: DateRange, signal?: AbortSignal): Promise<FormGuideMeeting[]> {
    const body = await this.fetcher.fetchText(this.url, { signal });
    if (body === null) throw new Error(`Form guide feed unavailable: ${this.url}`);
    return parseFormGuideFeed(JSON.parse(body));
  }
}
