import { request, type Dispatcher } from 'undici';
import { matchesThresholds } from '../pipeline/thresholds.js';
import type { Race } from '../types/race.js';
import type { Thresholds } from '../types/report.js';
import { logger } from '../utils/logger.js';
import type { AlertDedup } from './alert-dedup.js';

export function escapeMarkdownV2(text: string): string {
  return text.replace(/([_*\[\]()~`>#+\-=|{}.!\\])/g, '\\$1');
}

const ICONS: Record<Race['discipline'], string> = {
  thoroughbred: '\u{1F40E}',
  greyhound: '\u{1F415}',
  harness: '\u{1F3C7}',
};

export function formatRace(race: Race, index: number): string {
  const fav = race.favorite ? `${race.favorite.name} ${race.favorite.oddsString ?? ''}`.trim() : '-';
  const second = race.secondFavorite ? `${race.secondFavorite.name} ${race.secondFavorite.oddsString ?? ''}`.trim() : '-';

  const lines = [
    `${ICONS[race.discipline]} *#${index + 1} ${escapeMarkdownV2(race.course)}* ${escapeMarkdownV2(race.timeLocal)} \\(${escapeMarkdownV2(race.timezoneName)}\\)`,
    `Field ${race.fieldSize} \\| Score ${escapeMarkdownV2(race.valueScore.toFixed(1))}`,
    `Fav: ${escapeMarkdownV2(fav)} \\| 2nd: ${escapeMarkdownV2(second)}`,
  ];
  if (race.raceUrl) lines.push(`[Racecard](${race.raceUrl.replace(/([)\\])/g, '\\$1')})`);
  return lines.join('\n');
}

export function formatAlertMessage(races: Race[], generatedAt: Date = new Date()): string {
  const header = `\u{1F3AF} *Race Alerts \\- ${races.length} matching*\n`;
  const body = races.map((race, i) => formatRace(race, i)).join('\n\n');
  const footer = `\n\n_Generated at ${escapeMarkdownV2(generatedAt.toISOString())}_`;
  return header + body + footer;
}

export interface TelegramOptions {
  botToken: string;
  chatId: string;
  maxRaces: number;
  thresholds: Thresholds;
  dedup: AlertDedup;
  dispatcher?: Dispatcher;
}

export interface RaceAlerter {
  /** Returns how many races were announced. */
  notify(races: Race[]): Promise<number>;
}

/** Posts the races that pass the tipsheet thresholds, each at most once a day. */
export class TelegramAlerter implements RaceAlerter {
  constructor(private readonly options: TelegramOptions) {}

  async notify(races: Race[]): Promise<number> {
    const matching = races.filter((race) => matchesThresholds(race, this.options.thresholds));
    const fresh = await this.options.dedup.claimUnsent(matching, this.options.maxRaces);
    if (fresh.length === 0) return 0;

    const url = `https://api.telegram.org/bot${this.options.botToken}/sendMessage`;
    try {
      const { statusCode, body } = await request(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          chat_id: this.options.chatId,
          text: formatAlertMessage(fresh),
          parse_mode: 'MarkdownV2',
          disable_web_page_preview: true,
        }),
        dispatcher: this.options.dispatcher,
      });
      await body.dump();
      if (statusCode >= 400) {
        logger.error({ statusCode }, 'Telegram rejected alert message');
        return 0;
      }
    } catch (err) {
      logger.error({ err: err instanceof Error ? err.message : String(err) }, 'Failed to send Telegram message');
      return 0;
    }

    logger.info({ count: fresh.length }, 'Telegram alert sent');
    return fresh.length;
  }
}
