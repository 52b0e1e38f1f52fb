import type { Race } from '../types/race.js';
import type { Thresholds } from '../types/report.js';
import { DEFAULT_THRESHOLDS, matchesThresholds } from '../pipeline/thresholds.js';

export const CSV_COLUMNS = [
  'id',
  'course',
  'country',
  'discipline',
  'local_time',
  'timezone_name',
  'utc_datetime',
  'field_size',
  'value_score',
  'favorite_name',
  'favorite_odds',
  'second_favorite_name',
  'second_favorite_odds',
  'matches',
  'race_url',
  'form_guide_url',
  'data_sources',
] as const;

/** RFC 4180: quote when the value holds a comma, quote, CR or LF; double inner quotes. */
export function csvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function raceRow(race: Race, thresholds: Thresholds): (string | number)[] {
  return [
    race.id,
    race.course,
    race.country,
    race.discipline,
    race.timeLocal,
    race.timezoneName,
    race.utcDatetime,
    race.fieldSize,
    race.valueScore.toFixed(1),
    race.favorite?.name ?? '',
    race.favorite?.oddsString ?? '',
    race.secondFavorite?.name ?? '',
    race.secondFavorite?.oddsString ?? '',
    matchesThresholds(race, thresholds) ? 'yes' : 'no',
    race.raceUrl,
    race.formGuideUrl ?? '',
    JSON.stringify(race.dataSources),
  ];
}

export function renderCsvReport(races: Race[], thresholds: Thresholds = DEFAULT_THRESHOLDS): string {
  const lines = [CSV_COLUMNS.join(',')];
  for (const race of races) {
    lines.push(raceRow(race, thresholds).map(csvField).join(','));
  }
  return `${lines.join('\r\n')}\r\n`;
}
