import type { Race } from '../types/race.js';
import type { ScanReport, Thresholds } from '../types/report.js';
import { matchesThresholds } from '../pipeline/thresholds.js';

const ICONS: Record<Race['discipline'], string> = {
  thoroughbred: 'Ⓣ',
  greyhound: 'Ⓖ',
  harness: 'Ⓗ',
};

const STYLE = `
:root{color-scheme:light dark}
body{font-family:system-ui,Segoe UI,Roboto,Helvetica,Arial,sans-serif;background:#f7f7f9;color:#222;margin:20px}
@media (max-width:640px){body{margin:8px}}
.container{max-width:1080px;margin:auto;background:#fff;padding:20px;border-radius:8px;box-shadow:0 2px 12px rgba(0,0,0,.06)}
h1{margin:0 0 16px}
.meta{color:#666;font-size:.9rem;margin-bottom:16px}
.race{border:1px solid #e6e6ef;border-left:4px solid #5b8def;border-radius:6px;padding:12px;margin:10px 0;background:#fff}
.race.match{border-left-color:#2fb344;background:#f8fff8}
.head{display:flex;flex-wrap:wrap;align-items:center;gap:8px;font-weight:600}
.pill{display:inline-block;padding:2px 8px;border-radius:999px;background:#eef1f6;color:#334;font-size:.85rem}
.links a{display:inline-block;margin-right:8px;margin-top:8px;text-decoration:none;color:#fff;background:#007bff;padding:6px 10px;border-radius:4px}
.links a.alt{background:#6c757d}
.kv{font-size:.95rem;margin-top:6px}
`;

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function runnerLabel(runner: Race['favorite']): string {
  if (!runner) return '-';
  return `${escapeHtml(runner.name)} (${escapeHtml(runner.oddsString ?? '')})`;
}

export function renderRaceCard(race: Race, thresholds: Thresholds): string {
  const classes = matchesThresholds(race, thresholds) ? 'race match' : 'race';
  const links = [`<a href="${escapeHtml(race.raceUrl)}" target="_blank" rel="noopener">Racecard</a>`];
  if (race.formGuideUrl) {
    links.push(`<a class="alt" href="${escapeHtml(race.formGuideUrl)}" target="_blank" rel="noopener">Form</a>`);
  }

  return [
    `<div class="${classes}" data-race-id="${escapeHtml(race.id)}">`,
    `<div class="head">${ICONS[race.discipline]} ${escapeHtml(race.course)} (${escapeHtml(race.country)})`,
    `<span class="pill">${escapeHtml(race.timeLocal)} ${escapeHtml(race.timezoneName)}</span>`,
    `<span class="pill">Field ${race.fieldSize}</span>`,
    `<span class="pill">Score ${race.valueScore.toFixed(1)}</span>`,
    `</div>`,
    `<div class="kv"><b>Fav:</b> ${runnerLabel(race.favorite)} &nbsp; <b>2nd:</b> ${runnerLabel(race.secondFavorite)}</div>`,
    `<div class="links">${links.join('')}</div>`,
    `</div>`,
  ].join('\n');
}

/** Standalone page: inline styles, no scripts, every scraped string escaped. */
export function renderHtmlReport(report: ScanReport, thresholds: Thresholds): string {
  const { stats } = report;
  const matching = report.races.filter((race) => matchesThresholds(race, thresholds)).length;
  const meta = [
    `Generated ${escapeHtml(report.generatedAt)}`,
    `Races: ${report.races.length}`,
    `Matching: ${matching}`,
    `Cache hits: ${stats.http?.cacheHits ?? 0}`,
    `Misses: ${stats.http?.cacheMisses ?? 0}`,
    `Runtime: ${(stats.durationMs / 1000).toFixed(1)}s`,
  ];
  if (stats.cancelled) meta.push('Partial (cancelled)');

  const cards = report.races.map((race) => renderRaceCard(race, thresholds));

  return [
    '<!doctype html>',
    '<html><head><meta charset="utf-8"><meta name="viewport" content="width=device-width, initial-scale=1">',
    `<title>Racing Report ${escapeHtml(report.range.start)}</title>`,
    `<style>${STYLE}</style>`,
    '</head><body><div class="container">',
    '<h1>Racing Report</h1>',
    `<div class="meta">${meta.join(' • ')}</div>`,
    ...cards,
    '</div></body></html>',
    '',
  ].join('\n');
}
