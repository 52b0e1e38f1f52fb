import type { RankedRunner, Runner } from '../types/race.js';

/** Sentinel for SP, non-runners and anything unparsable. Sorts after every real price. */
export const UNKNOWN_ODDS = 999;

const NUMBER = /^\d+(\.\d+)?$/;

/**
 * Converts a published price to fractional odds (profit per unit staked).
 *
 * '5/2' → 2.5, 'EVS' → 1, '3.5' (decimal) → 2.5, 'SP' / '' / junk → UNKNOWN_ODDS.
 */
export function parseOdds(value: string | null | undefined): number {
  if (typeof value !== 'string') return UNKNOWN_ODDS;

  const s = value
    .trim()
    .toUpperCase()
    .replace(/\s+/g, '')
    .replace(/-/g, '/')
    .replace(/(JF|F|C)$/, '');

  if (!s || s === 'SP' || s === 'NR') return UNKNOWN_ODDS;
  if (s === 'EVS' || s === 'EVENS') return 1;

  if (s.includes('/')) {
    const [num, den, ...rest] = s.split('/');
    if (rest.length > 0 || !num || !den || !NUMBER.test(num) || !NUMBER.test(den)) return UNKNOWN_ODDS;
    const denominator = Number(den);
    if (denominator <= 0) return UNKNOWN_ODDS;
    return Number(num) / denominator;
  }

  if (!NUMBER.test(s)) return UNKNOWN_ODDS;
  const decimal = Number(s);
  return decimal > 1 ? decimal - 1 : UNKNOWN_ODDS;
}

export function isKnownOdds(fractional: number): boolean {
  return Number.isFinite(fractional) && fractional < UNKNOWN_ODDS;
}

/**
 * Favourite and second favourite by ascending fractional odds.
 * Ties keep source order; unpriced runners are never favourites.
 */
export function rankRunners(runners: Runner[]): {
  favorite: RankedRunner | null;
  secondFavorite: RankedRunner | null;
} {
  const priced = runners
    .map((r) => ({ name: r.name, oddsString: r.oddsString, oddsFractional: parseOdds(r.oddsString) }))
    .filter((r) => isKnownOdds(r.oddsFractional))
    .sort((a, b) => a.oddsFractional - b.oddsFractional);

  return {
    favorite: priced[0] ?? null,
    secondFavorite: priced[1] ?? null,
  };
}
