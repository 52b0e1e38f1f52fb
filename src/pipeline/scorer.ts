/**
 * Value score for ordering races in a report.
 *
 * Weights: field size 0.3, favourite price 0.4, fav/second spread 0.2,
 *          provenance richness 0.1
 * Each component is 0-100, so the weighted sum is too.
 */

import type { Race } from '../types/race.js';
import { isKnownOdds } from './odds.js';

export interface ScoreWeights {
  fieldSize: number;
  favoriteOdds: number;
  oddsSpread: number;
  dataRichness: number;
}

export const DEFAULT_WEIGHTS: Readonly<ScoreWeights> = {
  fieldSize: 0.3,
  favoriteOdds: 0.4,
  oddsSpread: 0.2,
  dataRichness: 0.1,
};

export type RaceScorer = (race: Race) => number;

function clamp(value: number, min = 0, max = 100): number {
  return Math.min(max, Math.max(min, value));
}

/** Smaller fields score higher; 12+ runners score 0. An unknown field (0) scores 0. */
export function scoreFieldSize(fieldSize: number): number {
  if (fieldSize <= 0) return 0;
  return clamp(((12 - fieldSize) / 12) * 100);
}

/** Longer-priced favourites score higher, saturating at 4/1. */
export function scoreFavoriteOdds(fav: number | null): number {
  if (fav === null || !isKnownOdds(fav)) return 0;
  return clamp(((fav - 0.5) / 3.5) * 100);
}

/** Gap between the two market leaders, saturating at 5 points. */
export function scoreOddsSpread(fav: number | null, second: number | null): number {
  if (fav === null || second === null || !isKnownOdds(fav) || !isKnownOdds(second)) return 0;
  if (second <= fav) return 0;
  return clamp(((second - fav) / 5) * 100);
}

export function scoreDataRichness(groups: number): number {
  return Math.min(100, 25 * groups);
}

export function scoreRace(race: Race, weights: ScoreWeights = DEFAULT_WEIGHTS): number {
  const fav = race.favorite?.oddsFractional ?? null;
  const second = race.secondFavorite?.oddsFractional ?? null;

  const total =
    scoreFieldSize(race.fieldSize) * weights.fieldSize +
    scoreFavoriteOdds(fav) * weights.favoriteOdds +
    scoreOddsSpread(fav, second) * weights.oddsSpread +
    scoreDataRichness(Object.keys(race.dataSources).length) * weights.dataRichness;

  return Math.round(clamp(total) * 10) / 10;
}

/**
 * Sets `valueScore` on every race and returns a new array sorted by score,
 * highest first. Equal scores keep their input order.
 */
export function applyScores(races: Race[], scorer: RaceScorer = (race) => scoreRace(race)): Race[] {
  for (const race of races) {
    race.valueScore = scorer(race);
  }
  return [...races].sort((a, b) => b.valueScore - a.valueScore);
}
