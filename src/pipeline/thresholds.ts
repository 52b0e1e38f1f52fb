import type { Race } from '../types/race.js';
import type { Thresholds } from '../types/report.js';
import { isKnownOdds } from './odds.js';

export const DEFAULT_THRESHOLDS: Readonly<Thresholds> = {
  maxFieldSize: 7,
  minFavFractional: 1.0,
  minSecondFavFractional: 3.0,
  minOddsRatio: 0,
};

/**
 * Tipsheet filter: small field, favourite at evens or longer and a second
 * favourite at 3/1 or longer. Used to highlight and alert, never to drop.
 */
export function matchesThresholds(race: Race, thresholds: Thresholds = DEFAULT_THRESHOLDS): boolean {
  if (race.fieldSize >= thresholds.maxFieldSize) return false;

  const fav = race.favorite?.oddsFractional;
  const second = race.secondFavorite?.oddsFractional;
  if (fav === undefined || second === undefined) return false;
  if (!isKnownOdds(fav) || !isKnownOdds(second)) return false;

  if (fav < thresholds.minFavFractional) return false;
  if (second < thresholds.minSecondFavFractional) return false;
  if (thresholds.minOddsRatio > 0 && (fav <= 0 || second / fav < thresholds.minOddsRatio)) return false;

  return true;
}
