import { describe, it, expect } from 'vitest';
import {
  applyScores,
  scoreDataRichness,
  scoreFavoriteOdds,
  scoreFieldSize,
  scoreOddsSpread,
  scoreRace,
} from '../../src/pipeline/scorer.js';
import { UNKNOWN_ODDS } from '../../src/pipeline/odds.js';
import { makeRace } from '../helpers/races.js';

describe('score components', () => {
  it('should favour small fields', () => {
    expect(scoreFieldSize(6)).toBe(50);
    expect(scoreFieldSize(12)).toBe(0);
    expect(scoreFieldSize(15)).toBe(0);
    expect(scoreFieldSize(0)).toBe(0);
  });

  it('should saturate the favourite price at 4/1', () => {
    expect(scoreFavoriteOdds(0.5)).toBe(0);
    expect(scoreFavoriteOdds(4)).toBe(100);
    expect(scoreFavoriteOdds(10)).toBe(100);
    expect(scoreFavoriteOdds(UNKNOWN_ODDS)).toBe(0);
    expect(scoreFavoriteOdds(null)).toBe(0);
  });

  it('should score the gap between the market leaders', () => {
    expect(scoreOddsSpread(2, 4)).toBeCloseTo(40);
    expect(scoreOddsSpread(3, 2)).toBe(0);
    expect(scoreOddsSpread(2, null)).toBe(0);
  });

  it('should cap provenance richness', () => {
    expect(scoreDataRichness(3)).toBe(75);
    expect(scoreDataRichness(6)).toBe(100);
  });
});

describe('scoreRace', () => {
  it('should weight the components and round to one decimal', () => {
    const race = makeRace({
      fieldSize: 5,
      favorite: { name: 'Alpha', oddsString: '2/1', oddsFractional: 2 },
      secondFavorite: { name: 'Bravo', oddsString: '4/1', oddsFractional: 4 },
    });
    // 17.5 + 17.14 + 8 + 7.5
    expect(scoreRace(race)).toBe(50.1);
  });

  it('should score an empty race as 0', () => {
    const race = makeRace({ fieldSize: 0, favorite: null, secondFavorite: null, dataSources: {} });
    expect(scoreRace(race)).toBe(0);
  });

  it('should honour custom weights', () => {
    const race = makeRace({ fieldSize: 6 });
    expect(scoreRace(race, { fieldSize: 1, favoriteOdds: 0, oddsSpread: 0, dataRichness: 0 })).toBe(50);
  });
});

describe('applyScores', () => {
  it('should sort by score descending and keep ties in input order', () => {
    const scores: Record<string, number> = { a: 10, b: 40, c: 40 };
    const races = [makeRace({ id: 'a' }), makeRace({ id: 'b' }), makeRace({ id: 'c' })];

    const sorted = applyScores(races, (race) => scores[race.id] ?? 0);

    expect(sorted.map((r) => r.id)).toEqual(['b', 'c', 'a']);
    expect(races[0]?.valueScore).toBe(10);
  });
});
