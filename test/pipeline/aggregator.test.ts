import { describe, it, expect } from 'vitest';
import { aggregate, liftRace, mergeRaces, validateRawRace } from '../../src/pipeline/aggregator.js';
import { buildKey, raceIdForKey } from '../../src/pipeline/normalizer.js';
import { MalformedRecordError } from '../../src/types/errors.js';
import { makeRawRace } from '../helpers/races.js';

const sportingLifeRecord = makeRawRace({
  sourceId: 'sportinglife',
  course: 'ascot',
  time: '14:07',
  fieldSize: 4,
  runners: [
    { name: 'Alpha', oddsString: '9/4' },
    { name: 'Bravo', oddsString: '3/1' },
    { name: 'Charlie', oddsString: '7/1' },
    { name: 'Delta', oddsString: '10/1' },
  ],
  raceUrl: 'https://example.test/sl/ascot-1407',
  dataSources: { course: 'SL', runners: 'SL' },
});

describe('aggregate', () => {
  it('should merge the same race reported by two sources', () => {
    const { races, skipped } = aggregate([makeRawRace(), sportingLifeRecord]);

    expect(skipped).toBe(0);
    expect(races).toHaveLength(1);
    const [race] = races;
    expect(race?.id).toBe(raceIdForKey({ course: 'ascot', date: '2024-05-01', time: '13:05', raceNumber: null }));
    expect(race?.course).toBe('Ascot');
    expect(race?.timeLocal).toBe('14:05');
    expect(race?.utcDatetime).toBe('2024-05-01T13:05:00.000Z');
    expect(race?.raceUrl).toBe('https://example.test/ascot/1405');
    expect(race?.fieldSize).toBe(4);
    expect(race?.allRunners).toHaveLength(4);
    expect(race?.favorite).toEqual({ name: 'Alpha', oddsString: '9/4', oddsFractional: 2.25 });
    expect(race?.secondFavorite).toEqual({ name: 'Bravo', oddsString: '3/1', oddsFractional: 3 });
    expect(race?.dataSources).toEqual({ course: 'ATR', runners: 'ATR', odds: 'ATR' });
  });

  it('should merge records published in different zones for the same instant', () => {
    const utcRecord = makeRawRace({ sourceId: 'rpb2b-us', time: '13:05', timezoneName: 'UTC', runners: [] });
    const { races } = aggregate([makeRawRace(), utcRecord]);
    expect(races).toHaveLength(1);
    expect(races[0]?.timeLocal).toBe('14:05');
  });

  it('should not merge races in different time buckets or at different courses', () => {
    const { races } = aggregate([
      makeRawRace(),
      makeRawRace({ time: '14:10' }),
      makeRawRace({ course: 'Newbury' }),
    ]);
    expect(races).toHaveLength(3);
  });

  it('should keep races apart when both carry different race numbers', () => {
    const { races } = aggregate([makeRawRace({ raceNumber: 1 }), makeRawRace({ raceNumber: 2 })]);
    expect(races).toHaveLength(2);
  });

  it('should skip records missing a course, date, time or zone', () => {
    const { races, skipped } = aggregate([
      makeRawRace({ course: '  ' }),
      makeRawRace({ date: '2024-02-30' }),
      makeRawRace({ time: '25:00' }),
      makeRawRace({ timezoneName: 'Mars/Base' }),
      makeRawRace(),
    ]);
    expect(skipped).toBe(4);
    expect(races).toHaveLength(1);
  });

  it('should key on the bucket size it is given', () => {
    const { races } = aggregate([makeRawRace(), makeRawRace({ time: '14:12' })], { bucketMinutes: 15 });
    expect(races).toHaveLength(1);
  });
});

describe('validateRawRace', () => {
  it('should name the missing field', () => {
    const error = validateRawRace(makeRawRace({ time: 'TBA' }));
    expect(error).toBeInstanceOf(MalformedRecordError);
    expect(error?.field).toBe('time');
    expect(validateRawRace(makeRawRace())).toBeNull();
  });
});

describe('mergeRaces', () => {
  const key = buildKey('Ascot', '2024-05-01', '13:05', null);
  const lift = (raw = makeRawRace()) => liftRace(raw, key, '2024-05-01T13:05:00.000Z');

  it('should be idempotent', () => {
    const race = lift();
    expect(mergeRaces(race, race)).toEqual(race);
  });

  it('should never shrink the field size', () => {
    const countOnly = lift(
      makeRawRace({ sourceId: 'rpb2b-us', runners: [], fieldSize: 8, dataSources: { course: 'RPB2B', fieldSize: 'RPB2B' } }),
    );
    const merged = mergeRaces(countOnly, lift());

    expect(merged.fieldSize).toBe(8);
    expect(merged.allRunners).toHaveLength(3);
    expect(merged.favorite?.name).toBe('Alpha');
  });

  it('should prefer the record with more provenance groups', () => {
    const richer = lift(
      makeRawRace({
        course: 'ASCOT',
        raceUrl: 'https://example.test/rich',
        dataSources: { course: 'RICH', runners: 'RICH', odds: 'RICH', form: 'RICH' },
      }),
    );
    const merged = mergeRaces(lift(), richer);

    expect(merged.course).toBe('ASCOT');
    expect(merged.raceUrl).toBe('https://example.test/rich');
    expect(merged.dataSources).toEqual({ course: 'RICH', runners: 'RICH', odds: 'RICH', form: 'RICH' });
  });

  it('should fill scalar gaps from the secondary record', () => {
    const withGrade = lift(makeRawRace({ grade: 'Class 4', dataSources: { course: 'SL' } }));
    expect(mergeRaces(lift(), withGrade).grade).toBe('Class 4');
  });

  it('should leave favourites empty when no runner is priced', () => {
    const unpriced = makeRawRace({
      runners: [
        { name: 'Alpha', oddsString: 'SP' },
        { name: 'Bravo', oddsString: null },
      ],
    });
    const merged = mergeRaces(lift(unpriced), lift(unpriced));
    expect(merged.favorite).toBeNull();
    expect(merged.secondFavorite).toBeNull();
  });
});

describe('field size across sources', () => {
  it('should keep the larger declared field size when the smaller side has no runners', () => {
    const { races } = aggregate([
      makeRawRace({ fieldSize: 5, runners: [], dataSources: { course: 'ATR' } }),
      makeRawRace({ sourceId: 'sportinglife', course: 'ascot', time: '14:07', fieldSize: 6, raceUrl: 'https://example.test/sl/ascot-1407' }),
    ]);

    expect(races).toHaveLength(1);
    expect(races[0]?.fieldSize).toBe(6);
    expect(races[0]?.allRunners).toHaveLength(3);
    expect(races[0]?.raceUrl).toBe('https://example.test/sl/ascot-1407');
  });
});

describe('liftRace', () => {
  it('should copy the declared field size as reported', () => {
    const race = liftRace(
      makeRawRace({ fieldSize: 10 }),
      buildKey('Ascot', '2024-05-01', '13:05', null),
      '2024-05-01T13:05:00.000Z',
    );
    expect(race.fieldSize).toBe(10);
    expect(race.allRunners).toHaveLength(3);
    expect(race.formGuideUrl).toBeNull();
    expect(race.valueScore).toBe(0);
  });
});
