import { describe, it, expect } from 'vitest';
import { CSV_COLUMNS, csvField, renderCsvReport } from '../../src/output/csv-report.js';
import { makeRace } from '../helpers/races.js';

describe('csvField', () => {
  it('should quote only when needed', () => {
    expect(csvField('plain')).toBe('plain');
    expect(csvField(7)).toBe('7');
    expect(csvField('a,b')).toBe('"a,b"');
    expect(csvField('say "hi"')).toBe('"say ""hi"""');
    expect(csvField('two\nlines')).toBe('"two\nlines"');
  });
});

describe('renderCsvReport', () => {
  it('should write a header and one CRLF-terminated row per race', () => {
    const csv = renderCsvReport([makeRace({ valueScore: 50.14 })]);
    const lines = csv.split('\r\n');

    expect(lines).toHaveLength(3);
    expect(lines[0]).toBe(CSV_COLUMNS.join(','));
    expect(lines[1]).toBe(
      'race-1,Ascot,GB,thoroughbred,14:05,Europe/London,2024-05-01T13:05:00.000Z,3,50.1,Alpha,2/1,Bravo,4/1,yes,' +
        'https://example.test/ascot/1405,,"{""course"":""ATR"",""runners"":""ATR"",""odds"":""ATR""}"',
    );
    expect(lines[2]).toBe('');
  });

  it('should leave missing favourites blank and flag non-matches', () => {
    const csv = renderCsvReport([makeRace({ favorite: null, secondFavorite: null, dataSources: {} })]);
    expect(csv.split('\r\n')[1]).toBe(
      'race-1,Ascot,GB,thoroughbred,14:05,Europe/London,2024-05-01T13:05:00.000Z,3,0.0,,,,,no,https://example.test/ascot/1405,,{}',
    );
  });

  it('should write only the header for no races', () => {
    expect(renderCsvReport([])).toBe(`${CSV_COLUMNS.join(',')}\r\n`);
  });
});
