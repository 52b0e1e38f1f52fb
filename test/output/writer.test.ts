import fs from 'node:fs';
import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { reportBaseName, writeReports } from '../../src/output/writer.js';
import { DEFAULT_THRESHOLDS } from '../../src/pipeline/thresholds.js';
import { tempDir } from '../helpers/fakes.js';
import { makeRace, makeReport } from '../helpers/races.js';

describe('writeReports', () => {
  it('should name files after the generation time', () => {
    expect(reportBaseName(makeReport([]))).toBe('racing_report_20240501_130500');
  });

  it('should write each requested format once, in order', async () => {
    const dir = path.join(tempDir(), 'nested');
    const files = await writeReports(makeReport([makeRace()]), {
      outputDir: dir,
      formats: ['csv', 'html', 'csv'],
      thresholds: DEFAULT_THRESHOLDS,
    });

    expect(files).toEqual([
      path.join(dir, 'racing_report_20240501_130500.csv'),
      path.join(dir, 'racing_report_20240501_130500.html'),
    ]);
    expect(fs.readFileSync(files[0] ?? '', 'utf-8').startsWith('id,course,country')).toBe(true);
    expect(fs.readFileSync(files[1] ?? '', 'utf-8').startsWith('<!doctype html>')).toBe(true);
  });

  it('should echo the scan config into the JSON report', async () => {
    const dir = tempDir();
    const [file] = await writeReports(makeReport([]), {
      outputDir: dir,
      formats: ['json'],
      thresholds: DEFAULT_THRESHOLDS,
      config: { daysBack: 1 },
    });

    expect(JSON.parse(fs.readFileSync(file ?? '', 'utf-8'))).toMatchObject({ config: { daysBack: 1 }, races: [] });
  });
});
