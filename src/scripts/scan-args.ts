import { parseArgs } from 'node:util';
import { z } from 'zod';
import type { Config } from '../config.js';
import type { ReportFormat, Thresholds } from '../types/report.js';

export interface ScanCliOptions {
  daysBack: number;
  formats: ReportFormat[];
  outputDir: string;
  only: string[];
  useCache: boolean;
  persist: boolean;
  thresholds: Thresholds;
  help: boolean;
}

export const USAGE = `Usage: npm run scan -- [options]

  --days-back <n>            days to scan, ending today (default from SCAN_DAYS_BACK)
  --formats <list>           html,json,csv (default from REPORT_FORMATS)
  --output-dir <dir>         where reports are written (default from REPORT_DIR)
  --only <ids>               comma-separated adapter ids
  --no-cache                 bypass the on-disk HTTP cache
  --persist                  save races to PostgreSQL
  --max-field-size <n>       tipsheet: field must be smaller than n
  --min-fav <x>              tipsheet: minimum favourite fractional odds
  --min-second-fav <x>       tipsheet: minimum second favourite fractional odds
  --min-odds-ratio <x>       tipsheet: minimum second/favourite ratio (0 = off)
  -h, --help                 show this help
`;

const csv = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim())
      .filter(Boolean),
  );

const argsSchema = z.object({
  daysBack: z.coerce.number().int().min(1).max(7),
  formats: z.array(z.enum(['html', 'json', 'csv'])).min(1),
  outputDir: z.string().min(1),
  only: z.array(z.string()),
  maxFieldSize: z.coerce.number().int().positive(),
  minFav: z.coerce.number().nonnegative(),
  minSecondFav: z.coerce.number().nonnegative(),
  minOddsRatio: z.coerce.number().nonnegative(),
});

/** Command-line flags over config defaults. Throws on unknown flags or bad values. */
export function parseScanArgs(argv: string[], cfg: Config): ScanCliOptions {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      'days-back': { type: 'string' },
      formats: { type: 'string' },
      'output-dir': { type: 'string' },
      only: { type: 'string' },
      'no-cache': { type: 'boolean', default: false },
      persist: { type: 'boolean', default: false },
      'max-field-size': { type: 'string' },
      'min-fav': { type: 'string' },
      'min-second-fav': { type: 'string' },
      'min-odds-ratio': { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  const parsed = argsSchema.parse({
    daysBack: values['days-back'] ?? cfg.SCAN_DAYS_BACK,
    formats: values.formats !== undefined ? csv.parse(values.formats) : cfg.REPORT_FORMATS,
    outputDir: values['output-dir'] ?? cfg.REPORT_DIR,
    only: values.only !== undefined ? csv.parse(values.only) : cfg.SCAN_SOURCES,
    maxFieldSize: values['max-field-size'] ?? cfg.MAX_FIELD_SIZE,
    minFav: values['min-fav'] ?? cfg.MIN_FAV_FRACTIONAL,
    minSecondFav: values['min-second-fav'] ?? cfg.MIN_SECOND_FAV_FRACTIONAL,
    minOddsRatio: values['min-odds-ratio'] ?? cfg.MIN_ODDS_RATIO,
  });

  return {
    daysBack: parsed.daysBack,
    formats: [...new Set(parsed.formats)],
    outputDir: parsed.outputDir,
    only: parsed.only,
    useCache: !values['no-cache'] && cfg.HTTP_CACHE_ENABLED,
    persist: values.persist || cfg.PERSIST_RACES,
    thresholds: {
      maxFieldSize: parsed.maxFieldSize,
      minFavFractional: parsed.minFav,
      minSecondFavFractional: parsed.minSecondFav,
      minOddsRatio: parsed.minOddsRatio,
    },
    help: values.help,
  };
}
