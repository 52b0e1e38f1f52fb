/**
 * One-shot scan: fetch every source, merge, enrich, score and write reports.
 * Usage: npm run scan -- [--days-back 2] [--formats html,csv] [--only attheraces]
 * Ctrl-C stops waiting on slow sources and writes what was collected.
 */
import { config } from '../config.js';
import { writeReports } from '../output/writer.js';
import { runScan } from '../pipeline/scan.js';
import { matchesThresholds } from '../pipeline/thresholds.js';
import { createScanRuntime, runtimeOptionsFromConfig } from '../runtime.js';
import { rangeEndingToday } from '../utils/date.js';
import { logger } from '../utils/logger.js';
import { parseScanArgs, USAGE } from './scan-args.js';

const options = parseScanArgs(process.argv.slice(2), config);
if (options.help) {
  console.log(USAGE);
  process.exit(0);
}

const runtime = createScanRuntime({
  ...runtimeOptionsFromConfig(config),
  cacheDir: options.useCache ? config.HTTP_CACHE_DIR : null,
});

const controller = new AbortController();
process.once('SIGINT', () => {
  logger.warn('Interrupted, finishing with partial results');
  controller.abort();
});

const range = rangeEndingToday(options.daysBack);
const report = await runScan(runtime.dependencies(options.only), {
  range,
  signal: controller.signal,
  bucketMinutes: config.BUCKET_MINUTES,
});

const files = await writeReports(report, {
  outputDir: options.outputDir,
  formats: options.formats,
  thresholds: options.thresholds,
  config: { range, sources: options.only, thresholds: options.thresholds, bucketMinutes: config.BUCKET_MINUTES },
});

if (options.persist) {
  // Loaded here so a plain scan never opens a database pool
  const { sql } = await import('../db/pool.js');
  const { PostgresRaceStore } = await import('../db/race-store.js');
  const saved = await new PostgresRaceStore(sql).saveRaces(report.races);
  logger.info({ saved }, 'Races persisted');
  await sql.end();
}

const matching = report.races.filter((race) => matchesThresholds(race, options.thresholds)).length;
console.log(`\nRaces: ${report.races.length} (matching: ${matching})${report.stats.cancelled ? ' [partial]' : ''}`);
for (const [source, stats] of Object.entries(report.stats.perSource)) {
  console.log(`  ${source}: ${stats.status}, ${stats.count} races${stats.error ? ` (${stats.error})` : ''}`);
}
for (const file of files) console.log(`  wrote ${file}`);
