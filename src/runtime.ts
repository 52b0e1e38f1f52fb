import { createAdapters, selectAdapters, type AdapterRegistry } from './adapters/index.js';
import { RacingAndSportsFeed } from './adapters/racing-and-sports.js';
import type { Config } from './config.js';
import { createReferenceContext, loadReferenceData } from './pipeline/reference-data.js';
import type { ScanDependencies } from './pipeline/scan.js';
import type { Thresholds } from './types/report.js';
import { HttpClient } from './workers/http-client.js';
import { ResponseCache } from './workers/response-cache.js';

export interface ScanRuntimeOptions {
  referenceDataPath: string;
  /** Null disables the on-disk cache. */
  cacheDir: string | null;
  respectRobots: boolean;
  maxConcurrent: number;
  minHostIntervalMs: number;
  formGuide: boolean;
}

/** Everything a scan needs, wired once per process. */
export interface ScanRuntime {
  readonly registry: AdapterRegistry;
  dependencies(only?: readonly string[]): ScanDependencies;
}

export function runtimeOptionsFromConfig(cfg: Config): ScanRuntimeOptions {
  return {
    referenceDataPath: cfg.REFERENCE_DATA_PATH,
    cacheDir: cfg.HTTP_CACHE_ENABLED ? cfg.HTTP_CACHE_DIR : null,
    respectRobots: cfg.RESPECT_ROBOTS,
    maxConcurrent: cfg.HTTP_MAX_CONCURRENT,
    minHostIntervalMs: cfg.HTTP_MIN_HOST_INTERVAL_MS,
    formGuide: cfg.FORM_GUIDE_ENABLED,
  };
}

export function thresholdsFromConfig(cfg: Config): Thresholds {
  return {
    maxFieldSize: cfg.MAX_FIELD_SIZE,
    minFavFractional: cfg.MIN_FAV_FRACTIONAL,
    minSecondFavFractional: cfg.MIN_SECOND_FAV_FRACTIONAL,
    minOddsRatio: cfg.MIN_ODDS_RATIO,
  };
}

export function createScanRuntime(options: ScanRuntimeOptions): ScanRuntime {
  const { normalizer, timezones } = createReferenceContext(loadReferenceData(options.referenceDataPath));
  const http = new HttpClient({
    maxConcurrent: options.maxConcurrent,
    minHostIntervalMs: options.minHostIntervalMs,
    respectRobots: options.respectRobots,
    cache: options.cacheDir ? new ResponseCache(options.cacheDir) : null,
  });
  const registry = createAdapters(http, timezones);
  const directoryFeed = options.formGuide ? new RacingAndSportsFeed(http) : null;

  return {
    registry,
    dependencies: (only = []) => ({
      adapters: selectAdapters(registry, only),
      directoryFeed,
      normalizer,
      httpStats: () => http.stats,
    }),
  };
}
