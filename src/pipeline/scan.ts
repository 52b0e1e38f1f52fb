import type { AdapterResult, DateRange, FormGuideFeed, SourceAdapter } from '../types/adapter.js';
import { SourceUnavailableError } from '../types/errors.js';
import type { RawRace } from '../types/race.js';
import type { HttpStats, ScanReport, SourceScanStats } from '../types/report.js';
import { logger } from '../utils/logger.js';
import { aggregate } from './aggregator.js';
import { buildFormGuideDirectory, enrich } from './enricher.js';
import { normalizeCourse, type CourseNormalizer } from './normalizer.js';
import { applyScores, type RaceScorer } from './scorer.js';

export interface ScanDependencies {
  adapters: SourceAdapter[];
  /** Optional: without one, races go out without form guide links. */
  directoryFeed?: FormGuideFeed | null;
  normalizer?: CourseNormalizer;
  scorer?: RaceScorer;
  /** Snapshot of the HTTP client's counters, read once the scan is done. */
  httpStats?: () => HttpStats;
}

export interface ScanOptions {
  range: DateRange;
  signal?: AbortSignal;
  bucketMinutes?: number;
}

type Settled = { result: AdapterResult; cancelled: false } | { sourceId: string; cancelled: true };

/** Resolves once `signal` aborts; the returned disposer drops the listener. */
function abortPromise(signal: AbortSignal | undefined): { promise: Promise<void>; dispose: () => void } {
  if (!signal) return { promise: new Promise<void>(() => undefined), dispose: () => undefined };
  if (signal.aborted) return { promise: Promise.resolve(), dispose: () => undefined };

  let onAbort: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    onAbort = () => resolve();
    signal.addEventListener('abort', onAbort, { once: true });
  });
  return { promise, dispose: () => signal.removeEventListener('abort', onAbort) };
}

/** Never rejects: a throwing adapter becomes a failed result. */
function runAdapter(adapter: SourceAdapter, range: DateRange, signal: AbortSignal | undefined): Promise<AdapterResult> {
  const sourceId = adapter.config.id;
  return adapter.fetchRaces(range, signal).then(
    (result) => result,
    (err: unknown) => ({
      sourceId,
      races: [],
      error: new SourceUnavailableError(sourceId, err instanceof Error ? err.message : String(err), { cause: err }),
      skippedFragments: 0,
    }),
  );
}

function sourceStats(settled: Settled): SourceScanStats {
  if (settled.cancelled) {
    return { status: 'cancelled', count: 0, skippedFragments: 0, error: null };
  }
  const { result } = settled;
  return {
    status: result.error ? 'failed' : 'ok',
    count: result.races.length,
    skippedFragments: result.skippedFragments,
    error: result.error?.message ?? null,
  };
}

/**
 * One full scan: every adapter concurrently, then merge, form guide links
 * and scoring. Aborting `signal` stops waiting on unfinished sources and
 * reports what was already collected.
 */
export async function runScan(deps: ScanDependencies, options: ScanOptions): Promise<ScanReport> {
  const started = Date.now();
  const { range, signal } = options;
  const normalizer = deps.normalizer ?? normalizeCourse;
  const log = logger.child({ scan: `${range.start}..${range.end}` });

  log.info({ sources: deps.adapters.map((a) => a.config.id) }, 'Scan started');

  const aborted = abortPromise(signal);
  let settled: Settled[];
  try {
    settled = await Promise.all(
      deps.adapters.map((adapter) =>
        Promise.race<Settled>([
          runAdapter(adapter, range, signal).then((result) => ({ result, cancelled: false as const })),
          aborted.promise.then(() => ({ sourceId: adapter.config.id, cancelled: true as const })),
        ]),
      ),
    );
  } finally {
    aborted.dispose();
  }

  const perSource: Record<string, SourceScanStats> = {};
  const raw: RawRace[] = [];
  for (const entry of settled) {
    const sourceId = entry.cancelled ? entry.sourceId : entry.result.sourceId;
    perSource[sourceId] = sourceStats(entry);
    if (entry.cancelled) continue;

    if (entry.result.error) {
      log.warn({ source: sourceId, err: entry.result.error.message }, 'Source unavailable');
    }
    raw.push(...entry.result.races);
  }

  const cancelled = signal?.aborted ?? false;
  const { races: merged, skipped } = aggregate(raw, { bucketMinutes: options.bucketMinutes, normalizer });

  let enriched = 0;
  if (deps.directoryFeed && !cancelled && merged.length > 0) {
    try {
      const meetings = await deps.directoryFeed.fetchMeetings(range, signal);
      const directory = buildFormGuideDirectory(meetings, deps.directoryFeed.sourceTag, normalizer);
      enriched = enrich(merged, directory, normalizer);
    } catch (err) {
      log.warn({ err: err instanceof Error ? err.message : String(err) }, 'Form guide directory unavailable');
    }
  }

  const races = applyScores(merged, deps.scorer);
  const durationMs = Date.now() - started;

  log.info(
    { raw: raw.length, skipped, merged: races.length, enriched, cancelled, durationMs },
    cancelled ? 'Scan cancelled, reporting partial results' : 'Scan finished',
  );

  return {
    generatedAt: new Date().toISOString(),
    range,
    races,
    stats: {
      perSource,
      rawCount: raw.length,
      skipped,
      merged: races.length,
      enriched,
      cancelled,
      durationMs,
      http: deps.httpStats ? deps.httpStats() : null,
    },
  };
}
