import { Worker, type Job } from 'bullmq';
import type { ScanStatusBoard } from '../api/scan-status.js';
import { broadcast } from '../api/ws-hub.js';
import type { RaceAlerter } from '../notifications/telegram.js';
import { writeReports } from '../output/writer.js';
import { runScan } from '../pipeline/scan.js';
import type { ScanRuntime } from '../runtime.js';
import { QUEUE_NAMES, type ScanJobData } from '../scheduler/constants.js';
import type { ReportFormat, Thresholds } from '../types/report.js';
import type { RaceStore } from '../types/store.js';
import { rangeEndingToday } from '../utils/date.js';
import { logger, type Logger } from '../utils/logger.js';

export interface ScanJobDeps {
  runtime: ScanRuntime;
  status: ScanStatusBoard;
  /** Null when persistence is off. */
  store: RaceStore | null;
  alerter: RaceAlerter | null;
  reportDir: string;
  formats: readonly ReportFormat[];
  thresholds: Thresholds;
  defaultDaysBack: number;
  defaultSources: readonly string[];
  bucketMinutes: number;
}

export interface ScanJobResult {
  races: number;
  files: string[];
  saved: number;
  alerted: number;
}

/** One scan end to end: fetch, merge, report, persist, push, alert. */
export async function processScanJob(
  data: ScanJobData,
  deps: ScanJobDeps,
  log: Logger = logger,
  signal?: AbortSignal,
): Promise<ScanJobResult> {
  const range = rangeEndingToday(data.daysBack ?? deps.defaultDaysBack);
  const sources = data.sources && data.sources.length > 0 ? data.sources : deps.defaultSources;

  const report = await runScan(deps.runtime.dependencies(sources), {
    range,
    signal,
    bucketMinutes: deps.bucketMinutes,
  });
  deps.status.record(report);

  const files = await writeReports(report, {
    outputDir: deps.reportDir,
    formats: deps.formats,
    thresholds: deps.thresholds,
    config: { range, sources, thresholds: deps.thresholds, bucketMinutes: deps.bucketMinutes },
  });

  const saved = deps.store ? await deps.store.saveRaces(report.races) : 0;

  broadcast('races:updated', { count: report.races.length, generatedAt: report.generatedAt });

  const alerted = deps.alerter ? await deps.alerter.notify(report.races) : 0;

  log.info({ races: report.races.length, saved, alerted, files: files.length }, 'Scan job done');
  return { races: report.races.length, files, saved, alerted };
}

export function createScanWorker(deps: ScanJobDeps, connection: { host: string; port: number }) {
  const worker = new Worker<ScanJobData, ScanJobResult>(
    QUEUE_NAMES.SCAN,
    async (job: Job<ScanJobData, ScanJobResult>) => {
      const log = logger.child({ job: job.id, worker: 'scan' });
      return processScanJob(job.data, deps, log);
    },
    {
      connection,
      concurrency: 1,
    },
  );

  worker.on('failed', (job, err) => {
    logger.error({ job: job?.id, err: err.message }, 'Scan job failed');
  });

  return worker;
}
