import type { DateRange } from './adapter.js';
import type { Race } from './race.js';

export type SourceStatus = 'ok' | 'failed' | 'cancelled';

export interface SourceScanStats {
  status: SourceStatus;
  count: number;
  skippedFragments: number;
  error: string | null;
}

export interface HttpStats {
  success: number;
  retries: number;
  /** Refused by robots.txt. */
  blocked: number;
  /** Gave up: a non-retryable status, or every attempt used. */
  failed: number;
  cacheHits: number;
  cacheMisses: number;
}

export interface ScanStats {
  perSource: Record<string, SourceScanStats>;
  rawCount: number;
  skipped: number;
  merged: number;
  enriched: number;
  cancelled: boolean;
  durationMs: number;
  http: HttpStats | null;
}

export interface ScanReport {
  generatedAt: string;
  range: DateRange;
  races: Race[];
  stats: ScanStats;
}

export interface Thresholds {
  maxFieldSize: number;
  minFavFractional: number;
  minSecondFavFractional: number;
  minOddsRatio: number;
}

export type ReportFormat = 'html' | 'json' | 'csv';
