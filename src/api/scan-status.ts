import type { SourceAdapterConfig } from '../types/adapter.js';
import type { ScanReport, SourceScanStats } from '../types/report.js';

export interface ScanSummary {
  generatedAt: string;
  range: ScanReport['range'];
  races: number;
  cancelled: boolean;
  durationMs: number;
  perSource: Record<string, SourceScanStats>;
}

/** The most recent scan's outcome, shared by the scan worker and the API. */
export class ScanStatusBoard {
  private latest: ScanSummary | null = null;

  record(report: ScanReport): void {
    this.latest = {
      generatedAt: report.generatedAt,
      range: report.range,
      races: report.races.length,
      cancelled: report.stats.cancelled,
      durationMs: report.stats.durationMs,
      perSource: report.stats.perSource,
    };
  }

  get lastScan(): ScanSummary | null {
    return this.latest;
  }

  sourceStatus(config: SourceAdapterConfig): SourceAdapterConfig & { lastScan: SourceScanStats | null } {
    return { ...config, lastScan: this.latest?.perSource[config.id] ?? null };
  }
}
