import type { ScanReport } from '../types/report.js';

export const SCHEMA_VERSION = '2.2';

export interface JsonReportMeta {
  /** Effective scan settings, echoed for traceability. */
  config: Record<string, unknown>;
}

export interface JsonReport {
  schemaVersion: string;
  generatedAt: string;
  config: Record<string, unknown>;
  statistics: ScanReport['stats'] & { range: ScanReport['range'] };
  races: ScanReport['races'];
}

export function buildJsonReport(report: ScanReport, meta: JsonReportMeta): JsonReport {
  return {
    schemaVersion: SCHEMA_VERSION,
    generatedAt: report.generatedAt,
    config: meta.config,
    statistics: { ...report.stats, range: report.range },
    races: report.races,
  };
}

export function renderJsonReport(report: ScanReport, meta: JsonReportMeta): string {
  return `${JSON.stringify(buildJsonReport(report, meta), null, 2)}\n`;
}
