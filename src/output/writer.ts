import fs from 'node:fs/promises';
import path from 'node:path';
import type { ReportFormat, ScanReport, Thresholds } from '../types/report.js';
import { fileStamp } from '../utils/date.js';
import { logger } from '../utils/logger.js';
import { renderCsvReport } from './csv-report.js';
import { renderHtmlReport } from './html-report.js';
import { renderJsonReport } from './json-report.js';

export interface WriteReportsOptions {
  outputDir: string;
  formats: readonly ReportFormat[];
  thresholds: Thresholds;
  /** Echoed into the JSON report. */
  config?: Record<string, unknown>;
}

/** 'racing_report_20240501_143005' from the report's generation time (UTC). */
export function reportBaseName(report: ScanReport): string {
  return `racing_report_${fileStamp(report.generatedAt)}`;
}

function render(format: ReportFormat, report: ScanReport, options: WriteReportsOptions): string {
  switch (format) {
    case 'html':
      return renderHtmlReport(report, options.thresholds);
    case 'json':
      return renderJsonReport(report, { config: options.config ?? {} });
    case 'csv':
      return renderCsvReport(report.races, options.thresholds);
  }
}

/** Writes one file per requested format and returns their paths in format order. */
export async function writeReports(report: ScanReport, options: WriteReportsOptions): Promise<string[]> {
  await fs.mkdir(options.outputDir, { recursive: true });
  const base = reportBaseName(report);
  const formats = [...new Set(options.formats)];

  const written = await Promise.all(
    formats.map(async (format) => {
      const file = path.join(options.outputDir, `${base}.${format}`);
      await fs.writeFile(file, render(format, report, options), 'utf-8');
      return file;
    }),
  );

  logger.info({ files: written }, 'Reports written');
  return written;
}
