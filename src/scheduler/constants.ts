export const QUEUE_NAMES = {
  SCAN: 'scan-queue',
} as const;

export const JOB_NAMES = {
  RUN_SCAN: 'run-scan',
} as const;

export const SCAN_SCHEDULER_ID = 'scheduled-scan';

export interface ScanJobData {
  /** Days ending today; the configured default when omitted. */
  daysBack?: number;
  /** Adapter ids; every adapter when omitted or empty. */
  sources?: string[];
}
