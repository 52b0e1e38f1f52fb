import type { Queue } from 'bullmq';
import { JOB_NAMES, SCAN_SCHEDULER_ID, type ScanJobData } from './constants.js';
import { logger } from '../utils/logger.js';

/**
 * Registers the repeatable scan. Uses upsertJobScheduler so restarts are
 * idempotent and a changed cron pattern replaces the old one.
 */
export async function startScheduler(queue: Queue<ScanJobData>, pattern: string, data: ScanJobData = {}): Promise<void> {
  await queue.upsertJobScheduler(SCAN_SCHEDULER_ID, { pattern }, { name: JOB_NAMES.RUN_SCAN, data });
  logger.info({ schedulerId: SCAN_SCHEDULER_ID, cron: pattern }, 'Registered job scheduler');
}
