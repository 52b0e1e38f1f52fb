/**
 * Enqueue a one-off scan on the running service.
 * Usage: npm run trigger-scan -- [daysBack] [adapterId,adapterId]
 */
import { Queue } from 'bullmq';
import { config } from '../src/config.js';
import { QUEUE_NAMES, JOB_NAMES, type ScanJobData } from '../src/scheduler/constants.js';

const daysBack = process.argv[2] ? Number(process.argv[2]) : undefined;
const sources = process.argv[3] ? process.argv[3].split(',').filter(Boolean) : undefined;

if (daysBack !== undefined && (!Number.isInteger(daysBack) || daysBack < 1)) {
  console.error(`Invalid daysBack: ${process.argv[2]}`);
  process.exit(1);
}

const scanQueue = new Queue<ScanJobData>(QUEUE_NAMES.SCAN, {
  connection: { host: config.REDIS_HOST, port: config.REDIS_PORT },
});

const job = await scanQueue.add(JOB_NAMES.RUN_SCAN, { daysBack, sources });

console.log(`Enqueued scan job: ${job.id}`);
console.log(`  daysBack: ${daysBack ?? config.SCAN_DAYS_BACK}`);
console.log(`  sources: ${sources?.join(', ') ?? 'all'}`);
console.log(`\nWatch logs in the running app process.`);

await scanQueue.close();
