/**
 * Check BullMQ queue status.
 * Usage: npm run check-queues
 */
import { Queue } from 'bullmq';
import { config } from '../src/config.js';
import { QUEUE_NAMES } from '../src/scheduler/constants.js';

const connection = { host: config.REDIS_HOST, port: config.REDIS_PORT };

for (const name of Object.values(QUEUE_NAMES)) {
  const queue = new Queue(name, { connection });

  const counts = await queue.getJobCounts();
  console.log(`\n=== Queue: ${name} ===`);
  console.log(`  waiting: ${counts.waiting}, active: ${counts.active}, completed: ${counts.completed}, failed: ${counts.failed}, delayed: ${counts.delayed}`);

  const schedulers = await queue.getJobSchedulers();
  for (const scheduler of schedulers) {
    console.log(`  SCHEDULER [${scheduler.key}]: ${scheduler.pattern ?? scheduler.every ?? ''} next=${scheduler.next ?? '-'}`);
  }

  const failed = await queue.getFailed(0, 5);
  for (const job of failed) {
    console.log(`  FAILED [${job.id}]: ${job.failedReason}`);
  }

  const completed = await queue.getCompleted(0, 5);
  for (const job of completed) {
    console.log(`  COMPLETED [${job.id}]: ${JSON.stringify(job.returnvalue).slice(0, 200)}`);
  }

  await queue.close();
}
