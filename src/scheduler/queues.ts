import { Queue } from 'bullmq';
import { config } from '../config.js';
import { QUEUE_NAMES, type ScanJobData } from './constants.js';

const connection = { host: config.REDIS_HOST, port: config.REDIS_PORT };

export const scanQueue = new Queue<ScanJobData>(QUEUE_NAMES.SCAN, {
  connection,
  defaultJobOptions: {
    attempts: 2,
    backoff: { type: 'exponential', delay: 30000 },
    removeOnComplete: { count: 200 },
    removeOnFail: { count: 500 },
  },
});
