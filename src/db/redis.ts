import { Redis } from 'ioredis';
import { config } from '../config.js';
import { logger } from '../utils/logger.js';

function createRedis(): Redis {
  const options = { maxRetriesPerRequest: null, lazyConnect: true };

  // Cloud Redis URLs carry auth and TLS
  if (config.REDIS_URL) return new Redis(config.REDIS_URL, options);

  return new Redis({ host: config.REDIS_HOST, port: config.REDIS_PORT, ...options });
}

export const redis = createRedis();

redis.connect().catch((err: unknown) => {
  logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'Redis not reachable yet, retrying in background');
});
