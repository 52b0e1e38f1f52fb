import fs from 'node:fs';
import { createServer } from './api/server.js';
import { ScanStatusBoard } from './api/scan-status.js';
import { config } from './config.js';
import { sql } from './db/pool.js';
import { PostgresRaceStore } from './db/race-store.js';
import { redis } from './db/redis.js';
import { AlertDedup } from './notifications/alert-dedup.js';
import { TelegramAlerter } from './notifications/telegram.js';
import { createScanRuntime, runtimeOptionsFromConfig, thresholdsFromConfig } from './runtime.js';
import { startScheduler } from './scheduler/index.js';
import { scanQueue } from './scheduler/queues.js';
import { getAllAdapters } from './adapters/index.js';
import { createScanWorker } from './workers/scan-worker.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  logger.info('Starting race-aggregator...');

  const runtime = createScanRuntime(runtimeOptionsFromConfig(config));
  const thresholds = thresholdsFromConfig(config);
  const store = new PostgresRaceStore(sql);
  const status = new ScanStatusBoard();
  fs.mkdirSync(config.REPORT_DIR, { recursive: true });

  const alerter =
    config.TELEGRAM_BOT_TOKEN && config.TELEGRAM_CHAT_ID
      ? new TelegramAlerter({
          botToken: config.TELEGRAM_BOT_TOKEN,
          chatId: config.TELEGRAM_CHAT_ID,
          maxRaces: config.TELEGRAM_MAX_RACES,
          thresholds,
          dedup: new AlertDedup(redis),
        })
      : null;

  // Start scheduler (registers the repeatable scan)
  await startScheduler(scanQueue, config.SCAN_CRON);

  const scanWorker = createScanWorker(
    {
      runtime,
      status,
      store: config.PERSIST_RACES ? store : null,
      alerter,
      reportDir: config.REPORT_DIR,
      formats: config.REPORT_FORMATS,
      thresholds,
      defaultDaysBack: config.SCAN_DAYS_BACK,
      defaultSources: config.SCAN_SOURCES,
      bucketMinutes: config.BUCKET_MINUTES,
    },
    { host: config.REDIS_HOST, port: config.REDIS_PORT },
  );
  logger.info('Worker started: scan-worker');

  const server = await createServer({
    store,
    sources: getAllAdapters(runtime.registry).map((adapter) => adapter.config),
    status,
    reportDir: config.REPORT_DIR,
    queues: [scanQueue],
  });
  await server.listen({ port: config.PORT, host: '0.0.0.0' });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    await server.close();
    await scanWorker.close();
    await scanQueue.close();
    await sql.end();
    redis.disconnect();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((err) => {
  logger.fatal(err, 'Failed to start');
  process.exit(1);
});
