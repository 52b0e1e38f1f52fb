import path from 'node:path';
import Fastify from 'fastify';
import fastifyStatic from '@fastify/static';
import type { Queue } from 'bullmq';
import type { SourceAdapterConfig } from '../types/adapter.js';
import type { RaceStore } from '../types/store.js';
import { loggerOptions } from '../utils/logger.js';
import { healthRoutes } from './routes/health.js';
import { racesRoutes } from './routes/races.js';
import { sourcesRoutes } from './routes/sources.js';
import { bullBoardPlugin } from './plugins/bull-board.js';
import { websocketPlugin } from './plugins/websocket.js';
import type { ScanStatusBoard } from './scan-status.js';

export interface ServerOptions {
  store: RaceStore;
  sources: SourceAdapterConfig[];
  status: ScanStatusBoard;
  /** Written reports, served under /reports/. */
  reportDir?: string;
  /** Queues shown on the /admin/queues dashboard. */
  queues?: Queue[];
  /** Off in tests. */
  log?: boolean;
}

export async function createServer(options: ServerOptions) {
  const app = Fastify({
    logger: options.log === false ? false : { ...loggerOptions, name: 'api' },
  });

  if (options.reportDir) {
    await app.register(fastifyStatic, {
      root: path.resolve(options.reportDir),
      prefix: '/reports/',
    });
  }

  await app.register(websocketPlugin, { status: options.status });
  await app.register(healthRoutes, { store: options.store, status: options.status });
  await app.register(racesRoutes, { prefix: '/races', store: options.store });
  await app.register(sourcesRoutes, { prefix: '/sources', sources: options.sources, status: options.status });
  if (options.queues && options.queues.length > 0) {
    await app.register(bullBoardPlugin, { queues: options.queues });
  }

  return app;
}
