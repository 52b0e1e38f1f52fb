import type { FastifyPluginAsync } from 'fastify';
import type { RaceStore } from '../../types/store.js';
import type { ScanStatusBoard } from '../scan-status.js';
import { getClientCount } from '../ws-hub.js';

export interface HealthRouteOptions {
  store: RaceStore;
  status: ScanStatusBoard;
}

export const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (app, { store, status }) => {
  app.get('/health', async () => {
    const dbUp = await store.ping();
    const lastScan = status.lastScan;
    return {
      status: dbUp ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      wsClients: getClientCount(),
      lastScanAt: lastScan?.generatedAt ?? null,
      services: {
        database: dbUp ? 'up' : 'down',
      },
    };
  });
};
