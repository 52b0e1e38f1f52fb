import type { FastifyPluginAsync } from 'fastify';
import type { SourceAdapterConfig } from '../../types/adapter.js';
import type { ScanStatusBoard } from '../scan-status.js';

export interface SourcesRouteOptions {
  sources: SourceAdapterConfig[];
  status: ScanStatusBoard;
}

export const sourcesRoutes: FastifyPluginAsync<SourcesRouteOptions> = async (app, { sources, status }) => {
  app.get('/', async () => {
    return { data: sources.map((source) => status.sourceStatus(source)) };
  });
};
