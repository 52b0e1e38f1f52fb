import websocket from '@fastify/websocket';
import type { FastifyPluginAsync } from 'fastify';
import type { ScanStatusBoard } from '../scan-status.js';
import { addClient } from '../ws-hub.js';

export interface WebsocketPluginOptions {
  status: ScanStatusBoard;
}

/** `/ws` pushes `races:updated` after every scan; new clients get the last scan summary first. */
export const websocketPlugin: FastifyPluginAsync<WebsocketPluginOptions> = async (app, { status }) => {
  await app.register(websocket);

  app.get('/ws', { websocket: true }, (socket) => {
    addClient(socket);
    socket.send(JSON.stringify({ event: 'connected', data: { lastScan: status.lastScan }, ts: Date.now() }));
  });
};
