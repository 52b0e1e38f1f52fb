import { logger } from '../utils/logger.js';

export interface HubSocket {
  readyState: number;
  send(data: string): void;
  on(event: 'close' | 'error', cb: () => void): void;
}

const clients = new Set<HubSocket>();

export function addClient(ws: HubSocket): void {
  clients.add(ws);
  ws.on('close', () => clients.delete(ws));
  ws.on('error', () => clients.delete(ws));
  logger.debug({ count: clients.size }, 'WS client connected');
}

/** Sends to every open socket; a socket that throws is dropped. */
export function broadcast(event: string, data: unknown): number {
  if (clients.size === 0) return 0;
  const msg = JSON.stringify({ event, data, ts: Date.now() });
  let sent = 0;
  for (const ws of clients) {
    try {
      if (ws.readyState === 1) {
        ws.send(msg);
        sent++;
      }
    } catch (err) {
      logger.debug({ err: err instanceof Error ? err.message : String(err) }, 'Dropping WS client');
      clients.delete(ws);
    }
  }
  return sent;
}

export function getClientCount(): number {
  return clients.size;
}
