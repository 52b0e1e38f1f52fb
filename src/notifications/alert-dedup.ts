const PREFIX = 'alert:sent:';
const TTL_SECONDS = 86400; // 24 hours

/** The Redis commands the dedup needs; ioredis' client satisfies it. */
export interface AlertKeyStore {
  set(key: string, value: string, secondsToken: 'EX', seconds: number, nx: 'NX'): Promise<'OK' | null>;
}

/**
 * Claims a key per race for 24 hours. Only the first claim succeeds, so a
 * race is alerted at most once per day even across processes.
 */
export class AlertDedup {
  constructor(private readonly store: AlertKeyStore) {}

  async claim(raceId: string): Promise<boolean> {
    const result = await this.store.set(`${PREFIX}${raceId}`, '1', 'EX', TTL_SECONDS, 'NX');
    return result === 'OK';
  }

  /** Up to `limit` items not alerted in the last 24 hours, in order; those returned are marked as alerted. */
  async claimUnsent<T extends { id: string }>(items: T[], limit = Infinity): Promise<T[]> {
    const fresh: T[] = [];
    for (const item of items) {
      if (fresh.length >= limit) break;
      if (await this.claim(item.id)) fresh.push(item);
    }
    return fresh;
  }
}
