import { setTimeout as delay } from 'node:timers/promises';

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => delay(ms),
};

/**
 * In-memory per-host throttle: consecutive requests to one host are spaced
 * at least `minIntervalMs` apart. Callers for the same host are served in
 * arrival order; different hosts never wait on each other.
 */
export class HostRateLimiter {
  private readonly lastRequest = new Map<string, number>();
  private readonly tails = new Map<string, Promise<void>>();

  constructor(
    private readonly minIntervalMs = 250,
    private readonly clock: Clock = systemClock,
  ) {}

  acquire(host: string): Promise<void> {
    const previous = this.tails.get(host) ?? Promise.resolve();
    const turn = previous.then(() => this.waitTurn(host));
    this.tails.set(host, turn);
    return turn;
  }

  private async waitTurn(host: string): Promise<void> {
    const last = this.lastRequest.get(host);
    if (last !== undefined) {
      const waitMs = this.minIntervalMs - (this.clock.now() - last);
      if (waitMs > 0) await this.clock.sleep(waitMs);
    }
    this.lastRequest.set(host, this.clock.now());
  }
}
