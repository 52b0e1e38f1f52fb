import { describe, it, expect } from 'vitest';
import { HostRateLimiter } from '../../src/compliance/rate-limiter.js';
import { fakeClock } from '../helpers/fakes.js';

describe('HostRateLimiter', () => {
  it('should let the first request to a host through at once', async () => {
    const { clock, sleeps } = fakeClock();
    await new HostRateLimiter(250, clock).acquire('a.test');
    expect(sleeps).toEqual([]);
  });

  it('should space queued requests to the same host', async () => {
    const { clock, sleeps } = fakeClock();
    const limiter = new HostRateLimiter(250, clock);

    await Promise.all([limiter.acquire('a.test'), limiter.acquire('a.test'), limiter.acquire('a.test')]);

    expect(sleeps).toEqual([250, 250]);
  });

  it('should only wait for what is left of the interval', async () => {
    const { clock, sleeps, advance } = fakeClock();
    const limiter = new HostRateLimiter(250, clock);

    await limiter.acquire('a.test');
    advance(100);
    await limiter.acquire('a.test');

    expect(sleeps).toEqual([150]);
  });

  it('should not make different hosts wait on each other', async () => {
    const { clock, sleeps } = fakeClock();
    const limiter = new HostRateLimiter(250, clock);

    await Promise.all([limiter.acquire('a.test'), limiter.acquire('b.test')]);

    expect(sleeps).toEqual([]);
  });
});
