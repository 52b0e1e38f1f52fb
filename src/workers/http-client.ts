import pLimit, { type LimitFunction } from 'p-limit';
import { request, type Dispatcher } from 'undici';
import type { IncomingHttpHeaders } from 'node:http';
import { HostRateLimiter, systemClock, type Clock } from '../compliance/rate-limiter.js';
import { RobotsChecker } from '../compliance/robots-checker.js';
import type { PageFetcher } from '../types/adapter.js';
import type { HttpStats } from '../types/report.js';
import { logger } from '../utils/logger.js';
import type { ResponseCache } from './response-cache.js';

const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent': 'RaceAggregator/1.0 (research project)',
  Accept: 'text/html,application/xhtml+xml,application/json;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-GB,en;q=0.8',
};

/** Worth another attempt: rate limiting, overload and Cloudflare origin errors. */
const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 520, 521, 522]);

export interface HttpClientOptions {
  maxConcurrent?: number;
  minHostIntervalMs?: number;
  maxAttempts?: number;
  cache?: ResponseCache | null;
  respectRobots?: boolean;
  dispatcher?: Dispatcher;
  clock?: Clock;
  random?: () => number;
  headersTimeoutMs?: number;
  bodyTimeoutMs?: number;
}

export interface FetchInit {
  signal?: AbortSignal;
  headers?: Record<string, string>;
}

/** First value of each header, lower-cased names. */
function flattenHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    const first = Array.isArray(value) ? value[0] : value;
    if (first !== undefined) flat[name.toLowerCase()] = first;
  }
  return flat;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

interface HttpReply {
  statusCode: number;
  headers: Record<string, string>;
  /** Null unless the status is 2xx. */
  body: string | null;
}

/**
 * Shared GET client for every adapter: global concurrency cap, per-host
 * spacing, optional robots.txt compliance, on-disk caching with conditional
 * revalidation and bounded retries. Resolves null instead of throwing.
 *
 * Only the request itself holds a concurrency slot; waiting for a host's
 * turn and backoff sleeps happen outside it.
 */
export class HttpClient implements PageFetcher {
  private readonly limit: LimitFunction;
  private readonly rateLimiter: HostRateLimiter;
  private readonly robots: RobotsChecker | null;
  private readonly cache: ResponseCache | null;
  private readonly clock: Clock;
  private readonly random: () => number;
  private readonly maxAttempts: number;
  private readonly counters: HttpStats = {
    success: 0,
    retries: 0,
    blocked: 0,
    failed: 0,
    cacheHits: 0,
    cacheMisses: 0,
  };

  constructor(private readonly options: HttpClientOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
    this.limit = pLimit(options.maxConcurrent ?? 12);
    this.rateLimiter = new HostRateLimiter(options.minHostIntervalMs ?? 250, this.clock);
    this.cache = options.cache ?? null;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 4);
    this.robots = options.respectRobots
      ? new RobotsChecker((url) => this.getRobots(url), () => this.clock.now())
      : null;
  }

  get stats(): HttpStats {
    return { ...this.counters };
  }

  async fetchText(url: string, init: FetchInit = {}): Promise<string | null> {
    if (init.signal?.aborted) return null;

    const cached = this.cache ? await this.cache.get(url) : null;
    if (cached?.fresh) {
      this.counters.cacheHits++;
      return cached.body;
    }
    if (this.cache) this.counters.cacheMisses++;

    if (this.robots && !(await this.robots.isAllowed(url))) {
      this.counters.blocked++;
      return null;
    }

    const headers: Record<string, string> = { ...DEFAULT_HEADERS, ...init.headers };
    if (cached?.headers['etag']) headers['If-None-Match'] = cached.headers['etag'];
    if (cached?.headers['last-modified']) headers['If-Modified-Since'] = cached.headers['last-modified'];

    const host = new URL(url).host;
    const log = logger.child({ url });

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const isLast = attempt === this.maxAttempts - 1;
      await this.rateLimiter.acquire(host);

      let reply: HttpReply;
      try {
        reply = await this.limit(() => this.send(url, headers, init.signal));
      } catch (err) {
        if (init.signal?.aborted) return null;
        this.counters.retries++;
        log.debug({ err: errorMessage(err), attempt }, 'Request failed');
        if (!isLast) await this.clock.sleep(500 + this.random() * 250);
        continue;
      }

      if (reply.statusCode === 304 && cached && this.cache) {
        await this.writeCache(url, (cache) => cache.refresh(url, reply.headers));
        this.counters.success++;
        return cached.body;
      }

      const { body } = reply;
      if (body !== null) {
        if (reply.statusCode === 200) await this.writeCache(url, (cache) => cache.set(url, body, reply.headers));
        this.counters.success++;
        return body;
      }

      if (!RETRYABLE_STATUS.has(reply.statusCode)) {
        log.debug({ status: reply.statusCode }, 'Non-retryable HTTP status');
        break;
      }

      this.counters.retries++;
      log.debug({ status: reply.statusCode, attempt }, 'Retryable HTTP status');
      if (!isLast) await this.clock.sleep(2 ** attempt * 1000 + this.random() * 300);
    }

    this.counters.failed++;
    return null;
  }

  private async send(url: string, headers: Record<string, string>, signal?: AbortSignal): Promise<HttpReply> {
    const response = await request(url, {
      method: 'GET',
      headers,
      maxRedirections: 3,
      headersTimeout: this.options.headersTimeoutMs ?? 15000,
      bodyTimeout: this.options.bodyTimeoutMs ?? 30000,
      signal,
      dispatcher: this.options.dispatcher,
    });
    const replyHeaders = flattenHeaders(response.headers);
    if (response.statusCode >= 200 && response.statusCode < 300) {
      return { statusCode: response.statusCode, headers: replyHeaders, body: await response.body.text() };
    }
    await response.body.dump();
    return { statusCode: response.statusCode, headers: replyHeaders, body: null };
  }

  /** A cache write that fails costs the next run a request, not this body. */
  private async writeCache(url: string, write: (cache: ResponseCache) => Promise<void>): Promise<void> {
    if (!this.cache) return;
    try {
      await write(this.cache);
    } catch (err) {
      logger.warn({ url, err: errorMessage(err) }, 'Could not write response cache');
    }
  }

  private getRobots(robotsUrl: string): Promise<string | null> {
    return this.limit(() => this.requestRobots(robotsUrl));
  }

  private async requestRobots(robotsUrl: string): Promise<string | null> {
    const { statusCode, body } = await request(robotsUrl, {
      method: 'GET',
      headers: DEFAULT_HEADERS,
      maxRedirections: 3,
      headersTimeout: 5000,
      dispatcher: this.options.dispatcher,
    });
    if (statusCode < 200 || statusCode >= 300) {
      await body.dump();
      return null;
    }
    return body.text();
  }
}
