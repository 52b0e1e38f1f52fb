import crypto from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { logger } from '../utils/logger.js';

const DEFAULT_TTL_SECONDS = 1800;
const MIN_TTL_SECONDS = 60;
const MAX_TTL_SECONDS = 6 * 3600;

/** Response headers worth keeping: validators for conditional requests plus caching hints. */
const KEPT_HEADERS = ['etag', 'last-modified', 'content-type', 'cache-control'] as const;

const entryMetaSchema = z.object({
  url: z.string(),
  cachedAt: z.string(),
  expiresAt: z.number(),
  headers: z.record(z.string()),
});

export type CacheEntryMeta = z.infer<typeof entryMetaSchema>;

export interface CachedResponse {
  body: string;
  headers: Record<string, string>;
  /** False once the entry is past its TTL; the body is still usable after a 304. */
  fresh: boolean;
}

export function cacheKey(url: string): string {
  return crypto.createHash('sha256').update(url).digest('hex').slice(0, 24);
}

/** TTL from `Cache-Control: max-age`, clamped to [1 min, 6 h]; 30 min when absent. */
export function ttlFromHeaders(headers: Record<string, string>): number {
  const match = /max-age=(\d+)/i.exec(headers['cache-control'] ?? '');
  if (!match) return DEFAULT_TTL_SECONDS;
  return Math.max(MIN_TTL_SECONDS, Math.min(MAX_TTL_SECONDS, Number(match[1])));
}

function pickHeaders(headers: Record<string, string>): Record<string, string> {
  const kept: Record<string, string> = {};
  for (const name of KEPT_HEADERS) {
    const value = headers[name];
    if (value) kept[name] = value;
  }
  return kept;
}

/**
 * On-disk response cache: `<key>.html` holds the body and `<key>.json` the
 * URL, expiry and validators. Expired entries are kept so their validators
 * can be sent on the next request.
 */
export class ResponseCache {
  constructor(
    readonly dir: string,
    private readonly now: () => number = Date.now,
  ) {}

  private files(url: string): { body: string; meta: string } {
    const key = cacheKey(url);
    return { body: path.join(this.dir, `${key}.html`), meta: path.join(this.dir, `${key}.json`) };
  }

  async get(url: string): Promise<CachedResponse | null> {
    const files = this.files(url);
    try {
      const [body, rawMeta] = await Promise.all([fs.readFile(files.body, 'utf-8'), fs.readFile(files.meta, 'utf-8')]);
      const meta = entryMetaSchema.safeParse(JSON.parse(rawMeta));
      if (!meta.success || meta.data.url !== url) return null;
      return { body, headers: meta.data.headers, fresh: this.now() < meta.data.expiresAt };
    } catch (err) {
      if (!isMissingFile(err)) {
        logger.debug({ url, err: err instanceof Error ? err.message : String(err) }, 'Unreadable cache entry');
      }
      return null;
    }
  }

  /** Lower-cased response headers in. */
  async set(url: string, body: string, headers: Record<string, string>): Promise<void> {
    const files = this.files(url);
    await fs.mkdir(this.dir, { recursive: true });
    await fs.writeFile(files.body, body, 'utf-8');
    await this.writeMeta(url, headers);
  }

  /** Extends an entry after the origin answered 304 Not Modified. */
  async refresh(url: string, headers: Record<string, string>): Promise<void> {
    const current = await this.get(url);
    if (!current) return;
    await this.writeMeta(url, { ...current.headers, ...headers });
  }

  private async writeMeta(url: string, headers: Record<string, string>): Promise<void> {
    const kept = pickHeaders(headers);
    const nowMs = this.now();
    const meta: CacheEntryMeta = {
      url,
      cachedAt: new Date(nowMs).toISOString(),
      expiresAt: nowMs + ttlFromHeaders(kept) * 1000,
      headers: kept,
    };
    await fs.writeFile(this.files(url).meta, JSON.stringify(meta, null, 2), 'utf-8');
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
