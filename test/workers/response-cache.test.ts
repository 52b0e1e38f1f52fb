import fs from 'node:fs';
import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { ResponseCache, cacheKey, ttlFromHeaders } from '../../src/workers/response-cache.js';
import { tempDir } from '../helpers/fakes.js';

const URL_A = 'https://races.test/cards/ascot';

describe('ttlFromHeaders', () => {
  it('should read max-age and clamp it', () => {
    expect(ttlFromHeaders({ 'cache-control': 'public, max-age=600' })).toBe(600);
    expect(ttlFromHeaders({ 'cache-control': 'max-age=30' })).toBe(60);
    expect(ttlFromHeaders({ 'cache-control': 'max-age=100000' })).toBe(21600);
  });

  it('should default to 30 minutes', () => {
    expect(ttlFromHeaders({})).toBe(1800);
    expect(ttlFromHeaders({ 'cache-control': 'no-cache' })).toBe(1800);
  });
});

describe('cacheKey', () => {
  it('should be 24 hex chars and differ per URL', () => {
    expect(cacheKey(URL_A)).toMatch(/^[0-9a-f]{24}$/);
    expect(cacheKey(URL_A)).not.toBe(cacheKey(`${URL_A}?x=1`));
  });
});

describe('ResponseCache', () => {
  it('should return nothing for an unknown URL', async () => {
    expect(await new ResponseCache(tempDir()).get(URL_A)).toBeNull();
  });

  it('should store the body and the validators', async () => {
    const dir = tempDir();
    const cache = new ResponseCache(dir, () => 1_000);

    await cache.set(URL_A, '<html>card</html>', {
      etag: '"v1"',
      'cache-control': 'max-age=600',
      'set-cookie': 'session=test-secret',
    });

    expect(await cache.get(URL_A)).toEqual({
      body: '<html>card</html>',
      headers: { etag: '"v1"', 'cache-control': 'max-age=600' },
      fresh: true,
    });
    expect(fs.existsSync(path.join(dir, `${cacheKey(URL_A)}.html`))).toBe(true);
  });

  it('should keep expired entries as stale', async () => {
    let now = 0;
    const cache = new ResponseCache(tempDir(), () => now);
    await cache.set(URL_A, 'body', { 'cache-control': 'max-age=60' });

    now = 60_000;
    expect((await cache.get(URL_A))?.fresh).toBe(false);
  });

  it('should extend an entry on refresh', async () => {
    let now = 0;
    const cache = new ResponseCache(tempDir(), () => now);
    await cache.set(URL_A, 'body', { 'cache-control': 'max-age=60', etag: '"v1"' });

    now = 120_000;
    await cache.refresh(URL_A, { 'cache-control': 'max-age=300' });

    expect(await cache.get(URL_A)).toEqual({
      body: 'body',
      headers: { etag: '"v1"', 'cache-control': 'max-age=300' },
      fresh: true,
    });
  });

  it('should ignore a corrupt metadata file', async () => {
    const dir = tempDir();
    const cache = new ResponseCache(dir);
    await cache.set(URL_A, 'body', {});
    fs.writeFileSync(path.join(dir, `${cacheKey(URL_A)}.json`), '{"url": 42}');

    expect(await cache.get(URL_A)).toBeNull();
  });
});
