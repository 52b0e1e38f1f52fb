import { logger } from '../utils/logger.js';

const CACHE_TTL_MS = 60 * 60 * 1000; // 1 hour

/**
 * Simple parser: only the `User-agent: *` group counts, and a path is
 * blocked when it starts with one of that group's Disallow prefixes.
 */
export function isPathAllowed(robotsTxt: string, path: string): boolean {
  let inWildcardBlock = false;
  for (const line of robotsTxt.split('\n')) {
    const trimmed = (line.split('#')[0] ?? '').trim();
    const lower = trimmed.toLowerCase();
    if (lower.startsWith('user-agent:')) {
      inWildcardBlock = trimmed.slice('user-agent:'.length).trim() === '*';
      continue;
    }
    if (inWildcardBlock && lower.startsWith('disallow:')) {
      const disallowed = trimmed.slice('disallow:'.length).trim();
      if (disallowed && path.startsWith(disallowed)) return false;
    }
  }
  return true;
}

/** Returns the robots.txt body for an origin, or null when there is none. */
export type RobotsFetcher = (robotsUrl: string) => Promise<string | null>;

export class RobotsChecker {
  private readonly cache = new Map<string, { text: string; fetchedAt: number }>();

  constructor(
    private readonly fetchRobots: RobotsFetcher,
    private readonly now: () => number = Date.now,
  ) {}

  /** Unreadable robots.txt allows by default. */
  async isAllowed(url: string): Promise<boolean> {
    const { origin, pathname, search } = new URL(url);
    const text = await this.load(origin);
    const path = `${pathname}${search}`;
    const allowed = isPathAllowed(text, path);
    if (!allowed) logger.info({ origin, path }, 'Path blocked by robots.txt');
    return allowed;
  }

  private async load(origin: string): Promise<string> {
    const cached = this.cache.get(origin);
    const now = this.now();
    if (cached && now - cached.fetchedAt < CACHE_TTL_MS) return cached.text;

    let text = '';
    try {
      text = (await this.fetchRobots(`${origin}/robots.txt`)) ?? '';
    } catch (err) {
      logger.warn({ origin, err: err instanceof Error ? err.message : String(err) }, 'Failed to fetch robots.txt, allowing by default');
    }
    this.cache.set(origin, { text, fetchedAt: now });
    return text;
  }
}
