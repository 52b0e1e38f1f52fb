import crypto from 'node:crypto';

/**
 * Stable identifier for a merged race, derived from its dedup key string.
 * Same course + date + time bucket + race number = same id across runs.
 */
export function computeRaceId(dedupKey: string): string {
  return crypto.createHash('sha256').update(dedupKey).digest('hex').slice(0, 16);
}
