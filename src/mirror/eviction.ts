import { stat, utimes } from 'node:fs/promises';
import { errnoCode } from '../common/errors';

export const DEFAULT_EVICTION_WINDOW_SECONDS = 3600;

export type EvictionPredicate = (directory: string, lastSync: Date, now: Date) => boolean;

/**
 * Seconds a mirror may go without a fetch, or a predicate deciding it.
 * `0` refreshes on every open, `Infinity` never does.
 */
export type EvictionPolicy = number | EvictionPredicate;

export function isEvicted(directory: string, lastSync: Date, now: Date, policy: EvictionPolicy): boolean {
  if (typeof policy === 'function') {
    return policy(directory, lastSync, now);
  }
  if (policy <= 0) {
    return true;
  }
  return now.getTime() - lastSync.getTime() > policy * 1000;
}

/**
 * The mirror's last sync time is its directory's modification time.
 */
export async function readLastSyncTime(directory: string): Promise<Date | undefined> {
  try {
    return (await stat(directory)).mtime;
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

export async function writeLastSyncTime(directory: string, time: Date): Promise<void> {
  await utimes(directory, time, time);
}
