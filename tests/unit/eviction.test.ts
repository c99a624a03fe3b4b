import { describe, it, expect } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  DEFAULT_EVICTION_WINDOW_SECONDS,
  isEvicted,
  readLastSyncTime,
  writeLastSyncTime,
} from '../../src/mirror/eviction';

const now = new Date(10_000_000);
const secondsAgo = (seconds: number) => new Date(now.getTime() - seconds * 1000);

describe('isEvicted', () => {
  it('defaults to a one hour window', () => {
    expect(DEFAULT_EVICTION_WINDOW_SECONDS).toBe(3600);
  });

  it('evicts only once the window has passed', () => {
    expect(isEvicted('/m', secondsAgo(3601), now, 3600)).toBe(true);
    expect(isEvicted('/m', secondsAgo(3600), now, 3600)).toBe(false);
    expect(isEvicted('/m', secondsAgo(3599), now, 3600)).toBe(false);
  });

  it('always evicts with a zero window and never with an infinite one', () => {
    expect(isEvicted('/m', now, now, 0)).toBe(true);
    expect(isEvicted('/m', new Date(0), now, Number.POSITIVE_INFINITY)).toBe(false);
  });

  it('delegates to a predicate', () => {
    const calls: Array<[string, number, number]> = [];
    const evicted = isEvicted('/m', secondsAgo(5), now, (directory, lastSync, current) => {
      calls.push([directory, lastSync.getTime(), current.getTime()]);
      return true;
    });

    expect(evicted).toBe(true);
    expect(calls).toEqual([['/m', now.getTime() - 5000, now.getTime()]]);
  });
});

describe('last sync time', () => {
  it('is stored as the directory modification time', async () => {
    const directory = await mkdtemp(join(tmpdir(), 'gitrevfs-eviction-'));
    try {
      await writeLastSyncTime(directory, new Date(1_700_000_000_000));
      const stored = await readLastSyncTime(directory);
      expect(stored?.getTime()).toBe(1_700_000_000_000);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it('is undefined for a missing directory', async () => {
    await expect(readLastSyncTime(join(tmpdir(), 'gitrevfs-missing-directory', 'nested'))).resolves.toBeUndefined();
  });
});
