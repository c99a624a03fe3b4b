import { open, stat, unlink } from 'node:fs/promises';
import { setTimeout as sleep } from 'node:timers/promises';
import { errnoCode, LockTimeoutError } from '../common/errors';
import type { Logger } from '../common/logger';

export interface LockOptions {
  /** How long to wait, and the age after which an abandoned lock is broken. */
  timeoutMs: number;
  pollMs?: number;
  logger?: Logger;
}

export interface MirrorLock {
  readonly path: string;
  release(): Promise<void>;
}

async function lockAge(path: string): Promise<number | undefined> {
  try {
    return Date.now() - (await stat(path)).mtimeMs;
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

async function removeLock(path: string): Promise<void> {
  await unlink(path).catch((error: unknown) => {
    if (errnoCode(error) !== 'ENOENT') {
      throw error;
    }
  });
}

/**
 * Exclusive-create lock file guarding clone, fetch and checkout of a mirror
 * shared by several processes.
 */
export async function acquireLock(path: string, options: LockOptions): Promise<MirrorLock> {
  const pollMs = options.pollMs ?? 100;
  const deadline = Date.now() + options.timeoutMs;

  for (;;) {
    try {
      const handle = await open(path, 'wx');
      try {
        await handle.writeFile(`${process.pid}\n${new Date().toISOString()}\n`);
      } finally {
        await handle.close();
      }
      return { path, release: () => removeLock(path) };
    } catch (error) {
      if (errnoCode(error) !== 'EEXIST') {
        throw error;
      }
    }

    const age = await lockAge(path);
    if (age !== undefined && age > options.timeoutMs) {
      options.logger?.warn('Breaking stale mirror lock', { path, ageMs: Math.round(age) });
      await removeLock(path);
      continue;
    }
    if (Date.now() >= deadline) {
      throw new LockTimeoutError(path, options.timeoutMs);
    }
    await sleep(pollMs);
  }
}

export async function withLock<T>(path: string, options: LockOptions, fn: () => Promise<T>): Promise<T> {
  const lock = await acquireLock(path, options);
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}
