import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, stat, utimes, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { LockTimeoutError } from '../../src/common/errors';
import { acquireLock, withLock } from '../../src/mirror/lock';

let workdir: string;
let lockPath: string;

beforeEach(async () => {
  workdir = await mkdtemp(join(tmpdir(), 'gitrevfs-lock-'));
  lockPath = join(workdir, 'mirror.lock');
});

afterEach(async () => {
  await rm(workdir, { recursive: true, force: true });
});

describe('mirror lock', () => {
  it('creates the lock file and removes it after the guarded work', async () => {
    let contents = '';
    const result = await withLock(lockPath, { timeoutMs: 1000 }, async () => {
      contents = await readFile(lockPath, 'utf8');
      return 'done';
    });

    expect(result).toBe('done');
    expect(contents.split('\n')[0]).toBe(String(process.pid));
    await expect(stat(lockPath)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('releases the lock when the guarded work fails', async () => {
    await expect(
      withLock(lockPath, { timeoutMs: 1000 }, async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    await expect(stat(lockPath)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('times out while another holder keeps a fresh lock', async () => {
    const held = await acquireLock(lockPath, { timeoutMs: 1000 });
    const fresh = new Date(Date.now() + 60_000);
    await utimes(lockPath, fresh, fresh);
    try {
      await expect(acquireLock(lockPath, { timeoutMs: 150, pollMs: 20 })).rejects.toBeInstanceOf(LockTimeoutError);
    } finally {
      await held.release();
    }
  });

  it('breaks a stale lock', async () => {
    await writeFile(lockPath, '99999\n');
    const old = new Date(Date.now() - 60_000);
    await utimes(lockPath, old, old);

    const lock = await acquireLock(lockPath, { timeoutMs: 1000, pollMs: 10 });
    await lock.release();

    await expect(stat(lockPath)).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
