import { chmod, lstat, mkdtemp, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { errnoCode } from './errors';

/**
 * Create a temporary directory under the OS tmp dir. Callers own it and
 * remove it with `removeTree`.
 */
export async function createTemporaryDirectory(prefix = 'gitrevfs-'): Promise<string> {
  return mkdtemp(join(tmpdir(), `${prefix}${randomUUID()}-`));
}

async function makeWritable(path: string): Promise<void> {
  const stats = await lstat(path);
  if (stats.isSymbolicLink()) {
    return;
  }
  await chmod(path, stats.mode | 0o200);
  if (stats.isDirectory()) {
    const entries = await readdir(path);
    for (const entry of entries) {
      await makeWritable(join(path, entry));
    }
  }
}

/**
 * Remove a directory tree, including the read-only pack files git leaves
 * under `.git/objects`. A missing path is not an error.
 */
export async function removeTree(path: string): Promise<void> {
  try {
    await rm(path, { recursive: true, force: true });
  } catch (error) {
    const code = errnoCode(error);
    if (code !== 'EPERM' && code !== 'EACCES') {
      throw error;
    }
    await makeWritable(path);
    await rm(path, { recursive: true, force: true });
  }
}
