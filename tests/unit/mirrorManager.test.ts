import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigurationError, SyncError } from '../../src/common/errors';
import { Logger } from '../../src/common/logger';
import { locateRepository } from '../../src/locator/endpoint';
import type { RepositorySource } from '../../src/locator/types';
import { MirrorManager } from '../../src/mirror/manager';
import { FakeGitClient, FakeRemote } from '../helpers/fakeGit';

const REMOTE = 'https://example.test/org/mirror.git';
const T0 = 1_700_000_000_000;
const logger = new Logger({ level: 'silent' });

let workdir: string;
let directory: string;
let remote: FakeRemote;
let git: FakeGitClient;
let source: RepositorySource;
let now: number;
let c1: string;
let c2: string;
let c3: string;

function manager(depth: number | 'unbounded' = 1): MirrorManager {
  return new MirrorManager({ directory, git, depth, logger, clock: () => new Date(now) });
}

beforeEach(async () => {
  workdir = await mkdtemp(join(tmpdir(), 'gitrevfs-mirror-'));
  directory = join(workdir, 'mirror');
  remote = new FakeRemote(REMOTE);
  c1 = remote.commit('main', 100, { 'file.txt': 'one', 'docs/readme.md': 'first' });
  c2 = remote.commit('main', 200, { 'file.txt': 'two' });
  c3 = remote.commit('main', 300, { 'file.txt': 'three' });
  git = new FakeGitClient(remote);
  source = await locateRepository(REMOTE);
  now = T0;
});

afterEach(async () => {
  await rm(workdir, { recursive: true, force: true });
});

describe('MirrorManager.ensureReady', () => {
  it('clones a missing mirror and stamps the sync time', async () => {
    const outcome = await manager().ensureReady(source, { ref: 'main' });

    expect(outcome).toBe('cloned');
    expect(git.calls.clone).toBe(1);
    expect(await readFile(join(directory, 'file.txt'), 'utf8')).toBe('three');
    expect((await stat(directory)).mtime.getTime()).toBe(T0);
    expect(await readdir(workdir)).toEqual(['mirror']);
  });

  it('clones into an existing empty directory', async () => {
    await mkdir(directory);

    await expect(manager().ensureReady(source, { ref: 'main' })).resolves.toBe('cloned');
    expect(await readFile(join(directory, 'file.txt'), 'utf8')).toBe('three');
  });

  it('fetches exactly once when the eviction window has passed', async () => {
    await manager().ensureReady(source, { ref: 'main' });
    git.resetCalls();

    now = T0 + 3601 * 1000;
    const outcome = await manager().ensureReady(source, { ref: 'main' }, 3600);

    expect(outcome).toBe('fetched');
    expect(git.calls).toEqual({ clone: 0, fetch: 1, checkout: 0 });
    expect((await stat(directory)).mtime.getTime()).toBe(now);
  });

  it('makes no network call inside the eviction window', async () => {
    await manager().ensureReady(source, { ref: 'main' });
    git.resetCalls();

    now = T0 + 3599 * 1000;
    const outcome = await manager().ensureReady(source, { ref: 'main' }, 3600);

    expect(outcome).toBe('reused');
    expect(git.networkCalls).toBe(0);
  });

  it('consults an eviction predicate', async () => {
    await manager().ensureReady(source, { ref: 'main' });
    git.resetCalls();

    const outcome = await manager().ensureReady(source, { ref: 'main' }, (path, lastSync) => {
      return path === directory && lastSync.getTime() === T0;
    });

    expect(outcome).toBe('fetched');
    expect(git.calls.fetch).toBe(1);
  });

  it('fetches a ref the mirror does not have yet, even when fresh', async () => {
    await manager().ensureReady(source, { ref: 'main' });
    remote.commit('release', 400, { 'file.txt': 'release' });
    git.resetCalls();

    const outcome = await manager().ensureReady(source, { ref: 'release' });

    expect(outcome).toBe('fetched');
    expect(git.calls.fetch).toBe(1);
  });

  it('reuses a mirror holding the revision inside the eviction window', async () => {
    await manager().ensureReady(source, { ref: 'main' });
    git.resetCalls();

    now = T0 + 3599 * 1000;
    const outcome = await manager().ensureReady(source, { revision: c3 });

    expect(outcome).toBe('reused');
    expect(git.networkCalls).toBe(0);
  });

  it('fetches once for a revision selector after the eviction window', async () => {
    await manager().ensureReady(source, { ref: 'main' });
    const c4 = remote.commit('main', 400, { 'file.txt': 'four' });
    git.resetCalls();

    now = T0 + 3601 * 1000;
    const outcome = await manager().ensureReady(source, { revision: c3 });

    expect(outcome).toBe('fetched');
    expect(git.calls).toEqual({ clone: 0, fetch: 1, checkout: 0 });
    expect((await stat(directory)).mtime.getTime()).toBe(now);
    await expect(git.resolveCommit(directory, 'refs/remotes/origin/HEAD')).resolves.toBe(c4);
  });

  it('fetches a revision missing from a fresh shallow clone', async () => {
    const outcome = await manager().ensureReady(source, { revision: c1 });

    expect(outcome).toBe('cloned');
    expect(git.calls).toMatchObject({ clone: 1, fetch: 1 });
    await expect(git.resolveCommit(directory, c1)).resolves.toBe(c1);
  });

  it('leaves no partial mirror behind when the clone fails', async () => {
    remote.offline = true;

    await expect(manager().ensureReady(source, { ref: 'main' })).rejects.toBeInstanceOf(SyncError);
    expect(await readdir(workdir)).toEqual([]);
  });

  it('leaves an existing mirror untouched when a fetch fails', async () => {
    await manager().ensureReady(source, { ref: 'main' });
    remote.offline = true;

    now = T0 + 3601 * 1000;
    await expect(manager().ensureReady(source, { ref: 'main' })).rejects.toMatchObject({ operation: 'fetch' });
    expect(await readFile(join(directory, 'file.txt'), 'utf8')).toBe('three');
    expect((await stat(directory)).mtime.getTime()).toBe(T0);
  });

  it('rejects a non-empty directory that is not a working copy', async () => {
    await mkdir(directory);
    await writeFile(join(directory, 'notes.txt'), 'mine');

    await expect(manager().ensureReady(source, { ref: 'main' })).rejects.toThrow(
      `Directory is neither empty nor a git working copy: ${directory}`,
    );
    expect(await readFile(join(directory, 'notes.txt'), 'utf8')).toBe('mine');
  });

  it('rejects a mirror cloned from another origin', async () => {
    const other = new FakeRemote('https://example.test/org/other.git');
    other.commit('main', 100, { 'other.txt': 'x' });
    const otherGit = new FakeGitClient(remote, other);
    await new MirrorManager({ directory, git: otherGit, logger }).ensureReady(
      await locateRepository(other.location),
      { ref: 'main' },
    );

    await expect(
      new MirrorManager({ directory, git: otherGit, logger }).ensureReady(source, { ref: 'main' }),
    ).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('rejects an invalid depth', () => {
    expect(() => manager(0)).toThrow(ConfigurationError);
    expect(() => manager(1.5)).toThrow(ConfigurationError);
  });
});

describe('MirrorManager.checkout', () => {
  it('is idempotent for the same resolved revision', async () => {
    const mirror = manager('unbounded');
    await mirror.ensureReady(source, { ref: 'main' });
    const resolved = await mirror.resolve({ ref: 'main', cutoff: new Date(250 * 1000) });
    expect(resolved.commitId).toBe(c2);

    await expect(mirror.checkout(resolved)).resolves.toBe(true);
    const entries = await readdir(directory);
    const mtime = (await stat(join(directory, 'file.txt'))).mtimeMs;

    await expect(mirror.checkout(resolved)).resolves.toBe(false);

    expect(git.calls.checkout).toBe(1);
    expect(await readdir(directory)).toEqual(entries);
    expect((await stat(join(directory, 'file.txt'))).mtimeMs).toBe(mtime);
    expect(await readFile(join(directory, 'file.txt'), 'utf8')).toBe('two');
  });

  it('keeps the sync time on the mirror directory across checkouts', async () => {
    const mirror = manager('unbounded');
    await mirror.ensureReady(source, { ref: 'main' });

    now = T0 + 60_000;
    await mirror.checkout(await mirror.resolve({ revision: c1 }));

    expect((await stat(directory)).mtime.getTime()).toBe(T0);
    expect((await mirror.state()).checkedOutCommit).toBe(c1);
  });

  it('skips the checkout when the commit is already at HEAD', async () => {
    const mirror = manager();
    await mirror.ensureReady(source, { ref: 'main' });

    await expect(mirror.checkout(await mirror.resolve({ ref: 'main' }))).resolves.toBe(false);
    expect(git.calls.checkout).toBe(0);
  });
});

describe('MirrorManager.switchBranch', () => {
  it('fetches only refs missing from the mirror', async () => {
    const mirror = manager();
    await mirror.ensureReady(source, { ref: 'main' });
    const dev = remote.commit('dev', 500, { 'file.txt': 'dev' });
    git.resetCalls();

    const switched = await mirror.switchBranch({ ref: 'dev' });
    expect(switched.commitId).toBe(dev);
    expect(await readFile(join(directory, 'file.txt'), 'utf8')).toBe('dev');

    const back = await mirror.switchBranch({ ref: 'main' });
    expect(back.commitId).toBe(c3);
    expect(git.calls).toEqual({ clone: 0, fetch: 1, checkout: 2 });
  });

  it('requires a prepared mirror', async () => {
    await expect(manager().switchBranch({ ref: 'main' })).rejects.toBeInstanceOf(ConfigurationError);
  });
});
