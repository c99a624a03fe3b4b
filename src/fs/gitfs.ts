import { createReadStream, Dirent, ReadStream, Stats } from 'node:fs';
import { mkdir, readdir, readFile, stat } from 'node:fs/promises';
import { isAbsolute, normalize, resolve } from 'node:path';
import { minimatch } from 'minimatch';
import {
  errnoCode,
  FilesystemClosedError,
  ReadOnlyViolation,
  ResourceNotFoundError,
  ResourceTypeError,
} from '../common/errors';
import { getLogger, Logger } from '../common/logger';
import { createTemporaryDirectory, removeTree } from '../common/temp';
import { CliGitClient } from '../git/client';
import type { GitClient } from '../git/types';
import { describeSource, environmentCredentialSource, expandPath, locateRepository } from '../locator/endpoint';
import type { FilesystemHandle, RepositorySource } from '../locator/types';
import { DEFAULT_EVICTION_WINDOW_SECONDS, EvictionPolicy } from '../mirror/eviction';
import { MirrorManager, MirrorState } from '../mirror/manager';
import { normalizeSelector } from '../resolver/revision';
import type { ResolvedRevision, Selector } from '../resolver/types';
import { baseName, HIDDEN_ENTRIES, joinPath, normalizePath, toSystemPath } from './paths';
import type { GitFSOptions, ResourceInfo } from './types';

/**
 * Who is responsible for the mirror directory. Only an owned directory is
 * ever deleted.
 */
interface MirrorDirectory {
  path: string;
  owned: boolean;
}

const WRITE_MODE = /[wax+]/;

function isHandle(value: string | FilesystemHandle): value is FilesystemHandle {
  return typeof value !== 'string';
}

async function directoryExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

async function prepareDirectory(localDir: GitFSOptions['localDir'], env: NodeJS.ProcessEnv): Promise<MirrorDirectory> {
  if (localDir === undefined) {
    return { path: await createTemporaryDirectory(), owned: true };
  }
  if (isHandle(localDir)) {
    return { path: localDir.getSystemPath('/'), owned: false };
  }
  const expanded = expandPath(localDir, env);
  const path = normalize(isAbsolute(expanded) ? expanded : resolve(expanded));
  if (await directoryExists(path)) {
    return { path, owned: false };
  }
  await mkdir(path, { recursive: true });
  return { path, owned: true };
}

function toInfo(path: string, stats: Stats): ResourceInfo {
  return {
    name: baseName(path),
    path,
    isDir: stats.isDirectory(),
    isFile: stats.isFile(),
    size: stats.size,
    modified: stats.mtime,
  };
}

/**
 * Read-only view of one commit of a git repository, served from a local
 * mirror. Open with `GitFS.open()`; every mutating call throws
 * `ReadOnlyViolation` and leaves the mirror alone.
 */
export class GitFS implements FilesystemHandle {
  readonly source: RepositorySource;
  readonly root: string;
  readonly owned: boolean;
  readonly autoDelete: boolean;
  private currentSelector: Selector;
  private resolved: ResolvedRevision;
  private closed = false;

  private constructor(
    private readonly mirror: MirrorManager,
    private readonly git: GitClient,
    private readonly eviction: EvictionPolicy,
    private readonly logger: Logger,
    init: {
      source: RepositorySource;
      directory: MirrorDirectory;
      autoDelete: boolean;
      selector: Selector;
      resolved: ResolvedRevision;
    },
  ) {
    this.source = init.source;
    this.root = init.directory.path;
    this.owned = init.directory.owned;
    this.autoDelete = init.autoDelete;
    this.currentSelector = init.selector;
    this.resolved = init.resolved;
  }

  /**
   * Locate the repository, bring the mirror up to date, resolve the selector
   * and check the commit out. A directory created here is removed again when
   * any of that fails.
   */
  static async open(options: GitFSOptions): Promise<GitFS> {
    const logger = options.logger ?? getLogger('gitfs');
    const selector = normalizeSelector({ ref: options.ref, revision: options.revision, cutoff: options.cutoff });
    const source = await locateRepository(options.repository, {
      credential: options.credential,
      username: options.username,
      credentialSource: options.credentialSource ?? environmentCredentialSource(),
    });
    const git =
      options.git ??
      new CliGitClient({ executable: options.gitExecutable, timeoutMs: options.commandTimeoutMs });
    const eviction = options.evictAfter ?? DEFAULT_EVICTION_WINDOW_SECONDS;
    const autoDelete = options.autoDelete ?? true;

    const directory = await prepareDirectory(options.localDir, process.env);
    try {
      const mirror = new MirrorManager({
        directory: directory.path,
        git,
        depth: options.depth,
        logger: logger.child('mirror'),
        clock: options.clock,
        lockTimeoutMs: options.lockTimeoutMs,
      });
      await mirror.ensureReady(source, selector, eviction);
      const resolved = await mirror.resolve(selector);
      await mirror.checkout(resolved);

      logger.info('Opened', {
        source: describeSource(source),
        commit: resolved.commitId,
        directory: directory.path,
        owned: directory.owned,
      });
      return new GitFS(mirror, git, eviction, logger, { source, directory, autoDelete, selector, resolved });
    } catch (error) {
      if (directory.owned) {
        await removeTree(directory.path).catch((cleanupError: unknown) => {
          logger.warn('Unable to remove mirror after failed open', {
            directory: directory.path,
            error: String(cleanupError),
          });
        });
      }
      throw error;
    }
  }

  get selector(): Selector {
    return this.currentSelector;
  }

  get resolvedRevision(): ResolvedRevision {
    return this.resolved;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  getSystemPath(path: string): string {
    this.ensureOpen();
    return toSystemPath(this.root, path);
  }

  async getinfo(path: string): Promise<ResourceInfo> {
    return toInfo(normalizePath(path), await this.statPath(path));
  }

  async exists(path: string): Promise<boolean> {
    return (await this.statIfExists(path)) !== undefined;
  }

  async isdir(path: string): Promise<boolean> {
    return (await this.statIfExists(path))?.isDirectory() ?? false;
  }

  async isfile(path: string): Promise<boolean> {
    return (await this.statIfExists(path))?.isFile() ?? false;
  }

  /** Entry names of a directory, sorted. */
  async listdir(path: string): Promise<string[]> {
    return (await this.readDirectory(path)).map((entry) => entry.name);
  }

  async scandir(path: string): Promise<ResourceInfo[]> {
    const base = normalizePath(path);
    const infos: ResourceInfo[] = [];
    for (const entry of await this.readDirectory(path)) {
      const child = joinPath(base, entry.name);
      infos.push(toInfo(child, await this.statPath(child)));
    }
    return infos;
  }

  /**
   * Read stream over a file. Streams still open when the filesystem closes
   * are not revoked.
   */
  async openbin(path: string): Promise<ReadStream> {
    await this.requireFile(path);
    return createReadStream(this.getSystemPath(path));
  }

  async open(path: string, mode = 'r'): Promise<ReadStream> {
    if (WRITE_MODE.test(mode)) {
      throw new ReadOnlyViolation(`open[${mode}]`, normalizePath(path));
    }
    await this.requireFile(path);
    const systemPath = this.getSystemPath(path);
    return mode.includes('b') ? createReadStream(systemPath) : createReadStream(systemPath, { encoding: 'utf8' });
  }

  async readbytes(path: string): Promise<Buffer> {
    await this.requireFile(path);
    return readFile(this.getSystemPath(path));
  }

  async readtext(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
    await this.requireFile(path);
    return readFile(this.getSystemPath(path), { encoding });
  }

  /**
   * Every file below `path`, depth first, in name order.
   */
  async *walk(path = '/'): AsyncGenerator<ResourceInfo> {
    const base = normalizePath(path);
    for (const entry of await this.readDirectory(base)) {
      const child = joinPath(base, entry.name);
      const info = toInfo(child, await this.statPath(child));
      if (info.isDir) {
        yield* this.walk(child);
      } else {
        yield info;
      }
    }
  }

  async glob(pattern: string, path = '/'): Promise<ResourceInfo[]> {
    const matches: ResourceInfo[] = [];
    const normalized = pattern.startsWith('/') ? pattern.slice(1) : pattern;
    for await (const info of this.walk(path)) {
      if (minimatch(info.path.slice(1), normalized, { dot: true, matchBase: !normalized.includes('/') })) {
        matches.push(info);
      }
    }
    return matches;
  }

  writebytes(path: string, _data: Uint8Array): Promise<never> {
    return this.refuse('writebytes', path);
  }

  writetext(path: string, _text: string): Promise<never> {
    return this.refuse('writetext', path);
  }

  create(path: string): Promise<never> {
    return this.refuse('create', path);
  }

  truncate(path: string, _size = 0): Promise<never> {
    return this.refuse('truncate', path);
  }

  makedir(path: string): Promise<never> {
    return this.refuse('makedir', path);
  }

  makedirs(path: string): Promise<never> {
    return this.refuse('makedirs', path);
  }

  remove(path: string): Promise<never> {
    return this.refuse('remove', path);
  }

  removedir(path: string): Promise<never> {
    return this.refuse('removedir', path);
  }

  removetree(path: string): Promise<never> {
    return this.refuse('removetree', path);
  }

  rename(source: string, _destination: string): Promise<never> {
    return this.refuse('rename', source);
  }

  move(source: string, _destination: string): Promise<never> {
    return this.refuse('move', source);
  }

  copy(source: string, _destination: string): Promise<never> {
    return this.refuse('copy', source);
  }

  setinfo(path: string, _info: Partial<ResourceInfo>): Promise<never> {
    return this.refuse('setinfo', path);
  }

  /**
   * Refresh the mirror when the eviction window has passed, then re-resolve
   * the selector. Returns the commit now exposed.
   */
  async update(): Promise<ResolvedRevision> {
    this.ensureOpen();
    await this.mirror.ensureReady(this.source, this.currentSelector, this.eviction);
    const resolved = await this.mirror.resolve(this.currentSelector);
    await this.mirror.checkout(resolved);
    this.resolved = resolved;
    return resolved;
  }

  /**
   * Expose another branch, tag or revision from the same mirror.
   */
  async switchBranch(selector: Selector): Promise<ResolvedRevision> {
    this.ensureOpen();
    const target = normalizeSelector(selector);
    const resolved = await this.mirror.switchBranch(target);
    this.currentSelector = target;
    this.resolved = resolved;
    this.logger.info('Switched', { ref: target.ref, revision: target.revision, commit: resolved.commitId });
    return resolved;
  }

  async currentRevision(short = true): Promise<string> {
    this.ensureOpen();
    return short ? this.git.abbreviate(this.root, this.resolved.commitId) : this.resolved.commitId;
  }

  /**
   * The branch or tag the view follows, or `'HEAD'` when pinned to a commit
   * by revision or cutoff.
   */
  async currentBranch(): Promise<string> {
    this.ensureOpen();
    if (this.currentSelector.revision !== undefined || this.currentSelector.cutoff !== undefined) {
      return 'HEAD';
    }
    return this.currentSelector.ref ?? (await this.git.defaultBranch(this.root)) ?? 'HEAD';
  }

  /**
   * Whether the mirror's HEAD is detached, as git reports it. Mirrors are
   * always checked out detached at the resolved commit.
   */
  async isDetached(): Promise<boolean> {
    this.ensureOpen();
    return (await this.git.currentBranch(this.root)) === undefined;
  }

  async mirrorState(): Promise<MirrorState> {
    this.ensureOpen();
    return this.mirror.state();
  }

  /**
   * Idempotent. Removes the mirror when this instance created it and
   * `autoDelete` is set; a failed removal is logged, not thrown.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (!this.owned || !this.autoDelete) {
      this.logger.debug('Closed; mirror kept', { directory: this.root, owned: this.owned });
      return;
    }
    try {
      await removeTree(this.root);
      this.logger.debug('Closed; mirror removed', { directory: this.root });
    } catch (error) {
      this.logger.warn('Unable to remove mirror directory', { directory: this.root, error: String(error) });
    }
  }

  toString(): string {
    const parts = [`'${describeSource(this.source)}'`];
    const { ref, revision, cutoff } = this.currentSelector;
    if (ref) {
      parts.push(`ref='${ref}'`);
    }
    if (revision) {
      parts.push(`revision='${revision}'`);
    }
    if (cutoff) {
      parts.push(`cutoff='${cutoff.toISOString()}'`);
    }
    return `GitFS(${parts.join(', ')})`;
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new FilesystemClosedError();
    }
  }

  private refuse(operation: string, path: string): Promise<never> {
    return Promise.reject(new ReadOnlyViolation(operation, normalizePath(path)));
  }

  private async statPath(path: string): Promise<Stats> {
    const systemPath = this.getSystemPath(path);
    try {
      return await stat(systemPath);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT' || errnoCode(error) === 'ENOTDIR') {
        throw new ResourceNotFoundError(normalizePath(path));
      }
      throw error;
    }
  }

  private async statIfExists(path: string): Promise<Stats | undefined> {
    try {
      return await this.statPath(path);
    } catch (error) {
      if (error instanceof ResourceNotFoundError) {
        return undefined;
      }
      throw error;
    }
  }

  private async requireFile(path: string): Promise<void> {
    if (!(await this.statPath(path)).isFile()) {
      throw new ResourceTypeError(normalizePath(path), 'file');
    }
  }

  private async readDirectory(path: string): Promise<Dirent[]> {
    const stats = await this.statPath(path);
    if (!stats.isDirectory()) {
      throw new ResourceTypeError(normalizePath(path), 'directory');
    }
    const atRoot = normalizePath(path) === '/';
    const entries = await readdir(this.getSystemPath(path), { withFileTypes: true });
    return entries
      .filter((entry) => !(atRoot && HIDDEN_ENTRIES.has(entry.name)))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }
}

/**
 * Open a filesystem, run `fn` and close it again on every exit path.
 */
export async function withGitFS<T>(options: GitFSOptions, fn: (fs: GitFS) => Promise<T>): Promise<T> {
  const fs = await GitFS.open(options);
  try {
    return await fn(fs);
  } finally {
    await fs.close();
  }
}
