import { mkdir, readdir, rename, rmdir } from 'node:fs/promises';
import { randomUUID } from 'node:crypto';
import { basename, dirname, join } from 'node:path';
import { ConfigurationError, errnoCode, RevisionNotFoundError } from '../common/errors';
import { getLogger, Logger } from '../common/logger';
import { removeTree } from '../common/temp';
import { CloneDepth, GitClient, REMOTE_HEAD } from '../git/types';
import { describeSource } from '../locator/endpoint';
import type { RepositorySource } from '../locator/types';
import { measureSync, recordSyncMetrics, SyncOperation } from '../observability/metrics';
import { withSpan } from '../observability/tracing';
import { normalizeSelector, RevisionResolver } from '../resolver/revision';
import type { ResolvedRevision, Selector } from '../resolver/types';
import {
  DEFAULT_EVICTION_WINDOW_SECONDS,
  EvictionPolicy,
  isEvicted,
  readLastSyncTime,
  writeLastSyncTime,
} from './eviction';
import { withLock } from './lock';

export const DEFAULT_CLONE_DEPTH = 1;
export const DEFAULT_LOCK_TIMEOUT_MS = 60_000;

export interface MirrorState {
  path: string;
  lastSyncTime?: Date;
  checkedOutCommit?: string;
  depth: CloneDepth;
}

export type ReadyOutcome = 'cloned' | 'fetched' | 'reused';

export interface MirrorManagerOptions {
  directory: string;
  git: GitClient;
  depth?: CloneDepth;
  resolver?: RevisionResolver;
  logger?: Logger;
  clock?: () => Date;
  lockTimeoutMs?: number;
}

function sameLocation(a: string, b: string): boolean {
  const normalize = (value: string) => value.trim().replace(/\/+$/, '');
  return normalize(a) === normalize(b);
}

async function isEmptyDirectory(directory: string): Promise<boolean | undefined> {
  try {
    const entries = await readdir(directory);
    return entries.length === 0;
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return undefined;
    }
    if (errnoCode(error) === 'ENOTDIR') {
      throw new ConfigurationError(`Mirror path is not a directory: ${directory}`);
    }
    throw error;
  }
}

/**
 * Owns the on-disk working copy: decides between a fresh clone, a fetch and
 * plain reuse, and checks out resolved commits.
 */
export class MirrorManager {
  readonly directory: string;
  readonly depth: CloneDepth;
  readonly resolver: RevisionResolver;
  private readonly git: GitClient;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly lockPath: string;
  private readonly lockTimeoutMs: number;
  private source?: RepositorySource;
  private checkedOut?: string;
  private lastSync?: Date;

  constructor(options: MirrorManagerOptions) {
    const depth = options.depth ?? DEFAULT_CLONE_DEPTH;
    if (depth !== 'unbounded' && (!Number.isInteger(depth) || depth < 1)) {
      throw new ConfigurationError(`Clone depth must be a positive integer or 'unbounded', got ${depth}`);
    }
    this.directory = options.directory;
    this.depth = depth;
    this.git = options.git;
    this.logger = options.logger ?? getLogger('gitfs:mirror');
    this.clock = options.clock ?? (() => new Date());
    this.resolver = options.resolver ?? new RevisionResolver(this.git, { logger: this.logger, clock: this.clock });
    this.lockPath = join(dirname(this.directory), `${basename(this.directory)}.lock`);
    this.lockTimeoutMs = options.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
  }

  /**
   * Make the mirror hold the commits the selector needs: clone when there is
   * no mirror, fetch when it lacks the selected ref or commit or is older
   * than the eviction window, otherwise touch nothing.
   */
  async ensureReady(
    source: RepositorySource,
    selector: Selector,
    eviction: EvictionPolicy = DEFAULT_EVICTION_WINDOW_SECONDS,
  ): Promise<ReadyOutcome> {
    const target = normalizeSelector(selector);
    this.source = source;

    return this.locked(async () => {
      const empty = await isEmptyDirectory(this.directory);
      if (empty === undefined || empty) {
        await this.cloneInto(source, target);
        return 'cloned';
      }

      await this.verifyExistingMirror(source);
      const lastSync = (await readLastSyncTime(this.directory)) ?? new Date(0);
      this.lastSync = lastSync;
      const now = this.clock();

      if (!(await this.hasTarget(target))) {
        this.logger.info('Selected ref missing from mirror; fetching', { ref: target.ref, revision: target.revision });
        await this.fetchTarget(source, target);
        return 'fetched';
      }
      if (isEvicted(this.directory, lastSync, now, eviction)) {
        this.logger.info('Mirror is stale; fetching', {
          directory: this.directory,
          lastSync: lastSync.toISOString(),
        });
        // a pinned commit is already present; refresh the ref it was taken from
        await this.fetchTarget(source, { ref: target.ref });
        return 'fetched';
      }

      this.logger.debug('Reusing mirror', { directory: this.directory, lastSync: lastSync.toISOString() });
      recordSyncMetrics({ operation: 'reuse', outcome: 'success', durationMs: 0 });
      return 'reused';
    });
  }

  async resolve(selector: Selector): Promise<ResolvedRevision> {
    const target = normalizeSelector(selector);
    return measureSync('resolve', () => this.resolver.resolve(this.directory, target, { depth: this.depth }));
  }

  /**
   * Point the working tree at a resolved commit. Returns false, without
   * touching the mirror, when that commit is already checked out.
   */
  async checkout(resolved: ResolvedRevision): Promise<boolean> {
    if (this.checkedOut === resolved.commitId) {
      return false;
    }
    const head = await this.git.headCommit(this.directory);
    if (head && head === resolved.commitId) {
      this.checkedOut = head;
      return false;
    }

    await this.locked(() =>
      this.instrument('checkout', { commit: resolved.commitId }, async () => {
        await this.git.checkout(this.directory, resolved.commitId);
        if (this.lastSync) {
          // checkout rewrites the root directory; keep its mtime on the sync clock
          await writeLastSyncTime(this.directory, this.lastSync);
        }
      }),
    );
    this.checkedOut = resolved.commitId;
    this.logger.info('Checked out', { directory: this.directory, commit: resolved.commitId, ref: resolved.ref });
    return true;
  }

  /**
   * Re-resolve against another branch, tag or revision. Refs already in the
   * mirror are used as they are; a missing one is fetched first.
   */
  async switchBranch(selector: Selector): Promise<ResolvedRevision> {
    const target = normalizeSelector(selector);
    const source = this.source;
    if (!source) {
      throw new ConfigurationError('Mirror is not ready; call ensureReady() first');
    }
    if (!(await this.hasTarget(target))) {
      await this.locked(() => this.fetchTarget(source, target));
    }
    const resolved = await this.resolve(target);
    await this.checkout(resolved);
    return resolved;
  }

  async state(): Promise<MirrorState> {
    return {
      path: this.directory,
      lastSyncTime: await readLastSyncTime(this.directory),
      checkedOutCommit: this.checkedOut,
      depth: this.depth,
    };
  }

  private async hasTarget(selector: Selector): Promise<boolean> {
    if (selector.revision) {
      return (await this.git.resolveCommit(this.directory, selector.revision)) !== undefined;
    }
    try {
      await this.resolver.resolveTip(this.directory, selector.ref ?? REMOTE_HEAD);
      return true;
    } catch (error) {
      if (error instanceof RevisionNotFoundError) {
        return false;
      }
      throw error;
    }
  }

  private async verifyExistingMirror(source: RepositorySource): Promise<void> {
    if (!(await this.git.isRepository(this.directory))) {
      throw new ConfigurationError(`Directory is neither empty nor a git working copy: ${this.directory}`);
    }
    const origin = await this.git.originUrl(this.directory);
    if (!origin || !sameLocation(origin, source.location)) {
      throw new ConfigurationError(
        `Existing mirror has a different origin: '${origin ?? '<none>'}' != '${describeSource(source)}'`,
      );
    }
  }

  /**
   * Clone beside the mirror and rename into place, so a failed clone never
   * leaves a partial working copy at the mirror path.
   */
  private async cloneInto(source: RepositorySource, selector: Selector): Promise<void> {
    const parent = dirname(this.directory);
    const staging = join(parent, `.${basename(this.directory)}.staging-${randomUUID()}`);
    await mkdir(parent, { recursive: true });

    this.logger.info('Cloning', { source: describeSource(source), ref: selector.ref, depth: this.depth });
    try {
      await this.instrument('clone', { ref: selector.ref, depth: String(this.depth) }, async () => {
        await this.git.clone({ source, destination: staging, ref: selector.ref, depth: this.depth });
        if (selector.revision && !(await this.git.resolveCommit(staging, selector.revision))) {
          await this.git.fetch(staging, { source, ref: selector.revision, depth: this.depth });
        }
      });
      await rmdir(this.directory).catch((error: unknown) => {
        if (errnoCode(error) !== 'ENOENT') {
          throw error;
        }
      });
      await rename(staging, this.directory);
    } catch (error) {
      await removeTree(staging);
      throw error;
    }

    const now = this.clock();
    await writeLastSyncTime(this.directory, now);
    this.lastSync = now;
    this.checkedOut = undefined;
  }

  private async fetchTarget(source: RepositorySource, selector: Selector): Promise<void> {
    const ref = selector.revision ?? selector.ref ?? REMOTE_HEAD;
    await this.instrument('fetch', { ref, depth: String(this.depth) }, () =>
      this.git.fetch(this.directory, { source, ref, depth: this.depth }),
    );
    const now = this.clock();
    await writeLastSyncTime(this.directory, now);
    this.lastSync = now;
  }

  private instrument<T>(
    operation: SyncOperation,
    attributes: Record<string, string | undefined>,
    fn: () => Promise<T>,
  ): Promise<T> {
    return withSpan(`gitfs.${operation}`, { directory: this.directory, ...attributes }, () =>
      measureSync(operation, fn),
    );
  }

  private async locked<T>(fn: () => Promise<T>): Promise<T> {
    await mkdir(dirname(this.lockPath), { recursive: true });
    return withLock(this.lockPath, { timeoutMs: this.lockTimeoutMs, logger: this.logger }, fn);
  }
}
