import type { RepositorySource } from '../locator/types';

/** Number of commits to fetch from each tip, or the full history. */
export type CloneDepth = number | 'unbounded';

export interface CommitEntry {
  commitId: string;
  timestamp: Date;
  parents: string[];
  /** The commit's parents were cut off by a shallow clone. */
  boundary: boolean;
}

export interface CloneOptions {
  source: RepositorySource;
  destination: string;
  /** Branch or tag. The remote's default branch when absent. */
  ref?: string;
  depth: CloneDepth;
}

export interface FetchOptions {
  source: RepositorySource;
  /** Branch, tag or full commit id. */
  ref: string;
  depth: CloneDepth;
}

/**
 * The version-control operations the mirror needs. `CliGitClient` drives the
 * `git` executable; tests substitute an in-process fake.
 */
export interface GitClient {
  /**
   * Clone a single branch or tag. Named refs are recorded as
   * `refs/remotes/origin/<ref>`.
   */
  clone(options: CloneOptions): Promise<void>;
  /**
   * Fetch one ref or commit from origin and return the fetched commit id.
   * Named refs are recorded as `refs/remotes/origin/<ref>`.
   */
  fetch(directory: string, options: FetchOptions): Promise<string>;
  /** Detached checkout of a commit present in the mirror. Clones are left detached too. */
  checkout(directory: string, commitId: string): Promise<void>;
  /** Commits reachable from `rev`, tip first, produced lazily. */
  log(directory: string, rev: string): AsyncIterable<CommitEntry>;
  /** Full commit id for a ref name or (abbreviated) id, or undefined. */
  resolveCommit(directory: string, rev: string): Promise<string | undefined>;
  headCommit(directory: string): Promise<string | undefined>;
  /** Checked out branch name, undefined when HEAD is detached. */
  currentBranch(directory: string): Promise<string | undefined>;
  /** Name of the remote's default branch, when the mirror recorded one. */
  defaultBranch(directory: string): Promise<string | undefined>;
  abbreviate(directory: string, commitId: string): Promise<string>;
  originUrl(directory: string): Promise<string | undefined>;
  isRepository(directory: string): Promise<boolean>;
  isShallow(directory: string): Promise<boolean>;
}

export const REMOTE_NAME = 'origin';

/** Ref name standing for the remote's default branch. */
export const REMOTE_HEAD = 'HEAD';

export function remoteRef(ref: string): string {
  return `refs/remotes/${REMOTE_NAME}/${ref}`;
}

export function isFullCommitId(value: string): boolean {
  return /^(?:[0-9a-f]{40}|[0-9a-f]{64})$/i.test(value);
}

export function looksLikeCommitId(value: string): boolean {
  return /^[0-9a-f]{4,64}$/i.test(value);
}
