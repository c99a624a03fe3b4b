import type { Logger } from '../common/logger';
import type { CloneDepth, GitClient } from '../git/types';
import type { CredentialSource, FilesystemHandle, RepositoryInput } from '../locator/types';
import type { EvictionPolicy } from '../mirror/eviction';

export interface ResourceInfo {
  /** Last path segment; empty for the root. */
  name: string;
  path: string;
  isDir: boolean;
  isFile: boolean;
  size: number;
  /** Filesystem modification time, not the commit date. */
  modified: Date;
}

export interface GitFSOptions {
  /** Remote URL, local repository path or an open filesystem rooted at one. */
  repository: RepositoryInput;
  /** Branch or tag; the remote's default branch when absent. */
  ref?: string;
  /** Commit id; takes precedence over `ref` and `cutoff`. */
  revision?: string;
  /** Expose the latest commit of `ref` at or before this instant. */
  cutoff?: Date;
  /**
   * Where the mirror lives. A fresh temporary directory when absent. An existing
   * directory stays the caller's and is never deleted.
   */
  localDir?: string | FilesystemHandle;
  /** Delete the mirror on close when this instance created it. Defaults to true. */
  autoDelete?: boolean;
  /** Eviction window in seconds (default 3600) or a predicate. */
  evictAfter?: EvictionPolicy;
  /** Defaults to 1; `'unbounded'` clones the full history. */
  depth?: CloneDepth;
  credential?: string;
  username?: string;
  /** Fallback token provider; defaults to the `GIT_ACCESS_TOKEN` environment variable. */
  credentialSource?: CredentialSource;
  git?: GitClient;
  gitExecutable?: string;
  commandTimeoutMs?: number;
  lockTimeoutMs?: number;
  clock?: () => Date;
  logger?: Logger;
}
