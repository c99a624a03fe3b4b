import type { LogFormat, LogLevel } from '../common/logger';
import type { CloneDepth } from '../git/types';

export interface RepositoryConfig {
  /** Remote URL (https, ssh, git) or scp-like `user@host:path`. */
  url?: string;
  /** Local repository path, relative to the config file. */
  path?: string;
  ref?: string;
  revision?: string;
  /** ISO-8601 instant, or a date value parsed by YAML/TOML. */
  cutoff?: string | Date;
  username?: string;
  /** Environment variable holding the access token. Defaults to `GIT_ACCESS_TOKEN`. */
  credentialEnv?: string;
}

export interface MirrorConfig {
  /** Mirror directory, relative to the config file. A temporary one when absent. */
  localDir?: string;
  autoDelete?: boolean;
  /** Eviction window in seconds. */
  evictAfter?: number;
  depth?: CloneDepth;
  lockTimeoutMs?: number;
}

export interface GitConfig {
  executable?: string;
  timeoutMs?: number;
}

export interface LoggingConfig {
  level?: LogLevel;
  format?: LogFormat;
}

export interface GitRevFsConfig {
  repository: RepositoryConfig;
  mirror?: MirrorConfig;
  git?: GitConfig;
  logging?: LoggingConfig;
  profiles?: Record<string, Partial<Omit<GitRevFsConfig, 'profiles'>>>;
}
