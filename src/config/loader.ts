import { readFile } from 'node:fs/promises';
import { dirname, extname, isAbsolute, resolve } from 'node:path';
import yaml from 'js-yaml';
import toml from 'toml';
import { ConfigurationError, errnoCode } from '../common/errors';
import { isLogFormat, isLogLevel } from '../common/logger';
import type { CloneDepth } from '../git/types';
import { environmentCredentialSource, expandPath } from '../locator/endpoint';
import type { GitFSOptions } from '../fs/types';
import type { GitConfig, GitRevFsConfig, LoggingConfig, MirrorConfig, RepositoryConfig } from './types';

type RawObject = Record<string, unknown>;

const SECTIONS = ['repository', 'mirror', 'git', 'logging'] as const;

function isObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function parseContents(contents: string, ext: string, path: string): unknown {
  try {
    switch (ext) {
      case '.yaml':
      case '.yml':
        return yaml.load(contents);
      case '.toml':
        return toml.parse(contents);
      case '.json':
        return JSON.parse(contents);
      default:
        throw new ConfigurationError(`Unsupported config format for ${path}`);
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw error;
    }
    throw new ConfigurationError(`Unable to parse ${path}: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }
}

export async function loadConfig(path: string, profile?: string): Promise<GitRevFsConfig> {
  const absolute = resolve(path);
  const baseDir = dirname(absolute);
  let contents: string;
  try {
    contents = await readFile(absolute, 'utf8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      throw new ConfigurationError(`Config file not found: ${absolute}`, { cause: error });
    }
    throw error;
  }

  const parsed = parseContents(contents, extname(absolute).toLowerCase(), absolute);
  if (!isObject(parsed) || !isObject(parsed.repository)) {
    throw new ConfigurationError('Config must define "repository" section');
  }

  let raw: RawObject = parsed;
  if (profile) {
    const profiles = isObject(parsed.profiles) ? parsed.profiles : {};
    const overlay = profiles[profile];
    if (!isObject(overlay)) {
      throw new ConfigurationError(`Profile ${profile} not found in config`);
    }
    raw = mergeConfigs(parsed, overlay);
  }

  return normalizeConfigPaths(validateConfig(raw), baseDir);
}

function mergeConfigs(base: RawObject, overlay: RawObject): RawObject {
  const merged: RawObject = { ...base };
  for (const section of SECTIONS) {
    const baseSection = base[section];
    const overlaySection = overlay[section];
    if (isObject(baseSection) && isObject(overlaySection)) {
      merged[section] = { ...baseSection, ...overlaySection };
    } else if (overlaySection !== undefined) {
      merged[section] = overlaySection;
    }
  }
  return merged;
}

function optionalString(section: RawObject, key: string, where: string): string | undefined {
  const value = section[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ConfigurationError(`${where}.${key} must be a string`);
  }
  return value;
}

function optionalNumber(section: RawObject, key: string, where: string): number | undefined {
  const value = section[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || Number.isNaN(value) || value < 0) {
    throw new ConfigurationError(`${where}.${key} must be a non-negative number`);
  }
  return value;
}

function optionalBoolean(section: RawObject, key: string, where: string): boolean | undefined {
  const value = section[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new ConfigurationError(`${where}.${key} must be true or false`);
  }
  return value;
}

function optionalSection(raw: RawObject, key: string): RawObject | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isObject(value)) {
    throw new ConfigurationError(`"${key}" must be a section`);
  }
  return value;
}

export function parseDepth(value: unknown): CloneDepth {
  if (value === 'unbounded' || value === 'full') {
    return 'unbounded';
  }
  const depth = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof depth !== 'number' || !Number.isInteger(depth) || depth < 1) {
    throw new ConfigurationError(`Clone depth must be a positive integer or 'unbounded', got ${String(value)}`);
  }
  return depth;
}

export function parseCutoff(value: string | Date): Date {
  const date = value instanceof Date ? value : new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ConfigurationError(`Invalid cutoff date: ${String(value)}`);
  }
  return date;
}

function validateRepository(section: RawObject): RepositoryConfig {
  const where = 'repository';
  const url = optionalString(section, 'url', where);
  const path = optionalString(section, 'path', where);
  if (Boolean(url) === Boolean(path)) {
    throw new ConfigurationError('repository must define exactly one of "url" or "path"');
  }
  const cutoff = section.cutoff;
  if (cutoff !== undefined && cutoff !== null && typeof cutoff !== 'string' && !(cutoff instanceof Date)) {
    throw new ConfigurationError('repository.cutoff must be an ISO-8601 date');
  }
  return {
    url,
    path,
    ref: optionalString(section, 'ref', where),
    revision: optionalString(section, 'revision', where),
    cutoff: cutoff === null || cutoff === undefined ? undefined : parseCutoff(cutoff),
    username: optionalString(section, 'username', where),
    credentialEnv: optionalString(section, 'credentialEnv', where),
  };
}

function validateMirror(section: RawObject): MirrorConfig {
  const where = 'mirror';
  return {
    localDir: optionalString(section, 'localDir', where),
    autoDelete: optionalBoolean(section, 'autoDelete', where),
    evictAfter: optionalNumber(section, 'evictAfter', where),
    depth: section.depth === undefined || section.depth === null ? undefined : parseDepth(section.depth),
    lockTimeoutMs: optionalNumber(section, 'lockTimeoutMs', where),
  };
}

function validateGit(section: RawObject): GitConfig {
  return {
    executable: optionalString(section, 'executable', 'git'),
    timeoutMs: optionalNumber(section, 'timeoutMs', 'git'),
  };
}

function validateLogging(section: RawObject): LoggingConfig {
  const level = optionalString(section, 'level', 'logging');
  const format = optionalString(section, 'format', 'logging');
  if (level !== undefined && !isLogLevel(level)) {
    throw new ConfigurationError(`logging.level must be one of silent, error, warn, info, debug`);
  }
  if (format !== undefined && !isLogFormat(format)) {
    throw new ConfigurationError(`logging.format must be text or json`);
  }
  return { level, format };
}

function validateConfig(raw: RawObject): GitRevFsConfig {
  const repository = optionalSection(raw, 'repository');
  if (!repository) {
    throw new ConfigurationError('Config must define "repository" section');
  }
  const mirror = optionalSection(raw, 'mirror');
  const git = optionalSection(raw, 'git');
  const logging = optionalSection(raw, 'logging');
  return {
    repository: validateRepository(repository),
    mirror: mirror ? validateMirror(mirror) : undefined,
    git: git ? validateGit(git) : undefined,
    logging: logging ? validateLogging(logging) : undefined,
  };
}

function resolveAgainst(baseDir: string, path: string): string {
  const expanded = expandPath(path);
  return isAbsolute(expanded) ? expanded : resolve(baseDir, expanded);
}

function normalizeConfigPaths(config: GitRevFsConfig, baseDir: string): GitRevFsConfig {
  const repoPath = config.repository.path;
  const localDir = config.mirror?.localDir;
  return {
    ...config,
    repository: {
      ...config.repository,
      path: repoPath === undefined ? undefined : resolveAgainst(baseDir, repoPath),
    },
    mirror: config.mirror && {
      ...config.mirror,
      localDir: localDir === undefined ? undefined : resolveAgainst(baseDir, localDir),
    },
  };
}

/**
 * Options for `GitFS.open()` described by a loaded config. `overrides` win
 * over the file.
 */
export function toGitFSOptions(config: GitRevFsConfig, overrides: Partial<GitFSOptions> = {}): GitFSOptions {
  const { repository, mirror = {}, git = {} } = config;
  const location = repository.url ?? repository.path;
  if (!location) {
    throw new ConfigurationError('repository must define exactly one of "url" or "path"');
  }
  return {
    repository: location,
    ref: repository.ref,
    revision: repository.revision,
    cutoff: repository.cutoff === undefined ? undefined : parseCutoff(repository.cutoff),
    username: repository.username,
    credentialSource: repository.credentialEnv
      ? environmentCredentialSource(process.env, repository.credentialEnv)
      : undefined,
    localDir: mirror.localDir,
    autoDelete: mirror.autoDelete,
    evictAfter: mirror.evictAfter,
    depth: mirror.depth,
    lockTimeoutMs: mirror.lockTimeoutMs,
    gitExecutable: git.executable,
    commandTimeoutMs: git.timeoutMs,
    ...definedOnly(overrides),
  };
}

function definedOnly<T extends object>(values: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key in values) {
    if (values[key] !== undefined) {
      result[key] = values[key];
    }
  }
  return result;
}
