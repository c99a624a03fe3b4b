import { stat } from 'node:fs/promises';
import { homedir } from 'node:os';
import { basename, isAbsolute, normalize, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigurationError, errnoCode } from '../common/errors';
import {
  Credential,
  CredentialSource,
  FilesystemHandle,
  LocateOptions,
  RepositoryInput,
  RepositorySource,
} from './types';

export const DEFAULT_TOKEN_VARIABLE = 'GIT_ACCESS_TOKEN';

const REMOTE_SCHEMES = new Set(['https:', 'http:', 'ssh:', 'git:', 'git+ssh:']);
const URL_LIKE = /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//;
const SCP_LIKE = /^(?:([^@/\\]+)@)?([^:/\\]+):(?!\/\/)(.+)$/;
const WINDOWS_DRIVE = /^[a-zA-Z]:[\\/]/;

export function environmentCredentialSource(
  env: NodeJS.ProcessEnv = process.env,
  variable = DEFAULT_TOKEN_VARIABLE,
): CredentialSource {
  return () => {
    const value = env[variable];
    return value && value.length > 0 ? value : undefined;
  };
}

/**
 * Precedence: explicit argument, then a password embedded in the URL, then the
 * credential source. The source is consulted at most once.
 */
export function resolveCredential(
  explicit: string | undefined,
  embedded: string | undefined,
  source: CredentialSource | undefined,
): Credential | undefined {
  const token = explicit || embedded || source?.();
  return token ? new Credential(token) : undefined;
}

/**
 * Expand `~` and `$VAR` / `${VAR}` references. Unknown variables are kept verbatim.
 */
export function expandPath(path: string, env: NodeJS.ProcessEnv = process.env): string {
  let expanded = path;
  if (expanded === '~' || expanded.startsWith('~/')) {
    expanded = `${homedir()}${expanded.slice(1)}`;
  }
  return expanded.replace(/\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g, (match, braced, bare) => {
    const name = typeof braced === 'string' ? braced : bare;
    const value = typeof name === 'string' ? env[name] : undefined;
    return value ?? match;
  });
}

export function repositoryName(pathname: string): string {
  const trimmed = pathname.replace(/[\\/]+$/, '');
  const name = basename(trimmed).replace(/\.git$/, '');
  if (!name) {
    throw new ConfigurationError(`Cannot derive a repository name from '${pathname}'`);
  }
  return name;
}

function freezeSource(source: RepositorySource): RepositorySource {
  return Object.freeze({ ...source });
}

function isFilesystemHandle(input: RepositoryInput): input is FilesystemHandle {
  return typeof input === 'object' && !(input instanceof URL) && typeof input.getSystemPath === 'function';
}

function decode(url: URL, part: 'username' | 'password'): string | undefined {
  const value = url[part];
  if (!value) {
    return undefined;
  }
  try {
    return decodeURIComponent(value);
  } catch (error) {
    throw new ConfigurationError(
      `Repository URL has a malformed ${part}: ${url.protocol}//***@${url.host}${url.pathname}`,
      { cause: error },
    );
  }
}

function locateUrl(url: URL, options: LocateOptions): RepositorySource {
  const scheme = url.protocol.toLowerCase();

  if (scheme === 'file:') {
    return locatePath(fileURLToPath(url), options);
  }
  if (!REMOTE_SCHEMES.has(scheme)) {
    throw new ConfigurationError(`Unsupported repository URL scheme '${scheme.slice(0, -1)}'`);
  }
  if (!url.hostname) {
    throw new ConfigurationError(`Repository URL has no host: ${scheme}//${url.pathname}`);
  }
  if (!url.pathname || url.pathname === '/') {
    throw new ConfigurationError(`Repository URL has no path: ${scheme}//${url.host}`);
  }

  const username = options.username ?? decode(url, 'username');
  const embedded = decode(url, 'password');
  const clean = new URL(url.href);
  clean.username = '';
  clean.password = '';

  return freezeSource({
    kind: 'remote',
    location: clean.href,
    name: repositoryName(url.pathname),
    username,
    credential: resolveCredential(options.credential, embedded, options.credentialSource),
  });
}

function locateScp(match: RegExpMatchArray, raw: string, options: LocateOptions): RepositorySource {
  const [, user, , path] = match;
  return freezeSource({
    kind: 'remote',
    location: raw,
    name: repositoryName(path),
    username: options.username ?? user,
    credential: resolveCredential(options.credential, undefined, options.credentialSource),
  });
}

function locatePath(path: string, options: LocateOptions): RepositorySource {
  const expanded = expandPath(path, options.env);
  const absolute = normalize(isAbsolute(expanded) ? expanded : resolve(options.cwd ?? process.cwd(), expanded));
  return freezeSource({
    kind: 'local',
    location: absolute,
    name: repositoryName(absolute),
    username: options.username,
    credential: resolveCredential(options.credential, undefined, options.credentialSource),
  });
}

async function locateHandle(handle: FilesystemHandle, options: LocateOptions): Promise<RepositorySource> {
  const root = handle.getSystemPath('/');
  try {
    const stats = await stat(root);
    if (!stats.isDirectory()) {
      throw new ConfigurationError(`Filesystem handle is not rooted at a directory: ${root}`);
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw error;
    }
    throw new ConfigurationError(`Filesystem handle root is not accessible: ${root} (${errnoCode(error) ?? 'unknown'})`, {
      cause: error,
    });
  }
  return locatePath(root, options);
}

/**
 * Normalize a repository locator into a `RepositorySource`. Performs no network
 * I/O; whether a local path really is a git repository is left to the mirror.
 */
export async function locateRepository(
  input: RepositoryInput,
  options: LocateOptions = {},
): Promise<RepositorySource> {
  if (isFilesystemHandle(input)) {
    return locateHandle(input, options);
  }
  if (input instanceof URL) {
    return locateUrl(input, options);
  }

  const raw = input.trim();
  if (!raw) {
    throw new ConfigurationError('Repository locator is empty');
  }
  if (URL_LIKE.test(raw)) {
    let url: URL;
    try {
      url = new URL(raw);
    } catch (error) {
      throw new ConfigurationError(`Invalid repository URL: ${raw.replace(/\/\/[^@/]*@/, '//***@')}`, { cause: error });
    }
    return locateUrl(url, options);
  }
  if (!WINDOWS_DRIVE.test(raw)) {
    const scp = raw.match(SCP_LIKE);
    if (scp) {
      return locateScp(scp, raw, options);
    }
  }
  return locatePath(raw, options);
}

/**
 * Location rendered for logs and `toString()`; never includes a credential.
 */
export function describeSource(source: RepositorySource): string {
  if (source.kind === 'remote' && source.username && URL_LIKE.test(source.location)) {
    const url = new URL(source.location);
    url.username = encodeURIComponent(source.username);
    return url.href;
  }
  return source.location;
}
