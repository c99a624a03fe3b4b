/**
 * Error classes raised by the git revision filesystem.
 *
 * Every error carries a stable `code` so callers can branch on the kind of
 * failure without relying on `instanceof` across module copies.
 */

export type GitFSErrorCode =
  | 'CONFIGURATION'
  | 'SYNC'
  | 'REVISION_NOT_FOUND'
  | 'INSUFFICIENT_HISTORY'
  | 'READ_ONLY'
  | 'RESOURCE_NOT_FOUND'
  | 'RESOURCE_TYPE'
  | 'ILLEGAL_PATH'
  | 'FILESYSTEM_CLOSED'
  | 'LOCK_TIMEOUT'
  | 'GIT_COMMAND';

/**
 * Base error class for all errors of this package
 */
export class GitFSError extends Error {
  public readonly code: GitFSErrorCode;

  constructor(code: GitFSErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GitFSError';
    this.code = code;
    Object.setPrototypeOf(this, GitFSError.prototype);
  }
}

/**
 * Bad locator, selector or option combination
 */
export class ConfigurationError extends GitFSError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION', message, options);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Clone or fetch failed. The existing mirror, if any, is left as it was.
 */
export class SyncError extends GitFSError {
  public readonly operation: 'clone' | 'fetch';

  constructor(operation: 'clone' | 'fetch', message: string, options?: { cause?: unknown }) {
    super('SYNC', message, options);
    this.name = 'SyncError';
    this.operation = operation;
    Object.setPrototypeOf(this, SyncError.prototype);
  }
}

export class RevisionNotFoundError extends GitFSError {
  public readonly revision: string;

  constructor(revision: string, message = `Revision not found: ${revision}`) {
    super('REVISION_NOT_FOUND', message);
    this.name = 'RevisionNotFoundError';
    this.revision = revision;
    Object.setPrototypeOf(this, RevisionNotFoundError.prototype);
  }
}

/**
 * The cutoff date lies beyond the history available in a shallow mirror.
 * Open the filesystem with `depth: 'unbounded'` to look further back.
 */
export class InsufficientHistoryError extends GitFSError {
  public readonly ref: string;
  public readonly cutoff: Date;
  public readonly depth: number | 'unbounded';

  constructor(ref: string, cutoff: Date, depth: number | 'unbounded') {
    super(
      'INSUFFICIENT_HISTORY',
      `History of '${ref}' is truncated (depth=${depth}) before ${cutoff.toISOString()}; clone with unbounded depth`,
    );
    this.name = 'InsufficientHistoryError';
    this.ref = ref;
    this.cutoff = cutoff;
    this.depth = depth;
    Object.setPrototypeOf(this, InsufficientHistoryError.prototype);
  }
}

export class ReadOnlyViolation extends GitFSError {
  public readonly operation: string;
  public readonly path: string;

  constructor(operation: string, path: string) {
    super('READ_ONLY', `Filesystem is read-only: ${operation}('${path}') is not allowed`);
    this.name = 'ReadOnlyViolation';
    this.operation = operation;
    this.path = path;
    Object.setPrototypeOf(this, ReadOnlyViolation.prototype);
  }
}

export class ResourceNotFoundError extends GitFSError {
  public readonly path: string;

  constructor(path: string) {
    super('RESOURCE_NOT_FOUND', `Resource not found: ${path}`);
    this.name = 'ResourceNotFoundError';
    this.path = path;
    Object.setPrototypeOf(this, ResourceNotFoundError.prototype);
  }
}

/**
 * A file was expected where there is a directory, or the other way round
 */
export class ResourceTypeError extends GitFSError {
  public readonly path: string;
  public readonly expected: 'file' | 'directory';

  constructor(path: string, expected: 'file' | 'directory') {
    super('RESOURCE_TYPE', `Expected a ${expected}: ${path}`);
    this.name = 'ResourceTypeError';
    this.path = path;
    this.expected = expected;
    Object.setPrototypeOf(this, ResourceTypeError.prototype);
  }
}

export class IllegalPathError extends GitFSError {
  public readonly path: string;

  constructor(path: string, reason = 'path escapes the filesystem root') {
    super('ILLEGAL_PATH', `Illegal path '${path}': ${reason}`);
    this.name = 'IllegalPathError';
    this.path = path;
    Object.setPrototypeOf(this, IllegalPathError.prototype);
  }
}

export class FilesystemClosedError extends GitFSError {
  constructor() {
    super('FILESYSTEM_CLOSED', 'Filesystem is closed');
    this.name = 'FilesystemClosedError';
    Object.setPrototypeOf(this, FilesystemClosedError.prototype);
  }
}

export class LockTimeoutError extends GitFSError {
  public readonly lockPath: string;

  constructor(lockPath: string, timeoutMs: number) {
    super('LOCK_TIMEOUT', `Timed out after ${timeoutMs}ms waiting for mirror lock ${lockPath}`);
    this.name = 'LockTimeoutError';
    this.lockPath = lockPath;
    Object.setPrototypeOf(this, LockTimeoutError.prototype);
  }
}

/**
 * A subprocess exited with a non-zero status
 */
export class GitCommandError extends GitFSError {
  public readonly command: string;
  public readonly stdout: string;
  public readonly stderr: string;

  constructor(message: string, command: string, stdout = '', stderr = '', options?: { cause?: unknown }) {
    super('GIT_COMMAND', message, options);
    this.name = 'GitCommandError';
    this.command = command;
    this.stdout = stdout;
    this.stderr = stderr;
    Object.setPrototypeOf(this, GitCommandError.prototype);
  }
}

export function isGitFSError(error: unknown): error is GitFSError {
  return error instanceof GitFSError;
}

/**
 * `code` of a Node.js system error (`ENOENT`, `EEXIST`, ...), if any.
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
