import { spawn } from 'node:child_process';
import { access, readFile } from 'node:fs/promises';
import { constants } from 'node:fs';
import { isAbsolute, join } from 'node:path';
import { createInterface } from 'node:readline';
import { fileURLToPath, pathToFileURL } from 'node:url';
import { renderCommand, runCommand } from '../common/exec';
import { errnoCode, GitCommandError, RevisionNotFoundError, SyncError } from '../common/errors';
import { getLogger, Logger } from '../common/logger';
import type { RepositorySource } from '../locator/types';
import {
  CloneOptions,
  CommitEntry,
  FetchOptions,
  GitClient,
  isFullCommitId,
  REMOTE_HEAD,
  REMOTE_NAME,
  remoteRef,
} from './types';

export interface CliGitClientOptions {
  executable?: string;
  timeoutMs?: number;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}

interface LogExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  error?: Error;
}

interface GitInvocation {
  cwd?: string;
  source?: RepositorySource;
}

const MISSING_REF_PATTERNS = [
  /couldn't find remote ref/i,
  /Remote branch .* not found/i,
  /not our ref/i,
  /unadvertised object/i,
];

function isMissingRef(error: unknown): boolean {
  return error instanceof GitCommandError && MISSING_REF_PATTERNS.some((pattern) => pattern.test(error.stderr));
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Local repositories are cloned over `file://`: git ignores `--depth` for
 * plain-path clones.
 */
function transportUrl(source: RepositorySource): string {
  return source.kind === 'local' ? pathToFileURL(source.location).href : source.location;
}

function depthArgs(depth: CloneOptions['depth']): string[] {
  return depth === 'unbounded' ? [] : ['--depth', String(depth)];
}

export class CliGitClient implements GitClient {
  private readonly executable: string;
  private readonly timeoutMs?: number;
  private readonly logger: Logger;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: CliGitClientOptions = {}) {
    this.executable = options.executable ?? 'git';
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? getLogger('gitfs:git');
    this.env = { ...(options.env ?? process.env), GIT_TERMINAL_PROMPT: '0' };
  }

  async clone(options: CloneOptions): Promise<void> {
    const args = ['clone', '--single-branch', '--no-tags', ...depthArgs(options.depth)];
    if (options.ref) {
      args.push('--branch', options.ref);
    }
    args.push('--', transportUrl(options.source), options.destination);

    try {
      await this.run(args, { source: options.source });
    } catch (error) {
      if (options.ref && isMissingRef(error)) {
        throw new RevisionNotFoundError(options.ref, `Branch or tag not found on ${REMOTE_NAME}: ${options.ref}`);
      }
      throw new SyncError('clone', `Unable to clone ${options.source.location}`, { cause: error });
    }

    const cwd = options.destination;
    if (options.ref) {
      await this.run(['update-ref', remoteRef(options.ref), 'HEAD'], { cwd });
    } else {
      await this.recordDefaultBranch(cwd);
    }
    // every view is a detached checkout, whether or not a later checkout runs
    await this.run(['-c', 'advice.detachedHead=false', 'checkout', '--quiet', '--detach'], { cwd });
  }

  async fetch(directory: string, options: FetchOptions): Promise<string> {
    const args = ['fetch', '--no-tags'];
    if (options.depth !== 'unbounded') {
      args.push(...depthArgs(options.depth));
    } else if (await this.isShallow(directory)) {
      args.push('--unshallow');
    }
    args.push(REMOTE_NAME, options.ref);

    try {
      await this.run(args, { cwd: directory, source: options.source });
    } catch (error) {
      if (isMissingRef(error)) {
        throw new RevisionNotFoundError(options.ref, `Ref not found on ${REMOTE_NAME}: ${options.ref}`);
      }
      throw new SyncError('fetch', `Unable to fetch '${options.ref}' from ${options.source.location}`, {
        cause: error,
      });
    }

    const fetched = await this.resolveCommit(directory, 'FETCH_HEAD');
    if (!fetched) {
      throw new RevisionNotFoundError(options.ref);
    }
    if (!isFullCommitId(options.ref)) {
      // through origin/HEAD to the default branch it names, when it names one
      await this.run(['update-ref', remoteRef(options.ref), fetched], { cwd: directory });
    }
    return fetched;
  }

  async checkout(directory: string, commitId: string): Promise<void> {
    const commit = await this.resolveCommit(directory, commitId);
    if (!commit) {
      throw new RevisionNotFoundError(commitId);
    }
    await this.run(['-c', 'advice.detachedHead=false', 'checkout', '--quiet', '--detach', commit], {
      cwd: directory,
    });
  }

  async *log(directory: string, rev: string): AsyncIterable<CommitEntry> {
    const shallow = await this.shallowCommits(directory);
    const args = ['log', '--format=%H%x09%ct%x09%P', rev, '--'];
    const command = renderCommand(this.executable, args);
    this.logger.debug(`Exec (cwd: ${directory}): ${command}`);

    const child = spawn(this.executable, args, {
      cwd: directory,
      env: this.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      timeout: this.timeoutMs,
    });
    const stderr: string[] = [];
    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (chunk: string) => stderr.push(chunk));
    const exited = new Promise<LogExit>((resolve) => {
      child.once('error', (error) => resolve({ code: null, signal: null, error }));
      child.once('close', (code, signal) => resolve({ code, signal }));
    });

    const lines = createInterface({ input: child.stdout, crlfDelay: Infinity });
    let completed = false;
    try {
      for await (const line of lines) {
        const [commitId, seconds, parents = ''] = line.split('\t');
        if (!commitId || !seconds) {
          continue;
        }
        yield {
          commitId,
          timestamp: new Date(Number(seconds) * 1000),
          parents: parents.split(' ').filter(Boolean),
          boundary: shallow.has(commitId),
        };
      }
      completed = true;
    } finally {
      lines.close();
      if (!completed) {
        child.kill();
      }
    }

    const exit = await exited;
    if (exit.error) {
      throw new GitCommandError(`Command failed (${command}): ${exit.error.message}`, command, '', '', {
        cause: exit.error,
      });
    }
    if (exit.code !== 0) {
      const status = exit.signal ? `killed by ${exit.signal}` : `exit code ${exit.code}`;
      throw new GitCommandError(`Command failed (${command}): ${status}`, command, '', stderr.join(''));
    }
  }

  async resolveCommit(directory: string, rev: string): Promise<string | undefined> {
    try {
      const { stdout } = await this.run(['rev-parse', '--verify', '--quiet', `${rev}^{commit}`], {
        cwd: directory,
      });
      const commit = stdout.trim();
      return commit || undefined;
    } catch (error) {
      if (error instanceof GitCommandError) {
        return undefined;
      }
      throw error;
    }
  }

  async headCommit(directory: string): Promise<string | undefined> {
    return this.resolveCommit(directory, 'HEAD');
  }

  async currentBranch(directory: string): Promise<string | undefined> {
    const { stdout } = await this.run(['symbolic-ref', '--quiet', '--short', 'HEAD'], { cwd: directory }).catch(
      (error: unknown) => {
        if (error instanceof GitCommandError) {
          return { stdout: '' };
        }
        throw error;
      },
    );
    return stdout.trim() || undefined;
  }

  async defaultBranch(directory: string): Promise<string | undefined> {
    const { stdout } = await this.run(['symbolic-ref', '--quiet', '--short', remoteRef(REMOTE_HEAD)], {
      cwd: directory,
    }).catch((error: unknown) => {
      if (error instanceof GitCommandError) {
        return { stdout: '' };
      }
      throw error;
    });
    const name = stdout.trim();
    const prefix = `${REMOTE_NAME}/`;
    return name.startsWith(prefix) ? name.slice(prefix.length) : undefined;
  }

  async abbreviate(directory: string, commitId: string): Promise<string> {
    const { stdout } = await this.run(['rev-parse', '--short', commitId], { cwd: directory });
    return stdout.trim();
  }

  async originUrl(directory: string): Promise<string | undefined> {
    const { stdout } = await this.run(['config', '--get', `remote.${REMOTE_NAME}.url`], { cwd: directory }).catch(
      (error: unknown) => {
        if (error instanceof GitCommandError) {
          return { stdout: '' };
        }
        throw error;
      },
    );
    const url = stdout.trim();
    if (!url) {
      return undefined;
    }
    return url.startsWith('file:') ? fileURLToPath(url) : url;
  }

  async isRepository(directory: string): Promise<boolean> {
    return pathExists(join(directory, '.git'));
  }

  async isShallow(directory: string): Promise<boolean> {
    const { stdout } = await this.run(['rev-parse', '--is-shallow-repository'], { cwd: directory });
    return stdout.trim() === 'true';
  }

  /**
   * Point `origin/HEAD` at the branch the clone checked out, so the default
   * branch keeps its name once HEAD is detached.
   */
  private async recordDefaultBranch(directory: string): Promise<void> {
    const branch = await this.currentBranch(directory);
    if (!branch) {
      await this.run(['update-ref', '--no-deref', remoteRef(REMOTE_HEAD), 'HEAD'], { cwd: directory });
      return;
    }
    await this.run(['update-ref', remoteRef(branch), 'HEAD'], { cwd: directory });
    await this.run(['symbolic-ref', remoteRef(REMOTE_HEAD), remoteRef(branch)], { cwd: directory });
  }

  private async shallowCommits(directory: string): Promise<Set<string>> {
    const { stdout } = await this.run(['rev-parse', '--git-path', 'shallow'], { cwd: directory });
    const relative = stdout.trim();
    const path = isAbsolute(relative) ? relative : join(directory, relative);
    try {
      const contents = await readFile(path, 'utf8');
      return new Set(contents.split(/\r?\n/).map((line) => line.trim()).filter(Boolean));
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return new Set();
      }
      throw error;
    }
  }

  /**
   * Basic auth header for http(s) remotes, passed per command so the token is
   * never written to the clone's config.
   */
  private authArgs(source?: RepositorySource): { args: string[]; secrets: string[] } {
    if (!source?.credential || !/^https?:\/\//i.test(source.location)) {
      return { args: [], secrets: [] };
    }
    const token = source.credential.reveal();
    const encoded = Buffer.from(`${source.username ?? 'x-access-token'}:${token}`).toString('base64');
    return {
      args: ['-c', `http.extraHeader=Authorization: Basic ${encoded}`],
      secrets: [encoded, token],
    };
  }

  private async run(args: string[], invocation: GitInvocation) {
    const auth = this.authArgs(invocation.source);
    const fullArgs = [...auth.args, ...args];
    this.logger.debug(`Exec (cwd: ${invocation.cwd ?? process.cwd()}): ${renderCommand(this.executable, fullArgs, auth.secrets)}`);
    return runCommand(this.executable, fullArgs, {
      cwd: invocation.cwd,
      env: this.env,
      timeoutMs: this.timeoutMs,
      secrets: auth.secrets,
    });
  }
}
