#!/usr/bin/env node
import { Command } from 'commander';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { loadConfig, parseCutoff, parseDepth, toGitFSOptions } from '../config';
import { ConfigurationError, errnoCode, isGitFSError } from '../common/errors';
import { configureLogger, getLogger, isLogFormat, isLogLevel, LogFormat, LogLevel } from '../common/logger';
import { GitFS, withGitFS } from '../fs/gitfs';
import type { GitFSOptions } from '../fs/types';
import { getMetricsSnapshot } from '../observability';

export interface RepositoryCommandOptions {
  config?: string;
  profile?: string;
  ref?: string;
  revision?: string;
  cutoff?: string;
  localDir?: string;
  depth?: string;
  evictAfter?: string;
  keep?: boolean;
}

export interface GlobalOptions {
  logLevel?: string;
  logFormat?: string;
}

function buildSampleConfig(): string {
  return `repository:
  url: https://github.com/your-org/your-repo.git
  ref: main
  # revision: 0123abcd
  # cutoff: 2024-01-01T00:00:00Z
  credentialEnv: GIT_ACCESS_TOKEN
mirror:
  localDir: ./.gitrevfs/your-repo
  autoDelete: false
  evictAfter: 3600
  depth: 1
git:
  executable: git
logging:
  level: warn
  format: text
profiles:
  history:
    mirror:
      depth: unbounded
`;
}

function parseLogLevel(value?: string): LogLevel | undefined {
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  if (!isLogLevel(normalized)) {
    throw new ConfigurationError(`Invalid log level '${value}'. Expected one of silent, error, warn, info, debug`);
  }
  return normalized;
}

function parseLogFormat(value?: string): LogFormat | undefined {
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  if (!isLogFormat(normalized)) {
    throw new ConfigurationError(`Invalid log format '${value}'. Expected text or json`);
  }
  return normalized;
}

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (value.trim() === '' || Number.isNaN(seconds) || seconds < 0) {
    throw new ConfigurationError(`Eviction window must be a non-negative number of seconds, got '${value}'`);
  }
  return seconds;
}

/**
 * Merge a config file, when given, with the command line. Flags win.
 */
export async function buildOpenOptions(
  repository: string | undefined,
  options: RepositoryCommandOptions,
  globals: GlobalOptions = {},
): Promise<GitFSOptions> {
  const overrides: Partial<GitFSOptions> = {
    repository,
    ref: options.ref,
    revision: options.revision,
    cutoff: options.cutoff === undefined ? undefined : parseCutoff(options.cutoff),
    localDir: options.localDir === undefined ? undefined : resolve(options.localDir),
    depth: options.depth === undefined ? undefined : parseDepth(options.depth),
    evictAfter: options.evictAfter === undefined ? undefined : parseSeconds(options.evictAfter),
    autoDelete: options.keep ? false : undefined,
  };

  if (options.config) {
    const config = await loadConfig(options.config, options.profile);
    if (config.logging) {
      // flags and environment take precedence over the file
      configureLogger({
        level: globals.logLevel === undefined ? config.logging.level : undefined,
        format: globals.logFormat === undefined ? config.logging.format : undefined,
      });
    }
    return toGitFSOptions(config, overrides);
  }
  if (options.profile) {
    throw new ConfigurationError('--profile requires --config');
  }
  if (!repository) {
    throw new ConfigurationError('A repository argument or --config is required');
  }
  return { ...overrides, repository };
}

function withRepositoryOptions(command: Command): Command {
  return command
    .option('--config <path>', 'Config file path')
    .option('--profile <name>', 'Config profile')
    .option('--ref <ref>', 'Branch or tag (defaults to the remote default branch)')
    .option('--revision <commit>', 'Commit id; takes precedence over --ref and --cutoff')
    .option('--cutoff <date>', 'Latest commit at or before this ISO-8601 date')
    .option('--local-dir <path>', 'Mirror directory (a temporary one when omitted)')
    .option('--depth <n>', "Clone depth, or 'unbounded'")
    .option('--evict-after <seconds>', 'Refresh the mirror when older than this')
    .option('--keep', 'Keep the mirror directory on exit');
}

async function write(text: string): Promise<void> {
  await new Promise<void>((resolveWrite, reject) => {
    process.stdout.write(text, (error) => (error ? reject(error) : resolveWrite()));
  });
}

export async function runCli(argv = process.argv) {
  const program = new Command();
  program.name('gitrevfs').description('Read-only view of a git branch, tag or revision');
  const openOptionsFor = (repository: string | undefined, options: RepositoryCommandOptions) =>
    buildOpenOptions(repository, options, program.opts<GlobalOptions>());

  program
    .option('--log-level <level>', 'Log level (silent|error|warn|info|debug)', process.env.GITREVFS_LOG_LEVEL)
    .option('--log-format <format>', 'Log format (text|json)', process.env.GITREVFS_LOG_FORMAT)
    .hook('preAction', (cmd) => {
      const opts = cmd.optsWithGlobals<GlobalOptions>();
      const level = parseLogLevel(opts.logLevel);
      const format = parseLogFormat(opts.logFormat);
      configureLogger({ level, format, destination: process.stderr });
    });

  program
    .command('init')
    .description('Create sample configuration file')
    .option('--config <path>', 'Config path', '.gitrevfs.yaml')
    .action(async (options: { config: string }) => {
      const log = getLogger('cli:init');
      const target = resolve(options.config);
      await mkdir(dirname(target), { recursive: true });
      try {
        await writeFile(target, buildSampleConfig(), { flag: 'wx' });
      } catch (error) {
        if (errnoCode(error) === 'EEXIST') {
          throw new ConfigurationError(`Config file already exists at ${target}`);
        }
        throw error;
      }
      log.info(`Created config at ${target}`);
    });

  withRepositoryOptions(
    program.command('resolve').description('Print the commit id the selector resolves to').argument('[repository]'),
  ).action(async (repository: string | undefined, options: RepositoryCommandOptions) => {
    const openOptions = await openOptionsFor(repository, options);
    const commit = await withGitFS(openOptions, async (fs) => fs.resolvedRevision.commitId);
    await write(`${commit}\n`);
  });

  withRepositoryOptions(
    program
      .command('ls')
      .description('List a directory; subdirectories end with /')
      .argument('<repository>')
      .argument('[path]', 'Directory inside the repository', '/'),
  ).action(async (repository: string, path: string, options: RepositoryCommandOptions) => {
    const entries = await withGitFS(await openOptionsFor(repository, options), (fs) => fs.scandir(path));
    await write(entries.map((entry) => (entry.isDir ? `${entry.name}/\n` : `${entry.name}\n`)).join(''));
  });

  withRepositoryOptions(
    program
      .command('cat')
      .description('Write a file to stdout')
      .argument('<repository>')
      .argument('<path>', 'File inside the repository'),
  ).action(async (repository: string, path: string, options: RepositoryCommandOptions) => {
    await withGitFS(await openOptionsFor(repository, options), async (fs) => {
      for await (const chunk of await fs.openbin(path)) {
        await new Promise<void>((resolveWrite, reject) => {
          process.stdout.write(chunk, (error) => (error ? reject(error) : resolveWrite()));
        });
      }
    });
  });

  withRepositoryOptions(
    program
      .command('tree')
      .description('List every file, optionally filtered by a glob pattern')
      .argument('<repository>')
      .argument('[pattern]', 'Glob pattern, e.g. "src/**/*.ts"'),
  ).action(async (repository: string, pattern: string | undefined, options: RepositoryCommandOptions) => {
    const paths = await withGitFS(await openOptionsFor(repository, options), async (fs) => {
      if (pattern) {
        return (await fs.glob(pattern)).map((info) => info.path);
      }
      const all: string[] = [];
      for await (const info of fs.walk('/')) {
        all.push(info.path);
      }
      return all;
    });
    await write(paths.map((path) => `${path}\n`).join(''));
  });

  withRepositoryOptions(
    program.command('info').description('Print source, commit and mirror state as JSON').argument('[repository]'),
  ).action(async (repository: string | undefined, options: RepositoryCommandOptions) => {
    const info = await withGitFS(await openOptionsFor(repository, options), async (fs) => describe(fs));
    await write(`${JSON.stringify(info, null, 2)}\n`);
  });

  withRepositoryOptions(
    program
      .command('sync')
      .description('Clone or refresh a persistent mirror')
      .argument('[repository]')
      .option('--metrics <path>', 'Write Prometheus metrics to file after syncing'),
  ).action(async (repository: string | undefined, options: RepositoryCommandOptions & { metrics?: string }) => {
    const log = getLogger('cli:sync');
    const openOptions = await openOptionsFor(repository, options);
    if (openOptions.localDir === undefined) {
      throw new ConfigurationError('sync needs a persistent mirror: pass --local-dir or set mirror.localDir');
    }
    const info = await withGitFS({ ...openOptions, autoDelete: false }, async (fs) => describe(fs));
    log.info('Mirror ready', { commit: info.commit, directory: info.mirror.path });
    await write(`${info.commit} ${info.mirror.path}\n`);
    if (options.metrics) {
      const target = resolve(options.metrics);
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, await getMetricsSnapshot(), 'utf8');
    }
  });

  await program.parseAsync(argv);
}

async function describe(fs: GitFS) {
  const state = await fs.mirrorState();
  return {
    source: fs.toString(),
    commit: fs.resolvedRevision.commitId,
    shortCommit: await fs.currentRevision(true),
    branch: await fs.currentBranch(),
    detached: await fs.isDetached(),
    mirror: {
      path: state.path,
      depth: state.depth,
      lastSyncTime: state.lastSyncTime?.toISOString(),
      owned: fs.owned,
    },
  };
}

if (require.main === module) {
  runCli().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    getLogger('cli').error(message, isGitFSError(error) ? { code: error.code } : undefined);
    process.exitCode = 1;
  });
}
