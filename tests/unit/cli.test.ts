import { describe, it, expect } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { ConfigurationError } from '../../src/common/errors';
import { buildOpenOptions, runCli } from '../../src/cli';
import { loadConfig } from '../../src/config';

async function withTempDir(fn: (dir: string) => Promise<void>) {
  const dir = await mkdtemp(join(tmpdir(), 'gitrevfs-cli-'));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

describe('buildOpenOptions', () => {
  it('parses selector and mirror flags', async () => {
    const options = await buildOpenOptions('https://example.test/org/repo.git', {
      ref: 'main',
      cutoff: '2024-03-01T12:00:00Z',
      depth: 'unbounded',
      evictAfter: '0',
      localDir: 'mirrors/repo',
      keep: true,
    });

    expect(options).toMatchObject({
      repository: 'https://example.test/org/repo.git',
      ref: 'main',
      cutoff: new Date('2024-03-01T12:00:00Z'),
      depth: 'unbounded',
      evictAfter: 0,
      localDir: resolve('mirrors/repo'),
      autoDelete: false,
    });
  });

  it('requires a repository without a config file', async () => {
    await expect(buildOpenOptions(undefined, {})).rejects.toThrow('A repository argument or --config is required');
    await expect(buildOpenOptions('repo', { profile: 'ci' })).rejects.toThrow('--profile requires --config');
  });

  it('rejects malformed flag values', async () => {
    await expect(buildOpenOptions('repo', { cutoff: 'yesterday' })).rejects.toBeInstanceOf(ConfigurationError);
    await expect(buildOpenOptions('repo', { depth: 'deep' })).rejects.toBeInstanceOf(ConfigurationError);
    await expect(buildOpenOptions('repo', { evictAfter: '-5' })).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('lets flags override the config file', async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, 'gitrevfs.yaml');
      await writeFile(configPath, 'repository:\n  url: https://example.test/org/repo.git\n  ref: main\nmirror:\n  depth: 3\n');

      const options = await buildOpenOptions(undefined, { config: configPath, ref: 'release' });

      expect(options).toMatchObject({ repository: 'https://example.test/org/repo.git', ref: 'release', depth: 3 });
    });
  });
});

describe('runCli', () => {
  it('writes a sample config that the loader accepts', async () => {
    await withTempDir(async (dir) => {
      const target = join(dir, 'nested', '.gitrevfs.yaml');

      await runCli(['node', 'gitrevfs', '--log-level', 'silent', 'init', '--config', target]);

      expect(await readFile(target, 'utf8')).toContain('credentialEnv: GIT_ACCESS_TOKEN');
      const config = await loadConfig(target, 'history');
      expect(config.mirror?.depth).toBe('unbounded');
      await expect(
        runCli(['node', 'gitrevfs', '--log-level', 'silent', 'init', '--config', target]),
      ).rejects.toThrow('Config file already exists');
    });
  });

  it('rejects an unknown log level', async () => {
    await expect(runCli(['node', 'gitrevfs', '--log-level', 'loud', 'init', '--config', '/dev/null/x'])).rejects.toThrow(
      "Invalid log level 'loud'",
    );
  });
});
