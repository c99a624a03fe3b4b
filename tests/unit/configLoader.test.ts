import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, writeFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigurationError } from '../../src/common/errors';
import { loadConfig, parseDepth, toGitFSOptions } from '../../src/config';

async function withTempDir(fn: (dir: string) => Promise<void>) {
  const dir = await mkdtemp(join(tmpdir(), 'gitrevfs-config-'));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

describe('Config loader', () => {
  afterEach(() => {
    delete process.env.GITREVFS_TEST_TOKEN;
  });

  it('loads YAML config, resolves paths and merges profiles', async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, 'config.yaml');
      await writeFile(
        configPath,
        [
          'repository:',
          '  path: ./repo',
          '  ref: main',
          'mirror:',
          '  localDir: ./mirror',
          '  depth: 1',
          '  evictAfter: 600',
          'profiles:',
          '  history:',
          '    mirror:',
          '      depth: unbounded',
          '',
        ].join('\n'),
      );

      const base = await loadConfig(configPath);
      expect(base.repository.path).toBe(join(dir, 'repo'));
      expect(base.mirror).toEqual({
        localDir: join(dir, 'mirror'),
        autoDelete: undefined,
        evictAfter: 600,
        depth: 1,
        lockTimeoutMs: undefined,
      });

      const profile = await loadConfig(configPath, 'history');
      expect(profile.mirror?.depth).toBe('unbounded');
      expect(profile.mirror?.evictAfter).toBe(600);
      expect(profile.mirror?.localDir).toBe(join(dir, 'mirror'));
    });
  });

  it('loads TOML and JSON configs', async () => {
    await withTempDir(async (dir) => {
      const tomlPath = join(dir, 'config.toml');
      await writeFile(
        tomlPath,
        ['[repository]', 'url = "https://example.test/org/repo.git"', 'cutoff = "2024-01-01T00:00:00Z"', ''].join('\n'),
      );
      const jsonPath = join(dir, 'config.json');
      await writeFile(jsonPath, JSON.stringify({ repository: { url: 'git@example.test:org/repo.git' }, git: { timeoutMs: 5000 } }));

      const fromToml = await loadConfig(tomlPath);
      expect(fromToml.repository.cutoff).toEqual(new Date('2024-01-01T00:00:00Z'));

      const fromJson = await loadConfig(jsonPath);
      expect(fromJson.git).toEqual({ executable: undefined, timeoutMs: 5000 });
    });
  });

  it('throws when repository section is missing', async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, 'broken.toml');
      await writeFile(configPath, `mirror = { depth = 1 }`);

      await expect(loadConfig(configPath)).rejects.toThrow(/repository/);
    });
  });

  it('rejects invalid values and unknown profiles', async () => {
    await withTempDir(async (dir) => {
      const both = join(dir, 'both.yaml');
      await writeFile(both, 'repository:\n  url: https://example.test/a.git\n  path: ./a\n');
      await expect(loadConfig(both)).rejects.toThrow('exactly one of "url" or "path"');

      const depth = join(dir, 'depth.yaml');
      await writeFile(depth, 'repository:\n  path: ./a\nmirror:\n  depth: 0\n');
      await expect(loadConfig(depth)).rejects.toBeInstanceOf(ConfigurationError);

      const level = join(dir, 'level.yaml');
      await writeFile(level, 'repository:\n  path: ./a\nlogging:\n  level: loud\n');
      await expect(loadConfig(level)).rejects.toThrow('logging.level');

      await expect(loadConfig(depth, 'missing')).rejects.toThrow('Profile missing not found in config');
      await expect(loadConfig(join(dir, 'config.ini'))).rejects.toBeInstanceOf(ConfigurationError);
    });
  });

  it('converts a config into open options, letting overrides win', async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, 'config.yaml');
      await writeFile(
        configPath,
        [
          'repository:',
          '  url: https://example.test/org/repo.git',
          '  ref: main',
          '  credentialEnv: GITREVFS_TEST_TOKEN',
          'mirror:',
          '  autoDelete: false',
          '',
        ].join('\n'),
      );
      process.env.GITREVFS_TEST_TOKEN = 'test-secret';

      const options = toGitFSOptions(await loadConfig(configPath), { ref: 'release', revision: undefined });

      expect(options).toMatchObject({
        repository: 'https://example.test/org/repo.git',
        ref: 'release',
        autoDelete: false,
      });
      expect(options.credentialSource?.()).toBe('test-secret');
    });
  });

  it('parses clone depths', () => {
    expect(parseDepth('unbounded')).toBe('unbounded');
    expect(parseDepth('5')).toBe(5);
    expect(() => parseDepth('-1')).toThrow(ConfigurationError);
  });
});
