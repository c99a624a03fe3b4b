import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { IllegalPathError, ResourceNotFoundError } from '../../src/common/errors';
import { baseName, joinPath, normalizePath, splitPath, toSystemPath } from '../../src/fs/paths';

describe('view paths', () => {
  it('normalizes separators, dots and parent segments', () => {
    expect(normalizePath('')).toBe('/');
    expect(normalizePath('docs//./api/')).toBe('/docs/api');
    expect(normalizePath('docs\\api\\..\\guide.md')).toBe('/docs/guide.md');
    expect(splitPath('/a/b/../c')).toEqual(['a', 'c']);
  });

  it('refuses to leave the root', () => {
    expect(() => splitPath('..')).toThrow(IllegalPathError);
    expect(() => splitPath('/a/../../b')).toThrow(IllegalPathError);
    expect(() => splitPath('a\0b')).toThrow('contains a NUL byte');
  });

  it('maps onto the mirror directory and hides git metadata', () => {
    expect(toSystemPath('/srv/mirror', '/')).toBe('/srv/mirror');
    expect(toSystemPath('/srv/mirror', 'docs/guide.md')).toBe(join('/srv/mirror', 'docs', 'guide.md'));
    expect(() => toSystemPath('/srv/mirror', '.git/config')).toThrow(ResourceNotFoundError);
    expect(toSystemPath('/srv/mirror', 'docs/.git')).toBe(join('/srv/mirror', 'docs', '.git'));
  });

  it('joins and splits names', () => {
    expect(joinPath('/', 'docs')).toBe('/docs');
    expect(joinPath('/docs', 'api')).toBe('/docs/api');
    expect(baseName('/docs/guide.md')).toBe('guide.md');
    expect(baseName('/')).toBe('');
  });
});
