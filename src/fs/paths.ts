import { join } from 'node:path';
import { IllegalPathError, ResourceNotFoundError } from '../common/errors';

export const HIDDEN_ENTRIES = new Set(['.git']);

/**
 * Normalize a `/`-separated path inside the view. Returns the segments below
 * the root; backing out of the root is illegal.
 */
export function splitPath(path: string): string[] {
  if (path.includes('\0')) {
    throw new IllegalPathError(path, 'contains a NUL byte');
  }
  const segments: string[] = [];
  for (const part of path.replace(/\\/g, '/').split('/')) {
    if (part === '' || part === '.') {
      continue;
    }
    if (part === '..') {
      if (segments.length === 0) {
        throw new IllegalPathError(path);
      }
      segments.pop();
      continue;
    }
    segments.push(part);
  }
  return segments;
}

export function normalizePath(path: string): string {
  return `/${splitPath(path).join('/')}`;
}

/**
 * Map a view path onto the mirror directory. Git's own metadata is not part
 * of the view.
 */
export function toSystemPath(root: string, path: string): string {
  const segments = splitPath(path);
  if (segments.length > 0 && HIDDEN_ENTRIES.has(segments[0])) {
    throw new ResourceNotFoundError(normalizePath(path));
  }
  return segments.length === 0 ? root : join(root, ...segments);
}

export function joinPath(base: string, name: string): string {
  return base === '/' ? `/${name}` : `${base}/${name}`;
}

export function baseName(path: string): string {
  const segments = splitPath(path);
  return segments.length === 0 ? '' : segments[segments.length - 1];
}
