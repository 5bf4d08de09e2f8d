/**
 * Relative path handling shared by every component.
 *
 * Manifest keys are forward-slash separated, never start with `./` or `/`
 * and never contain `.`, `..` or empty segments.
 */

import { InvalidPathError } from './errors.js';

/**
 * Normalize a relative path to manifest form.
 *
 * @throws InvalidPathError if the path is empty or escapes its root
 */
export function normalizeRelativePath(input: string): string {
  const slashed = input.replace(/\\/g, '/');
  const segments: string[] = [];

  for (const segment of slashed.split('/')) {
    if (segment === '' || segment === '.') {
      continue;
    }
    if (segment === '..') {
      throw new InvalidPathError(input, 'parent directory segments are not allowed');
    }
    segments.push(segment);
  }

  if (segments.length === 0) {
    throw new InvalidPathError(input, 'path is empty');
  }

  return segments.join('/');
}

/** Non-throwing variant of normalizeRelativePath. */
export function tryNormalizeRelativePath(input: string): string | null {
  try {
    return normalizeRelativePath(input);
  } catch {
    return null;
  }
}

/**
 * Ordering used for manifest entries, diff sets and sync plans.
 * Plain code-unit comparison, independent of locale.
 */
export function comparePaths(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function sortPaths(paths: Iterable<string>): string[] {
  return [...paths].sort(comparePaths);
}

/** Parent directories of a relative path, nearest first (`a/b/c` -> `a/b`, `a`). */
export function parentDirectories(relativePath: string): string[] {
  const parents: string[] = [];
  let index = relativePath.lastIndexOf('/');
  while (index > 0) {
    parents.push(relativePath.slice(0, index));
    index = relativePath.lastIndexOf('/', index - 1);
  }
  return parents;
}
