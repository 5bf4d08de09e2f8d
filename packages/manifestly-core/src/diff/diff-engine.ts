/**
 * Manifest comparison.
 *
 * Pure and synchronous: one pass over each side with map lookups, no I/O.
 */

import { AlgorithmMismatchError, MalformedManifestError } from '../errors.js';
import { sortPaths, tryNormalizeRelativePath } from '../paths.js';
import type { DiffableManifest, DiffDocument, DiffResult, DiffSummary } from './types.js';

/**
 * Compare `source` against `target`.
 *
 * @throws AlgorithmMismatchError if both manifests have entries and were
 *   hashed with different algorithms
 */
export function diffManifests(source: DiffableManifest, target: DiffableManifest): DiffResult {
  if (source.algorithm !== target.algorithm && source.entries.size > 0 && target.entries.size > 0) {
    throw new AlgorithmMismatchError(source.algorithm, target.algorithm);
  }

  const added: string[] = [];
  const removed: string[] = [];
  const changed: string[] = [];
  const unchanged: string[] = [];

  for (const [filePath, entry] of source.entries) {
    const other = target.entries.get(filePath);
    if (other === undefined) {
      added.push(filePath);
    } else if (other.hash !== entry.hash) {
      changed.push(filePath);
    } else {
      unchanged.push(filePath);
    }
  }

  for (const filePath of target.entries.keys()) {
    if (!source.entries.has(filePath)) {
      removed.push(filePath);
    }
  }

  return {
    added: sortPaths(added),
    removed: sortPaths(removed),
    changed: sortPaths(changed),
    unchanged: sortPaths(unchanged),
  };
}

/** True when applying the diff would change nothing */
export function isInSync(diff: DiffResult): boolean {
  return diff.added.length === 0 && diff.removed.length === 0 && diff.changed.length === 0;
}

export function summarizeDiff(diff: DiffResult): DiffSummary {
  return {
    added: diff.added.length,
    removed: diff.removed.length,
    changed: diff.changed.length,
    unchanged: diff.unchanged.length,
  };
}

export function toDiffDocument(diff: DiffResult): DiffDocument {
  return {
    added: [...diff.added],
    removed: [...diff.removed],
    changed: [...diff.changed],
  };
}

export function encodeDiffDocument(document: DiffDocument): Buffer {
  return Buffer.from(JSON.stringify(document, null, 2) + '\n', 'utf-8');
}

function readPathList(document: Record<string, unknown>, key: keyof DiffDocument, source: string): string[] {
  const value = document[key];
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new MalformedManifestError(source, `"${key}" must be an array of paths`);
  }

  const paths: string[] = [];
  for (const item of value) {
    const normalized = typeof item === 'string' ? tryNormalizeRelativePath(item) : null;
    if (normalized === null || normalized !== item) {
      throw new MalformedManifestError(source, `"${key}" contains an invalid path: ${JSON.stringify(item)}`);
    }
    paths.push(normalized);
  }
  return sortPaths(new Set(paths));
}

/**
 * Parse and validate a serialized diff document.
 *
 * @throws MalformedManifestError on invalid JSON, wrong shapes or unsafe paths
 */
export function parseDiffDocument(bytes: Uint8Array, source = 'diff document'): DiffDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(bytes).toString('utf-8'));
  } catch (err) {
    throw new MalformedManifestError(source, 'invalid JSON', err);
  }

  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new MalformedManifestError(source, 'expected a JSON object');
  }

  const record: Record<string, unknown> = { ...parsed };
  return {
    added: readPathList(record, 'added', source),
    removed: readPathList(record, 'removed', source),
    changed: readPathList(record, 'changed', source),
  };
}

/** A diff rebuilt from its document; nothing is known to be unchanged */
export function fromDiffDocument(document: DiffDocument): DiffResult {
  return {
    added: sortPaths(document.added),
    removed: sortPaths(document.removed),
    changed: sortPaths(document.changed),
    unchanged: [],
  };
}
