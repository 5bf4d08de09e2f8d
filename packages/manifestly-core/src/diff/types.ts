import type { ManifestEntry } from '../manifest/types.js';

/**
 * Content difference between a source and a target manifest.
 *
 * Direction is source-relative:
 * - `added`: present in the source only
 * - `removed`: present in the target only
 * - `changed`: present in both with different hashes
 * - `unchanged`: present in both with equal hashes (sizes are not compared)
 *
 * Each list is sorted by path and the four lists are disjoint.
 */
export interface DiffResult {
  added: string[];
  removed: string[];
  changed: string[];
  unchanged: string[];
}

/** Serialized diff, as written by `patch --diff-only` and into archives */
export interface DiffDocument {
  added: string[];
  removed: string[];
  changed: string[];
}

export interface DiffSummary {
  added: number;
  removed: number;
  changed: number;
  unchanged: number;
}

/** The part of a manifest the diff engine reads */
export interface DiffableManifest {
  readonly algorithm: string;
  readonly entries: ReadonlyMap<string, ManifestEntry>;
}
