/**
 * Storage abstraction shared by the local filesystem and object stores.
 *
 * Core components never touch `node:fs` or an SDK client directly; they
 * go through a StorageBackend obtained from the StorageResolver.
 */

import type { Readable } from 'node:stream';

export type StorageEntryKind = 'file' | 'directory' | 'symlink' | 'other';

/** One entry yielded by a recursive listing */
export interface StorageEntry {
  /** Forward-slash path relative to the listed root */
  relativePath: string;
  kind: StorageEntryKind;
  /** Size in bytes for files, when the listing knows it */
  size?: number;
}

export interface StorageStat {
  kind: StorageEntryKind;
  size: number;
}

export interface ListOptions {
  /**
   * Called for each directory before descending into it. Returning true
   * skips the directory and everything below it.
   */
  prune?: (relativePath: string) => boolean;
  /** Called when a subdirectory cannot be read; the listing continues */
  onError?: (relativePath: string, error: unknown) => void;
  signal?: AbortSignal;
}

export interface ReadOptions {
  /** Preferred chunk size for the returned stream */
  chunkSize?: number;
}

export interface WriteOptions {
  /** Content length, when known up front */
  size?: number;
}

export interface RemoveOptions {
  /**
   * After removing the file, remove parent directories that are left
   * empty, stopping at (and never removing) this directory.
   */
  pruneEmptyParentsUpTo?: string;
}

export interface StorageBackend {
  /** URI scheme this backend serves (`file`, `s3`, ...) */
  readonly scheme: string;

  /**
   * Recursively list everything below `root`, in no particular order.
   *
   * @throws PathNotFoundError if the root does not exist
   */
  list(root: string, options?: ListOptions): Promise<StorageEntry[]>;

  /** Stat a location, or null when nothing exists there */
  stat(location: string): Promise<StorageStat | null>;

  exists(location: string): Promise<boolean>;

  /** Open a location for streaming reads */
  openRead(location: string, options?: ReadOptions): Promise<Readable>;

  /** Read a whole location into memory */
  read(location: string): Promise<Buffer>;

  /**
   * Write a location atomically: readers observe either the previous
   * content or the complete new content. Parent directories are created
   * as needed.
   */
  write(location: string, data: Uint8Array | Readable, options?: WriteOptions): Promise<void>;

  /** Remove a file. Removing something that does not exist is a no-op. */
  remove(location: string, options?: RemoveOptions): Promise<void>;

  /** Create a directory and its parents. Idempotent. */
  ensureDir(location: string): Promise<void>;

  join(base: string, ...segments: string[]): string;
  dirname(location: string): string;
  basename(location: string): string;
}

/** A location resolved to the backend that serves it */
export interface ResolvedLocation {
  backend: StorageBackend;
  /** Backend-native path (absolute filesystem path, object key, ...) */
  path: string;
  /** The location as it was given */
  uri: string;
}
