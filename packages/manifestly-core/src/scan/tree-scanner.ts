/**
 * Walks a root through its storage backend and hashes every admitted file.
 *
 * Listing is sequential; hashing runs on a bounded worker pool. Per-file
 * failures are collected with their path instead of aborting the scan,
 * and entries are sorted once all work is done so the result does not
 * depend on completion order.
 */

import type { Logger } from 'pino';
import { runWithConcurrency } from '../concurrency.js';
import { InvalidPathError, OperationCancelledError, toManifestlyError } from '../errors.js';
import type { PathFailure } from '../errors.js';
import { hashStream } from '../hash/file-hasher.js';
import type { HashAlgorithmRegistry } from '../hash/registry.js';
import type { HashAlgorithmName } from '../hash/types.js';
import type { ManifestIgnore } from '../ignore/manifest-ignore.js';
import type { ManifestEntry } from '../manifest/types.js';
import { comparePaths, tryNormalizeRelativePath } from '../paths.js';
import type { StorageBackend, StorageEntry } from '../storage/types.js';

export interface TreeScannerOptions {
  backend: StorageBackend;
  /** Backend-native root path */
  root: string;
  ignore: ManifestIgnore;
  algorithm: HashAlgorithmName;
  chunkSize: number;
  concurrency: number;
  logger: Logger;
  registry?: HashAlgorithmRegistry;
  signal?: AbortSignal;
}

export interface ScanResult {
  entries: ManifestEntry[];
  failures: PathFailure[];
  /** Symlinks and other non-regular entries that were not hashed */
  skipped: string[];
}

export class TreeScanner {
  private readonly options: TreeScannerOptions;
  private readonly logger: Logger;

  constructor(options: TreeScannerOptions) {
    this.options = options;
    this.logger = options.logger.child({ component: 'tree-scanner' });
  }

  /**
   * @throws PathNotFoundError if the root does not exist
   * @throws OperationCancelledError if the signal aborts
   */
  async scan(): Promise<ScanResult> {
    const { backend, root, ignore, signal } = this.options;
    const failures: PathFailure[] = [];
    const skipped: string[] = [];
    const startTime = Date.now();

    const listing = await backend.list(root, {
      prune: (dir) => ignore.canPrune(dir),
      onError: (relativePath, error) => {
        failures.push({ path: relativePath, error: toManifestlyError(error, relativePath) });
      },
      signal,
    });

    const files: StorageEntry[] = [];
    for (const entry of listing) {
      if (entry.kind === 'directory' || ignore.isIgnored(entry.relativePath, false)) {
        continue;
      }
      if (entry.kind !== 'file') {
        skipped.push(entry.relativePath);
        continue;
      }
      const normalized = tryNormalizeRelativePath(entry.relativePath);
      if (normalized === null) {
        failures.push({
          path: entry.relativePath,
          error: new InvalidPathError(entry.relativePath, 'not representable as a manifest path'),
        });
        continue;
      }
      files.push({ ...entry, relativePath: normalized });
    }

    this.logger.debug({ root, files: files.length, skipped: skipped.length }, 'Listing complete');

    const outcomes = await runWithConcurrency(files, this.options.concurrency, (file) => this.hashEntry(file), {
      signal,
    });

    if (signal?.aborted) {
      throw new OperationCancelledError(`Scan of ${root}`);
    }

    const entries: ManifestEntry[] = [];
    outcomes.forEach((outcome, index) => {
      const relativePath = files[index].relativePath;
      if (outcome.status === 'fulfilled') {
        entries.push(outcome.value);
      } else if (outcome.status === 'rejected') {
        failures.push({ path: relativePath, error: toManifestlyError(outcome.reason, relativePath) });
      }
    });

    entries.sort((a, b) => comparePaths(a.path, b.path));
    failures.sort((a, b) => comparePaths(a.path, b.path));
    skipped.sort(comparePaths);

    this.logger.info(
      { root, files: entries.length, failed: failures.length, skipped: skipped.length, durationMs: Date.now() - startTime },
      'Scan complete',
    );

    return { entries, failures, skipped };
  }

  private async hashEntry(file: StorageEntry): Promise<ManifestEntry> {
    const { backend, root, algorithm, chunkSize, registry } = this.options;
    const location = backend.join(root, file.relativePath);
    const stream = await backend.openRead(location, { chunkSize });

    try {
      const result = await hashStream(stream, algorithm, { chunkSize, registry });
      return { path: file.relativePath, size: result.sizeBytes, hash: result.hash, algorithm: result.algorithm };
    } catch (err) {
      stream.destroy();
      throw toManifestlyError(err, file.relativePath);
    }
  }
}
