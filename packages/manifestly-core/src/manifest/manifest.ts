/**
 * Manifest - a content-addressed snapshot of a directory tree.
 *
 * A manifest maps normalized relative paths to size and content hash,
 * all computed with one algorithm. It is immutable apart from refresh(),
 * which replaces the entries and generation time together once a new
 * scan has succeeded.
 */

import { ManifestlyError, ScanFailedError } from '../errors.js';
import { diffManifests } from '../diff/diff-engine.js';
import type { DiffResult } from '../diff/types.js';
import { ManifestIgnore } from '../ignore/manifest-ignore.js';
import { comparePaths, normalizeRelativePath } from '../paths.js';
import { TreeScanner } from '../scan/tree-scanner.js';
import { formatLocation } from '../storage/resolver.js';
import type { HashAlgorithmName } from '../hash/types.js';
import type { ManifestContext, ManifestDocument, ManifestEntry, ManifestEqualityOptions } from './types.js';

function toEntryMap(entries: Iterable<ManifestEntry>): ReadonlyMap<string, ManifestEntry> {
  const sorted = [...entries].sort((a, b) => comparePaths(a.path, b.path));
  return new Map(sorted.map((entry) => [entry.path, Object.freeze({ ...entry })]));
}

/**
 * Scan `root` with the context's configuration. Fails with an aggregate
 * error listing every path that could not be hashed.
 */
async function scanRoot(root: string, context: ManifestContext): Promise<ManifestEntry[]> {
  const { resolver, config, logger } = context;
  const { backend, path: nativeRoot } = resolver.resolve(root);

  const ignore = await ManifestIgnore.load(backend, nativeRoot, {
    manifestName: config.manifestName,
    ignoreFileName: config.ignoreFileName,
    extraBuiltinNames: context.outputManifestName ? [context.outputManifestName] : [],
    includePatterns: config.includePatterns,
    excludePatterns: config.excludePatterns,
  });

  const scanner = new TreeScanner({
    backend,
    root: nativeRoot,
    ignore,
    algorithm: config.algorithm,
    chunkSize: config.chunkSize,
    concurrency: config.concurrency,
    logger,
    registry: context.registry,
    signal: context.signal,
  });

  const result = await scanner.scan();
  if (result.failures.length > 0) {
    throw new ScanFailedError(root, result.failures);
  }
  return result.entries;
}

export class Manifest {
  /** Location of the scanned tree (local path or storage URI) */
  readonly root: string;
  readonly algorithm: HashAlgorithmName;

  private _generatedAt: Date;
  private _entries: ReadonlyMap<string, ManifestEntry>;
  private readonly context?: ManifestContext;

  private constructor(
    root: string,
    algorithm: HashAlgorithmName,
    generatedAt: Date,
    entries: Iterable<ManifestEntry>,
    context?: ManifestContext,
  ) {
    this.root = root;
    this.algorithm = algorithm;
    this._generatedAt = generatedAt;
    this._entries = toEntryMap(entries);
    this.context = context;
  }

  /**
   * Scan `root` and build a manifest of every admitted file.
   *
   * @throws PathNotFoundError if the root does not exist
   * @throws ScanFailedError if any file could not be hashed
   */
  static async generate(root: string, context: ManifestContext): Promise<Manifest> {
    const resolved = context.resolver.resolve(root);
    const canonicalRoot = formatLocation(resolved.backend, resolved.path);
    const entries = await scanRoot(canonicalRoot, context);
    return new Manifest(canonicalRoot, context.config.algorithm, new Date(), entries, context);
  }

  /** A manifest with no entries, standing in for a tree that has none yet */
  static empty(root: string, algorithm: HashAlgorithmName, context?: ManifestContext): Manifest {
    return new Manifest(root, algorithm, new Date(), [], context);
  }

  /**
   * Build a manifest from known entries. Every entry must use `algorithm`.
   */
  static fromEntries(
    root: string,
    algorithm: HashAlgorithmName,
    entries: Iterable<ManifestEntry>,
    options: { generatedAt?: Date; context?: ManifestContext } = {},
  ): Manifest {
    const list = [...entries];
    for (const entry of list) {
      if (entry.algorithm !== algorithm) {
        throw new ManifestlyError(
          'ALGORITHM_MISMATCH',
          `Entry ${entry.path} uses ${entry.algorithm}, manifest uses ${algorithm}`,
          { path: entry.path },
        );
      }
      normalizeRelativePath(entry.path);
    }
    return new Manifest(root, algorithm, options.generatedAt ?? new Date(), list, options.context);
  }

  /**
   * Rebuild a manifest from its serialized form.
   *
   * @param options.root - overrides the document's root
   */
  static fromDocument(
    document: ManifestDocument,
    options: { root?: string; context?: ManifestContext } = {},
  ): Manifest {
    const root = options.root ?? document.root ?? '';
    const entries: ManifestEntry[] = Object.entries(document.files).map(([filePath, file]) => ({
      path: filePath,
      size: file.size,
      hash: file.hash,
      algorithm: document.algorithm,
    }));
    return new Manifest(root, document.algorithm, new Date(document.generated_at), entries, options.context);
  }

  get generatedAt(): Date {
    return new Date(this._generatedAt.getTime());
  }

  /** Entries keyed by path, in path order */
  get entries(): ReadonlyMap<string, ManifestEntry> {
    return this._entries;
  }

  get size(): number {
    return this._entries.size;
  }

  get isEmpty(): boolean {
    return this._entries.size === 0;
  }

  /** Scan context this manifest refreshes with, if any */
  get scanContext(): ManifestContext | undefined {
    return this.context;
  }

  get(filePath: string): ManifestEntry | undefined {
    return this._entries.get(filePath);
  }

  has(filePath: string): boolean {
    return this._entries.has(filePath);
  }

  paths(): string[] {
    return [...this._entries.keys()];
  }

  /** Total size of all entries in bytes */
  totalBytes(): number {
    let total = 0;
    for (const entry of this._entries.values()) {
      total += entry.size;
    }
    return total;
  }

  /**
   * Re-scan the root and replace entries and timestamp. On failure the
   * manifest keeps its previous state.
   */
  async refresh(): Promise<void> {
    const context = this.requireContext('refresh');
    const entries = await scanRoot(this.root, this.withAlgorithm(context));
    this._entries = toEntryMap(entries);
    this._generatedAt = new Date();
  }

  /**
   * What changed on disk since this manifest was taken: the current tree
   * as source, this manifest as target. Nothing is mutated.
   */
  async changes(): Promise<DiffResult> {
    const context = this.requireContext('changes');
    const current = await scanRoot(this.root, this.withAlgorithm(context));
    return diffManifests(
      new Manifest(this.root, this.algorithm, new Date(), current, context),
      this,
    );
  }

  equals(other: Manifest, options: ManifestEqualityOptions = {}): boolean {
    if (this.root !== other.root || this.algorithm !== other.algorithm || this.size !== other.size) {
      return false;
    }
    if (options.compareGeneratedAt && this._generatedAt.getTime() !== other._generatedAt.getTime()) {
      return false;
    }
    for (const [filePath, entry] of this._entries) {
      const theirs = other._entries.get(filePath);
      if (!theirs || theirs.hash !== entry.hash || theirs.size !== entry.size) {
        return false;
      }
    }
    return true;
  }

  toDocument(): ManifestDocument {
    const files: ManifestDocument['files'] = Object.fromEntries(
      [...this._entries].map(([filePath, entry]) => [filePath, { hash: entry.hash, size: entry.size }]),
    );
    return {
      root: this.root,
      algorithm: this.algorithm,
      generated_at: this._generatedAt.toISOString(),
      files,
    };
  }

  private requireContext(operation: string): ManifestContext {
    if (!this.context) {
      throw new ManifestlyError('CONFIG_INVALID', `Cannot ${operation} a manifest of ${this.root} without a scan context`);
    }
    return this.context;
  }

  /** Re-scans keep the manifest's own algorithm, whatever the current config says */
  private withAlgorithm(context: ManifestContext): ManifestContext {
    if (context.config.algorithm === this.algorithm) {
      return context;
    }
    return { ...context, config: { ...context.config, algorithm: this.algorithm } };
  }
}
