import type { Logger } from 'pino';
import type { ManifestConfig } from '../config/types.js';
import type { HashAlgorithmName } from '../hash/types.js';
import type { HashAlgorithmRegistry } from '../hash/registry.js';
import type { StorageResolver } from '../storage/resolver.js';

/** One hashed file, keyed by its normalized relative path */
export interface ManifestEntry {
  path: string;
  size: number;
  hash: string;
  algorithm: HashAlgorithmName;
}

/** Serialized manifest, as stored on disk */
export interface ManifestDocument {
  root: string | null;
  algorithm: HashAlgorithmName;
  generated_at: string;
  files: Record<string, { hash: string; size: number }>;
}

/** What a manifest needs to (re)scan its root */
export interface ManifestContext {
  resolver: StorageResolver;
  config: ManifestConfig;
  logger: Logger;
  registry?: HashAlgorithmRegistry;
  /**
   * File name of the manifest being written, when it differs from
   * config.manifestName; excluded from scans like the default name.
   */
  outputManifestName?: string;
  signal?: AbortSignal;
}

export interface ManifestCodec {
  encode(document: ManifestDocument): Buffer;
  /** @throws MalformedManifestError */
  decode(bytes: Uint8Array, source: string): ManifestDocument;
}

export interface ManifestEqualityOptions {
  /** Also require identical generation timestamps (default: false) */
  compareGeneratedAt?: boolean;
}
