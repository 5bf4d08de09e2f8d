/**
 * Types for the content hashing module.
 *
 * Digests are selected by name through a registry so callers never depend
 * on a concrete algorithm implementation.
 */

/** Canonical name of a registered hash algorithm (e.g. "sha256"). */
export type HashAlgorithmName = string;

/** Incremental digest fed one chunk at a time. */
export interface StreamingDigest {
  update(chunk: Uint8Array): void;
  /** Finish and return the lowercase hex digest. */
  digest(): string;
}

export type DigestFactory = () => StreamingDigest;

/** Result of hashing a file or stream */
export interface FileHashResult {
  /** The computed hash as a hex string */
  hash: string;
  /** Canonical algorithm name */
  algorithm: HashAlgorithmName;
  /** Number of bytes hashed */
  sizeBytes: number;
}

export interface HashOptions {
  /** Maximum bytes fed to the digest per update (default: 8192) */
  chunkSize?: number;
}

export const DEFAULT_CHUNK_SIZE = 8192;

export const DEFAULT_HASH_ALGORITHM: HashAlgorithmName = 'sha256';
