/**
 * Configuration value passed explicitly into every component.
 */

import type { LevelWithSilent } from 'pino';
import type { HashAlgorithmName } from '../hash/types.js';

export type OutputFormat = 'text' | 'json';

export interface RetryConfig {
  /** Retries after the first attempt for transient remote failures */
  maxRetries: number;
  /** Base delay for exponential backoff in milliseconds */
  baseDelayMs: number;
  /** Upper bound for a single backoff delay in milliseconds */
  maxDelayMs: number;
}

export interface S3BackendConfig {
  /** AWS region used when a location does not imply one */
  region: string;
  /** Custom endpoint for S3-compatible stores (MinIO, R2, ...) */
  endpoint?: string;
  /** Use path-style addressing (required by most S3-compatible stores) */
  forcePathStyle: boolean;
  /** Maximum in-flight requests per bucket */
  maxConcurrentRequests: number;
  /** Objects larger than this are uploaded in parts */
  multipartThresholdBytes: number;
  /** Part size for multipart uploads */
  multipartPartSizeBytes: number;
  /** Maximum number of list pages fetched for one prefix (safety limit) */
  maxListPages: number;
}

export interface ManifestConfig {
  /** Canonical hash algorithm name */
  algorithm: HashAlgorithmName;
  /** Default manifest file name inside a directory */
  manifestName: string;
  /** Ignore file name at the manifest root */
  ignoreFileName: string;
  /** Bytes fed to the digest per update */
  chunkSize: number;
  /** Patterns that re-admit paths excluded by earlier rules */
  includePatterns: readonly string[];
  /** Patterns that exclude paths */
  excludePatterns: readonly string[];
  /** Output format for command results */
  outputFormat: OutputFormat;
  /** Worker pool size for hashing */
  concurrency: number;
  /** Worker pool size for sync copies */
  maxConcurrentTransfers: number;
  /** Re-hash copied files and compare with the source hash */
  verifyCopies: boolean;
  /** Largest file rendered as text in a patch */
  maxPatchFileBytes: number;
  retry: RetryConfig;
  s3: S3BackendConfig;
  logLevel: LevelWithSilent;
}

/** Partial overrides; nested sections may be given partially too. */
export type ManifestConfigOverrides = Partial<Omit<ManifestConfig, 'retry' | 's3'>> & {
  retry?: Partial<RetryConfig>;
  s3?: Partial<S3BackendConfig>;
};

export const DEFAULT_MANIFEST_NAME = '.manifestly.json';

export const DEFAULT_IGNORE_FILE_NAME = '.manifestlyignore';

/** Name of the diff document inside a change archive */
export const DIFF_ENTRY_NAME = '.manifestly.diff';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json'];
