// Errors
export {
  ManifestlyError,
  PathNotFoundError,
  ManifestNotFoundError,
  UnsupportedAlgorithmError,
  PermissionDeniedError,
  RemoteBackendError,
  TransientRemoteError,
  RemoteAuthError,
  IntegrityMismatchError,
  MalformedManifestError,
  AlgorithmMismatchError,
  InvalidPathError,
  ConfigError,
  OperationCancelledError,
  AggregateOperationError,
  ScanFailedError,
  SyncFailedError,
  toManifestlyError,
} from './errors.js';

export type { ManifestlyErrorCode, PathFailure } from './errors.js';

// Shared utilities
export { createLogger, createSilentLogger, isLogLevel, LOG_LEVELS } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';

export { normalizeRelativePath, tryNormalizeRelativePath, comparePaths, sortPaths, parentDirectories } from './paths.js';

export { runWithConcurrency, RequestLimiter } from './concurrency.js';
export type { SettledOutcome, ConcurrencyOptions } from './concurrency.js';

// Config module
export * from './config/index.js';

// Hash module
export * from './hash/index.js';

// Ignore module
export * from './ignore/index.js';

// Storage module
export * from './storage/index.js';

// Scan module
export * from './scan/index.js';

// Manifest module
export * from './manifest/index.js';

// Diff module
export * from './diff/index.js';

// Sync module
export * from './sync/index.js';

// Patch module
export * from './patch/index.js';

// Archive module
export * from './archive/index.js';
