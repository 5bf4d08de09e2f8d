export { LocalStorageBackend } from './local-backend.js';
export { S3StorageBackend, createS3Client } from './s3-backend.js';
export type { S3StorageBackendOptions } from './s3-backend.js';
export { StorageResolver, formatLocation } from './resolver.js';
export type { BackendFactory, StorageResolverOptions } from './resolver.js';
export { withRetry, getBackoffDelay, isTransientError } from './retry.js';
export type { RetryOptions } from './retry.js';
export type {
  StorageBackend,
  StorageEntry,
  StorageEntryKind,
  StorageStat,
  ListOptions,
  ReadOptions,
  WriteOptions,
  RemoveOptions,
  ResolvedLocation,
} from './types.js';
