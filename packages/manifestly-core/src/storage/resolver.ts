/**
 * Maps location strings to the backend that serves them.
 *
 *   /data/photos, ./photos      local filesystem
 *   file:///data/photos         local filesystem
 *   s3://bucket/prefix          S3 (one backend per bucket, shared client)
 *
 * Further schemes can be added with registerBackend().
 */

import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { S3Client } from '@aws-sdk/client-s3';
import type { Logger } from 'pino';
import type { ManifestConfig, S3BackendConfig } from '../config/types.js';
import { InvalidPathError } from '../errors.js';
import { LocalStorageBackend } from './local-backend.js';
import { S3StorageBackend, createS3Client } from './s3-backend.js';
import type { ResolvedLocation, StorageBackend } from './types.js';

/** Resolves a location of a registered scheme to its backend and native path */
export type BackendFactory = (uri: string) => Omit<ResolvedLocation, 'uri'>;

export interface StorageResolverOptions {
  config: Pick<ManifestConfig, 's3' | 'retry'>;
  logger: Logger;
  /** Supplies the S3 client; defaults to one built from config.s3 */
  s3ClientFactory?: (config: S3BackendConfig) => S3Client;
  /** Passed to remote backends' retry policy; override for tests */
  sleep?: (ms: number) => Promise<void>;
}

const SCHEME_PATTERN = /^([a-zA-Z][a-zA-Z0-9+.-]*):\/\//;

export class StorageResolver {
  private readonly options: StorageResolverOptions;
  private readonly local = new LocalStorageBackend();
  private readonly s3Backends = new Map<string, S3StorageBackend>();
  private readonly factories = new Map<string, BackendFactory>();
  private s3Client: S3Client | null = null;

  constructor(options: StorageResolverOptions) {
    this.options = options;
  }

  /**
   * Register a backend for a URI scheme (without `://`). Registering
   * `file` or `s3` replaces the built-in handling.
   */
  registerBackend(scheme: string, factory: BackendFactory): void {
    this.factories.set(scheme.toLowerCase(), factory);
  }

  resolve(uri: string): ResolvedLocation {
    const match = SCHEME_PATTERN.exec(uri);
    const scheme = match ? match[1].toLowerCase() : 'file';

    const custom = this.factories.get(scheme);
    if (custom) {
      return { ...custom(uri), uri };
    }

    if (!match) {
      return { backend: this.local, path: path.resolve(uri), uri };
    }

    switch (scheme) {
      case 'file':
        return { backend: this.local, path: fileURLToPath(uri), uri };
      case 's3':
        return this.resolveS3(uri);
      default:
        throw new InvalidPathError(uri, `unsupported storage scheme "${scheme}"`);
    }
  }

  /** Backend for a location, without its path */
  backendFor(uri: string): StorageBackend {
    return this.resolve(uri).backend;
  }

  private resolveS3(uri: string): ResolvedLocation {
    const rest = uri.slice('s3://'.length);
    const slash = rest.indexOf('/');
    const bucket = slash === -1 ? rest : rest.slice(0, slash);
    const key = slash === -1 ? '' : rest.slice(slash + 1).replace(/\/+$/, '');

    if (bucket === '') {
      throw new InvalidPathError(uri, 'missing bucket name');
    }

    let backend = this.s3Backends.get(bucket);
    if (!backend) {
      backend = new S3StorageBackend({
        client: this.getS3Client(),
        bucket,
        config: this.options.config.s3,
        retry: this.options.config.retry,
        logger: this.options.logger,
        sleep: this.options.sleep,
      });
      this.s3Backends.set(bucket, backend);
    }

    return { backend, path: key, uri };
  }

  private getS3Client(): S3Client {
    if (this.s3Client === null) {
      const factory = this.options.s3ClientFactory ?? createS3Client;
      this.s3Client = factory(this.options.config.s3);
    }
    return this.s3Client;
  }
}

/** Render a backend-native path back into a location string */
export function formatLocation(backend: StorageBackend, nativePath: string): string {
  if (backend instanceof S3StorageBackend) {
    return backend.uriOf(nativePath);
  }
  return nativePath;
}
