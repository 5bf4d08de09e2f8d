/**
 * StorageBackend over an S3-compatible object store.
 *
 * Locations are object keys inside one bucket. Directories do not exist
 * as objects; they are derived from key prefixes, so `ensureDir` is a
 * no-op and there are no empty parents to prune.
 *
 * Every request passes through a RequestLimiter (bounded in-flight
 * requests per backend) and the transient-error retry policy.
 */

import * as path from 'node:path';
import { Readable } from 'node:stream';
import {
  S3Client,
  ListObjectsV2Command,
  HeadObjectCommand,
  GetObjectCommand,
  PutObjectCommand,
  DeleteObjectCommand,
} from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import type { Logger } from 'pino';
import type { RetryConfig, S3BackendConfig } from '../config/types.js';
import { RequestLimiter } from '../concurrency.js';
import { OperationCancelledError, PathNotFoundError, RemoteBackendError, toManifestlyError } from '../errors.js';
import { withRetry } from './retry.js';
import type {
  ListOptions,
  StorageBackend,
  StorageEntry,
  StorageStat,
  WriteOptions,
} from './types.js';

export interface S3StorageBackendOptions {
  client: S3Client;
  bucket: string;
  config: S3BackendConfig;
  retry: RetryConfig;
  logger: Logger;
  /** Override for tests */
  sleep?: (ms: number) => Promise<void>;
}

/** Build an S3 client from backend configuration */
export function createS3Client(config: S3BackendConfig): S3Client {
  return new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: config.forcePathStyle,
  });
}

async function collect(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

export class S3StorageBackend implements StorageBackend {
  readonly scheme = 's3';
  readonly bucket: string;

  private readonly client: S3Client;
  private readonly config: S3BackendConfig;
  private readonly retry: RetryConfig;
  private readonly logger: Logger;
  private readonly limiter: RequestLimiter;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(options: S3StorageBackendOptions) {
    this.client = options.client;
    this.bucket = options.bucket;
    this.config = options.config;
    this.retry = options.retry;
    this.sleep = options.sleep;
    this.limiter = new RequestLimiter(options.config.maxConcurrentRequests);
    this.logger = options.logger.child({ component: 's3-backend', bucket: options.bucket });
  }

  async list(root: string, options: ListOptions = {}): Promise<StorageEntry[]> {
    const prefix = this.prefixOf(root);
    const results: StorageEntry[] = [];
    const directories = new Map<string, boolean>();
    let continuationToken: string | undefined;
    let pageCount = 0;

    // A directory is pruned when it or any ancestor is pruned
    const isPruned = (dir: string): boolean => {
      const known = directories.get(dir);
      if (known !== undefined) {
        return known;
      }
      const slash = dir.lastIndexOf('/');
      const parentPruned = slash > 0 && isPruned(dir.slice(0, slash));
      const pruned = parentPruned || (options.prune?.(dir) ?? false);
      directories.set(dir, pruned);
      if (!parentPruned) {
        results.push({ relativePath: dir, kind: 'directory' });
      }
      return pruned;
    };

    do {
      if (options.signal?.aborted) {
        throw new OperationCancelledError(`Listing s3://${this.bucket}/${prefix}`);
      }

      const response = await this.send('ListObjectsV2', prefix, () =>
        this.client.send(
          new ListObjectsV2Command({
            Bucket: this.bucket,
            Prefix: prefix || undefined,
            ContinuationToken: continuationToken,
            MaxKeys: 1000,
          }),
        ),
      );

      for (const obj of response.Contents ?? []) {
        if (!obj.Key || obj.Key.endsWith('/')) {
          continue;
        }
        const relativePath = obj.Key.slice(prefix.length);
        const slash = relativePath.lastIndexOf('/');
        if (slash > 0 && isPruned(relativePath.slice(0, slash))) {
          continue;
        }
        results.push({ relativePath, kind: 'file', size: obj.Size ?? 0 });
      }

      continuationToken = response.IsTruncated ? response.NextContinuationToken : undefined;
      pageCount++;

      if (continuationToken && pageCount >= this.config.maxListPages) {
        this.logger.warn(
          { maxListPages: this.config.maxListPages, objectsSoFar: results.length },
          'Listing truncated at maximum list pages limit',
        );
        throw new RemoteBackendError(
          `Listing s3://${this.bucket}/${prefix} exceeded ${this.config.maxListPages} pages; refusing a partial listing`,
          { path: root },
        );
      }
    } while (continuationToken);

    return results;
  }

  async stat(location: string): Promise<StorageStat | null> {
    const key = this.keyOf(location);

    if (key !== '') {
      try {
        const head = await this.send('HeadObject', key, () =>
          this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key })),
        );
        return { kind: 'file', size: head.ContentLength ?? 0 };
      } catch (err) {
        if (!(err instanceof PathNotFoundError)) {
          throw err;
        }
      }
    }

    const prefix = this.prefixOf(key);
    const listing = await this.send('ListObjectsV2', prefix, () =>
      this.client.send(new ListObjectsV2Command({ Bucket: this.bucket, Prefix: prefix || undefined, MaxKeys: 1 })),
    );
    if (key === '' || (listing.KeyCount ?? listing.Contents?.length ?? 0) > 0) {
      return { kind: 'directory', size: 0 };
    }
    return null;
  }

  async exists(location: string): Promise<boolean> {
    return (await this.stat(location)) !== null;
  }

  async openRead(location: string): Promise<Readable> {
    const key = this.keyOf(location);
    const response = await this.send('GetObject', key, () =>
      this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key })),
    );

    if (!response.Body) {
      return Readable.from([]);
    }
    if (response.Body instanceof Readable) {
      return response.Body;
    }
    return Readable.from([await response.Body.transformToByteArray()]);
  }

  async read(location: string): Promise<Buffer> {
    return collect(await this.openRead(location));
  }

  async write(location: string, data: Uint8Array | Readable, options: WriteOptions = {}): Promise<void> {
    const key = this.keyOf(location);
    const size = data instanceof Readable ? options.size : data.byteLength;

    // Small bodies are buffered so a failed PUT can be retried; larger
    // ones stream through a multipart upload that only becomes visible
    // once every part has been committed.
    if (size !== undefined && size < this.config.multipartThresholdBytes) {
      const body = data instanceof Readable ? await collect(data) : data;
      await this.send('PutObject', key, () =>
        this.client.send(new PutObjectCommand({ Bucket: this.bucket, Key: key, Body: body })),
      );
      return;
    }

    this.logger.debug({ key, size }, 'Starting multipart upload');
    const upload = new Upload({
      client: this.client,
      params: { Bucket: this.bucket, Key: key, Body: data },
      queueSize: Math.max(1, Math.min(4, this.config.maxConcurrentRequests)),
      partSize: this.config.multipartPartSizeBytes,
      leavePartsOnError: false,
    });

    try {
      await this.limiter.run(() => upload.done());
    } catch (err) {
      throw toManifestlyError(err, key, true);
    }
  }

  async remove(location: string): Promise<void> {
    const key = this.keyOf(location);
    await this.send('DeleteObject', key, () =>
      this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key })),
    );
  }

  async ensureDir(): Promise<void> {
    // prefixes come into existence with their first object
  }

  join(base: string, ...segments: string[]): string {
    const joined = path.posix.join(base || '.', ...segments).replace(/^\/+/, '');
    return joined === '.' ? '' : joined;
  }

  dirname(location: string): string {
    const dir = path.posix.dirname(this.keyOf(location));
    return dir === '.' ? '' : dir;
  }

  basename(location: string): string {
    return path.posix.basename(location);
  }

  /** URI form of a key, for messages */
  uriOf(location: string): string {
    return `s3://${this.bucket}/${this.keyOf(location)}`;
  }

  private keyOf(location: string): string {
    return location.replace(/^\/+/, '').replace(/\/+$/, '');
  }

  private prefixOf(location: string): string {
    const key = this.keyOf(location);
    return key === '' ? '' : `${key}/`;
  }

  private send<T>(operation: string, key: string, request: () => Promise<T>): Promise<T> {
    return withRetry(
      () =>
        this.limiter.run(async () => {
          try {
            return await request();
          } catch (err) {
            throw toManifestlyError(err, key, true);
          }
        }),
      { ...this.retry, operation: `${operation} ${key}`, logger: this.logger, sleep: this.sleep },
    );
  }
}
