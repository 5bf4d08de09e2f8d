/**
 * Chunked content hasher.
 *
 * Streams bytes through an incremental digest at most `chunkSize` bytes at a
 * time, so memory use stays constant regardless of file size.
 */

import * as fs from 'node:fs';
import { toManifestlyError } from '../errors.js';
import { defaultHashRegistry } from './registry.js';
import type { HashAlgorithmRegistry } from './registry.js';
import { DEFAULT_CHUNK_SIZE, DEFAULT_HASH_ALGORITHM } from './types.js';
import type { FileHashResult, HashAlgorithmName, HashOptions } from './types.js';

export interface StreamHashOptions extends HashOptions {
  /** Registry to resolve the algorithm name against (default: built-in registry) */
  registry?: HashAlgorithmRegistry;
}

/**
 * Hash an async byte source (a Node Readable, an S3 body stream, ...).
 *
 * Chunks larger than `chunkSize` are fed in `chunkSize` slices.
 */
export async function hashStream(
  source: AsyncIterable<Uint8Array | string>,
  algorithm: HashAlgorithmName = DEFAULT_HASH_ALGORITHM,
  options: StreamHashOptions = {},
): Promise<FileHashResult> {
  const registry = options.registry ?? defaultHashRegistry;
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const canonical = registry.resolve(algorithm);
  const digest = registry.create(canonical);
  let sizeBytes = 0;

  for await (const raw of source) {
    const chunk = typeof raw === 'string' ? Buffer.from(raw) : raw;
    for (let offset = 0; offset < chunk.length; offset += chunkSize) {
      digest.update(chunk.subarray(offset, offset + chunkSize));
    }
    sizeBytes += chunk.length;
  }

  return {
    hash: digest.digest(),
    algorithm: canonical,
    sizeBytes,
  };
}

/**
 * Compute the hash of a local file using a streaming approach.
 *
 * @param filePath - Absolute path to the file
 * @throws PathNotFoundError / PermissionDeniedError if the file cannot be read
 */
export async function hashFile(
  filePath: string,
  algorithm: HashAlgorithmName = DEFAULT_HASH_ALGORITHM,
  options: StreamHashOptions = {},
): Promise<FileHashResult> {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const stream = fs.createReadStream(filePath, { highWaterMark: chunkSize });

  try {
    return await hashStream(stream, algorithm, { ...options, chunkSize });
  } catch (err) {
    stream.destroy();
    throw toManifestlyError(err, filePath);
  }
}

/**
 * Compute hash of a Buffer (useful for testing or in-memory content).
 */
export function hashBuffer(
  content: Uint8Array,
  algorithm: HashAlgorithmName = DEFAULT_HASH_ALGORITHM,
  registry: HashAlgorithmRegistry = defaultHashRegistry,
): FileHashResult {
  const canonical = registry.resolve(algorithm);
  const digest = registry.create(canonical);
  digest.update(content);

  return {
    hash: digest.digest(),
    algorithm: canonical,
    sizeBytes: content.length,
  };
}
