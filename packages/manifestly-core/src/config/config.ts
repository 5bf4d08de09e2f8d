/**
 * Configuration builder.
 *
 * Environment variables are read once, here, from the `env` object the
 * caller passes in. Explicit overrides win over the environment. The
 * resolved value is validated and frozen before any component sees it.
 */

import * as os from 'node:os';
import { ConfigError } from '../errors.js';
import { isLogLevel } from '../logger.js';
import { DEFAULT_CHUNK_SIZE, DEFAULT_HASH_ALGORITHM } from '../hash/types.js';
import { defaultHashRegistry } from '../hash/registry.js';
import type { HashAlgorithmRegistry } from '../hash/registry.js';
import type { ManifestConfig, ManifestConfigOverrides, OutputFormat } from './types.js';
import { DEFAULT_IGNORE_FILE_NAME, DEFAULT_MANIFEST_NAME, OUTPUT_FORMATS } from './types.js';

export type Environment = Record<string, string | undefined>;

function getEnv(env: Environment, key: string, fallback: string): string {
  return env[key] ?? fallback;
}

/** @throws ConfigError when the variable is set to anything but a whole number */
function getEnvNumber(env: Environment, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (raw === undefined || raw === '') return fallback;
  const parsed = Number(raw);
  if (!Number.isSafeInteger(parsed)) {
    throw new ConfigError([`${key} must be an integer, got "${raw}"`]);
  }
  return parsed;
}

function getEnvList(env: Environment, key: string): string[] {
  const raw = env[key];
  if (!raw) return [];
  return raw
    .split(',')
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

export function defaultConcurrency(): number {
  return Math.max(1, Math.min(16, os.availableParallelism()));
}

/**
 * Build a configuration from environment variables and optional overrides.
 * The result is not validated; see resolveManifestConfig.
 *
 * Environment variables:
 * - MANIFESTLY_HASH_ALGORITHM: Hash algorithm (default: sha256)
 * - MANIFESTLY_NAME: Manifest file name (default: .manifestly.json)
 * - MANIFESTLY_IGNORE_FILE: Ignore file name (default: .manifestlyignore)
 * - MANIFESTLY_CHUNK_SIZE: Bytes per digest update (default: 8192)
 * - MANIFESTLY_INCLUDE / MANIFESTLY_EXCLUDE: Comma-separated patterns
 * - MANIFESTLY_OUTPUT_FORMAT: text | json (default: text)
 * - MANIFESTLY_CONCURRENCY: Hashing workers (default: available parallelism, max 16)
 * - MANIFESTLY_MAX_TRANSFERS: Concurrent sync copies (default: 4)
 * - MANIFESTLY_VERIFY: Re-hash copied files, "false" to disable (default: true)
 * - MANIFESTLY_MAX_RETRIES / MANIFESTLY_RETRY_BASE_DELAY_MS: Remote retry policy
 * - AWS_REGION, MANIFESTLY_S3_ENDPOINT, MANIFESTLY_S3_FORCE_PATH_STYLE,
 *   MANIFESTLY_S3_MAX_REQUESTS: S3 backend settings
 * - MANIFESTLY_LOG_LEVEL: pino level (default: warn)
 */
export function buildManifestConfig(overrides?: ManifestConfigOverrides, env: Environment = {}): ManifestConfig {
  const envFormat = getEnv(env, 'MANIFESTLY_OUTPUT_FORMAT', 'text');
  const envLogLevel = getEnv(env, 'MANIFESTLY_LOG_LEVEL', 'warn');
  const envEndpoint = env['MANIFESTLY_S3_ENDPOINT'];

  return {
    algorithm: overrides?.algorithm ?? getEnv(env, 'MANIFESTLY_HASH_ALGORITHM', DEFAULT_HASH_ALGORITHM),
    manifestName: overrides?.manifestName ?? getEnv(env, 'MANIFESTLY_NAME', DEFAULT_MANIFEST_NAME),
    ignoreFileName: overrides?.ignoreFileName ?? getEnv(env, 'MANIFESTLY_IGNORE_FILE', DEFAULT_IGNORE_FILE_NAME),
    chunkSize: overrides?.chunkSize ?? getEnvNumber(env, 'MANIFESTLY_CHUNK_SIZE', DEFAULT_CHUNK_SIZE),
    includePatterns: overrides?.includePatterns ?? getEnvList(env, 'MANIFESTLY_INCLUDE'),
    excludePatterns: overrides?.excludePatterns ?? getEnvList(env, 'MANIFESTLY_EXCLUDE'),
    outputFormat: overrides?.outputFormat ?? (isOutputFormat(envFormat) ? envFormat : 'text'),
    concurrency: overrides?.concurrency ?? getEnvNumber(env, 'MANIFESTLY_CONCURRENCY', defaultConcurrency()),
    maxConcurrentTransfers: overrides?.maxConcurrentTransfers ?? getEnvNumber(env, 'MANIFESTLY_MAX_TRANSFERS', 4),
    verifyCopies: overrides?.verifyCopies ?? getEnv(env, 'MANIFESTLY_VERIFY', 'true') !== 'false',
    maxPatchFileBytes: overrides?.maxPatchFileBytes ?? 5 * 1024 * 1024,
    retry: {
      maxRetries: overrides?.retry?.maxRetries ?? getEnvNumber(env, 'MANIFESTLY_MAX_RETRIES', 3),
      baseDelayMs: overrides?.retry?.baseDelayMs ?? getEnvNumber(env, 'MANIFESTLY_RETRY_BASE_DELAY_MS', 200),
      maxDelayMs: overrides?.retry?.maxDelayMs ?? 10_000,
    },
    s3: {
      region: overrides?.s3?.region ?? getEnv(env, 'AWS_REGION', 'us-east-1'),
      endpoint: overrides?.s3?.endpoint ?? (envEndpoint || undefined),
      forcePathStyle:
        overrides?.s3?.forcePathStyle ?? getEnv(env, 'MANIFESTLY_S3_FORCE_PATH_STYLE', 'false') === 'true',
      maxConcurrentRequests:
        overrides?.s3?.maxConcurrentRequests ?? getEnvNumber(env, 'MANIFESTLY_S3_MAX_REQUESTS', 8),
      multipartThresholdBytes: overrides?.s3?.multipartThresholdBytes ?? 8 * 1024 * 1024,
      multipartPartSizeBytes: overrides?.s3?.multipartPartSizeBytes ?? 8 * 1024 * 1024,
      maxListPages: overrides?.s3?.maxListPages ?? 10_000,
    },
    logLevel: overrides?.logLevel ?? (isLogLevel(envLogLevel) ? envLogLevel : 'warn'),
  };
}

/**
 * Validate a configuration.
 * Returns an array of error messages (empty = valid).
 */
export function validateManifestConfig(
  config: ManifestConfig,
  registry: HashAlgorithmRegistry = defaultHashRegistry,
): string[] {
  const errors: string[] = [];

  if (!registry.has(config.algorithm)) {
    errors.push(`algorithm must be one of: ${registry.names().join(', ')}`);
  }

  if (!config.manifestName || config.manifestName.includes('/')) {
    errors.push('manifestName must be a plain file name');
  }

  if (!config.ignoreFileName || config.ignoreFileName.includes('/')) {
    errors.push('ignoreFileName must be a plain file name');
  }

  if (!Number.isInteger(config.chunkSize) || config.chunkSize < 1) {
    errors.push('chunkSize must be a positive integer');
  }

  if (!isOutputFormat(config.outputFormat)) {
    errors.push(`outputFormat must be one of: ${OUTPUT_FORMATS.join(', ')}`);
  }

  if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
    errors.push('concurrency must be at least 1');
  }

  if (!Number.isInteger(config.maxConcurrentTransfers) || config.maxConcurrentTransfers < 1) {
    errors.push('maxConcurrentTransfers must be at least 1');
  }

  if (config.maxPatchFileBytes < 0) {
    errors.push('maxPatchFileBytes must not be negative');
  }

  if (config.retry.maxRetries < 0) {
    errors.push('retry.maxRetries must not be negative');
  }

  if (config.retry.baseDelayMs < 0) {
    errors.push('retry.baseDelayMs must not be negative');
  }

  if (config.s3.maxConcurrentRequests < 1) {
    errors.push('s3.maxConcurrentRequests must be at least 1');
  }

  if (config.s3.multipartPartSizeBytes < 5 * 1024 * 1024) {
    errors.push('s3.multipartPartSizeBytes must be at least 5 MiB');
  }

  return errors;
}

/**
 * Build, validate and freeze a configuration. The algorithm name is
 * replaced by its canonical form, so an unknown algorithm fails here
 * rather than inside a hashing loop.
 *
 * @throws UnsupportedAlgorithmError for an unknown algorithm
 * @throws ConfigError for any other invalid setting
 */
export function resolveManifestConfig(
  overrides?: ManifestConfigOverrides,
  env: Environment = {},
  registry: HashAlgorithmRegistry = defaultHashRegistry,
): Readonly<ManifestConfig> {
  const config = buildManifestConfig(overrides, env);
  const algorithm = registry.resolve(config.algorithm);

  const errors = validateManifestConfig(config, registry);
  if (errors.length > 0) {
    throw new ConfigError(errors);
  }

  return Object.freeze({
    ...config,
    algorithm,
    includePatterns: Object.freeze([...config.includePatterns]),
    excludePatterns: Object.freeze([...config.excludePatterns]),
    retry: Object.freeze({ ...config.retry }),
    s3: Object.freeze({ ...config.s3 }),
  });
}
