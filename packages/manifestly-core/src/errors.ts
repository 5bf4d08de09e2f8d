/**
 * Error taxonomy for manifest, scan, sync and storage operations.
 *
 * Every error raised by the core extends ManifestlyError and carries a
 * stable `code` plus, where one applies, the path it is attributed to.
 */

export type ManifestlyErrorCode =
  | 'PATH_NOT_FOUND'
  | 'MANIFEST_NOT_FOUND'
  | 'UNSUPPORTED_ALGORITHM'
  | 'PERMISSION_DENIED'
  | 'REMOTE_BACKEND'
  | 'REMOTE_TRANSIENT'
  | 'REMOTE_AUTH'
  | 'INTEGRITY_MISMATCH'
  | 'MALFORMED_MANIFEST'
  | 'ALGORITHM_MISMATCH'
  | 'INVALID_PATH'
  | 'CONFIG_INVALID'
  | 'CANCELLED'
  | 'PARTIAL_FAILURE'
  | 'IO_ERROR';

export class ManifestlyError extends Error {
  public readonly code: ManifestlyErrorCode;
  public readonly path?: string;

  constructor(code: ManifestlyErrorCode, message: string, options?: { path?: string; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ManifestlyError';
    this.code = code;
    this.path = options?.path;
  }
}

export class PathNotFoundError extends ManifestlyError {
  constructor(path: string, cause?: unknown, code: ManifestlyErrorCode = 'PATH_NOT_FOUND') {
    super(code, `Path not found: ${path}`, { path, cause });
    this.name = 'PathNotFoundError';
  }
}

export class ManifestNotFoundError extends PathNotFoundError {
  constructor(path: string, cause?: unknown) {
    super(path, cause, 'MANIFEST_NOT_FOUND');
    this.name = 'ManifestNotFoundError';
    this.message = `Manifest not found: ${path}`;
  }
}

export class UnsupportedAlgorithmError extends ManifestlyError {
  public readonly algorithm: string;

  constructor(algorithm: string, supported: readonly string[] = []) {
    const hint = supported.length > 0 ? ` (supported: ${supported.join(', ')})` : '';
    super('UNSUPPORTED_ALGORITHM', `Unsupported hash algorithm: ${algorithm}${hint}`);
    this.name = 'UnsupportedAlgorithmError';
    this.algorithm = algorithm;
  }
}

export class PermissionDeniedError extends ManifestlyError {
  constructor(path: string, cause?: unknown) {
    super('PERMISSION_DENIED', `Permission denied: ${path}`, { path, cause });
    this.name = 'PermissionDeniedError';
  }
}

/**
 * Failure talking to a remote storage backend. `transient` failures may be
 * retried; anything else is final.
 */
export class RemoteBackendError extends ManifestlyError {
  public readonly transient: boolean;
  public readonly statusCode?: number;

  constructor(
    message: string,
    options?: { path?: string; cause?: unknown; transient?: boolean; statusCode?: number; code?: ManifestlyErrorCode },
  ) {
    super(options?.code ?? 'REMOTE_BACKEND', message, options);
    this.name = 'RemoteBackendError';
    this.transient = options?.transient ?? false;
    this.statusCode = options?.statusCode;
  }
}

export class TransientRemoteError extends RemoteBackendError {
  constructor(message: string, options?: { path?: string; cause?: unknown; statusCode?: number }) {
    super(message, { ...options, transient: true, code: 'REMOTE_TRANSIENT' });
    this.name = 'TransientRemoteError';
  }
}

export class RemoteAuthError extends RemoteBackendError {
  constructor(message: string, options?: { path?: string; cause?: unknown; statusCode?: number }) {
    super(message, { ...options, transient: false, code: 'REMOTE_AUTH' });
    this.name = 'RemoteAuthError';
  }
}

export class IntegrityMismatchError extends ManifestlyError {
  public readonly expectedHash: string;
  public readonly actualHash: string;

  constructor(path: string, expectedHash: string, actualHash: string) {
    super('INTEGRITY_MISMATCH', `Integrity mismatch for ${path}: expected ${expectedHash}, got ${actualHash}`, {
      path,
    });
    this.name = 'IntegrityMismatchError';
    this.expectedHash = expectedHash;
    this.actualHash = actualHash;
  }
}

export class MalformedManifestError extends ManifestlyError {
  constructor(source: string, reason: string, cause?: unknown) {
    super('MALFORMED_MANIFEST', `Malformed manifest ${source}: ${reason}`, { path: source, cause });
    this.name = 'MalformedManifestError';
  }
}

export class AlgorithmMismatchError extends ManifestlyError {
  constructor(sourceAlgorithm: string, targetAlgorithm: string) {
    super(
      'ALGORITHM_MISMATCH',
      `Cannot compare manifests hashed with different algorithms: ${sourceAlgorithm} vs ${targetAlgorithm}`,
    );
    this.name = 'AlgorithmMismatchError';
  }
}

export class InvalidPathError extends ManifestlyError {
  constructor(path: string, reason: string) {
    super('INVALID_PATH', `Invalid relative path "${path}": ${reason}`, { path });
    this.name = 'InvalidPathError';
  }
}

export class ConfigError extends ManifestlyError {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super('CONFIG_INVALID', `Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

export class OperationCancelledError extends ManifestlyError {
  constructor(operation: string) {
    super('CANCELLED', `${operation} was cancelled`);
    this.name = 'OperationCancelledError';
  }
}

/** A failure attributed to a single relative path. */
export interface PathFailure {
  path: string;
  error: ManifestlyError;
}

/**
 * Raised once all independent units of an operation have completed and at
 * least one of them failed. Holds the full failure set.
 */
export class AggregateOperationError extends ManifestlyError {
  public readonly failures: readonly PathFailure[];

  constructor(operation: string, failures: readonly PathFailure[]) {
    super(
      'PARTIAL_FAILURE',
      `${operation} failed for ${failures.length} path${failures.length === 1 ? '' : 's'}: ` +
        failures
          .slice(0, 5)
          .map((f) => f.path)
          .join(', ') +
        (failures.length > 5 ? ', ...' : ''),
    );
    this.name = 'AggregateOperationError';
    this.failures = failures;
  }
}

export class ScanFailedError extends AggregateOperationError {
  constructor(root: string, failures: readonly PathFailure[]) {
    super(`Scan of ${root}`, failures);
    this.name = 'ScanFailedError';
  }
}

export class SyncFailedError extends AggregateOperationError {
  constructor(target: string, failures: readonly PathFailure[]) {
    super(`Sync to ${target}`, failures);
    this.name = 'SyncFailedError';
  }
}

// ─── Classification ─────────────────────────────────────────────────

const AUTH_ERROR_NAMES = new Set([
  'AccessDenied',
  'AccessDeniedException',
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'ExpiredToken',
  'InvalidToken',
  'CredentialsProviderError',
  'UnrecognizedClientException',
]);

const NOT_FOUND_ERROR_NAMES = new Set(['NoSuchKey', 'NotFound', 'NoSuchBucket']);

const TRANSIENT_ERROR_NAMES = new Set([
  'SlowDown',
  'Throttling',
  'ThrottlingException',
  'RequestTimeout',
  'RequestTimeoutException',
  'TimeoutError',
  'InternalError',
  'ServiceUnavailable',
]);

const TRANSIENT_ERRNO = new Set(['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EPIPE', 'EAI_AGAIN', 'ENOTFOUND']);

function readStringField(value: object, key: string): string | undefined {
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' ? field : undefined;
}

function readStatusCode(value: object): number | undefined {
  const metadata: unknown = Reflect.get(value, '$metadata');
  if (metadata !== null && typeof metadata === 'object') {
    const status: unknown = Reflect.get(metadata, 'httpStatusCode');
    if (typeof status === 'number') {
      return status;
    }
  }
  return undefined;
}

/**
 * Map an arbitrary thrown value onto the error taxonomy, attributing it to
 * `path`. Node errno codes and AWS SDK service errors are recognised;
 * anything else becomes a non-transient RemoteBackendError when `remote`
 * is set, or a plain ManifestlyError otherwise.
 */
export function toManifestlyError(err: unknown, path: string, remote = false): ManifestlyError {
  if (err instanceof ManifestlyError) {
    return err;
  }
  if (err === null || typeof err !== 'object') {
    return new ManifestlyError(remote ? 'REMOTE_BACKEND' : 'IO_ERROR', String(err), { path });
  }

  const errno = readStringField(err, 'code');
  const name = readStringField(err, 'name') ?? '';
  const message = readStringField(err, 'message') ?? String(err);
  const statusCode = readStatusCode(err);

  if (errno === 'ENOENT' || NOT_FOUND_ERROR_NAMES.has(name) || statusCode === 404) {
    return new PathNotFoundError(path, err);
  }
  if (errno === 'EACCES' || errno === 'EPERM') {
    return new PermissionDeniedError(path, err);
  }
  if (AUTH_ERROR_NAMES.has(name) || statusCode === 401 || statusCode === 403) {
    return new RemoteAuthError(`Remote authorization failed for ${path}: ${message}`, { path, cause: err, statusCode });
  }
  if (
    TRANSIENT_ERROR_NAMES.has(name) ||
    (errno !== undefined && TRANSIENT_ERRNO.has(errno)) ||
    (statusCode !== undefined && (statusCode === 429 || statusCode >= 500))
  ) {
    return new TransientRemoteError(`Remote request failed for ${path}: ${message}`, { path, cause: err, statusCode });
  }
  if (remote) {
    return new RemoteBackendError(`Remote request failed for ${path}: ${message}`, { path, cause: err, statusCode });
  }
  return new ManifestlyError('IO_ERROR', message, { path, cause: err });
}
