/**
 * Retry policy for remote requests.
 *
 * Only errors classified as transient are retried. Delays grow
 * exponentially from `baseDelayMs` with up to one base delay of random
 * jitter, capped at `maxDelayMs`.
 */

import type { Logger } from 'pino';
import type { RetryConfig } from '../config/types.js';
import { OperationCancelledError, RemoteBackendError } from '../errors.js';

export interface RetryOptions extends RetryConfig {
  /** Name used in log lines */
  operation: string;
  logger?: Logger;
  signal?: AbortSignal;
  /** Override for tests */
  sleep?: (ms: number) => Promise<void>;
  /** Override for tests; defaults to Math.random */
  random?: () => number;
  /** Decides whether an error may be retried (default: transient RemoteBackendError) */
  isRetryable?: (error: unknown) => boolean;
}

export function isTransientError(error: unknown): boolean {
  return error instanceof RemoteBackendError && error.transient;
}

/**
 * Delay before retry number `attempt` (0-based).
 */
export function getBackoffDelay(
  attempt: number,
  config: Pick<RetryConfig, 'baseDelayMs' | 'maxDelayMs'>,
  random: () => number = Math.random,
): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt);
  const jitter = random() * config.baseDelayMs;
  return Math.min(exponentialDelay + jitter, config.maxDelayMs);
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `task`, retrying transient failures up to `maxRetries` times.
 * The last error is rethrown once retries are exhausted.
 */
export async function withRetry<T>(task: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const isRetryable = options.isRetryable ?? isTransientError;

  for (let attempt = 0; ; attempt++) {
    try {
      return await task(attempt);
    } catch (err) {
      if (attempt >= options.maxRetries || !isRetryable(err)) {
        throw err;
      }
      if (options.signal?.aborted) {
        throw new OperationCancelledError(options.operation);
      }

      const delay = getBackoffDelay(attempt, options, options.random);
      options.logger?.debug(
        { operation: options.operation, attempt: attempt + 1, delayMs: Math.round(delay), err },
        'Retrying after transient failure',
      );
      await sleep(delay);
    }
  }
}
