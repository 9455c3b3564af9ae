/**
 * Retry with exponential backoff for transient transport failures.
 *
 * Only failures the server may succeed on later are retried: UNAVAILABLE,
 * DEADLINE_EXCEEDED and ABORTED transport statuses, and operation timeouts.
 * Input errors, missing resources and malformed read streams fail at once.
 *
 * @example
 * ```typescript
 * import { withRetry } from '@widecol/core';
 *
 * const { instances } = await withRetry(() => client.listInstances(), {
 *   maxRetries: 5,
 *   retryIf: (error) => error instanceof TransportError && error.status === StatusCode.UNAVAILABLE,
 * });
 * ```
 *
 * @module retry
 */

import { RetryError, StatusCode, TimeoutError, TransportError } from './errors.js';

export interface RetryOptions {
  /**
   * Retry attempts after the initial failure; 0 disables retries.
   * @default 3
   */
  maxRetries?: number;

  /**
   * Delay before the first retry in milliseconds, doubled on each retry.
   * @default 100
   */
  baseDelay?: number;

  /**
   * Upper bound for a single delay in milliseconds.
   * @default 10000
   */
  maxDelay?: number;

  /**
   * Randomize each delay into [delay / 2, delay].
   * @default true
   */
  jitter?: boolean;

  /**
   * Replaces {@link isRetryableError} when given.
   */
  retryIf?: (error: Error) => boolean;

  /**
   * Called before sleeping ahead of each retry.
   */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
}

export type ResolvedRetryOptions = Required<Omit<RetryOptions, 'retryIf' | 'onRetry'>>;

const RETRYABLE_STATUSES = new Set<StatusCode>([
  StatusCode.UNAVAILABLE,
  StatusCode.DEADLINE_EXCEEDED,
  StatusCode.ABORTED,
]);

/**
 * True when `error` is a transient failure worth retrying.
 */
export function isRetryableError(error: Error): boolean {
  if (error instanceof TimeoutError) {
    return true;
  }
  if (error instanceof TransportError) {
    return RETRYABLE_STATUSES.has(error.status);
  }
  return false;
}

export const DEFAULT_RETRY_OPTIONS: ResolvedRetryOptions = {
  maxRetries: 3,
  baseDelay: 100,
  maxDelay: 10000,
  jitter: true,
};

/**
 * Delay before retry number `attempt` (0-indexed): `baseDelay * 2^attempt`
 * capped at `maxDelay`, optionally jittered.
 */
export function calculateDelay(attempt: number, options: ResolvedRetryOptions): number {
  const cappedDelay = Math.min(options.baseDelay * Math.pow(2, attempt), options.maxDelay);

  if (options.jitter) {
    return Math.floor(cappedDelay * (0.5 + Math.random() * 0.5));
  }
  return cappedDelay;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function resolveRetryOptions(options?: RetryOptions): ResolvedRetryOptions {
  return {
    maxRetries: options?.maxRetries ?? DEFAULT_RETRY_OPTIONS.maxRetries,
    baseDelay: options?.baseDelay ?? DEFAULT_RETRY_OPTIONS.baseDelay,
    maxDelay: options?.maxDelay ?? DEFAULT_RETRY_OPTIONS.maxDelay,
    jitter: options?.jitter ?? DEFAULT_RETRY_OPTIONS.jitter,
  };
}

/**
 * Run `fn`, retrying transient failures with exponential backoff.
 *
 * @throws RetryError when every attempt failed with a retryable error
 * @throws the original error when it is not retryable
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const opts = resolveRetryOptions(options);
  const shouldRetry = options?.retryIf ?? isRetryableError;
  let lastError: Error = new Error('withRetry made no attempt');
  let attempts = 0;

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    attempts++;

    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (!shouldRetry(lastError)) {
        throw lastError;
      }
      if (attempt >= opts.maxRetries) {
        break;
      }

      const delay = calculateDelay(attempt, opts);
      options?.onRetry?.(lastError, attempt + 1, delay);
      await sleep(delay);
    }
  }

  throw new RetryError(`All ${attempts} retry attempts failed: ${lastError.message}`, lastError, attempts);
}
