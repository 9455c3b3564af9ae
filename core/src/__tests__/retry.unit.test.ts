/**
 * Retry with exponential backoff
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  calculateDelay,
  DEFAULT_RETRY_OPTIONS,
  isRetryableError,
  resolveRetryOptions,
  withRetry,
} from '../retry.js';
import {
  MalformedChunkSequenceError,
  NotFoundError,
  RetryError,
  StatusCode,
  TimeoutError,
  TransportError,
  ValidationError,
} from '../errors.js';

describe('withRetry', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('retries transient failures with doubling delays', async () => {
    let attempts = 0;
    const fn = vi.fn(async () => {
      attempts++;
      if (attempts < 3) {
        throw TransportError.unavailable();
      }
      return 'ok';
    });

    const promise = withRetry(fn, { jitter: false });

    await vi.advanceTimersByTimeAsync(0);
    expect(fn).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(100);
    expect(fn).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(200);
    expect(fn).toHaveBeenCalledTimes(3);

    await expect(promise).resolves.toBe('ok');
  });

  it('does not retry errors that will not go away', async () => {
    const failure = new NotFoundError('gone');
    const fn = vi.fn(async () => {
      throw failure;
    });

    await expect(withRetry(fn)).rejects.toBe(failure);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('raises RetryError once retries are exhausted', async () => {
    const fn = vi.fn(async () => {
      throw new TransportError('deadline', StatusCode.DEADLINE_EXCEEDED);
    });

    const promise = withRetry(fn, { maxRetries: 2, jitter: false });
    const settled = expect(promise).rejects.toBeInstanceOf(RetryError);
    await vi.advanceTimersByTimeAsync(1_000);
    await settled;

    expect(fn).toHaveBeenCalledTimes(3);
    await expect(promise).rejects.toMatchObject({ attempts: 3 });
  });

  it('reports each retry', async () => {
    const onRetry = vi.fn();
    let attempts = 0;
    const promise = withRetry(
      async () => {
        if (attempts++ === 0) throw TransportError.unavailable();
        return attempts;
      },
      { jitter: false, baseDelay: 10, onRetry }
    );

    await vi.advanceTimersByTimeAsync(10);
    await expect(promise).resolves.toBe(2);
    expect(onRetry).toHaveBeenCalledWith(expect.any(TransportError), 1, 10);
  });

  it('accepts a custom retry predicate', async () => {
    const fn = vi.fn(async () => {
      throw new ValidationError('nope');
    });
    const promise = withRetry(fn, { maxRetries: 1, jitter: false, retryIf: () => true });
    const settled = expect(promise).rejects.toBeInstanceOf(RetryError);
    await vi.advanceTimersByTimeAsync(100);
    await settled;
    expect(fn).toHaveBeenCalledTimes(2);
  });
});

describe('isRetryableError', () => {
  it('retries transient transport statuses and timeouts', () => {
    expect(isRetryableError(TransportError.unavailable())).toBe(true);
    expect(isRetryableError(new TransportError('x', StatusCode.ABORTED))).toBe(true);
    expect(isRetryableError(new TimeoutError('slow'))).toBe(true);
  });

  it('does not retry input, resource or data-integrity errors', () => {
    expect(isRetryableError(new ValidationError('x'))).toBe(false);
    expect(isRetryableError(new NotFoundError('x'))).toBe(false);
    expect(isRetryableError(MalformedChunkSequenceError.invalidChunk('x'))).toBe(false);
    expect(isRetryableError(new TransportError('x', StatusCode.INTERNAL))).toBe(false);
    expect(isRetryableError(new Error('plain'))).toBe(false);
  });
});

describe('calculateDelay', () => {
  const options = { ...DEFAULT_RETRY_OPTIONS, jitter: false };

  it('doubles up to the cap', () => {
    expect(calculateDelay(0, options)).toBe(100);
    expect(calculateDelay(3, options)).toBe(800);
    expect(calculateDelay(20, options)).toBe(10_000);
  });

  it('keeps jittered delays within [delay / 2, delay]', () => {
    for (let i = 0; i < 50; i++) {
      const delay = calculateDelay(2, { ...options, jitter: true });
      expect(delay).toBeGreaterThanOrEqual(200);
      expect(delay).toBeLessThanOrEqual(400);
    }
  });

  it('fills in defaults', () => {
    expect(resolveRetryOptions({ maxRetries: 7 })).toEqual({ ...DEFAULT_RETRY_OPTIONS, maxRetries: 7 });
  });
});
