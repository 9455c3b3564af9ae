import { TimeoutError } from '@widecol/core';

/**
 * Settle with `promise`, or reject with TimeoutError once `timeoutMs` passes.
 * Without a timeout, `promise` is returned as is.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number | undefined,
  operation: string
): Promise<T> {
  if (timeoutMs === undefined) {
    return promise;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(TimeoutError.operationTimeout(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
