/**
 * Client-side view of a long-running operation.
 */

import {
  createNoopLogger,
  sleep,
  statusToError,
  TimeoutError,
  type Logger,
} from '@widecol/core';

import type { LongRunningOperation, OperationState } from './transport.js';

export interface OperationOptions {
  defaultTimeoutMs: number;
  pollIntervalMs: number;
  logger?: Logger;
}

export interface OperationResultOptions {
  /** Overrides the configured default timeout */
  timeoutMs?: number;
}

/**
 * Adapt the result type of a server-side operation handle.
 */
export function mapOperation<T, U>(
  operation: LongRunningOperation<T>,
  map: (result: T) => U
): LongRunningOperation<U> {
  return {
    name: operation.name,
    async poll(): Promise<OperationState<U>> {
      const state = await operation.poll();
      if (!state.done) return state;
      if ('error' in state) return state;
      return { done: true, result: map(state.result) };
    },
  };
}

/**
 * A long-running admin operation (instance creation, instance or app
 * profile update).
 *
 * @example
 * ```typescript
 * const operation = await instance.create({ locationId: 'us-central1-c' });
 * const created = await operation.result({ timeoutMs: 30_000 });
 * ```
 */
export class Operation<T> {
  private readonly logger: Logger;
  private finished: OperationState<T> | undefined;

  constructor(
    private readonly handle: LongRunningOperation<T>,
    private readonly options: OperationOptions
  ) {
    this.logger = options.logger ?? createNoopLogger();
  }

  get name(): string {
    return this.handle.name;
  }

  /**
   * Poll once; true when the operation has finished, successfully or not.
   */
  async done(): Promise<boolean> {
    return (await this.poll()).done;
  }

  /**
   * Wait for the operation to finish.
   *
   * @throws TimeoutError when it is still running after the timeout
   * @throws TransportError (or a subclass) when the operation failed
   */
  async result(options: OperationResultOptions = {}): Promise<T> {
    const timeoutMs = options.timeoutMs ?? this.options.defaultTimeoutMs;
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      const state = await this.poll();
      if (state.done) {
        if ('error' in state) {
          throw statusToError(state.error, { operation: this.name });
        }
        return state.result;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        this.logger.warn('Operation timed out', { operation: this.name, timeoutMs });
        throw TimeoutError.operationTimeout(this.name, timeoutMs);
      }
      await sleep(Math.min(this.options.pollIntervalMs, remaining));
    }
  }

  private async poll(): Promise<OperationState<T>> {
    if (this.finished) {
      return this.finished;
    }
    const state = await this.handle.poll();
    if (state.done) {
      this.finished = state;
    }
    return state;
  }
}
