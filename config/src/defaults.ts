/**
 * @widecol/config - Default Configuration Values
 *
 * @packageDocumentation
 */

import { DEFAULT_RETRY_OPTIONS } from '@widecol/core';

import type {
  ClientConfig,
  MutateConfig,
  ObservabilityConfig,
  OperationConfig,
  ReadConfig,
  WidecolConfig,
} from './types.js';

const DEFAULT_CLIENT_CONFIG: ClientConfig = {
  projectId: 'widecol-project',
  admin: false,
};

/**
 * Read retries share the backoff policy of `withRetry`.
 */
const DEFAULT_READ_CONFIG: ReadConfig = {
  maxRetries: DEFAULT_RETRY_OPTIONS.maxRetries,
  initialRetryDelayMs: DEFAULT_RETRY_OPTIONS.baseDelay,
  maxRetryDelayMs: DEFAULT_RETRY_OPTIONS.maxDelay,
  retryJitter: DEFAULT_RETRY_OPTIONS.jitter,
  chunkValidation: 'strict',
};

const DEFAULT_MUTATE_CONFIG: MutateConfig = {
  maxMutationsPerRow: 100_000,
};

const DEFAULT_OPERATION_CONFIG: OperationConfig = {
  defaultTimeoutMs: 60_000,
  pollIntervalMs: 100,
};

const DEFAULT_OBSERVABILITY_CONFIG: ObservabilityConfig = {
  logLevel: 'info',
  logFormat: 'json',
  logToConsole: false,
};

/**
 * Default configuration.
 *
 * @example
 * ```typescript
 * import { DEFAULT_CONFIG, createConfig } from '@widecol/config';
 *
 * console.log(DEFAULT_CONFIG.mutate.maxMutationsPerRow); // 100000
 *
 * const config = createConfig({ client: { projectId: 'my-project', admin: true } });
 * ```
 */
export const DEFAULT_CONFIG: WidecolConfig = {
  client: DEFAULT_CLIENT_CONFIG,
  read: DEFAULT_READ_CONFIG,
  mutate: DEFAULT_MUTATE_CONFIG,
  operation: DEFAULT_OPERATION_CONFIG,
  observability: DEFAULT_OBSERVABILITY_CONFIG,
};
