/**
 * @widecol/config - Configuration Validation
 *
 * Validates configuration values and provides clear error messages.
 *
 * @packageDocumentation
 */

import { isLogLevel, isValidIdentifier } from '@widecol/core';

import type {
  WidecolConfig,
  ValidationResult,
  ValidationError,
  ValidationWarning,
} from './types.js';

/**
 * Validate a complete WidecolConfig.
 *
 * @example
 * ```typescript
 * const result = validateConfig(myConfig);
 * if (!result.valid) {
 *   console.error('Config errors:', result.errors);
 * }
 * if (result.warnings.length > 0) {
 *   console.warn('Config warnings:', result.warnings);
 * }
 * ```
 */
export function validateConfig(config: WidecolConfig): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  validateClientConfig(config.client, errors);
  validateReadConfig(config.read, errors, warnings);
  validateMutateConfig(config.mutate, errors, warnings);
  validateOperationConfig(config.operation, errors, warnings);
  validateObservabilityConfig(config.observability, errors, warnings);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

function isNonNegativeInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

function validateClientConfig(
  client: WidecolConfig['client'],
  errors: ValidationError[]
): void {
  if (client.projectId.trim() === '') {
    errors.push({
      path: 'client.projectId',
      message: 'Project id must not be empty',
      value: client.projectId,
    });
  }

  if (client.appProfileId !== undefined && !isValidIdentifier('appProfile', client.appProfileId)) {
    errors.push({
      path: 'client.appProfileId',
      message: 'App profile id is not a valid identifier',
      value: client.appProfileId,
      suggestion: 'Use letters, digits, "_", "-" and "." (at most 50 characters)',
    });
  }
}

function validateReadConfig(
  read: WidecolConfig['read'],
  errors: ValidationError[],
  warnings: ValidationWarning[]
): void {
  if (!isNonNegativeInteger(read.maxRetries)) {
    errors.push({
      path: 'read.maxRetries',
      message: 'Max retries must be a non-negative integer',
      value: read.maxRetries,
      suggestion: 'Use 0 to disable read retries',
    });
  }

  if (read.initialRetryDelayMs < 0) {
    errors.push({
      path: 'read.initialRetryDelayMs',
      message: 'Initial retry delay must be non-negative',
      value: read.initialRetryDelayMs,
    });
  }

  if (read.maxRetryDelayMs < read.initialRetryDelayMs) {
    errors.push({
      path: 'read.maxRetryDelayMs',
      message: 'Max retry delay must not be less than the initial retry delay',
      value: read.maxRetryDelayMs,
      suggestion: `Use a value of at least ${read.initialRetryDelayMs}`,
    });
  }

  if (read.chunkValidation !== 'strict' && read.chunkValidation !== 'lenient') {
    errors.push({
      path: 'read.chunkValidation',
      message: 'Chunk validation must be one of: strict, lenient',
      value: read.chunkValidation,
    });
  }

  if (read.chunkValidation === 'lenient') {
    warnings.push({
      path: 'read.chunkValidation',
      message: 'Lenient chunk validation accepts rows that arrive out of key order',
      value: read.chunkValidation,
      recommendation: 'Use "strict" unless the server is known to reorder rows',
    });
  }

  if (read.maxRetries > 10) {
    warnings.push({
      path: 'read.maxRetries',
      message: 'Many retries can hide a persistently failing server',
      value: read.maxRetries,
      recommendation: 'Consider values between 3 and 10',
    });
  }
}

function validateMutateConfig(
  mutate: WidecolConfig['mutate'],
  errors: ValidationError[],
  warnings: ValidationWarning[]
): void {
  if (!Number.isSafeInteger(mutate.maxMutationsPerRow) || mutate.maxMutationsPerRow <= 0) {
    errors.push({
      path: 'mutate.maxMutationsPerRow',
      message: 'Max mutations per row must be a positive integer',
      value: mutate.maxMutationsPerRow,
    });
  }

  if (mutate.maxMutationsPerRow > 100_000) {
    warnings.push({
      path: 'mutate.maxMutationsPerRow',
      message: 'Servers reject row commits with more than 100000 mutations',
      value: mutate.maxMutationsPerRow,
      recommendation: 'Keep the limit at 100000 or below',
    });
  }
}

function validateOperationConfig(
  operation: WidecolConfig['operation'],
  errors: ValidationError[],
  warnings: ValidationWarning[]
): void {
  if (operation.defaultTimeoutMs <= 0) {
    errors.push({
      path: 'operation.defaultTimeoutMs',
      message: 'Default timeout must be a positive number in milliseconds',
      value: operation.defaultTimeoutMs,
    });
  }

  if (operation.pollIntervalMs <= 0) {
    errors.push({
      path: 'operation.pollIntervalMs',
      message: 'Poll interval must be a positive number in milliseconds',
      value: operation.pollIntervalMs,
    });
  }

  if (operation.pollIntervalMs > operation.defaultTimeoutMs) {
    warnings.push({
      path: 'operation.pollIntervalMs',
      message: 'Poll interval is longer than the default timeout',
      value: operation.pollIntervalMs,
      recommendation: 'Poll at least once before the timeout expires',
    });
  }
}

function validateObservabilityConfig(
  observability: WidecolConfig['observability'],
  errors: ValidationError[],
  warnings: ValidationWarning[]
): void {
  if (!isLogLevel(observability.logLevel)) {
    errors.push({
      path: 'observability.logLevel',
      message: 'Log level must be one of: debug, info, warn, error',
      value: observability.logLevel,
    });
  }

  const validLogFormats = ['json', 'pretty'];
  if (!validLogFormats.includes(observability.logFormat)) {
    errors.push({
      path: 'observability.logFormat',
      message: `Log format must be one of: ${validLogFormats.join(', ')}`,
      value: observability.logFormat,
    });
  }

  if (observability.logToConsole && observability.logLevel === 'debug') {
    warnings.push({
      path: 'observability.logLevel',
      message: 'Debug logging to the console writes one line per read stream and request',
      value: observability.logLevel,
      recommendation: 'Use "info" or higher log level in production',
    });
  }
}
