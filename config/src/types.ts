/**
 * @widecol/config - Type Definitions
 *
 * Configuration schema shared by the widecol client and its tooling.
 *
 * Naming Conventions:
 * - All durations: *TimeoutMs, *DelayMs or *IntervalMs (milliseconds)
 * - All counts: max*
 *
 * @packageDocumentation
 * @module @widecol/config
 */

import type { LogLevel } from '@widecol/core';

// =============================================================================
// Utility Types
// =============================================================================

/**
 * Deep partial type that makes all nested properties optional.
 */
export type DeepPartial<T> = T extends object
  ? { [P in keyof T]?: DeepPartial<T[P]> }
  : T;

// =============================================================================
// Client Configuration
// =============================================================================

/**
 * Identity of the client and the project it works in.
 *
 * @example
 * ```typescript
 * const clientConfig: ClientConfig = {
 *   projectId: 'my-project',
 *   admin: true,
 *   appProfileId: 'batch-reads',
 * };
 * ```
 */
export interface ClientConfig {
  /** Project every fully qualified name is built under */
  projectId: string;

  /** Allow instance and table administration */
  admin: boolean;

  /** App profile sent with every data request */
  appProfileId?: string;
}

// =============================================================================
// Read Configuration
// =============================================================================

/**
 * How strictly read streams check the chunk sequence.
 *
 * `lenient` skips the check that row keys arrive in increasing order.
 */
export type ChunkValidationMode = 'strict' | 'lenient';

/**
 * Read stream retry and validation settings.
 */
export interface ReadConfig {
  /** Retries of a broken read stream before giving up */
  maxRetries: number;

  /** Delay before the first retry */
  initialRetryDelayMs: number;

  /** Upper bound on the delay between retries */
  maxRetryDelayMs: number;

  /** Randomize retry delays */
  retryJitter: boolean;

  /** Chunk sequence checking */
  chunkValidation: ChunkValidationMode;
}

// =============================================================================
// Mutate Configuration
// =============================================================================

export interface MutateConfig {
  /** Mutations one row commit may carry */
  maxMutationsPerRow: number;
}

// =============================================================================
// Operation Configuration
// =============================================================================

/**
 * Long-running operation settings.
 */
export interface OperationConfig {
  /** How long `Operation.result()` waits when no timeout is passed */
  defaultTimeoutMs: number;

  /** Delay between polls of an unfinished operation */
  pollIntervalMs: number;
}

// =============================================================================
// Observability Configuration
// =============================================================================

/**
 * Log format options.
 */
export type LogFormat = 'json' | 'pretty';

/**
 * Logging configuration.
 *
 * @example
 * ```typescript
 * const observabilityConfig: ObservabilityConfig = {
 *   logLevel: 'debug',
 *   logFormat: 'pretty',
 *   logToConsole: true,
 * };
 * ```
 */
export interface ObservabilityConfig {
  /** Minimum log level */
  logLevel: LogLevel;

  /** Log output format */
  logFormat: LogFormat;

  /** Log to the console when no logger is supplied */
  logToConsole: boolean;
}

// =============================================================================
// Unified Configuration
// =============================================================================

/**
 * Unified widecol configuration.
 */
export interface WidecolConfig {
  client: ClientConfig;
  read: ReadConfig;
  mutate: MutateConfig;
  operation: OperationConfig;
  observability: ObservabilityConfig;
}

// =============================================================================
// Validation Types
// =============================================================================

/**
 * Validation error details.
 */
export interface ValidationError {
  /** Path to the invalid field (e.g., 'read.maxRetries') */
  path: string;

  /** Human-readable error message */
  message: string;

  /** The invalid value */
  value: unknown;

  /** Suggested fix (optional) */
  suggestion?: string;
}

/**
 * Validation warning details.
 */
export interface ValidationWarning {
  /** Path to the field with potential issue */
  path: string;

  /** Human-readable warning message */
  message: string;

  /** The concerning value */
  value: unknown;

  /** Recommended action */
  recommendation?: string;
}

/**
 * Configuration validation result.
 */
export interface ValidationResult {
  /** Whether the configuration is valid */
  valid: boolean;

  /** List of validation errors */
  errors: ValidationError[];

  /** List of validation warnings */
  warnings: ValidationWarning[];
}

// =============================================================================
// Environment Configuration Types
// =============================================================================

/**
 * Options for loading configuration from environment variables.
 */
export interface EnvConfigOptions {
  /** Environment variable prefix (default: 'WIDECOL') */
  prefix?: string;

  /** Custom environment object (default: process.env) */
  env?: Record<string, string | undefined>;
}
