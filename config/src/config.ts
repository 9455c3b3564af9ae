/**
 * @widecol/config - Configuration Factory Functions
 *
 * Provides functions to create, merge, and load configurations.
 *
 * @packageDocumentation
 */

import { isLogLevel, ValidationError, type LogLevel } from '@widecol/core';

import type {
  ChunkValidationMode,
  DeepPartial,
  EnvConfigOptions,
  LogFormat,
  WidecolConfig,
} from './types.js';
import { DEFAULT_CONFIG } from './defaults.js';

type ConfigOverrides = DeepPartial<WidecolConfig>;

/**
 * Copy of `value` without its undefined fields.
 */
function definedFields<T extends object>(value: Partial<T> | null | undefined): Partial<T> {
  const result: Partial<T> = {};
  if (!value) {
    return result;
  }
  for (const key in value) {
    const field = value[key];
    if (field !== undefined) {
      result[key] = field;
    }
  }
  return result;
}

/**
 * Shallow merge of one section, with defined `source` values taking precedence.
 */
function mergeSection<T extends object>(target: T, source: Partial<T> | null | undefined): T {
  return { ...target, ...definedFields(source) };
}

function mergePartialSection<T extends object>(
  target: Partial<T> | undefined,
  source: Partial<T> | undefined
): Partial<T> | undefined {
  if (target === undefined && source === undefined) {
    return undefined;
  }
  return { ...definedFields(target), ...definedFields(source) };
}

function freezeConfig(config: WidecolConfig): WidecolConfig {
  Object.freeze(config.client);
  Object.freeze(config.read);
  Object.freeze(config.mutate);
  Object.freeze(config.operation);
  Object.freeze(config.observability);
  return Object.freeze(config);
}

/**
 * Create a complete WidecolConfig with optional overrides.
 *
 * @param overrides - Partial configuration to merge with defaults
 * @param base - Optional base configuration (defaults to DEFAULT_CONFIG)
 * @returns Frozen WidecolConfig with all values filled in
 *
 * @example
 * ```typescript
 * // Use all defaults
 * const config1 = createConfig();
 *
 * // Override specific values
 * const config2 = createConfig({
 *   client: { projectId: 'my-project', admin: true },
 *   read: { maxRetries: 5 },
 * });
 *
 * // Build on another config
 * const config3 = createConfig({ read: { retryJitter: false } }, config2);
 * ```
 */
export function createConfig(
  overrides?: ConfigOverrides | null,
  base: WidecolConfig = DEFAULT_CONFIG
): WidecolConfig {
  return freezeConfig({
    client: mergeSection(base.client, overrides?.client),
    read: mergeSection(base.read, overrides?.read),
    mutate: mergeSection(base.mutate, overrides?.mutate),
    operation: mergeSection(base.operation, overrides?.operation),
    observability: mergeSection(base.observability, overrides?.observability),
  });
}

/**
 * Merge multiple partial configurations.
 *
 * Later configurations take precedence over earlier ones.
 *
 * @example
 * ```typescript
 * const merged = mergeConfigs(
 *   { read: { maxRetries: 4 } },
 *   { read: { maxRetries: 8, retryJitter: false } }
 * );
 * // merged.read.maxRetries === 8
 * ```
 */
export function mergeConfigs(
  ...configs: Array<ConfigOverrides | null | undefined>
): ConfigOverrides {
  let result: ConfigOverrides = {};

  for (const config of configs) {
    if (!config) {
      continue;
    }
    const merged: ConfigOverrides = {
      client: mergePartialSection(result.client, config.client),
      read: mergePartialSection(result.read, config.read),
      mutate: mergePartialSection(result.mutate, config.mutate),
      operation: mergePartialSection(result.operation, config.operation),
      observability: mergePartialSection(result.observability, config.observability),
    };
    result = definedFields(merged);
  }

  return result;
}

// =============================================================================
// Environment
// =============================================================================

/**
 * Get environment variable with prefix.
 */
function getEnvVar(
  env: Record<string, string | undefined>,
  prefix: string,
  ...parts: string[]
): { key: string; value: string | undefined } {
  const key = [prefix, ...parts].join('_').toUpperCase();
  return { key, value: env[key] };
}

function invalidEnvValue(key: string, value: string, expected: string): ValidationError {
  return new ValidationError(
    `Environment variable ${key} has invalid value '${value}'`,
    undefined,
    { key, value },
    `Expected ${expected}`
  );
}

function parseNumber({ key, value }: { key: string; value: string | undefined }): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const num = Number(value);
  if (value.trim() === '' || Number.isNaN(num)) {
    throw invalidEnvValue(key, value, 'a number');
  }
  return num;
}

function parseBoolean({ key, value }: { key: string; value: string | undefined }): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  switch (value.toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw invalidEnvValue(key, value, 'true, false, 1 or 0');
  }
}

function parseChoice<T extends string>(
  { key, value }: { key: string; value: string | undefined },
  isChoice: (value: string) => value is T,
  choices: readonly T[]
): T | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isChoice(value)) {
    throw invalidEnvValue(key, value, `one of: ${choices.join(', ')}`);
  }
  return value;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const LOG_FORMATS: readonly LogFormat[] = ['json', 'pretty'];
const CHUNK_VALIDATION_MODES: readonly ChunkValidationMode[] = ['strict', 'lenient'];

function isLogFormat(value: string): value is LogFormat {
  return value === 'json' || value === 'pretty';
}

function isChunkValidationMode(value: string): value is ChunkValidationMode {
  return value === 'strict' || value === 'lenient';
}

/**
 * Create configuration from environment variables.
 *
 * Environment variables follow the pattern: WIDECOL_<SECTION>_<FIELD>
 * For example:
 * - WIDECOL_CLIENT_PROJECT_ID=my-project
 * - WIDECOL_READ_MAX_RETRIES=5
 * - WIDECOL_OBSERVABILITY_LOG_LEVEL=debug
 *
 * @throws ValidationError when a variable is set to a value its field cannot take
 *
 * @example
 * ```typescript
 * const config = getConfigFromEnv();
 * const custom = getConfigFromEnv({ prefix: 'MYAPP', env: { MYAPP_CLIENT_ADMIN: 'true' } });
 * ```
 */
export function getConfigFromEnv(options: EnvConfigOptions = {}): WidecolConfig {
  const prefix = options.prefix ?? 'WIDECOL';
  const env = options.env ?? (typeof process !== 'undefined' ? process.env : {});
  const read = (...parts: string[]) => getEnvVar(env, prefix, ...parts);

  const overrides: ConfigOverrides = {
    client: {
      projectId: read('CLIENT', 'PROJECT', 'ID').value,
      admin: parseBoolean(read('CLIENT', 'ADMIN')),
      appProfileId: read('CLIENT', 'APP', 'PROFILE', 'ID').value,
    },
    read: {
      maxRetries: parseNumber(read('READ', 'MAX', 'RETRIES')),
      initialRetryDelayMs: parseNumber(read('READ', 'INITIAL', 'RETRY', 'DELAY', 'MS')),
      maxRetryDelayMs: parseNumber(read('READ', 'MAX', 'RETRY', 'DELAY', 'MS')),
      retryJitter: parseBoolean(read('READ', 'RETRY', 'JITTER')),
      chunkValidation: parseChoice(
        read('READ', 'CHUNK', 'VALIDATION'),
        isChunkValidationMode,
        CHUNK_VALIDATION_MODES
      ),
    },
    mutate: {
      maxMutationsPerRow: parseNumber(read('MUTATE', 'MAX', 'MUTATIONS', 'PER', 'ROW')),
    },
    operation: {
      defaultTimeoutMs: parseNumber(read('OPERATION', 'DEFAULT', 'TIMEOUT', 'MS')),
      pollIntervalMs: parseNumber(read('OPERATION', 'POLL', 'INTERVAL', 'MS')),
    },
    observability: {
      logLevel: parseChoice(read('OBSERVABILITY', 'LOG', 'LEVEL'), isLogLevel, LOG_LEVELS),
      logFormat: parseChoice(read('OBSERVABILITY', 'LOG', 'FORMAT'), isLogFormat, LOG_FORMATS),
      logToConsole: parseBoolean(read('OBSERVABILITY', 'LOG', 'TO', 'CONSOLE')),
    },
  };

  return createConfig(overrides);
}
