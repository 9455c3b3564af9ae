/**
 * @widecol/config - Configuration for widecol clients
 *
 * @example
 * ```typescript
 * import { createConfig, validateConfig, getConfigFromEnv } from '@widecol/config';
 *
 * const config = createConfig({ client: { projectId: 'my-project', admin: true } });
 * const envConfig = getConfigFromEnv();
 *
 * const result = validateConfig(config);
 * if (!result.valid) {
 *   console.error('Config errors:', result.errors);
 * }
 * ```
 *
 * @packageDocumentation
 * @module @widecol/config
 */

export type {
  DeepPartial,
  ClientConfig,
  ChunkValidationMode,
  ReadConfig,
  MutateConfig,
  OperationConfig,
  LogFormat,
  ObservabilityConfig,
  WidecolConfig,
  ValidationError,
  ValidationWarning,
  ValidationResult,
  EnvConfigOptions,
} from './types.js';

export { DEFAULT_CONFIG } from './defaults.js';

export { createConfig, mergeConfigs, getConfigFromEnv } from './config.js';

export { validateConfig } from './validation.js';
