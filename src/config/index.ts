/**
 * Config Module
 *
 * Exports for programmatic config access.
 */

// Schema and types
export { ObservabilityOptionsSchema, ResolvedOptionsSchema } from './schema.js';
export type { ObservabilityOptions, ResolvedOptions } from './schema.js';

// Defaults
export {
  DEFAULT_OPTIONS,
  DEFAULT_SERVICE_NAME,
  DEFAULT_ENDPOINT,
  BATCH_EXPORT,
  API_KEY_HEADER,
  DATASET_HEADER,
} from './defaults.js';

// Resolution
export { resolveOptions, mergeOptions, validateOptions, optionsFingerprint } from './loader.js';
export type { MergedOptions } from './loader.js';

// Environment variables
export {
  loadEnv,
  getApiKeyFromEnv,
  parseApiKeyHeader,
  SETUP_INSTRUCTIONS,
  EnvSchema,
  _clearEnvCache,
} from './env.js';
export type { EnvVars } from './env.js';
