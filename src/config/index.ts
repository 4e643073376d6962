/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `textvec config` commands.
 */

// Schema and types
export { ConfigSchema, PartialConfigSchema, EmbeddingConfigSchema, HttpUrlSchema } from './schema.js';
export type { Config, PartialConfig } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  getConfigKeys,
  resetConfig,
} from './loader.js';

// Paths
export { getConfigDir, getConfigPath, CONFIG_FILENAME } from './paths.js';

// Environment variables
export { loadEnv, getEnv, getOllamaHost, EnvSchema, _clearEnvCache } from './env.js';
export type { EnvVars } from './env.js';

// Run settings
export { resolveIngestConfig, resolveBaseUrl, validateIngestConfig } from './validation.js';
export type { IngestOverrides, IngestConfigInput, IngestConfig } from './validation.js';
