/**
 * Environment Variable Handler
 *
 * Reads the variables textvec understands.
 * Supports .env files for local development via dotenv.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// Load .env file (for local development)
// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/**
 * Environment variable schema. Everything is optional; empty strings
 * count as unset.
 */
export const EnvSchema = z.object({
  /** Overrides embedding.base_url */
  OLLAMA_HOST: z.string().trim().min(1).optional().catch(undefined),
  /** Relocates the config directory */
  TEXTVEC_HOME: z.string().trim().min(1).optional().catch(undefined),
});

export type EnvVars = z.infer<typeof EnvSchema>;

// ============================================================================
// PRIVATE STATE
// ============================================================================

/**
 * Cached environment variables (loaded once at first access).
 * Access through getEnv(); tests reset with _clearEnvCache().
 */
let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  _envCache = EnvSchema.parse({
    OLLAMA_HOST: process.env.OLLAMA_HOST,
    TEXTVEC_HOME: process.env.TEXTVEC_HOME,
  });

  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Get the Ollama host URL, if one is set in the environment.
 */
export function getOllamaHost(): string | undefined {
  return getEnv('OLLAMA_HOST');
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to mock different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}
