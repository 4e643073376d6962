/**
 * Default Configuration Values
 *
 * These are used when:
 * 1. No config.toml exists (first run)
 * 2. User's config.toml is missing certain fields
 *
 * The loader merges user config ON TOP of these defaults.
 */

import { DEFAULT_CHUNK_SIZE } from '../ingest/chunker/index.js';
import {
  DEFAULT_BACKOFF_MS,
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_MAX_RETRIES,
  DEFAULT_OLLAMA_HOST,
  DEFAULT_REQUEST_TIMEOUT_MS,
} from '../ingest/embedder/index.js';
import type { Config } from './schema.js';

/**
 * Default configuration
 * Targets a local Ollama with nomic-embed-text
 */
export const DEFAULT_CONFIG: Config = {
  model: DEFAULT_EMBEDDING_MODEL,
  output: 'storage/vectors.jsonl',
  chunk_size: DEFAULT_CHUNK_SIZE, // words per chunk

  embedding: {
    base_url: DEFAULT_OLLAMA_HOST,
    timeout_ms: DEFAULT_REQUEST_TIMEOUT_MS, // per request, separate from retry backoff
    max_retries: DEFAULT_MAX_RETRIES,
    backoff_ms: DEFAULT_BACKOFF_MS, // 1s, 2s, 4s
  },
};

/**
 * Config file template (TOML format)
 * Written to the config directory on first run
 */
export const CONFIG_TEMPLATE = `# textvec configuration
# Location: $TEXTVEC_HOME/config.toml (default ~/.textvec/config.toml)
# Command-line flags override these values.

# Embedding model served by Ollama
model = "${DEFAULT_CONFIG.model}"

# JSONL file records are appended to (relative paths resolve against the working directory)
output = "${DEFAULT_CONFIG.output}"

# Target words per chunk
chunk_size = ${DEFAULT_CONFIG.chunk_size}

# Embedding service
# OLLAMA_HOST overrides base_url
[embedding]
base_url = "${DEFAULT_CONFIG.embedding.base_url}"
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}
max_retries = ${DEFAULT_CONFIG.embedding.max_retries}
backoff_ms = ${DEFAULT_CONFIG.embedding.backoff_ms}
`;
