/**
 * Embedder Module
 *
 * Fetches one vector per chunk from an Ollama-compatible service.
 *
 * Usage:
 * ```typescript
 * import { OllamaEmbeddingClient } from './embedder/index.js';
 *
 * const client = new OllamaEmbeddingClient({
 *   model: 'nomic-embed-text',
 *   baseUrl: 'http://localhost:11434',
 * });
 *
 * await client.healthCheck(signal);
 * const embedding = await client.getEmbedding(chunk.text, signal);
 * ```
 */

export {
  OllamaEmbeddingClient,
  DEFAULT_OLLAMA_HOST,
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_BACKOFF_MS,
} from './client.js';

export type {
  Embedding,
  EmbeddingClient,
  FetchFn,
  OllamaEmbeddingClientOptions,
} from './types.js';
