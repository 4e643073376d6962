/**
 * Embedder Types
 *
 * The pipeline depends only on the EmbeddingClient interface, so tests and
 * alternative services can stand in for the Ollama client.
 */

import type { Logger, DelayFn } from '../../utils/index.js';

/**
 * An embedding vector. Length is fixed by the model and never empty.
 */
export type Embedding = number[];

/**
 * Minimal fetch signature the client needs. Defaults to the global fetch.
 */
export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Source of chunk embeddings.
 */
export interface EmbeddingClient {
  /** Model identifier sent with every request */
  readonly model: string;

  /** Service base URL, without a trailing slash */
  readonly baseUrl: string;

  /**
   * Embed one chunk of text, retrying with exponential backoff.
   *
   * @throws EmbeddingError after all attempts fail
   * @throws CancelledError if `signal` aborts during a request or a backoff wait
   */
  getEmbedding(text: string, signal?: AbortSignal): Promise<Embedding>;

  /**
   * Verify the service is reachable. Not retried.
   *
   * @throws ConnectivityError on network failure or a non-2xx status
   * @throws CancelledError if `signal` aborts
   */
  healthCheck(signal?: AbortSignal): Promise<void>;
}

/**
 * Options for creating an Ollama embedding client.
 *
 * Only the model is required - everything else has defaults.
 */
export interface OllamaEmbeddingClientOptions {
  /** Embedding model, e.g. 'nomic-embed-text' */
  model: string;

  /**
   * Service base URL.
   * @default 'http://localhost:11434'
   */
  baseUrl?: string;

  /**
   * Per-request timeout in milliseconds, separate from retry backoff.
   * @default 30000
   */
  timeoutMs?: number;

  /**
   * Extra attempts after the first failure.
   * @default 3
   */
  maxRetries?: number;

  /**
   * Wait before the first retry; doubles for each following retry.
   * @default 1000
   */
  backoffMs?: number;

  /** HTTP implementation (tests pass an in-process fake) */
  fetch?: FetchFn;

  /** Delay primitive used between retries */
  delay?: DelayFn;

  /** Receives per-attempt warnings and retry debug lines */
  logger?: Logger;
}
