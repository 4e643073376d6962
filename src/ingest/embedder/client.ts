/**
 * Ollama Embedding Client
 *
 * Talks to an Ollama-compatible embedding service over HTTP:
 * - POST {baseUrl}/api/embeddings  { model, prompt } -> { embedding: number[] }
 * - GET  {baseUrl}/api/tags        health check, any 2xx is healthy
 *
 * One request per chunk. A failed request is retried up to `maxRetries`
 * times, waiting backoffMs * 2^(retry - 1) before each retry. The caller's
 * AbortSignal cancels both in-flight requests and backoff waits.
 */

import { z } from 'zod';

import { CancelledError, ConnectivityError } from '../../errors/index.js';
import { silentLogger, sleep, type DelayFn, type Logger } from '../../utils/index.js';
import { EmbeddingError, EmbeddingRequestError } from '../errors.js';
import type {
  Embedding,
  EmbeddingClient,
  FetchFn,
  OllamaEmbeddingClientOptions,
} from './types.js';

// ============================================================================
// CONSTANTS
// ============================================================================

/** Local Ollama server */
export const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';

/** nomic-embed-text: 768 dimensions, small enough for CPU inference */
export const DEFAULT_EMBEDDING_MODEL = 'nomic-embed-text';

/** Per-request timeout - 30 seconds */
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

/** Retries after the first failed attempt */
export const DEFAULT_MAX_RETRIES = 3;

/** Base backoff before the first retry - 1 second */
export const DEFAULT_BACKOFF_MS = 1000;

/** Longest response body quoted in an error message */
const MAX_ERROR_BODY_LENGTH = 500;

/**
 * Shape of a successful /api/embeddings response.
 */
const EmbeddingResponseSchema = z.object({
  embedding: z.array(z.number()),
});

// ============================================================================
// REQUEST SIGNAL
// ============================================================================

interface RequestSignal {
  signal: AbortSignal;
  /** True once the per-request timeout fired */
  timedOut: () => boolean;
  /** Clear the timer and detach from the parent signal */
  dispose: () => void;
}

/**
 * Derive a signal that aborts when the parent aborts or the timeout elapses.
 */
function createRequestSignal(parent: AbortSignal | undefined, timeoutMs: number): RequestSignal {
  const controller = new AbortController();
  let expired = false;

  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new Error(`Request timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// CLIENT
// ============================================================================

/**
 * Embedding client for Ollama's /api/embeddings endpoint.
 *
 * @example
 * ```typescript
 * const client = new OllamaEmbeddingClient({ model: 'nomic-embed-text' });
 *
 * await client.healthCheck();
 * const vector = await client.getEmbedding('The quick brown fox');
 * console.log(vector.length); // 768
 * ```
 */
export class OllamaEmbeddingClient implements EmbeddingClient {
  readonly model: string;
  readonly baseUrl: string;

  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly backoffMs: number;
  private readonly fetchImpl: FetchFn;
  private readonly delay: DelayFn;
  private readonly logger: Logger;

  constructor(options: OllamaEmbeddingClientOptions) {
    this.model = options.model;
    this.baseUrl = (options.baseUrl ?? DEFAULT_OLLAMA_HOST).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.backoffMs = options.backoffMs ?? DEFAULT_BACKOFF_MS;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.delay = options.delay ?? sleep;
    this.logger = options.logger ?? silentLogger;
  }

  async getEmbedding(text: string, signal?: AbortSignal): Promise<Embedding> {
    const attempts = this.maxRetries + 1;
    let lastError: Error = new EmbeddingRequestError('No embedding attempt was made');

    for (let attempt = 0; attempt < attempts; attempt++) {
      if (attempt > 0) {
        const backoff = this.backoffMs * 2 ** (attempt - 1);
        this.logger.debug?.(
          `Retrying embedding request (attempt ${attempt + 1}/${attempts}, backoff ${backoff}ms, ${text.length} chars)`
        );
        await this.delay(backoff, signal);
      }

      if (signal?.aborted) {
        throw new CancelledError();
      }

      try {
        return await this.requestEmbedding(text, signal);
      } catch (error) {
        if (error instanceof CancelledError) {
          throw error;
        }
        lastError = error instanceof Error ? error : new Error(String(error));
        this.logger.warn(
          `Embedding request failed (attempt ${attempt + 1}/${attempts}): ${lastError.message}`
        );
      }
    }

    throw new EmbeddingError(attempts, lastError);
  }

  async healthCheck(signal?: AbortSignal): Promise<void> {
    const request = createRequestSignal(signal, this.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/api/tags`, {
        method: 'GET',
        signal: request.signal,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      const detail = request.timedOut()
        ? `no response within ${this.timeoutMs}ms`
        : errorMessage(error);
      throw new ConnectivityError(this.baseUrl, detail, {
        cause: error instanceof Error ? error : undefined,
      });
    } finally {
      request.dispose();
    }

    // Only the status matters; release the body so the connection is reused
    try {
      await response.body?.cancel();
    } catch (error) {
      this.logger.debug?.(`Could not discard health check body: ${errorMessage(error)}`);
    }

    if (!response.ok) {
      throw new ConnectivityError(
        this.baseUrl,
        `health check failed with status ${response.status}`,
        { status: response.status }
      );
    }
  }

  /**
   * One attempt: POST the prompt and validate the returned vector.
   */
  private async requestEmbedding(text: string, signal?: AbortSignal): Promise<Embedding> {
    const request = createRequestSignal(signal, this.timeoutMs);

    try {
      const response = await this.fetchImpl(`${this.baseUrl}/api/embeddings`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: this.model, prompt: text }),
        signal: request.signal,
      });

      if (!response.ok) {
        const body = await this.readErrorBody(response);
        throw new EmbeddingRequestError(
          `API request failed with status ${response.status}` + (body ? `: ${body}` : ''),
          { status: response.status }
        );
      }

      let payload: unknown;
      try {
        payload = await response.json();
      } catch (error) {
        throw new EmbeddingRequestError(`Failed to decode response: ${errorMessage(error)}`, {
          cause: error,
        });
      }

      const parsed = EmbeddingResponseSchema.safeParse(payload);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
        throw new EmbeddingRequestError(
          `Malformed response: ${where}${issue?.message ?? 'unexpected shape'}`
        );
      }

      if (parsed.data.embedding.length === 0) {
        throw new EmbeddingRequestError('Received empty embedding');
      }

      return parsed.data.embedding;
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      if (error instanceof EmbeddingRequestError) {
        throw error;
      }
      if (request.timedOut()) {
        throw new EmbeddingRequestError(`Request timed out after ${this.timeoutMs}ms`, {
          cause: error,
        });
      }
      throw new EmbeddingRequestError(`Failed to make request: ${errorMessage(error)}`, {
        cause: error,
      });
    } finally {
      request.dispose();
    }
  }

  /**
   * Best-effort read of a failed response's body for the error message.
   */
  private async readErrorBody(response: Response): Promise<string> {
    try {
      const body = (await response.text()).trim();
      return body.length > MAX_ERROR_BODY_LENGTH
        ? `${body.slice(0, MAX_ERROR_BODY_LENGTH)}...`
        : body;
    } catch (error) {
      this.logger.debug?.(`Could not read error response body: ${errorMessage(error)}`);
      return '';
    }
  }
}
