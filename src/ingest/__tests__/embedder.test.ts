/**
 * Embedding Client Tests
 *
 * Uses an in-process fake of the Ollama API and a recording delay, so
 * retry backoffs are asserted without waiting them out.
 */

import { describe, it, expect, vi } from 'vitest';

import { OllamaEmbeddingClient, type FetchFn } from '../embedder/index.js';
import { EmbeddingError, EmbeddingRequestError } from '../errors.js';
import { CancelledError, ConnectivityError } from '../../errors/index.js';
import { sleep, type DelayFn, type Logger } from '../../utils/index.js';
import { createFakeOllama } from '../../test-utils/index.js';

const BASE_URL = 'http://ollama.test:11434';

function recordingDelay(): { delay: DelayFn; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    delay: async (ms) => {
      delays.push(ms);
    },
  };
}

function mockLogger(): Logger & { warn: ReturnType<typeof vi.fn>; debug: ReturnType<typeof vi.fn> } {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

/** Never answers; rejects with the abort reason once the request signal fires */
const hangingFetch: FetchFn = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    const signal = init?.signal;
    if (!signal) return;
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200 });
}

describe('OllamaEmbeddingClient', () => {
  describe('configuration', () => {
    it('applies defaults', () => {
      const client = new OllamaEmbeddingClient({ model: 'nomic-embed-text' });

      expect(client.model).toBe('nomic-embed-text');
      expect(client.baseUrl).toBe('http://localhost:11434');
    });

    it('strips trailing slashes from the base URL', () => {
      const client = new OllamaEmbeddingClient({ model: 'm', baseUrl: `${BASE_URL}//` });

      expect(client.baseUrl).toBe(BASE_URL);
    });
  });

  describe('getEmbedding', () => {
    it('posts model and prompt and returns the vector', async () => {
      const ollama = createFakeOllama({ embed: () => [0.1, -0.2, 0.3] });
      const client = new OllamaEmbeddingClient({
        model: 'nomic-embed-text',
        baseUrl: BASE_URL,
        fetch: ollama.fetch,
      });

      const embedding = await client.getEmbedding('The quick brown fox');

      expect(embedding).toEqual([0.1, -0.2, 0.3]);
      expect(ollama.requests).toEqual([
        {
          url: `${BASE_URL}/api/embeddings`,
          method: 'POST',
          body: { model: 'nomic-embed-text', prompt: 'The quick brown fox' },
        },
      ]);
    });

    it('retries with exponential backoff and reports the last cause', async () => {
      const ollama = createFakeOllama({ embeddingStatus: 500 });
      const { delay, delays } = recordingDelay();
      const client = new OllamaEmbeddingClient({
        model: 'm',
        baseUrl: BASE_URL,
        fetch: ollama.fetch,
        delay,
      });

      const error = await client.getEmbedding('hello').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(EmbeddingError);
      expect(error).toMatchObject({
        attempts: 4,
        message:
          'Failed to get embedding after 4 attempts: API request failed with status 500: model runner crashed',
      });
      expect(error instanceof Error ? error.cause : undefined).toBeInstanceOf(EmbeddingRequestError);
      expect(error instanceof Error ? error.cause : undefined).toMatchObject({ status: 500 });
      expect(delays).toEqual([1000, 2000, 4000]);
      expect(ollama.prompts()).toEqual(['hello', 'hello', 'hello', 'hello']);
    });

    it('recovers when a retry succeeds', async () => {
      const ollama = createFakeOllama({
        embeddingStatus: (_prompt, call) => (call < 2 ? 503 : 200),
      });
      const { delay, delays } = recordingDelay();
      const logger = mockLogger();
      const client = new OllamaEmbeddingClient({
        model: 'm',
        baseUrl: BASE_URL,
        fetch: ollama.fetch,
        delay,
        logger,
      });

      const embedding = await client.getEmbedding('two words');

      expect(embedding).toEqual([9, 2, 0.5]);
      expect(delays).toEqual([1000, 2000]);
      expect(logger.warn).toHaveBeenCalledTimes(2);
      expect(logger.warn).toHaveBeenNthCalledWith(
        1,
        'Embedding request failed (attempt 1/4): API request failed with status 503: model runner crashed'
      );
      expect(logger.debug).toHaveBeenCalledWith(
        'Retrying embedding request (attempt 2/4, backoff 1000ms, 9 chars)'
      );
    });

    it('honours custom retry count and backoff', async () => {
      const ollama = createFakeOllama({ embeddingStatus: 500 });
      const { delay, delays } = recordingDelay();
      const client = new OllamaEmbeddingClient({
        model: 'm',
        baseUrl: BASE_URL,
        fetch: ollama.fetch,
        delay,
        maxRetries: 2,
        backoffMs: 10,
      });

      await expect(client.getEmbedding('x')).rejects.toThrow(
        /^Failed to get embedding after 3 attempts/
      );
      expect(delays).toEqual([10, 20]);
    });

    it('makes a single attempt when retries are disabled', async () => {
      const ollama = createFakeOllama({ embeddingStatus: 404 });
      const { delay, delays } = recordingDelay();
      const client = new OllamaEmbeddingClient({
        model: 'm',
        baseUrl: BASE_URL,
        fetch: ollama.fetch,
        delay,
        maxRetries: 0,
      });

      await expect(client.getEmbedding('x')).rejects.toThrow(
        'Failed to get embedding after 1 attempt: API request failed with status 404: model runner crashed'
      );
      expect(delays).toEqual([]);
    });

    it.each([
      ['an empty embedding', jsonResponse({ embedding: [] }), 'Received empty embedding'],
      ['a missing embedding', jsonResponse({ vector: [1] }), 'Malformed response: embedding: Required'],
      [
        'non-numeric values',
        jsonResponse({ embedding: ['a'] }),
        'Malformed response: embedding.0: Expected number, received string',
      ],
    ])('rejects %s', async (_label, response, message) => {
      const client = new OllamaEmbeddingClient({
        model: 'm',
        baseUrl: BASE_URL,
        fetch: async () => response,
        maxRetries: 0,
      });

      const error = await client.getEmbedding('x').catch((e: unknown) => e);

      expect(error instanceof Error ? error.cause : undefined).toMatchObject({ message });
    });

    it('rejects a body that is not JSON', async () => {
      const client = new OllamaEmbeddingClient({
        model: 'm',
        baseUrl: BASE_URL,
        fetch: async () => new Response('<html>', { status: 200 }),
        maxRetries: 0,
      });

      await expect(client.getEmbedding('x')).rejects.toThrow(/Failed to decode response: /);
    });

    it('wraps network failures', async () => {
      const ollama = createFakeOllama({ unreachable: true });
      const client = new OllamaEmbeddingClient({
        model: 'm',
        baseUrl: BASE_URL,
        fetch: ollama.fetch,
        maxRetries: 0,
      });

      await expect(client.getEmbedding('x')).rejects.toThrow(
        'Failed to get embedding after 1 attempt: Failed to make request: fetch failed'
      );
    });

    it('times out a request that never answers', async () => {
      const client = new OllamaEmbeddingClient({
        model: 'm',
        baseUrl: BASE_URL,
        fetch: hangingFetch,
        timeoutMs: 20,
        maxRetries: 0,
      });

      await expect(client.getEmbedding('x')).rejects.toThrow(
        'Failed to get embedding after 1 attempt: Request timed out after 20ms'
      );
    });

    it('truncates long error bodies', async () => {
      const client = new OllamaEmbeddingClient({
        model: 'm',
        baseUrl: BASE_URL,
        fetch: async () => new Response('x'.repeat(600), { status: 500 }),
        maxRetries: 0,
      });

      const error = await client.getEmbedding('x').catch((e: unknown) => e);

      expect(error instanceof Error ? error.cause : undefined).toMatchObject({
        message: `API request failed with status 500: ${'x'.repeat(500)}...`,
      });
    });
  });

  describe('cancellation', () => {
    it('fails fast when the signal is already aborted', async () => {
      const ollama = createFakeOllama();
      const client = new OllamaEmbeddingClient({ model: 'm', baseUrl: BASE_URL, fetch: ollama.fetch });

      await expect(client.getEmbedding('x', AbortSignal.abort())).rejects.toBeInstanceOf(
        CancelledError
      );
      expect(ollama.requests).toHaveLength(0);
    });

    it('stops during a backoff wait instead of retrying', async () => {
      const ollama = createFakeOllama({ embeddingStatus: 500 });
      const controller = new AbortController();
      const client = new OllamaEmbeddingClient({
        model: 'm',
        baseUrl: BASE_URL,
        fetch: ollama.fetch,
        delay: (ms, signal) => {
          controller.abort();
          return sleep(ms, signal);
        },
      });

      await expect(client.getEmbedding('x', controller.signal)).rejects.toBeInstanceOf(
        CancelledError
      );
      expect(ollama.requests).toHaveLength(1);
    });

    it('aborts an in-flight request without retrying', async () => {
      const controller = new AbortController();
      const fetchSpy = vi.fn(hangingFetch);
      const client = new OllamaEmbeddingClient({
        model: 'm',
        baseUrl: BASE_URL,
        fetch: fetchSpy,
      });

      const pending = client.getEmbedding('x', controller.signal);
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(CancelledError);
      expect(fetchSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe('healthCheck', () => {
    it('succeeds on a 2xx from /api/tags', async () => {
      const ollama = createFakeOllama();
      const client = new OllamaEmbeddingClient({ model: 'm', baseUrl: BASE_URL, fetch: ollama.fetch });

      await expect(client.healthCheck()).resolves.toBeUndefined();
      expect(ollama.requests).toEqual([
        { url: `${BASE_URL}/api/tags`, method: 'GET', body: undefined },
      ]);
    });

    it('reports a non-2xx status as a connectivity error', async () => {
      const ollama = createFakeOllama({ healthStatus: 503 });
      const client = new OllamaEmbeddingClient({ model: 'm', baseUrl: BASE_URL, fetch: ollama.fetch });

      const error = await client.healthCheck().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConnectivityError);
      expect(error).toMatchObject({
        status: 503,
        code: 6,
        message: `Embedding service is not reachable at ${BASE_URL}: health check failed with status 503`,
      });
    });

    it.each([200, 503])('discards the response body (status %i)', async (status) => {
      let cancelled = false;
      const client = new OllamaEmbeddingClient({
        model: 'm',
        baseUrl: BASE_URL,
        fetch: async () =>
          new Response(
            new ReadableStream<Uint8Array>({
              cancel() {
                cancelled = true;
              },
            }),
            { status }
          ),
      });

      await client.healthCheck().catch(() => undefined);

      expect(cancelled).toBe(true);
    });

    it('reports a network failure as a connectivity error without retrying', async () => {
      const ollama = createFakeOllama({ unreachable: true });
      const client = new OllamaEmbeddingClient({ model: 'm', baseUrl: BASE_URL, fetch: ollama.fetch });

      await expect(client.healthCheck()).rejects.toThrow(
        `Embedding service is not reachable at ${BASE_URL}: fetch failed`
      );
      expect(ollama.requests).toHaveLength(1);
    });

    it('reports a timeout', async () => {
      const client = new OllamaEmbeddingClient({
        model: 'm',
        baseUrl: BASE_URL,
        fetch: hangingFetch,
        timeoutMs: 20,
      });

      await expect(client.healthCheck()).rejects.toThrow(
        `Embedding service is not reachable at ${BASE_URL}: no response within 20ms`
      );
    });

    it('raises CancelledError when the signal aborts', async () => {
      const client = new OllamaEmbeddingClient({ model: 'm', baseUrl: BASE_URL, fetch: hangingFetch });
      const controller = new AbortController();

      const pending = client.healthCheck(controller.signal);
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(CancelledError);
    });
  });
});
