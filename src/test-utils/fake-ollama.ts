/**
 * Fake Ollama Service
 *
 * An in-process `fetch` that answers /api/tags and /api/embeddings the
 * way Ollama does. Nothing touches the network.
 *
 * @example
 * ```typescript
 * const ollama = createFakeOllama({ embeddingStatus: 500 });
 * const client = new OllamaEmbeddingClient({
 *   model: 'nomic-embed-text',
 *   fetch: ollama.fetch,
 *   delay: async () => {},
 * });
 * ```
 */

import type { Embedding, FetchFn } from '../ingest/embedder/index.js';

export interface RecordedRequest {
  url: string;
  method: string;
  body: unknown;
}

export interface FakeOllamaOptions {
  /** Status for /api/tags */
  healthStatus?: number;

  /**
   * Status for /api/embeddings, or a function of the prompt and
   * 0-based call number
   */
  embeddingStatus?: number | ((prompt: string, call: number) => number);

  /** Vector returned for a prompt */
  embed?: (prompt: string) => Embedding;

  /** Reject every request as a network failure */
  unreachable?: boolean;
}

export interface FakeOllama {
  fetch: FetchFn;
  requests: RecordedRequest[];
  /** Prompts sent to /api/embeddings, in order */
  prompts: () => string[];
}

/**
 * Deterministic vector: [characters, words, 0.5]
 */
export function fakeEmbedding(prompt: string): Embedding {
  return [prompt.length, prompt.split(/\s+/u).filter(Boolean).length, 0.5];
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function promptOf(body: unknown): string {
  if (typeof body === 'object' && body !== null && 'prompt' in body) {
    return typeof body.prompt === 'string' ? body.prompt : '';
  }
  return '';
}

export function createFakeOllama(options: FakeOllamaOptions = {}): FakeOllama {
  const requests: RecordedRequest[] = [];
  const embed = options.embed ?? fakeEmbedding;
  let embeddingCalls = 0;

  const fakeFetch: FetchFn = async (input, init) => {
    const method = init?.method ?? 'GET';
    const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
    requests.push({ url: input, method, body });

    if (init?.signal?.aborted) {
      throw init.signal.reason;
    }
    if (options.unreachable) {
      throw new TypeError('fetch failed');
    }

    const path = new URL(input).pathname;

    if (path === '/api/tags' && method === 'GET') {
      const status = options.healthStatus ?? 200;
      return json({ models: [{ name: 'nomic-embed-text:latest' }] }, status);
    }

    if (path === '/api/embeddings' && method === 'POST') {
      const prompt = promptOf(body);
      const call = embeddingCalls++;
      const status =
        typeof options.embeddingStatus === 'function'
          ? options.embeddingStatus(prompt, call)
          : (options.embeddingStatus ?? 200);

      if (status < 200 || status >= 300) {
        return new Response('model runner crashed', { status });
      }
      return json({ embedding: embed(prompt) });
    }

    return new Response('404 page not found', { status: 404 });
  };

  return {
    fetch: fakeFetch,
    requests,
    prompts: () =>
      requests.filter((request) => request.url.endsWith('/api/embeddings')).map((r) => promptOf(r.body)),
  };
}
