/**
 * Test Utilities Module
 *
 * Shared utilities for testing across the codebase.
 *
 * @example
 * ```typescript
 * import { createFakeOllama, MemoryRecordSink } from '../test-utils/index.js';
 *
 * const ollama = createFakeOllama();
 * const sink = new MemoryRecordSink();
 * ```
 */

export { resetAll } from './reset.js';
export { MemoryRecordSink, type MemoryRecordSinkOptions } from './memory-sink.js';
export {
  createFakeOllama,
  fakeEmbedding,
  type FakeOllama,
  type FakeOllamaOptions,
  type RecordedRequest,
} from './fake-ollama.js';
