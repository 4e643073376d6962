/**
 * textvec - Library Entry Point
 *
 * The CLI is the usual way in:
 * ```bash
 * textvec check                       # Is the embedding service up?
 * textvec ingest ./notes              # Embed every .txt file under ./notes
 * textvec ingest ./notes -c 200 -o out/vectors.jsonl
 * ```
 *
 * The same pipeline is exported for programs that want to drive it
 * themselves, swap the embedding service, or write records somewhere
 * other than a JSONL file.
 *
 * @example Run an ingestion
 * ```typescript
 * import { OllamaEmbeddingClient, runIngestPipeline } from 'textvec';
 *
 * const client = new OllamaEmbeddingClient({ model: 'nomic-embed-text' });
 * const result = await runIngestPipeline({
 *   inputDir: './notes',
 *   outputPath: './storage/vectors.jsonl',
 *   chunkSize: 300,
 *   client,
 * });
 * ```
 *
 * @example Read records back
 * ```typescript
 * import { readFileSync } from 'node:fs';
 * import { parseRecord } from 'textvec';
 *
 * const records = readFileSync('./storage/vectors.jsonl', 'utf-8')
 *   .split('\n')
 *   .filter(Boolean)
 *   .map(parseRecord);
 * ```
 *
 * @packageDocumentation
 */

// Pipeline, chunker, embedding client, record writer
export * from './ingest/index.js';

// Configuration
export {
  loadConfig,
  resolveIngestConfig,
  validateIngestConfig,
  resolveBaseUrl,
  getConfigPath,
  DEFAULT_CONFIG,
  ConfigSchema,
} from './config/index.js';
export type { Config, IngestConfig, IngestOverrides } from './config/index.js';

// Errors
export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  ValidationError,
  OutputError,
  ConnectivityError,
  CancelledError,
  formatError,
  getExitCode,
} from './errors/index.js';

// Logging and delay hooks
export { consoleLogger, silentLogger, sleep } from './utils/index.js';
export type { Logger, DelayFn } from './utils/index.js';
