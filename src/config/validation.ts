/**
 * Ingest Configuration
 *
 * Merges CLI flags, environment and config file into the settings of one
 * run (flag > env > file > default), then checks them against the
 * file system before anything is embedded.
 */

import { access, constants, stat } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';

import { ConfigError, FileNotFoundError, OutputError, ValidationError } from '../errors/index.js';
import { loadEnv, type EnvVars } from './env.js';
import { loadConfig } from './loader.js';
import { EmbeddingConfigSchema, HttpUrlSchema, type Config } from './schema.js';

/**
 * Values given on the command line. Anything unset falls back.
 */
export interface IngestOverrides {
  model?: string;
  output?: string;
  chunkSize?: number;
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
}

/**
 * Run settings before validation.
 */
export interface IngestConfigInput {
  inputDir: string;
  model: string;
  output: string;
  chunkSize: number;
  embedding: {
    baseUrl: string;
    timeoutMs: number;
    maxRetries: number;
    backoffMs: number;
  };
}

/**
 * Validated run settings. Paths are absolute.
 */
export interface IngestConfig {
  inputDir: string;
  model: string;
  outputPath: string;
  chunkSize: number;
  embedding: {
    baseUrl: string;
    timeoutMs: number;
    maxRetries: number;
    backoffMs: number;
  };
}

const IngestConfigInputSchema = z.object({
  inputDir: z.string().min(1, 'Input directory is required'),
  model: z.string().trim().min(1, 'Model cannot be empty'),
  output: z.string().trim().min(1, 'Output path cannot be empty'),
  chunkSize: z
    .number()
    .int('Chunk size must be an integer')
    .positive('Chunk size must be a positive integer'),
  embedding: z.object({
    baseUrl: HttpUrlSchema,
    timeoutMs: EmbeddingConfigSchema.shape.timeout_ms,
    maxRetries: EmbeddingConfigSchema.shape.max_retries,
    backoffMs: EmbeddingConfigSchema.shape.backoff_ms,
  }),
});

/**
 * Embedding service endpoint after precedence.
 */
export function resolveBaseUrl(
  override: string | undefined,
  config: Config,
  env: EnvVars = loadEnv()
): string {
  return override ?? env.OLLAMA_HOST ?? config.embedding.base_url;
}

/**
 * Combine flags, environment and config file for one run.
 */
export function resolveIngestConfig(
  inputDir: string,
  overrides: IngestOverrides = {},
  config: Config = loadConfig(),
  env: EnvVars = loadEnv()
): IngestConfigInput {
  return {
    inputDir,
    model: overrides.model ?? config.model,
    output: overrides.output ?? config.output,
    chunkSize: overrides.chunkSize ?? config.chunk_size,
    embedding: {
      baseUrl: resolveBaseUrl(overrides.baseUrl, config, env),
      timeoutMs: overrides.timeoutMs ?? config.embedding.timeout_ms,
      maxRetries: overrides.maxRetries ?? config.embedding.max_retries,
      backoffMs: config.embedding.backoff_ms,
    },
  };
}

/**
 * Nearest path at or above `path` that exists.
 */
async function nearestExistingAncestor(path: string): Promise<string> {
  let current = path;
  for (;;) {
    try {
      await stat(current);
      return current;
    } catch {
      const parent = dirname(current);
      if (parent === current) {
        return current;
      }
      current = parent;
    }
  }
}

/**
 * Validate run settings and resolve paths against `cwd`.
 *
 * Nothing is created: the output directory only has to be creatable.
 *
 * @throws ValidationError for bad values (model, chunk size, URL, limits)
 * @throws FileNotFoundError if the input directory doesn't exist
 * @throws ConfigError if the input path is not a readable directory
 * @throws OutputError if the output directory cannot be created
 */
export async function validateIngestConfig(
  input: IngestConfigInput,
  cwd: string = process.cwd()
): Promise<IngestConfig> {
  const result = IngestConfigInputSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${path}${issue.message}`;
    });
    throw new ValidationError('Invalid ingest options', issues);
  }
  const valid = result.data;

  const inputDir = resolve(cwd, valid.inputDir);
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(inputDir)).isDirectory();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new FileNotFoundError(inputDir);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot access input directory: ${message}`);
  }
  if (!isDirectory) {
    throw new ConfigError(
      `Not a directory: ${inputDir}`,
      'Pass the directory that contains your .txt files'
    );
  }

  const outputPath = resolve(cwd, valid.output);
  const ancestor = await nearestExistingAncestor(dirname(outputPath));
  try {
    if (!(await stat(ancestor)).isDirectory()) {
      throw new Error(`${ancestor} is not a directory`);
    }
    await access(ancestor, constants.W_OK);
  } catch (error) {
    throw new OutputError(outputPath, error instanceof Error ? error : undefined);
  }

  return {
    inputDir,
    model: valid.model,
    outputPath,
    chunkSize: valid.chunkSize,
    embedding: {
      baseUrl: valid.embedding.baseUrl,
      timeoutMs: valid.embedding.timeoutMs,
      maxRetries: valid.embedding.maxRetries,
      backoffMs: valid.embedding.backoffMs,
    },
  };
}
