/**
 * Configuration Schema
 *
 * Defines the shape of config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * http:// or https:// URL
 */
export const HttpUrlSchema = z
  .string()
  .url('must be a valid URL')
  .refine((value) => /^https?:\/\//i.test(value), {
    message: 'must use http or https',
  });

/**
 * Embedding service configuration
 * Controls how the Ollama-compatible service is reached
 */
export const EmbeddingConfigSchema = z.object({
  base_url: HttpUrlSchema.describe('Embedding service base URL'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Per-request timeout in milliseconds (1000-600000, default 30000)'),
  max_retries: z
    .number()
    .int()
    .min(0)
    .max(10)
    .describe('Retries after a failed embedding request (0-10, default 3)'),
  backoff_ms: z
    .number()
    .int()
    .min(0)
    .max(60000)
    .describe('Wait before the first retry, doubled for each following retry'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  model: z.string().min(1).describe('Embedding model identifier'),
  output: z.string().min(1).describe('JSONL output path, relative to the working directory'),
  chunk_size: z.number().int().positive().describe('Target words per chunk'),
  embedding: EmbeddingConfigSchema,
});

/**
 * TypeScript type inferred from the schema
 * Use this for type-safe config access throughout the codebase
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
