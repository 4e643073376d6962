/**
 * Ingest configuration tests: precedence and file-system validation.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { DEFAULT_CONFIG } from '../defaults.js';
import {
  resolveBaseUrl,
  resolveIngestConfig,
  validateIngestConfig,
  type IngestConfigInput,
} from '../validation.js';
import {
  ConfigError,
  FileNotFoundError,
  OutputError,
  ValidationError,
} from '../../errors/index.js';

describe('resolveIngestConfig', () => {
  it('falls back to the config file', () => {
    const input = resolveIngestConfig('corpus', {}, DEFAULT_CONFIG, {});

    expect(input).toEqual({
      inputDir: 'corpus',
      model: 'nomic-embed-text',
      output: 'storage/vectors.jsonl',
      chunkSize: 300,
      embedding: {
        baseUrl: 'http://localhost:11434',
        timeoutMs: 30000,
        maxRetries: 3,
        backoffMs: 1000,
      },
    });
  });

  it('lets flags override the config file', () => {
    const input = resolveIngestConfig(
      'corpus',
      { model: 'all-minilm', output: 'out.jsonl', chunkSize: 50, timeoutMs: 5000, maxRetries: 0 },
      DEFAULT_CONFIG,
      {}
    );

    expect(input.model).toBe('all-minilm');
    expect(input.output).toBe('out.jsonl');
    expect(input.chunkSize).toBe(50);
    expect(input.embedding.timeoutMs).toBe(5000);
    expect(input.embedding.maxRetries).toBe(0);
  });

  it('orders base URL sources flag > env > file', () => {
    const env = { OLLAMA_HOST: 'http://env-host:11434' };

    expect(resolveBaseUrl('http://flag-host:11434', DEFAULT_CONFIG, env)).toBe(
      'http://flag-host:11434'
    );
    expect(resolveBaseUrl(undefined, DEFAULT_CONFIG, env)).toBe('http://env-host:11434');
    expect(resolveBaseUrl(undefined, DEFAULT_CONFIG, {})).toBe('http://localhost:11434');
  });
});

describe('validateIngestConfig', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'textvec-validate-'));
    fs.mkdirSync(path.join(workDir, 'corpus'));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  function input(overrides: Partial<IngestConfigInput> = {}): IngestConfigInput {
    return { ...resolveIngestConfig('corpus', {}, DEFAULT_CONFIG, {}), ...overrides };
  }

  it('resolves paths against the working directory', async () => {
    const config = await validateIngestConfig(input(), workDir);

    expect(config.inputDir).toBe(path.join(workDir, 'corpus'));
    expect(config.outputPath).toBe(path.join(workDir, 'storage', 'vectors.jsonl'));
    expect(config.model).toBe('nomic-embed-text');
    expect(config.chunkSize).toBe(300);
  });

  it('does not create the output directory', async () => {
    await validateIngestConfig(input(), workDir);

    expect(fs.existsSync(path.join(workDir, 'storage'))).toBe(false);
  });

  it('throws FileNotFoundError for a missing directory', async () => {
    const error = await validateIngestConfig(input({ inputDir: 'missing' }), workDir).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(FileNotFoundError);
    expect(error).toMatchObject({ code: 3 });
  });

  it('throws ConfigError when the input is a file', async () => {
    fs.writeFileSync(path.join(workDir, 'notes.txt'), 'hello');

    await expect(validateIngestConfig(input({ inputDir: 'notes.txt' }), workDir)).rejects.toThrow(
      ConfigError
    );
  });

  it('rejects a non-positive chunk size', async () => {
    const error = await validateIngestConfig(input({ chunkSize: 0 }), workDir).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ issues: ['chunkSize: Chunk size must be a positive integer'] });
  });

  it('rejects a blank model', async () => {
    const error = await validateIngestConfig(input({ model: '   ' }), workDir).catch(
      (e: unknown) => e
    );

    expect(error).toMatchObject({ issues: ['model: Model cannot be empty'] });
  });

  it('rejects a base URL without http scheme', async () => {
    const error = await validateIngestConfig(
      input({
        embedding: { baseUrl: 'localhost:11434', timeoutMs: 30000, maxRetries: 3, backoffMs: 1000 },
      }),
      workDir
    ).catch((e: unknown) => e);

    expect(error).toMatchObject({ issues: ['embedding.baseUrl: must use http or https'] });
  });

  it('throws OutputError when the output parent is a file', async () => {
    fs.writeFileSync(path.join(workDir, 'blocker'), 'x');

    await expect(
      validateIngestConfig(input({ output: 'blocker/vectors.jsonl' }), workDir)
    ).rejects.toThrow(OutputError);
  });
});
