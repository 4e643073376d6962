/**
 * IngestReporter Tests
 *
 * Tests the progress display for each output mode:
 * - JSON (NDJSON events)
 * - Non-interactive (one line per file)
 * - Interactive without a spinner (quiet per-file output)
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  IngestReporter,
  createIngestReporter,
  type IngestReporterOptions,
  type RunInfo,
} from '../progress.js';
import type { FileOutcome, IngestRunResult } from '../../../ingest/index.js';

const info: RunInfo = {
  inputDir: '/data/corpus',
  outputPath: '/data/storage/vectors.jsonl',
  model: 'nomic-embed-text',
  chunkSize: 300,
  baseUrl: 'http://localhost:11434',
};

const processed: FileOutcome = { sourceFile: 'a.txt', status: 'processed', chunks: 3, recordsWritten: 3 };
const failed: FileOutcome = {
  sourceFile: 'b.txt',
  status: 'failed',
  chunks: 3,
  recordsWritten: 1,
  error: 'boom',
};

function runResult(overrides: Partial<IngestRunResult> = {}): IngestRunResult {
  return {
    stats: {
      filesProcessed: 2,
      filesSkipped: 1,
      chunksCreated: 4,
      totalErrors: 1,
      startTime: new Date('2024-01-15T10:30:00.000Z'),
      endTime: new Date('2024-01-15T10:30:01.500Z'),
    },
    files: [processed, failed],
    outputPath: '/out/vectors.jsonl',
    outputSize: 2048,
    durationMs: 1500,
    warnings: [],
    errors: ['b.txt: boom'],
    ...overrides,
  };
}

interface Event {
  type: string;
  timestamp: string;
  data: Record<string, unknown>;
}

function isEvent(value: unknown): value is Event {
  return typeof value === 'object' && value !== null && 'type' in value && 'data' in value;
}

describe('IngestReporter', () => {
  // Capture console output
  let consoleOutput: string[] = [];

  beforeEach(() => {
    consoleOutput = [];
    const capture = (...args: unknown[]) => {
      consoleOutput.push(args.map(String).join(' '));
    };
    vi.spyOn(console, 'log').mockImplementation(capture);
    vi.spyOn(console, 'error').mockImplementation(capture);
    vi.spyOn(console, 'warn').mockImplementation(capture);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function events(): Event[] {
    return consoleOutput.map((line) => {
      const parsed: unknown = JSON.parse(line);
      if (!isEvent(parsed)) {
        throw new Error(`Not an event: ${line}`);
      }
      return parsed;
    });
  }

  describe('JSON mode', () => {
    const jsonOptions: IngestReporterOptions = {
      json: true,
      verbose: false,
      noColor: true,
      isInteractive: false,
    };

    it('emits run_start with the settings', () => {
      new IngestReporter(jsonOptions).start(info);

      const [event] = events();
      expect(event?.type).toBe('run_start');
      expect(event?.data).toEqual({ ...info });
      expect(event?.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T/);
    });

    it('emits file_start and file_complete events', () => {
      const reporter = new IngestReporter(jsonOptions);

      reporter.startFile('b.txt', 1, 2);
      reporter.completeFile(failed, 1, 2);

      expect(events().map((e) => [e.type, e.data])).toEqual([
        ['file_start', { file: 'b.txt', index: 1, total: 2 }],
        [
          'file_complete',
          { file: 'b.txt', status: 'failed', chunks: 3, recordsWritten: 1, error: 'boom', index: 1, total: 2 },
        ],
      ]);
    });

    it('emits warnings and errors as events', () => {
      const reporter = new IngestReporter(jsonOptions);

      reporter.warn('Cannot traverse: EACCES', '/data/corpus/locked');
      reporter.error('boom', 'b.txt (chunk 1)');

      expect(events().map((e) => [e.type, e.data])).toEqual([
        ['warning', { message: 'Cannot traverse: EACCES', context: '/data/corpus/locked' }],
        ['error', { message: 'boom', context: 'b.txt (chunk 1)' }],
      ]);
    });

    it('emits a complete event with stats', () => {
      new IngestReporter(jsonOptions).showSummary(runResult());

      const [event] = events();
      expect(event?.type).toBe('complete');
      expect(event?.data).toMatchObject({
        filesProcessed: 2,
        filesSkipped: 1,
        chunksCreated: 4,
        totalErrors: 1,
        startTime: '2024-01-15T10:30:00.000Z',
        endTime: '2024-01-15T10:30:01.500Z',
        durationMs: 1500,
        outputPath: '/out/vectors.jsonl',
        outputSize: 2048,
      });
    });

    it('prints nothing for discovery, state or debug', () => {
      const reporter = new IngestReporter({ ...jsonOptions, verbose: true });

      reporter.setState('health_checking');
      reporter.filesDiscovered(3);
      reporter.debug('hidden');
      reporter.asLogger().info('hidden');

      expect(consoleOutput).toEqual([]);
    });
  });

  describe('non-interactive mode', () => {
    const textOptions: IngestReporterOptions = {
      json: false,
      verbose: false,
      noColor: true,
      isInteractive: false,
    };

    it('announces the run', () => {
      new IngestReporter(textOptions).start(info);

      expect(consoleOutput).toEqual([
        'Ingesting /data/corpus',
        '  model nomic-embed-text · chunk size 300 · http://localhost:11434 → /data/storage/vectors.jsonl',
      ]);
    });

    it('reports the discovered file count', () => {
      const reporter = new IngestReporter(textOptions);

      reporter.filesDiscovered(1);
      reporter.filesDiscovered(2);

      expect(consoleOutput).toEqual(['Found 1 text file', 'Found 2 text files']);
    });

    it('prints one line per file', () => {
      const reporter = new IngestReporter(textOptions);

      reporter.completeFile(processed, 0, 3);
      reporter.completeFile(failed, 1, 3);
      reporter.completeFile({ sourceFile: 'c.txt', status: 'empty', chunks: 0, recordsWritten: 0 }, 2, 3);

      expect(consoleOutput).toEqual([
        '[1/3] a.txt: 3 records',
        '[2/3] b.txt: failed after 1/3 chunks',
        '[3/3] c.txt: no words',
      ]);
    });

    it('prints warnings and errors with context', () => {
      const reporter = new IngestReporter(textOptions);

      reporter.warn('No .txt files found in /data/corpus');
      reporter.error('boom', 'b.txt (chunk 1)');

      expect(consoleOutput).toEqual([
        'Warning: No .txt files found in /data/corpus',
        'Error: boom (b.txt (chunk 1))',
      ]);
    });

    it('shows debug lines only when verbose', () => {
      new IngestReporter(textOptions).debug('quiet');
      new IngestReporter({ ...textOptions, verbose: true }).asLogger().debug?.('loud');

      expect(consoleOutput).toEqual(['[debug] loud']);
    });

    it('prints the summary', () => {
      new IngestReporter(textOptions).showSummary(runResult());

      expect(consoleOutput).toEqual([
        '',
        'Ingestion Complete ✓',
        '',
        '  Files processed:  2',
        '  Files skipped:    1',
        '  Chunks created:   4',
        '  Errors:           1',
        '  Time elapsed:     1.5s',
        '  Output:           /out/vectors.jsonl (2.0 KB)',
        '',
        '  1 file(s) had errors',
        '',
      ]);
    });

    it('lists errors in verbose mode', () => {
      new IngestReporter({ ...textOptions, verbose: true }).showSummary(
        runResult({ durationMs: 250, outputSize: undefined })
      );

      expect(consoleOutput).toContain('  Time elapsed:     250ms');
      expect(consoleOutput).toContain('  Output:           /out/vectors.jsonl');
      expect(consoleOutput).toContain('    - b.txt: boom');
    });
  });

  describe('interactive mode', () => {
    it('keeps per-file lines out of the spinner output', () => {
      const reporter = new IngestReporter({
        json: false,
        verbose: false,
        noColor: true,
        isInteractive: true,
      });

      reporter.startFile('a.txt', 0, 1);
      reporter.completeFile(processed, 0, 1);
      reporter.warn('hidden without --verbose');

      expect(consoleOutput).toEqual([]);
    });
  });
});

describe('createIngestReporter', () => {
  it('applies defaults', () => {
    expect(createIngestReporter({ isInteractive: false, noColor: true })).toBeInstanceOf(IngestReporter);
  });
});
