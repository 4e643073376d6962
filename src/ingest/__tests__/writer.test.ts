/**
 * Record Writer Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import {
  JsonlRecordWriter,
  createRecord,
  formatTimestamp,
  parseRecord,
  serializeRecord,
} from '../writer/index.js';
import { RecordWriteError } from '../errors.js';
import type { Chunk } from '../chunker/index.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

const chunk: Chunk = { text: 'the quick brown fox', wordCount: 4, index: 2 };

describe('createRecord', () => {
  it('formats timestamps as UTC seconds', () => {
    expect(formatTimestamp(new Date(Date.UTC(2024, 0, 15, 10, 30, 45, 123)))).toBe(
      '2024-01-15T10:30:45Z'
    );
  });

  it('assembles every field', () => {
    const record = createRecord('notes/a.txt', chunk, [0.25, -1], {
      now: new Date(Date.UTC(2024, 0, 15, 10, 30, 45)),
      generateId: () => 'rec-1',
    });

    expect(record).toEqual({
      id: 'rec-1',
      source_file: 'notes/a.txt',
      chunk_index: 2,
      text: 'the quick brown fox',
      embedding: [0.25, -1],
      word_count: 4,
      created_at: '2024-01-15T10:30:45Z',
    });
  });

  it('generates a fresh UUID per record', () => {
    const first = createRecord('a.txt', chunk, [1]);
    const second = createRecord('a.txt', chunk, [1]);

    expect(first.id).toMatch(UUID_PATTERN);
    expect(second.id).toMatch(UUID_PATTERN);
    expect(first.id).not.toBe(second.id);
  });

  it('round-trips through serialization', () => {
    const record = createRecord('dir/ü.txt', { text: 'naïve — "quoted"\ttext', wordCount: 3, index: 0 }, [
      0.1, 2e-7, -3.5,
    ]);
    const line = serializeRecord(record);

    expect(line.endsWith('\n')).toBe(true);
    expect(line.indexOf('\n')).toBe(line.length - 1);
    expect(parseRecord(line)).toEqual(record);
  });

  it('rejects lines missing mandatory fields', () => {
    expect(() => parseRecord('{"id":"x","source_file":"a.txt"}')).toThrow(/^Invalid record: /);
  });
});

describe('JsonlRecordWriter', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'textvec-writer-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function readLines(path: string): string[] {
    return readFileSync(path, 'utf-8').split('\n').filter(Boolean);
  }

  it('creates missing parent directories', async () => {
    const path = join(dir, 'storage', 'nested', 'vectors.jsonl');

    const writer = await JsonlRecordWriter.open(path);
    await writer.close();

    expect(writer.path).toBe(path);
    expect(readFileSync(path, 'utf-8')).toBe('');
  });

  it('writes one JSON line per record', async () => {
    const path = join(dir, 'vectors.jsonl');
    const writer = await JsonlRecordWriter.open(path);

    const first = await writer.writeChunk('a.txt', chunk, [1, 2, 3]);
    const second = await writer.writeChunk('b.txt', { ...chunk, index: 0 }, [4, 5, 6]);
    await writer.close();

    const lines = readLines(path);
    expect(lines).toHaveLength(2);
    expect(parseRecord(lines[0] ?? '')).toEqual(first);
    expect(parseRecord(lines[1] ?? '')).toMatchObject({
      id: second.id,
      source_file: 'b.txt',
      chunk_index: 0,
      embedding: [4, 5, 6],
    });
    expect(first.created_at).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/);
  });

  it('appends to existing content instead of truncating', async () => {
    const path = join(dir, 'vectors.jsonl');
    writeFileSync(path, '{"previous":true}\n');

    const writer = await JsonlRecordWriter.open(path);
    await writer.writeChunk('a.txt', chunk, [1]);
    await writer.close();

    const again = await JsonlRecordWriter.open(path);
    await again.writeChunk('a.txt', chunk, [2]);
    await again.close();

    const lines = readLines(path);
    expect(lines).toHaveLength(3);
    expect(lines[0]).toBe('{"previous":true}');
    expect(parseRecord(lines[2] ?? '').embedding).toEqual([2]);
  });

  it('fails to write after close', async () => {
    const writer = await JsonlRecordWriter.open(join(dir, 'vectors.jsonl'));
    await writer.close();

    expect(writer.closed).toBe(true);
    await expect(writer.writeChunk('a.txt', chunk, [1])).rejects.toBeInstanceOf(RecordWriteError);
    await expect(writer.write(createRecord('a.txt', chunk, [1]))).rejects.toThrow(
      /writer is closed$/
    );
  });

  it('treats a second close as a no-op', async () => {
    const writer = await JsonlRecordWriter.open(join(dir, 'vectors.jsonl'));

    await writer.close();
    await expect(writer.close()).resolves.toBeUndefined();
  });

  it('reports size in bytes, before and after close', async () => {
    const path = join(dir, 'vectors.jsonl');
    const writer = await JsonlRecordWriter.open(path);
    expect(await writer.size()).toBe(0);

    const record = await writer.writeChunk('a.txt', { text: 'é', wordCount: 1, index: 0 }, [1]);
    const expected = Buffer.byteLength(serializeRecord(record), 'utf-8');

    expect(await writer.size()).toBe(expected);
    await writer.close();
    expect(await writer.size()).toBe(expected);
  });

  it('flushes while open and refuses after close', async () => {
    const writer = await JsonlRecordWriter.open(join(dir, 'vectors.jsonl'));
    await writer.writeChunk('a.txt', chunk, [1]);

    await expect(writer.flush()).resolves.toBeUndefined();
    await writer.close();
    await expect(writer.flush()).rejects.toBeInstanceOf(RecordWriteError);
  });

  it('fails to open when the parent path is a file', async () => {
    const blocker = join(dir, 'blocker');
    writeFileSync(blocker, 'not a directory');

    const error = await JsonlRecordWriter.open(join(blocker, 'vectors.jsonl')).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(RecordWriteError);
    expect(error instanceof Error ? error.message : '').toMatch(
      /^Failed to create output directory /
    );
  });
});
