/**
 * JSONL Record Writer
 *
 * Appends one JSON object per line to a file opened in append mode.
 * Existing content is never truncated, so repeated runs against the same
 * output path accumulate records.
 *
 * Each write() hands a complete line (JSON + "\n") to a single append
 * call, so an interruption between writes never leaves a partial line.
 */

import { mkdir, open, stat, type FileHandle } from 'node:fs/promises';
import { dirname } from 'node:path';

import type { Chunk } from '../chunker/index.js';
import type { Embedding } from '../embedder/index.js';
import { RecordWriteError } from '../errors.js';
import { createRecord, serializeRecord } from './record.js';
import type { RecordSink, VectorRecord } from './types.js';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * File-backed RecordSink.
 *
 * @example
 * ```typescript
 * const writer = await JsonlRecordWriter.open('storage/vectors.jsonl');
 * try {
 *   await writer.writeChunk('notes/a.txt', chunk, embedding);
 * } finally {
 *   await writer.close();
 * }
 * ```
 */
export class JsonlRecordWriter implements RecordSink {
  readonly path: string;

  private handle: FileHandle | null;

  private constructor(outputPath: string, handle: FileHandle) {
    this.path = outputPath;
    this.handle = handle;
  }

  /**
   * Create the parent directory if needed and open the file for appending.
   *
   * @throws RecordWriteError if the directory or file cannot be created/opened
   */
  static async open(outputPath: string): Promise<JsonlRecordWriter> {
    const directory = dirname(outputPath);
    try {
      await mkdir(directory, { recursive: true });
    } catch (error) {
      throw new RecordWriteError(
        `Failed to create output directory ${directory}: ${errorMessage(error)}`,
        error
      );
    }

    let handle: FileHandle;
    try {
      handle = await open(outputPath, 'a');
    } catch (error) {
      throw new RecordWriteError(
        `Failed to open output file ${outputPath}: ${errorMessage(error)}`,
        error
      );
    }

    return new JsonlRecordWriter(outputPath, handle);
  }

  /** Whether close() has been called */
  get closed(): boolean {
    return this.handle === null;
  }

  async write(record: VectorRecord): Promise<void> {
    const handle = this.requireOpen();
    try {
      await handle.appendFile(serializeRecord(record), 'utf-8');
    } catch (error) {
      throw new RecordWriteError(
        `Failed to write record to ${this.path}: ${errorMessage(error)}`,
        error
      );
    }
  }

  /**
   * Build a record for an embedded chunk and append it.
   *
   * @returns The record as written
   */
  async writeChunk(sourceFile: string, chunk: Chunk, embedding: Embedding): Promise<VectorRecord> {
    const record = createRecord(sourceFile, chunk, embedding);
    await this.write(record);
    return record;
  }

  /**
   * Force written records to stable storage.
   */
  async flush(): Promise<void> {
    const handle = this.requireOpen();
    try {
      await handle.sync();
    } catch (error) {
      throw new RecordWriteError(`Failed to flush ${this.path}: ${errorMessage(error)}`, error);
    }
  }

  /**
   * Current output size in bytes. Works after close() too.
   */
  async size(): Promise<number> {
    const info = this.handle ? await this.handle.stat() : await stat(this.path);
    return info.size;
  }

  async close(): Promise<void> {
    const handle = this.handle;
    if (!handle) {
      return;
    }
    this.handle = null;

    try {
      await handle.close();
    } catch (error) {
      throw new RecordWriteError(`Failed to close ${this.path}: ${errorMessage(error)}`, error);
    }
  }

  private requireOpen(): FileHandle {
    if (!this.handle) {
      throw new RecordWriteError(`Cannot write to ${this.path}: writer is closed`);
    }
    return this.handle;
  }
}
