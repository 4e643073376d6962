/**
 * In-memory RecordSink
 *
 * Keeps records in an array so pipeline tests can assert on exactly what
 * was written, and can inject write failures.
 */

import { RecordWriteError } from '../ingest/errors.js';
import type { RecordSink, VectorRecord } from '../ingest/writer/index.js';

export interface MemoryRecordSinkOptions {
  /**
   * Called before each write with the 0-based write number.
   * Return an error to make that write fail.
   */
  failWrite?: (record: VectorRecord, writeNumber: number) => Error | undefined;
}

export class MemoryRecordSink implements RecordSink {
  readonly path = 'memory://records';
  readonly records: VectorRecord[] = [];
  closed = false;
  closeCalls = 0;

  private attempts = 0;
  private readonly failWrite?: MemoryRecordSinkOptions['failWrite'];

  constructor(options: MemoryRecordSinkOptions = {}) {
    this.failWrite = options.failWrite;
  }

  async write(record: VectorRecord): Promise<void> {
    if (this.closed) {
      throw new RecordWriteError(`Cannot write to ${this.path}: writer is closed`);
    }

    const failure = this.failWrite?.(record, this.attempts++);
    if (failure) {
      throw new RecordWriteError(failure.message, failure);
    }

    this.records.push(record);
  }

  async close(): Promise<void> {
    this.closeCalls++;
    this.closed = true;
  }

  async size(): Promise<number> {
    return this.records.reduce((total, record) => total + JSON.stringify(record).length + 1, 0);
  }

  /** Records written for one source file, in write order */
  recordsFor(sourceFile: string): VectorRecord[] {
    return this.records.filter((record) => record.source_file === sourceFile);
  }
}
