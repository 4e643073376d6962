/**
 * Record Writer Types
 *
 * The pipeline only ever appends records and closes the store, so it talks
 * to a RecordSink. The JSONL file writer is one implementation; an object
 * store or queue producer can replace it without touching the pipeline.
 */

import { z } from 'zod';

/**
 * One line of the output store. Field names are the on-disk format.
 */
export const VectorRecordSchema = z.object({
  id: z.string().min(1),
  source_file: z.string().min(1),
  chunk_index: z.number().int().min(0),
  text: z.string().min(1),
  embedding: z.array(z.number()).min(1),
  word_count: z.number().int().min(1),
  created_at: z.string().regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/),
});

export type VectorRecord = z.infer<typeof VectorRecordSchema>;

/**
 * Append-only, sequential record store.
 *
 * Single-writer: callers await each write before issuing the next.
 */
export interface RecordSink {
  /** Where records go, for display */
  readonly path: string;

  /**
   * Append one record. When the promise resolves the record is a complete,
   * newline-terminated entry in the store.
   *
   * @throws RecordWriteError on I/O failure or after close()
   */
  write(record: VectorRecord): Promise<void>;

  /** Release the store. Further writes fail; closing twice is a no-op. */
  close(): Promise<void>;

  /** Current store size in bytes, when the store can tell */
  size?(): Promise<number>;
}
