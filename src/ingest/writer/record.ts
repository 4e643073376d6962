/**
 * Record construction and parsing.
 */

import { randomUUID } from 'node:crypto';

import type { Chunk } from '../chunker/index.js';
import type { Embedding } from '../embedder/index.js';
import { VectorRecordSchema, type VectorRecord } from './types.js';

/**
 * Overrides for the generated fields (tests pin these).
 */
export interface CreateRecordOptions {
  /** Clock reading for created_at */
  now?: Date;
  /** Record id generator */
  generateId?: () => string;
}

/**
 * Format a date as UTC with second precision: 2024-01-15T10:30:45Z
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Assemble the record for one embedded chunk with a fresh id and timestamp.
 */
export function createRecord(
  sourceFile: string,
  chunk: Chunk,
  embedding: Embedding,
  options: CreateRecordOptions = {}
): VectorRecord {
  const generateId = options.generateId ?? randomUUID;

  return {
    id: generateId(),
    source_file: sourceFile,
    chunk_index: chunk.index,
    text: chunk.text,
    embedding,
    word_count: chunk.wordCount,
    created_at: formatTimestamp(options.now ?? new Date()),
  };
}

/**
 * Encode a record as one newline-terminated JSON line.
 */
export function serializeRecord(record: VectorRecord): string {
  return `${JSON.stringify(record)}\n`;
}

/**
 * Decode and validate one line of the output store.
 *
 * @throws Error if the line is not JSON or lacks a mandatory field
 */
export function parseRecord(line: string): VectorRecord {
  const parsed = VectorRecordSchema.safeParse(JSON.parse(line));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid record: ${issues}`);
  }
  return parsed.data;
}
