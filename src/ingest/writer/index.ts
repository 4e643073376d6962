/**
 * Record Writer Module
 *
 * Append-only persistence of embedded chunks.
 */

export { JsonlRecordWriter } from './jsonl-writer.js';
export {
  createRecord,
  formatTimestamp,
  serializeRecord,
  parseRecord,
  type CreateRecordOptions,
} from './record.js';
export { VectorRecordSchema } from './types.js';
export type { VectorRecord, RecordSink } from './types.js';
