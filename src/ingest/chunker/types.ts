/**
 * Chunker Types
 */

/**
 * A bounded run of words cut from one file's text.
 *
 * Produced by the chunker and consumed immediately by the pipeline;
 * never persisted on its own.
 */
export interface Chunk {
  /** Chunk text (words joined by single spaces, or the whole trimmed text) */
  text: string;

  /** Number of words that contain a letter or digit (>= 1) */
  wordCount: number;

  /** 0-based position within the file, contiguous */
  index: number;
}
