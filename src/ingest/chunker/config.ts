/**
 * Chunker Configuration
 */

/** Target words per chunk when none is configured */
export const DEFAULT_CHUNK_SIZE = 300;

/** A token counts as a word if it contains a letter or a decimal digit */
export const WORD_CHARACTER = /[\p{L}\p{Nd}]/u;

/**
 * Runs of Unicode White_Space separate tokens. Includes U+0085 (NEL),
 * excludes U+FEFF (BOM), unlike `\s`.
 */
export const TOKEN_SEPARATOR = /\p{White_Space}+/u;

/** Leading or trailing White_Space, for trimming the whole text */
export const EDGE_WHITESPACE = /^\p{White_Space}+|\p{White_Space}+$/gu;
