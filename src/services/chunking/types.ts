/**
 * Chunking System Types
 */

/**
 * Average characters per token for English prose
 */
export const CHARS_PER_TOKEN = 4;

/**
 * A whitespace-delimited word. Offsets index the article text.
 */
export interface WordSpan {
  start: number;
  end: number;
}

/**
 * Half-open range of word indices [start, end)
 */
export interface WordRange {
  start: number;
  end: number;
}

/**
 * Word-level view of an article, built once per chunk() call
 */
export interface TextLayout {
  text: string;
  words: WordSpan[];
  /** Word ranges of the blank-line separated paragraphs, in order */
  paragraphs: WordRange[];
  /** sentenceEnds[i] is true when word i closes a sentence */
  sentenceEnds: boolean[];
}
