/**
 * Word, sentence and paragraph analysis over raw article text
 */

import { CHARS_PER_TOKEN, type TextLayout, type WordRange, type WordSpan } from './types.js';

const WORD_PATTERN = /\S+/g;
const PARAGRAPH_GAP = /\n[ \t\r\f\v]*\n/;
const SENTENCE_END = /[.!?…]["'”’)\]]*$/;

export function countWords(text: string): number {
  return text.match(WORD_PATTERN)?.length ?? 0;
}

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

export function tokenizeWords(text: string): WordSpan[] {
  const words: WordSpan[] = [];
  for (const match of text.matchAll(WORD_PATTERN)) {
    const start = match.index ?? 0;
    words.push({ start, end: start + match[0].length });
  }
  return words;
}

/**
 * Build the word layout. Paragraphs break where the whitespace between two
 * words contains a blank line.
 */
export function analyzeText(text: string): TextLayout {
  const words = tokenizeWords(text);
  const paragraphs: WordRange[] = [];
  const sentenceEnds: boolean[] = [];

  let paragraphStart = 0;
  for (let i = 0; i < words.length; i++) {
    const word = words[i];
    if (!word) continue;
    sentenceEnds.push(SENTENCE_END.test(text.slice(word.start, word.end)));

    const next = words[i + 1];
    if (next && PARAGRAPH_GAP.test(text.slice(word.end, next.start))) {
      paragraphs.push({ start: paragraphStart, end: i + 1 });
      paragraphStart = i + 1;
    }
  }
  if (words.length > paragraphStart) {
    paragraphs.push({ start: paragraphStart, end: words.length });
  }

  return { text, words, paragraphs, sentenceEnds };
}

/**
 * Characters covered by the words of a range, without surrounding whitespace
 */
export function rangeContentLength(layout: TextLayout, range: WordRange): number {
  const first = layout.words[range.start];
  const last = layout.words[range.end - 1];
  if (!first || !last) return 0;
  return last.end - first.start;
}
