/**
 * Base Chunker
 *
 * Deterministic paragraph-first segmentation with a sentence-aware sliding
 * window for oversized spans. Never performs I/O.
 *
 * Chunks are contiguous: the first starts at 0, the last ends at the end
 * of the text, and each chunk's text is the exact source slice including
 * trailing whitespace. Sliding-window chunks overlap their predecessor by
 * `overlapPrevious` characters.
 */

import { v5 as uuidv5 } from 'uuid';
import { ChunkingError, ErrorCodes } from '../../core/errors.js';
import { createComponentLogger } from '../../utils/logger.js';
import { analyzeText, countWords, estimateTokens, rangeContentLength } from './text-layout.js';
import { detectSemanticType } from './semantic-type.js';
import type { Article, ArticleMetadata, Chunk } from '../../core/types.js';
import type { ChunkingConfig } from '../../config/index.js';
import type { TextLayout, WordRange } from './types.js';

const logger = createComponentLogger('chunker');

/** Chunk ids are name-based so re-chunking the same text yields the same ids */
const CHUNK_ID_NAMESPACE = '6f1c2b8e-3d4a-5b6c-9d8e-7f6a5b4c3d2e';

export function chunkId(articleId: string, index: number, charStart: number, charEnd: number): string {
  return uuidv5(`${articleId}:${index}:${charStart}:${charEnd}`, CHUNK_ID_NAMESPACE);
}

export class BaseChunker {
  private readonly config: ChunkingConfig;

  constructor(config: ChunkingConfig) {
    this.config = { ...config };
  }

  getConfig(): ChunkingConfig {
    return { ...this.config };
  }

  chunkArticle(article: Article): Chunk[] {
    const { text, ...metadata } = article;
    return this.chunk(text, metadata);
  }

  /**
   * Split text into ordered chunks.
   *
   * @throws ChunkingError when the text is not a string, contains NUL
   *   characters or is longer than `maxArticleChars`
   */
  chunk(text: string, metadata: ArticleMetadata): Chunk[] {
    this.validate(text, metadata.id);

    if (text.trim().length === 0) {
      return [];
    }

    const layout = analyzeText(text);
    const ranges = this.applyMinChars(layout, this.segment(layout));
    const chunks = this.buildChunks(layout, ranges, metadata.id);

    logger.debug(
      { articleId: metadata.id, words: layout.words.length, chunks: chunks.length },
      'Article chunked'
    );

    return chunks;
  }

  private validate(text: unknown, articleId: string): void {
    if (typeof text !== 'string') {
      throw new ChunkingError('Article text must be a string', articleId, ErrorCodes.MALFORMED_TEXT, {
        receivedType: typeof text,
      });
    }
    if (text.includes('\u0000')) {
      throw new ChunkingError('Article text contains NUL characters', articleId, ErrorCodes.MALFORMED_TEXT);
    }
    if (text.length > this.config.maxArticleChars) {
      throw new ChunkingError(
        `Article text exceeds ${this.config.maxArticleChars} characters`,
        articleId,
        ErrorCodes.ARTICLE_TOO_LARGE,
        { length: text.length }
      );
    }
  }

  /**
   * Accumulate paragraphs up to the target; oversized spans go through the
   * sliding window. A window shorter than `minWords` only stands when it
   * ends the article, otherwise it opens the next group.
   */
  private segment(layout: TextLayout): WordRange[] {
    const { targetWords, minWords, maxWords } = this.config;
    const ranges: WordRange[] = [];
    let group: WordRange | null = null;

    for (const paragraph of layout.paragraphs) {
      const size = paragraph.end - paragraph.start;

      if (group === null) {
        group = size > maxWords ? this.pushWindows(ranges, this.slidingWindow(layout, paragraph)) : { ...paragraph };
        continue;
      }

      const groupSize = group.end - group.start;
      if (size <= maxWords && groupSize < targetWords && groupSize + size <= maxWords) {
        group.end = paragraph.end;
        continue;
      }

      if (groupSize < minWords) {
        // Too small to stand alone and too big to merge whole
        group = this.pushWindows(ranges, this.slidingWindow(layout, { start: group.start, end: paragraph.end }));
        continue;
      }

      ranges.push(group);
      group = size > maxWords ? this.pushWindows(ranges, this.slidingWindow(layout, paragraph)) : { ...paragraph };
    }

    if (group) {
      ranges.push(group);
    }
    return ranges;
  }

  /**
   * Push windows onto `ranges`, returning a short last window instead
   */
  private pushWindows(ranges: WordRange[], windows: WordRange[]): WordRange | null {
    const last = windows.pop();
    ranges.push(...windows);
    if (!last) return null;
    if (last.end - last.start < this.config.minWords) {
      return last;
    }
    ranges.push(last);
    return null;
  }

  /**
   * Every window but the last holds [minWords, maxWords] words. The last
   * one is shorter than `minWords` only when the span cannot be split
   * into full windows.
   */
  private slidingWindow(layout: TextLayout, span: WordRange): WordRange[] {
    const { minWords, maxWords, overlapWords } = this.config;
    const windows: WordRange[] = [];
    let start = span.start;

    while (span.end - start > maxWords) {
      let end = this.windowEnd(layout, start, span.end);
      const remaining = span.end - start + overlapWords;
      if (span.end - (end - overlapWords) < minWords) {
        end = remaining >= 2 * minWords ? start + Math.ceil(remaining / 2) : start + maxWords;
      }
      windows.push({ start, end });
      start = end - overlapWords;
    }
    windows.push({ start, end: span.end });

    return windows;
  }

  /**
   * Window end closest to the target that closes a sentence, within
   * [min, max] words of the start. Falls back to the target.
   */
  private windowEnd(layout: TextLayout, start: number, limit: number): number {
    const { targetWords, minWords, maxWords } = this.config;
    const ideal = Math.min(start + targetWords, limit);
    const upper = Math.min(start + maxWords, limit);

    let best = -1;
    let bestDistance = Number.POSITIVE_INFINITY;
    for (let end = start + minWords; end <= upper; end++) {
      if (!layout.sentenceEnds[end - 1]) continue;
      const distance = Math.abs(end - ideal);
      if (distance < bestDistance) {
        best = end;
        bestDistance = distance;
      }
    }
    return best === -1 ? ideal : best;
  }

  /**
   * Merge chunks shorter than `minChars` into the next chunk, or the previous
   * one, as long as the merged span stays within `maxWords`.
   */
  private applyMinChars(layout: TextLayout, ranges: WordRange[]): WordRange[] {
    const { minChars, maxWords } = this.config;
    const result = ranges.map((range) => ({ ...range }));

    let i = 0;
    while (i < result.length && result.length > 1) {
      const current = result[i];
      if (!current) break;

      if (rangeContentLength(layout, current) >= minChars) {
        i++;
        continue;
      }

      const next = result[i + 1];
      if (next && next.end - current.start <= maxWords) {
        result.splice(i, 2, { start: current.start, end: next.end });
        continue;
      }

      const previous = result[i - 1];
      if (previous && current.end - previous.start <= maxWords) {
        result.splice(i - 1, 2, { start: previous.start, end: current.end });
        i--;
        continue;
      }

      i++;
    }

    return result;
  }

  private buildChunks(layout: TextLayout, ranges: WordRange[], articleId: string): Chunk[] {
    const { text, words } = layout;
    const total = ranges.length;
    const chunks: Chunk[] = [];
    let previousEnd = 0;

    ranges.forEach((range, index) => {
      const charStart = index === 0 ? 0 : (words[range.start]?.start ?? text.length);
      const charEnd = index === total - 1 ? text.length : (words[range.end]?.start ?? text.length);
      const chunkText = text.slice(charStart, charEnd);

      chunks.push({
        id: chunkId(articleId, index, charStart, charEnd),
        articleId,
        index,
        text: chunkText,
        charStart,
        charEnd,
        wordCount: range.end - range.start,
        tokenEstimate: estimateTokens(chunkText),
        overlapPrevious: index === 0 ? 0 : Math.max(0, previousEnd - charStart),
        semanticType: detectSemanticType(chunkText, index, total),
        scores: null,
        confidence: null,
        routingReasons: [],
        refinementStatus: 'unrefined',
        refinement: null,
        dropSuggested: false,
      });
      previousEnd = charEnd;
    });

    return chunks;
  }
}

/**
 * Re-slice a chunk to new offsets, recomputing the derived fields
 */
export function resliceChunk(chunk: Chunk, articleText: string, charStart: number, charEnd: number): Chunk {
  const sliced = articleText.slice(charStart, charEnd);
  return {
    ...chunk,
    text: sliced,
    charStart,
    charEnd,
    wordCount: countWords(sliced),
    tokenEstimate: estimateTokens(sliced),
  };
}

/**
 * Rebuild an article from its chunks, dropping each chunk's overlap
 */
export function reconstructText(chunks: Chunk[]): string {
  return chunks
    .map((chunk, index) => (index === 0 ? chunk.text : chunk.text.slice(chunk.overlapPrevious)))
    .join('');
}
