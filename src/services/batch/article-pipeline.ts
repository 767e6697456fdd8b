/**
 * Article Pipeline
 *
 * chunk -> route -> refine for one article, strictly sequential per chunk.
 * The chunk list is owned by the pipeline call until it returns.
 *
 * Boundary moves keep coverage lossless: when a chunk's end moves, the
 * start of a contiguous next chunk moves with it. Provider merge
 * suggestions are applied afterwards, only when the merged span stays
 * within maxWords.
 */

import { createComponentLogger } from '../../utils/logger.js';
import { LLMFatalError } from '../../core/errors.js';
import { countWords } from '../chunking/text-layout.js';
import { resliceChunk, type BaseChunker } from '../chunking/base-chunker.js';
import type { QualityRouter } from '../routing/quality-router.js';
import type { RefinementClient } from '../refinement/refinement-client.js';
import type { Article, ArticleMetadata, Chunk } from '../../core/types.js';
import type { ChunkingConfig } from '../../config/index.js';
import type { ArticleError } from './types.js';

const logger = createComponentLogger('article-pipeline');

export interface ArticlePipelineOptions {
  chunker: BaseChunker;
  router: QualityRouter;
  refinement: RefinementClient;
  chunking: Pick<ChunkingConfig, 'minWords' | 'maxWords'>;
}

export interface ArticleRunOptions {
  batchId?: string;
  signal?: AbortSignal;
}

export interface ArticleResult {
  articleId: string;
  chunks: Chunk[];
  routed: number;
  refined: number;
  deniedByRateLimit: number;
  circuitOpenSkips: number;
  refinementFailures: number;
  warnings: ArticleError[];
}

function metadataOf(article: Article): ArticleMetadata {
  const { text: _text, ...metadata } = article;
  return metadata;
}

export class ArticlePipeline {
  private readonly chunker: BaseChunker;
  private readonly router: QualityRouter;
  private readonly refinement: RefinementClient;
  private readonly minWords: number;
  private readonly maxWords: number;

  constructor(options: ArticlePipelineOptions) {
    this.chunker = options.chunker;
    this.router = options.router;
    this.refinement = options.refinement;
    this.minWords = options.chunking.minWords;
    this.maxWords = options.chunking.maxWords;
  }

  /**
   * Base chunks for an article. Throws ChunkingError.
   */
  chunk(article: Article): Chunk[] {
    return this.chunker.chunkArticle(article);
  }

  /**
   * Route every chunk and refine the routed ones
   */
  async refineArticle(article: Article, baseChunks: Chunk[], options: ArticleRunOptions = {}): Promise<ArticleResult> {
    const metadata = metadataOf(article);
    const chunks = baseChunks.map((chunk) => ({ ...chunk }));
    const result: ArticleResult = {
      articleId: article.id,
      chunks,
      routed: 0,
      refined: 0,
      deniedByRateLimit: 0,
      circuitOpenSkips: 0,
      refinementFailures: 0,
      warnings: [],
    };

    for (let i = 0; i < chunks.length; i++) {
      const current = chunks[i];
      if (!current) continue;

      const decision = this.router.route(current, { domain: article.domain, totalChunks: chunks.length });
      chunks[i] = decision.chunk;
      if (!decision.needsLlm) continue;
      result.routed++;

      if (options.signal?.aborted) {
        // Cancelled: remaining chunks keep their base boundaries
        continue;
      }

      const outcome = await this.refinement.refine(decision.chunk, {
        article: metadata,
        articleText: article.text,
        batchId: options.batchId,
        previous: chunks[i - 1],
        next: chunks[i + 1],
        canMoveBoundaryTo: (newEnd) => this.canMoveBoundary(chunks, i, newEnd, article.text),
      });

      switch (outcome.status) {
        case 'refined':
          result.refined++;
          this.commitRefinement(chunks, i, outcome.chunk, article.text);
          break;
        case 'skipped_rate_limit':
          result.deniedByRateLimit++;
          break;
        case 'skipped_circuit_open':
          result.circuitOpenSkips++;
          break;
        case 'failed':
          result.refinementFailures++;
          chunks[i] = outcome.chunk;
          if (outcome.error instanceof LLMFatalError) {
            result.warnings.push({
              articleId: article.id,
              stage: 'refine',
              code: outcome.error.code,
              message: outcome.error.message,
              attempts: 1,
              severity: 'warning',
            });
          }
          break;
        case 'skipped_disabled':
          break;
      }
    }

    result.chunks = this.applyMerges(chunks, article.text);

    logger.debug(
      {
        articleId: article.id,
        chunks: result.chunks.length,
        routed: result.routed,
        refined: result.refined,
      },
      'Article pipeline finished'
    );

    return result;
  }

  /**
   * A boundary move is allowed when the chunk keeps its word bounds, the
   * next chunk keeps its own (the last chunk may stay short), and no gap
   * opens between the two. The last chunk's end is fixed.
   */
  private canMoveBoundary(chunks: Chunk[], index: number, newEnd: number, text: string): boolean {
    const chunk = chunks[index];
    const next = chunks[index + 1];
    if (!chunk || !next) return false;
    if (newEnd <= chunk.charStart || newEnd >= next.charEnd) return false;

    const contiguous = next.charStart === chunk.charEnd;
    if (!contiguous && newEnd < next.charStart) return false;

    const words = countWords(text.slice(chunk.charStart, newEnd));
    if (words < this.minWords || words > this.maxWords) return false;

    if (contiguous) {
      const nextWords = countWords(text.slice(newEnd, next.charEnd));
      const nextIsLast = index + 1 === chunks.length - 1;
      if (nextWords > this.maxWords || (!nextIsLast && nextWords < this.minWords)) return false;
    }
    return true;
  }

  private commitRefinement(chunks: Chunk[], index: number, refined: Chunk, text: string): void {
    const original = chunks[index];
    chunks[index] = refined;

    const next = chunks[index + 1];
    if (!original || !next || refined.charEnd === original.charEnd) return;

    if (next.charStart === original.charEnd) {
      chunks[index + 1] = { ...resliceChunk(next, text, refined.charEnd, next.charEnd), overlapPrevious: 0 };
    } else {
      chunks[index + 1] = { ...next, overlapPrevious: Math.max(0, refined.charEnd - next.charStart) };
    }
  }

  /**
   * Apply merge_prev / merge_next suggestions, then renumber
   */
  private applyMerges(chunks: Chunk[], text: string): Chunk[] {
    const merged: Chunk[] = [];

    for (let i = 0; i < chunks.length; i++) {
      const chunk = chunks[i];
      if (!chunk) continue;
      const action = chunk.refinement?.action;

      const previous = merged[merged.length - 1];
      if (action === 'merge_prev' && previous && this.fits(text, previous.charStart, chunk.charEnd)) {
        merged[merged.length - 1] = this.mergePair(previous, chunk, chunk, text);
        continue;
      }

      const next = chunks[i + 1];
      if (action === 'merge_next' && next && this.fits(text, chunk.charStart, next.charEnd)) {
        merged.push(this.mergePair(chunk, next, chunk, text));
        i++;
        continue;
      }

      merged.push(chunk);
    }

    return merged.map((chunk, index) => (chunk.index === index ? chunk : { ...chunk, index }));
  }

  private fits(text: string, start: number, end: number): boolean {
    return countWords(text.slice(start, end)) <= this.maxWords;
  }

  /**
   * One chunk spanning both; keeps the first chunk's identity and the
   * annotations of the chunk that asked for the merge
   */
  private mergePair(first: Chunk, second: Chunk, requester: Chunk, text: string): Chunk {
    const span = resliceChunk(first, text, first.charStart, second.charEnd);
    return {
      ...span,
      refinementStatus: requester.refinementStatus,
      refinement: requester.refinement,
      semanticType: requester.semanticType,
      dropSuggested: first.dropSuggested && second.dropSuggested,
    };
  }
}
