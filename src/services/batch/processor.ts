/**
 * Batch Processor
 *
 * Runs many articles through the article pipeline:
 * - articles are grouped into batches of `batchSize` (shrunk for long
 *   articles when adaptive sizing is on)
 * - up to `maxConcurrentBatches` batches run at once
 * - a backpressure gate holds new batches while in-flight articles are
 *   above `backpressureThreshold * maxInFlightArticles`
 * - articles inside a batch run concurrently; a failed article never
 *   aborts its batch and may be retried up to `maxRetries` times
 *
 * Cancellation (ctx.signal) stops admission of new batches and new
 * articles. Work already started finishes.
 */

import { v4 as uuidv4 } from 'uuid';
import { createComponentLogger } from '../../utils/logger.js';
import { BackpressureGate, Semaphore } from '../../utils/backpressure.js';
import { systemClock } from '../../utils/clock.js';
import { ErrorCodes, HybridChunkerError, StorageError, toError } from '../../core/errors.js';
import type { LlmRateLimiter } from '../rate-limit/llm-rate-limiter.js';
import type { BatchConfig } from '../../config/index.js';
import type { Article, Chunk } from '../../core/types.js';
import type { Clock } from '../../core/interfaces/clock.js';
import type { IArticleStorage } from '../../core/interfaces/storage.js';
import type { ArticlePipeline, ArticleResult } from './article-pipeline.js';
import type { ArticleError, ArticleStage, BatchResult, ProcessingContext } from './types.js';

const logger = createComponentLogger('batch-processor');

/** Average article length above which batches are quartered */
export const LONG_ARTICLE_CHARS = 20_000;
/** Average article length above which batches are halved */
export const MEDIUM_ARTICLE_CHARS = 8_000;

export interface BatchProcessorOptions {
  pipeline: ArticlePipeline;
  rateLimiter: LlmRateLimiter;
  config: BatchConfig;
  storage?: IArticleStorage;
  clock?: Clock;
}

export interface BatchProcessorStats {
  batchesRun: number;
  articlesProcessed: number;
  articlesFailed: number;
  inFlightArticles: number;
  batchSlots: { current: number; max: number; waiting: number };
  backpressure: ReturnType<BackpressureGate['getStats']>;
}

interface ArticleState {
  article: Article;
  baseChunks: Chunk[];
  output: ArticleResult | null;
  persisted: boolean;
  attempts: number;
  lastError: { stage: ArticleStage; error: Error } | null;
}

interface BatchOutcome {
  processed: ArticleResult[];
  errors: ArticleError[];
  failed: number;
  skipped: number;
  retries: number;
}

export class BatchProcessor {
  private readonly pipeline: ArticlePipeline;
  private readonly rateLimiter: LlmRateLimiter;
  private readonly config: BatchConfig;
  private readonly storage: IArticleStorage | undefined;
  private readonly clock: Clock;
  private readonly batchSlots: Semaphore;
  private readonly gate: BackpressureGate;

  private batchesRun = 0;
  private articlesProcessed = 0;
  private articlesFailed = 0;

  constructor(options: BatchProcessorOptions) {
    this.pipeline = options.pipeline;
    this.rateLimiter = options.rateLimiter;
    this.config = { ...options.config };
    this.storage = options.storage;
    this.clock = options.clock ?? systemClock;
    this.batchSlots = new Semaphore({ maxConcurrent: this.config.maxConcurrentBatches, name: 'batches' });
    this.gate = new BackpressureGate({
      capacity: this.config.maxInFlightArticles,
      threshold: this.config.backpressureThreshold,
      name: 'articles',
    });
  }

  /**
   * Effective batch size for a set of articles
   */
  batchSizeFor(articles: readonly Article[]): number {
    const base = this.config.batchSize;
    if (!this.config.adaptiveBatchSizing || articles.length === 0) return base;

    const averageChars = articles.reduce((sum, a) => sum + a.text.length, 0) / articles.length;
    if (averageChars > LONG_ARTICLE_CHARS) return Math.max(1, Math.floor(base / 4));
    if (averageChars > MEDIUM_ARTICLE_CHARS) return Math.max(1, Math.floor(base / 2));
    return base;
  }

  planBatches(articles: readonly Article[]): Article[][] {
    const size = this.batchSizeFor(articles);
    const batches: Article[][] = [];
    for (let i = 0; i < articles.length; i += size) {
      batches.push(articles.slice(i, i + size));
    }
    return batches;
  }

  /**
   * Process every article and aggregate the outcome. Never throws for
   * per-article failures; they are listed in `errors`.
   */
  async processBatch(articles: readonly Article[], ctx: ProcessingContext = {}): Promise<BatchResult> {
    const startedAt = this.clock.now();
    const runId = ctx.runId ?? uuidv4();
    const batches = this.planBatches(articles);

    logger.info(
      { runId, articles: articles.length, batches: batches.length, batchSize: batches[0]?.length ?? 0 },
      'Starting batch run'
    );

    const outcomes = await Promise.all(
      batches.map((batch, index) => this.runBatch(batch, `${runId}:${index}`, ctx))
    );

    const result: BatchResult = {
      articlesProcessed: 0,
      articlesFailed: 0,
      articlesSkipped: 0,
      chunksCreated: 0,
      chunksRefined: 0,
      refinementsDeniedByRateLimit: 0,
      circuitOpenSkips: 0,
      refinementFailures: 0,
      articleRetries: 0,
      batches: batches.length,
      processingTimeMs: 0,
      cancelled: ctx.signal?.aborted ?? false,
      articles: [],
      errors: [],
    };

    for (const outcome of outcomes) {
      for (const article of outcome.processed) {
        result.articlesProcessed++;
        result.chunksCreated += article.chunks.length;
        result.chunksRefined += article.refined;
        result.refinementsDeniedByRateLimit += article.deniedByRateLimit;
        result.circuitOpenSkips += article.circuitOpenSkips;
        result.refinementFailures += article.refinementFailures;
        result.articles.push({ articleId: article.articleId, chunks: article.chunks });
      }
      result.articlesFailed += outcome.failed;
      result.articlesSkipped += outcome.skipped;
      result.articleRetries += outcome.retries;
      result.errors.push(...outcome.errors);
    }

    result.processingTimeMs = this.clock.now() - startedAt;
    this.articlesProcessed += result.articlesProcessed;
    this.articlesFailed += result.articlesFailed;

    logger.info(
      {
        runId,
        processed: result.articlesProcessed,
        failed: result.articlesFailed,
        skipped: result.articlesSkipped,
        chunks: result.chunksCreated,
        refined: result.chunksRefined,
        denied: result.refinementsDeniedByRateLimit,
        durationMs: result.processingTimeMs,
      },
      'Batch run finished'
    );

    return result;
  }

  getInFlightArticles(): number {
    return this.gate.getInFlight();
  }

  getStats(): BatchProcessorStats {
    const slots = this.batchSlots.getStats();
    return {
      batchesRun: this.batchesRun,
      articlesProcessed: this.articlesProcessed,
      articlesFailed: this.articlesFailed,
      inFlightArticles: this.gate.getInFlight(),
      batchSlots: { current: slots.current, max: slots.max, waiting: slots.waiting },
      backpressure: this.gate.getStats(),
    };
  }

  private async runBatch(batch: Article[], batchId: string, ctx: ProcessingContext): Promise<BatchOutcome> {
    const outcome: BatchOutcome = { processed: [], errors: [], failed: 0, skipped: 0, retries: 0 };

    await this.batchSlots.acquire();
    try {
      if (ctx.signal?.aborted) {
        outcome.skipped = batch.length;
        return outcome;
      }

      await this.gate.admit(batch.length);
      let unsettled = batch.length;
      const settle = (count: number) => {
        this.gate.complete(count);
        unsettled -= count;
      };

      try {
        this.batchesRun++;
        await this.runAdmittedBatch(batch, batchId, ctx, outcome, settle);
      } finally {
        if (unsettled > 0) settle(unsettled);
      }
    } finally {
      this.batchSlots.release();
    }

    return outcome;
  }

  private async runAdmittedBatch(
    batch: Article[],
    batchId: string,
    ctx: ProcessingContext,
    outcome: BatchOutcome,
    settle: (count: number) => void
  ): Promise<void> {
    const states: ArticleState[] = [];

    for (const article of batch) {
      try {
        const baseChunks = this.pipeline.chunk(article);
        states.push({ article, baseChunks, output: null, persisted: false, attempts: 0, lastError: null });
      } catch (error) {
        const err = toError(error);
        outcome.failed++;
        outcome.errors.push(this.articleError(article.id, 'chunk', err, 1));
        logger.warn({ articleId: article.id, batchId, error: err.message }, 'Chunking failed');
        settle(1);
      }
    }

    const totalChunks = states.reduce((sum, s) => sum + s.baseChunks.length, 0);
    this.rateLimiter.beginBatch(batchId, totalChunks);

    try {
      const maxAttempts = this.config.retryFailedArticles ? this.config.maxRetries + 1 : 1;
      let pending = states;

      for (let round = 0; round < maxAttempts && pending.length > 0; round++) {
        if (ctx.signal?.aborted) break;
        if (round > 0) {
          outcome.retries += pending.length;
          logger.debug({ batchId, round, articles: pending.length }, 'Retrying failed articles');
        }

        const isFinalRound = round === maxAttempts - 1;
        await Promise.all(pending.map((state) => this.runArticle(state, batchId, ctx)));

        pending = pending.filter((state) => {
          if (state.lastError === null && state.output !== null) {
            outcome.processed.push(state.output);
            outcome.errors.push(...state.output.warnings);
            settle(1);
            return false;
          }
          if (isFinalRound) {
            this.recordFailure(state, batchId, outcome);
            settle(1);
            return false;
          }
          return true;
        });
      }

      // Left over only after cancellation
      for (const state of pending) {
        if (state.attempts === 0) {
          outcome.skipped++;
        } else {
          this.recordFailure(state, batchId, outcome);
        }
        settle(1);
      }
    } finally {
      this.rateLimiter.endBatch(batchId);
    }
  }

  /**
   * One attempt: the pipeline unless a previous attempt already produced
   * chunks, then persistence
   */
  private async runArticle(state: ArticleState, batchId: string, ctx: ProcessingContext): Promise<void> {
    state.attempts++;
    state.lastError = null;

    if (state.output === null) {
      try {
        state.output = await this.pipeline.refineArticle(state.article, state.baseChunks, {
          batchId,
          signal: ctx.signal,
        });
      } catch (error) {
        state.lastError = { stage: 'pipeline', error: toError(error) };
        return;
      }
    }

    if (this.storage && ctx.persist !== false && !state.persisted) {
      try {
        await this.storage.persistChunks(state.article, state.output.chunks);
        state.persisted = true;
      } catch (error) {
        const err = toError(error);
        state.lastError = {
          stage: 'persist',
          error:
            err instanceof StorageError
              ? err
              : new StorageError(err.message, 'persist', { articleId: state.article.id }),
        };
      }
    }
  }

  private recordFailure(state: ArticleState, batchId: string, outcome: BatchOutcome): void {
    const failure = state.lastError;
    if (failure === null) return;
    outcome.failed++;
    outcome.errors.push(this.articleError(state.article.id, failure.stage, failure.error, state.attempts));
    logger.warn(
      { articleId: state.article.id, batchId, stage: failure.stage, attempts: state.attempts, error: failure.error.message },
      'Article failed permanently'
    );
  }

  private articleError(articleId: string, stage: ArticleStage, error: Error, attempts: number): ArticleError {
    return {
      articleId,
      stage,
      code: error instanceof HybridChunkerError ? error.code : ErrorCodes.COORDINATOR_FAILED,
      message: error.message,
      attempts,
      severity: 'error',
    };
  }
}
