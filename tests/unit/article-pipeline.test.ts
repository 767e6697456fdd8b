import { describe, it, expect, beforeEach } from 'vitest';
import { ArticlePipeline } from '../../src/services/batch/article-pipeline.js';
import { BaseChunker, reconstructText } from '../../src/services/chunking/base-chunker.js';
import { QualityRouter } from '../../src/services/routing/quality-router.js';
import { LlmRateLimiter } from '../../src/services/rate-limit/llm-rate-limiter.js';
import { RefinementClient } from '../../src/services/refinement/refinement-client.js';
import { CircuitBreaker } from '../../src/utils/circuit-breaker.js';
import {
  defaultConfig,
  type ChunkingConfig,
  type RateLimitConfig,
  type RouterConfig,
} from '../../src/config/index.js';
import { ManualClock, instantSleep } from '../fixtures/clock.js';
import { FakeCompletionProvider, httpError, refinementReply, type ScriptedReply } from '../fixtures/fake-provider.js';
import { makeArticle, paragraphs } from '../fixtures/articles.js';
import type { Article, Chunk } from '../../src/core/types.js';

const config = defaultConfig();

/** Chunker settings that cut every 150-word paragraph into its own chunk */
const SMALL_CHUNKS: ChunkingConfig = {
  ...config.chunking,
  targetWords: 150,
  minWords: 100,
  maxWords: 200,
  overlapWords: 20,
  minChars: 0,
};

interface HarnessOptions {
  script?: ScriptedReply[];
  router?: Partial<RouterConfig>;
  rateLimit?: Partial<RateLimitConfig>;
  bounds?: { minWords: number; maxWords: number };
}

interface Harness {
  pipeline: ArticlePipeline;
  provider: FakeCompletionProvider;
  breaker: CircuitBreaker;
}

describe('ArticlePipeline', () => {
  let clock: ManualClock;

  beforeEach(() => {
    clock = new ManualClock();
  });

  function setup(options: HarnessOptions = {}): Harness {
    const provider = new FakeCompletionProvider(options.script ?? []);
    const breaker = new CircuitBreaker({ name: 'llm:fake', failureThreshold: 5, resetTimeoutMs: 60_000, clock });
    const refinement = new RefinementClient({
      provider,
      rateLimiter: new LlmRateLimiter({ ...config.rateLimit, ...options.rateLimit }, clock),
      breaker,
      config: config.llm,
      sleep: instantSleep(),
    });
    const pipeline = new ArticlePipeline({
      chunker: new BaseChunker(config.chunking),
      router: new QualityRouter({ ...config.router, confidenceMin: 0.95, ...options.router }, config.chunking),
      refinement,
      chunking: options.bounds ?? config.chunking,
    });
    return { pipeline, provider, breaker };
  }

  function threeChunkArticle(): { article: Article; chunks: Chunk[] } {
    const article = makeArticle('a1', paragraphs(250, 250, 250, 250, 250));
    return { article, chunks: new BaseChunker(config.chunking).chunkArticle(article) };
  }

  function smallChunkArticle(): { article: Article; chunks: Chunk[] } {
    const article = makeArticle('a2', paragraphs(150, 150, 150));
    return { article, chunks: new BaseChunker(SMALL_CHUNKS).chunkArticle(article) };
  }

  describe('routing', () => {
    it('should leave well-scored chunks alone', async () => {
      const { pipeline, provider } = setup({ router: { confidenceMin: 0.6 } });
      const { article, chunks } = threeChunkArticle();

      const result = await pipeline.refineArticle(article, chunks);

      expect(result.routed).toBe(0);
      expect(result.refined).toBe(0);
      expect(provider.calls).toBe(0);
      expect(result.chunks.map((c) => c.refinementStatus)).toEqual(['unrefined', 'unrefined', 'unrefined']);
      expect(result.chunks.map((c) => c.confidence)).toEqual([
        expect.closeTo(0.85, 10),
        expect.closeTo(0.85, 10),
        expect.closeTo(0.775, 10),
      ]);
    });

    it('should refine every routed chunk', async () => {
      const { pipeline, provider } = setup();
      const { article, chunks } = threeChunkArticle();

      const result = await pipeline.refineArticle(article, chunks, { batchId: 'run:0' });

      expect(result).toMatchObject({
        articleId: 'a1',
        routed: 3,
        refined: 3,
        deniedByRateLimit: 0,
        circuitOpenSkips: 0,
        refinementFailures: 0,
        warnings: [],
      });
      expect(provider.calls).toBe(3);
      expect(result.chunks.map((c) => c.refinementStatus)).toEqual(['refined', 'refined', 'refined']);
      expect(chunks[0]?.refinementStatus).toBe('unrefined');
    });

    it('should chunk through the configured chunker', () => {
      const { pipeline } = setup();
      const { article, chunks } = threeChunkArticle();

      expect(pipeline.chunk(article)).toEqual(chunks);
    });
  });

  describe('boundary moves', () => {
    it('should shift the next chunk when a boundary moves', async () => {
      const { pipeline } = setup({
        script: [refinementReply({ offset_adjust: -2 }), refinementReply(), refinementReply()],
      });
      const { article, chunks } = threeChunkArticle();
      const originalEnd = chunks[0]?.charEnd ?? 0;

      const result = await pipeline.refineArticle(article, chunks);

      expect(result.chunks[0]?.charEnd).toBe(originalEnd - 2);
      expect(result.chunks[0]?.refinement?.boundaryApplied).toBe(true);
      expect(result.chunks[1]?.charStart).toBe(originalEnd - 2);
      expect(result.chunks[1]?.text.startsWith('\n\n')).toBe(true);
      expect(result.chunks[1]?.overlapPrevious).toBe(0);
      expect(reconstructText(result.chunks)).toBe(article.text);
    });

    it('should never move the end of the last chunk', async () => {
      const { pipeline } = setup({
        script: [refinementReply(), refinementReply(), refinementReply({ offset_adjust: -2 })],
      });
      const { article, chunks } = threeChunkArticle();

      const result = await pipeline.refineArticle(article, chunks);

      expect(result.chunks[2]?.charEnd).toBe(article.text.length);
      expect(result.chunks[2]?.refinement?.boundaryRejectedReason).toBe('violates_chunk_bounds');
      expect(result.chunks[2]?.refinementStatus).toBe('refined');
    });

    it('should reject a move that pushes a chunk over maxWords', async () => {
      const { pipeline } = setup({
        script: [refinementReply({ offset_adjust: 50 })],
        bounds: { minWords: 200, maxWords: 500 },
      });
      const { article, chunks } = threeChunkArticle();

      const result = await pipeline.refineArticle(article, chunks);

      expect(result.chunks[0]?.charEnd).toBe(chunks[0]?.charEnd);
      expect(result.chunks[0]?.refinement?.boundaryRejectedReason).toBe('violates_chunk_bounds');
    });
  });

  describe('merges', () => {
    it('should merge a chunk into the next one', async () => {
      const { pipeline } = setup({ script: [refinementReply({ action: 'merge_next', semantic_type: 'intro' })] });
      const { article, chunks } = smallChunkArticle();
      expect(chunks.map((c) => c.wordCount)).toEqual([150, 150, 150]);

      const result = await pipeline.refineArticle(article, chunks);

      expect(result.chunks).toHaveLength(2);
      expect(result.chunks[0]).toMatchObject({
        id: chunks[0]?.id,
        index: 0,
        charStart: 0,
        charEnd: chunks[1]?.charEnd,
        wordCount: 300,
        semanticType: 'intro',
      });
      expect(result.chunks[0]?.refinement?.action).toBe('merge_next');
      expect(result.chunks[1]).toMatchObject({ id: chunks[2]?.id, index: 1 });
      expect(reconstructText(result.chunks)).toBe(article.text);
    });

    it('should merge a chunk into the previous one', async () => {
      const { pipeline } = setup({
        script: [refinementReply(), refinementReply(), refinementReply({ action: 'merge_prev' })],
      });
      const { article, chunks } = smallChunkArticle();

      const result = await pipeline.refineArticle(article, chunks);

      expect(result.chunks).toHaveLength(2);
      expect(result.chunks[1]).toMatchObject({
        id: chunks[1]?.id,
        index: 1,
        charStart: chunks[1]?.charStart,
        charEnd: article.text.length,
        wordCount: 300,
      });
      expect(result.chunks[1]?.refinement?.action).toBe('merge_prev');
    });

    it('should skip a merge that would exceed maxWords', async () => {
      const { pipeline } = setup({
        script: [refinementReply({ action: 'merge_next' })],
        bounds: { minWords: 100, maxWords: 250 },
      });
      const { article, chunks } = smallChunkArticle();

      const result = await pipeline.refineArticle(article, chunks);

      expect(result.chunks).toHaveLength(3);
      expect(result.chunks[0]?.refinement?.action).toBe('merge_next');
      expect(result.chunks[0]?.charEnd).toBe(chunks[0]?.charEnd);
    });
  });

  describe('degraded refinement', () => {
    it('should count chunks the rate limiter turned away', async () => {
      const { pipeline, provider } = setup({ rateLimit: { maxLlmCallsPerMin: 1 } });
      const { article, chunks } = threeChunkArticle();

      const result = await pipeline.refineArticle(article, chunks);

      expect(result.refined).toBe(1);
      expect(result.deniedByRateLimit).toBe(2);
      expect(provider.calls).toBe(1);
      expect(result.chunks.map((c) => c.refinementStatus)).toEqual(['refined', 'unrefined', 'unrefined']);
    });

    it('should count chunks skipped by an open circuit', async () => {
      const { pipeline, breaker, provider } = setup();
      for (let i = 0; i < 5; i++) breaker.onFailure(new Error('down'));
      const { article, chunks } = threeChunkArticle();

      const result = await pipeline.refineArticle(article, chunks);

      expect(result.circuitOpenSkips).toBe(3);
      expect(provider.calls).toBe(0);
    });

    it('should keep the base chunk and warn on a fatal provider error', async () => {
      const { pipeline } = setup({ script: [httpError(401, 'invalid api key')] });
      const { article, chunks } = threeChunkArticle();

      const result = await pipeline.refineArticle(article, chunks);

      expect(result.refinementFailures).toBe(1);
      expect(result.refined).toBe(2);
      expect(result.chunks[0]?.refinementStatus).toBe('refinement_failed');
      expect(result.chunks[0]?.text).toBe(chunks[0]?.text);
      expect(result.warnings).toEqual([
        {
          articleId: 'a1',
          stage: 'refine',
          code: 'E4001',
          message: 'Provider rejected credentials: invalid api key',
          attempts: 1,
          severity: 'warning',
        },
      ]);
    });

    it('should stop refining once the signal is aborted', async () => {
      const { pipeline, provider } = setup();
      const { article, chunks } = threeChunkArticle();
      const controller = new AbortController();
      controller.abort();

      const result = await pipeline.refineArticle(article, chunks, { signal: controller.signal });

      expect(result.routed).toBe(3);
      expect(result.refined).toBe(0);
      expect(provider.calls).toBe(0);
      expect(result.chunks.map((c) => c.charEnd)).toEqual(chunks.map((c) => c.charEnd));
    });
  });
});
