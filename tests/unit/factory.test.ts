import { describe, it, expect, afterEach } from 'vitest';
import { createHybridChunker, type HybridChunker } from '../../src/core/factory.js';
import { InMemoryArticleStore } from '../../src/core/adapters/memory-storage.adapter.js';
import { defaultConfig } from '../../src/config/index.js';
import { ConfigurationError, ErrorCodes, HybridChunkerError } from '../../src/core/errors.js';
import { ManualClock, instantSleep } from '../fixtures/clock.js';
import { FakeCompletionProvider } from '../fixtures/fake-provider.js';
import { makeArticle, paragraphs } from '../fixtures/articles.js';

const TEXT = paragraphs(150, 150, 150);

describe('createHybridChunker', () => {
  const created: HybridChunker[] = [];

  function create(...args: Parameters<typeof createHybridChunker>): HybridChunker {
    const instance = createHybridChunker(...args);
    created.push(instance);
    return instance;
  }

  afterEach(async () => {
    await Promise.all(created.splice(0).map((instance) => instance.shutdown()));
  });

  it('should refine routed chunks through the injected provider', async () => {
    const provider = new FakeCompletionProvider();
    const store = new InMemoryArticleStore();
    const chunker = create(defaultConfig(), {
      provider,
      storage: store,
      clock: new ManualClock(),
      sleep: instantSleep(),
      overrides: { router: { confidenceMin: 0.95 }, rateLimit: { maxLlmPercentagePerBatch: 1 } },
    });

    const result = await chunker.processBatch([makeArticle('a1', TEXT)]);

    expect(result.chunksRefined).toBe(1);
    expect(provider.calls).toBe(1);
    expect(store.getChunks('a1')?.[0]?.refinementStatus).toBe('refined');
  });

  it('should skip refinement when no provider is configured', async () => {
    const chunker = create(defaultConfig(), {
      storage: new InMemoryArticleStore(),
      overrides: { router: { confidenceMin: 0.95 } },
    });

    const result = await chunker.processBatch([makeArticle('a1', TEXT)]);

    expect(result.chunksRefined).toBe(0);
    expect(result.refinementsDeniedByRateLimit).toBe(0);
    expect(chunker.refinement.isEnabled()).toBe(false);
  });

  it('should run submitted jobs against its storage', async () => {
    const store = new InMemoryArticleStore([makeArticle('a1', TEXT), makeArticle('a2', TEXT)]);
    const chunker = create(defaultConfig(), { storage: store });

    const jobId = chunker.submitJob(['a1', 'a2'], 'high');
    await chunker.coordinator.waitForJob(jobId);

    const status = chunker.getJobStatus(jobId);
    expect(status.status).toBe('completed');
    expect(status.result?.articlesProcessed).toBe(2);
    expect(store.persistedArticleIds().sort()).toEqual(['a1', 'a2']);
  });

  it('should report component status', () => {
    const chunker = create(defaultConfig(), { storage: new InMemoryArticleStore(), autoStart: false });

    const status = chunker.getStatus();

    expect(status.breaker.name).toBe('llm:disabled');
    expect(status.breaker.state).toBe('CLOSED');
    expect(status).toMatchObject({ queuedJobs: 0, runningJobs: 0, inFlightArticles: 0, configVersion: 1 });
    expect(chunker.coordinator.isRunning()).toBe(false);
  });

  it('should push reloaded settings into live components', async () => {
    const provider = new FakeCompletionProvider();
    const chunker = create(defaultConfig(), { provider, storage: new InMemoryArticleStore() });

    const reload = chunker.reload({
      HYBRID_CHUNKER_CONFIDENCE_MIN: '0.95',
      HYBRID_CHUNKER_MAX_LLM_PERCENTAGE_PER_BATCH: '1',
      HYBRID_CHUNKER_CB_FAILURE_THRESHOLD: '1',
    });
    expect(reload.success).toBe(true);
    expect(chunker.getStatus().configVersion).toBe(2);

    const result = await chunker.processBatch([makeArticle('a1', TEXT)]);
    expect(result.chunksRefined).toBe(1);

    chunker.breaker.onFailure(new Error('provider down'));
    expect(chunker.breaker.getState()).toBe('OPEN');
  });

  it('should reapply code overrides on reload', () => {
    const chunker = create(defaultConfig(), {
      storage: new InMemoryArticleStore(),
      overrides: { router: { confidenceMin: 0.95 } },
    });

    const reload = chunker.reload({ HYBRID_CHUNKER_CONFIDENCE_MIN: '0.2' });

    expect(reload.changes).toEqual([]);
    expect(chunker.config.current().config.router.confidenceMin).toBe(0.95);
  });

  it('should reject invalid configuration', () => {
    expect(() => createHybridChunker(defaultConfig(), { overrides: { router: { confidenceMin: 2 } } })).toThrow(
      ConfigurationError
    );
  });

  it('should reject overrides outside the option schemas', () => {
    const error = (() => {
      try {
        createHybridChunker(defaultConfig(), {
          storage: new InMemoryArticleStore(),
          overrides: { batch: { batchSize: 0 }, chunking: { maxArticleChars: -1 } },
        });
      } catch (e) {
        return e;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ code: ErrorCodes.INVALID_CONFIG });
    if (!(error instanceof ConfigurationError)) return;
    expect(error.issues.map((issue) => issue.split(':')[0])).toEqual(['chunking.maxArticleChars', 'batch.batchSize']);
  });

  it('should open the bundled SQLite store by default', async () => {
    const chunker = create(defaultConfig(), { autoStart: false });

    expect(await chunker.storage.loadArticles({ ids: ['a1'] })).toEqual([]);
  });

  it('should process a batch on the bundled SQLite store', async () => {
    const chunker = create(defaultConfig(), { provider: null });
    const article = makeArticle('x1', TEXT);

    const result = await chunker.processBatch([article]);

    expect(result).toMatchObject({ articlesProcessed: 1, articlesFailed: 0, errors: [] });
    expect(await chunker.storage.loadArticles({ ids: ['x1'] })).toEqual([article]);

    const jobId = chunker.submitJob(['x1']);
    const snapshot = await chunker.coordinator.waitForJob(jobId);
    expect(snapshot.result?.articlesProcessed).toBe(1);
  });

  it('should shut down once and refuse new jobs', async () => {
    const chunker = create(defaultConfig(), { storage: new InMemoryArticleStore() });

    await chunker.shutdown();
    await chunker.shutdown();

    expect(chunker.coordinator.isRunning()).toBe(false);
    let code: string | undefined;
    try {
      chunker.submitJob(['a1']);
    } catch (error) {
      if (error instanceof HybridChunkerError) code = error.code;
    }
    expect(code).toBe(ErrorCodes.COORDINATOR_STOPPED);
  });
});
