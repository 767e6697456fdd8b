/**
 * Hybrid Chunker Factory
 *
 * Wires every pipeline component from one configuration. The rate limiter
 * and circuit breaker are created once here and shared by every concurrent
 * caller; nothing is held in module-level state.
 *
 * Without an explicit storage the bundled SQLite store is opened at
 * `storage.sqlitePath` and closed again by shutdown().
 */

import { createComponentLogger } from '../utils/logger.js';
import { systemClock, sleep as defaultSleep } from '../utils/clock.js';
import { CircuitBreaker, type CircuitBreakerStats } from '../utils/circuit-breaker.js';
import { ConfigReloader, type ReloadResult } from '../utils/config-reload.js';
import { applyOverrides, getConfig, validateConfig, type Config, type ConfigOverrides } from '../config/index.js';
import { BaseChunker } from '../services/chunking/index.js';
import { QualityRouter } from '../services/routing/index.js';
import { LlmRateLimiter, type RateLimiterStats } from '../services/rate-limit/index.js';
import { RefinementClient, createCompletionProvider } from '../services/refinement/index.js';
import {
  ArticlePipeline,
  BatchCoordinator,
  BatchProcessor,
  type BatchResult,
  type JobContext,
  type JobPriority,
  type JobStatusSnapshot,
  type ProcessingContext,
} from '../services/batch/index.js';
import { openDatabase, closeDatabase, type DatabaseDeps } from '../db/connection.js';
import { createArticleRepository } from '../db/repositories/articles.js';
import type { EnvSource } from '../config/registry/index.js';
import type { Article } from './types.js';
import type { Clock, SleepFn } from './interfaces/clock.js';
import type { ICompletionProvider } from './interfaces/completion.js';
import type { IArticleStorage } from './interfaces/storage.js';

const logger = createComponentLogger('factory');

export interface HybridChunkerOptions {
  /** Applied over the given config, and again on every reload */
  overrides?: ConfigOverrides;
  clock?: Clock;
  sleep?: SleepFn;
  /** Jitter source for retry backoff */
  random?: () => number;
  /** Replaces the provider built from `llm.provider`; null disables refinement calls */
  provider?: ICompletionProvider | null;
  storage?: IArticleStorage;
  /** Start the job coordinator right away (default true) */
  autoStart?: boolean;
}

export interface HybridChunkerStatus {
  breaker: CircuitBreakerStats;
  rateLimiter: RateLimiterStats;
  queuedJobs: number;
  runningJobs: number;
  inFlightArticles: number;
  configVersion: number;
}

export interface HybridChunker {
  readonly config: ConfigReloader;
  readonly chunker: BaseChunker;
  readonly router: QualityRouter;
  readonly rateLimiter: LlmRateLimiter;
  readonly breaker: CircuitBreaker;
  readonly refinement: RefinementClient;
  readonly pipeline: ArticlePipeline;
  readonly processor: BatchProcessor;
  readonly coordinator: BatchCoordinator;
  readonly storage: IArticleStorage;

  processBatch(articles: readonly Article[], context?: ProcessingContext): Promise<BatchResult>;
  submitJob(articleIds: readonly string[], priority?: JobPriority, context?: JobContext): string;
  getJobStatus(jobId: string): JobStatusSnapshot;
  getStatus(): HybridChunkerStatus;
  /** Re-read the environment and apply reloadable changes */
  reload(env?: EnvSource): ReloadResult;
  shutdown(): Promise<void>;
}

/**
 * Create a fully wired pipeline. Throws ConfigurationError on invalid
 * configuration.
 */
export function createHybridChunker(
  baseConfig: Config = getConfig(),
  options: HybridChunkerOptions = {}
): HybridChunker {
  const overrides = options.overrides ?? {};
  const config = validateConfig(applyOverrides(baseConfig, overrides));
  const clock = options.clock ?? systemClock;

  const reloader = new ConfigReloader(config, clock);

  const chunker = new BaseChunker(config.chunking);
  const router = new QualityRouter(config.router, config.chunking);
  const rateLimiter = new LlmRateLimiter(config.rateLimit, clock);
  const breaker = new CircuitBreaker({
    name: `llm:${config.llm.provider}`,
    failureThreshold: config.circuitBreaker.failureThreshold,
    resetTimeoutMs: config.circuitBreaker.resetTimeoutMs,
    clock,
  });
  const provider = options.provider !== undefined ? options.provider : createCompletionProvider(config.llm);
  const refinement = new RefinementClient({
    provider,
    rateLimiter,
    breaker,
    config: config.llm,
    sleep: options.sleep ?? defaultSleep,
    random: options.random,
  });

  let database: DatabaseDeps | null = null;
  let storage: IArticleStorage;
  if (options.storage) {
    storage = options.storage;
  } else {
    database = openDatabase({ path: config.storage.sqlitePath, busyTimeoutMs: config.storage.busyTimeoutMs });
    storage = createArticleRepository(database);
  }

  const pipeline = new ArticlePipeline({ chunker, router, refinement, chunking: config.chunking });
  const processor = new BatchProcessor({ pipeline, rateLimiter, config: config.batch, storage, clock });
  const coordinator = new BatchCoordinator({ processor, storage, config: config.batch, clock });

  const unsubscribe = reloader.onReload((result, snapshot) => {
    if (!result.success || result.changes.length === 0) return;
    const next = snapshot.config;
    router.updateConfig(next.router);
    rateLimiter.updateLimits(next.rateLimit);
    breaker.updateSettings(next.circuitBreaker);
    refinement.updateConfig(next.llm);
  });

  if (options.autoStart !== false) {
    coordinator.start();
  }

  logger.info(
    {
      provider: provider?.name ?? 'disabled',
      refinementEnabled: config.llm.refinementEnabled,
      routingEnabled: config.router.routingEnabled,
      storage: database ? 'sqlite' : 'custom',
    },
    'Hybrid chunker created'
  );

  let shutDown = false;

  return {
    config: reloader,
    chunker,
    router,
    rateLimiter,
    breaker,
    refinement,
    pipeline,
    processor,
    coordinator,
    storage,

    processBatch: (articles, context) => processor.processBatch(articles, context),
    submitJob: (articleIds, priority, context) => coordinator.submit(articleIds, priority, context),
    getJobStatus: (jobId) => coordinator.status(jobId),

    getStatus() {
      const jobs = coordinator.getStats();
      return {
        breaker: breaker.getStats(),
        rateLimiter: rateLimiter.getStats(),
        queuedJobs: jobs.queuedJobs,
        runningJobs: jobs.runningJobs,
        inFlightArticles: jobs.inFlightArticles,
        configVersion: reloader.current().version,
      };
    },

    reload: (env) => reloader.reload(env, overrides),

    async shutdown() {
      if (shutDown) return;
      shutDown = true;
      await coordinator.stop();
      unsubscribe();
      if (database) closeDatabase(database);
      logger.info('Hybrid chunker shut down');
    },
  };
}
