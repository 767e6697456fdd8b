/**
 * Batch Coordinator
 *
 * Owns the job queue. Jobs are ordered by priority (urgent > high >
 * normal > low) and, within a priority, by submission order. Up to
 * `maxConcurrentJobs` jobs run at once; each loads its articles from
 * storage and hands them to the batch processor.
 *
 * Job states: queued -> running -> completed | failed | cancelled.
 * A job fails only when the coordinator cannot proceed at all (no storage,
 * load error, nothing loaded). Article failures keep the job completed with
 * the errors attached to its result.
 *
 * Terminal jobs stay in memory until status() has returned their terminal
 * snapshot once.
 */

import { v4 as uuidv4 } from 'uuid';
import { EventEmitter } from 'events';
import { createComponentLogger } from '../../utils/logger.js';
import { PriorityQueue } from '../../utils/priority-queue.js';
import { systemClock } from '../../utils/clock.js';
import {
  CoordinatorError,
  ErrorCodes,
  HybridChunkerError,
  createJobNotFoundError,
  createValidationError,
  toError,
} from '../../core/errors.js';
import type { Article } from '../../core/types.js';
import type { Clock } from '../../core/interfaces/clock.js';
import type { IArticleStorage } from '../../core/interfaces/storage.js';
import type { BatchConfig } from '../../config/index.js';
import type { BatchProcessor } from './processor.js';
import {
  PRIORITY_RANK,
  TERMINAL_JOB_STATUSES,
  type ArticleError,
  type BatchJob,
  type JobContext,
  type JobPriority,
  type JobStatusSnapshot,
} from './types.js';

const logger = createComponentLogger('batch-coordinator');

export interface CoordinatorEventMap {
  'job:created': { job: JobStatusSnapshot };
  'job:started': { job: JobStatusSnapshot };
  'job:completed': { job: JobStatusSnapshot };
  'job:failed': { job: JobStatusSnapshot };
  'job:cancelled': { job: JobStatusSnapshot };
}

export type CoordinatorEventName = keyof CoordinatorEventMap;

export interface BatchCoordinatorOptions {
  processor: BatchProcessor;
  storage?: IArticleStorage;
  config: Pick<BatchConfig, 'maxConcurrentJobs'>;
  clock?: Clock;
}

export interface CoordinatorStats {
  jobsCreated: number;
  jobsCompleted: number;
  jobsFailed: number;
  jobsCancelled: number;
  articlesProcessed: number;
  articlesFailed: number;
  queuedJobs: number;
  runningJobs: number;
  inFlightArticles: number;
  isRunning: boolean;
}

interface RunningJob {
  controller: AbortController;
  done: Promise<void>;
}

function compareJobs(a: BatchJob, b: BatchJob): number {
  return PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority] || a.sequence - b.sequence;
}

function isJobPriority(value: string): value is JobPriority {
  return Object.prototype.hasOwnProperty.call(PRIORITY_RANK, value);
}

export class BatchCoordinator extends EventEmitter {
  private readonly processor: BatchProcessor;
  private readonly storage: IArticleStorage | undefined;
  private readonly maxConcurrentJobs: number;
  private readonly clock: Clock;

  private readonly jobs = new Map<string, BatchJob>();
  private readonly queue = new PriorityQueue<BatchJob>(compareJobs);
  private readonly running = new Map<string, RunningJob>();
  private readonly jobWaiters = new Map<string, Array<(snapshot: JobStatusSnapshot) => void>>();
  private idleWaiters: Array<() => void> = [];

  private sequence = 0;
  private started = false;
  private stopped = false;

  private stats = {
    jobsCreated: 0,
    jobsCompleted: 0,
    jobsFailed: 0,
    jobsCancelled: 0,
    articlesProcessed: 0,
    articlesFailed: 0,
  };

  constructor(options: BatchCoordinatorOptions) {
    super();
    this.processor = options.processor;
    this.storage = options.storage;
    this.maxConcurrentJobs = options.config.maxConcurrentJobs;
    this.clock = options.clock ?? systemClock;
  }

  override emit<K extends CoordinatorEventName>(event: K, data: CoordinatorEventMap[K]): boolean {
    return super.emit(event, data);
  }

  override on<K extends CoordinatorEventName>(event: K, listener: (data: CoordinatorEventMap[K]) => void): this {
    return super.on(event, listener);
  }

  // ===========================================================================
  // LIFECYCLE
  // ===========================================================================

  start(): void {
    if (this.stopped) {
      throw new CoordinatorError('Coordinator has been stopped', ErrorCodes.COORDINATOR_STOPPED);
    }
    if (this.started) return;
    this.started = true;
    logger.info({ maxConcurrentJobs: this.maxConcurrentJobs }, 'Coordinator started');
    this.pump();
  }

  /**
   * Stop accepting jobs, cancel queued ones and wait for running jobs
   */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    this.started = false;

    let job = this.queue.pop();
    while (job) {
      this.finishCancelled(job);
      job = this.queue.pop();
    }

    await Promise.all([...this.running.values()].map((r) => r.done));
    this.notifyIdle();
    logger.info(this.getStats(), 'Coordinator stopped');
  }

  /**
   * Run the queue dry, then stop
   */
  async drain(): Promise<void> {
    if (this.stopped) return;
    this.start();
    if (!this.isIdle()) {
      await new Promise<void>((resolve) => {
        this.idleWaiters.push(resolve);
      });
    }
    await this.stop();
  }

  isRunning(): boolean {
    return this.started;
  }

  // ===========================================================================
  // JOBS
  // ===========================================================================

  submit(articleIds: readonly string[], priority: JobPriority = 'normal', context: JobContext = {}): string {
    if (this.stopped) {
      throw new CoordinatorError('Coordinator is not accepting jobs', ErrorCodes.COORDINATOR_STOPPED);
    }
    if (!isJobPriority(priority)) {
      throw createValidationError('priority', `unknown priority "${String(priority)}"`, 'use urgent, high, normal or low');
    }

    const job: BatchJob = {
      id: uuidv4(),
      articleIds: [...new Set(articleIds)],
      priority,
      status: 'queued',
      retryCount: 0,
      errors: [],
      result: null,
      error: null,
      context,
      sequence: this.sequence++,
      createdAt: this.clock.now(),
      startedAt: null,
      completedAt: null,
    };

    this.jobs.set(job.id, job);
    this.queue.push(job);
    this.stats.jobsCreated++;

    logger.info(
      { jobId: job.id, priority, articles: job.articleIds.length, requestedBy: context.requestedBy },
      'Job queued'
    );
    this.emit('job:created', { job: this.snapshot(job) });
    this.pump();

    return job.id;
  }

  /**
   * Split a long id list into jobs of at most `jobSize` articles
   */
  submitBatchJobs(
    articleIds: readonly string[],
    jobSize: number,
    priority: JobPriority = 'normal',
    context: JobContext = {}
  ): string[] {
    if (!Number.isInteger(jobSize) || jobSize < 1) {
      throw createValidationError('jobSize', 'must be a positive integer');
    }
    const ids: string[] = [];
    for (let i = 0; i < articleIds.length; i += jobSize) {
      ids.push(this.submit(articleIds.slice(i, i + jobSize), priority, context));
    }
    return ids;
  }

  /**
   * Current snapshot. A terminal snapshot is returned once, then the job
   * is evicted.
   */
  status(jobId: string): JobStatusSnapshot {
    const job = this.jobs.get(jobId);
    if (!job) throw createJobNotFoundError(jobId);

    const snapshot = this.snapshot(job);
    if (TERMINAL_JOB_STATUSES.has(job.status)) {
      this.jobs.delete(jobId);
    }
    return snapshot;
  }

  /**
   * Cancel a job. Queued jobs end at once; running jobs stop admitting new
   * article work and end `cancelled` when in-flight work finishes.
   * Returns false when the job already finished.
   */
  cancel(jobId: string): boolean {
    const job = this.jobs.get(jobId);
    if (!job) throw createJobNotFoundError(jobId);

    if (job.status === 'queued') {
      this.queue.remove((queued) => queued.id === jobId);
      this.finishCancelled(job);
      this.pump();
      return true;
    }

    const running = this.running.get(jobId);
    if (job.status === 'running' && running) {
      logger.info({ jobId }, 'Cancelling running job');
      running.controller.abort();
      return true;
    }

    return false;
  }

  /**
   * Resolve with the job's terminal snapshot (without evicting it)
   */
  waitForJob(jobId: string): Promise<JobStatusSnapshot> {
    const job = this.jobs.get(jobId);
    if (!job) return Promise.reject(createJobNotFoundError(jobId));
    if (TERMINAL_JOB_STATUSES.has(job.status)) return Promise.resolve(this.snapshot(job));

    return new Promise((resolve) => {
      const waiters = this.jobWaiters.get(jobId) ?? [];
      waiters.push(resolve);
      this.jobWaiters.set(jobId, waiters);
    });
  }

  getStats(): CoordinatorStats {
    return {
      ...this.stats,
      queuedJobs: this.queue.size,
      runningJobs: this.running.size,
      inFlightArticles: this.processor.getInFlightArticles(),
      isRunning: this.started,
    };
  }

  // ===========================================================================
  // SCHEDULING
  // ===========================================================================

  private pump(): void {
    while (this.started && this.running.size < this.maxConcurrentJobs) {
      const job = this.queue.pop();
      if (!job) break;

      const controller = new AbortController();
      const done = this.runJob(job, controller.signal);
      this.running.set(job.id, { controller, done });
    }
    if (this.isIdle()) this.notifyIdle();
  }

  private async runJob(job: BatchJob, signal: AbortSignal): Promise<void> {
    job.status = 'running';
    job.startedAt = this.clock.now();
    logger.info({ jobId: job.id, priority: job.priority }, 'Job started');
    this.emit('job:started', { job: this.snapshot(job) });

    try {
      const { articles, warnings } = await this.loadArticles(job);
      const result = await this.processor.processBatch(articles, { runId: job.id, signal });
      result.errors.unshift(...warnings);

      job.result = result;
      job.errors = result.errors;
      job.retryCount = result.articleRetries;
      job.status = result.cancelled ? 'cancelled' : 'completed';
      this.stats.articlesProcessed += result.articlesProcessed;
      this.stats.articlesFailed += result.articlesFailed;
    } catch (error) {
      const err = toError(error);
      job.status = 'failed';
      job.error = {
        code: err instanceof HybridChunkerError ? err.code : ErrorCodes.COORDINATOR_FAILED,
        message: err.message,
      };
      logger.error({ jobId: job.id, error: err.message }, 'Job failed');
    } finally {
      job.completedAt = this.clock.now();
      this.running.delete(job.id);
    }

    if (job.status === 'completed') {
      this.stats.jobsCompleted++;
      logger.info(
        {
          jobId: job.id,
          processed: job.result?.articlesProcessed,
          failed: job.result?.articlesFailed,
          durationMs: job.completedAt - (job.startedAt ?? job.completedAt),
        },
        'Job completed'
      );
      this.settle(job, 'job:completed');
    } else if (job.status === 'cancelled') {
      this.stats.jobsCancelled++;
      logger.info({ jobId: job.id }, 'Job cancelled');
      this.settle(job, 'job:cancelled');
    } else {
      this.stats.jobsFailed++;
      this.settle(job, 'job:failed');
    }

    this.pump();
  }

  private async loadArticles(job: BatchJob): Promise<{ articles: Article[]; warnings: ArticleError[] }> {
    if (!this.storage) {
      throw new CoordinatorError('No article storage configured', ErrorCodes.COORDINATOR_FAILED, {
        jobId: job.id,
      });
    }

    let loaded: Article[];
    try {
      loaded = await this.storage.loadArticles({ ids: job.articleIds });
    } catch (error) {
      throw new CoordinatorError(
        `Failed to load articles: ${toError(error).message}`,
        ErrorCodes.COORDINATOR_FAILED,
        { jobId: job.id }
      );
    }

    const byId = new Map(loaded.map((article) => [article.id, article]));
    const articles: Article[] = [];
    const warnings: ArticleError[] = [];
    for (const id of job.articleIds) {
      const article = byId.get(id);
      if (article) {
        articles.push(article);
      } else {
        warnings.push({
          articleId: id,
          stage: 'load',
          code: ErrorCodes.STORAGE_LOAD_FAILED,
          message: `Article not found: ${id}`,
          attempts: 1,
          severity: 'warning',
        });
      }
    }

    if (articles.length === 0) {
      throw new CoordinatorError('No articles could be loaded', ErrorCodes.COORDINATOR_FAILED, {
        jobId: job.id,
        requested: job.articleIds.length,
      });
    }

    return { articles, warnings };
  }

  private finishCancelled(job: BatchJob): void {
    job.status = 'cancelled';
    job.completedAt = this.clock.now();
    this.stats.jobsCancelled++;
    logger.info({ jobId: job.id }, 'Queued job cancelled');
    this.settle(job, 'job:cancelled');
  }

  private settle(job: BatchJob, event: 'job:completed' | 'job:failed' | 'job:cancelled'): void {
    const snapshot = this.snapshot(job);
    const waiters = this.jobWaiters.get(job.id) ?? [];
    this.jobWaiters.delete(job.id);
    for (const resolve of waiters) resolve(snapshot);
    this.emit(event, { job: snapshot });
  }

  private isIdle(): boolean {
    return this.queue.isEmpty() && this.running.size === 0;
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private snapshot(job: BatchJob): JobStatusSnapshot {
    return {
      jobId: job.id,
      status: job.status,
      priority: job.priority,
      articleCount: job.articleIds.length,
      retryCount: job.retryCount,
      createdAt: job.createdAt,
      startedAt: job.startedAt,
      completedAt: job.completedAt,
      result: job.result,
      error: job.error,
    };
  }
}
