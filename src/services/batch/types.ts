/**
 * Batch processing and job coordination types
 */

import type { Chunk } from '../../core/types.js';

// =============================================================================
// JOBS
// =============================================================================

export type JobPriority = 'urgent' | 'high' | 'normal' | 'low';

/** Lower rank runs first */
export const PRIORITY_RANK: Record<JobPriority, number> = {
  urgent: 1,
  high: 2,
  normal: 3,
  low: 4,
};

export type JobStatus = 'queued' | 'running' | 'completed' | 'failed' | 'cancelled';

export const TERMINAL_JOB_STATUSES: ReadonlySet<JobStatus> = new Set(['completed', 'failed', 'cancelled']);

/**
 * Caller-supplied job context, carried through to logs
 */
export interface JobContext {
  requestedBy?: string;
  metadata?: Record<string, unknown>;
}

export interface JobFailure {
  code: string;
  message: string;
}

export interface BatchJob {
  id: string;
  articleIds: string[];
  priority: JobPriority;
  status: JobStatus;
  /** Article-level retries performed while the job ran */
  retryCount: number;
  errors: ArticleError[];
  result: BatchResult | null;
  error: JobFailure | null;
  context: JobContext;
  /** Submission order, breaks ties within a priority */
  sequence: number;
  createdAt: number;
  startedAt: number | null;
  completedAt: number | null;
}

/**
 * Read-only view of a job handed to callers
 */
export interface JobStatusSnapshot {
  jobId: string;
  status: JobStatus;
  priority: JobPriority;
  articleCount: number;
  retryCount: number;
  createdAt: number;
  startedAt: number | null;
  completedAt: number | null;
  result: BatchResult | null;
  error: JobFailure | null;
}

// =============================================================================
// BATCH RESULTS
// =============================================================================

export type ArticleStage = 'load' | 'chunk' | 'pipeline' | 'refine' | 'persist';

export interface ArticleError {
  articleId: string;
  stage: ArticleStage;
  code: string;
  message: string;
  /** Processing attempts made for the article */
  attempts: number;
  /** Warnings never fail the article */
  severity: 'error' | 'warning';
}

export interface ArticleOutput {
  articleId: string;
  chunks: Chunk[];
}

export interface BatchResult {
  articlesProcessed: number;
  articlesFailed: number;
  /** Articles never started because the run was cancelled */
  articlesSkipped: number;
  chunksCreated: number;
  chunksRefined: number;
  refinementsDeniedByRateLimit: number;
  circuitOpenSkips: number;
  refinementFailures: number;
  articleRetries: number;
  batches: number;
  processingTimeMs: number;
  cancelled: boolean;
  articles: ArticleOutput[];
  errors: ArticleError[];
}

export interface ProcessingContext {
  /** Prefix for rate limiter batch ids */
  runId?: string;
  /** Stops admission of new per-article work when aborted */
  signal?: AbortSignal;
  /** Write final chunks to storage when one is configured (default true) */
  persist?: boolean;
}
