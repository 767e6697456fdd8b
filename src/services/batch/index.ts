/**
 * Batch processing and job coordination
 */

export { ArticlePipeline } from './article-pipeline.js';
export type { ArticlePipelineOptions, ArticleResult, ArticleRunOptions } from './article-pipeline.js';
export { BatchProcessor, LONG_ARTICLE_CHARS, MEDIUM_ARTICLE_CHARS } from './processor.js';
export type { BatchProcessorOptions, BatchProcessorStats } from './processor.js';
export { BatchCoordinator } from './coordinator.js';
export type {
  BatchCoordinatorOptions,
  CoordinatorEventMap,
  CoordinatorEventName,
  CoordinatorStats,
} from './coordinator.js';
export { PRIORITY_RANK, TERMINAL_JOB_STATUSES } from './types.js';
export type {
  ArticleError,
  ArticleOutput,
  ArticleStage,
  BatchJob,
  BatchResult,
  JobContext,
  JobFailure,
  JobPriority,
  JobStatus,
  JobStatusSnapshot,
  ProcessingContext,
} from './types.js';
