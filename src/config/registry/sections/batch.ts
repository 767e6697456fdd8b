/**
 * Batch Configuration Section
 *
 * Concurrency, backpressure and retry settings of the batch processor
 * and job coordinator.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const batchOptions = {
  batchSize: {
    envKey: 'HYBRID_CHUNKER_BATCH_SIZE',
    defaultValue: 50,
    description: 'Articles per batch.',
    schema: z.number().int().min(1),
    parse: 'int' as const,
  },
  maxConcurrentBatches: {
    envKey: 'HYBRID_CHUNKER_MAX_CONCURRENT_BATCHES',
    defaultValue: 3,
    description: 'Batches processed at the same time.',
    schema: z.number().int().min(1),
    parse: 'int' as const,
  },
  maxConcurrentJobs: {
    envKey: 'HYBRID_CHUNKER_MAX_CONCURRENT_JOBS',
    defaultValue: 1,
    description: 'Jobs the coordinator runs at the same time.',
    schema: z.number().int().min(1),
    parse: 'int' as const,
  },
  maxInFlightArticles: {
    envKey: 'HYBRID_CHUNKER_MAX_IN_FLIGHT_ARTICLES',
    defaultValue: 150,
    description: 'Ceiling of in-flight articles used by the backpressure gate.',
    schema: z.number().int().min(1),
    parse: 'int' as const,
  },
  backpressureThreshold: {
    envKey: 'HYBRID_CHUNKER_BACKPRESSURE_THRESHOLD',
    defaultValue: 0.8,
    description: 'Fraction of maxInFlightArticles above which new batches wait.',
    schema: z.number().gt(0).max(1),
    parse: 'number' as const,
  },
  retryFailedArticles: {
    envKey: 'HYBRID_CHUNKER_RETRY_FAILED_ARTICLES',
    defaultValue: true,
    description: 'Re-run failed articles before recording them as permanent failures.',
    schema: z.boolean(),
    parse: 'boolean' as const,
  },
  maxRetries: {
    envKey: 'HYBRID_CHUNKER_BATCH_MAX_RETRIES',
    defaultValue: 2,
    description: 'Re-runs per failed article.',
    schema: z.number().int().min(0),
    parse: 'int' as const,
  },
  adaptiveBatchSizing: {
    envKey: 'HYBRID_CHUNKER_ADAPTIVE_BATCH_SIZING',
    defaultValue: false,
    description: 'Shrink batches of long articles.',
    schema: z.boolean(),
    parse: 'boolean' as const,
  },
};

export const batchSection: ConfigSectionMeta = {
  name: 'batch',
  description: 'Batch processing and job coordination.',
  options: batchOptions,
};
