/**
 * Refinement client types
 */

import type { ArticleMetadata, Chunk } from '../../core/types.js';
import type { LLMError } from '../../core/errors.js';
import type { RateLimitDenialReason } from '../rate-limit/llm-rate-limiter.js';

export type RefinementOutcomeStatus =
  | 'refined'
  | 'skipped_disabled'
  | 'skipped_rate_limit'
  | 'skipped_circuit_open'
  | 'failed';

export interface RefinementContext {
  article: ArticleMetadata;
  /** Full article text, used to re-slice a moved boundary */
  articleText: string;
  /** Rate limiter batch scope */
  batchId?: string;
  previous?: Chunk;
  next?: Chunk;
  /**
   * Whether the chunk's end may move to `newEnd` without breaking coverage
   * or the word bounds of this chunk and its neighbour
   */
  canMoveBoundaryTo?: (newEnd: number) => boolean;
}

export interface RefinementOutcome {
  /** The refined chunk, or the input chunk when nothing was applied */
  chunk: Chunk;
  status: RefinementOutcomeStatus;
  denialReason?: RateLimitDenialReason;
  /** Set when status is `failed` */
  error?: LLMError;
  /** Epoch ms at which an open circuit admits its next trial */
  retryAt?: number | null;
}
