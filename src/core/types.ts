/**
 * Core domain types shared by every pipeline stage
 */

/**
 * Immutable pipeline input
 */
export interface Article {
  id: string;
  text: string;
  /** Source site, e.g. "example.com" */
  domain: string;
  language: string;
  title?: string;
  metadata: Record<string, unknown>;
}

/**
 * Everything about an article except its text
 */
export type ArticleMetadata = Omit<Article, 'text'>;

export type RefinementStatus = 'unrefined' | 'refined' | 'refinement_failed';

export type SemanticType = 'intro' | 'body' | 'list' | 'quote' | 'conclusion' | 'code';

export const SEMANTIC_TYPES = ['intro', 'body', 'list', 'quote', 'conclusion', 'code'] as const;

export type RefinementAction = 'keep' | 'merge_prev' | 'merge_next' | 'drop';

export const REFINEMENT_ACTIONS = ['keep', 'merge_prev', 'merge_next', 'drop'] as const;

/**
 * Router factor values, each in [0, 1], higher is better
 */
export interface QualityScores {
  boundary: number;
  size: number;
  complexity: number;
}

/**
 * What the provider said about a refined chunk
 */
export interface RefinementAnnotation {
  action: RefinementAction;
  confidence: number;
  reason: string;
  /** Boundary move requested by the provider, in characters */
  offsetAdjust: number;
  /** Whether the requested move was applied */
  boundaryApplied: boolean;
  boundaryRejectedReason?: 'exceeds_max_offset' | 'violates_chunk_bounds';
  provider: string;
  model: string;
}

/**
 * A contiguous span of an article. `text` is always
 * `article.text.slice(charStart, charEnd)`.
 */
export interface Chunk {
  id: string;
  articleId: string;
  index: number;
  text: string;
  charStart: number;
  charEnd: number;
  wordCount: number;
  tokenEstimate: number;
  /** Characters shared with the previous chunk */
  overlapPrevious: number;
  semanticType: SemanticType;
  /** Set by the router */
  scores: QualityScores | null;
  confidence: number | null;
  /** Why the router sent this chunk to refinement; empty when it did not */
  routingReasons: RoutingReason[];
  refinementStatus: RefinementStatus;
  refinement: RefinementAnnotation | null;
  /** The provider suggested dropping this chunk; its text is kept */
  dropSuggested: boolean;
}

export type RoutingReason =
  | 'boundary_start'
  | 'boundary_end'
  | 'size_deviation'
  | 'structural_complexity'
  | 'low_confidence'
  | 'domain_denied'
  | 'domain_allowed'
  | 'routing_disabled'
  | 'routing_error';

export interface RoutingDecision {
  chunk: Chunk;
  needsLlm: boolean;
  score: number;
  factors: QualityScores;
  reasons: RoutingReason[];
}
