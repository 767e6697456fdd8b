/**
 * Quality Router
 *
 * Scores a base chunk and decides whether it is worth an LLM refinement.
 * score = boundaryWeight * boundary + sizeWeight * size + complexityWeight * complexity
 *
 * A chunk is routed when its score is strictly below `confidenceMin`.
 * Scoring failures never propagate: they resolve to "keep".
 */

import { RoutingError, toError } from '../../core/errors.js';
import { createComponentLogger } from '../../utils/logger.js';
import { scoreBoundary, scoreComplexity, scoreSize, type BoundarySignal } from './signals.js';
import type { Chunk, QualityScores, RoutingDecision, RoutingReason } from '../../core/types.js';
import type { ChunkingConfig, RouterConfig } from '../../config/index.js';

const logger = createComponentLogger('router');

/** Factors below this are listed as a reason */
const FACTOR_REASON_THRESHOLD = 0.7;

export interface RoutingContext {
  domain: string;
  /** Number of chunks in the article, to recognise the last one */
  totalChunks: number;
}

type SizeSettings = Pick<ChunkingConfig, 'targetWords' | 'minWords' | 'maxWords'>;

export class QualityRouter {
  private config: RouterConfig;
  private readonly size: SizeSettings;

  constructor(config: RouterConfig, size: SizeSettings) {
    this.config = { ...config };
    this.size = { targetWords: size.targetWords, minWords: size.minWords, maxWords: size.maxWords };
  }

  /**
   * Swap in a reloaded router section
   */
  updateConfig(config: RouterConfig): void {
    this.config = { ...config };
  }

  getConfig(): RouterConfig {
    return { ...this.config };
  }

  /**
   * Compute the three quality factors of a chunk
   */
  computeFactors(chunk: Chunk, context: RoutingContext): QualityScores {
    const boundary = this.boundarySignal(chunk, context);
    return {
      boundary: boundary.score,
      size: scoreSize(chunk.wordCount, this.size),
      complexity: scoreComplexity(chunk.text),
    };
  }

  /**
   * Weighted confidence for a set of factors.
   *
   * @throws RoutingError when a factor is not a number in [0, 1]
   */
  scoreFactors(factors: QualityScores): number {
    for (const [name, value] of Object.entries(factors)) {
      if (!Number.isFinite(value) || value < 0 || value > 1) {
        throw new RoutingError(`Quality factor ${name} out of range`, { factor: name, value });
      }
    }
    const { boundaryWeight, sizeWeight, complexityWeight } = this.config;
    return (
      boundaryWeight * factors.boundary + sizeWeight * factors.size + complexityWeight * factors.complexity
    );
  }

  route(chunk: Chunk, context: RoutingContext): RoutingDecision {
    const config = this.config;

    let factors: QualityScores;
    let score: number;
    try {
      factors = this.computeFactors(chunk, context);
      score = this.scoreFactors(factors);
    } catch (error) {
      logger.warn(
        { chunkId: chunk.id, articleId: chunk.articleId, error: toError(error).message },
        'Routing failed, keeping base chunk'
      );
      return this.decide(chunk, false, 1, { boundary: 1, size: 1, complexity: 1 }, ['routing_error']);
    }

    const reasons = this.factorReasons(chunk, context, factors);

    if (!config.routingEnabled) {
      return this.decide(chunk, false, score, factors, ['routing_disabled']);
    }
    if (config.llmDenyDomains.includes(context.domain)) {
      return this.decide(chunk, false, score, factors, ['domain_denied']);
    }
    if (config.llmAllowDomains.includes(context.domain)) {
      return this.decide(chunk, score < 1, score, factors, [...reasons, 'domain_allowed']);
    }

    // Ties with the threshold stay on the cheap path
    const needsLlm = score < config.confidenceMin;
    return this.decide(chunk, needsLlm, score, factors, needsLlm ? [...reasons, 'low_confidence'] : []);
  }

  private boundarySignal(chunk: Chunk, context: RoutingContext): BoundarySignal {
    return scoreBoundary(chunk.text, {
      isFirst: chunk.index === 0,
      isLast: chunk.index === context.totalChunks - 1,
    });
  }

  private factorReasons(chunk: Chunk, context: RoutingContext, factors: QualityScores): RoutingReason[] {
    const reasons: RoutingReason[] = [];
    const boundary = this.boundarySignal(chunk, context);
    if (boundary.startMisaligned) reasons.push('boundary_start');
    if (boundary.endMisaligned) reasons.push('boundary_end');
    if (factors.size < FACTOR_REASON_THRESHOLD) reasons.push('size_deviation');
    if (factors.complexity < FACTOR_REASON_THRESHOLD) reasons.push('structural_complexity');
    return reasons;
  }

  private decide(
    chunk: Chunk,
    needsLlm: boolean,
    score: number,
    factors: QualityScores,
    reasons: RoutingReason[]
  ): RoutingDecision {
    return {
      chunk: {
        ...chunk,
        scores: factors,
        confidence: score,
        routingReasons: needsLlm ? reasons : [],
      },
      needsLlm,
      score,
      factors,
      reasons,
    };
  }
}
