/**
 * LLM Refinement Client
 *
 * Wraps one completion call per chunk in the call-protection layer:
 * rate limiter admission, then circuit breaker permission, then bounded
 * retries with exponential backoff and a per-call timeout.
 *
 * refine() never throws. Denials and failures return the input chunk
 * (failures marked `refinement_failed`) together with an outcome status.
 *
 * One rate-limiter admission covers all retries of a refine() call, so a
 * retried chunk counts once against the call ceilings.
 */

import { createComponentLogger } from '../../utils/logger.js';
import { withRetry } from '../../utils/retry.js';
import { sleep as defaultSleep } from '../../utils/clock.js';
import { LLMTransientError } from '../../core/errors.js';
import { resliceChunk } from '../chunking/base-chunker.js';
import { buildRefinementPrompt } from './prompts.js';
import { parseRefinementResponse, type RefinementResponse } from './response-parser.js';
import { classifyProviderError } from './providers/types.js';
import type { CircuitBreaker } from '../../utils/circuit-breaker.js';
import type { LlmRateLimiter } from '../rate-limit/llm-rate-limiter.js';
import type { LlmConfig } from '../../config/index.js';
import type { Chunk, RefinementAnnotation } from '../../core/types.js';
import type { SleepFn } from '../../core/interfaces/clock.js';
import type { CompletionResult, ICompletionProvider } from '../../core/interfaces/completion.js';
import type { RefinementContext, RefinementOutcome } from './types.js';

const logger = createComponentLogger('refinement');

export interface RefinementClientOptions {
  provider: ICompletionProvider | null;
  rateLimiter: LlmRateLimiter;
  breaker: CircuitBreaker;
  config: LlmConfig;
  sleep?: SleepFn;
  random?: () => number;
}

interface CallResult {
  completion: CompletionResult;
  response: RefinementResponse;
}

export class RefinementClient {
  private config: LlmConfig;
  private readonly provider: ICompletionProvider | null;
  private readonly rateLimiter: LlmRateLimiter;
  private readonly breaker: CircuitBreaker;
  private readonly sleep: SleepFn;
  private readonly random: () => number;

  constructor(options: RefinementClientOptions) {
    this.config = { ...options.config };
    this.provider = options.provider;
    this.rateLimiter = options.rateLimiter;
    this.breaker = options.breaker;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  /**
   * Swap in a reloaded llm section. Provider and credentials stay as built.
   */
  updateConfig(config: LlmConfig): void {
    this.config = { ...config };
  }

  isEnabled(): boolean {
    return this.config.refinementEnabled && this.provider !== null;
  }

  async refine(chunk: Chunk, context: RefinementContext): Promise<RefinementOutcome> {
    const config = this.config;
    const provider = this.provider;
    if (!config.refinementEnabled || provider === null) {
      return { chunk, status: 'skipped_disabled' };
    }

    const estimatedCostUsd = this.rateLimiter.estimateCallCost(chunk.text);
    const admission = this.rateLimiter.admit({
      domain: context.article.domain,
      batchId: context.batchId,
      estimatedCostUsd,
    });
    if (!admission.allowed) {
      return { chunk, status: 'skipped_rate_limit', denialReason: admission.reason };
    }
    const ticket = admission.ticket;

    const permit = this.breaker.allow();
    if (!permit.permitted) {
      this.rateLimiter.release(ticket);
      logger.debug({ chunkId: chunk.id, state: permit.state }, 'Circuit open, skipping refinement');
      return { chunk, status: 'skipped_circuit_open', retryAt: permit.retryAt };
    }

    const prompt = buildRefinementPrompt({
      article: context.article,
      chunk,
      previous: context.previous,
      next: context.next,
    });

    let result: CallResult;
    try {
      result = await withRetry(
        async () => {
          const completion = await this.callOnce(provider, prompt, config);
          return { completion, response: parseRefinementResponse(completion.text, provider.name) };
        },
        {
          maxAttempts: config.maxRetries + 1,
          initialDelayMs: config.retryBaseDelayMs,
          maxDelayMs: config.retryMaxDelayMs,
          backoffMultiplier: 2,
          jitter: config.retryJitter,
          retryableErrors: (error) => error instanceof LLMTransientError,
          onRetry: (error, attempt, delayMs) => {
            logger.warn(
              { error: error.message, attempt, delayMs, provider: provider.name, chunkId: chunk.id },
              'Retrying refinement after error'
            );
          },
          sleep: this.sleep,
          random: this.random,
        }
      );
    } catch (error) {
      const llmError = classifyProviderError(error, provider.name);
      this.breaker.onFailure(llmError, permit);
      this.rateLimiter.record(ticket, estimatedCostUsd);
      logger.warn(
        { chunkId: chunk.id, articleId: chunk.articleId, code: llmError.code, kind: llmError.kind },
        'Refinement failed, keeping base chunk'
      );
      return { chunk: { ...chunk, refinementStatus: 'refinement_failed' }, status: 'failed', error: llmError };
    }

    this.breaker.onSuccess(permit);
    const { completion, response } = result;
    this.rateLimiter.record(
      ticket,
      completion.usage ? this.rateLimiter.costOfUsage(completion.usage) : estimatedCostUsd
    );

    return {
      chunk: this.applyResponse(chunk, response, completion.model, provider.name, context, config),
      status: 'refined',
    };
  }

  /**
   * One completion attempt bounded by the request timeout. The timeout
   * rejects even when a provider ignores the abort signal.
   */
  private async callOnce(
    provider: ICompletionProvider,
    prompt: string,
    config: LlmConfig
  ): Promise<CompletionResult> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(
          new LLMTransientError(
            `Completion timed out after ${config.requestTimeoutMs}ms`,
            'timeout',
            provider.name
          )
        );
      }, config.requestTimeoutMs);
    });

    try {
      return await Promise.race([
        provider.complete(prompt, {
          temperature: config.temperature,
          maxOutputTokens: config.maxOutputTokens,
          jsonMode: true,
          signal: controller.signal,
        }),
        timeout,
      ]);
    } catch (error) {
      throw classifyProviderError(error, provider.name);
    } finally {
      clearTimeout(timer);
    }
  }

  private applyResponse(
    chunk: Chunk,
    response: RefinementResponse,
    model: string,
    providerName: string,
    context: RefinementContext,
    config: LlmConfig
  ): Chunk {
    const adjust = response.offset_adjust;
    let refined = chunk;
    let boundaryApplied = false;
    let rejectedReason: RefinementAnnotation['boundaryRejectedReason'];

    if (adjust !== 0) {
      const newEnd = chunk.charEnd + adjust;
      if (Math.abs(adjust) > config.maxOffset) {
        rejectedReason = 'exceeds_max_offset';
      } else if (!this.canMoveBoundary(chunk, newEnd, context)) {
        rejectedReason = 'violates_chunk_bounds';
      } else {
        refined = resliceChunk(chunk, context.articleText, chunk.charStart, newEnd);
        boundaryApplied = true;
      }

      if (rejectedReason) {
        logger.debug(
          { chunkId: chunk.id, offsetAdjust: adjust, reason: rejectedReason },
          'Boundary adjustment rejected, keeping original boundary'
        );
      }
    }

    return {
      ...refined,
      semanticType: response.semantic_type,
      refinementStatus: 'refined',
      dropSuggested: response.action === 'drop',
      refinement: {
        action: response.action,
        confidence: response.confidence,
        reason: response.reason,
        offsetAdjust: adjust,
        boundaryApplied,
        ...(rejectedReason ? { boundaryRejectedReason: rejectedReason } : {}),
        provider: providerName,
        model,
      },
    };
  }

  private canMoveBoundary(chunk: Chunk, newEnd: number, context: RefinementContext): boolean {
    if (context.canMoveBoundaryTo) {
      return context.canMoveBoundaryTo(newEnd);
    }
    return newEnd > chunk.charStart && newEnd <= context.articleText.length;
  }
}
