/**
 * LLM Rate Limiter
 *
 * Multi-axis admission control for refinement calls:
 * - global calls per minute (fixed window)
 * - calls per domain within the same window
 * - calls per batch, and a cap on the fraction of a batch's chunks
 * - daily cost ceiling, in the configured timezone
 *
 * admit() checks every axis and reserves the slot in one synchronous step,
 * so concurrent callers on the event loop can never overshoot a ceiling.
 * Every allowed admission returns a ticket that must be closed with either
 * record() (a call was made) or release() (no call was made).
 */

import { v4 as uuid } from 'uuid';
import { createComponentLogger } from '../../utils/logger.js';
import { systemClock } from '../../utils/clock.js';
import { costOfUsage, estimateCallCost } from './cost-model.js';
import type { Clock } from '../../core/interfaces/clock.js';
import type { CompletionUsage } from '../../core/interfaces/completion.js';
import type { RateLimitConfig } from '../../config/index.js';

const logger = createComponentLogger('rate-limiter');

const MINUTE_MS = 60_000;
const COST_EPSILON = 1e-12;

// =============================================================================
// TYPES
// =============================================================================

export type RateLimitDenialReason =
  | 'minute_limit'
  | 'domain_limit'
  | 'batch_limit'
  | 'batch_percentage'
  | 'daily_cost';

export interface AdmissionRequest {
  domain: string;
  batchId?: string;
  estimatedCostUsd: number;
}

export interface RateLimitTicket {
  readonly id: string;
  readonly domain: string;
  readonly batchId: string | undefined;
  readonly estimatedCostUsd: number;
  readonly minuteWindow: number;
  readonly day: string;
}

export type Admission =
  | { allowed: true; ticket: RateLimitTicket }
  | { allowed: false; reason: RateLimitDenialReason };

interface BatchBudget {
  totalChunks: number | null;
  calls: number;
}

export interface BatchBudgetStats {
  batchId: string;
  totalChunks: number | null;
  calls: number;
  /** Effective call cap: min of the per-batch ceiling and the fraction cap */
  cap: number;
}

export interface RateLimiterStats {
  minuteWindowStart: number;
  callsThisMinute: number;
  callsByDomain: Record<string, number>;
  activeBatches: BatchBudgetStats[];
  cost: {
    day: string;
    committedUsd: number;
    reservedUsd: number;
    limitUsd: number;
  };
  outstandingTickets: number;
  denials: Record<RateLimitDenialReason, number>;
}

// =============================================================================
// RATE LIMITER
// =============================================================================

export class LlmRateLimiter {
  private config: RateLimitConfig;
  private readonly clock: Clock;
  private readonly dayFormatter: Intl.DateTimeFormat;

  private minuteWindow: number;
  private callsThisMinute = 0;
  private callsByDomain = new Map<string, number>();
  private batches = new Map<string, BatchBudget>();
  private day: string;
  private committedUsd = 0;
  private reservedUsd = 0;
  private tickets = new Map<string, RateLimitTicket>();
  private denials: Record<RateLimitDenialReason, number> = {
    minute_limit: 0,
    domain_limit: 0,
    batch_limit: 0,
    batch_percentage: 0,
    daily_cost: 0,
  };

  constructor(config: RateLimitConfig, clock: Clock = systemClock) {
    this.config = { ...config };
    this.clock = clock;
    this.dayFormatter = new Intl.DateTimeFormat('en-CA', {
      timeZone: config.costTimezone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
    });
    const now = clock.now();
    this.minuteWindow = Math.floor(now / MINUTE_MS);
    this.day = this.dayFormatter.format(now);
  }

  /**
   * Check every axis and reserve a slot. Never waits.
   */
  admit(request: AdmissionRequest): Admission {
    this.roll();
    const config = this.config;

    if (this.callsThisMinute >= config.maxLlmCallsPerMin) {
      return this.deny('minute_limit', request);
    }
    if ((this.callsByDomain.get(request.domain) ?? 0) >= config.maxLlmCallsPerDomain) {
      return this.deny('domain_limit', request);
    }

    let batch: BatchBudget | undefined;
    if (request.batchId !== undefined) {
      batch = this.batches.get(request.batchId);
      if (!batch) {
        // Unknown batch: the call ceiling applies, the fraction cap cannot
        batch = { totalChunks: null, calls: 0 };
        this.batches.set(request.batchId, batch);
      }
      if (batch.calls >= config.maxLlmCallsPerBatch) {
        return this.deny('batch_limit', request);
      }
      if (batch.totalChunks !== null && batch.calls >= this.fractionCap(batch.totalChunks)) {
        return this.deny('batch_percentage', request);
      }
    }

    if (
      this.committedUsd + this.reservedUsd + request.estimatedCostUsd >
      config.dailyCostLimitUsd + COST_EPSILON
    ) {
      return this.deny('daily_cost', request);
    }

    this.callsThisMinute++;
    this.callsByDomain.set(request.domain, (this.callsByDomain.get(request.domain) ?? 0) + 1);
    if (batch) batch.calls++;
    this.reservedUsd += request.estimatedCostUsd;

    const ticket: RateLimitTicket = {
      id: uuid(),
      domain: request.domain,
      batchId: request.batchId,
      estimatedCostUsd: request.estimatedCostUsd,
      minuteWindow: this.minuteWindow,
      day: this.day,
    };
    this.tickets.set(ticket.id, ticket);
    return { allowed: true, ticket };
  }

  /**
   * Close a ticket whose call was made, replacing the reserved estimate
   * with the actual cost.
   */
  record(ticket: RateLimitTicket, actualCostUsd: number): void {
    if (!this.tickets.delete(ticket.id)) {
      logger.debug({ ticketId: ticket.id }, 'Ignoring unknown or closed ticket');
      return;
    }
    this.roll();

    if (ticket.day === this.day) {
      this.reservedUsd = Math.max(0, this.reservedUsd - ticket.estimatedCostUsd);
    }
    this.committedUsd += actualCostUsd;
  }

  /**
   * Close a ticket that never produced a call and give its slot back
   */
  release(ticket: RateLimitTicket): void {
    if (!this.tickets.delete(ticket.id)) {
      logger.debug({ ticketId: ticket.id }, 'Ignoring unknown or closed ticket');
      return;
    }
    this.roll();

    if (ticket.minuteWindow === this.minuteWindow) {
      this.callsThisMinute = Math.max(0, this.callsThisMinute - 1);
      const domainCalls = this.callsByDomain.get(ticket.domain) ?? 0;
      if (domainCalls <= 1) {
        this.callsByDomain.delete(ticket.domain);
      } else {
        this.callsByDomain.set(ticket.domain, domainCalls - 1);
      }
    }
    if (ticket.batchId !== undefined) {
      const batch = this.batches.get(ticket.batchId);
      if (batch) batch.calls = Math.max(0, batch.calls - 1);
    }
    if (ticket.day === this.day) {
      this.reservedUsd = Math.max(0, this.reservedUsd - ticket.estimatedCostUsd);
    }
  }

  /**
   * Open a batch scope. Resets the batch's counters if it already exists.
   */
  beginBatch(batchId: string, totalChunks: number): void {
    this.batches.set(batchId, { totalChunks, calls: 0 });
    logger.debug(
      { batchId, totalChunks, cap: this.batchCap(totalChunks) },
      'Batch budget opened'
    );
  }

  endBatch(batchId: string): void {
    this.batches.delete(batchId);
  }

  estimateCallCost(text: string): number {
    return estimateCallCost(text, this.config);
  }

  costOfUsage(usage: CompletionUsage): number {
    return costOfUsage(usage, this.config);
  }

  /**
   * Swap in a reloaded rate-limit section. The cost timezone is fixed at
   * construction.
   */
  updateLimits(config: RateLimitConfig): void {
    this.config = { ...config, costTimezone: this.config.costTimezone };
  }

  getConfig(): RateLimitConfig {
    return { ...this.config };
  }

  getStats(): RateLimiterStats {
    this.roll();
    return {
      minuteWindowStart: this.minuteWindow * MINUTE_MS,
      callsThisMinute: this.callsThisMinute,
      callsByDomain: Object.fromEntries(this.callsByDomain),
      activeBatches: [...this.batches.entries()].map(([batchId, batch]) => ({
        batchId,
        totalChunks: batch.totalChunks,
        calls: batch.calls,
        cap: batch.totalChunks === null ? this.config.maxLlmCallsPerBatch : this.batchCap(batch.totalChunks),
      })),
      cost: {
        day: this.day,
        committedUsd: this.committedUsd,
        reservedUsd: this.reservedUsd,
        limitUsd: this.config.dailyCostLimitUsd,
      },
      outstandingTickets: this.tickets.size,
      denials: { ...this.denials },
    };
  }

  private fractionCap(totalChunks: number): number {
    return Math.floor(totalChunks * this.config.maxLlmPercentagePerBatch);
  }

  private batchCap(totalChunks: number): number {
    return Math.min(this.config.maxLlmCallsPerBatch, this.fractionCap(totalChunks));
  }

  /**
   * Reset window counters on minute or day rollover
   */
  private roll(): void {
    const now = this.clock.now();

    const minuteWindow = Math.floor(now / MINUTE_MS);
    if (minuteWindow !== this.minuteWindow) {
      this.minuteWindow = minuteWindow;
      this.callsThisMinute = 0;
      this.callsByDomain.clear();
    }

    const day = this.dayFormatter.format(now);
    if (day !== this.day) {
      logger.info({ previousDay: this.day, day, spentUsd: this.committedUsd }, 'Daily cost budget reset');
      this.day = day;
      this.committedUsd = 0;
      this.reservedUsd = 0;
    }
  }

  private deny(reason: RateLimitDenialReason, request: AdmissionRequest): Admission {
    this.denials[reason]++;
    logger.debug({ reason, domain: request.domain, batchId: request.batchId }, 'LLM call denied');
    return { allowed: false, reason };
  }
}
