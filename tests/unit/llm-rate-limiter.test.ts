import { describe, it, expect, beforeEach } from 'vitest';
import { LlmRateLimiter, type Admission } from '../../src/services/rate-limit/llm-rate-limiter.js';
import { costOfUsage, estimateCallCost, estimateCallTokens } from '../../src/services/rate-limit/cost-model.js';
import { defaultConfig, type RateLimitConfig } from '../../src/config/index.js';
import { ManualClock } from '../fixtures/clock.js';

function limits(overrides: Partial<RateLimitConfig> = {}): RateLimitConfig {
  return { ...defaultConfig().rateLimit, ...overrides };
}

function allowedCount(admissions: Admission[]): number {
  return admissions.filter((admission) => admission.allowed).length;
}

describe('LlmRateLimiter', () => {
  let clock: ManualClock;

  beforeEach(() => {
    clock = new ManualClock();
  });

  describe('call ceilings', () => {
    it('should never admit more concurrent callers than the minute ceiling', async () => {
      const limiter = new LlmRateLimiter(
        limits({ maxLlmCallsPerMin: 10, maxLlmCallsPerDomain: 1000 }),
        clock
      );

      const admissions = await Promise.all(
        Array.from({ length: 100 }, async () =>
          limiter.admit({ domain: 'example.com', estimatedCostUsd: 0 })
        )
      );

      expect(allowedCount(admissions)).toBe(10);
      expect(limiter.getStats().denials.minute_limit).toBe(90);
      expect(limiter.getStats().callsThisMinute).toBe(10);
    });

    it('should reset the minute window on rollover', () => {
      const limiter = new LlmRateLimiter(limits({ maxLlmCallsPerMin: 1 }), clock);

      expect(limiter.admit({ domain: 'a.example', estimatedCostUsd: 0 }).allowed).toBe(true);
      expect(limiter.admit({ domain: 'a.example', estimatedCostUsd: 0 })).toEqual({
        allowed: false,
        reason: 'minute_limit',
      });

      clock.advance(60_000);

      expect(limiter.admit({ domain: 'a.example', estimatedCostUsd: 0 }).allowed).toBe(true);
    });

    it('should cap calls per domain', () => {
      const limiter = new LlmRateLimiter(limits({ maxLlmCallsPerDomain: 2 }), clock);

      limiter.admit({ domain: 'busy.example', estimatedCostUsd: 0 });
      limiter.admit({ domain: 'busy.example', estimatedCostUsd: 0 });

      expect(limiter.admit({ domain: 'busy.example', estimatedCostUsd: 0 })).toEqual({
        allowed: false,
        reason: 'domain_limit',
      });
      expect(limiter.admit({ domain: 'quiet.example', estimatedCostUsd: 0 }).allowed).toBe(true);
    });

    it('should cap calls at the batch fraction', () => {
      const limiter = new LlmRateLimiter(limits({ maxLlmPercentagePerBatch: 0.3 }), clock);
      limiter.beginBatch('batch-1', 10);

      const admissions = Array.from({ length: 4 }, () =>
        limiter.admit({ domain: 'example.com', batchId: 'batch-1', estimatedCostUsd: 0 })
      );

      expect(allowedCount(admissions)).toBe(3);
      expect(admissions[3]).toEqual({ allowed: false, reason: 'batch_percentage' });
    });

    it('should cap calls at the per-batch ceiling', () => {
      const limiter = new LlmRateLimiter(limits({ maxLlmCallsPerBatch: 2, maxLlmPercentagePerBatch: 1 }), clock);
      limiter.beginBatch('batch-1', 100);

      limiter.admit({ domain: 'example.com', batchId: 'batch-1', estimatedCostUsd: 0 });
      limiter.admit({ domain: 'example.com', batchId: 'batch-1', estimatedCostUsd: 0 });

      expect(limiter.admit({ domain: 'example.com', batchId: 'batch-1', estimatedCostUsd: 0 })).toEqual({
        allowed: false,
        reason: 'batch_limit',
      });
    });

    it('should open an unknown batch without a fraction cap', () => {
      const limiter = new LlmRateLimiter(limits({ maxLlmCallsPerBatch: 5 }), clock);

      expect(limiter.admit({ domain: 'example.com', batchId: 'adhoc', estimatedCostUsd: 0 }).allowed).toBe(true);
      expect(limiter.getStats().activeBatches).toEqual([
        { batchId: 'adhoc', totalChunks: null, calls: 1, cap: 5 },
      ]);
    });

    it('should forget a batch once it ends', () => {
      const limiter = new LlmRateLimiter(limits(), clock);
      limiter.beginBatch('batch-1', 10);
      limiter.endBatch('batch-1');

      expect(limiter.getStats().activeBatches).toEqual([]);
    });
  });

  describe('tickets', () => {
    it('should give the slot back on release', () => {
      const limiter = new LlmRateLimiter(limits({ maxLlmCallsPerMin: 1 }), clock);

      const first = limiter.admit({ domain: 'example.com', estimatedCostUsd: 0.01 });
      expect(first.allowed).toBe(true);
      expect(limiter.admit({ domain: 'example.com', estimatedCostUsd: 0.01 }).allowed).toBe(false);

      if (first.allowed) limiter.release(first.ticket);

      expect(limiter.getStats().cost.reservedUsd).toBe(0);
      expect(limiter.admit({ domain: 'example.com', estimatedCostUsd: 0.01 }).allowed).toBe(true);
    });

    it('should replace the reservation with the recorded cost', () => {
      const limiter = new LlmRateLimiter(limits(), clock);
      const admission = limiter.admit({ domain: 'example.com', estimatedCostUsd: 0.5 });
      expect(limiter.getStats().cost.reservedUsd).toBe(0.5);

      if (admission.allowed) limiter.record(admission.ticket, 0.25);

      const { cost, outstandingTickets, callsThisMinute } = limiter.getStats();
      expect(cost.reservedUsd).toBe(0);
      expect(cost.committedUsd).toBe(0.25);
      expect(outstandingTickets).toBe(0);
      expect(callsThisMinute).toBe(1);
    });

    it('should ignore a ticket closed twice', () => {
      const limiter = new LlmRateLimiter(limits(), clock);
      const admission = limiter.admit({ domain: 'example.com', estimatedCostUsd: 0.5 });
      if (!admission.allowed) throw new Error('expected admission');

      limiter.record(admission.ticket, 0.5);
      limiter.record(admission.ticket, 0.5);
      limiter.release(admission.ticket);

      expect(limiter.getStats().cost.committedUsd).toBe(0.5);
      expect(limiter.getStats().callsThisMinute).toBe(1);
    });
  });

  describe('daily cost', () => {
    it('should deny a call whose estimate would exceed the daily limit', () => {
      const limiter = new LlmRateLimiter(limits({ dailyCostLimitUsd: 1 }), clock);

      const first = limiter.admit({ domain: 'example.com', estimatedCostUsd: 0.6 });
      expect(first.allowed).toBe(true);
      expect(limiter.admit({ domain: 'example.com', estimatedCostUsd: 0.6 })).toEqual({
        allowed: false,
        reason: 'daily_cost',
      });

      if (first.allowed) limiter.record(first.ticket, 0.6);

      expect(limiter.admit({ domain: 'example.com', estimatedCostUsd: 0.4 }).allowed).toBe(true);
    });

    it('should reset spending at midnight in the configured timezone', () => {
      clock.set(Date.UTC(2024, 0, 15, 4, 30));
      const limiter = new LlmRateLimiter(
        limits({ dailyCostLimitUsd: 1, costTimezone: 'America/New_York' }),
        clock
      );
      expect(limiter.getStats().cost.day).toBe('2024-01-14');

      const admission = limiter.admit({ domain: 'example.com', estimatedCostUsd: 1 });
      if (!admission.allowed) throw new Error('expected admission');
      limiter.record(admission.ticket, 1);
      expect(limiter.admit({ domain: 'example.com', estimatedCostUsd: 0.01 }).allowed).toBe(false);

      clock.advance(60 * 60 * 1000);

      expect(limiter.admit({ domain: 'example.com', estimatedCostUsd: 0.01 }).allowed).toBe(true);
      expect(limiter.getStats().cost.day).toBe('2024-01-15');
      expect(limiter.getStats().cost.committedUsd).toBe(0);
    });
  });

  describe('updateLimits', () => {
    it('should apply new ceilings but keep the timezone', () => {
      const limiter = new LlmRateLimiter(limits({ maxLlmCallsPerMin: 1 }), clock);
      limiter.admit({ domain: 'example.com', estimatedCostUsd: 0 });

      limiter.updateLimits(limits({ maxLlmCallsPerMin: 5, costTimezone: 'Asia/Tokyo' }));

      expect(limiter.admit({ domain: 'example.com', estimatedCostUsd: 0 }).allowed).toBe(true);
      expect(limiter.getConfig().maxLlmCallsPerMin).toBe(5);
      expect(limiter.getConfig().costTimezone).toBe('UTC');
    });
  });
});

describe('cost model', () => {
  const model = defaultConfig().rateLimit;

  it('should estimate tokens from characters plus prompt overhead', () => {
    expect(estimateCallTokens('x'.repeat(400), model)).toBe(300);
  });

  it('should split the estimate between input and output rates', () => {
    expect(estimateCallCost('x'.repeat(400), model)).toBeCloseTo(0.0525, 10);
  });

  it('should price reported usage', () => {
    expect(costOfUsage({ inputTokens: 1000, outputTokens: 100 }, model)).toBeCloseTo(0.1625, 10);
  });
});
