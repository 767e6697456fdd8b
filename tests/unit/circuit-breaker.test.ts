import { describe, it, expect, beforeEach } from 'vitest';
import { CircuitBreaker, type BreakerPermit } from '../../src/utils/circuit-breaker.js';
import { ManualClock } from '../fixtures/clock.js';

function permitOf(breaker: CircuitBreaker): BreakerPermit {
  const admission = breaker.allow();
  if (!admission.permitted) {
    throw new Error(`expected a permit, circuit is ${admission.state}`);
  }
  return admission;
}

describe('CircuitBreaker', () => {
  let clock: ManualClock;
  let breaker: CircuitBreaker;

  beforeEach(() => {
    clock = new ManualClock();
    breaker = new CircuitBreaker({
      name: 'llm:test',
      failureThreshold: 5,
      resetTimeoutMs: 60_000,
      clock,
    });
  });

  function failTimes(count: number): void {
    for (let i = 0; i < count; i++) {
      breaker.onFailure(new Error('provider down'), permitOf(breaker));
    }
  }

  describe('CLOSED state', () => {
    it('should start closed and permit calls', () => {
      expect(breaker.getState()).toBe('CLOSED');
      expect(breaker.allow()).toEqual({ permitted: true, trial: false });
    });

    it('should stay closed below the failure threshold', () => {
      failTimes(4);

      expect(breaker.getState()).toBe('CLOSED');
      expect(breaker.getStats().consecutiveFailures).toBe(4);
    });

    it('should reset the failure count on success', () => {
      failTimes(4);
      breaker.onSuccess(permitOf(breaker));
      failTimes(4);

      expect(breaker.getState()).toBe('CLOSED');
    });
  });

  describe('OPEN state', () => {
    it('should open at the threshold and deny the next call', () => {
      failTimes(5);

      expect(breaker.getState()).toBe('OPEN');
      expect(breaker.allow()).toEqual({
        permitted: false,
        state: 'OPEN',
        retryAt: clock.now() + 60_000,
      });
      expect(breaker.getStats().totalRejected).toBe(1);
    });

    it('should keep denying until the reset timeout elapses', () => {
      failTimes(5);
      clock.advance(59_999);

      expect(breaker.allow().permitted).toBe(false);
    });
  });

  describe('HALF_OPEN state', () => {
    beforeEach(() => {
      failTimes(5);
      clock.advance(60_000);
    });

    it('should admit exactly one trial', () => {
      expect(breaker.allow()).toEqual({ permitted: true, trial: true });
      expect(breaker.getState()).toBe('HALF_OPEN');
      expect(breaker.allow()).toEqual({ permitted: false, state: 'HALF_OPEN', retryAt: null });
    });

    it('should close after a successful trial', () => {
      breaker.onSuccess(permitOf(breaker));

      expect(breaker.getState()).toBe('CLOSED');
      expect(breaker.getStats().consecutiveFailures).toBe(0);
      expect(breaker.allow().permitted).toBe(true);
    });

    it('should reopen after a failed trial with a fresh timeout', () => {
      breaker.onFailure(new Error('still down'), permitOf(breaker));

      expect(breaker.getState()).toBe('OPEN');
      expect(breaker.getStats().nextAttemptTime).toBe(clock.now() + 60_000);
    });

    it('should ignore late results of calls permitted before opening', () => {
      const late: BreakerPermit = { permitted: true, trial: false };
      const trial = permitOf(breaker);

      breaker.onFailure(new Error('late failure'), late);
      expect(breaker.getState()).toBe('HALF_OPEN');

      breaker.onSuccess(trial);
      expect(breaker.getState()).toBe('CLOSED');
    });
  });

  describe('updateSettings', () => {
    it('should apply a lower threshold on the next failure', () => {
      failTimes(2);
      breaker.updateSettings({ failureThreshold: 3, resetTimeoutMs: 1_000 });
      failTimes(1);

      expect(breaker.getState()).toBe('OPEN');
      expect(breaker.getStats().nextAttemptTime).toBe(clock.now() + 1_000);
    });
  });

  it('should report its counters', () => {
    breaker.onSuccess(permitOf(breaker));
    failTimes(1);

    expect(breaker.getStats()).toMatchObject({
      name: 'llm:test',
      state: 'CLOSED',
      consecutiveFailures: 1,
      totalPermitted: 2,
      totalFailures: 1,
      totalSuccesses: 1,
      trialInFlight: false,
    });
  });
});
