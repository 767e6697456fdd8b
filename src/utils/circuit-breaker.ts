/**
 * Circuit Breaker Pattern Implementation
 *
 * Prevents cascading failures by failing fast when a service is down.
 * States: CLOSED (normal) -> OPEN (failing) -> HALF_OPEN (one trial)
 *
 * Callers ask allow() before each call and report the outcome with
 * onSuccess()/onFailure(). All state lives in one instance and every
 * method runs to completion synchronously, so concurrent callers on the
 * event loop cannot interleave inside a check-and-transition.
 */

import { createComponentLogger } from './logger.js';
import { systemClock } from './clock.js';
import type { Clock } from '../core/interfaces/clock.js';

const logger = createComponentLogger('circuit-breaker');

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerConfig {
  /** Name of the service being protected */
  name: string;
  /** Consecutive failures before opening the circuit */
  failureThreshold: number;
  /** Time in ms an open circuit waits before admitting a trial */
  resetTimeoutMs: number;
  clock?: Clock;
}

/**
 * Handed out by allow(); pass it back to onSuccess/onFailure so a late
 * result from a non-trial call cannot decide a half-open circuit.
 */
export interface BreakerPermit {
  permitted: true;
  trial: boolean;
}

export interface BreakerDenial {
  permitted: false;
  state: CircuitState;
  /** Epoch ms at which an open circuit admits its trial; null while a trial is in flight */
  retryAt: number | null;
}

export type BreakerAdmission = BreakerPermit | BreakerDenial;

export interface CircuitBreakerStats {
  name: string;
  state: CircuitState;
  consecutiveFailures: number;
  lastTransitionTime: number;
  lastFailureTime: number | null;
  lastSuccessTime: number | null;
  nextAttemptTime: number | null;
  trialInFlight: boolean;
  totalPermitted: number;
  totalRejected: number;
  totalFailures: number;
  totalSuccesses: number;
}

/**
 * Circuit Breaker implementation
 */
export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failures = 0;
  private lastTransitionTime: number;
  private lastFailureTime: number | null = null;
  private lastSuccessTime: number | null = null;
  private nextAttemptTime: number | null = null;
  private trialInFlight = false;
  private totalPermitted = 0;
  private totalRejected = 0;
  private totalFailures = 0;
  private totalSuccesses = 0;
  private failureThreshold: number;
  private resetTimeoutMs: number;
  private readonly name: string;
  private readonly clock: Clock;

  constructor(config: CircuitBreakerConfig) {
    this.name = config.name;
    this.failureThreshold = config.failureThreshold;
    this.resetTimeoutMs = config.resetTimeoutMs;
    this.clock = config.clock ?? systemClock;
    this.lastTransitionTime = this.clock.now();
  }

  /**
   * Ask to make a call. An elapsed OPEN circuit moves to HALF_OPEN here and
   * the caller that triggers the move holds the single trial.
   */
  allow(): BreakerAdmission {
    if (this.state === 'OPEN') {
      const retryAt = this.nextAttemptTime ?? 0;
      if (this.clock.now() < retryAt) {
        return this.reject(retryAt);
      }
      this.transitionTo('HALF_OPEN');
    }

    if (this.state === 'HALF_OPEN') {
      if (this.trialInFlight) {
        return this.reject(null);
      }
      this.trialInFlight = true;
      this.totalPermitted++;
      return { permitted: true, trial: true };
    }

    this.totalPermitted++;
    return { permitted: true, trial: false };
  }

  /**
   * Report a successful call
   */
  onSuccess(permit?: BreakerPermit): void {
    this.totalSuccesses++;
    this.lastSuccessTime = this.clock.now();

    if (this.state === 'HALF_OPEN') {
      if (permit === undefined || permit.trial) {
        this.trialInFlight = false;
        this.transitionTo('CLOSED');
      }
    } else if (this.state === 'CLOSED') {
      this.failures = 0;
    }
  }

  /**
   * Report a failed call
   */
  onFailure(error?: Error, permit?: BreakerPermit): void {
    this.totalFailures++;
    this.lastFailureTime = this.clock.now();

    logger.warn({ service: this.name, error: error?.message, state: this.state }, 'Circuit breaker failure');

    if (this.state === 'HALF_OPEN') {
      if (permit === undefined || permit.trial) {
        this.trialInFlight = false;
        this.failures++;
        this.transitionTo('OPEN');
      }
    } else if (this.state === 'CLOSED') {
      this.failures++;
      if (this.failures >= this.failureThreshold) {
        this.transitionTo('OPEN');
      }
    }
  }

  /**
   * Apply reloaded settings. A lower threshold takes effect on the next failure.
   */
  updateSettings(settings: { failureThreshold: number; resetTimeoutMs: number }): void {
    this.failureThreshold = settings.failureThreshold;
    this.resetTimeoutMs = settings.resetTimeoutMs;
  }

  private reject(retryAt: number | null): BreakerDenial {
    this.totalRejected++;
    logger.debug({ service: this.name, state: this.state }, 'Circuit breaker rejected call');
    return { permitted: false, state: this.state, retryAt };
  }

  /**
   * Transition to a new state
   */
  private transitionTo(newState: CircuitState): void {
    const oldState = this.state;
    this.state = newState;
    this.lastTransitionTime = this.clock.now();

    if (newState === 'OPEN') {
      this.nextAttemptTime = this.lastTransitionTime + this.resetTimeoutMs;
      logger.warn(
        {
          service: this.name,
          failures: this.failures,
          resetTime: new Date(this.nextAttemptTime).toISOString(),
        },
        'Circuit breaker opened'
      );
    } else if (newState === 'CLOSED') {
      this.failures = 0;
      this.nextAttemptTime = null;
      logger.info({ service: this.name }, 'Circuit breaker closed');
    } else {
      logger.info({ service: this.name }, 'Circuit breaker half-open, probing...');
    }

    logger.debug({ service: this.name, from: oldState, to: newState }, 'State transition');
  }

  getState(): CircuitState {
    return this.state;
  }

  getName(): string {
    return this.name;
  }

  /**
   * Get current stats
   */
  getStats(): CircuitBreakerStats {
    return {
      name: this.name,
      state: this.state,
      consecutiveFailures: this.failures,
      lastTransitionTime: this.lastTransitionTime,
      lastFailureTime: this.lastFailureTime,
      lastSuccessTime: this.lastSuccessTime,
      nextAttemptTime: this.nextAttemptTime,
      trialInFlight: this.trialInFlight,
      totalPermitted: this.totalPermitted,
      totalRejected: this.totalRejected,
      totalFailures: this.totalFailures,
      totalSuccesses: this.totalSuccesses,
    };
  }
}
