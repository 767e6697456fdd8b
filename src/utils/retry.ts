/**
 * Retry utility with exponential backoff
 *
 * delay(attempt) = min(initialDelayMs * multiplier^attempt, maxDelayMs),
 * then spread by +/- jitter and capped at maxDelayMs again. `attempt` is 0
 * for the first retry.
 */

import { createComponentLogger } from './logger.js';
import { sleep as defaultSleep } from './clock.js';
import type { SleepFn } from '../core/interfaces/clock.js';

const logger = createComponentLogger('retry');

export interface RetryOptions {
  /** Total attempts, including the first one */
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  /** Fraction in [0, 1]; 0.25 spreads each delay over [0.75d, 1.25d] */
  jitter?: number;
  retryableErrors?: (error: Error) => boolean;
  /** Replaces the default warn log of each retry */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  sleep?: SleepFn;
  random?: () => number;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxAttempts: 3,
  initialDelayMs: 100,
  maxDelayMs: 5000,
  backoffMultiplier: 2,
  jitter: 0,
  retryableErrors: () => true,
  onRetry: (error, attempt, delayMs) => {
    logger.warn({ error: error.message, attempt, delayMs }, 'Retrying operation');
  },
  sleep: defaultSleep,
  random: Math.random,
};

/**
 * Delay before retry number `attempt` (0-based)
 */
export function computeBackoffDelay(
  attempt: number,
  options: Pick<RetryOptions, 'initialDelayMs' | 'maxDelayMs' | 'backoffMultiplier' | 'jitter' | 'random'> = {}
): number {
  const initial = options.initialDelayMs ?? DEFAULT_OPTIONS.initialDelayMs;
  const max = options.maxDelayMs ?? DEFAULT_OPTIONS.maxDelayMs;
  const multiplier = options.backoffMultiplier ?? DEFAULT_OPTIONS.backoffMultiplier;
  const jitter = options.jitter ?? DEFAULT_OPTIONS.jitter;
  const random = options.random ?? DEFAULT_OPTIONS.random;

  const base = Math.min(initial * Math.pow(multiplier, attempt), max);
  if (jitter <= 0) {
    return base;
  }
  const spread = base * jitter * (random() * 2 - 1);
  return Math.min(max, Math.max(0, Math.round(base + spread)));
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let lastError: Error = new Error('Retry failed');

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === opts.maxAttempts || !opts.retryableErrors(lastError)) {
        throw lastError;
      }

      const delay = computeBackoffDelay(attempt - 1, opts);
      opts.onRetry(lastError, attempt, delay);

      await opts.sleep(delay);
    }
  }

  throw lastError;
}

export function isRetryableNetworkError(error: Error): boolean {
  const message = error.message.toLowerCase();
  return (
    message.includes('timeout') ||
    message.includes('timed out') ||
    message.includes('econnreset') ||
    message.includes('econnrefused') ||
    message.includes('socket hang up') ||
    message.includes('network') ||
    message.includes('rate limit') ||
    message.includes('503') ||
    message.includes('502') ||
    message.includes('504')
  );
}
