/**
 * Time source for rate-limiter windows, breaker timers and job timestamps.
 * Injected everywhere so tests can drive time by hand.
 */
export interface Clock {
  /** Milliseconds since the epoch */
  now(): number;
}

export type SleepFn = (ms: number) => Promise<void>;
