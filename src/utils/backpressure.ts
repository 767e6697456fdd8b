/**
 * Backpressure and Resource Limits Utility
 *
 * Provides mechanisms to prevent system overload:
 * - Semaphore for limiting concurrent operations
 * - Backpressure gate that holds new work while in-flight work is above
 *   a fraction of a ceiling
 *
 * Usage:
 *   const slots = new Semaphore({ maxConcurrent: 3, name: 'batches' });
 *   await slots.acquire();
 *   await gate.admit(batch.length);
 *   try {
 *     await processBatch(batch);
 *   } finally {
 *     gate.complete(batch.length);
 *     slots.release();
 *   }
 */

import { createComponentLogger } from './logger.js';

const logger = createComponentLogger('backpressure');

// =============================================================================
// TYPES
// =============================================================================

export interface SemaphoreOptions {
  maxConcurrent: number;
  name?: string;
}

export interface SemaphoreStats {
  name: string;
  current: number;
  max: number;
  waiting: number;
}

export interface BackpressureGateOptions {
  /** In-flight ceiling, in work units */
  capacity: number;
  /** Fraction of capacity at or above which admission waits */
  threshold: number;
  name?: string;
}

export interface BackpressureGateStats {
  name: string;
  inFlight: number;
  capacity: number;
  threshold: number;
  waiting: number;
  utilization: number;
  underPressure: boolean;
}

// =============================================================================
// SEMAPHORE
// =============================================================================

/**
 * Semaphore for limiting concurrent operations. Waiters are served in
 * arrival order.
 */
export class Semaphore {
  private permits: number;
  private readonly maxPermits: number;
  private readonly name: string;
  private waitQueue: Array<() => void> = [];

  constructor(options: SemaphoreOptions) {
    this.maxPermits = options.maxConcurrent;
    this.permits = options.maxConcurrent;
    this.name = options.name ?? 'default';
  }

  /**
   * Acquire a permit, waiting if necessary
   */
  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }

    return new Promise((resolve) => {
      this.waitQueue.push(resolve);
    });
  }

  /**
   * Release a permit, handing it straight to the next waiter if any
   */
  release(): void {
    const next = this.waitQueue.shift();
    if (next) {
      next();
    } else if (this.permits < this.maxPermits) {
      this.permits++;
    }
  }

  getStats(): SemaphoreStats {
    return {
      name: this.name,
      current: this.maxPermits - this.permits,
      max: this.maxPermits,
      waiting: this.waitQueue.length,
    };
  }
}

// =============================================================================
// BACKPRESSURE GATE
// =============================================================================

/**
 * Admission gate weighted by work units (articles).
 *
 * admit() resolves once in-flight work is below `threshold * capacity`,
 * counting the admitted weight in the same step. With nothing in flight
 * admission is immediate, so a single unit of work larger than the
 * ceiling still runs.
 */
export class BackpressureGate {
  private inFlight = 0;
  private readonly capacity: number;
  private readonly threshold: number;
  private readonly name: string;
  private waiters: Array<{ weight: number; resolve: () => void }> = [];

  constructor(options: BackpressureGateOptions) {
    this.capacity = options.capacity;
    this.threshold = options.threshold;
    this.name = options.name ?? 'default';
  }

  /**
   * Whether new work would be admitted right now
   */
  isOpen(): boolean {
    return this.inFlight === 0 || this.inFlight < this.capacity * this.threshold;
  }

  /**
   * Wait for room, then count `weight` units as in flight
   */
  async admit(weight: number): Promise<void> {
    if (this.waiters.length === 0 && this.isOpen()) {
      this.inFlight += weight;
      return;
    }

    logger.debug(
      { gate: this.name, inFlight: this.inFlight, capacity: this.capacity, weight },
      'Backpressure: holding admission'
    );

    return new Promise((resolve) => {
      this.waiters.push({ weight, resolve });
    });
  }

  /**
   * Mark `weight` units as finished and admit waiters while there is room
   */
  complete(weight: number): void {
    this.inFlight = Math.max(0, this.inFlight - weight);

    while (this.waiters.length > 0 && this.isOpen()) {
      const waiter = this.waiters.shift();
      if (!waiter) break;
      this.inFlight += waiter.weight;
      waiter.resolve();
    }
  }

  getInFlight(): number {
    return this.inFlight;
  }

  getStats(): BackpressureGateStats {
    return {
      name: this.name,
      inFlight: this.inFlight,
      capacity: this.capacity,
      threshold: this.threshold,
      waiting: this.waiters.length,
      utilization: this.inFlight / this.capacity,
      underPressure: !this.isOpen(),
    };
  }
}
