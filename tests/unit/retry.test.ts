import { describe, it, expect, vi, beforeEach } from 'vitest';

const { warnMock } = vi.hoisted(() => ({ warnMock: vi.fn() }));

vi.mock('../../src/utils/logger.js', () => ({
  createComponentLogger: () => ({
    debug: vi.fn(),
    warn: warnMock,
    error: vi.fn(),
  }),
}));

import { computeBackoffDelay, isRetryableNetworkError, withRetry } from '../../src/utils/retry.js';
import { instantSleep } from '../fixtures/clock.js';

describe('Retry Utilities', () => {
  describe('withRetry', () => {
    beforeEach(() => {
      warnMock.mockClear();
    });

    it('should return result on successful first attempt', async () => {
      const fn = vi.fn().mockResolvedValue('success');

      const result = await withRetry(fn, { sleep: instantSleep() });

      expect(result).toBe('success');
      expect(fn).toHaveBeenCalledTimes(1);
      expect(fn).toHaveBeenCalledWith(1);
    });

    it('should retry on failure and succeed', async () => {
      const fn = vi.fn().mockRejectedValueOnce(new Error('First failure')).mockResolvedValue('success');
      const delays: number[] = [];

      const result = await withRetry(fn, { initialDelayMs: 100, sleep: instantSleep(delays) });

      expect(result).toBe('success');
      expect(fn).toHaveBeenCalledTimes(2);
      expect(delays).toEqual([100]);
    });

    it('should throw the last error after max attempts', async () => {
      const fn = vi.fn().mockRejectedValue(new Error('Always fails'));
      const delays: number[] = [];

      await expect(
        withRetry(fn, { maxAttempts: 4, initialDelayMs: 100, sleep: instantSleep(delays) })
      ).rejects.toThrow('Always fails');
      expect(fn).toHaveBeenCalledTimes(4);
      expect(delays).toEqual([100, 200, 400]);
    });

    it('should not retry errors the predicate rejects', async () => {
      const fn = vi.fn().mockRejectedValue(new Error('fatal'));

      await expect(
        withRetry(fn, { retryableErrors: () => false, sleep: instantSleep() })
      ).rejects.toThrow('fatal');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should report each retry', async () => {
      const onRetry = vi.fn();
      const fn = vi.fn().mockRejectedValueOnce(new Error('flaky')).mockResolvedValue('ok');

      await withRetry(fn, { initialDelayMs: 50, onRetry, sleep: instantSleep() });

      expect(onRetry).toHaveBeenCalledTimes(1);
      expect(onRetry).toHaveBeenCalledWith(expect.any(Error), 1, 50);
      expect(warnMock).not.toHaveBeenCalled();
    });

    it('should log each retry once without onRetry', async () => {
      const fn = vi.fn().mockRejectedValueOnce(new Error('flaky')).mockResolvedValue('ok');

      await withRetry(fn, { initialDelayMs: 50, sleep: instantSleep() });

      expect(warnMock).toHaveBeenCalledTimes(1);
      expect(warnMock).toHaveBeenCalledWith({ error: 'flaky', attempt: 1, delayMs: 50 }, 'Retrying operation');
    });

    it('should wrap non-Error rejections', async () => {
      const fn = vi.fn().mockRejectedValue('plain string');

      await expect(withRetry(fn, { maxAttempts: 1 })).rejects.toThrow('plain string');
    });
  });

  describe('computeBackoffDelay', () => {
    it('should grow exponentially up to the maximum', () => {
      const options = { initialDelayMs: 1000, maxDelayMs: 5000, backoffMultiplier: 2 };

      expect(computeBackoffDelay(0, options)).toBe(1000);
      expect(computeBackoffDelay(1, options)).toBe(2000);
      expect(computeBackoffDelay(2, options)).toBe(4000);
      expect(computeBackoffDelay(3, options)).toBe(5000);
    });

    it('should spread the delay by the jitter fraction', () => {
      const options = { initialDelayMs: 1000, maxDelayMs: 60000, jitter: 0.25 };

      expect(computeBackoffDelay(0, { ...options, random: () => 0 })).toBe(750);
      expect(computeBackoffDelay(0, { ...options, random: () => 0.5 })).toBe(1000);
      expect(computeBackoffDelay(0, { ...options, random: () => 1 })).toBe(1250);
    });

    it('should keep jittered delays at or below the maximum', () => {
      const options = { initialDelayMs: 1000, maxDelayMs: 60000, jitter: 0.25 };

      expect(computeBackoffDelay(10, { ...options, random: () => 1 })).toBe(60000);
      expect(computeBackoffDelay(10, { ...options, random: () => 0 })).toBe(45000);
      expect(computeBackoffDelay(5, { ...options, random: () => 1 })).toBe(40000);
    });
  });

  describe('isRetryableNetworkError', () => {
    it.each(['Request timeout', 'ECONNRESET', 'socket hang up', '503 Service Unavailable', 'network unreachable'])(
      'should treat "%s" as retryable',
      (message) => {
        expect(isRetryableNetworkError(new Error(message))).toBe(true);
      }
    );

    it('should not retry validation errors', () => {
      expect(isRetryableNetworkError(new Error('Invalid input'))).toBe(false);
    });
  });
});
