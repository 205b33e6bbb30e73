/**
 * Rate Limit Service Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { getDelayMs, SourceRateLimiter } from '../rate-limit.service.js';

describe('Rate Limit Service', () => {
  describe('getDelayMs', () => {
    it('should map levels onto 3000-300ms', () => {
      expect(getDelayMs(1)).toBe(3000);
      expect(getDelayMs(5)).toBe(1800);
      expect(getDelayMs(10)).toBe(300);
    });

    it('should clamp out-of-range levels', () => {
      expect(getDelayMs(0)).toBe(3000);
      expect(getDelayMs(42)).toBe(300);
    });
  });

  describe('SourceRateLimiter', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should let the first request through immediately', async () => {
      const limiter = new SourceRateLimiter({ delayMs: 1000 });

      await limiter.acquire();

      expect(limiter.getStats().requests).toBe(1);
    });

    it('should space consecutive requests by the delay', async () => {
      const limiter = new SourceRateLimiter({ delayMs: 1000 });
      await limiter.acquire();

      let released = false;
      const second = limiter.acquire().then(() => {
        released = true;
      });

      await vi.advanceTimersByTimeAsync(999);
      expect(released).toBe(false);

      await vi.advanceTimersByTimeAsync(1);
      await second;
      expect(released).toBe(true);
    });

    it('should back off exponentially after failures', () => {
      const limiter = new SourceRateLimiter({ delayMs: 1000 });

      limiter.record(false);
      limiter.record(false);
      expect(limiter.getStats().currentDelayMs).toBe(4000);

      limiter.record(true);
      expect(limiter.getStats().currentDelayMs).toBe(1000);
    });

    it('should cap the backoff exponent', () => {
      const limiter = new SourceRateLimiter({ delayMs: 100, maxBackoffExponent: 2 });

      for (let i = 0; i < 5; i++) limiter.record(false);

      expect(limiter.getStats()).toEqual({ requests: 0, consecutiveErrors: 2, currentDelayMs: 400 });
    });

    it('should build a limiter from a level', () => {
      expect(SourceRateLimiter.fromLevel(10).getStats().currentDelayMs).toBe(300);
    });
  });
});
