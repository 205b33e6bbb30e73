/**
 * Parallel Service Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { parallelMap, TimeoutError, withTimeout } from '../parallel.service.js';

describe('Parallel Service', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('parallelMap', () => {
    it('should process every item and keep input order', async () => {
      const fn = vi.fn(async (item: number) => item * 2);

      const result = await parallelMap([1, 2, 3, 4, 5], fn, { concurrency: 2 });

      expect(result.total).toBe(5);
      expect(result.successful).toBe(5);
      expect(result.results.map((r) => r.result)).toEqual([2, 4, 6, 8, 10]);
      expect(fn).toHaveBeenCalledTimes(5);
    });

    it('should isolate failures', async () => {
      const result = await parallelMap([1, 2, 3], async (item) => {
        if (item === 2) throw new Error('Test error');
        return item;
      });

      expect(result.successful).toBe(2);
      expect(result.failed).toBe(1);
      expect(result.results[1]).toEqual({ success: false, error: 'Test error', index: 1 });
    });

    it('should never run more than the concurrency limit at once', async () => {
      let running = 0;
      let peak = 0;

      await parallelMap([1, 2, 3, 4, 5, 6], async () => {
        running++;
        peak = Math.max(peak, running);
        await new Promise((resolve) => setTimeout(resolve, 5));
        running--;
      }, { concurrency: 2 });

      expect(peak).toBe(2);
    });

    it('should stop scheduling once cancelled', async () => {
      let processed = 0;

      const result = await parallelMap([1, 2, 3, 4, 5], async () => {
        processed++;
      }, { concurrency: 1, shouldCancel: () => processed >= 2 });

      expect(processed).toBe(2);
      expect(result.cancelled).toBe(3);
      expect(result.results[4]).toEqual({ success: false, error: 'Operation cancelled', cancelled: true, index: 4 });
    });

    it('should report progress for each finished item', async () => {
      const onProgress = vi.fn();

      await parallelMap([1, 2, 3], async (item) => item, { onProgress });

      expect(onProgress).toHaveBeenCalledTimes(3);
      expect(onProgress).toHaveBeenLastCalledWith(3, 3, expect.objectContaining({ success: true }));
    });
  });

  describe('withTimeout', () => {
    it('should resolve when the operation finishes in time', async () => {
      await expect(withTimeout(Promise.resolve('done'), 1000, 'op')).resolves.toBe('done');
    });

    it('should reject with TimeoutError when the operation is slow', async () => {
      vi.useFakeTimers();
      const slow = new Promise<string>((resolve) => setTimeout(() => resolve('late'), 5000));

      const pending = expect(withTimeout(slow, 100, 'Slow source')).rejects.toThrow(TimeoutError);
      await vi.advanceTimersByTimeAsync(100);
      await pending;
    });

    it('should pass through when the timeout is disabled', async () => {
      await expect(withTimeout(Promise.resolve(1), 0, 'op')).resolves.toBe(1);
    });
  });
});
