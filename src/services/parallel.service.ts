/**
 * Parallel Processing Service
 *
 * Provides controlled parallel execution for batch operations.
 * Uses p-limit to manage concurrency.
 */

import pLimit from 'p-limit';
import { batchLogger } from './logger.service.js';

// =============================================================================
// Types
// =============================================================================

export interface ParallelResult<T> {
  success: boolean;
  result?: T;
  error?: string;
  /** Skipped because the batch was cancelled */
  cancelled?: boolean;
  index: number;
}

export interface ParallelBatchResult<T> {
  total: number;
  successful: number;
  failed: number;
  cancelled: number;
  results: ParallelResult<T>[];
  duration: number;
}

export interface ParallelOptions {
  /** Maximum concurrent operations (default: 3) */
  concurrency?: number;
  /** Progress callback called after each item */
  onProgress?: (completed: number, total: number, result: ParallelResult<unknown>) => void;
  /** Whether operation should be cancelled */
  shouldCancel?: () => boolean;
}

/**
 * Error raised when an operation exceeds its time budget
 */
export class TimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

// =============================================================================
// Parallel Execution Functions
// =============================================================================

/**
 * Execute operations in parallel with controlled concurrency.
 * A failing item never aborts the others; cancellation stops scheduling new items.
 */
export async function parallelMap<T, R>(
  items: T[],
  fn: (item: T, index: number) => Promise<R>,
  options: ParallelOptions = {}
): Promise<ParallelBatchResult<R>> {
  const { concurrency = 3, onProgress, shouldCancel } = options;

  const startTime = Date.now();
  const limit = pLimit(Math.max(1, concurrency));
  const results: ParallelResult<R>[] = [];
  let successful = 0;
  let failed = 0;
  let cancelled = 0;

  batchLogger.debug({
    total: items.length,
    concurrency,
  }, `Starting parallel processing of ${items.length} items with concurrency ${concurrency}`);

  const promises = items.map((item, index) =>
    limit(async () => {
      if (shouldCancel?.()) {
        cancelled++;
        const result: ParallelResult<R> = {
          success: false,
          error: 'Operation cancelled',
          cancelled: true,
          index,
        };
        results[index] = result;
        return result;
      }

      try {
        const result = await fn(item, index);
        successful++;
        const parallelResult: ParallelResult<R> = {
          success: true,
          result,
          index,
        };
        results[index] = parallelResult;
        onProgress?.(successful + failed, items.length, parallelResult);
        return parallelResult;
      } catch (error) {
        failed++;
        const errorMessage = error instanceof Error ? error.message : String(error);
        const parallelResult: ParallelResult<R> = {
          success: false,
          error: errorMessage,
          index,
        };
        results[index] = parallelResult;

        batchLogger.warn({
          index,
          error: errorMessage,
        }, `Item ${index} failed: ${errorMessage}`);

        onProgress?.(successful + failed, items.length, parallelResult);
        return parallelResult;
      }
    })
  );

  await Promise.all(promises);

  const duration = Date.now() - startTime;

  batchLogger.debug({
    total: items.length,
    successful,
    failed,
    cancelled,
    duration,
  }, `Parallel processing complete: ${successful} succeeded, ${failed} failed in ${duration}ms`);

  return {
    total: items.length,
    successful,
    failed,
    cancelled,
    results,
    duration,
  };
}

/**
 * Race a promise against a timer. The timer is always cleared.
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return operation;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

export const Parallel = {
  map: parallelMap,
  withTimeout,
};

export default Parallel;
