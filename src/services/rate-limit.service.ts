/**
 * Rate Limit Service
 *
 * Per-source request spacing for outbound adapter calls.
 * Each adapter owns one limiter; consecutive failures back off exponentially.
 */

// =============================================================================
// Types
// =============================================================================

export interface RateLimiterOptions {
  /** Base delay between requests in milliseconds */
  delayMs: number;
  /** Cap on the backoff exponent (default: 5) */
  maxBackoffExponent?: number;
}

export interface RateLimiterStats {
  requests: number;
  consecutiveErrors: number;
  currentDelayMs: number;
}

// =============================================================================
// Delay Calculation
// =============================================================================

/**
 * Map a rate limit level (1-10) to a delay between requests.
 * Level 1: 1 req/3s (conservative), Level 10: 1 req/0.3s (aggressive)
 */
export function getDelayMs(level: number): number {
  const minDelay = 300;
  const maxDelay = 3000;
  const normalized = Math.max(1, Math.min(10, level));
  return maxDelay - ((normalized - 1) / 9) * (maxDelay - minDelay);
}

// =============================================================================
// Limiter
// =============================================================================

export class SourceRateLimiter {
  private readonly delayMs: number;
  private readonly maxBackoffExponent: number;
  private lastRequestTime = 0;
  private consecutiveErrors = 0;
  private requests = 0;
  /** Serializes waiters so spacing holds under concurrent callers */
  private queue: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions) {
    this.delayMs = Math.max(0, options.delayMs);
    this.maxBackoffExponent = options.maxBackoffExponent ?? 5;
  }

  static fromLevel(level: number): SourceRateLimiter {
    return new SourceRateLimiter({ delayMs: getDelayMs(level) });
  }

  /**
   * Wait until the next request may be sent
   */
  acquire(): Promise<void> {
    const turn = this.queue.then(() => this.waitForTurn());
    this.queue = turn;
    return turn;
  }

  /**
   * Update backoff state after a request completes
   */
  record(success: boolean): void {
    if (success) {
      this.consecutiveErrors = 0;
    } else {
      this.consecutiveErrors = Math.min(this.consecutiveErrors + 1, this.maxBackoffExponent);
    }
  }

  getStats(): RateLimiterStats {
    return {
      requests: this.requests,
      consecutiveErrors: this.consecutiveErrors,
      currentDelayMs: this.currentDelay(),
    };
  }

  private currentDelay(): number {
    return this.delayMs * Math.pow(2, this.consecutiveErrors);
  }

  private async waitForTurn(): Promise<void> {
    const totalDelay = this.currentDelay();
    const elapsed = Date.now() - this.lastRequestTime;
    if (this.requests > 0 && elapsed < totalDelay) {
      await new Promise((resolve) => setTimeout(resolve, totalDelay - elapsed));
    }
    this.lastRequestTime = Date.now();
    this.requests++;
  }
}
