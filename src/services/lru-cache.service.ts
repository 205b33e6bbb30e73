/**
 * LRU Cache Service
 *
 * Generic Least Recently Used cache with an optional TTL,
 * used to memoize adapter responses.
 */

// =============================================================================
// Types
// =============================================================================

export interface LRUCacheOptions {
  /** Maximum number of entries (default: 100) */
  maxSize?: number;
  /** TTL in milliseconds (optional, no expiry if not set) */
  defaultTTL?: number;
}

interface CacheEntry<T> {
  value: T;
  expiresAt?: number;
}

// =============================================================================
// LRU Cache Class
// =============================================================================

/**
 * Uses a Map to maintain insertion order for O(1) operations
 */
export class LRUCache<T> {
  private cache = new Map<string, CacheEntry<T>>();
  private maxSize: number;
  private defaultTTL?: number;

  constructor(options: LRUCacheOptions = {}) {
    this.maxSize = options.maxSize ?? 100;
    this.defaultTTL = options.defaultTTL;
  }

  /**
   * Get a value from the cache
   * Returns undefined if not found or expired
   */
  get(key: string): T | undefined {
    const entry = this.cache.get(key);
    if (!entry) {
      return undefined;
    }

    this.cache.delete(key);
    if (entry.expiresAt && Date.now() > entry.expiresAt) {
      return undefined;
    }

    // Re-insert at the end (most recently used)
    this.cache.set(key, entry);
    return entry.value;
  }

  set(key: string, value: T): void {
    this.cache.delete(key);

    // Map keeps insertion order, so the first key is the least recently used
    while (this.cache.size >= this.maxSize) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }

    this.cache.set(key, {
      value,
      expiresAt: this.defaultTTL ? Date.now() + this.defaultTTL : undefined,
    });
  }
}

// =============================================================================
// Pre-configured Cache Instances
// =============================================================================

/**
 * Create an LRU cache for catalog responses (24h TTL, max 500 entries)
 */
export function createCatalogResponseCache<T>(): LRUCache<T> {
  return new LRUCache<T>({
    maxSize: 500,
    defaultTTL: 24 * 60 * 60 * 1000,
  });
}

