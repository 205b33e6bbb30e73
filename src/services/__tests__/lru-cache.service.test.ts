/**
 * LRU Cache Service Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createCatalogResponseCache, LRUCache } from '../lru-cache.service.js';

describe('LRU Cache Service', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should evict the least recently used entry', () => {
    const cache = new LRUCache<number>({ maxSize: 2 });

    cache.set('a', 1);
    cache.set('b', 2);
    cache.get('a');
    cache.set('c', 3);

    expect(cache.get('b')).toBeUndefined();
    expect(cache.get('a')).toBe(1);
    expect(cache.get('c')).toBe(3);
  });

  it('should expire entries after their TTL', () => {
    vi.useFakeTimers();
    const cache = new LRUCache<string>({ defaultTTL: 1000 });

    cache.set('key', 'value');
    vi.advanceTimersByTime(1001);

    expect(cache.get('key')).toBeUndefined();
  });

  it('should configure the catalog cache for a day', () => {
    vi.useFakeTimers();
    const cache = createCatalogResponseCache<string>();

    cache.set('query', 'page');
    vi.advanceTimersByTime(23 * 60 * 60 * 1000);
    expect(cache.get('query')).toBe('page');

    vi.advanceTimersByTime(2 * 60 * 60 * 1000);
    expect(cache.get('query')).toBeUndefined();
  });
});
