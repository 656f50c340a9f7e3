/**
 * Ephemeris Cache
 *
 * Bounded LRU (Least Recently Used) store for calculation results with:
 * - O(1) get/put operations
 * - Size-based eviction of exactly one entry per overflowing insert
 * - Lifetime hit/miss/eviction counters
 */

import type { CacheStats, LayerPositions } from '@astrolabe/types';

import { DEFAULT_CACHE_CONFIG, type EphemerisCacheConfig, validateMaxSize } from './cache-config.js';

/**
 * Result of a cache lookup
 */
export type CacheLookup<V> = { found: true; value: V } | { found: false };

const MISS: CacheLookup<never> = { found: false };

/**
 * Cache entry wrapper, so a stored undefined is still a hit
 */
interface CacheEntry<V> {
  readonly value: V;
}

/**
 * LRU cache for position results
 *
 * Uses Map for O(1) operations while maintaining insertion order
 * for LRU eviction (Map iterates in insertion order, so the first key is
 * the least recently used one).
 *
 * Values are stored by reference and never copied or inspected.
 *
 * Counters survive `clear()`: they describe the cache's lifetime, not its
 * current contents. Use `resetStats()` to zero them.
 */
export class EphemerisCache<V = LayerPositions> {
  private readonly entries: Map<string, CacheEntry<V>> = new Map();
  readonly maxSize: number;

  // Statistics
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  /**
   * @throws ConfigurationError if maxSize is not a positive integer
   */
  constructor(config: Partial<EphemerisCacheConfig> = {}) {
    const { maxSize } = { ...DEFAULT_CACHE_CONFIG, ...config };
    validateMaxSize(maxSize);
    this.maxSize = maxSize;
  }

  /**
   * Look up a key
   *
   * A hit moves the entry to the most recently used end.
   */
  get(key: string): CacheLookup<V> {
    const entry = this.entries.get(key);

    if (!entry) {
      this.misses++;
      return MISS;
    }

    // Move to end (most recently used) by re-inserting
    this.entries.delete(key);
    this.entries.set(key, entry);

    this.hits++;
    return { found: true, value: entry.value };
  }

  /**
   * Insert or overwrite an entry
   *
   * Evicts the least recently used entry when full and the key is new.
   */
  put(key: string, value: V): void {
    if (this.entries.has(key)) {
      // Delete first so the overwrite lands at the most recently used end
      this.entries.delete(key);
    } else if (this.entries.size >= this.maxSize) {
      this.evictLRU();
    }

    this.entries.set(key, { value });
  }

  /**
   * Check if key exists (without touching recency or counters)
   */
  has(key: string): boolean {
    return this.entries.has(key);
  }

  /**
   * Get the current number of entries
   */
  get size(): number {
    return this.entries.size;
  }

  /**
   * Get cache statistics
   */
  stats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.entries.size,
      maxSize: this.maxSize,
      hitRate: total > 0 ? this.hits / total : 0,
      evictions: this.evictions,
    };
  }

  /**
   * Remove all entries. Counters are kept.
   */
  clear(): void {
    this.entries.clear();
  }

  /**
   * Reset statistics (keeps cached data)
   */
  resetStats(): void {
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
  }

  /**
   * Keys from least to most recently used
   */
  keys(): IterableIterator<string> {
    return this.entries.keys();
  }

  /**
   * Evict the least recently used entry
   */
  private evictLRU(): void {
    const first = this.entries.keys().next();
    if (!first.done) {
      this.entries.delete(first.value);
      this.evictions++;
    }
  }
}

/**
 * Create an ephemeris cache with the given capacity
 */
export function createEphemerisCache<V = LayerPositions>(
  maxSize: number = DEFAULT_CACHE_CONFIG.maxSize,
): EphemerisCache<V> {
  return new EphemerisCache<V>({ maxSize });
}
