/**
 * Caching decorator for ephemeris providers
 *
 * Wraps any EphemerisProvider and memoises its results in an EphemerisCache.
 * Providers are assumed deterministic: the same inputs always produce the
 * same positions.
 */

import type {
  CacheStats,
  CachingEphemerisProvider,
  EphemerisProvider,
  EphemerisSettings,
  GeoLocation,
  LayerPositions,
} from '@astrolabe/types';

import {
  type CacheKeyOptions,
  DEFAULT_CACHE_SIZE,
  DEFAULT_KEY_OPTIONS,
  validateKeyOptions,
} from '../cache/cache-config.js';
import { buildCacheKey } from '../cache/cache-key.js';
import { EphemerisCache } from '../cache/ephemeris-cache.js';
import { ConfigurationError } from '../errors.js';

/**
 * Options for the cached adapter
 */
export interface CachedAdapterOptions {
  /** Capacity of the adapter's own cache (default: 256) */
  maxSize?: number;
  /** Use an existing cache instead of creating one (excludes maxSize) */
  cache?: EphemerisCache;
  /** Key canonicalisation options */
  key?: Partial<CacheKeyOptions>;
}

/**
 * Transparent caching layer in front of a provider
 *
 * Lookups, provider calls and inserts run one call at a time per adapter, so
 * the wrapped provider never sees two overlapping calls (providers may keep
 * per-instance state such as the selected sidereal mode) and concurrent
 * misses on one key result in a single provider call.
 *
 * Provider errors are passed through unchanged and never cached.
 */
export class CachedEphemerisAdapter implements CachingEphemerisProvider {
  readonly cache: EphemerisCache;
  private readonly keyOptions: CacheKeyOptions;
  private queue: Promise<unknown> = Promise.resolve();

  /**
   * @throws ConfigurationError on an invalid cache size or key option
   */
  constructor(
    readonly provider: EphemerisProvider,
    options: CachedAdapterOptions = {},
  ) {
    if (options.cache && options.maxSize !== undefined) {
      throw new ConfigurationError('Pass either cache or maxSize, not both', 'maxSize');
    }

    this.keyOptions = { ...DEFAULT_KEY_OPTIONS, ...options.key };
    validateKeyOptions(this.keyOptions);

    this.cache = options.cache ?? new EphemerisCache({ maxSize: options.maxSize ?? DEFAULT_CACHE_SIZE });
  }

  /**
   * Calculate positions, serving repeated inputs from the cache
   */
  calcPositions(
    instant: Date,
    location: GeoLocation | null,
    settings: EphemerisSettings,
  ): Promise<LayerPositions> {
    const key = buildCacheKey(instant, location, settings, this.keyOptions);

    return this.serialize(async () => {
      const cached = this.cache.get(key);
      if (cached.found) {
        return cached.value;
      }

      // A rejection propagates from here before anything is stored
      const positions = await this.provider.calcPositions(instant, location, settings);
      this.cache.put(key, positions);
      return positions;
    });
  }

  /**
   * Get cache statistics
   */
  getCacheStats(): CacheStats {
    return this.cache.stats();
  }

  /**
   * Clear cached results (statistics are kept)
   */
  clearCache(): void {
    this.cache.clear();
  }

  /**
   * Run a task after every previously queued task has settled
   */
  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // The caller receives the rejection through `run`; the queue only needs to settle
    this.queue = run.catch(() => undefined);
    return run;
  }
}

/**
 * Wrap a provider in a cache of the given size
 */
export function withCache(
  provider: EphemerisProvider,
  maxSize: number = DEFAULT_CACHE_SIZE,
): CachedEphemerisAdapter {
  return new CachedEphemerisAdapter(provider, { maxSize });
}
