/**
 * Cache module exports
 *
 * In-memory caching for position results with LRU eviction.
 */

// Configuration
export {
  type CacheKeyOptions,
  type EphemerisCacheConfig,
  DEFAULT_CACHE_SIZE,
  DEFAULT_CACHE_CONFIG,
  DEFAULT_KEY_OPTIONS,
  validateMaxSize,
  validateKeyOptions,
} from './cache-config.js';

// LRU cache
export { type CacheLookup, EphemerisCache, createEphemerisCache } from './ephemeris-cache.js';

// Keys
export {
  buildCacheKey,
  normalizeInstant,
  normalizeCoordinate,
  normalizeObjects,
} from './cache-key.js';
