/**
 * @astrolabe/core - Caching layer for ephemeris providers
 *
 * This package contains:
 * - EphemerisCache: bounded LRU store with hit/miss accounting
 * - Cache key canonicalisation for calculation inputs
 * - CachedEphemerisAdapter: caching decorator around any provider
 */

export const VERSION = '0.1.0';

// Re-export cache
export * from './cache/index.js';

// Re-export adapter
export * from './adapter/index.js';

// Re-export errors
export { ConfigurationError } from './errors.js';
