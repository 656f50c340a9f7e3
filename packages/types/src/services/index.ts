/**
 * Service interface exports
 *
 * Contracts implemented by ephemeris providers (the Swiss Ephemeris adapter,
 * the caching decorator, test stubs).
 */

import type { EphemerisSettings, GeoLocation, LayerPositions } from '../ephemeris/index.js';

/**
 * Position calculation service.
 *
 * Implementations must be deterministic for fixed inputs; the caching layer
 * relies on it. Errors are provider-defined and are passed through unchanged
 * by decorators.
 */
export interface EphemerisProvider {
  /**
   * Calculate object positions (and houses when a location is given)
   *
   * @param instant - Moment of the calculation
   * @param location - Observer location, or null to skip houses
   * @param settings - Calculation settings
   */
  calcPositions(
    instant: Date,
    location: GeoLocation | null,
    settings: EphemerisSettings,
  ): Promise<LayerPositions>;
}

/**
 * Cache statistics reported by a caching provider
 */
export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
  maxSize: number;
  /** hits / (hits + misses), 0 when nothing was looked up */
  hitRate: number;
  evictions: number;
}

/**
 * Provider that memoises results and reports on it
 */
export interface CachingEphemerisProvider extends EphemerisProvider {
  getCacheStats(): CacheStats;
  clearCache(): void;
}
