/**
 * Cache Configuration
 *
 * Configuration types and defaults for the ephemeris cache and its keys.
 */

import { ConfigurationError } from '../errors.js';

/**
 * Options controlling how calculation inputs are folded into cache keys
 */
export interface CacheKeyOptions {
  /**
   * Decimal places kept for latitude and longitude.
   * Four places is roughly 11 metres at the equator.
   */
  coordinatePrecision: number;

  /**
   * Width of the time bucket in milliseconds (0 = exact instant).
   * With 60000 every instant inside the same UTC minute shares a key.
   */
  timeResolutionMs: number;
}

/**
 * Cache configuration
 */
export interface EphemerisCacheConfig {
  /** Maximum number of cached position results */
  maxSize: number;
}

export const DEFAULT_CACHE_SIZE = 256;

export const DEFAULT_CACHE_CONFIG: EphemerisCacheConfig = {
  maxSize: DEFAULT_CACHE_SIZE,
};

export const DEFAULT_KEY_OPTIONS: CacheKeyOptions = {
  coordinatePrecision: 4,
  timeResolutionMs: 0,
};

/**
 * Check a cache size
 * @throws ConfigurationError unless maxSize is a positive integer
 */
export function validateMaxSize(maxSize: number): void {
  if (!Number.isInteger(maxSize) || maxSize <= 0) {
    throw new ConfigurationError(
      `Cache maxSize must be a positive integer, got ${String(maxSize)}`,
      'maxSize',
    );
  }
}

/**
 * Check key options
 * @throws ConfigurationError if precision or resolution is out of range
 */
export function validateKeyOptions(options: CacheKeyOptions): void {
  const { coordinatePrecision, timeResolutionMs } = options;

  // Doubles carry no more than ~15 significant decimal digits
  if (!Number.isInteger(coordinatePrecision) || coordinatePrecision < 0 || coordinatePrecision > 15) {
    throw new ConfigurationError(
      `coordinatePrecision must be an integer between 0 and 15, got ${String(coordinatePrecision)}`,
      'coordinatePrecision',
    );
  }

  if (!Number.isInteger(timeResolutionMs) || timeResolutionMs < 0) {
    throw new ConfigurationError(
      `timeResolutionMs must be a non-negative integer, got ${String(timeResolutionMs)}`,
      'timeResolutionMs',
    );
  }
}
