/**
 * Cache key generation for position calculations
 *
 * Keys identify a calculation by its logical inputs, so that equivalent calls
 * share one cache entry:
 * - the instant as UTC epoch milliseconds (offsets in the source string are
 *   already folded into a Date), optionally bucketed
 * - latitude/longitude rounded to a fixed number of decimals
 * - the settings, with the object list treated as a set
 *
 * Key format: "positions:<ms>|<lat>,<lon>|<zodiac>|<ayanamsa>|<houses>|<objects>"
 * The ayanamsa is "-" unless the zodiac is sidereal. Names are URI-encoded so
 * that separators inside them cannot merge segments.
 * Example: "positions:1704110400000|40.7128,-74.0060|tropical|-|placidus|moon,sun"
 */

import type { EphemerisSettings, GeoLocation } from '@astrolabe/types';

import { type CacheKeyOptions, DEFAULT_KEY_OPTIONS } from './cache-config.js';

const KEY_PREFIX = 'positions';

/** Placeholder for absent optional inputs */
const NONE = '-';

/**
 * Escape separator characters inside a caller-supplied value
 */
function encodeSegment(value: string): string {
  return encodeURIComponent(value);
}

/**
 * Normalize an instant to UTC epoch milliseconds
 *
 * @param instant - Moment to normalize
 * @param resolutionMs - Bucket width (0 keeps the exact millisecond)
 * @returns Epoch milliseconds as a string ("NaN" for an invalid Date)
 *
 * @example
 * normalizeInstant(new Date('2024-01-01T07:00:00-05:00'))
 * // Returns: '1704110400000'
 */
export function normalizeInstant(instant: Date, resolutionMs: number = 0): string {
  const ms = instant.getTime();
  if (Number.isNaN(ms)) {
    return 'NaN';
  }
  if (resolutionMs > 0) {
    return String(Math.floor(ms / resolutionMs) * resolutionMs);
  }
  return String(ms);
}

/**
 * Round a coordinate to a fixed number of decimals
 *
 * Negative zero is folded into zero so that -0.00001 and 0.00001 agree.
 *
 * @example
 * normalizeCoordinate(-74.00601234, 4)
 * // Returns: '-74.0060'
 */
export function normalizeCoordinate(value: number, precision: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }
  const rounded = Number(value.toFixed(precision));
  return (rounded === 0 ? 0 : rounded).toFixed(precision);
}

/**
 * Canonical form of a requested-object list: trimmed, lower-cased,
 * de-duplicated and sorted
 */
export function normalizeObjects(objects: readonly string[]): string[] {
  const unique = new Set(objects.map((id) => id.trim().toLowerCase()));
  return Array.from(unique).sort();
}

/**
 * Build the cache key for a calculation
 *
 * Pure and total: never throws for values the types admit.
 */
export function buildCacheKey(
  instant: Date,
  location: GeoLocation | null,
  settings: EphemerisSettings,
  options: CacheKeyOptions = DEFAULT_KEY_OPTIONS,
): string {
  const time = normalizeInstant(instant, options.timeResolutionMs);

  const place = location
    ? `${normalizeCoordinate(location.lat, options.coordinatePrecision)},${normalizeCoordinate(
        location.lon,
        options.coordinatePrecision,
      )}`
    : NONE;

  const zodiac = settings.zodiacType.trim().toLowerCase();
  // Tropical results do not depend on the ayanamsa
  const ayanamsa =
    zodiac === 'sidereal' && settings.ayanamsa
      ? encodeSegment(settings.ayanamsa.trim().toLowerCase())
      : NONE;
  const houses = encodeSegment(settings.houseSystem.trim().toLowerCase());
  const objects = normalizeObjects(settings.includeObjects).map(encodeSegment).join(',');

  return `${KEY_PREFIX}:${time}|${place}|${encodeSegment(zodiac)}|${ayanamsa}|${houses}|${objects}`;
}
