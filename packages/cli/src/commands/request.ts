/**
 * Turn parsed CLI options and configuration into a position request
 */

import type { EphemerisSettings, GeoLocation } from '@astrolabe/types';

import type { AstrolabeConfig, CliOptions } from '../config/schema.js';
import { InputError } from '../errors/cli-errors.js';

export interface PositionsRequest {
  instant: Date;
  location: GeoLocation | null;
  settings: EphemerisSettings;
  repeat: number;
}

/**
 * Parse an ISO 8601 instant. A value without an offset is read as UTC.
 */
export function parseInstant(value: string | undefined): Date {
  if (value === undefined || value.trim() === '') {
    throw new InputError('No date provided', 'Pass --date, e.g. --date 2024-01-01T12:00:00Z');
  }

  const trimmed = value.trim();
  const hasTime = trimmed.includes('T');
  const hasOffset = /(?:Z|[+-]\d{2}:?\d{2})$/i.test(trimmed);
  const instant = new Date(hasTime && !hasOffset ? `${trimmed}Z` : trimmed);

  if (Number.isNaN(instant.getTime())) {
    throw new InputError(`Invalid date: ${value}`, 'Use ISO 8601, e.g. 2024-01-01T12:00:00Z');
  }
  return instant;
}

/**
 * Build an observer location; both coordinates or neither
 */
export function parseLocation(lat: number | undefined, lon: number | undefined): GeoLocation | null {
  if (lat === undefined && lon === undefined) {
    return null;
  }

  if (lat === undefined || lon === undefined) {
    throw new InputError(
      'Latitude and longitude must be given together',
      'Pass both --lat and --lon, or neither to skip houses',
    );
  }

  if (!Number.isFinite(lat) || lat < -90 || lat > 90) {
    throw new InputError(`Latitude out of range: ${lat}`, 'Latitude must be between -90 and 90');
  }

  if (!Number.isFinite(lon) || lon < -180 || lon > 180) {
    throw new InputError(`Longitude out of range: ${lon}`, 'Longitude must be between -180 and 180');
  }

  return { lat, lon };
}

/**
 * Build the full request; settings come from the resolved configuration
 */
export function buildPositionsRequest(
  options: CliOptions,
  config: AstrolabeConfig,
): PositionsRequest {
  return {
    instant: parseInstant(options.date),
    location: parseLocation(options.lat, options.lon),
    settings: {
      zodiacType: config.defaults.zodiacType,
      ayanamsa: config.defaults.ayanamsa,
      houseSystem: config.defaults.houseSystem,
      includeObjects: [...config.defaults.includeObjects],
    },
    repeat: options.repeat ?? 1,
  };
}
