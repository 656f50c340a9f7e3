/**
 * Configuration schema types for the Astrolabe CLI
 */

import type { Ayanamsa, HouseSystem, ZodiacType } from '@astrolabe/types';

/**
 * Cache configuration
 */
export interface CacheConfigSchema {
  /** Maximum number of cached results */
  maxSize: number;
  /** Decimal places kept from coordinates when building cache keys */
  coordinatePrecision: number;
  /** Instants are bucketed to this many milliseconds (0 = exact) */
  timeResolutionMs: number;
}

/**
 * Ephemeris data configuration
 */
export interface EphemerisConfigSchema {
  /** Data directory; unset falls back to SWISS_EPHEMERIS_PATH and the built-in default */
  path?: string;
}

/**
 * Calculation defaults applied when the command line does not say otherwise
 */
export interface DefaultsConfigSchema {
  zodiacType: ZodiacType;
  ayanamsa: Ayanamsa | null;
  houseSystem: HouseSystem;
  includeObjects: string[];
}

/**
 * Complete Astrolabe configuration
 */
export interface AstrolabeConfig {
  cache: CacheConfigSchema;
  ephemeris: EphemerisConfigSchema;
  defaults: DefaultsConfigSchema;
}

/**
 * CLI options from command line arguments
 */
export interface CliOptions {
  /** Path to config file */
  config?: string;
  /** Instant to compute, ISO 8601 */
  date?: string;
  /** Observer latitude */
  lat?: number;
  /** Observer longitude */
  lon?: number;
  /** Zodiac frame */
  zodiac?: string;
  /** Ayanamsa for sidereal calculations */
  ayanamsa?: string;
  /** House system */
  houseSystem?: string;
  /** Objects to compute */
  objects?: string[];
  /** Number of times to run the calculation */
  repeat?: number;
  /** Print JSON instead of tables */
  json?: boolean;
  /** Ephemeris data directory */
  ephePath?: string;
  /** Cache size */
  cacheSize?: number;
  /** Print resolved config and exit */
  showConfig?: boolean;
  /** Disable colored output */
  noColor?: boolean;
}
