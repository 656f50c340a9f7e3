/**
 * Default configuration values
 */

import { DEFAULT_CACHE_SIZE, DEFAULT_KEY_OPTIONS } from '@astrolabe/core';

import type {
  AstrolabeConfig,
  CacheConfigSchema,
  DefaultsConfigSchema,
  EphemerisConfigSchema,
} from './schema.js';

/**
 * Default cache configuration
 */
export const DEFAULT_CACHE_CONFIG: CacheConfigSchema = {
  maxSize: DEFAULT_CACHE_SIZE,
  coordinatePrecision: DEFAULT_KEY_OPTIONS.coordinatePrecision,
  timeResolutionMs: DEFAULT_KEY_OPTIONS.timeResolutionMs,
};

/**
 * Default ephemeris configuration
 */
export const DEFAULT_EPHEMERIS_CONFIG: EphemerisConfigSchema = {};

/**
 * Default calculation settings: the ten classical bodies and the lunar nodes
 */
export const DEFAULT_SETTINGS_CONFIG: DefaultsConfigSchema = {
  zodiacType: 'tropical',
  ayanamsa: null,
  houseSystem: 'placidus',
  includeObjects: [
    'sun',
    'moon',
    'mercury',
    'venus',
    'mars',
    'jupiter',
    'saturn',
    'uranus',
    'neptune',
    'pluto',
    'north_node',
    'south_node',
  ],
};

/**
 * Complete default configuration
 */
export const DEFAULT_CONFIG: AstrolabeConfig = {
  cache: DEFAULT_CACHE_CONFIG,
  ephemeris: DEFAULT_EPHEMERIS_CONFIG,
  defaults: DEFAULT_SETTINGS_CONFIG,
};
