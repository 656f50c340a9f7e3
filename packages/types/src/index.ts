/**
 * @astrolabe/types - Shared type definitions for Astrolabe
 *
 * This package provides a stable import location for types used across
 * multiple packages.
 *
 * Usage:
 *   import type { EphemerisSettings, LayerPositions } from '@astrolabe/types';
 *   import type { EphemerisProvider } from '@astrolabe/types/services';
 */

// Settings, locations and position payloads
export * from './ephemeris/index.js';

// Service contracts
export type {
  EphemerisProvider,
  CacheStats,
  CachingEphemerisProvider,
} from './services/index.js';
