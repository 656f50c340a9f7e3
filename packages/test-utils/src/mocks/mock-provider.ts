/**
 * Mock ephemeris provider for testing
 *
 * Implements the EphemerisProvider interface with deterministic fake
 * positions, optional latency, failure injection and call/concurrency tracking.
 */

import { vi, type Mock } from 'vitest';

import type {
  EphemerisProvider,
  EphemerisSettings,
  GeoLocation,
  HousePositions,
  LayerPositions,
  PlanetPosition,
} from '@astrolabe/types';
import { isCelestialObjectId } from '@astrolabe/types';

type CalcPositions = EphemerisProvider['calcPositions'];

export interface MockProviderConfig {
  /** Simulate latency in milliseconds */
  latencyMs?: number;
  /** Return an error to reject the call with, or undefined to succeed */
  failWith?: (
    instant: Date,
    location: GeoLocation | null,
    settings: EphemerisSettings,
  ) => Error | undefined;
  /** Replace the generated positions */
  positions?: (
    instant: Date,
    location: GeoLocation | null,
    settings: EphemerisSettings,
  ) => LayerPositions;
}

export interface MockProvider extends EphemerisProvider {
  calcPositions: Mock<CalcPositions>;
  /** Number of calls made so far */
  callCount(): number;
  /** Highest number of calls that were in flight at the same time */
  maxConcurrentCalls(): number;
}

/**
 * Create a mock provider
 */
export function createMockProvider(config: MockProviderConfig = {}): MockProvider {
  const { latencyMs = 0, failWith, positions = generatePositions } = config;

  let active = 0;
  let maxActive = 0;

  const calcPositions = vi.fn<CalcPositions>(async (instant, location, settings) => {
    active++;
    maxActive = Math.max(maxActive, active);

    try {
      if (latencyMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, latencyMs));
      }

      const error = failWith?.(instant, location, settings);
      if (error) {
        throw error;
      }

      return positions(instant, location, settings);
    } finally {
      active--;
    }
  });

  return {
    calcPositions,
    callCount: () => calcPositions.mock.calls.length,
    maxConcurrentCalls: () => maxActive,
  };
}

/**
 * Generate deterministic fake positions from the inputs
 */
export function generatePositions(
  instant: Date,
  location: GeoLocation | null,
  settings: EphemerisSettings,
): LayerPositions {
  const planets: LayerPositions['planets'] = {};
  const minutes = Math.floor(instant.getTime() / 60_000);

  for (const id of settings.includeObjects) {
    const normalized = id.toLowerCase();
    if (!isCelestialObjectId(normalized)) continue;

    const lon = (simpleHash(`${normalized}:${minutes}`) % 36_000) / 100;
    const position: PlanetPosition = {
      lon,
      lat: 0,
      speedLon: 1,
      retrograde: false,
    };
    planets[normalized] = position;
  }

  let houses: HousePositions | null = null;
  if (location) {
    const asc = (simpleHash(`asc:${minutes}:${location.lat}:${location.lon}`) % 36_000) / 100;
    const mc = (asc + 270) % 360;
    houses = {
      system: settings.houseSystem,
      cusps: { '1': asc, '4': (mc + 180) % 360, '7': (asc + 180) % 360, '10': mc },
      angles: { asc, mc, ic: (mc + 180) % 360, dc: (asc + 180) % 360 },
    };
  }

  return { planets, houses };
}

/**
 * Simple hash function for deterministic variation
 */
function simpleHash(str: string): number {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);
    hash = (hash << 5) - hash + char;
    hash = hash & hash; // Convert to 32bit integer
  }
  return Math.abs(hash);
}
