import { describe, it, expect, beforeEach } from 'vitest';

import {
  createMockProvider,
  ephemerisSettings,
  SAMPLE_INSTANT,
  SAMPLE_LOCATION,
  type MockProvider,
} from '@astrolabe/test-utils';

import { CachedEphemerisAdapter, withCache } from '../adapter/cached-adapter.js';
import { EphemerisCache } from '../cache/ephemeris-cache.js';
import { ConfigurationError } from '../errors.js';

class CalculationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CalculationError';
  }
}

describe('CachedEphemerisAdapter', () => {
  let provider: MockProvider;
  let adapter: CachedEphemerisAdapter;

  beforeEach(() => {
    provider = createMockProvider();
    adapter = new CachedEphemerisAdapter(provider);
  });

  describe('constructor', () => {
    it('should create a 256-entry cache by default', () => {
      expect(adapter.getCacheStats().maxSize).toBe(256);
    });

    it('should honour maxSize', () => {
      expect(new CachedEphemerisAdapter(provider, { maxSize: 8 }).getCacheStats().maxSize).toBe(8);
      expect(withCache(provider, 16).getCacheStats().maxSize).toBe(16);
    });

    it('should use an injected cache', () => {
      const cache = new EphemerisCache({ maxSize: 4 });
      const injected = new CachedEphemerisAdapter(provider, { cache });
      expect(injected.cache).toBe(cache);
    });

    it('should reject an invalid maxSize', () => {
      expect(() => new CachedEphemerisAdapter(provider, { maxSize: 0 })).toThrow(ConfigurationError);
      expect(() => withCache(provider, -1)).toThrow(ConfigurationError);
    });

    it('should reject cache and maxSize together', () => {
      const cache = new EphemerisCache({ maxSize: 4 });
      expect(() => new CachedEphemerisAdapter(provider, { cache, maxSize: 4 })).toThrow(
        ConfigurationError,
      );
    });

    it('should reject invalid key options', () => {
      expect(
        () => new CachedEphemerisAdapter(provider, { key: { coordinatePrecision: -1 } }),
      ).toThrow(ConfigurationError);
      expect(() => new CachedEphemerisAdapter(provider, { key: { timeResolutionMs: 0.5 } })).toThrow(
        ConfigurationError,
      );
    });
  });

  describe('calcPositions', () => {
    it('should call the provider once and serve the repeat from the cache', async () => {
      const settings = ephemerisSettings().build();

      const first = await adapter.calcPositions(SAMPLE_INSTANT, SAMPLE_LOCATION, settings);
      const second = await adapter.calcPositions(SAMPLE_INSTANT, SAMPLE_LOCATION, settings);

      expect(second).toBe(first);
      expect(provider.callCount()).toBe(1);
      expect(adapter.getCacheStats()).toMatchObject({ hits: 1, misses: 1, size: 1 });
    });

    it('should pass the arguments to the provider unchanged', async () => {
      const settings = ephemerisSettings().objects('Sun', 'moon').build();
      await adapter.calcPositions(SAMPLE_INSTANT, null, settings);

      expect(provider.calcPositions).toHaveBeenCalledWith(SAMPLE_INSTANT, null, settings);
    });

    it('should hit for a reordered object list', async () => {
      await adapter.calcPositions(
        SAMPLE_INSTANT,
        SAMPLE_LOCATION,
        ephemerisSettings().objects('sun', 'moon', 'mars').build(),
      );
      await adapter.calcPositions(
        SAMPLE_INSTANT,
        SAMPLE_LOCATION,
        ephemerisSettings().objects('mars', 'sun', 'moon').build(),
      );

      expect(provider.callCount()).toBe(1);
      expect(adapter.getCacheStats().hits).toBe(1);
    });

    it('should hit for the same moment written with another offset', async () => {
      const settings = ephemerisSettings().build();
      await adapter.calcPositions(new Date('2024-01-01T12:00:00Z'), SAMPLE_LOCATION, settings);
      await adapter.calcPositions(new Date('2024-01-01T13:00:00+01:00'), SAMPLE_LOCATION, settings);

      expect(provider.callCount()).toBe(1);
    });

    it('should miss for different settings', async () => {
      await adapter.calcPositions(SAMPLE_INSTANT, SAMPLE_LOCATION, ephemerisSettings().build());
      await adapter.calcPositions(
        SAMPLE_INSTANT,
        SAMPLE_LOCATION,
        ephemerisSettings().sidereal('lahiri').build(),
      );

      expect(provider.callCount()).toBe(2);
      expect(adapter.getCacheStats()).toMatchObject({ hits: 0, misses: 2, size: 2 });
    });

    it('should keep a comma-joined object id apart from the object list', async () => {
      await adapter.calcPositions(
        SAMPLE_INSTANT,
        null,
        ephemerisSettings().objects('moon,sun').build(),
      );
      const positions = await adapter.calcPositions(
        SAMPLE_INSTANT,
        null,
        ephemerisSettings().objects('sun', 'moon').build(),
      );

      expect(provider.callCount()).toBe(2);
      expect(Object.keys(positions.planets).sort()).toEqual(['moon', 'sun']);
    });

    it('should share tropical results whatever the ayanamsa', async () => {
      const tropical = ephemerisSettings().build();
      await adapter.calcPositions(SAMPLE_INSTANT, null, tropical);
      await adapter.calcPositions(SAMPLE_INSTANT, null, { ...tropical, ayanamsa: 'raman' });

      expect(provider.callCount()).toBe(1);
    });

    it('should recompute after eviction', async () => {
      const small = new CachedEphemerisAdapter(provider, { maxSize: 1 });
      const settings = ephemerisSettings().build();

      await small.calcPositions(new Date('2024-01-01T00:00:00Z'), null, settings);
      await small.calcPositions(new Date('2024-01-02T00:00:00Z'), null, settings);
      await small.calcPositions(new Date('2024-01-01T00:00:00Z'), null, settings);

      expect(provider.callCount()).toBe(3);
      expect(small.getCacheStats()).toMatchObject({ misses: 3, evictions: 2, size: 1 });
    });
  });

  describe('error transparency', () => {
    it('should propagate provider errors and cache nothing', async () => {
      const failure = new CalculationError('Date out of ephemeris range');
      const failing = createMockProvider({ failWith: () => failure });
      const cached = new CachedEphemerisAdapter(failing);
      const settings = ephemerisSettings().build();

      await expect(cached.calcPositions(SAMPLE_INSTANT, SAMPLE_LOCATION, settings)).rejects.toBe(
        failure,
      );
      expect(cached.getCacheStats()).toMatchObject({ hits: 0, misses: 1, size: 0 });

      await expect(cached.calcPositions(SAMPLE_INSTANT, SAMPLE_LOCATION, settings)).rejects.toBe(
        failure,
      );
      expect(cached.getCacheStats()).toMatchObject({ hits: 0, misses: 2, size: 0 });
      expect(failing.callCount()).toBe(2);
    });

    it('should keep serving other calls after a failure', async () => {
      const failing = createMockProvider({
        failWith: (instant) =>
          instant.getUTCFullYear() < 1800 ? new CalculationError('out of range') : undefined,
      });
      const cached = new CachedEphemerisAdapter(failing);
      const settings = ephemerisSettings().build();

      const bad = cached.calcPositions(new Date('1500-01-01T00:00:00Z'), null, settings);
      const good = cached.calcPositions(SAMPLE_INSTANT, null, settings);

      await expect(bad).rejects.toBeInstanceOf(CalculationError);
      await expect(good).resolves.toHaveProperty('planets');
      expect(cached.getCacheStats().size).toBe(1);
    });
  });

  describe('concurrency', () => {
    it('should call the provider once for 50 overlapping identical calls', async () => {
      const slow = createMockProvider({ latencyMs: 20 });
      const cached = new CachedEphemerisAdapter(slow);
      const settings = ephemerisSettings().build();

      const results = await Promise.all(
        Array.from({ length: 50 }, () =>
          cached.calcPositions(SAMPLE_INSTANT, SAMPLE_LOCATION, settings),
        ),
      );

      expect(slow.callCount()).toBe(1);
      expect(new Set(results).size).toBe(1);
      expect(cached.getCacheStats()).toMatchObject({ hits: 49, misses: 1 });
    });

    it('should never overlap provider calls for different keys', async () => {
      const slow = createMockProvider({ latencyMs: 5 });
      const cached = new CachedEphemerisAdapter(slow);
      const settings = ephemerisSettings().build();

      await Promise.all(
        Array.from({ length: 10 }, (_, day) =>
          cached.calcPositions(new Date(Date.UTC(2024, 0, day + 1)), null, settings),
        ),
      );

      expect(slow.callCount()).toBe(10);
      expect(slow.maxConcurrentCalls()).toBe(1);
    });
  });

  describe('clearCache', () => {
    it('should drop results but keep statistics', async () => {
      const settings = ephemerisSettings().build();
      await adapter.calcPositions(SAMPLE_INSTANT, null, settings);
      await adapter.calcPositions(SAMPLE_INSTANT, null, settings);

      adapter.clearCache();
      expect(adapter.getCacheStats()).toMatchObject({ hits: 1, misses: 1, size: 0 });

      await adapter.calcPositions(SAMPLE_INSTANT, null, settings);
      expect(provider.callCount()).toBe(2);
      expect(adapter.getCacheStats()).toMatchObject({ hits: 1, misses: 2, size: 1 });
    });
  });

  describe('getCacheStats', () => {
    it('should pass the cache statistics through', async () => {
      await adapter.calcPositions(SAMPLE_INSTANT, null, ephemerisSettings().build());
      expect(adapter.getCacheStats()).toEqual(adapter.cache.stats());
    });
  });
});
