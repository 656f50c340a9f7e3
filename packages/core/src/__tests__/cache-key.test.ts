import { describe, it, expect } from 'vitest';

import type { EphemerisSettings } from '@astrolabe/types';

import {
  buildCacheKey,
  normalizeCoordinate,
  normalizeInstant,
  normalizeObjects,
} from '../cache/cache-key.js';

const SETTINGS: EphemerisSettings = {
  zodiacType: 'tropical',
  ayanamsa: null,
  houseSystem: 'placidus',
  includeObjects: ['sun', 'moon'],
};

const NEW_YORK = { lat: 40.7128, lon: -74.006 };

describe('Cache Key Utilities', () => {
  describe('normalizeInstant', () => {
    it('should return UTC epoch milliseconds', () => {
      expect(normalizeInstant(new Date('2024-01-01T12:00:00Z'))).toBe('1704110400000');
    });

    it('should give the same value for one moment in different offsets', () => {
      const utc = new Date('2024-01-01T12:00:00Z');
      const newYork = new Date('2024-01-01T07:00:00-05:00');
      const kolkata = new Date('2024-01-01T17:30:00+05:30');
      expect(normalizeInstant(newYork)).toBe(normalizeInstant(utc));
      expect(normalizeInstant(kolkata)).toBe(normalizeInstant(utc));
    });

    it('should bucket to the requested resolution', () => {
      const instant = new Date('2024-01-01T12:00:42.500Z');
      expect(normalizeInstant(instant, 60_000)).toBe('1704110400000');
    });

    it('should map an invalid date to NaN without throwing', () => {
      expect(normalizeInstant(new Date('not a date'))).toBe('NaN');
      expect(normalizeInstant(new Date('not a date'), 60_000)).toBe('NaN');
    });
  });

  describe('normalizeCoordinate', () => {
    it('should round to the given precision', () => {
      expect(normalizeCoordinate(-74.00601234, 4)).toBe('-74.0060');
      expect(normalizeCoordinate(40.71284999, 4)).toBe('40.7128');
    });

    it('should absorb floating noise below the precision', () => {
      expect(normalizeCoordinate(0.1 + 0.2, 4)).toBe(normalizeCoordinate(0.3, 4));
    });

    it('should fold negative zero into zero', () => {
      expect(normalizeCoordinate(-0.00001, 4)).toBe('0.0000');
      expect(normalizeCoordinate(-0, 2)).toBe('0.00');
    });

    it('should pass non-finite values through', () => {
      expect(normalizeCoordinate(Number.NaN, 4)).toBe('NaN');
      expect(normalizeCoordinate(Number.POSITIVE_INFINITY, 4)).toBe('Infinity');
    });
  });

  describe('normalizeObjects', () => {
    it('should sort, lower-case, trim and de-duplicate', () => {
      expect(normalizeObjects(['Moon', 'sun ', 'moon', 'MARS'])).toEqual(['mars', 'moon', 'sun']);
    });

    it('should handle an empty list', () => {
      expect(normalizeObjects([])).toEqual([]);
    });
  });

  describe('buildCacheKey', () => {
    it('should produce the documented format', () => {
      const key = buildCacheKey(new Date('2024-01-01T12:00:00Z'), NEW_YORK, SETTINGS);
      expect(key).toBe('positions:1704110400000|40.7128,-74.0060|tropical|-|placidus|moon,sun');
    });

    it('should ignore object order', () => {
      const instant = new Date('2024-01-01T12:00:00Z');
      const a = buildCacheKey(instant, NEW_YORK, { ...SETTINGS, includeObjects: ['sun', 'moon', 'mars'] });
      const b = buildCacheKey(instant, NEW_YORK, { ...SETTINGS, includeObjects: ['mars', 'sun', 'moon'] });
      expect(a).toBe(b);
    });

    it('should treat a null and an absent ayanamsa alike', () => {
      const instant = new Date('2024-01-01T12:00:00Z');
      const withNull = buildCacheKey(instant, null, { ...SETTINGS, ayanamsa: null });
      const { ayanamsa: _omitted, ...withoutAyanamsa } = SETTINGS;
      expect(buildCacheKey(instant, null, withoutAyanamsa)).toBe(withNull);
    });

    it('should mark a missing location', () => {
      const key = buildCacheKey(new Date('2024-01-01T12:00:00Z'), null, SETTINGS);
      expect(key).toBe('positions:1704110400000|-|tropical|-|placidus|moon,sun');
    });

    it('should distinguish every setting', () => {
      const instant = new Date('2024-01-01T12:00:00Z');
      const base = buildCacheKey(instant, NEW_YORK, SETTINGS);

      expect(buildCacheKey(instant, NEW_YORK, { ...SETTINGS, zodiacType: 'sidereal' })).not.toBe(base);
      expect(
        buildCacheKey(instant, NEW_YORK, { ...SETTINGS, zodiacType: 'sidereal', ayanamsa: 'raman' }),
      ).not.toBe(buildCacheKey(instant, NEW_YORK, { ...SETTINGS, zodiacType: 'sidereal' }));
      expect(buildCacheKey(instant, NEW_YORK, { ...SETTINGS, houseSystem: 'koch' })).not.toBe(base);
      expect(buildCacheKey(instant, NEW_YORK, { ...SETTINGS, includeObjects: ['sun'] })).not.toBe(base);
      expect(buildCacheKey(instant, { lat: 51.5074, lon: -0.1278 }, SETTINGS)).not.toBe(base);
      expect(buildCacheKey(new Date('2024-01-01T12:00:01Z'), NEW_YORK, SETTINGS)).not.toBe(base);
    });

    it('should ignore the ayanamsa for tropical requests', () => {
      const instant = new Date('2024-01-01T12:00:00Z');
      expect(buildCacheKey(instant, null, { ...SETTINGS, ayanamsa: 'raman' })).toBe(
        buildCacheKey(instant, null, SETTINGS),
      );
    });

    it('should include the ayanamsa for sidereal requests', () => {
      const key = buildCacheKey(new Date('2024-01-01T12:00:00Z'), null, {
        ...SETTINGS,
        zodiacType: 'sidereal',
        ayanamsa: 'lahiri',
      });
      expect(key).toBe('positions:1704110400000|-|sidereal|lahiri|placidus|moon,sun');
    });

    it('should not let a comma inside an object id merge with the list separator', () => {
      const instant = new Date('2024-01-01T12:00:00Z');
      const single = buildCacheKey(instant, null, { ...SETTINGS, includeObjects: ['moon,sun'] });
      const pair = buildCacheKey(instant, null, { ...SETTINGS, includeObjects: ['sun', 'moon'] });

      expect(single).not.toBe(pair);
      expect(single).toBe('positions:1704110400000|-|tropical|-|placidus|moon%2Csun');
    });

    it('should escape separators in the other segments', () => {
      const instant = new Date('2024-01-01T12:00:00Z');
      const settings = Object.assign({ ...SETTINGS }, { houseSystem: 'koch|sun' });
      const key = buildCacheKey(instant, null, settings);
      expect(key).toBe('positions:1704110400000|-|tropical|-|koch%7Csun|moon,sun');
    });

    it('should honour custom key options', () => {
      const key = buildCacheKey(new Date('2024-01-01T12:00:42Z'), NEW_YORK, SETTINGS, {
        coordinatePrecision: 1,
        timeResolutionMs: 60_000,
      });
      expect(key).toBe('positions:1704110400000|40.7,-74.0|tropical|-|placidus|moon,sun');
    });
  });
});
