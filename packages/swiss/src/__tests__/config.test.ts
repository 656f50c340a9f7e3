import { describe, it, expect } from 'vitest';

import { resolveEphemerisPath } from '../config.js';
import { degreeInSign, normalizeLongitude, signOf } from '../signs.js';

describe('resolveEphemerisPath', () => {
  it('should prefer the explicit path', () => {
    expect(resolveEphemerisPath('/explicit', { SWISS_EPHEMERIS_PATH: '/env' })).toBe('/explicit');
  });

  it('should use the environment next', () => {
    expect(resolveEphemerisPath(undefined, { SWISS_EPHEMERIS_PATH: '/env' })).toBe('/env');
    expect(resolveEphemerisPath(null, { SWISS_EPHEMERIS_PATH: '/env' })).toBe('/env');
  });

  it('should treat blank values as unset', () => {
    expect(resolveEphemerisPath('  ', { SWISS_EPHEMERIS_PATH: '' })).toBe('/usr/local/share/swisseph');
  });

  it('should fall back to the default', () => {
    expect(resolveEphemerisPath(undefined, {})).toBe('/usr/local/share/swisseph');
  });
});

describe('signs', () => {
  it('should map longitudes to signs', () => {
    expect(signOf(0)).toBe('aries');
    expect(signOf(29.999)).toBe('aries');
    expect(signOf(30)).toBe('taurus');
    expect(signOf(280.5)).toBe('capricorn');
    expect(signOf(359.9)).toBe('pisces');
  });

  it('should wrap out-of-range longitudes', () => {
    expect(signOf(360)).toBe('aries');
    expect(signOf(-10)).toBe('pisces');
    expect(normalizeLongitude(-90)).toBe(270);
    expect(normalizeLongitude(725)).toBe(5);
  });

  it('should give the degree within the sign', () => {
    expect(degreeInSign(45)).toBe(15);
    expect(degreeInSign(-10)).toBe(20);
  });
});
