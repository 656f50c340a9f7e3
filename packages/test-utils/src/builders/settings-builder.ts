/**
 * Fluent builder for EphemerisSettings test data
 */

import type { Ayanamsa, EphemerisSettings, GeoLocation, HouseSystem } from '@astrolabe/types';

/**
 * 2024-01-01 12:00 UTC
 */
export const SAMPLE_INSTANT = new Date('2024-01-01T12:00:00Z');

/**
 * New York
 */
export const SAMPLE_LOCATION: GeoLocation = { lat: 40.7128, lon: -74.006 };

export const DEFAULT_TEST_OBJECTS = ['sun', 'moon', 'mercury', 'venus', 'mars'] as const;

/**
 * Builder for settings objects
 */
export class SettingsBuilder {
  private settings: EphemerisSettings = {
    zodiacType: 'tropical',
    ayanamsa: null,
    houseSystem: 'placidus',
    includeObjects: [...DEFAULT_TEST_OBJECTS],
  };

  tropical(): this {
    this.settings = { ...this.settings, zodiacType: 'tropical', ayanamsa: null };
    return this;
  }

  sidereal(ayanamsa: Ayanamsa | null = 'lahiri'): this {
    this.settings = { ...this.settings, zodiacType: 'sidereal', ayanamsa };
    return this;
  }

  houses(houseSystem: HouseSystem): this {
    this.settings = { ...this.settings, houseSystem };
    return this;
  }

  objects(...includeObjects: string[]): this {
    this.settings = { ...this.settings, includeObjects };
    return this;
  }

  build(): EphemerisSettings {
    return { ...this.settings, includeObjects: [...this.settings.includeObjects] };
  }
}

/**
 * Start building settings
 */
export function ephemerisSettings(): SettingsBuilder {
  return new SettingsBuilder();
}
