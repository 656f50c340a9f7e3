/**
 * Position request building tests
 */

import { describe, it, expect } from 'vitest';

import { buildPositionsRequest, parseInstant, parseLocation } from '../commands/request.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { InputError } from '../errors/cli-errors.js';

describe('parseInstant', () => {
  it('should parse an instant with an offset', () => {
    expect(parseInstant('2024-01-01T12:00:00+02:00').toISOString()).toBe(
      '2024-01-01T10:00:00.000Z',
    );
  });

  it('should read a time without an offset as UTC', () => {
    expect(parseInstant('2024-01-01T12:00:00').toISOString()).toBe('2024-01-01T12:00:00.000Z');
  });

  it('should read a bare date as midnight UTC', () => {
    expect(parseInstant('2024-03-20').toISOString()).toBe('2024-03-20T00:00:00.000Z');
  });

  it('should reject a missing date', () => {
    expect(() => parseInstant(undefined)).toThrow(InputError);
    expect(() => parseInstant('   ')).toThrow('No date provided');
  });

  it('should reject an unparseable date', () => {
    expect(() => parseInstant('yesterday')).toThrow('Invalid date: yesterday');
  });
});

describe('parseLocation', () => {
  it('should return null without coordinates', () => {
    expect(parseLocation(undefined, undefined)).toBeNull();
  });

  it('should build a location from both coordinates', () => {
    expect(parseLocation(51.5, -0.12)).toEqual({ lat: 51.5, lon: -0.12 });
  });

  it('should require both coordinates', () => {
    expect(() => parseLocation(51.5, undefined)).toThrow(
      'Latitude and longitude must be given together',
    );
  });

  it('should reject coordinates out of range', () => {
    expect(() => parseLocation(91, 0)).toThrow('Latitude out of range: 91');
    expect(() => parseLocation(0, -181)).toThrow('Longitude out of range: -181');
  });
});

describe('buildPositionsRequest', () => {
  it('should take settings from the configuration', () => {
    const request = buildPositionsRequest(
      { date: '2024-01-01T12:00:00Z', lat: 40.7128, lon: -74.006 },
      DEFAULT_CONFIG,
    );

    expect(request.instant.toISOString()).toBe('2024-01-01T12:00:00.000Z');
    expect(request.location).toEqual({ lat: 40.7128, lon: -74.006 });
    expect(request.settings).toEqual({
      zodiacType: 'tropical',
      ayanamsa: null,
      houseSystem: 'placidus',
      includeObjects: DEFAULT_CONFIG.defaults.includeObjects,
    });
    expect(request.repeat).toBe(1);
  });

  it('should copy the object list', () => {
    const request = buildPositionsRequest({ date: '2024-01-01' }, DEFAULT_CONFIG);
    expect(request.settings.includeObjects).not.toBe(DEFAULT_CONFIG.defaults.includeObjects);
  });

  it('should keep the repeat count', () => {
    expect(buildPositionsRequest({ date: '2024-01-01', repeat: 5 }, DEFAULT_CONFIG).repeat).toBe(5);
  });
});
