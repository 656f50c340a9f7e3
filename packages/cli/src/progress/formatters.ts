/**
 * Output formatting utilities
 */

import { normalizeLongitude, signOf } from '@astrolabe/swiss/signs';
import {
  CELESTIAL_OBJECTS,
  type CacheStats,
  type HouseNumber,
  type LayerPositions,
  type PlanetPosition,
} from '@astrolabe/types';

import type { AstrolabeConfig } from '../config/schema.js';

import { PLAIN_COLORS } from './colors.js';
import type { ColorFunctions } from './types.js';

const ARCMINUTES_PER_CIRCLE = 360 * 60;
const ARCMINUTES_PER_SIGN = 30 * 60;

const HOUSE_NUMBERS: readonly HouseNumber[] = [
  '1',
  '2',
  '3',
  '4',
  '5',
  '6',
  '7',
  '8',
  '9',
  '10',
  '11',
  '12',
];

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/**
 * Format an ecliptic longitude as degrees and minutes within its sign,
 * e.g. 280.5 -> "10°30' Capricorn"
 */
export function formatLongitude(longitude: number): string {
  const total = Math.round(normalizeLongitude(longitude) * 60) % ARCMINUTES_PER_CIRCLE;
  const sign = signOf(total / 60);
  const within = total % ARCMINUTES_PER_SIGN;
  const degrees = Math.floor(within / 60);
  const minutes = within % 60;
  return `${degrees}°${String(minutes).padStart(2, '0')}' ${capitalize(sign)}`;
}

/**
 * Format daily motion, e.g. "+1.0191°/d"
 */
export function formatSpeed(speed: number): string {
  return `${speed >= 0 ? '+' : ''}${speed.toFixed(4)}°/d`;
}

/**
 * One table row for a planet
 */
export function formatPlanetRow(id: string, position: PlanetPosition): string {
  return `${id.padEnd(12)}${formatLongitude(position.lon).padStart(18)}  ${formatSpeed(
    position.speedLon,
  )}${position.retrograde ? ' R' : ''}`;
}

/**
 * Format a calculation result as plain tables
 */
export function formatPositionsTable(
  positions: LayerPositions,
  c: ColorFunctions = PLAIN_COLORS,
): string {
  const lines: string[] = [];

  lines.push(c.bold('Planets'));
  for (const id of CELESTIAL_OBJECTS) {
    const position = positions.planets[id];
    if (position) {
      lines.push(`  ${formatPlanetRow(id, position)}`);
    }
  }

  if (positions.houses) {
    const { system, cusps, angles } = positions.houses;
    lines.push('');
    lines.push(c.bold(`Houses (${system})`));
    for (const house of HOUSE_NUMBERS) {
      const cusp = cusps[house];
      if (cusp !== undefined) {
        lines.push(`  ${house.padStart(2)}  ${formatLongitude(cusp)}`);
      }
    }
    lines.push('');
    lines.push(c.bold('Angles'));
    lines.push(`  ASC ${formatLongitude(angles.asc)}`);
    lines.push(`  MC  ${formatLongitude(angles.mc)}`);
    lines.push(`  DC  ${formatLongitude(angles.dc)}`);
    lines.push(`  IC  ${formatLongitude(angles.ic)}`);
  }

  return lines.join('\n');
}

/**
 * One-line cache summary
 */
export function formatCacheStats(stats: CacheStats): string {
  return [
    `Cache: ${stats.hits} hits`,
    `${stats.misses} misses`,
    `hit rate ${(stats.hitRate * 100).toFixed(1)}%`,
    `${stats.size}/${stats.maxSize} entries`,
    `${stats.evictions} evictions`,
  ].join(', ');
}

/**
 * Format configuration for display
 */
export function formatConfigDisplay(
  config: AstrolabeConfig,
  c: ColorFunctions = PLAIN_COLORS,
): string {
  const lines: string[] = [];

  lines.push(c.bold('Configuration:'));
  lines.push('');

  // Cache
  lines.push(c.dim('Cache:'));
  lines.push(`  Max size: ${config.cache.maxSize}`);
  lines.push(`  Coordinate precision: ${config.cache.coordinatePrecision}`);
  lines.push(`  Time resolution: ${config.cache.timeResolutionMs}ms`);
  lines.push('');

  // Ephemeris
  lines.push(c.dim('Ephemeris:'));
  lines.push(`  Path: ${config.ephemeris.path ?? c.yellow('(library default)')}`);
  lines.push('');

  // Defaults
  lines.push(c.dim('Defaults:'));
  lines.push(`  Zodiac: ${config.defaults.zodiacType}`);
  lines.push(`  Ayanamsa: ${config.defaults.ayanamsa ?? 'default'}`);
  lines.push(`  House system: ${config.defaults.houseSystem}`);
  lines.push(`  Objects: ${config.defaults.includeObjects.join(', ')}`);

  return lines.join('\n');
}

/**
 * Format a time duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}
