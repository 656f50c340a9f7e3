/**
 * CLI definition using Commander.js
 */

import { AYANAMSAS, HOUSE_SYSTEMS } from '@astrolabe/types';
import { Command, InvalidArgumentError } from 'commander';

import { parseList } from './config/loader.js';
import type { CliOptions } from './config/schema.js';

export const VERSION = '0.1.0';

const ZODIAC_HELP = `Zodiac frame:
    tropical - Equinox-based zodiac [default]
    sidereal - Star-based zodiac (see --ayanamsa)`;

const AYANAMSA_HELP = `Ayanamsa for sidereal calculations (default: lahiri):
    ${AYANAMSAS.join(', ')}
    none - use the default`;

const HOUSE_SYSTEM_HELP = `House system (default: placidus):
    ${HOUSE_SYSTEMS.join(', ')}`;

/**
 * Commander parser for numeric options
 */
function parseNumber(value: string): number {
  const num = Number(value);
  if (value.trim() === '' || Number.isNaN(num)) {
    throw new InvalidArgumentError(`Expected a number, got '${value}'.`);
  }
  return num;
}

/**
 * Commander parser for positive integer options
 */
function parsePositiveInt(value: string): number {
  const num = parseNumber(value);
  if (!Number.isInteger(num) || num < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got '${value}'.`);
  }
  return num;
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('astrolabe')
    .description('Planetary and house positions from the Swiss Ephemeris, with a result cache')
    .version(VERSION);

  // Positions command
  program
    .command('positions')
    .description('Compute planetary positions and houses for an instant')
    .option('-d, --date <iso>', 'Instant to compute, ISO 8601 (e.g. 2024-01-01T12:00:00Z)')
    .option('--lat <degrees>', 'Observer latitude, north positive', parseNumber)
    .option('--lon <degrees>', 'Observer longitude, east positive', parseNumber)
    .option('-z, --zodiac <type>', ZODIAC_HELP)
    .option('-a, --ayanamsa <name>', AYANAMSA_HELP)
    .option('-s, --house-system <name>', HOUSE_SYSTEM_HELP)
    .option('-o, --objects <list>', 'Comma-separated objects to compute', parseList)
    .option('-r, --repeat <n>', 'Run the calculation n times (exercises the cache)', parsePositiveInt)
    .option('--cache-size <n>', 'Maximum cached results (default: 256)', parsePositiveInt)
    .option('--ephe-path <dir>', 'Swiss Ephemeris data directory')
    .option('-c, --config <file>', 'Path to config file')
    .option('--json', 'Print JSON instead of tables')
    .option('--show-config', 'Print resolved configuration and exit')
    .option('--no-color', 'Disable colored output (useful for piping)')
    .action(async (options: Record<string, unknown>) => {
      // Import dynamically so --help does not load the ephemeris binding
      const { positionsCommand } = await import('./commands/positions.js');
      await positionsCommand(options);
    });

  // Validate command
  program
    .command('validate')
    .description('Check that the ephemeris data directory is usable')
    .option('--ephe-path <dir>', 'Swiss Ephemeris data directory')
    .option('-c, --config <file>', 'Path to config file')
    .option('--show-config', 'Print resolved configuration and exit')
    .option('--no-color', 'Disable colored output (useful for piping)')
    .action(async (options: Record<string, unknown>) => {
      const { validateCommand } = await import('./commands/validate.js');
      await validateCommand(options);
    });

  return program;
}

function stringOption(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  return typeof value === 'string' ? value : undefined;
}

function numberOption(options: Record<string, unknown>, key: string): number | undefined {
  const value = options[key];
  return typeof value === 'number' ? value : undefined;
}

function booleanOption(options: Record<string, unknown>, key: string): boolean | undefined {
  const value = options[key];
  return typeof value === 'boolean' ? value : undefined;
}

function listOption(options: Record<string, unknown>, key: string): string[] | undefined {
  const value = options[key];
  if (typeof value === 'string') return parseList(value);
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string');
  }
  return undefined;
}

/**
 * Parse CLI options from command options object
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  const result: CliOptions = {};

  const config = stringOption(options, 'config');
  if (config !== undefined) result.config = config;
  const date = stringOption(options, 'date');
  if (date !== undefined) result.date = date;
  const lat = numberOption(options, 'lat');
  if (lat !== undefined) result.lat = lat;
  const lon = numberOption(options, 'lon');
  if (lon !== undefined) result.lon = lon;
  const zodiac = stringOption(options, 'zodiac');
  if (zodiac !== undefined) result.zodiac = zodiac;
  const ayanamsa = stringOption(options, 'ayanamsa');
  if (ayanamsa !== undefined) result.ayanamsa = ayanamsa;
  const houseSystem = stringOption(options, 'houseSystem');
  if (houseSystem !== undefined) result.houseSystem = houseSystem;
  const objects = listOption(options, 'objects');
  if (objects !== undefined) result.objects = objects;
  const repeat = numberOption(options, 'repeat');
  if (repeat !== undefined) result.repeat = repeat;
  const cacheSize = numberOption(options, 'cacheSize');
  if (cacheSize !== undefined) result.cacheSize = cacheSize;
  const ephePath = stringOption(options, 'ephePath');
  if (ephePath !== undefined) result.ephePath = ephePath;
  const json = booleanOption(options, 'json');
  if (json !== undefined) result.json = json;
  const showConfig = booleanOption(options, 'showConfig');
  if (showConfig !== undefined) result.showConfig = showConfig;
  // Note: Commander.js uses 'color' (negated) when --no-color is used
  if (options['color'] === false) result.noColor = true;

  return result;
}
