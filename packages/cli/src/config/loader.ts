/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import * as fs from 'node:fs';

import { cosmiconfig } from 'cosmiconfig';

import { ConfigError, resolveAbsolutePath } from '../errors/cli-errors.js';

import { DEFAULT_CONFIG } from './defaults.js';
import type { AstrolabeConfig, CliOptions } from './schema.js';
import {
  validateConfig,
  validatePartialConfig,
  type PartialAstrolabeConfig,
} from './validation.js';

type ConfigSection = keyof AstrolabeConfig;

type EnvValueKind = 'number' | 'string' | 'list' | 'nullable';

interface EnvBinding {
  section: ConfigSection;
  key: string;
  kind: EnvValueKind;
}

/**
 * Environment variable mapping
 * Maps env var names to config locations
 */
const ENV_VAR_MAP: Record<string, EnvBinding> = {
  // Ephemeris
  SWISS_EPHEMERIS_PATH: { section: 'ephemeris', key: 'path', kind: 'string' },

  // Cache
  ASTROLABE_CACHE_SIZE: { section: 'cache', key: 'maxSize', kind: 'number' },
  ASTROLABE_COORDINATE_PRECISION: { section: 'cache', key: 'coordinatePrecision', kind: 'number' },
  ASTROLABE_TIME_RESOLUTION_MS: { section: 'cache', key: 'timeResolutionMs', kind: 'number' },

  // Calculation defaults
  ASTROLABE_ZODIAC: { section: 'defaults', key: 'zodiacType', kind: 'string' },
  ASTROLABE_AYANAMSA: { section: 'defaults', key: 'ayanamsa', kind: 'nullable' },
  ASTROLABE_HOUSE_SYSTEM: { section: 'defaults', key: 'houseSystem', kind: 'string' },
  ASTROLABE_OBJECTS: { section: 'defaults', key: 'includeObjects', kind: 'list' },
};

/**
 * Split a comma-separated list, dropping blanks
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Parse environment variable value based on expected type.
 * Unparseable numbers stay strings so validation can name them.
 */
function parseEnvValue(value: string, kind: EnvValueKind): unknown {
  switch (kind) {
    case 'number': {
      const num = Number(value);
      return value.trim() === '' || Number.isNaN(num) ? value : num;
    }
    case 'list':
      return parseList(value);
    case 'nullable':
      return value.toLowerCase() === 'none' ? null : value;
    case 'string':
      return value;
  }
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialAstrolabeConfig {
  const config: Partial<Record<ConfigSection, Record<string, unknown>>> = {};

  for (const [envVar, binding] of Object.entries(ENV_VAR_MAP)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      const section = (config[binding.section] ??= {});
      section[binding.key] = parseEnvValue(value, binding.kind);
    }
  }

  return validatePartialConfig(config);
}

/**
 * Load configuration from config file using cosmiconfig.
 * A missing file is not an error; a broken one is.
 */
export async function loadConfigFile(
  configPath?: string,
  searchFrom?: string,
): Promise<PartialAstrolabeConfig | null> {
  const explorer = cosmiconfig('astrolabe', {
    searchPlaces: [
      'package.json',
      '.astrolaberc',
      '.astrolaberc.json',
      '.astrolaberc.yaml',
      '.astrolaberc.yml',
      '.astrolaberc.js',
      '.astrolaberc.cjs',
      'astrolabe.config.js',
      'astrolabe.config.cjs',
    ],
  });

  if (configPath && !fs.existsSync(resolveAbsolutePath(configPath))) {
    throw new ConfigError(
      `Config file not found: ${resolveAbsolutePath(configPath)}`,
      'Check the --config path and try again',
    );
  }

  const result = configPath ? await explorer.load(configPath) : await explorer.search(searchFrom);
  if (!result || result.isEmpty) {
    return null;
  }

  return validatePartialConfig(result.config);
}

/**
 * Map CLI options to config object
 */
export function mapCliToConfig(options: CliOptions): Record<ConfigSection, Record<string, unknown>> {
  const cache: Record<string, unknown> = {};
  const ephemeris: Record<string, unknown> = {};
  const defaults: Record<string, unknown> = {};

  if (options.cacheSize !== undefined) cache['maxSize'] = options.cacheSize;
  if (options.ephePath !== undefined) ephemeris['path'] = options.ephePath;
  if (options.zodiac !== undefined) defaults['zodiacType'] = options.zodiac;
  if (options.ayanamsa !== undefined) {
    defaults['ayanamsa'] = options.ayanamsa.toLowerCase() === 'none' ? null : options.ayanamsa;
  }
  if (options.houseSystem !== undefined) defaults['houseSystem'] = options.houseSystem;
  if (options.objects !== undefined) defaults['includeObjects'] = options.objects;

  return { cache, ephemeris, defaults };
}

/**
 * Deep merge configuration layers
 * Source values override target values
 */
function deepMerge(target: AstrolabeConfig, source: PartialAstrolabeConfig): AstrolabeConfig {
  return {
    cache: { ...target.cache, ...source.cache },
    ephemeris: { ...target.ephemeris, ...source.ephemeris },
    defaults: {
      ...target.defaults,
      ...source.defaults,
      includeObjects: [...(source.defaults?.includeObjects ?? target.defaults.includeObjects)],
    },
  };
}

/**
 * Where configuration is read from
 */
export interface ConfigSources {
  env?: NodeJS.ProcessEnv;
  /** Directory the config file search starts in (defaults to cwd) */
  searchFrom?: string;
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */
export async function loadConfig(
  cliOptions: CliOptions,
  sources: ConfigSources = {},
): Promise<AstrolabeConfig> {
  // 1. Start with defaults
  let config = deepMerge(DEFAULT_CONFIG, {});

  // 2. Load and merge config file (if exists)
  const fileConfig = await loadConfigFile(cliOptions.config, sources.searchFrom);
  if (fileConfig) {
    config = deepMerge(config, fileConfig);
  }

  // 3. Apply environment variables
  config = deepMerge(config, loadEnvConfig(sources.env));

  // 4. Apply CLI arguments (highest priority)
  config = deepMerge(config, validatePartialConfig(mapCliToConfig(cliOptions)));

  // 5. Validate final config
  return validateConfig(config);
}

/**
 * Format configuration for display
 */
export function formatConfig(config: AstrolabeConfig): string {
  return JSON.stringify(config, null, 2);
}
