/**
 * Configuration module exports
 */

// Schema types
export type {
  AstrolabeConfig,
  CacheConfigSchema,
  CliOptions,
  DefaultsConfigSchema,
  EphemerisConfigSchema,
} from './schema.js';

// Defaults
export {
  DEFAULT_CACHE_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_EPHEMERIS_CONFIG,
  DEFAULT_SETTINGS_CONFIG,
} from './defaults.js';

// Validation
export {
  configSchema,
  partialConfigSchema,
  ConfigValidationError,
  validateConfig,
  validatePartialConfig,
  type PartialAstrolabeConfig,
} from './validation.js';

// Loader
export {
  loadConfig,
  loadConfigFile,
  loadEnvConfig,
  formatConfig,
  parseList,
  type ConfigSources,
} from './loader.js';
