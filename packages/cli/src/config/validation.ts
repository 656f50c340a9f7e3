/**
 * Zod validation schemas for configuration
 */

import { AYANAMSAS, HOUSE_SYSTEMS } from '@astrolabe/types';
import { z } from 'zod';

import type { AstrolabeConfig } from './schema.js';

/**
 * Zodiac type schema
 */
export const zodiacTypeSchema = z.enum(['tropical', 'sidereal']);

/**
 * Ayanamsa schema
 */
export const ayanamsaSchema = z.enum(AYANAMSAS);

/**
 * House system schema
 */
export const houseSystemSchema = z.enum(HOUSE_SYSTEMS);

/**
 * Cache configuration schema
 */
export const cacheConfigSchema = z.object({
  maxSize: z.number().int().min(1),
  coordinatePrecision: z.number().int().min(0).max(15),
  timeResolutionMs: z.number().int().min(0),
});

/**
 * Ephemeris configuration schema
 */
export const ephemerisConfigSchema = z.object({
  path: z.string().min(1).optional(),
});

/**
 * Calculation defaults schema
 */
export const defaultsConfigSchema = z.object({
  zodiacType: zodiacTypeSchema,
  ayanamsa: ayanamsaSchema.nullable(),
  houseSystem: houseSystemSchema,
  includeObjects: z.array(z.string().min(1)).min(1),
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  cache: cacheConfigSchema,
  ephemeris: ephemerisConfigSchema,
  defaults: defaultsConfigSchema,
});

/**
 * Partial configuration schema (for config files and environment variables)
 */
export const partialConfigSchema = z.object({
  cache: cacheConfigSchema.partial().optional(),
  ephemeris: ephemerisConfigSchema.partial().optional(),
  defaults: defaultsConfigSchema.partial().optional(),
});

export type PartialAstrolabeConfig = z.infer<typeof partialConfigSchema>;

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(public readonly errors: Array<{ path: string; message: string }>) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      'Configuration validation failed:',
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Use --help to see available options',
      'Use --show-config to see current configuration',
    ].join('\n');
  }
}

function toValidationError(error: z.ZodError): ConfigValidationError {
  return new ConfigValidationError(
    error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  );
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): AstrolabeConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate a partial configuration (from a config file or the environment)
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown): PartialAstrolabeConfig {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}
