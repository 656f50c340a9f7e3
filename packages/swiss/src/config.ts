/**
 * Ephemeris path resolution
 */

/**
 * Default ephemeris data directory
 */
export const DEFAULT_EPHEMERIS_PATH = '/usr/local/share/swisseph';

/**
 * Environment variable naming the ephemeris data directory
 */
export const EPHEMERIS_PATH_ENV = 'SWISS_EPHEMERIS_PATH';

/**
 * Resolve the ephemeris data directory.
 *
 * Order: explicit value, then `SWISS_EPHEMERIS_PATH`, then the built-in default.
 * Blank values count as unset.
 */
export function resolveEphemerisPath(
  explicit?: string | null,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const fromArgument = explicit?.trim();
  if (fromArgument) {
    return fromArgument;
  }

  const fromEnv = env[EPHEMERIS_PATH_ENV]?.trim();
  if (fromEnv) {
    return fromEnv;
  }

  return DEFAULT_EPHEMERIS_PATH;
}
