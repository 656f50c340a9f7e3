/**
 * @astrolabe/swiss - Swiss Ephemeris provider
 */

export {
  SwissEphemerisAdapter,
  resetLibraryState,
  toJulianDay,
  type SwissEphemerisAdapterOptions,
} from './adapter.js';

export { DEFAULT_EPHEMERIS_PATH, EPHEMERIS_PATH_ENV, resolveEphemerisPath } from './config.js';

export {
  AYANAMSA_MODES,
  DEFAULT_AYANAMSA,
  HOUSE_SYSTEM_CODES,
  PLANET_IDS,
  type DirectObjectId,
} from './constants.js';

export {
  SwissEphemerisError,
  EphemerisFileNotFoundError,
  EphemerisCalculationError,
  InvalidHouseSystemError,
  InvalidAyanamsaError,
} from './errors.js';

export { ZODIAC_SIGNS, degreeInSign, normalizeLongitude, signOf, type ZodiacSign } from './signs.js';

export {
  EPHEMERIS_FILE_EXTENSION,
  MIN_EPHEMERIS_FILE_BYTES,
  assertEphemerisPath,
  checkFileIntegrity,
  findEphemerisFiles,
  validateEphemerisFiles,
  validateEphemerisPath,
  type ValidationResult,
} from './validation.js';
