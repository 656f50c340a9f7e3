/**
 * Error classes for Swiss Ephemeris operations
 */

/**
 * Base error class for Swiss Ephemeris errors
 */
export class SwissEphemerisError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SwissEphemerisError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SwissEphemerisError);
    }
  }
}

/**
 * Error thrown when the ephemeris data files cannot be found
 */
export class EphemerisFileNotFoundError extends SwissEphemerisError {
  constructor(
    public readonly path: string,
    message?: string,
  ) {
    super(
      message ??
        [
          `Swiss Ephemeris data files not found at: ${path}`,
          'Make sure the Swiss Ephemeris data files (.se1) are installed. You can:',
          '  1. Set the SWISS_EPHEMERIS_PATH environment variable to the correct path',
          `  2. Install the data files to ${path}`,
          '  3. Pass ephemerisPath to SwissEphemerisAdapter',
          '',
          'Licensing and download information:',
          '  https://www.astro.com/swisseph/swephinfo_e.htm',
        ].join('\n'),
    );
    this.name = 'EphemerisFileNotFoundError';
  }
}

/**
 * Error thrown when a calculation fails
 */
export class EphemerisCalculationError extends SwissEphemerisError {
  constructor(
    message: string,
    public readonly planetId?: string,
    public readonly instant?: Date,
  ) {
    super(
      `${message}${planetId ? ` (planet: ${planetId})` : ''}${
        instant ? ` (instant: ${formatInstant(instant)})` : ''
      }`,
    );
    this.name = 'EphemerisCalculationError';
  }
}

/**
 * Error thrown when an unknown house system is requested
 */
export class InvalidHouseSystemError extends SwissEphemerisError {
  constructor(
    public readonly houseSystem: string,
    public readonly validSystems: readonly string[] = [],
  ) {
    super(
      `Invalid house system: ${houseSystem}${
        validSystems.length > 0 ? `\nValid house systems: ${validSystems.join(', ')}` : ''
      }`,
    );
    this.name = 'InvalidHouseSystemError';
  }
}

/**
 * Error thrown when an unknown ayanamsa is requested
 */
export class InvalidAyanamsaError extends SwissEphemerisError {
  constructor(
    public readonly ayanamsa: string,
    public readonly validAyanamsas: readonly string[] = [],
  ) {
    super(
      `Invalid ayanamsa: ${ayanamsa}${
        validAyanamsas.length > 0 ? `\nValid ayanamsas: ${validAyanamsas.join(', ')}` : ''
      }`,
    );
    this.name = 'InvalidAyanamsaError';
  }
}

function formatInstant(instant: Date): string {
  return Number.isNaN(instant.getTime()) ? 'Invalid Date' : instant.toISOString();
}
