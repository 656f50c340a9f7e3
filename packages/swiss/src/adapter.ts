/**
 * Swiss Ephemeris provider
 *
 * Translates settings into sweph calls and shapes the results. All astronomy
 * (planetary motion, house geometry, ayanamsa offsets) stays in the library.
 */

import { calc_ut, constants, houses_ex2, julday, set_ephe_path, set_sid_mode } from 'sweph';

import {
  AYANAMSAS,
  HOUSE_SYSTEMS,
  isAyanamsa,
  isHouseSystem,
  type CelestialObjectId,
  type EphemerisProvider,
  type EphemerisSettings,
  type GeoLocation,
  type HouseNumber,
  type HousePositions,
  type HouseSystem,
  type LayerPositions,
  type PlanetPosition,
} from '@astrolabe/types';

import { resolveEphemerisPath } from './config.js';
import {
  AYANAMSA_MODES,
  DEFAULT_AYANAMSA,
  HOUSE_SYSTEM_CODES,
  PLANET_IDS,
  isDirectObjectId,
  type DirectObjectId,
} from './constants.js';
import {
  EphemerisCalculationError,
  InvalidAyanamsaError,
  InvalidHouseSystemError,
} from './errors.js';
import { normalizeLongitude } from './signs.js';

/**
 * Adapter options
 */
export interface SwissEphemerisAdapterOptions {
  /** Ephemeris data directory; falls back to SWISS_EPHEMERIS_PATH, then the default */
  ephemerisPath?: string | null;
  /** Environment used for path resolution */
  env?: NodeJS.ProcessEnv;
}

/**
 * Settings last applied to the sweph library. The ephemeris path and the
 * sidereal mode are process-wide in the library, so every adapter checks and
 * records them here.
 */
const libraryState: { ephemerisPath: string | null; siderealMode: number | null } = {
  ephemerisPath: null,
  siderealMode: null,
};

function applyEphemerisPath(ephemerisPath: string): void {
  if (libraryState.ephemerisPath === ephemerisPath) {
    return;
  }
  set_ephe_path(ephemerisPath);
  libraryState.ephemerisPath = ephemerisPath;
}

function applySiderealMode(mode: number): void {
  if (libraryState.siderealMode === mode) {
    return;
  }
  set_sid_mode(mode, 0, 0);
  libraryState.siderealMode = mode;
}

/**
 * Forget the recorded library settings, so the next calculation applies them
 * again. Needed after sweph has been configured outside this module.
 */
export function resetLibraryState(): void {
  libraryState.ephemerisPath = null;
  libraryState.siderealMode = null;
}

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

/**
 * Convert a UTC instant to a Julian day number (Gregorian calendar)
 */
export function toJulianDay(instant: Date): number {
  const hour =
    instant.getUTCHours() +
    instant.getUTCMinutes() / 60 +
    instant.getUTCSeconds() / 3600 +
    instant.getUTCMilliseconds() / 3_600_000;

  return julday(
    instant.getUTCFullYear(),
    instant.getUTCMonth() + 1,
    instant.getUTCDate(),
    hour,
    constants.SE_GREG_CAL,
  );
}

/**
 * EphemerisProvider backed by the Swiss Ephemeris
 */
export class SwissEphemerisAdapter implements EphemerisProvider {
  readonly ephemerisPath: string;

  constructor(options: SwissEphemerisAdapterOptions = {}) {
    this.ephemerisPath = resolveEphemerisPath(options.ephemerisPath, options.env);
    applyEphemerisPath(this.ephemerisPath);
  }

  calcPositions(
    instant: Date,
    location: GeoLocation | null,
    settings: EphemerisSettings,
  ): Promise<LayerPositions> {
    try {
      return Promise.resolve(this.calculate(instant, location, settings));
    } catch (error) {
      return Promise.reject(error);
    }
  }

  private calculate(
    instant: Date,
    location: GeoLocation | null,
    settings: EphemerisSettings,
  ): LayerPositions {
    if (Number.isNaN(instant.getTime())) {
      throw new EphemerisCalculationError('Invalid instant', undefined, instant);
    }

    const houseSystem = this.resolveHouseSystem(settings.houseSystem);
    applyEphemerisPath(this.ephemerisPath);
    const flags = this.configureFlags(settings);
    const jd = toJulianDay(instant);

    const planets: Partial<Record<CelestialObjectId, PlanetPosition>> = {};
    for (const requested of settings.includeObjects) {
      const id = requested.trim().toLowerCase();

      if (id === 'south_node') {
        const northNode = planets.north_node ?? this.calcPlanet('north_node', jd, flags);
        if (northNode) {
          planets.south_node = {
            lon: normalizeLongitude(northNode.lon + 180),
            lat: 0,
            speedLon: northNode.speedLon,
            retrograde: northNode.retrograde,
          };
        }
        continue;
      }

      if (!isDirectObjectId(id) || planets[id]) {
        continue;
      }

      const position = this.calcPlanet(id, jd, flags);
      if (position) {
        planets[id] = position;
      }
    }

    const houses = location ? this.calcHouses(jd, location, houseSystem, flags, instant) : null;

    return { planets, houses };
  }

  private calcPlanet(id: DirectObjectId, jd: number, flags: number): PlanetPosition | null {
    const result = calc_ut(jd, PLANET_IDS[id], flags);
    if (result.flag < 0) {
      console.warn(`[SwissEphemerisAdapter] Failed to compute ${id}: ${result.error}`);
      return null;
    }

    const [lon = 0, lat = 0, , speedLon = 0] = result.data;
    return {
      lon: normalizeLongitude(lon),
      lat,
      speedLon,
      retrograde: speedLon < 0,
    };
  }

  private calcHouses(
    jd: number,
    location: GeoLocation,
    system: HouseSystem,
    flags: number,
    instant: Date,
  ): HousePositions {
    const result = houses_ex2(
      jd,
      flags & constants.SEFLG_SIDEREAL,
      location.lat,
      location.lon,
      HOUSE_SYSTEM_CODES[system],
    );
    if (result.flag < 0) {
      throw new EphemerisCalculationError(
        `House calculation failed for ${system}: ${result.error}`,
        undefined,
        instant,
      );
    }

    const cusps: Partial<Record<HouseNumber, number>> = {};
    HOUSE_NUMBERS.forEach((house, index) => {
      const cusp = result.data.houses[index];
      if (cusp !== undefined) {
        cusps[house] = normalizeLongitude(cusp);
      }
    });

    const asc = normalizeLongitude(result.data.points[0] ?? 0);
    const mc = normalizeLongitude(result.data.points[1] ?? 0);

    return {
      system,
      cusps,
      angles: {
        asc,
        mc,
        ic: normalizeLongitude(mc + 180),
        dc: normalizeLongitude(asc + 180),
      },
    };
  }

  private resolveHouseSystem(houseSystem: string): HouseSystem {
    const name = houseSystem.trim().toLowerCase();
    if (!isHouseSystem(name)) {
      throw new InvalidHouseSystemError(houseSystem, HOUSE_SYSTEMS);
    }
    return name;
  }

  private configureFlags(settings: EphemerisSettings): number {
    let flags = constants.SEFLG_SWIEPH | constants.SEFLG_SPEED;

    if (settings.zodiacType === 'sidereal') {
      applySiderealMode(this.resolveAyanamsa(settings.ayanamsa));
      flags |= constants.SEFLG_SIDEREAL;
    }

    return flags;
  }

  private resolveAyanamsa(ayanamsa: string | null | undefined): number {
    if (!ayanamsa) {
      return AYANAMSA_MODES[DEFAULT_AYANAMSA];
    }

    const name = ayanamsa.trim().toLowerCase();
    if (!isAyanamsa(name)) {
      throw new InvalidAyanamsaError(ayanamsa, AYANAMSAS);
    }
    return AYANAMSA_MODES[name];
  }
}
