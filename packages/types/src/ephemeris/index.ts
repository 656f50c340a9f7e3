/**
 * Ephemeris type exports
 *
 * Calculation settings, observer location and the position payloads
 * returned by providers.
 */

/**
 * Zodiac reference frame
 */
export type ZodiacType = 'tropical' | 'sidereal';

/**
 * Recognised ayanamsa names.
 * `chitrapaksha` is an alias of `lahiri`, so twelve names cover eleven systems.
 */
export const AYANAMSAS = [
  'lahiri',
  'chitrapaksha',
  'fagan_bradley',
  'de_luce',
  'raman',
  'krishnamurti',
  'yukteshwar',
  'djwhal_khul',
  'true_citra',
  'true_revati',
  'aryabhata',
  'aryabhata_mean_sun',
] as const;

export type Ayanamsa = (typeof AYANAMSAS)[number];

/**
 * Recognised house systems
 */
export const HOUSE_SYSTEMS = [
  'placidus',
  'whole_sign',
  'koch',
  'equal',
  'regiomontanus',
  'campanus',
  'alcabitius',
  'morinus',
] as const;

export type HouseSystem = (typeof HOUSE_SYSTEMS)[number];

/**
 * Celestial objects a provider knows how to compute
 */
export const CELESTIAL_OBJECTS = [
  'sun',
  'moon',
  'mercury',
  'venus',
  'mars',
  'jupiter',
  'saturn',
  'uranus',
  'neptune',
  'pluto',
  'chiron',
  'north_node',
  'south_node',
] as const;

export type CelestialObjectId = (typeof CELESTIAL_OBJECTS)[number];

/**
 * Calculation settings
 */
export interface EphemerisSettings {
  /** Zodiac frame */
  zodiacType: ZodiacType;
  /** Ayanamsa for sidereal calculations (null or absent means the provider default) */
  ayanamsa?: Ayanamsa | null;
  /** House system used when a location is given */
  houseSystem: HouseSystem;
  /**
   * Objects to compute. Treated as a set: order and duplicates do not matter,
   * unknown identifiers are skipped.
   */
  includeObjects: readonly string[];
}

/**
 * Observer location in decimal degrees
 */
export interface GeoLocation {
  /** Latitude, north positive */
  lat: number;
  /** Longitude, east positive */
  lon: number;
}

/**
 * Position of a single object
 */
export interface PlanetPosition {
  /** Ecliptic longitude in [0, 360) */
  lon: number;
  /** Ecliptic latitude */
  lat: number;
  /** Daily motion in longitude (degrees/day) */
  speedLon: number;
  /** True when the object moves backwards in longitude */
  retrograde: boolean;
}

/**
 * House number key ('1' through '12')
 */
export type HouseNumber =
  | '1'
  | '2'
  | '3'
  | '4'
  | '5'
  | '6'
  | '7'
  | '8'
  | '9'
  | '10'
  | '11'
  | '12';

export interface ChartAngles {
  asc: number;
  mc: number;
  ic: number;
  dc: number;
}

/**
 * House cusps and angles for one house system
 */
export interface HousePositions {
  system: HouseSystem;
  cusps: Partial<Record<HouseNumber, number>>;
  angles: ChartAngles;
}

/**
 * Result of one position calculation
 */
export interface LayerPositions {
  planets: Partial<Record<CelestialObjectId, PlanetPosition>>;
  /** Null when no location was supplied */
  houses: HousePositions | null;
}

/**
 * Narrow an arbitrary string to a known celestial object id
 */
export function isCelestialObjectId(value: string): value is CelestialObjectId {
  return (CELESTIAL_OBJECTS as readonly string[]).includes(value);
}

export function isHouseSystem(value: string): value is HouseSystem {
  return (HOUSE_SYSTEMS as readonly string[]).includes(value);
}

export function isAyanamsa(value: string): value is Ayanamsa {
  return (AYANAMSAS as readonly string[]).includes(value);
}
