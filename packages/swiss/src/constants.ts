/**
 * Mappings from astrolabe identifiers to Swiss Ephemeris constants
 */

import { constants } from 'sweph';

import type { Ayanamsa, CelestialObjectId, HouseSystem } from '@astrolabe/types';

/**
 * Objects computed directly by the library.
 * The south node is derived from the north node.
 */
export type DirectObjectId = Exclude<CelestialObjectId, 'south_node'>;

export const PLANET_IDS: Readonly<Record<DirectObjectId, number>> = {
  sun: constants.SE_SUN,
  moon: constants.SE_MOON,
  mercury: constants.SE_MERCURY,
  venus: constants.SE_VENUS,
  mars: constants.SE_MARS,
  jupiter: constants.SE_JUPITER,
  saturn: constants.SE_SATURN,
  uranus: constants.SE_URANUS,
  neptune: constants.SE_NEPTUNE,
  pluto: constants.SE_PLUTO,
  chiron: constants.SE_CHIRON,
  north_node: constants.SE_TRUE_NODE,
};

export function isDirectObjectId(value: string): value is DirectObjectId {
  return Object.prototype.hasOwnProperty.call(PLANET_IDS, value);
}

/**
 * Single-letter house system codes
 */
export const HOUSE_SYSTEM_CODES: Readonly<Record<HouseSystem, string>> = {
  placidus: 'P',
  whole_sign: 'W',
  koch: 'K',
  equal: 'E',
  regiomontanus: 'R',
  campanus: 'C',
  alcabitius: 'B',
  morinus: 'M',
};

/**
 * Sidereal modes
 */
export const AYANAMSA_MODES: Readonly<Record<Ayanamsa, number>> = {
  lahiri: constants.SE_SIDM_LAHIRI,
  chitrapaksha: constants.SE_SIDM_LAHIRI,
  fagan_bradley: constants.SE_SIDM_FAGAN_BRADLEY,
  de_luce: constants.SE_SIDM_DELUCE,
  raman: constants.SE_SIDM_RAMAN,
  krishnamurti: constants.SE_SIDM_KRISHNAMURTI,
  yukteshwar: constants.SE_SIDM_YUKTESHWAR,
  djwhal_khul: constants.SE_SIDM_DJWHAL_KHUL,
  true_citra: constants.SE_SIDM_TRUE_CITRA,
  true_revati: constants.SE_SIDM_TRUE_REVATI,
  aryabhata: constants.SE_SIDM_ARYABHATA,
  aryabhata_mean_sun: constants.SE_SIDM_ARYABHATA_MSUN,
};

export const DEFAULT_AYANAMSA: Ayanamsa = 'lahiri';
