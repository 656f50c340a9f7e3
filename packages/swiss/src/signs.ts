/**
 * Zodiac sign lookup
 */

export const ZODIAC_SIGNS = [
  'aries',
  'taurus',
  'gemini',
  'cancer',
  'leo',
  'virgo',
  'libra',
  'scorpio',
  'sagittarius',
  'capricorn',
  'aquarius',
  'pisces',
] as const;

export type ZodiacSign = (typeof ZODIAC_SIGNS)[number];

/**
 * Normalize a longitude into [0, 360)
 */
export function normalizeLongitude(longitude: number): number {
  const normalized = ((longitude % 360) + 360) % 360;
  // -1e-20 + 360 rounds to 360
  return normalized >= 360 ? 0 : normalized;
}

/**
 * Sign containing a longitude
 */
export function signOf(longitude: number): ZodiacSign {
  const index = Math.min(Math.max(Math.floor(normalizeLongitude(longitude) / 30), 0), 11);
  return ZODIAC_SIGNS[index] ?? 'aries';
}

/**
 * Degrees within the sign, in [0, 30)
 */
export function degreeInSign(longitude: number): number {
  return normalizeLongitude(longitude) % 30;
}
