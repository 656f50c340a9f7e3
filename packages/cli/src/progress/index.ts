/**
 * Progress module exports
 */

export type { ColorFunctions, ReporterOptions } from './types.js';
export { Reporter } from './reporter.js';
export { PLAIN_COLORS, createColorFns } from './colors.js';
export {
  formatCacheStats,
  formatConfigDisplay,
  formatDuration,
  formatLongitude,
  formatPlanetRow,
  formatPositionsTable,
  formatSpeed,
} from './formatters.js';
