/**
 * Adapter module exports
 */

export { type CachedAdapterOptions, CachedEphemerisAdapter, withCache } from './cached-adapter.js';
