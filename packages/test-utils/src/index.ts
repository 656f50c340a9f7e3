/**
 * @astrolabe/test-utils
 *
 * Shared test utilities for Astrolabe
 */

// Mock providers
export {
  createMockProvider,
  generatePositions,
  type MockProvider,
  type MockProviderConfig,
} from './mocks/mock-provider.js';

// Builders and fixtures
export {
  SettingsBuilder,
  ephemerisSettings,
  SAMPLE_INSTANT,
  SAMPLE_LOCATION,
  DEFAULT_TEST_OBJECTS,
} from './builders/settings-builder.js';
