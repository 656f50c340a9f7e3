/**
 * Error module exports
 */

export {
  CliError,
  ConfigError,
  InputError,
  EphemerisSetupError,
  resolveAbsolutePath,
} from './cli-errors.js';

export { formatError, handleError } from './handler.js';
