/**
 * Validate command implementation
 */

import {
  checkFileIntegrity,
  findEphemerisFiles,
  resolveEphemerisPath,
  validateEphemerisPath,
} from '@astrolabe/swiss';

import { parseCliOptions, VERSION } from '../cli.js';
import { loadConfig, formatConfig } from '../config/loader.js';
import { EphemerisSetupError, handleError, resolveAbsolutePath } from '../errors/index.js';
import { Reporter } from '../progress/reporter.js';

/**
 * Main validate command handler
 */
export async function validateCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const options = parseCliOptions(rawOptions);
  const reporter = new Reporter({ color: !options.noColor });

  try {
    const config = await loadConfig(options);

    if (options.showConfig) {
      reporter.printConfig(config);
      console.log('');
      console.log('Raw configuration:');
      console.log(formatConfig(config));
      return;
    }

    const ephemerisPath = resolveAbsolutePath(resolveEphemerisPath(config.ephemeris.path));

    reporter.printHeader(VERSION);
    reporter.printMessage(`Checking ${ephemerisPath}`);

    const pathResult = validateEphemerisPath(ephemerisPath);
    if (!pathResult.valid) {
      throw new EphemerisSetupError(ephemerisPath, pathResult.errors);
    }

    const problems: string[] = [];
    for (const file of findEphemerisFiles(ephemerisPath)) {
      const integrity = checkFileIntegrity(file);
      if (integrity.valid) {
        reporter.printSuccess(file);
      } else {
        for (const error of integrity.errors) {
          reporter.printWarning(error);
        }
        problems.push(...integrity.errors);
      }
    }

    if (problems.length > 0) {
      throw new EphemerisSetupError(ephemerisPath, problems);
    }

    reporter.printMessage('');
    reporter.printSuccess('Ephemeris data looks usable.');
  } catch (error) {
    handleError(error);
  }
}
