/**
 * Positions command implementation
 */

import { CachedEphemerisAdapter } from '@astrolabe/core';
import { SwissEphemerisAdapter } from '@astrolabe/swiss';

import { parseCliOptions, VERSION } from '../cli.js';
import { loadConfig, formatConfig } from '../config/loader.js';
import { handleError } from '../errors/index.js';
import { Reporter } from '../progress/reporter.js';

import { buildPositionsRequest } from './request.js';

/**
 * Main positions command handler
 */
export async function positionsCommand(rawOptions: Record<string, unknown>): Promise<void> {
  const options = parseCliOptions(rawOptions);
  const reporter = new Reporter({
    color: !options.noColor,
    silent: options.json === true,
  });

  try {
    // Load configuration
    const config = await loadConfig(options);

    // Show config and exit if requested
    if (options.showConfig) {
      reporter.printConfig(config);
      console.log('');
      console.log('Raw configuration:');
      console.log(formatConfig(config));
      return;
    }

    const request = buildPositionsRequest(options, config);

    const adapter = new CachedEphemerisAdapter(
      new SwissEphemerisAdapter({ ephemerisPath: config.ephemeris.path }),
      {
        maxSize: config.cache.maxSize,
        key: {
          coordinatePrecision: config.cache.coordinatePrecision,
          timeResolutionMs: config.cache.timeResolutionMs,
        },
      },
    );

    reporter.printHeader(VERSION);
    reporter.startSpinner(
      `Computing positions for ${request.instant.toISOString()}` +
        (request.repeat > 1 ? ` (${request.repeat} runs)` : ''),
    );

    let positions = await adapter.calcPositions(request.instant, request.location, request.settings);
    for (let run = 1; run < request.repeat; run++) {
      positions = await adapter.calcPositions(request.instant, request.location, request.settings);
    }

    reporter.succeedSpinner('Positions computed');

    const stats = adapter.getCacheStats();

    if (options.json) {
      process.stdout.write(
        `${JSON.stringify(
          {
            instant: request.instant.toISOString(),
            location: request.location,
            settings: request.settings,
            positions,
            cache: stats,
          },
          null,
          2,
        )}\n`,
      );
      return;
    }

    reporter.printPositions(positions);
    reporter.printCacheStats(stats);
  } catch (error) {
    reporter.stop();
    handleError(error);
  }
}
