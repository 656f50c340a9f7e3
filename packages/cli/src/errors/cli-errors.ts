/**
 * CLI-specific error classes
 */

import * as path from 'node:path';

/**
 * Resolve a path to absolute for clearer error messages
 */
export function resolveAbsolutePath(filePath: string): string {
  return path.resolve(process.cwd(), filePath);
}

/**
 * Base CLI error class
 */
export class CliError extends Error {
  constructor(
    message: string,
    public readonly suggestion?: string,
    public readonly exitCode: number = 1,
  ) {
    super(message);
    this.name = 'CliError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    const lines = [`Error: ${this.message}`];
    if (this.suggestion) {
      lines.push('');
      lines.push(`Suggestion: ${this.suggestion}`);
    }
    return lines.join('\n');
  }
}

/**
 * Configuration error
 */
export class ConfigError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'ConfigError';
  }
}

/**
 * Invalid command line input
 */
export class InputError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'InputError';
  }
}

/**
 * Ephemeris data directory failed validation
 */
export class EphemerisSetupError extends CliError {
  constructor(
    public readonly ephemerisPath: string,
    public readonly problems: readonly string[],
  ) {
    super(
      `Ephemeris data at ${ephemerisPath} failed validation`,
      'Set SWISS_EPHEMERIS_PATH or pass --ephe-path to a directory of .se1 files',
      2,
    );
    this.name = 'EphemerisSetupError';
  }

  override format(): string {
    return [
      `Error: ${this.message}`,
      ...this.problems.map((problem) => `  - ${problem}`),
      '',
      `Suggestion: ${this.suggestion ?? ''}`,
    ].join('\n');
  }
}
