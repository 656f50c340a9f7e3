/**
 * Ephemeris data file validation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

import { EphemerisFileNotFoundError } from './errors.js';

/**
 * Swiss Ephemeris data file extension
 */
export const EPHEMERIS_FILE_EXTENSION = '.se1';

/**
 * Files smaller than this are reported as suspicious
 */
export const MIN_EPHEMERIS_FILE_BYTES = 1024;

/**
 * Outcome of a validation check
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function statOrNull(target: string): fs.Stats | null {
  try {
    return fs.statSync(target);
  } catch (error) {
    if (isMissingPathError(error)) {
      return null;
    }
    throw error;
  }
}

function isMissingPathError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

function listEphemerisFileNames(dir: string): string[] {
  return fs.readdirSync(dir).filter((name) => name.endsWith(EPHEMERIS_FILE_EXTENSION));
}

/**
 * Check that a path is an existing directory holding at least one data file
 */
export function validateEphemerisPath(dir: string): ValidationResult {
  if (!dir) {
    return { valid: false, errors: ['Path is empty'] };
  }

  const stats = statOrNull(dir);
  if (!stats) {
    return { valid: false, errors: [`Path does not exist: ${dir}`] };
  }

  if (!stats.isDirectory()) {
    return { valid: false, errors: [`Path is not a directory: ${dir}`] };
  }

  if (listEphemerisFileNames(dir).length === 0) {
    return { valid: false, errors: [`No ${EPHEMERIS_FILE_EXTENSION} files found in: ${dir}`] };
  }

  return { valid: true, errors: [] };
}

/**
 * Check the directory, then that every required file is present.
 * Without a list only the directory check applies.
 */
export function validateEphemerisFiles(
  dir: string,
  requiredFiles?: readonly string[],
): ValidationResult {
  const pathResult = validateEphemerisPath(dir);
  if (!pathResult.valid || !requiredFiles) {
    return pathResult;
  }

  const missing = requiredFiles.filter((name) => statOrNull(path.join(dir, name)) === null);
  if (missing.length === 0) {
    return { valid: true, errors: [] };
  }

  return {
    valid: false,
    errors: [`Missing required files: ${missing.join(', ')}`, `Expected in: ${dir}`],
  };
}

/**
 * Basic integrity checks on a single data file
 */
export function checkFileIntegrity(filePath: string): ValidationResult {
  const stats = statOrNull(filePath);
  if (!stats) {
    return { valid: false, errors: [`File does not exist: ${filePath}`] };
  }

  if (!stats.isFile()) {
    return { valid: false, errors: [`Path is not a file: ${filePath}`] };
  }

  if (stats.size === 0) {
    return { valid: false, errors: [`File is empty: ${filePath}`] };
  }

  if (stats.size < MIN_EPHEMERIS_FILE_BYTES) {
    return {
      valid: false,
      errors: [`File is unusually small (${stats.size} bytes): ${filePath}`],
    };
  }

  return { valid: true, errors: [] };
}

/**
 * Sorted paths of the data files in a directory; empty when it does not exist
 */
export function findEphemerisFiles(dir: string): string[] {
  const stats = dir ? statOrNull(dir) : null;
  if (!stats?.isDirectory()) {
    return [];
  }

  return listEphemerisFileNames(dir)
    .map((name) => path.join(dir, name))
    .filter((filePath) => statOrNull(filePath)?.isFile() === true)
    .sort();
}

/**
 * Throw EphemerisFileNotFoundError unless the directory validates
 */
export function assertEphemerisPath(dir: string): void {
  if (!validateEphemerisPath(dir).valid) {
    throw new EphemerisFileNotFoundError(dir);
  }
}
