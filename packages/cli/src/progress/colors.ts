/**
 * Color helpers
 */

import chalk from 'chalk';

import type { ColorFunctions } from './types.js';

const identity = (text: string): string => text;

/**
 * Pass-through color functions
 */
export const PLAIN_COLORS: ColorFunctions = {
  bold: identity,
  dim: identity,
  green: identity,
  red: identity,
  yellow: identity,
  cyan: identity,
};

/**
 * Colorized output via chalk, or plain text when color is off
 */
export function createColorFns(useColor: boolean): ColorFunctions {
  if (!useColor) {
    return PLAIN_COLORS;
  }
  return {
    bold: (text: string) => chalk.bold(text),
    dim: (text: string) => chalk.dim(text),
    green: (text: string) => chalk.green(text),
    red: (text: string) => chalk.red(text),
    yellow: (text: string) => chalk.yellow(text),
    cyan: (text: string) => chalk.cyan(text),
  };
}
