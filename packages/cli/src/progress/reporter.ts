/**
 * Reporter with ora spinners
 */

import type { CacheStats, LayerPositions } from '@astrolabe/types';
import ora, { type Color, type Ora } from 'ora';

import type { AstrolabeConfig } from '../config/schema.js';

import { createColorFns } from './colors.js';
import {
  formatCacheStats,
  formatConfigDisplay,
  formatDuration,
  formatPositionsTable,
} from './formatters.js';
import type { ColorFunctions, ReporterOptions } from './types.js';

/**
 * Reporter for CLI output
 */
export class Reporter {
  private spinner: Ora | null = null;
  private spinnerStartTime: number = 0;
  private readonly silent: boolean;
  private readonly useColor: boolean;

  // Color functions
  private readonly c: ColorFunctions;

  constructor(options: ReporterOptions = {}) {
    this.silent = options.silent ?? false;
    this.useColor = options.color ?? true;
    this.c = createColorFns(this.useColor);
  }

  /**
   * Print the version header
   */
  printHeader(version: string): void {
    if (this.silent) return;
    console.log(this.c.bold(`Astrolabe v${version}`));
    console.log('');
  }

  /**
   * Start a spinner for a long-running step
   */
  startSpinner(text: string): void {
    if (this.silent) return;

    this.stop();
    this.spinnerStartTime = Date.now();

    // Build ora options - only include color if colors are enabled
    const oraOptions: { text: string; prefixText: string; color?: Color } = {
      text,
      prefixText: ' ',
    };
    if (this.useColor) {
      oraOptions.color = 'cyan';
    }

    this.spinner = ora(oraOptions).start();
  }

  /**
   * Mark the running step as done
   */
  succeedSpinner(text: string): void {
    if (!this.spinner) return;
    const duration = Date.now() - this.spinnerStartTime;
    this.spinner.succeed(`${text}${this.c.dim(` (${formatDuration(duration)})`)}`);
    this.spinner = null;
  }

  /**
   * Print computed positions
   */
  printPositions(positions: LayerPositions): void {
    if (this.silent) return;
    console.log('');
    console.log(formatPositionsTable(positions, this.c));
  }

  /**
   * Print cache statistics
   */
  printCacheStats(stats: CacheStats): void {
    if (this.silent) return;
    console.log('');
    console.log(this.c.dim(formatCacheStats(stats)));
  }

  /**
   * Print the resolved configuration
   */
  printConfig(config: AstrolabeConfig): void {
    console.log(formatConfigDisplay(config, this.c));
  }

  /**
   * Print a plain message
   */
  printMessage(message: string): void {
    if (this.silent) return;
    console.log(message);
  }

  /**
   * Print a success message
   */
  printSuccess(message: string): void {
    if (this.silent) return;
    console.log(this.c.green(`✓ ${message}`));
  }

  /**
   * Print a warning message
   */
  printWarning(message: string): void {
    if (this.silent) return;
    console.log(this.c.yellow(`⚠ ${message}`));
  }

  /**
   * Stop any running spinner
   */
  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }
}
