/**
 * Where user-facing output goes
 */

import * as clack from '@clack/prompts';
import type { Palette } from '../stack/colors.js';

export interface Reporter {
  /** Plain line on stdout */
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Shown only with --debug */
  debug(message: string): void;
  /** Every git command line; shown with --debug, mutating ones also with --verbose */
  command(command: string, mutating: boolean): void;
}

export interface ConsoleReporterOptions {
  debug: boolean;
  verbose: boolean;
}

export class ConsoleReporter implements Reporter {
  constructor(
    private readonly palette: Palette,
    private readonly options: ConsoleReporterOptions
  ) {}

  info(message: string): void {
    console.log(message);
  }

  success(message: string): void {
    console.log(this.palette.c.green(this.palette.checkMark) + ' ' + message);
  }

  warn(message: string): void {
    clack.log.warn(message);
  }

  error(message: string): void {
    clack.log.error(message);
  }

  debug(message: string): void {
    if (this.options.debug) {
      process.stderr.write(this.palette.c.dim(message) + '\n');
    }
  }

  command(command: string, mutating: boolean): void {
    if (this.options.debug || (this.options.verbose && mutating)) {
      process.stderr.write(this.palette.c.dim(`> ${command}`) + '\n');
    }
  }
}
