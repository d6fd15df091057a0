/**
 * Colour and glyph choices for tree output
 */

import pc from 'picocolors';
import type { EdgeColor } from './types.js';

export type Colors = ReturnType<typeof pc.createColors>;

export interface PaletteOptions {
  colors: boolean;
  asciiOnly: boolean;
}

const ASCII_JUNCTIONS: Record<EdgeColor, string> = {
  green: 'o-',
  yellow: '?-',
  red: 'x-',
  grey: 'm-',
};

export class Palette {
  readonly c: Colors;
  readonly asciiOnly: boolean;

  constructor(options: PaletteOptions) {
    this.c = pc.createColors(options.colors && !options.asciiOnly);
    this.asciiOnly = options.asciiOnly;
  }

  get verticalBar(): string {
    return this.asciiOnly ? '|' : '│';
  }

  get rightArrow(): string {
    return this.asciiOnly ? '->' : '➔';
  }

  get checkMark(): string {
    return this.asciiOnly ? 'OK' : '✓';
  }

  /**
   * Colour text the way an edge of the given colour is drawn
   */
  edge(color: EdgeColor, text: string): string {
    switch (color) {
      case 'green':
        return this.c.green(text);
      case 'yellow':
        return this.c.yellow(text);
      case 'red':
        return this.c.red(text);
      case 'grey':
        return this.c.dim(text);
    }
  }

  /**
   * Junction drawn before a child branch name. A three-legged junction is
   * used only when the edge below continues in the same colour.
   */
  junction(color: EdgeColor, sameColorBelow: boolean): string {
    if (this.asciiOnly) return ASCII_JUNCTIONS[color];
    return sameColorBelow ? '├─' : '└─';
  }

  branch(name: string): string {
    return this.c.bold(name);
  }

  currentBranch(name: string): string {
    if (this.asciiOnly) return `${name} *`;
    return this.c.bold(this.c.underline(name));
  }
}
