/**
 * Block text wrapping.
 *
 * Words are placed left to right; after each word the pen advances by the
 * word width plus a fraction of the em width. When the pen passes the right
 * edge the next word starts a new line, so a line overflows the edge by at
 * most its last word. A literal `\n` token forces a break.
 */

import type { TextAnchor } from '../types/index.js';
import type { SurfaceFont } from '../rendering/DrawingSurface.js';

/**
 * Measures the advance width of text in a font.
 */
export type MeasureFn = (text: string, font: SurfaceFont) => number;

/**
 * A positioned text run ready for drawing.
 */
export interface PositionedTextRun {
  text: string;
  /** Anchor x in device units */
  x: number;
  /** Baseline y in device units */
  y: number;
  anchor: TextAnchor;
  font: SurfaceFont;
  /** Measured width, when the layout needed it */
  width?: number;
}

/**
 * Result of wrapping one block of text.
 */
export interface WrapResult {
  runs: PositionedTextRun[];
  /** Number of line breaks produced */
  breaks: number;
}

/** Word gap as a fraction of the em width */
export const WORD_SPACING_FACTOR = 0.3;

/** Word gap for monospaced fonts */
export const MONO_WORD_SPACING_FACTOR = 1.0;

/** Token that forces a line break inside block text */
export const MANUAL_BREAK_TOKEN = '\\n';

const WHITESPACE = /[ \n\t]+/;

/**
 * Word wrapper with a per-instance width cache.
 */
export class WordWrapper {
  private readonly measure: MeasureFn;
  private readonly widthCache: Map<string, number> = new Map();

  constructor(measure: MeasureFn) {
    this.measure = measure;
  }

  /**
   * Wraps `text` into lines starting at (`x`, `y`) within `width`.
   *
   * @param leading Distance between baselines
   */
  wrap(text: string, x: number, y: number, width: number, leading: number, font: SurfaceFont): WrapResult {
    const factor = font.monospace ? MONO_WORD_SPACING_FACTOR : WORD_SPACING_FACTOR;
    const wordSpacing = this.measureCached('M', font) * factor;
    const words = text.split(WHITESPACE).filter((word) => word.length > 0);
    const edge = x + width;

    const runs: PositionedTextRun[] = [];
    let breaks = 0;
    let xp = x;
    let yp = y;

    for (const word of words) {
      if (word === MANUAL_BREAK_TOKEN) {
        xp = x;
        yp += leading;
        breaks++;
        continue;
      }

      const tw = this.measureCached(word, font);
      runs.push({ text: word, x: xp, y: yp, anchor: 'start', font, width: tw });
      xp += tw + wordSpacing;
      if (xp > edge) {
        xp = x;
        yp += leading;
        breaks++;
      }
    }

    return { runs, breaks };
  }

  /**
   * Clears the word width cache.
   */
  clearCache(): void {
    this.widthCache.clear();
  }

  private measureCached(text: string, font: SurfaceFont): number {
    const key = `${font.family}:${font.weight}:${font.size}:${text}`;
    const cached = this.widthCache.get(key);
    if (cached !== undefined) {
      return cached;
    }
    const width = this.measure(text, font);
    this.widthCache.set(key, width);
    return width;
  }
}
