import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { Rgba } from '../types/index.js';
import { Colors } from '../types/index.js';

const NamedColorTableSchema = z.record(z.tuple([z.number(), z.number(), z.number()]));

type NamedColorTable = z.infer<typeof NamedColorTableSchema>;

const NAMED_COLORS_URL = new URL('../../data/named-colors.json', import.meta.url);

let namedColors: NamedColorTable | undefined;

/**
 * Loads the SVG color name table once.
 */
function getNamedColors(): NamedColorTable {
  if (!namedColors) {
    namedColors = NamedColorTableSchema.parse(JSON.parse(readFileSync(NAMED_COLORS_URL, 'utf8')));
  }
  return namedColors;
}

const FUNCTION_PATTERN = /^(rgba?|hsv)\(([^)]*)\)$/;

function clampChannel(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(255, Math.max(0, Math.round(value)));
}

/**
 * Resolves deck color strings to RGBA.
 *
 * Accepts SVG color names, #rgb, #rrggbb, rgb(r,g,b), rgba(r,g,b,a) with
 * alpha in 0-1, and hsv(h,s,v) with hue in degrees and s, v in percent.
 * Anything else resolves to black.
 */
export class ColorResolver {
  /**
   * Resolves a color string to RGBA.
   */
  resolve(color: string): Rgba {
    const value = color.trim().toLowerCase();

    if (value.startsWith('#')) {
      return this.parseHexColor(value);
    }

    const fn = FUNCTION_PATTERN.exec(value);
    if (fn) {
      const name = fn[1] ?? '';
      const args = (fn[2] ?? '').split(',').map((part) => parseFloat(part.trim()));
      return name === 'hsv' ? this.hsvToRgba(args[0] ?? 0, args[1] ?? 0, args[2] ?? 0) : this.fromRgbArgs(args);
    }

    const named = getNamedColors()[value];
    if (named) {
      return { r: named[0], g: named[1], b: named[2], a: 255 };
    }

    return { ...Colors.black };
  }

  /**
   * Parses a hex color string to RGBA.
   */
  parseHexColor(hex: string): Rgba {
    let digits = hex.replace('#', '');

    if (digits.length === 3) {
      const c0 = digits[0] ?? '0';
      const c1 = digits[1] ?? '0';
      const c2 = digits[2] ?? '0';
      digits = c0 + c0 + c1 + c1 + c2 + c2;
    }

    if (digits.length === 6 && /^[0-9a-f]{6}$/i.test(digits)) {
      return {
        r: parseInt(digits.substring(0, 2), 16),
        g: parseInt(digits.substring(2, 4), 16),
        b: parseInt(digits.substring(4, 6), 16),
        a: 255,
      };
    }

    return { ...Colors.black };
  }

  /**
   * Converts HSV (hue degrees, saturation and value percent) to RGBA.
   */
  hsvToRgba(h: number, s: number, v: number): Rgba {
    const hue = ((h % 360) + 360) % 360;
    const sat = Math.min(100, Math.max(0, s)) / 100;
    const val = Math.min(100, Math.max(0, v)) / 100;

    const c = val * sat;
    const x = c * (1 - Math.abs(((hue / 60) % 2) - 1));
    const m = val - c;

    let r = 0;
    let g = 0;
    let b = 0;
    if (hue < 60) {
      [r, g, b] = [c, x, 0];
    } else if (hue < 120) {
      [r, g, b] = [x, c, 0];
    } else if (hue < 180) {
      [r, g, b] = [0, c, x];
    } else if (hue < 240) {
      [r, g, b] = [0, x, c];
    } else if (hue < 300) {
      [r, g, b] = [x, 0, c];
    } else {
      [r, g, b] = [c, 0, x];
    }

    return {
      r: clampChannel((r + m) * 255),
      g: clampChannel((g + m) * 255),
      b: clampChannel((b + m) * 255),
      a: 255,
    };
  }

  /**
   * Formats a color as a CSS rgba() string, applying an extra opacity (0-1).
   */
  toCss(color: string, opacity: number = 1): string {
    const rgba = this.resolve(color);
    const alpha = (rgba.a / 255) * opacity;
    return `rgba(${rgba.r},${rgba.g},${rgba.b},${Number(alpha.toFixed(4))})`;
  }

  private fromRgbArgs(args: number[]): Rgba {
    const alpha = args[3];
    return {
      r: clampChannel(args[0] ?? 0),
      g: clampChannel(args[1] ?? 0),
      b: clampChannel(args[2] ?? 0),
      a: alpha === undefined ? 255 : clampChannel(alpha * 255),
    };
  }
}

/**
 * Shared resolver instance.
 */
export const defaultColorResolver = new ColorResolver();
