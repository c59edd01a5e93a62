/**
 * Percentage coordinate conversion.
 *
 * Deck coordinates are percentages of the canvas. X runs left to right from
 * the left edge; Y runs bottom to top, so device Y is flipped:
 *
 *   deviceX = width * xp / 100
 *   deviceY = height * (100 - yp) / 100
 *
 * Sizes given with `sp` (font size, stroke width) are percentages of the
 * canvas width.
 */

/**
 * Multiplier applied to `sp` sizes after percentage conversion.
 */
export const FONT_FACTOR = 1.0;

/**
 * Device position plus a converted size.
 */
export interface DeviceDimen {
  x: number;
  y: number;
  size: number;
}

/**
 * Returns `value` percent of `measure`.
 */
export function pct(value: number, measure: number): number {
  return (value / 100) * measure;
}

/**
 * Converts an x percentage to device units.
 */
export function deviceX(width: number, xp: number): number {
  return pct(xp, width);
}

/**
 * Converts a bottom-up y percentage to a top-down device coordinate.
 */
export function deviceY(height: number, yp: number): number {
  return pct(100 - yp, height);
}

/**
 * Recovers the y percentage from a device coordinate.
 */
export function percentFromDeviceY(height: number, y: number): number {
  return 100 - (y / height) * 100;
}

/**
 * Converts a position and an `sp` size in one step.
 */
export function dimen(width: number, height: number, xp: number, yp: number, sp: number): DeviceDimen {
  return {
    x: deviceX(width, xp),
    y: deviceY(height, yp),
    size: pct(sp, width) * FONT_FACTOR,
  };
}

/**
 * Width percent of `measure`, or `fallback` when the percent is 0.
 */
export function pwidth(wp: number, measure: number, fallback: number): number {
  if (wp === 0) {
    return fallback;
  }
  return pct(wp, measure);
}

/**
 * Converter bound to one canvas size.
 */
export class UnitConverter {
  readonly width: number;
  readonly height: number;

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
  }

  /**
   * Converts an x percentage to device units.
   */
  x(xp: number): number {
    return deviceX(this.width, xp);
  }

  /**
   * Converts a y percentage to device units (flipped).
   */
  y(yp: number): number {
    return deviceY(this.height, yp);
  }

  /**
   * Converts a percentage of the canvas width.
   */
  ofWidth(p: number): number {
    return pct(p, this.width);
  }

  /**
   * Converts a percentage of the canvas height.
   */
  ofHeight(p: number): number {
    return pct(p, this.height);
  }

  /**
   * Converts a position and `sp` size.
   */
  dimen(xp: number, yp: number, sp: number): DeviceDimen {
    return dimen(this.width, this.height, xp, yp, sp);
  }

  /**
   * Width percent of the canvas width, or `fallback` when 0.
   */
  pwidth(wp: number, fallback: number): number {
    return pwidth(wp, this.width, fallback);
  }
}
