/**
 * Drawing capabilities every backend provides.
 *
 * All coordinates are device units with the origin at the top-left corner.
 * Colors are deck color strings; each surface converts them as it needs.
 */

import type { Gradient, Point, TextAnchor } from '../types/index.js';
import type { ResolvedFont } from '../text/FontResolver.js';
import type { DecodedImage } from '../utils/ImageDecoder.js';

/**
 * Fill color with opacity (0-1).
 */
export interface Paint {
  color: string;
  opacity: number;
}

/**
 * Stroke color, opacity (0-1) and width in device units.
 */
export interface StrokeStyle extends Paint {
  width: number;
}

/**
 * Font face at a device size.
 */
export interface SurfaceFont extends ResolvedFont {
  size: number;
}

export interface DrawingSurface {
  readonly width: number;
  readonly height: number;

  fillRect(x: number, y: number, w: number, h: number, paint: Paint): void;

  fillEllipse(cx: number, cy: number, rx: number, ry: number, paint: Paint): void;

  strokeLine(x1: number, y1: number, x2: number, y2: number, stroke: StrokeStyle): void;

  /**
   * Strokes an elliptical arc. Angles are degrees counterclockwise from
   * 3 o'clock, as seen on the page.
   */
  drawArc(
    cx: number,
    cy: number,
    rx: number,
    ry: number,
    startAngle: number,
    endAngle: number,
    stroke: StrokeStyle
  ): void;

  /**
   * Strokes a quadratic curve from `start` to `end` bent toward `control`.
   */
  drawCurve(start: Point, control: Point, end: Point, stroke: StrokeStyle): void;

  fillPolygon(points: readonly Point[], paint: Paint): void;

  /**
   * Fills a rectangle with a top-to-bottom two-stop gradient.
   */
  fillLinearGradient(x: number, y: number, w: number, h: number, gradient: Gradient): void;

  /**
   * Draws one line of text with its baseline at `y`, anchored horizontally at `x`.
   */
  drawText(text: string, x: number, y: number, font: SurfaceFont, anchor: TextAnchor, paint: Paint): void;

  /**
   * Returns the advance width of `text` in device units.
   */
  measureText(text: string, font: SurfaceFont): number;

  /**
   * Draws an image scaled to `w` x `h`, centered on (`cx`, `cy`).
   */
  drawImage(image: DecodedImage, cx: number, cy: number, w: number, h: number): void;

  /**
   * Runs `draw` with the surface rotated counterclockwise about (`cx`, `cy`).
   */
  rotated(degrees: number, cx: number, cy: number, draw: () => void): void;
}
