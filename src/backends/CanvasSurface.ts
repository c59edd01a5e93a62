/**
 * Drawing surface over an @napi-rs/canvas 2D context.
 */

import type { SKRSContext2D } from '@napi-rs/canvas';
import type { Gradient, Point, TextAnchor } from '../types/index.js';
import type { DrawingSurface, Paint, StrokeStyle, SurfaceFont } from '../rendering/DrawingSurface.js';
import type { ColorResolver } from '../theme/ColorResolver.js';
import type { DecodedImage } from '../utils/ImageDecoder.js';
import type { CanvasFontRegistry } from './CanvasFonts.js';

const TEXT_ALIGN = {
  start: 'left',
  middle: 'center',
  end: 'right',
} as const satisfies Record<TextAnchor, 'left' | 'center' | 'right'>;

/**
 * Rounds an opacity down to the nearest 8-bit alpha step.
 */
export function quantizeOpacity(opacity: number): number {
  return Math.trunc(255 * opacity) / 255;
}

/**
 * Whole-unit box covering the device pixels a fractional rectangle's edges
 * round to.
 */
export function snapRect(x: number, y: number, w: number, h: number): [number, number, number, number] {
  const left = Math.round(x);
  const top = Math.round(y);
  return [left, top, Math.round(x + w) - left, Math.round(y + h) - top];
}

function snapPoint(point: Point): Point {
  return { x: Math.round(point.x), y: Math.round(point.y) };
}

/**
 * Raster surface. Shape geometry lands on whole device units, and scaled
 * images are sampled nearest-neighbor.
 */
export class CanvasSurface implements DrawingSurface {
  readonly width: number;
  readonly height: number;
  private readonly ctx: SKRSContext2D;
  private readonly colors: ColorResolver;
  private readonly fonts: CanvasFontRegistry;

  constructor(ctx: SKRSContext2D, width: number, height: number, colors: ColorResolver, fonts: CanvasFontRegistry) {
    this.ctx = ctx;
    this.width = width;
    this.height = height;
    this.colors = colors;
    this.fonts = fonts;
  }

  fillRect(x: number, y: number, w: number, h: number, paint: Paint): void {
    this.ctx.fillStyle = this.css(paint);
    this.ctx.fillRect(...snapRect(x, y, w, h));
  }

  fillEllipse(cx: number, cy: number, rx: number, ry: number, paint: Paint): void {
    this.ctx.beginPath();
    this.ctx.ellipse(Math.round(cx), Math.round(cy), Math.round(rx), Math.round(ry), 0, 0, Math.PI * 2);
    this.ctx.fillStyle = this.css(paint);
    this.ctx.fill();
  }

  strokeLine(x1: number, y1: number, x2: number, y2: number, stroke: StrokeStyle): void {
    this.ctx.beginPath();
    this.ctx.moveTo(Math.round(x1), Math.round(y1));
    this.ctx.lineTo(Math.round(x2), Math.round(y2));
    this.applyStroke(stroke);
  }

  drawArc(
    cx: number,
    cy: number,
    rx: number,
    ry: number,
    startAngle: number,
    endAngle: number,
    stroke: StrokeStyle
  ): void {
    // Canvas angles run clockwise; page angles run counterclockwise.
    const start = (-startAngle * Math.PI) / 180;
    const end = (-endAngle * Math.PI) / 180;
    this.ctx.beginPath();
    this.ctx.ellipse(Math.round(cx), Math.round(cy), Math.round(rx), Math.round(ry), 0, start, end, endAngle > startAngle);
    this.applyStroke(stroke);
  }

  drawCurve(start: Point, control: Point, end: Point, stroke: StrokeStyle): void {
    const from = snapPoint(start);
    const via = snapPoint(control);
    const to = snapPoint(end);
    this.ctx.beginPath();
    this.ctx.moveTo(from.x, from.y);
    this.ctx.quadraticCurveTo(via.x, via.y, to.x, to.y);
    this.applyStroke(stroke);
  }

  fillPolygon(points: readonly Point[], paint: Paint): void {
    this.ctx.beginPath();
    points.map(snapPoint).forEach((point, i) => {
      if (i === 0) {
        this.ctx.moveTo(point.x, point.y);
      } else {
        this.ctx.lineTo(point.x, point.y);
      }
    });
    this.ctx.closePath();
    this.ctx.fillStyle = this.css(paint);
    this.ctx.fill();
  }

  fillLinearGradient(x: number, y: number, w: number, h: number, gradient: Gradient): void {
    const box = snapRect(x, y, w, h);
    const fill = this.ctx.createLinearGradient(0, box[1], 0, box[1] + box[3]);
    fill.addColorStop(0, this.colors.toCss(gradient.color1));
    fill.addColorStop(gradient.percent / 100, this.colors.toCss(gradient.color2));
    this.ctx.fillStyle = fill;
    this.ctx.fillRect(...box);
  }

  drawText(text: string, x: number, y: number, font: SurfaceFont, anchor: TextAnchor, paint: Paint): void {
    this.ctx.font = this.fonts.css(font);
    this.ctx.textAlign = TEXT_ALIGN[anchor];
    this.ctx.textBaseline = 'alphabetic';
    this.ctx.fillStyle = this.css(paint);
    this.ctx.fillText(text, x, y);
  }

  measureText(text: string, font: SurfaceFont): number {
    this.ctx.font = this.fonts.css(font);
    return this.ctx.measureText(text).width;
  }

  /**
   * Draws with the top-left corner on whole device units. A resized image is
   * sampled nearest-neighbor, never interpolated.
   */
  drawImage(image: DecodedImage, cx: number, cy: number, w: number, h: number): void {
    const resized = w !== image.width || h !== image.height;
    this.ctx.save();
    try {
      this.ctx.imageSmoothingEnabled = !resized;
      this.ctx.drawImage(image.image, Math.trunc(cx - w / 2), Math.trunc(cy - h / 2), w, h);
    } finally {
      this.ctx.restore();
    }
  }

  rotated(degrees: number, cx: number, cy: number, draw: () => void): void {
    this.ctx.save();
    try {
      this.ctx.translate(cx, cy);
      this.ctx.rotate((-degrees * Math.PI) / 180);
      this.ctx.translate(-cx, -cy);
      draw();
    } finally {
      this.ctx.restore();
    }
  }

  private applyStroke(stroke: StrokeStyle): void {
    this.ctx.strokeStyle = this.css(stroke);
    this.ctx.lineWidth = stroke.width;
    this.ctx.stroke();
  }

  private css(paint: Paint): string {
    return this.colors.toCss(paint.color, quantizeOpacity(paint.opacity));
  }
}
