/**
 * Drawing surface over a pdfkit page.
 *
 * The paginated output has no gradients or quadratic curves here: gradients
 * fill flat with their first color, curves draw as one straight segment and
 * arcs as straight chords.
 */

import type { Gradient, Point, TextAnchor } from '../types/index.js';
import { ARC_CHORD_DEGREES } from '../core/constants.js';
import { FontLoadWarning } from '../core/errors.js';
import type { DrawingSurface, Paint, StrokeStyle, SurfaceFont } from '../rendering/DrawingSurface.js';
import type { ColorResolver } from '../theme/ColorResolver.js';
import type { DecodedImage } from '../utils/ImageDecoder.js';
import type { ILogger } from '../utils/Logger.js';
import { reportFontWarning, type FontWarningHandler } from './CanvasFonts.js';
import { ellipsePoint } from './SvgSurface.js';

type PdfColor = [number, number, number];

/**
 * Standard PDF font for a resolved font.
 */
export function standardPdfFont(font: SurfaceFont): string {
  const bold = font.weight >= 600;
  const family = font.family.toLowerCase();
  if (font.monospace) {
    return bold ? 'Courier-Bold' : 'Courier';
  }
  if (family === 'serif' || family.includes('times') || family.includes('georgia') || family.includes('palatino')) {
    return bold ? 'Times-Bold' : 'Times-Roman';
  }
  return bold ? 'Helvetica-Bold' : 'Helvetica';
}

/**
 * Points approximating an arc with chords of at most `step` degrees.
 */
export function arcChordPoints(
  cx: number,
  cy: number,
  rx: number,
  ry: number,
  startAngle: number,
  endAngle: number,
  step: number = ARC_CHORD_DEGREES
): Point[] {
  const sweep = endAngle - startAngle;
  const segments = Math.max(1, Math.ceil(Math.abs(sweep) / step));
  const points: Point[] = [];
  for (let i = 0; i <= segments; i++) {
    points.push(ellipsePoint(cx, cy, rx, ry, startAngle + (sweep * i) / segments));
  }
  return points;
}

/**
 * Configuration for PdfSurface.
 */
export interface PdfSurfaceConfig {
  doc: PDFKit.PDFDocument;
  width: number;
  height: number;
  colors: ColorResolver;
  logger: ILogger;
  onWarning?: FontWarningHandler;
  /** Font files already registered with this document, by path */
  registeredFonts: Map<string, string | undefined>;
}

export class PdfSurface implements DrawingSurface {
  readonly width: number;
  readonly height: number;
  private readonly doc: PDFKit.PDFDocument;
  private readonly colors: ColorResolver;
  private readonly logger: ILogger;
  private readonly onWarning?: FontWarningHandler;
  private readonly registeredFonts: Map<string, string | undefined>;

  constructor(config: PdfSurfaceConfig) {
    this.doc = config.doc;
    this.width = config.width;
    this.height = config.height;
    this.colors = config.colors;
    this.logger = config.logger;
    this.onWarning = config.onWarning;
    this.registeredFonts = config.registeredFonts;
  }

  fillRect(x: number, y: number, w: number, h: number, paint: Paint): void {
    this.doc.rect(x, y, w, h).fillColor(this.color(paint.color), this.opacity(paint)).fill();
  }

  fillEllipse(cx: number, cy: number, rx: number, ry: number, paint: Paint): void {
    this.doc.ellipse(cx, cy, rx, ry).fillColor(this.color(paint.color), this.opacity(paint)).fill();
  }

  strokeLine(x1: number, y1: number, x2: number, y2: number, stroke: StrokeStyle): void {
    this.doc.moveTo(x1, y1).lineTo(x2, y2);
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
    const [first, ...rest] = arcChordPoints(cx, cy, rx, ry, startAngle, endAngle);
    if (!first) {
      return;
    }
    this.doc.moveTo(first.x, first.y);
    for (const point of rest) {
      this.doc.lineTo(point.x, point.y);
    }
    this.applyStroke(stroke);
  }

  drawCurve(start: Point, _control: Point, end: Point, stroke: StrokeStyle): void {
    this.strokeLine(start.x, start.y, end.x, end.y, stroke);
  }

  fillPolygon(points: readonly Point[], paint: Paint): void {
    this.doc
      .polygon(...points.map((p) => [p.x, p.y]))
      .fillColor(this.color(paint.color), this.opacity(paint))
      .fill();
  }

  fillLinearGradient(x: number, y: number, w: number, h: number, gradient: Gradient): void {
    this.fillRect(x, y, w, h, { color: gradient.color1, opacity: 1 });
  }

  drawText(text: string, x: number, y: number, font: SurfaceFont, anchor: TextAnchor, paint: Paint): void {
    this.useFont(font);
    const width = this.doc.widthOfString(text);
    let left = x;
    if (anchor === 'middle') {
      left = x - width / 2;
    } else if (anchor === 'end') {
      left = x - width;
    }
    this.doc
      .fillColor(this.color(paint.color), this.opacity(paint))
      .text(text, left, y, { baseline: 'alphabetic', lineBreak: false });
  }

  measureText(text: string, font: SurfaceFont): number {
    this.useFont(font);
    return this.doc.widthOfString(text);
  }

  /**
   * Embeds PNG and JPEG data; other formats draw as a light placeholder box.
   */
  drawImage(image: DecodedImage, cx: number, cy: number, w: number, h: number): void {
    const x = cx - w / 2;
    const y = cy - h / 2;
    if (image.format === 'png' || image.format === 'jpeg') {
      this.doc.image(image.data, x, y, { width: w, height: h });
      return;
    }
    this.logger.debug('Image format not embeddable, drawing placeholder', { name: image.name, format: image.format });
    this.fillRect(x, y, w, h, { color: 'lightgray', opacity: 1 });
  }

  rotated(degrees: number, cx: number, cy: number, draw: () => void): void {
    this.doc.save();
    try {
      this.doc.rotate(-degrees, { origin: [cx, cy] });
      draw();
    } finally {
      this.doc.restore();
    }
  }

  private applyStroke(stroke: StrokeStyle): void {
    this.doc
      .lineWidth(stroke.width)
      .strokeColor(this.color(stroke.color), this.opacity(stroke))
      .stroke();
  }

  private color(color: string): PdfColor {
    const rgba = this.colors.resolve(color);
    return [rgba.r, rgba.g, rgba.b];
  }

  private opacity(paint: Paint): number {
    return (this.colors.resolve(paint.color).a / 255) * paint.opacity;
  }

  /**
   * Selects a font file when one was resolved, otherwise a standard face.
   * A file pdfkit cannot read is reported once and replaced by the standard face.
   */
  private useFont(font: SurfaceFont): void {
    const fallback = standardPdfFont(font);

    if (font.path && !this.registeredFonts.has(font.path)) {
      const name = `${font.family}-${font.weight}`;
      try {
        this.doc.registerFont(name, font.path);
        this.doc.font(name);
        this.registeredFonts.set(font.path, name);
      } catch (error) {
        this.registeredFonts.set(font.path, undefined);
        reportFontWarning(
          this.logger,
          new FontLoadWarning(font.family, font.path, error instanceof Error ? error.message : String(error)),
          this.onWarning
        );
      }
    }

    const registered = font.path ? this.registeredFonts.get(font.path) : undefined;
    this.doc.font(registered ?? fallback).fontSize(font.size);
  }
}
