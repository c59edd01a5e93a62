/**
 * Drawing surface that accumulates SVG markup.
 * Color strings pass through to the markup unchanged.
 */

import type { Gradient, Point, TextAnchor } from '../types/index.js';
import type { DrawingSurface, Paint, StrokeStyle, SurfaceFont } from '../rendering/DrawingSurface.js';
import type { DecodedImage, ImageFormat } from '../utils/ImageDecoder.js';

const MIME_TYPES: Record<ImageFormat, string> = {
  png: 'image/png',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  bmp: 'image/bmp',
  webp: 'image/webp',
  unknown: 'application/octet-stream',
};

/**
 * Escapes text for use in XML content and attribute values.
 */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Formats a device coordinate with at most two decimals.
 */
export function fmt(value: number): string {
  return String(Number(value.toFixed(2)));
}

/**
 * Point on an ellipse at `degrees` counterclockwise from 3 o'clock, as seen
 * on the page.
 */
export function ellipsePoint(cx: number, cy: number, rx: number, ry: number, degrees: number): Point {
  const radians = (degrees * Math.PI) / 180;
  return { x: cx + rx * Math.cos(radians), y: cy - ry * Math.sin(radians) };
}

function fillAttrs(paint: Paint): string {
  const opacity = paint.opacity < 1 ? ` fill-opacity="${fmt(paint.opacity)}"` : '';
  return `fill="${escapeXml(paint.color)}"${opacity}`;
}

function strokeAttrs(stroke: StrokeStyle): string {
  const opacity = stroke.opacity < 1 ? ` stroke-opacity="${fmt(stroke.opacity)}"` : '';
  return `stroke="${escapeXml(stroke.color)}" stroke-width="${fmt(stroke.width)}"${opacity}`;
}

/**
 * Configuration for SvgSurface.
 */
export interface SvgSurfaceConfig {
  width: number;
  height: number;
  /** Emitted as the document `<title>` when set */
  title?: string;
  measure: (text: string, font: SurfaceFont) => number;
}

export class SvgSurface implements DrawingSurface {
  readonly width: number;
  readonly height: number;
  private readonly title?: string;
  private readonly measure: (text: string, font: SurfaceFont) => number;
  private readonly body: string[] = [];
  private readonly defs: string[] = [];
  private readonly gradientIds: Map<string, string> = new Map();

  constructor(config: SvgSurfaceConfig) {
    this.width = config.width;
    this.height = config.height;
    this.title = config.title;
    this.measure = config.measure;
  }

  fillRect(x: number, y: number, w: number, h: number, paint: Paint): void {
    this.body.push(`<rect x="${fmt(x)}" y="${fmt(y)}" width="${fmt(w)}" height="${fmt(h)}" ${fillAttrs(paint)}/>`);
  }

  fillEllipse(cx: number, cy: number, rx: number, ry: number, paint: Paint): void {
    this.body.push(
      `<ellipse cx="${fmt(cx)}" cy="${fmt(cy)}" rx="${fmt(rx)}" ry="${fmt(ry)}" ${fillAttrs(paint)}/>`
    );
  }

  strokeLine(x1: number, y1: number, x2: number, y2: number, stroke: StrokeStyle): void {
    this.body.push(
      `<line x1="${fmt(x1)}" y1="${fmt(y1)}" x2="${fmt(x2)}" y2="${fmt(y2)}" ${strokeAttrs(stroke)}/>`
    );
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
    const sweep = endAngle - startAngle;
    if (Math.abs(sweep) >= 360) {
      this.body.push(
        `<ellipse cx="${fmt(cx)}" cy="${fmt(cy)}" rx="${fmt(rx)}" ry="${fmt(ry)}" fill="none" ${strokeAttrs(stroke)}/>`
      );
      return;
    }

    const start = ellipsePoint(cx, cy, rx, ry, startAngle);
    const end = ellipsePoint(cx, cy, rx, ry, endAngle);
    const largeArc = Math.abs(sweep) > 180 ? 1 : 0;
    // SVG sweep flag 1 runs clockwise on the page
    const sweepFlag = sweep > 0 ? 0 : 1;
    const d =
      `M ${fmt(start.x)} ${fmt(start.y)} ` +
      `A ${fmt(rx)} ${fmt(ry)} 0 ${largeArc} ${sweepFlag} ${fmt(end.x)} ${fmt(end.y)}`;
    this.body.push(`<path d="${d}" fill="none" ${strokeAttrs(stroke)}/>`);
  }

  drawCurve(start: Point, control: Point, end: Point, stroke: StrokeStyle): void {
    const d =
      `M ${fmt(start.x)} ${fmt(start.y)} ` +
      `Q ${fmt(control.x)} ${fmt(control.y)} ${fmt(end.x)} ${fmt(end.y)}`;
    this.body.push(`<path d="${d}" fill="none" ${strokeAttrs(stroke)}/>`);
  }

  fillPolygon(points: readonly Point[], paint: Paint): void {
    const list = points.map((p) => `${fmt(p.x)},${fmt(p.y)}`).join(' ');
    this.body.push(`<polygon points="${list}" ${fillAttrs(paint)}/>`);
  }

  fillLinearGradient(x: number, y: number, w: number, h: number, gradient: Gradient): void {
    const id = this.gradientId(gradient);
    this.body.push(`<rect x="${fmt(x)}" y="${fmt(y)}" width="${fmt(w)}" height="${fmt(h)}" fill="url(#${id})"/>`);
  }

  drawText(text: string, x: number, y: number, font: SurfaceFont, anchor: TextAnchor, paint: Paint): void {
    const weight = font.weight !== 400 ? ` font-weight="${font.weight}"` : '';
    this.body.push(
      `<text x="${fmt(x)}" y="${fmt(y)}" font-family="${escapeXml(font.family)}" font-size="${fmt(font.size)}"` +
        `${weight} text-anchor="${anchor}" ${fillAttrs(paint)}>${escapeXml(text)}</text>`
    );
  }

  measureText(text: string, font: SurfaceFont): number {
    return this.measure(text, font);
  }

  drawImage(image: DecodedImage, cx: number, cy: number, w: number, h: number): void {
    const href = `data:${MIME_TYPES[image.format]};base64,${image.data.toString('base64')}`;
    this.body.push(
      `<image x="${fmt(cx - w / 2)}" y="${fmt(cy - h / 2)}" width="${fmt(w)}" height="${fmt(h)}" ` +
        `preserveAspectRatio="none" xlink:href="${href}"/>`
    );
  }

  rotated(degrees: number, cx: number, cy: number, draw: () => void): void {
    this.body.push(`<g transform="rotate(${fmt(-degrees)} ${fmt(cx)} ${fmt(cy)})">`);
    draw();
    this.body.push('</g>');
  }

  /**
   * Returns the complete SVG document.
   */
  toString(): string {
    const lines = [
      '<?xml version="1.0" encoding="UTF-8"?>',
      `<svg xmlns="http://www.w3.org/2000/svg" xmlns:xlink="http://www.w3.org/1999/xlink" ` +
        `width="${fmt(this.width)}" height="${fmt(this.height)}" viewBox="0 0 ${fmt(this.width)} ${fmt(this.height)}">`,
    ];
    if (this.title !== undefined) {
      lines.push(`<title>${escapeXml(this.title)}</title>`);
    }
    if (this.defs.length > 0) {
      lines.push('<defs>', ...this.defs, '</defs>');
    }
    lines.push(...this.body, '</svg>');
    return `${lines.join('\n')}\n`;
  }

  private gradientId(gradient: Gradient): string {
    const key = `${gradient.color1}|${gradient.color2}|${gradient.percent}`;
    const existing = this.gradientIds.get(key);
    if (existing) {
      return existing;
    }

    const id = `grad${this.gradientIds.size}`;
    this.gradientIds.set(key, id);
    this.defs.push(
      `<linearGradient id="${id}" x1="0" y1="0" x2="0" y2="1">` +
        `<stop offset="0%" stop-color="${escapeXml(gradient.color1)}"/>` +
        `<stop offset="${fmt(gradient.percent)}%" stop-color="${escapeXml(gradient.color2)}"/>` +
        '</linearGradient>'
    );
    return id;
  }
}
