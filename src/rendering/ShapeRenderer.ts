/**
 * Draws geometric deck shapes on a surface.
 * Rects and ellipses are positioned by their center; heights given with `hr`
 * are a percentage of the rendered width.
 */

import type {
  ArcShape,
  CurveShape,
  EllipseShape,
  LineShape,
  Point,
  PolygonShape,
  RectShape,
} from '../types/index.js';
import { DEFAULT_SHAPE_COLOR, DEFAULT_STROKE_WIDTH } from '../core/constants.js';
import type { UnitConverter } from '../core/UnitConverter.js';
import type { DrawingSurface, Paint, StrokeStyle } from './DrawingSurface.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * Surface and coordinate system for one slide.
 */
export interface ShapeRenderContext {
  surface: DrawingSurface;
  converter: UnitConverter;
}

/**
 * Configuration for ShapeRenderer.
 */
export interface ShapeRendererConfig {
  logger?: ILogger;
}

/**
 * Converts a style opacity percent to a paint.
 */
export function shapePaint(color: string | undefined, opacity: number): Paint {
  return { color: color ?? DEFAULT_SHAPE_COLOR, opacity: opacity / 100 };
}

export class ShapeRenderer {
  private readonly logger: ILogger;

  constructor(config: ShapeRendererConfig = {}) {
    this.logger = config.logger ?? createLogger('warn', 'ShapeRenderer');
  }

  drawRect(ctx: ShapeRenderContext, rect: RectShape): void {
    const { surface, converter } = ctx;
    const { x, y } = converter.dimen(rect.xp, rect.yp, 0);
    const w = converter.ofWidth(rect.wp);
    const h = rect.hr === 0 ? converter.ofHeight(rect.hp) : (rect.hr / 100) * w;

    if (rect.gradient) {
      surface.fillLinearGradient(x - w / 2, y - h / 2, w, h, rect.gradient);
      return;
    }
    surface.fillRect(x - w / 2, y - h / 2, w, h, shapePaint(rect.color, rect.opacity));
  }

  drawEllipse(ctx: ShapeRenderContext, ellipse: EllipseShape): void {
    const { surface, converter } = ctx;
    const { x, y } = converter.dimen(ellipse.xp, ellipse.yp, 0);
    const w = converter.ofWidth(ellipse.wp);
    const h = ellipse.hr === 0 ? converter.ofHeight(ellipse.hp) : (ellipse.hr / 100) * w;
    surface.fillEllipse(x, y, w / 2, h / 2, shapePaint(ellipse.color, ellipse.opacity));
  }

  drawLine(ctx: ShapeRenderContext, line: LineShape): void {
    const { surface, converter } = ctx;
    const start = converter.dimen(line.xp1, line.yp1, line.sp);
    const end = converter.dimen(line.xp2, line.yp2, 0);
    surface.strokeLine(start.x, start.y, end.x, end.y, this.stroke(line.color, line.opacity, start.size));
  }

  /**
   * Both arc radii are measured against the canvas width, so equal `wp` and
   * `hp` give a circular arc on any canvas.
   */
  drawArc(ctx: ShapeRenderContext, arc: ArcShape): void {
    const { surface, converter } = ctx;
    const { x, y, size } = converter.dimen(arc.xp, arc.yp, arc.sp);
    const w = converter.ofWidth(arc.wp);
    const h = converter.ofWidth(arc.hp);
    surface.drawArc(x, y, w / 2, h / 2, arc.a1, arc.a2, this.stroke(arc.color, arc.opacity, size));
  }

  drawCurve(ctx: ShapeRenderContext, curve: CurveShape): void {
    const { surface, converter } = ctx;
    const start = converter.dimen(curve.xp1, curve.yp1, curve.sp);
    const control = { x: converter.x(curve.xp2), y: converter.y(curve.yp2) };
    const end = { x: converter.x(curve.xp3), y: converter.y(curve.yp3) };
    surface.drawCurve(
      { x: start.x, y: start.y },
      control,
      end,
      this.stroke(curve.color, curve.opacity, start.size)
    );
  }

  /**
   * Fills a polygon. Coordinates that failed to parse land on the device origin.
   */
  drawPolygon(ctx: ShapeRenderContext, polygon: PolygonShape): void {
    const { surface, converter } = ctx;
    const count = Math.min(polygon.xc.length, polygon.yc.length);
    if (count < 3) {
      this.logger.debug('Skipping polygon with fewer than 3 points', { points: count });
      return;
    }
    if (polygon.xc.length !== polygon.yc.length) {
      this.logger.warn('Polygon coordinate lists differ in length', {
        xc: polygon.xc.length,
        yc: polygon.yc.length,
      });
    }

    const points: Point[] = [];
    for (let i = 0; i < count; i++) {
      const xp = polygon.xc[i] ?? Number.NaN;
      const yp = polygon.yc[i] ?? Number.NaN;
      points.push({
        x: Number.isNaN(xp) ? 0 : converter.x(xp),
        y: Number.isNaN(yp) ? 0 : converter.y(yp),
      });
    }
    surface.fillPolygon(points, shapePaint(polygon.color, polygon.opacity));
  }

  private stroke(color: string | undefined, opacity: number, width: number): StrokeStyle {
    return {
      ...shapePaint(color, opacity),
      width: width === 0 ? DEFAULT_STROKE_WIDTH : width,
    };
  }
}
