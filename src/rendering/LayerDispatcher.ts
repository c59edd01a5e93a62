/**
 * Draws a slide's shape collections in layer order.
 */

import type { Slide } from '../types/index.js';
import type { UnitConverter } from '../core/UnitConverter.js';
import type { SlideTextContext, TextLayoutEngine } from '../text/TextLayoutEngine.js';
import type { DrawingSurface } from './DrawingSurface.js';
import type { ImageRenderer } from './ImageRenderer.js';
import type { ShapeRenderer } from './ShapeRenderer.js';
import type { TextRenderer } from './TextRenderer.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * Per-slide state the dispatcher hands to each renderer.
 */
export interface LayerContext {
  surface: DrawingSurface;
  converter: UnitConverter;
  slide: Slide;
  slideIndex: number;
  text: SlideTextContext;
  textLayout: TextLayoutEngine;
}

/**
 * Configuration for LayerDispatcher.
 */
export interface LayerDispatcherConfig {
  shapes: ShapeRenderer;
  images: ImageRenderer;
  text: TextRenderer;
  logger?: ILogger;
}

export class LayerDispatcher {
  private readonly logger: ILogger;
  private readonly shapes: ShapeRenderer;
  private readonly images: ImageRenderer;
  private readonly text: TextRenderer;

  constructor(config: LayerDispatcherConfig) {
    this.logger = config.logger ?? createLogger('warn', 'LayerDispatcher');
    this.shapes = config.shapes;
    this.images = config.images;
    this.text = config.text;
  }

  /**
   * Draws every layer named in `layers`, in order. A name may repeat, in
   * which case that collection is drawn again. Unknown names are skipped.
   * Within a layer, elements are drawn in document order.
   */
  async dispatch(layers: readonly string[], ctx: LayerContext): Promise<void> {
    const { slide } = ctx;

    for (const layer of layers) {
      switch (layer) {
        case 'image':
          for (const image of slide.images) {
            await this.images.drawImage(
              {
                surface: ctx.surface,
                converter: ctx.converter,
                textLayout: ctx.textLayout,
                foreground: slide.foreground,
                fontFamily: ctx.text.fontFamily,
              },
              image
            );
          }
          break;
        case 'rect':
          this.each(layer, ctx, slide.rects, (rect) => this.shapes.drawRect(ctx, rect));
          break;
        case 'ellipse':
          this.each(layer, ctx, slide.ellipses, (ellipse) => this.shapes.drawEllipse(ctx, ellipse));
          break;
        case 'curve':
          this.each(layer, ctx, slide.curves, (curve) => this.shapes.drawCurve(ctx, curve));
          break;
        case 'arc':
          this.each(layer, ctx, slide.arcs, (arc) => this.shapes.drawArc(ctx, arc));
          break;
        case 'line':
          this.each(layer, ctx, slide.lines, (line) => this.shapes.drawLine(ctx, line));
          break;
        case 'poly':
          this.each(layer, ctx, slide.polygons, (polygon) => this.shapes.drawPolygon(ctx, polygon));
          break;
        case 'text':
          this.each(layer, ctx, slide.texts, (text) =>
            this.text.paintText(ctx.surface, ctx.textLayout.layoutText(text, ctx.text))
          );
          break;
        case 'list':
          this.each(layer, ctx, slide.lists, (list) =>
            this.text.paintList(ctx.surface, ctx.textLayout.layoutList(list, ctx.text))
          );
          break;
        default:
          this.logger.debug('Skipping unknown layer', { layer });
      }
    }
  }

  /**
   * Draws each element; a failing element is logged and the rest still draw.
   */
  private each<T>(layer: string, ctx: LayerContext, elements: readonly T[], draw: (element: T) => void): void {
    elements.forEach((element, index) => {
      try {
        draw(element);
      } catch (error) {
        this.logger.warn(`Failed to render ${layer}`, {
          slide: ctx.slideIndex,
          index,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    });
  }
}
