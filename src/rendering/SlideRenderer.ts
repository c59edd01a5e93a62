import type { DeckDocument, ResolvedRenderOptions, Slide } from '../types/index.js';
import { GRID_STROKE_WIDTH } from '../core/constants.js';
import { UnitConverter } from '../core/UnitConverter.js';
import type { FontResolver } from '../text/FontResolver.js';
import { TextLayoutEngine } from '../text/TextLayoutEngine.js';
import type { ImageDecoder } from '../utils/ImageDecoder.js';
import type { DrawingSurface } from './DrawingSurface.js';
import { ImageRenderer } from './ImageRenderer.js';
import { LayerDispatcher } from './LayerDispatcher.js';
import { ShapeRenderer } from './ShapeRenderer.js';
import { TextRenderer } from './TextRenderer.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * Configuration for SlideRenderer.
 */
export interface SlideRendererConfig {
  fontResolver: FontResolver;
  images: ImageDecoder;
  options: ResolvedRenderOptions;
  logger?: ILogger;
}

/**
 * Paints one slide onto any drawing surface: background, gradient, the
 * layers in order, then the optional grid.
 */
export class SlideRenderer {
  private readonly logger: ILogger;
  private readonly fontResolver: FontResolver;
  private readonly options: ResolvedRenderOptions;
  private readonly dispatcher: LayerDispatcher;

  constructor(config: SlideRendererConfig) {
    this.logger = config.logger ?? createLogger('warn', 'SlideRenderer');
    this.fontResolver = config.fontResolver;
    this.options = config.options;
    this.dispatcher = new LayerDispatcher({
      shapes: new ShapeRenderer({ logger: this.logger.child('Shape') }),
      images: new ImageRenderer({ decoder: config.images, logger: this.logger.child('Image') }),
      text: new TextRenderer(),
      logger: this.logger.child('Layers'),
    });
  }

  async renderSlide(surface: DrawingSurface, document: DeckDocument, slide: Slide, slideIndex: number): Promise<void> {
    const { width, height } = document;
    const converter = new UnitConverter(width, height);

    this.logger.debug('Rendering slide', { index: slideIndex, width, height });

    surface.fillRect(0, 0, width, height, { color: slide.background, opacity: 1 });
    if (slide.gradient) {
      surface.fillLinearGradient(0, 0, width, height, slide.gradient);
    }

    const textLayout = new TextLayoutEngine({
      fontResolver: this.fontResolver,
      measure: (text, font) => surface.measureText(text, font),
      logger: this.logger.child('Text'),
    });

    await this.dispatcher.dispatch(this.options.layers, {
      surface,
      converter,
      slide,
      slideIndex,
      text: {
        converter,
        foreground: slide.foreground,
        fontFamily: this.options.fontFamily,
        fontWeight: this.options.fontWeight,
      },
      textLayout,
    });

    if (this.options.gridPercent > 0) {
      this.drawGrid(surface, converter, textLayout, slide.foreground, this.options.gridPercent);
    }
  }

  /**
   * Draws grid lines every `percent` of each dimension, labelled along the
   * bottom and left edges. Zero labels are left out.
   */
  private drawGrid(
    surface: DrawingSurface,
    converter: UnitConverter,
    textLayout: TextLayoutEngine,
    color: string,
    percent: number
  ): void {
    const { width, height } = converter;
    const stroke = { color, opacity: 1, width: GRID_STROKE_WIDTH };
    const paint = { color, opacity: 1 };
    const fs = converter.ofWidth(1);
    const font = textLayout.font('sans', 400, fs);

    const stepX = converter.ofWidth(percent);
    for (let x = 0, pl = 0; x <= width; x += stepX, pl += percent) {
      surface.strokeLine(x, 0, x, height, stroke);
      if (pl > 0) {
        surface.drawText(pl.toFixed(0), x, height - fs, font, 'middle', paint);
      }
    }

    const stepY = converter.ofHeight(percent);
    for (let y = 0, pl = 0; y <= height; y += stepY, pl += percent) {
      surface.strokeLine(0, y, width, y, stroke);
      if (pl < 100) {
        surface.drawText((100 - pl).toFixed(0), fs, y + fs / 3, font, 'middle', paint);
      }
    }
  }
}
