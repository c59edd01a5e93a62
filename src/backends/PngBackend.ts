import { createCanvas } from '@napi-rs/canvas';
import type { DeckDocument } from '../types/index.js';
import { SlideRenderer } from '../rendering/SlideRenderer.js';
import { defaultColorResolver } from '../theme/ColorResolver.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import { selectSlide, type BackendConfig, type SlideBackend } from './Backend.js';
import { CanvasFontRegistry } from './CanvasFonts.js';
import { CanvasSurface } from './CanvasSurface.js';

/**
 * Raster backend: one PNG per slide, one pixel per device unit.
 */
export class PngBackend implements SlideBackend {
  readonly format = 'png';
  private readonly logger: ILogger;
  private readonly slideRenderer: SlideRenderer;
  private readonly fonts: CanvasFontRegistry;

  constructor(config: BackendConfig) {
    this.logger = config.logger ?? createLogger('warn', 'PngBackend');
    this.slideRenderer = new SlideRenderer({
      fontResolver: config.fontResolver,
      images: config.images,
      options: config.options,
      logger: this.logger.child('Slide'),
    });
    this.fonts = new CanvasFontRegistry({ onWarning: config.options.onWarning, logger: this.logger.child('Fonts') });
  }

  async renderSlide(document: DeckDocument, slideIndex: number): Promise<Buffer> {
    const slide = selectSlide(document, slideIndex);
    const width = Math.round(document.width);
    const height = Math.round(document.height);
    const canvas = createCanvas(width, height);
    const surface = new CanvasSurface(canvas.getContext('2d'), width, height, defaultColorResolver, this.fonts);

    await this.slideRenderer.renderSlide(surface, document, slide, slideIndex);

    const png = await canvas.encode('png');
    this.logger.debug('Encoded slide', { index: slideIndex, width, height, bytes: png.length });
    return png;
  }
}
