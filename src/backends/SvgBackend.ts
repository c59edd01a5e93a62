import type { DeckDocument } from '../types/index.js';
import { SlideRenderer } from '../rendering/SlideRenderer.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import { selectSlide, slideTitle, type BackendConfig, type SlideBackend } from './Backend.js';
import { CanvasFontRegistry } from './CanvasFonts.js';
import { SvgSurface } from './SvgSurface.js';

/**
 * Vector backend: one SVG document per slide.
 */
export class SvgBackend implements SlideBackend {
  readonly format = 'svg';
  private readonly logger: ILogger;
  private readonly config: BackendConfig;
  private readonly slideRenderer: SlideRenderer;
  private readonly fonts: CanvasFontRegistry;

  constructor(config: BackendConfig) {
    this.logger = config.logger ?? createLogger('warn', 'SvgBackend');
    this.config = config;
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
    const { title } = this.config.options;
    const surface = new SvgSurface({
      width: document.width,
      height: document.height,
      title: title ? slideTitle(title, slideIndex) : undefined,
      measure: (text, font) => this.fonts.measure(text, font),
    });

    await this.slideRenderer.renderSlide(surface, document, slide, slideIndex);
    return Buffer.from(surface.toString(), 'utf8');
  }
}
