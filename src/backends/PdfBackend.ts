import PDFDocument from 'pdfkit';
import type { DeckDocument } from '../types/index.js';
import { SlideRenderer } from '../rendering/SlideRenderer.js';
import { defaultColorResolver } from '../theme/ColorResolver.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import type { BackendConfig, DocumentBackend } from './Backend.js';
import { PdfSurface } from './PdfSurface.js';

/**
 * Fixed creation date so identical decks produce identical documents.
 */
const CREATION_DATE = new Date(0);

/**
 * Paginated backend: every slide on its own page, page size equal to the canvas.
 */
export class PdfBackend implements DocumentBackend {
  readonly format = 'pdf';
  private readonly logger: ILogger;
  private readonly config: BackendConfig;
  private readonly slideRenderer: SlideRenderer;

  constructor(config: BackendConfig) {
    this.logger = config.logger ?? createLogger('warn', 'PdfBackend');
    this.config = config;
    this.slideRenderer = new SlideRenderer({
      fontResolver: config.fontResolver,
      images: config.images,
      options: config.options,
      logger: this.logger.child('Slide'),
    });
  }

  async renderDocument(document: DeckDocument): Promise<Buffer> {
    const { options } = this.config;
    const title = options.title || document.title;
    const doc = new PDFDocument({
      autoFirstPage: false,
      compress: false,
      info: title ? { Title: title, CreationDate: CREATION_DATE } : { CreationDate: CREATION_DATE },
    });

    const chunks: Buffer[] = [];
    const finished = new Promise<Buffer>((resolve, reject) => {
      doc.on('data', (chunk: Buffer) => chunks.push(chunk));
      doc.on('end', () => resolve(Buffer.concat(chunks)));
      doc.on('error', reject);
    });

    const registeredFonts = new Map<string, string | undefined>();
    try {
      for (const [index, slide] of document.slides.entries()) {
        doc.addPage({ size: [document.width, document.height], margin: 0 });
        const surface = new PdfSurface({
          doc,
          width: document.width,
          height: document.height,
          colors: defaultColorResolver,
          logger: this.logger.child('Surface'),
          onWarning: options.onWarning,
          registeredFonts,
        });
        await this.slideRenderer.renderSlide(surface, document, slide, index);
      }
    } finally {
      doc.end();
    }

    const pdf = await finished;
    this.logger.debug('Wrote document', { pages: document.slides.length, bytes: pdf.length });
    return pdf;
  }
}
