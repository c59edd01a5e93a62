/**
 * Backend contracts shared by the vector, raster and paginated outputs.
 */

import type { DeckDocument, RenderFormat, ResolvedRenderOptions } from '../types/index.js';
import { SlideIndexError } from '../core/errors.js';
import type { FontResolver } from '../text/FontResolver.js';
import type { ImageDecoder } from '../utils/ImageDecoder.js';
import type { ILogger } from '../utils/Logger.js';

/**
 * Services every backend draws with.
 */
export interface BackendConfig {
  fontResolver: FontResolver;
  images: ImageDecoder;
  options: ResolvedRenderOptions;
  logger?: ILogger;
}

/**
 * A backend that produces one artifact per slide.
 */
export interface SlideBackend {
  readonly format: Exclude<RenderFormat, 'pdf'>;
  renderSlide(document: DeckDocument, slideIndex: number): Promise<Buffer>;
}

/**
 * A backend that produces one artifact holding every slide.
 */
export interface DocumentBackend {
  readonly format: 'pdf';
  renderDocument(document: DeckDocument): Promise<Buffer>;
}

export type Backend = SlideBackend | DocumentBackend;

/**
 * Returns the requested slide or throws SlideIndexError.
 */
export function selectSlide(document: DeckDocument, slideIndex: number): DeckDocument['slides'][number] {
  const slide = Number.isInteger(slideIndex) ? document.slides[slideIndex] : undefined;
  if (!slide) {
    throw new SlideIndexError(slideIndex, document.slides.length);
  }
  return slide;
}

/**
 * Metadata title for a zero-based slide index.
 */
export function slideTitle(title: string, slideIndex: number): string {
  return `${title}: Slide ${slideIndex + 1}`;
}
