/**
 * Places images and their captions.
 */

import type { ImageShape, Size } from '../types/index.js';
import { DEFAULT_CAPTION_SIZE } from '../core/constants.js';
import type { UnitConverter } from '../core/UnitConverter.js';
import type { TextLayoutEngine } from '../text/TextLayoutEngine.js';
import type { ImageDecoder } from '../utils/ImageDecoder.js';
import type { DrawingSurface } from './DrawingSurface.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * Rendered image size in device units.
 */
export type ImageSize = Size;

/**
 * Everything an image needs from the slide being drawn.
 */
export interface ImageRenderContext {
  surface: DrawingSurface;
  converter: UnitConverter;
  textLayout: TextLayoutEngine;
  foreground: string;
  fontFamily: string;
}

/**
 * Configuration for ImageRenderer.
 */
export interface ImageRendererConfig {
  decoder: ImageDecoder;
  logger?: ILogger;
}

/**
 * Computes the drawn size of an image.
 *
 * Explicit `width`/`height` are pixels; `scale` is a percentage of those.
 * `autoscale` stretches an image narrower than the canvas to the canvas
 * width. A `width` with no `height` is a percentage of the canvas width, the
 * height following the natural aspect ratio. With no size at all the natural
 * size is used.
 */
export function computeImageSize(
  shape: ImageShape,
  natural: ImageSize,
  canvasWidth: number
): ImageSize {
  let width = shape.width;
  let height = shape.height;

  if (shape.scale > 0) {
    width = Math.trunc((width * shape.scale) / 100);
    height = Math.trunc((height * shape.scale) / 100);
  }

  if (shape.autoscale && width > 0 && width < canvasWidth) {
    height = Math.trunc((canvasWidth / width) * height);
    width = canvasWidth;
  }

  if (shape.height === 0 && shape.width > 0 && natural.height > 0) {
    const fractional = (shape.width / 100) * canvasWidth;
    width = Math.trunc(fractional);
    height = Math.trunc(fractional / (natural.width / natural.height));
  }

  if (width === 0 && height === 0) {
    return { width: natural.width, height: natural.height };
  }
  return { width, height };
}

export class ImageRenderer {
  private readonly logger: ILogger;
  private readonly decoder: ImageDecoder;

  constructor(config: ImageRendererConfig) {
    this.logger = config.logger ?? createLogger('warn', 'ImageRenderer');
    this.decoder = config.decoder;
  }

  /**
   * Draws an image centered on its position, then its caption.
   * An image that cannot be loaded is logged and left out.
   */
  async drawImage(ctx: ImageRenderContext, shape: ImageShape): Promise<void> {
    const { surface, converter } = ctx;

    const decoded = await this.decoder.load(shape.name).catch((error: unknown) => {
      this.logger.warn('Skipping image', {
        name: shape.name,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    });
    if (!decoded) {
      return;
    }

    const x = Math.trunc(converter.x(shape.xp));
    const y = Math.trunc(converter.y(shape.yp));
    const size = computeImageSize(shape, decoded, converter.width);
    surface.drawImage(decoded, x, y, size.width, size.height);

    if (shape.caption) {
      this.drawCaption(ctx, shape, shape.caption, x, y, size);
    }
  }

  private drawCaption(
    ctx: ImageRenderContext,
    shape: ImageShape,
    caption: string,
    x: number,
    y: number,
    size: ImageSize
  ): void {
    const { surface, converter, textLayout } = ctx;
    const captionSize = converter.pwidth(shape.sp, converter.ofWidth(DEFAULT_CAPTION_SIZE));
    const font = textLayout.font(shape.font ?? ctx.fontFamily, 400, captionSize);

    let cx = x;
    if (shape.align === 'start') {
      cx = x - size.width / 2;
    } else if (shape.align === 'end') {
      cx = x + size.width / 2;
    }

    surface.drawText(
      caption,
      cx,
      y + size.height / 2 + captionSize * 1.5,
      font,
      shape.align,
      { color: shape.color ?? ctx.foreground, opacity: 1 }
    );
  }
}
