/**
 * Font registration and text measurement on @napi-rs/canvas.
 * Used to draw raster text and to measure text for every backend that
 * needs word widths before drawing.
 */

import { GlobalFonts, createCanvas, type SKRSContext2D } from '@napi-rs/canvas';
import { FontLoadWarning } from '../core/errors.js';
import type { SurfaceFont } from '../rendering/DrawingSurface.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

const GENERIC_FAMILIES = new Set(['sans-serif', 'serif', 'monospace']);

/**
 * Receives font problems that did not stop rendering.
 */
export type FontWarningHandler = (warning: FontLoadWarning) => void;

/**
 * Logs a font warning and passes it to the caller's handler.
 */
export function reportFontWarning(logger: ILogger, warning: FontLoadWarning, onWarning?: FontWarningHandler): void {
  logger.warn(warning.message, { family: warning.family, path: warning.path });
  onWarning?.(warning);
}

/**
 * Configuration for CanvasFontRegistry.
 */
export interface CanvasFontRegistryConfig {
  onWarning?: FontWarningHandler;
  logger?: ILogger;
}

/**
 * Registers font files with the canvas once each and builds CSS font
 * strings. A file that fails to register is reported and its text falls
 * back to the generic family.
 */
export class CanvasFontRegistry {
  private readonly logger: ILogger;
  private readonly onWarning?: FontWarningHandler;
  private readonly registered: Map<string, string | undefined> = new Map();
  private readonly scratch: SKRSContext2D = createCanvas(1, 1).getContext('2d');

  constructor(config: CanvasFontRegistryConfig = {}) {
    this.logger = config.logger ?? createLogger('warn', 'CanvasFonts');
    this.onWarning = config.onWarning;
  }

  /**
   * Family name the canvas knows the font by.
   */
  family(font: SurfaceFont): string {
    if (!font.path) {
      return font.family;
    }

    if (!this.registered.has(font.path)) {
      const alias = `${font.family} ${font.weight}`;
      let failure: string | undefined;
      try {
        if (!GlobalFonts.registerFromPath(font.path, alias)) {
          failure = 'font file could not be registered';
        }
      } catch (error) {
        failure = error instanceof Error ? error.message : String(error);
      }

      if (failure === undefined) {
        this.logger.debug('Registered font', { family: font.family, path: font.path });
        this.registered.set(font.path, alias);
      } else {
        this.registered.set(font.path, undefined);
        reportFontWarning(this.logger, new FontLoadWarning(font.family, font.path, failure), this.onWarning);
      }
    }

    return this.registered.get(font.path) ?? (font.monospace ? 'monospace' : 'sans-serif');
  }

  /**
   * CSS font shorthand for the canvas `font` property.
   */
  css(font: SurfaceFont): string {
    const family = this.family(font);
    const quoted = GENERIC_FAMILIES.has(family) ? family : `"${family}"`;
    return `${font.weight} ${font.size}px ${quoted}`;
  }

  /**
   * Advance width of `text` in device units.
   */
  measure(text: string, font: SurfaceFont): number {
    this.scratch.font = this.css(font);
    return this.scratch.measureText(text).width;
  }
}
