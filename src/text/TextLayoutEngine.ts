/**
 * Lays out text and list elements as positioned runs.
 * The layout is backend-independent; only text measurement comes from the
 * surface being drawn on.
 */

import type { ListShape, Point, TextAnchor, TextShape } from '../types/index.js';
import { CODE_BACKGROUND } from '../core/constants.js';
import type { UnitConverter } from '../core/UnitConverter.js';
import type { Paint, SurfaceFont } from '../rendering/DrawingSurface.js';
import { BulletFormatter, type BulletDot } from './BulletFormatter.js';
import type { FontResolver } from './FontResolver.js';
import { WordWrapper, type MeasureFn, type PositionedTextRun } from './WordWrapper.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * Family forced for code text.
 */
export const CODE_FONT_FAMILY = 'mono';

/**
 * Shaded rectangle painted beneath code text.
 */
export interface ShadedBackground {
  x: number;
  y: number;
  width: number;
  height: number;
  color: string;
}

/**
 * Laid out text element.
 */
export interface TextBlockLayout {
  runs: PositionedTextRun[];
  /** Line breaks produced by block wrapping */
  breaks: number;
  paint: Paint;
  background?: ShadedBackground;
  rotation: number;
  origin: Point;
}

/**
 * Laid out list item.
 */
export interface ListItemLayout {
  /** Zero-based item index */
  index: number;
  /** Item text with its prefix */
  text: string;
  runs: PositionedTextRun[];
  breaks: number;
  paint: Paint;
  marker?: BulletDot;
}

/**
 * Laid out list element.
 */
export interface ListLayout {
  items: ListItemLayout[];
  markerPaint: Paint;
  rotation: number;
  origin: Point;
}

/**
 * Slide-level values text layout depends on.
 */
export interface SlideTextContext {
  converter: UnitConverter;
  foreground: string;
  fontFamily: string;
  fontWeight: number;
}

/**
 * Configuration for TextLayoutEngine.
 */
export interface TextLayoutEngineConfig {
  fontResolver: FontResolver;
  measure: MeasureFn;
  logger?: ILogger;
}

/**
 * Text layout engine for measuring and positioning text.
 */
export class TextLayoutEngine {
  private readonly logger: ILogger;
  private readonly fontResolver: FontResolver;
  private readonly wordWrapper: WordWrapper;
  private readonly bulletFormatter = new BulletFormatter();

  constructor(config: TextLayoutEngineConfig) {
    this.logger = config.logger ?? createLogger('warn', 'TextLayoutEngine');
    this.fontResolver = config.fontResolver;
    this.wordWrapper = new WordWrapper(config.measure);
  }

  /**
   * Resolves a family at a device size.
   */
  font(family: string, weight: number, size: number): SurfaceFont {
    return { ...this.fontResolver.resolve(family, weight), size };
  }

  /**
   * Lays out a single line anchored at (`x`, `y`).
   */
  line(text: string, x: number, y: number, font: SurfaceFont, anchor: TextAnchor): PositionedTextRun {
    return { text, x, y, anchor, font };
  }

  /**
   * Lays out a text element.
   *
   * Free and code text place one run per line, `lp` font sizes apart. Block
   * text wraps to `wp` percent of the canvas (half the canvas by default).
   * Code text sits over a background `lines * lp * fs` tall, offset one font
   * size up and left of the first baseline.
   */
  layoutText(shape: TextShape, ctx: SlideTextContext): TextBlockLayout {
    const { converter } = ctx;
    const { x, y, size: fs } = converter.dimen(shape.xp, shape.yp, shape.sp);
    const paint: Paint = { color: shape.color ?? ctx.foreground, opacity: shape.opacity / 100 };
    const family = shape.type === 'code' ? CODE_FONT_FAMILY : (shape.font ?? ctx.fontFamily);
    const font = this.font(family, shape.weight ?? ctx.fontWeight, fs);
    const leading = shape.lp * fs;
    const origin = { x, y };

    if (shape.type === 'block') {
      const wrapped = this.wordWrapper.wrap(shape.content, x, y, converter.pwidth(shape.wp, converter.width / 2), leading, font);
      return { runs: wrapped.runs, breaks: wrapped.breaks, paint, rotation: shape.rotation, origin };
    }

    const lines = shape.content.split('\n');
    const anchor = shape.align ?? (shape.type === 'code' ? 'start' : 'middle');
    const runs = lines.map((text, i) => this.line(text, x, y + i * leading, font, anchor));

    let background: ShadedBackground | undefined;
    if (shape.type === 'code') {
      background = {
        x: x - fs,
        y: y - fs,
        width: converter.pwidth(shape.wp, converter.width - x - 20),
        height: lines.length * leading,
        color: CODE_BACKGROUND,
      };
    }

    return { runs, breaks: 0, paint, background, rotation: shape.rotation, origin };
  }

  /**
   * Lays out a list element.
   *
   * Centered lists place each item on one line. Other alignments wrap each
   * item to `wp` percent of the canvas and move the next item down by the
   * lines the wrap used, so items never overlap.
   */
  layoutList(shape: ListShape, ctx: SlideTextContext): ListLayout {
    const { converter } = ctx;
    const dimen = converter.dimen(shape.xp, shape.yp, shape.sp);
    const fs = dimen.size;
    const x = dimen.x + this.bulletFormatter.indent(shape.type, fs);
    let y = dimen.y;

    const color = shape.color ?? ctx.foreground;
    const leading = shape.lp * fs;
    const wrapWidth = converter.pwidth(shape.wp, converter.width / 2);
    const weight = shape.weight ?? ctx.fontWeight;
    const baseFamily = shape.font ?? ctx.fontFamily;

    const items: ListItemLayout[] = shape.items.map((item, index) => {
      const text = this.bulletFormatter.formatItem(shape.type, index, item.content);
      const font = this.font(item.font ?? baseFamily, weight, fs);
      const paint: Paint = { color: item.color ?? color, opacity: (item.opacity ?? shape.opacity) / 100 };
      const marker = shape.type === 'bullet' ? this.bulletFormatter.bulletDot(x, y, fs) : undefined;

      if (shape.align === 'middle') {
        const run = this.line(text, x, y, font, 'middle');
        y += leading;
        return { index, text, runs: [run], breaks: 0, paint, marker };
      }

      const wrapped = this.wordWrapper.wrap(text, x, y, wrapWidth, leading, font);
      y += leading + leading * wrapped.breaks;
      return { index, text, runs: wrapped.runs, breaks: wrapped.breaks, paint, marker };
    });

    this.logger.debug('Laid out list', { items: items.length, type: shape.type });

    return {
      items,
      markerPaint: { color, opacity: shape.opacity / 100 },
      rotation: shape.rotation,
      origin: { x, y: dimen.y },
    };
  }
}
