import type { FontLoadWarning } from '../core/errors.js';

/**
 * Output format identifiers. 'xml' passes the compiled intermediate through.
 */
export type OutputFormat = 'svg' | 'png' | 'pdf' | 'xml';

/**
 * Formats drawn by a backend renderer.
 */
export type RenderFormat = Exclude<OutputFormat, 'xml'>;

/**
 * Logging level for the renderer.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Options for rendering a deck.
 */
export interface RenderOptions {
  /**
   * Paint order of shape layers, as a colon-separated string or a list.
   * Unknown names are skipped.
   * @default 'image:rect:ellipse:curve:arc:line:poly:text:list'
   */
  layers?: string | readonly string[];

  /**
   * Grid overlay spacing in percent. 0 disables the grid.
   * @default 0
   */
  gridPercent?: number;

  /**
   * Document title. When set, each vector slide is titled "<title>: Slide N"
   * and the paginated document carries it as its Title.
   * @default ''
   */
  title?: string;

  /**
   * Font family for text with no explicit font.
   * @default 'sans'
   */
  fontFamily?: string;

  /**
   * Font weight for text with no explicit weight.
   * @default 400
   */
  fontWeight?: number;

  /**
   * Zero-based slide rendered by single-image formats (svg, png).
   * @default 0
   */
  slide?: number;

  /**
   * Canvas size given to fragments that carry no canvas element.
   * @default 792 x 612
   */
  defaultWidth?: number;
  defaultHeight?: number;

  /**
   * Logging level for diagnostic output.
   * @default 'warn'
   */
  logLevel?: LogLevel;

  /**
   * Called for every non-fatal font loading problem.
   */
  onWarning?: (warning: FontLoadWarning) => void;
}

/**
 * Default rendering options.
 */
export const DEFAULT_RENDER_OPTIONS = {
  layers: 'image:rect:ellipse:curve:arc:line:poly:text:list',
  gridPercent: 0,
  title: '',
  fontFamily: 'sans',
  fontWeight: 400,
  slide: 0,
  defaultWidth: 792,
  defaultHeight: 612,
  logLevel: 'warn',
} as const satisfies Required<Omit<RenderOptions, 'onWarning'>>;

/**
 * Render options after merging with defaults and splitting the layer list.
 */
export interface ResolvedRenderOptions {
  layers: readonly string[];
  gridPercent: number;
  title: string;
  fontFamily: string;
  fontWeight: number;
  slide: number;
  defaultWidth: number;
  defaultHeight: number;
  logLevel: LogLevel;
  onWarning: ((warning: FontLoadWarning) => void) | undefined;
}
