/**
 * Shared constants for deck elements, layers and output formats.
 */

import type { OutputFormat } from '../types/index.js';

/**
 * Layer names accepted in a layer list.
 * Order is the default paint order: later layers paint over earlier ones.
 */
export const LAYER_NAMES = [
  'image',
  'rect',
  'ellipse',
  'curve',
  'arc',
  'line',
  'poly',
  'text',
  'list',
] as const;

/**
 * Type representing a known layer name.
 */
export type LayerName = (typeof LAYER_NAMES)[number];

/**
 * Shape element tags that may appear inside a slide.
 */
export const SHAPE_ELEMENT_TAGS = [
  'rect',
  'ellipse',
  'line',
  'arc',
  'curve',
  'polygon',
  'text',
  'list',
  'image',
] as const;

/**
 * Every output format, in the order the watcher reports them.
 */
export const OUTPUT_FORMATS: readonly OutputFormat[] = ['svg', 'png', 'pdf', 'xml'];

/**
 * Extension of DSL source files.
 */
export const DSL_EXTENSION = '.dsh';

/** Default canvas width (US Letter, landscape, points) */
export const DEFAULT_CANVAS_WIDTH = 792;

/** Default canvas height (US Letter, landscape, points) */
export const DEFAULT_CANVAS_HEIGHT = 612;

/** Background when a slide sets none */
export const DEFAULT_BACKGROUND = 'white';

/** Foreground (text, grid) when a slide sets none */
export const DEFAULT_FOREGROUND = 'black';

/** Fill for shapes with no color */
export const DEFAULT_SHAPE_COLOR = 'rgb(127,127,127)';

/** Background behind code text */
export const CODE_BACKGROUND = 'rgb(240,240,240)';

/** Text line spacing, as a multiple of font size */
export const LINE_SPACING = 1.4;

/** List item spacing, as a multiple of font size */
export const LIST_SPACING = 2.0;

/** List wrap width percent */
export const LIST_WRAP = 95;

/** Stroke width in device units when a line, arc or curve sets none */
export const DEFAULT_STROKE_WIDTH = 2;

/** Caption size percent when an image sets none */
export const DEFAULT_CAPTION_SIZE = 2;

/** Grid line width in device units */
export const GRID_STROKE_WIDTH = 0.25;

/** Step used to approximate arcs with straight chords, degrees */
export const ARC_CHORD_DEGREES = 15;
