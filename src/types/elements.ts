/**
 * Document model for a parsed deck.
 *
 * Positions and sizes are percentages of the canvas: x values of the width,
 * y values measured up from the bottom edge. Shape records are immutable once
 * parsed.
 */

/**
 * Horizontal text anchor.
 */
export type TextAnchor = 'start' | 'middle' | 'end';

/**
 * Text layout modes.
 * - 'free': newline-separated lines
 * - 'block': word-wrapped to a target width
 * - 'code': monospaced lines over a shaded background
 */
export type TextType = 'free' | 'block' | 'code';

/**
 * List item marker styles.
 */
export type ListType = 'plain' | 'bullet' | 'number';

/**
 * Two-stop linear gradient, top to bottom.
 */
export interface Gradient {
  readonly color1: string;
  readonly color2: string;
  /** Position of the second stop, percent (1-100) */
  readonly percent: number;
}

/**
 * Color and opacity shared by every drawn shape.
 */
export interface ShapeStyle {
  /** Color string; falls back per shape kind when absent */
  readonly color?: string;
  /** Opacity percent (1-100) */
  readonly opacity: number;
}

export interface RectShape extends ShapeStyle {
  readonly kind: 'rect';
  readonly xp: number;
  readonly yp: number;
  readonly wp: number;
  readonly hp: number;
  /** Height as a percentage of the rendered width; 0 when unset */
  readonly hr: number;
  readonly gradient?: Gradient;
}

export interface EllipseShape extends ShapeStyle {
  readonly kind: 'ellipse';
  readonly xp: number;
  readonly yp: number;
  readonly wp: number;
  readonly hp: number;
  readonly hr: number;
}

export interface LineShape extends ShapeStyle {
  readonly kind: 'line';
  readonly xp1: number;
  readonly yp1: number;
  readonly xp2: number;
  readonly yp2: number;
  /** Stroke width as a percentage of canvas width; 0 when unset */
  readonly sp: number;
}

export interface ArcShape extends ShapeStyle {
  readonly kind: 'arc';
  readonly xp: number;
  readonly yp: number;
  readonly wp: number;
  readonly hp: number;
  /** Start angle, degrees counterclockwise from 3 o'clock */
  readonly a1: number;
  /** End angle, degrees counterclockwise from 3 o'clock */
  readonly a2: number;
  readonly sp: number;
}

/**
 * Quadratic curve from (xp1, yp1) to (xp3, yp3) with control point (xp2, yp2).
 */
export interface CurveShape extends ShapeStyle {
  readonly kind: 'curve';
  readonly xp1: number;
  readonly yp1: number;
  readonly xp2: number;
  readonly yp2: number;
  readonly xp3: number;
  readonly yp3: number;
  readonly sp: number;
}

export interface PolygonShape extends ShapeStyle {
  readonly kind: 'polygon';
  readonly xc: readonly number[];
  readonly yc: readonly number[];
}

export interface TextShape extends ShapeStyle {
  readonly kind: 'text';
  readonly xp: number;
  readonly yp: number;
  /** Font size as a percentage of canvas width */
  readonly sp: number;
  /** Wrap or background width percent; 0 means the per-type default */
  readonly wp: number;
  readonly type: TextType;
  /** Explicit anchor; free text defaults to middle, block and code to start */
  readonly align?: TextAnchor;
  readonly font?: string;
  readonly weight?: number;
  /** Line spacing as a multiple of font size */
  readonly lp: number;
  /** Rotation in degrees, counterclockwise about (xp, yp) */
  readonly rotation: number;
  readonly content: string;
}

export interface ListItem {
  readonly content: string;
  readonly color?: string;
  readonly font?: string;
  readonly opacity?: number;
}

export interface ListShape extends ShapeStyle {
  readonly kind: 'list';
  readonly xp: number;
  readonly yp: number;
  readonly sp: number;
  readonly wp: number;
  readonly type: ListType;
  readonly align: TextAnchor;
  readonly font?: string;
  readonly weight?: number;
  readonly lp: number;
  readonly rotation: number;
  readonly items: readonly ListItem[];
}

export interface ImageShape {
  readonly kind: 'image';
  /** Image file path */
  readonly name: string;
  readonly xp: number;
  readonly yp: number;
  /** Pixel width, or a width percent when height is 0 */
  readonly width: number;
  readonly height: number;
  /** Scale percent; 0 means unscaled */
  readonly scale: number;
  readonly autoscale: boolean;
  readonly caption?: string;
  /** Caption font size percent */
  readonly sp: number;
  readonly font?: string;
  readonly color?: string;
  readonly align: TextAnchor;
}

export type Shape =
  | RectShape
  | EllipseShape
  | LineShape
  | ArcShape
  | CurveShape
  | PolygonShape
  | TextShape
  | ListShape
  | ImageShape;

export type ShapeKind = Shape['kind'];

export interface Slide {
  readonly background: string;
  readonly foreground: string;
  /** Present only when both gradient colors are set */
  readonly gradient?: Gradient;
  readonly rects: readonly RectShape[];
  readonly ellipses: readonly EllipseShape[];
  readonly lines: readonly LineShape[];
  readonly arcs: readonly ArcShape[];
  readonly curves: readonly CurveShape[];
  readonly polygons: readonly PolygonShape[];
  readonly texts: readonly TextShape[];
  readonly lists: readonly ListShape[];
  readonly images: readonly ImageShape[];
}

export interface DeckDocument {
  readonly width: number;
  readonly height: number;
  readonly title?: string;
  readonly slides: readonly Slide[];
}
