/**
 * Type definitions for deckrender.
 */

// Options and configuration
export type {
  RenderOptions,
  ResolvedRenderOptions,
  OutputFormat,
  RenderFormat,
  LogLevel,
} from './options.js';
export { DEFAULT_RENDER_OPTIONS } from './options.js';

// Results
export type { RenderArtifact, FormatOutcome, FileProcessResult } from './results.js';

// Geometry
export type { Rgba, Point, Size } from './geometry.js';
export { Colors } from './geometry.js';

// Document model
export type {
  TextAnchor,
  TextType,
  ListType,
  Gradient,
  ShapeStyle,
  RectShape,
  EllipseShape,
  LineShape,
  ArcShape,
  CurveShape,
  PolygonShape,
  TextShape,
  ListItem,
  ListShape,
  ImageShape,
  Shape,
  ShapeKind,
  Slide,
  DeckDocument,
} from './elements.js';
