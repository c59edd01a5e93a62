/**
 * deckrender - percentage-coordinate deck renderer
 *
 * Renders slide decks described in deck XML to SVG, PNG and PDF, with a
 * compile pipeline, a polling watcher and golden fixture testing.
 */

// Main entry point
export {
  DeckRenderer,
  createRenderer,
  renderDeck,
  renderDeckFile,
  defaultOutputName,
  isOutputFormat,
  writeOutput,
} from './core/DeckRenderer.js';
export type { IDeckRenderer, DeckRendererConfig } from './core/DeckRenderer.js';

// Types - Options and Results
export type {
  RenderOptions,
  ResolvedRenderOptions,
  OutputFormat,
  RenderFormat,
  LogLevel,
  RenderArtifact,
  FormatOutcome,
  FileProcessResult,
} from './types/index.js';
export { DEFAULT_RENDER_OPTIONS } from './types/index.js';

// Types - Document model
export type {
  Rgba,
  Point,
  Size,
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
} from './types/index.js';
export { Colors } from './types/index.js';

// Core
export {
  DeckshCompiler,
  PassThroughCompiler,
  DeckParser,
  parseDeck,
  UnitConverter,
  loadEnvironmentConfig,
  parseLayerList,
  resolveRenderOptions,
  DeckError,
  CompileError,
  ParseError,
  UnsupportedFormatError,
  SlideIndexError,
  FontLoadWarning,
  OutputIOError,
  StageError,
} from './core/index.js';
export type {
  DeckCompiler,
  DeckshCompilerConfig,
  DeckParserConfig,
  EnvironmentConfig,
  DeckErrorCode,
  PipelineStage,
} from './core/index.js';

// Backends
export { SvgBackend, PngBackend, PdfBackend } from './backends/index.js';
export type { Backend, BackendConfig, SlideBackend, DocumentBackend } from './backends/index.js';

// Rendering
export { SlideRenderer, LayerDispatcher } from './rendering/index.js';
export type { DrawingSurface, Paint, StrokeStyle, SurfaceFont } from './rendering/index.js';

// Text
export { FontResolver, DirectoryFontCache, createFontResolver, TextLayoutEngine, WordWrapper } from './text/index.js';
export type { FontCache, ResolvedFont, FontResolverConfig, MeasureFn } from './text/index.js';

// Theme
export { ColorResolver, defaultColorResolver } from './theme/index.js';

// Watcher
export { DeckWatcher, InFlightSet, DEFAULT_WATCH_OPTIONS, createWatcher } from './watch/index.js';
export type { DeckWatcherConfig } from './watch/index.js';

// Golden testing
export {
  GoldenTestRunner,
  runGoldenTests,
  recordGoldenFixtures,
  formatGoldenReport,
  loadGoldenCatalog,
} from './testing/index.js';
export type { GoldenReport, GoldenCaseResult, GoldenStageResult, GoldenTestOptions } from './testing/index.js';

// Utilities
export { createLogger, parseLogLevel, ImageDecoder } from './utils/index.js';
export type { ILogger, LogSink } from './utils/index.js';
