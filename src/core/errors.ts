/**
 * Error taxonomy for the rendering pipeline.
 *
 * Every error carries the pipeline stage it came from so callers can tell a
 * compiler rejection from a malformed document or a failed write.
 */

/**
 * Pipeline stage names.
 */
export type PipelineStage = 'compile' | 'parse' | 'render' | 'write';

/**
 * Stable error codes.
 */
export type DeckErrorCode =
  | 'COMPILE_FAILED'
  | 'PARSE_FAILED'
  | 'UNSUPPORTED_FORMAT'
  | 'SLIDE_INDEX'
  | 'FONT_LOAD'
  | 'OUTPUT_IO'
  | 'STAGE_FAILED';

/**
 * Base class for pipeline errors.
 */
export class DeckError extends Error {
  readonly stage: PipelineStage;
  readonly code: DeckErrorCode;

  constructor(stage: PipelineStage, code: DeckErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DeckError';
    this.stage = stage;
    this.code = code;
  }
}

/**
 * The DSL compiler rejected its input. The message is the compiler's own.
 */
export class CompileError extends DeckError {
  readonly exitCode: number | null;

  constructor(message: string, exitCode: number | null = null, options?: { cause?: unknown }) {
    super('compile', 'COMPILE_FAILED', message, options);
    this.name = 'CompileError';
    this.exitCode = exitCode;
  }
}

/**
 * The intermediate document is malformed.
 */
export class ParseError extends DeckError {
  readonly element?: string;
  readonly attribute?: string;

  constructor(message: string, details: { element?: string; attribute?: string; cause?: unknown } = {}) {
    super('parse', 'PARSE_FAILED', message, { cause: details.cause });
    this.name = 'ParseError';
    this.element = details.element;
    this.attribute = details.attribute;
  }
}

/**
 * No backend produces the requested format.
 */
export class UnsupportedFormatError extends DeckError {
  readonly format: string;

  constructor(format: string) {
    super('render', 'UNSUPPORTED_FORMAT', `Unsupported output format: ${format}`);
    this.name = 'UnsupportedFormatError';
    this.format = format;
  }
}

/**
 * Requested slide index is outside the document.
 */
export class SlideIndexError extends DeckError {
  readonly slideIndex: number;
  readonly slideCount: number;

  constructor(slideIndex: number, slideCount: number) {
    super('render', 'SLIDE_INDEX', `Slide index ${slideIndex} out of range (0-${slideCount - 1})`);
    this.name = 'SlideIndexError';
    this.slideIndex = slideIndex;
    this.slideCount = slideCount;
  }
}

/**
 * A font could not be loaded; rendering continued with a fallback face.
 * Reported, never thrown.
 */
export class FontLoadWarning extends DeckError {
  readonly family: string;
  readonly path?: string;

  constructor(family: string, path: string | undefined, reason: string) {
    super('render', 'FONT_LOAD', `Font ${family}${path ? ` (${path})` : ''} not loaded: ${reason}`);
    this.name = 'FontLoadWarning';
    this.family = family;
    this.path = path;
  }
}

/**
 * Produced bytes could not be written or returned.
 */
export class OutputIOError extends DeckError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super('write', 'OUTPUT_IO', `Cannot write ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.name = 'OutputIOError';
    this.path = path;
  }
}

/**
 * Any other failure inside a stage, labeled with the stage name.
 */
export class StageError extends DeckError {
  constructor(stage: PipelineStage, cause: unknown) {
    super(stage, 'STAGE_FAILED', `${stage}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'StageError';
  }
}

/**
 * Labels an error with its stage. Taxonomy errors already carry one.
 */
export function wrapStageError(stage: PipelineStage, error: unknown): DeckError {
  if (error instanceof DeckError) {
    return error;
  }
  return new StageError(stage, error);
}
