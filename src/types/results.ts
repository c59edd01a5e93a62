import type { OutputFormat } from './options.js';

/**
 * Bytes produced for one output format.
 */
export interface RenderArtifact {
  format: OutputFormat;

  /**
   * Zero-based slide index for single-image formats; undefined for pdf and xml.
   */
  slideIndex?: number;

  data: Buffer;
}

/**
 * Outcome of writing one format for a watched or rendered file.
 */
export interface FormatOutcome {
  format: OutputFormat;

  /**
   * Whether the output was produced and written.
   */
  success: boolean;

  /**
   * Where the output was written.
   */
  outputPath?: string;

  /**
   * Size of the written output.
   */
  bytes?: number;

  /**
   * Error message if this format failed.
   */
  errorMessage?: string;
}

/**
 * Result of processing one DSL file into every requested format.
 */
export interface FileProcessResult {
  inputPath: string;

  /**
   * Per-format outcomes, in requested order. Empty when compilation failed.
   */
  outputs: FormatOutcome[];

  /**
   * Set when the file failed before any format was attempted.
   */
  errorMessage?: string;

  durationMs: number;
}
