import { mkdir, readFile, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import type {
  DeckDocument,
  LogLevel,
  OutputFormat,
  RenderArtifact,
  RenderFormat,
  RenderOptions,
  ResolvedRenderOptions,
} from '../types/index.js';
import type { Backend } from '../backends/Backend.js';
import { PdfBackend } from '../backends/PdfBackend.js';
import { PngBackend } from '../backends/PngBackend.js';
import { SvgBackend } from '../backends/SvgBackend.js';
import type { FontResolver } from '../text/FontResolver.js';
import { createFontResolver } from '../text/FontResolver.js';
import { ImageDecoder } from '../utils/ImageDecoder.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import { resolveRenderOptions } from './config.js';
import { DSL_EXTENSION, OUTPUT_FORMATS } from './constants.js';
import { DeckshCompiler, type DeckCompiler } from './DeckCompiler.js';
import { DeckParser } from './DeckParser.js';
import { OutputIOError, UnsupportedFormatError, wrapStageError } from './errors.js';

/**
 * Interface for the deck renderer.
 */
export interface IDeckRenderer {
  /**
   * Compiles DSL source and renders it in one format.
   */
  render(source: string, format: string, options?: RenderOptions): Promise<Buffer>;

  /**
   * Renders already-compiled deck XML.
   */
  renderXml(xml: string, format: string, options?: RenderOptions): Promise<Buffer>;

  /**
   * Renders a parsed document, one artifact per slide for svg and png.
   */
  renderSlides(document: DeckDocument, format: string, options?: RenderOptions): Promise<RenderArtifact[]>;

  /**
   * Renders a DSL file and writes the output, returning the path written.
   */
  renderFile(inputPath: string, format: string, outputPath?: string, options?: RenderOptions): Promise<string>;
}

/**
 * Configuration for DeckRenderer.
 */
export interface DeckRendererConfig {
  /** DSL compiler; defaults to the decksh executable */
  compiler?: DeckCompiler;
  /** Font resolver shared by every render; defaults to one over DECKFONTS */
  fontResolver?: FontResolver;
  /** Directory image names resolve against; defaults to the working directory */
  imageDir?: string;
  logLevel?: LogLevel;
  logger?: ILogger;
}

/**
 * Type guard for known output formats.
 */
export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Default output path: the DSL extension replaced by the format's, or the
 * format's extension appended when the input has a different extension.
 */
export function defaultOutputName(inputPath: string, format: OutputFormat): string {
  if (path.extname(inputPath) === DSL_EXTENSION) {
    return `${inputPath.slice(0, -DSL_EXTENSION.length)}.${format}`;
  }
  return `${inputPath}.${format}`;
}

function requireFormat(format: string): OutputFormat {
  if (!isOutputFormat(format)) {
    throw new UnsupportedFormatError(format);
  }
  return format;
}

function requireRenderFormat(format: string): RenderFormat {
  const checked = requireFormat(format);
  if (checked === 'xml') {
    throw new UnsupportedFormatError(format);
  }
  return checked;
}

/**
 * Compile, parse and render pipeline. Errors leave each stage labeled with
 * the stage name.
 */
export class DeckRenderer implements IDeckRenderer {
  private readonly logger: ILogger;
  private readonly compiler: DeckCompiler;
  private readonly fontResolver: FontResolver;
  private readonly imageDir?: string;

  constructor(config: DeckRendererConfig = {}) {
    this.logger = config.logger ?? createLogger(config.logLevel ?? 'warn', 'DeckRenderer');
    this.compiler = config.compiler ?? new DeckshCompiler({ logger: this.logger.child('Compiler') });
    this.fontResolver = config.fontResolver ?? createFontResolver(this.logger.child('Fonts'));
    this.imageDir = config.imageDir;
  }

  async render(source: string, format: string, options: RenderOptions = {}): Promise<Buffer> {
    const checked = requireFormat(format);
    const xml = await this.compile(source);
    if (checked === 'xml') {
      return Buffer.from(xml, 'utf8');
    }
    return this.renderXml(xml, checked, options);
  }

  async renderXml(xml: string, format: string, options: RenderOptions = {}): Promise<Buffer> {
    const checked = requireFormat(format);
    if (checked === 'xml') {
      return Buffer.from(xml, 'utf8');
    }
    const document = this.parse(xml, options);
    return this.renderDocument(document, checked, options);
  }

  /**
   * Runs the external compiler.
   */
  async compile(source: string): Promise<string> {
    try {
      return await this.compiler.compile(source);
    } catch (error) {
      throw wrapStageError('compile', error);
    }
  }

  /**
   * Parses deck XML into a document.
   */
  parse(xml: string, options: RenderOptions = {}): DeckDocument {
    const resolved = resolveRenderOptions(options);
    try {
      return new DeckParser({
        defaultWidth: resolved.defaultWidth,
        defaultHeight: resolved.defaultHeight,
        logger: this.logger.child('Parser'),
      }).parse(xml);
    } catch (error) {
      throw wrapStageError('parse', error);
    }
  }

  /**
   * Renders a document to one artifact: the selected slide for svg and png,
   * every slide for pdf.
   */
  async renderDocument(
    document: DeckDocument,
    format: string,
    options: RenderOptions = {},
    imageDir: string | undefined = this.imageDir
  ): Promise<Buffer> {
    const checked = requireRenderFormat(format);
    const resolved = resolveRenderOptions(options);
    const backend = this.createBackend(checked, resolved, imageDir);

    this.logger.info('Rendering deck', {
      format: checked,
      slides: document.slides.length,
      width: document.width,
      height: document.height,
    });

    try {
      if (backend.format === 'pdf') {
        return await backend.renderDocument(document);
      }
      return await backend.renderSlide(document, resolved.slide);
    } catch (error) {
      throw wrapStageError('render', error);
    }
  }

  async renderSlides(document: DeckDocument, format: string, options: RenderOptions = {}): Promise<RenderArtifact[]> {
    const checked = requireRenderFormat(format);
    const backend = this.createBackend(checked, resolveRenderOptions(options), this.imageDir);

    try {
      if (backend.format === 'pdf') {
        return [{ format: checked, data: await backend.renderDocument(document) }];
      }

      const artifacts: RenderArtifact[] = [];
      for (let i = 0; i < document.slides.length; i++) {
        artifacts.push({ format: checked, slideIndex: i, data: await backend.renderSlide(document, i) });
      }
      return artifacts;
    } catch (error) {
      throw wrapStageError('render', error);
    }
  }

  /**
   * Renders a DSL file. Images resolve against the file's directory.
   *
   * @throws OutputIOError when the output cannot be written
   */
  async renderFile(
    inputPath: string,
    format: string,
    outputPath?: string,
    options: RenderOptions = {}
  ): Promise<string> {
    const checked = requireFormat(format);
    const target = outputPath ?? defaultOutputName(inputPath, checked);

    let source: string;
    try {
      source = await readFile(inputPath, 'utf8');
    } catch (error) {
      throw wrapStageError('compile', error);
    }

    const xml = await this.compile(source);
    const data =
      checked === 'xml'
        ? Buffer.from(xml, 'utf8')
        : await this.renderDocument(this.parse(xml, options), checked, options, path.dirname(inputPath));

    await writeOutput(target, data);
    this.logger.info('Wrote output', { input: inputPath, output: target, bytes: data.length });
    return target;
  }

  private createBackend(format: RenderFormat, options: ResolvedRenderOptions, imageDir: string | undefined): Backend {
    const config = {
      fontResolver: this.fontResolver,
      images: new ImageDecoder({ baseDir: imageDir, logger: this.logger.child('Images') }),
      options,
      logger: this.logger.child(format.toUpperCase()),
    };

    switch (format) {
      case 'svg':
        return new SvgBackend(config);
      case 'png':
        return new PngBackend(config);
      case 'pdf':
        return new PdfBackend(config);
    }
  }
}

/**
 * Writes bytes, creating the parent directory.
 *
 * @throws OutputIOError on any filesystem failure
 */
export async function writeOutput(outputPath: string, data: Buffer): Promise<void> {
  try {
    await mkdir(path.dirname(outputPath), { recursive: true });
    await writeFile(outputPath, data);
  } catch (error) {
    throw new OutputIOError(outputPath, error);
  }
}

/**
 * Creates a DeckRenderer instance.
 */
export function createRenderer(config?: DeckRendererConfig): DeckRenderer {
  return new DeckRenderer(config);
}

/**
 * Convenience function to compile and render DSL source in one format.
 */
export async function renderDeck(source: string, format: string, options?: RenderOptions): Promise<Buffer> {
  const renderer = new DeckRenderer({ logLevel: options?.logLevel });
  return renderer.render(source, format, options);
}

/**
 * Convenience function to render a DSL file beside itself, or to `outputPath`.
 */
export async function renderDeckFile(
  inputPath: string,
  format: string,
  outputPath?: string,
  options?: RenderOptions
): Promise<string> {
  const renderer = new DeckRenderer({ logLevel: options?.logLevel });
  return renderer.renderFile(inputPath, format, outputPath, options);
}
