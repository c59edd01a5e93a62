/**
 * Polling watcher that re-renders recently modified DSL files.
 *
 * Each poll walks the roots; a DSL file modified within the freshness window
 * and not already being processed is compiled once and written in every
 * requested format. A failing format is logged and the others still run.
 */

import { readFile, readdir, stat } from 'node:fs/promises';
import * as path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import type { DeckDocument, FileProcessResult, FormatOutcome, OutputFormat, RenderOptions } from '../types/index.js';
import { DSL_EXTENSION } from '../core/constants.js';
import { DeckRenderer, defaultOutputName, writeOutput } from '../core/DeckRenderer.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * Default watcher timings, in milliseconds.
 */
export const DEFAULT_WATCH_OPTIONS = {
  pollInterval: 2000,
  freshness: 10000,
  shutdownTimeout: 30000,
} as const;

/**
 * Configuration for DeckWatcher.
 */
export interface DeckWatcherConfig {
  /** Directories (or single files) to watch */
  roots: readonly string[];
  /** Formats written for every changed file */
  formats: readonly OutputFormat[];
  /** Directory for outputs; defaults to beside each input */
  outputDir?: string;
  renderer?: DeckRenderer;
  renderOptions?: RenderOptions;
  pollInterval?: number;
  /** Files modified longer ago than this are left alone */
  freshness?: number;
  /** Longest wait for running tasks when stopping */
  shutdownTimeout?: number;
  /** Called after each file is processed */
  onProcessed?: (result: FileProcessResult) => void;
  logger?: ILogger;
}

/**
 * Set of paths currently being processed.
 */
export class InFlightSet {
  private readonly paths: Set<string> = new Set();

  /**
   * Marks `key` in flight. Returns false when it already was.
   */
  tryAdd(key: string): boolean {
    if (this.paths.has(key)) {
      return false;
    }
    this.paths.add(key);
    return true;
  }

  delete(key: string): void {
    this.paths.delete(key);
  }

  has(key: string): boolean {
    return this.paths.has(key);
  }

  get size(): number {
    return this.paths.size;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class DeckWatcher {
  private readonly logger: ILogger;
  private readonly config: DeckWatcherConfig;
  private readonly renderer: DeckRenderer;
  private readonly pollInterval: number;
  private readonly freshness: number;
  private readonly shutdownTimeout: number;
  private readonly inFlight = new InFlightSet();
  private readonly tasks: Set<Promise<void>> = new Set();
  private controller?: AbortController;
  private loop?: Promise<void>;

  constructor(config: DeckWatcherConfig) {
    this.logger = config.logger ?? createLogger('warn', 'DeckWatcher');
    this.config = config;
    this.renderer = config.renderer ?? new DeckRenderer({ logger: this.logger.child('Renderer') });
    this.pollInterval = config.pollInterval ?? DEFAULT_WATCH_OPTIONS.pollInterval;
    this.freshness = config.freshness ?? DEFAULT_WATCH_OPTIONS.freshness;
    this.shutdownTimeout = config.shutdownTimeout ?? DEFAULT_WATCH_OPTIONS.shutdownTimeout;
  }

  get running(): boolean {
    return this.controller !== undefined && !this.controller.signal.aborted;
  }

  /**
   * Starts polling. Calling start on a running watcher does nothing.
   */
  start(): void {
    if (this.running) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.poll(controller.signal).catch((error: unknown) => {
      this.logger.error('Watch loop stopped', { error: errorMessage(error) });
    });
    this.logger.info('Watching', { roots: this.config.roots, formats: this.config.formats });
  }

  /**
   * Stops scanning and waits for running tasks, at most the shutdown timeout.
   *
   * @returns true when every task finished in time
   */
  async stop(): Promise<boolean> {
    this.controller?.abort();
    await this.loop;
    this.loop = undefined;

    const drained = await this.waitForTasks(this.shutdownTimeout);
    if (!drained) {
      this.logger.warn('Shutdown timed out with tasks still running', { tasks: this.tasks.size });
    }
    return drained;
  }

  /**
   * Resolves when no task is running.
   */
  async whenIdle(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all([...this.tasks]);
    }
  }

  /**
   * Walks the roots once and starts a task for every fresh DSL file.
   *
   * @returns the files dispatched by this scan
   */
  async scan(now: number = Date.now()): Promise<string[]> {
    const dispatched: string[] = [];

    for (const root of this.config.roots) {
      let files: string[];
      try {
        files = await this.findDeckFiles(root);
      } catch (error) {
        this.logger.warn('Cannot scan root', { root, error: errorMessage(error) });
        continue;
      }

      for (const file of files) {
        if (this.controller?.signal.aborted) {
          return dispatched;
        }
        if (await this.isFresh(file, now)) {
          if (this.dispatch(file)) {
            dispatched.push(file);
          }
        }
      }
    }

    return dispatched;
  }

  /**
   * Compiles one file and writes every configured format.
   */
  async processFile(filePath: string): Promise<FileProcessResult> {
    const started = Date.now();
    const options = this.config.renderOptions ?? {};

    let xml: string;
    try {
      xml = await this.renderer.compile(await readFile(filePath, 'utf8'));
    } catch (error) {
      this.logger.error('Compile failed', { file: filePath, error: errorMessage(error) });
      return { inputPath: filePath, outputs: [], errorMessage: errorMessage(error), durationMs: Date.now() - started };
    }

    let document: DeckDocument | undefined;
    const outputs: FormatOutcome[] = [];

    for (const format of this.config.formats) {
      const outputPath = this.outputPath(filePath, format);
      try {
        let data: Buffer;
        if (format === 'xml') {
          data = Buffer.from(xml, 'utf8');
        } else {
          document ??= this.renderer.parse(xml, options);
          data = await this.renderer.renderDocument(document, format, options, path.dirname(filePath));
        }
        await writeOutput(outputPath, data);
        outputs.push({ format, success: true, outputPath, bytes: data.length });
      } catch (error) {
        this.logger.warn('Format failed', { file: filePath, format, error: errorMessage(error) });
        outputs.push({ format, success: false, errorMessage: errorMessage(error) });
      }
    }

    const result: FileProcessResult = { inputPath: filePath, outputs, durationMs: Date.now() - started };
    this.logger.info('Processed', {
      file: filePath,
      written: outputs.filter((o) => o.success).length,
      failed: outputs.filter((o) => !o.success).length,
    });
    return result;
  }

  private outputPath(filePath: string, format: OutputFormat): string {
    const name = defaultOutputName(filePath, format);
    return this.config.outputDir ? path.join(this.config.outputDir, path.basename(name)) : name;
  }

  private dispatch(filePath: string): boolean {
    if (!this.inFlight.tryAdd(filePath)) {
      this.logger.debug('Already in flight', { file: filePath });
      return false;
    }

    const task = this.processFile(filePath)
      .then((result) => {
        this.config.onProcessed?.(result);
      })
      .catch((error: unknown) => {
        this.logger.error('Task failed', { file: filePath, error: errorMessage(error) });
      })
      .finally(() => {
        this.inFlight.delete(filePath);
        this.tasks.delete(task);
      });
    this.tasks.add(task);
    return true;
  }

  private async poll(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await this.scan();
      try {
        await sleep(this.pollInterval, undefined, { signal });
      } catch (error) {
        if (!signal.aborted) {
          throw error;
        }
      }
    }
  }

  private async waitForTasks(timeout: number): Promise<boolean> {
    const controller = new AbortController();
    const timedOut = sleep(timeout, false, { signal: controller.signal }).catch(() => false);
    const finished = this.whenIdle().then(() => true);
    const drained = await Promise.race([finished, timedOut]);
    controller.abort();
    return drained;
  }

  private async isFresh(file: string, now: number): Promise<boolean> {
    try {
      const info = await stat(file);
      return now - info.mtimeMs <= this.freshness;
    } catch (error) {
      this.logger.debug('Cannot stat file', { file, error: errorMessage(error) });
      return false;
    }
  }

  private async findDeckFiles(root: string): Promise<string[]> {
    const info = await stat(root);
    if (info.isFile()) {
      return path.extname(root) === DSL_EXTENSION ? [root] : [];
    }

    const found: string[] = [];
    const entries = await readdir(root, { withFileTypes: true });
    for (const entry of entries) {
      const full = path.join(root, entry.name);
      if (entry.isDirectory()) {
        found.push(...(await this.findDeckFiles(full)));
      } else if (entry.isFile() && path.extname(entry.name) === DSL_EXTENSION) {
        found.push(full);
      }
    }
    return found.sort();
  }
}

/**
 * Creates a DeckWatcher instance.
 */
export function createWatcher(config: DeckWatcherConfig): DeckWatcher {
  return new DeckWatcher(config);
}
