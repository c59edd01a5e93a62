import type { LogLevel, RenderOptions, ResolvedRenderOptions } from '../types/index.js';
import { DEFAULT_RENDER_OPTIONS } from '../types/index.js';
import { parseLogLevel } from '../utils/Logger.js';

/**
 * Settings read from the process environment.
 */
export interface EnvironmentConfig {
  /** Font directory override (DECKFONTS) */
  fontDir?: string;
  /** DSL compiler executable (DECKSH_BIN) */
  compilerPath: string;
  /** Log level (DECK_LOG_LEVEL) */
  logLevel?: LogLevel;
}

/**
 * Compiler executable used when DECKSH_BIN is unset.
 */
export const DEFAULT_COMPILER_PATH = 'decksh';

/**
 * Reads deck settings from an environment map.
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const fontDir = env['DECKFONTS']?.trim();
  const compilerPath = env['DECKSH_BIN']?.trim();

  return {
    fontDir: fontDir ? fontDir : undefined,
    compilerPath: compilerPath ? compilerPath : DEFAULT_COMPILER_PATH,
    logLevel: parseLogLevel(env['DECK_LOG_LEVEL']),
  };
}

/**
 * Splits a layer list given as "a:b:c" or as an array.
 */
export function parseLayerList(layers: string | readonly string[]): string[] {
  const names = typeof layers === 'string' ? layers.split(':') : [...layers];
  return names.map((name) => name.trim()).filter((name) => name.length > 0);
}

/**
 * Merges render options over the defaults.
 */
export function resolveRenderOptions(options: RenderOptions = {}): ResolvedRenderOptions {
  const defaults = DEFAULT_RENDER_OPTIONS;

  return {
    layers: parseLayerList(options.layers ?? defaults.layers),
    gridPercent: options.gridPercent ?? defaults.gridPercent,
    title: options.title ?? defaults.title,
    fontFamily: options.fontFamily ?? defaults.fontFamily,
    fontWeight: options.fontWeight ?? defaults.fontWeight,
    slide: options.slide ?? defaults.slide,
    defaultWidth: options.defaultWidth ?? defaults.defaultWidth,
    defaultHeight: options.defaultHeight ?? defaults.defaultHeight,
    logLevel: options.logLevel ?? defaults.logLevel,
    onWarning: options.onWarning,
  };
}
