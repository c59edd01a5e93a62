/**
 * Resolves logical font names to usable font resources.
 *
 * Resolution order: a font file cached at the requested weight, then the
 * first email-safe family whose name occurs in the request, then a generic
 * family.
 */

import { existsSync } from 'node:fs';
import * as path from 'node:path';
import { loadEnvironmentConfig } from '../core/config.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * Fonts assumed present on every renderer host.
 */
export const EMAIL_SAFE_FONTS = [
  'Arial',
  'Helvetica',
  'Georgia',
  'Times',
  'Courier',
  'Verdana',
  'Tahoma',
  'Impact',
  'Comic Sans MS',
  'Trebuchet MS',
  'Arial Black',
  'Palatino',
  'Lucida Console',
] as const;

const MONOSPACE_FAMILIES = new Set(['Courier', 'Lucida Console', 'monospace']);

/**
 * Lookup of font files by family and weight.
 */
export interface FontCache {
  /**
   * Returns the path of a cached font file, or undefined when none is cached.
   */
  lookup(family: string, weight: number): string | undefined;
}

/**
 * How a font was resolved.
 */
export type FontSource = 'cache' | 'email-safe' | 'generic';

/**
 * Resolved font information.
 */
export interface ResolvedFont {
  /** Family name as requested */
  requested: string;
  /** Family name for markup and canvas use */
  family: string;
  weight: number;
  /** Font file, when resolved from the cache */
  path?: string;
  source: FontSource;
  monospace: boolean;
}

/**
 * Configuration for FontResolver.
 */
export interface FontResolverConfig {
  /** Font file cache; none means only substitutes are used */
  cache?: FontCache;
  /** Logger instance */
  logger?: ILogger;
}

/**
 * Font cache over a directory laid out as `<family>/<weight>.ttf`, with
 * `<family>.ttf` accepted for weight 400.
 */
export class DirectoryFontCache implements FontCache {
  readonly root: string;
  private static readonly EXTENSIONS = ['.ttf', '.otf'];

  constructor(root: string) {
    this.root = root;
  }

  /**
   * Creates a cache for the DECKFONTS directory, or undefined when unset.
   */
  static fromEnvironment(env: NodeJS.ProcessEnv = process.env): DirectoryFontCache | undefined {
    const { fontDir } = loadEnvironmentConfig(env);
    return fontDir ? new DirectoryFontCache(fontDir) : undefined;
  }

  lookup(family: string, weight: number): string | undefined {
    const candidates: string[] = [];
    for (const ext of DirectoryFontCache.EXTENSIONS) {
      candidates.push(path.join(this.root, family, `${weight}${ext}`));
    }
    if (weight === 400) {
      for (const ext of DirectoryFontCache.EXTENSIONS) {
        candidates.push(path.join(this.root, `${family}${ext}`));
      }
    }
    return candidates.find((candidate) => existsSync(candidate));
  }
}

/**
 * Picks the generic family for a logical name.
 */
function genericFamily(requested: string): string {
  const name = requested.trim().toLowerCase();
  if (name === 'mono' || name === 'monospace' || name === 'code') {
    return 'monospace';
  }
  if (name === 'serif') {
    return 'serif';
  }
  return 'sans-serif';
}

/**
 * Resolves logical font names, memoizing every answer.
 */
export class FontResolver {
  private readonly logger: ILogger;
  private readonly cache?: FontCache;
  private readonly resolved: Map<string, ResolvedFont> = new Map();

  constructor(config: FontResolverConfig = {}) {
    this.logger = config.logger ?? createLogger('warn', 'FontResolver');
    this.cache = config.cache;
  }

  /**
   * Resolves a family and weight.
   */
  resolve(family: string, weight: number = 400): ResolvedFont {
    const key = `${family}:${weight}`;
    const hit = this.resolved.get(key);
    if (hit) {
      return hit;
    }

    const font = this.resolveUncached(family, weight);
    this.resolved.set(key, font);
    this.logger.debug('Resolved font', { requested: family, weight, family: font.family, source: font.source });
    return font;
  }

  /**
   * Finds the email-safe family contained in a requested name.
   */
  findEmailSafe(requested: string): string | undefined {
    const name = requested.toLowerCase();
    return EMAIL_SAFE_FONTS.find((safe) => name.includes(safe.toLowerCase()));
  }

  /**
   * Forgets every resolved font.
   */
  clearCache(): void {
    this.resolved.clear();
  }

  private resolveUncached(family: string, weight: number): ResolvedFont {
    const monospaceRequest = genericFamily(family) === 'monospace';

    const cachedPath = this.cache?.lookup(family, weight);
    if (cachedPath) {
      return { requested: family, family, weight, path: cachedPath, source: 'cache', monospace: monospaceRequest };
    }

    const safe = this.findEmailSafe(family);
    if (safe) {
      return { requested: family, family: safe, weight, source: 'email-safe', monospace: MONOSPACE_FAMILIES.has(safe) };
    }

    const generic = genericFamily(family);
    return { requested: family, family: generic, weight, source: 'generic', monospace: generic === 'monospace' };
  }
}

/**
 * Creates a FontResolver over the DECKFONTS directory, if one is set.
 */
export function createFontResolver(logger?: ILogger, env: NodeJS.ProcessEnv = process.env): FontResolver {
  return new FontResolver({ cache: DirectoryFontCache.fromEnvironment(env), logger });
}
