import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { DirectoryFontCache, FontResolver, type FontCache } from '../../src/text/FontResolver.js';

class CountingCache implements FontCache {
  calls = 0;
  constructor(private readonly files: Record<string, string>) {}

  lookup(family: string, weight: number): string | undefined {
    this.calls++;
    return this.files[`${family}:${weight}`];
  }
}

describe('FontResolver', () => {
  describe('Resolution order', () => {
    it('should prefer a cached font file', () => {
      const resolver = new FontResolver({ cache: new CountingCache({ 'Inter:700': '/fonts/Inter/700.ttf' }) });

      expect(resolver.resolve('Inter', 700)).toEqual({
        requested: 'Inter',
        family: 'Inter',
        weight: 700,
        path: '/fonts/Inter/700.ttf',
        source: 'cache',
        monospace: false,
      });
    });

    it('should fall back to an email-safe family contained in the name', () => {
      const font = new FontResolver().resolve('Arial Narrow');

      expect(font.family).toBe('Arial');
      expect(font.source).toBe('email-safe');
      expect(font.path).toBeUndefined();
    });

    it('should mark monospace email-safe families', () => {
      expect(new FontResolver().resolve('Courier New').monospace).toBe(true);
    });

    it('should map logical names to generic families', () => {
      const resolver = new FontResolver();

      expect(resolver.resolve('mono')).toMatchObject({ family: 'monospace', source: 'generic', monospace: true });
      expect(resolver.resolve('serif').family).toBe('serif');
      expect(resolver.resolve('sans').family).toBe('sans-serif');
      expect(resolver.resolve('Nonexistent Grotesk').family).toBe('sans-serif');
    });
  });

  describe('Memoization', () => {
    it('should look each family and weight up once', () => {
      const cache = new CountingCache({});
      const resolver = new FontResolver({ cache });

      const first = resolver.resolve('sans', 400);
      const second = resolver.resolve('sans', 400);
      resolver.resolve('sans', 700);

      expect(second).toBe(first);
      expect(cache.calls).toBe(2);
    });

    it('should look up again after clearCache', () => {
      const cache = new CountingCache({});
      const resolver = new FontResolver({ cache });

      resolver.resolve('sans');
      resolver.clearCache();
      resolver.resolve('sans');

      expect(cache.calls).toBe(2);
    });
  });

  describe('DirectoryFontCache', () => {
    let root: string;

    beforeAll(() => {
      root = mkdtempSync(path.join(tmpdir(), 'deckfonts-'));
      mkdirSync(path.join(root, 'Inter'));
      writeFileSync(path.join(root, 'Inter', '700.ttf'), 'placeholder');
      writeFileSync(path.join(root, 'Plex.otf'), 'placeholder');
    });

    afterAll(() => {
      rmSync(root, { recursive: true, force: true });
    });

    it('should find weight files inside a family directory', () => {
      const cache = new DirectoryFontCache(root);

      expect(cache.lookup('Inter', 700)).toBe(path.join(root, 'Inter', '700.ttf'));
      expect(cache.lookup('Inter', 400)).toBeUndefined();
    });

    it('should accept a bare family file for the regular weight only', () => {
      const cache = new DirectoryFontCache(root);

      expect(cache.lookup('Plex', 400)).toBe(path.join(root, 'Plex.otf'));
      expect(cache.lookup('Plex', 700)).toBeUndefined();
    });

    it('should be created from DECKFONTS', () => {
      expect(DirectoryFontCache.fromEnvironment({ DECKFONTS: root })?.root).toBe(root);
      expect(DirectoryFontCache.fromEnvironment({})).toBeUndefined();
    });
  });
});
