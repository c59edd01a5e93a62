import { describe, it, expect } from 'vitest';
import { loadEnvironmentConfig, parseLayerList, resolveRenderOptions } from '../../src/core/config.js';

describe('config', () => {
  describe('loadEnvironmentConfig', () => {
    it('should use defaults for an empty environment', () => {
      expect(loadEnvironmentConfig({})).toEqual({ fontDir: undefined, compilerPath: 'decksh', logLevel: undefined });
    });

    it('should read the deck variables', () => {
      const config = loadEnvironmentConfig({
        DECKFONTS: '/srv/fonts',
        DECKSH_BIN: '/usr/local/bin/decksh',
        DECK_LOG_LEVEL: 'DEBUG',
      });

      expect(config).toEqual({ fontDir: '/srv/fonts', compilerPath: '/usr/local/bin/decksh', logLevel: 'debug' });
    });

    it('should ignore an unknown log level', () => {
      expect(loadEnvironmentConfig({ DECK_LOG_LEVEL: 'loud' }).logLevel).toBeUndefined();
    });
  });

  describe('parseLayerList', () => {
    it('should split colon lists and drop blanks', () => {
      expect(parseLayerList('text: rect::image')).toEqual(['text', 'rect', 'image']);
      expect(parseLayerList(['list', ' poly '])).toEqual(['list', 'poly']);
    });
  });

  describe('resolveRenderOptions', () => {
    it('should fill every default', () => {
      const resolved = resolveRenderOptions();

      expect(resolved.layers).toEqual(['image', 'rect', 'ellipse', 'curve', 'arc', 'line', 'poly', 'text', 'list']);
      expect(resolved.gridPercent).toBe(0);
      expect(resolved.fontFamily).toBe('sans');
      expect(resolved.slide).toBe(0);
      expect(resolved.defaultWidth).toBe(792);
      expect(resolved.defaultHeight).toBe(612);
    });

    it('should keep defaults for options given as undefined', () => {
      expect(resolveRenderOptions({ fontFamily: undefined, slide: 2 })).toMatchObject({ fontFamily: 'sans', slide: 2 });
    });
  });
});
