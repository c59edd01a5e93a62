import { describe, it, expect } from 'vitest';
import type { ListShape, TextShape } from '../../src/types/index.js';
import { UnitConverter } from '../../src/core/UnitConverter.js';
import type { SurfaceFont } from '../../src/rendering/DrawingSurface.js';
import { FontResolver } from '../../src/text/FontResolver.js';
import { TextLayoutEngine, type SlideTextContext } from '../../src/text/TextLayoutEngine.js';
import { WordWrapper } from '../../src/text/WordWrapper.js';

/** Every character is half an em wide. */
const halfEm = (text: string, font: SurfaceFont): number => text.length * font.size * 0.5;

const SANS: SurfaceFont = {
  requested: 'sans',
  family: 'sans-serif',
  weight: 400,
  source: 'generic',
  monospace: false,
  size: 10,
};

function textShape(overrides: Partial<TextShape>): TextShape {
  return {
    kind: 'text',
    xp: 50,
    yp: 50,
    sp: 2,
    wp: 0,
    type: 'free',
    lp: 1.4,
    rotation: 0,
    opacity: 100,
    content: '',
    ...overrides,
  };
}

function listShape(overrides: Partial<ListShape>): ListShape {
  return {
    kind: 'list',
    xp: 10,
    yp: 90,
    sp: 1,
    wp: 95,
    type: 'plain',
    align: 'start',
    lp: 2,
    rotation: 0,
    opacity: 100,
    items: [],
    ...overrides,
  };
}

describe('WordWrapper', () => {
  it('should break after the word that crosses the right edge', () => {
    const result = new WordWrapper(halfEm).wrap('aa bb cc dd', 0, 100, 25, 14, SANS);

    expect(result.runs.map((run) => [run.text, run.x, run.y])).toEqual([
      ['aa', 0, 100],
      ['bb', 11.5, 100],
      ['cc', 23, 100],
      ['dd', 0, 114],
    ]);
    expect(result.breaks).toBe(1);
  });

  it('should honor the manual break token', () => {
    const result = new WordWrapper(halfEm).wrap('aa \\n bb', 0, 100, 500, 14, SANS);

    expect(result.runs.map((run) => [run.text, run.x, run.y])).toEqual([
      ['aa', 0, 100],
      ['bb', 0, 114],
    ]);
    expect(result.breaks).toBe(1);
  });

  it('should use a full em between words in monospace', () => {
    const result = new WordWrapper(halfEm).wrap('aa bb', 0, 0, 500, 14, { ...SANS, monospace: true });
    expect(result.runs[1]?.x).toBe(15);
  });

  it('should measure each word once', () => {
    let calls = 0;
    const wrapper = new WordWrapper((text, font) => {
      calls++;
      return halfEm(text, font);
    });

    wrapper.wrap('aa aa aa', 0, 0, 500, 14, SANS);
    expect(calls).toBe(2);
  });
});

describe('TextLayoutEngine', () => {
  const ctx: SlideTextContext = {
    converter: new UnitConverter(1000, 1000),
    foreground: 'black',
    fontFamily: 'sans',
    fontWeight: 400,
  };
  const engine = new TextLayoutEngine({ fontResolver: new FontResolver(), measure: halfEm });

  describe('layoutText', () => {
    it('should center free text and stack its lines', () => {
      const layout = engine.layoutText(textShape({ content: 'one\ntwo' }), ctx);

      expect(layout.runs.map((run) => [run.text, run.x, run.y, run.anchor])).toEqual([
        ['one', 500, 500, 'middle'],
        ['two', 500, 528, 'middle'],
      ]);
      expect(layout.paint).toEqual({ color: 'black', opacity: 1 });
      expect(layout.background).toBeUndefined();
    });

    it('should honor an explicit anchor and color', () => {
      const layout = engine.layoutText(textShape({ content: 'x', align: 'end', color: 'red', opacity: 40 }), ctx);

      expect(layout.runs[0]?.anchor).toBe('end');
      expect(layout.paint).toEqual({ color: 'red', opacity: 0.4 });
    });

    it('should set code in monospace over a shaded background', () => {
      const layout = engine.layoutText(textShape({ type: 'code', xp: 10, yp: 90, sp: 1, content: 'a\nb' }), ctx);

      expect(layout.runs[0]?.font.family).toBe('monospace');
      expect(layout.runs[0]?.anchor).toBe('start');
      expect(layout.background).toEqual({ x: 90, y: 90, width: 880, height: 28, color: 'rgb(240,240,240)' });
    });

    it('should wrap block text to half the canvas by default', () => {
      const words = Array.from({ length: 12 }, () => 'abcdefghij').join(' ');
      const layout = engine.layoutText(textShape({ type: 'block', xp: 0, yp: 100, sp: 1, content: words }), ctx);

      // 50 per word plus a 1.5 gap: the tenth word ends past x=500
      expect(layout.breaks).toBe(1);
      expect(layout.runs[9]).toMatchObject({ x: 463.5, y: 0 });
      expect(layout.runs[10]).toMatchObject({ x: 0, y: 14 });
    });

    it('should keep the rotation origin at the anchor point', () => {
      const layout = engine.layoutText(textShape({ content: 'r', rotation: 45 }), ctx);

      expect(layout.rotation).toBe(45);
      expect(layout.origin).toEqual({ x: 500, y: 500 });
    });
  });

  describe('layoutList', () => {
    it('should number items', () => {
      const layout = engine.layoutList(
        listShape({ type: 'number', items: [{ content: 'One' }, { content: 'Two' }] }),
        ctx
      );

      expect(layout.items.map((item) => item.text)).toEqual(['1. One', '2. Two']);
      expect(layout.items[1]?.runs[0]).toMatchObject({ text: '2.', x: 100, y: 120 });
    });

    it('should indent bulleted lists and place a dot per item', () => {
      const layout = engine.layoutList(
        listShape({ type: 'bullet', items: [{ content: 'One' }, { content: 'Two' }] }),
        ctx
      );

      expect(layout.items[0]?.runs[0]).toMatchObject({ x: 112, y: 100 });
      expect(layout.items[0]?.marker).toEqual({ cx: 102, cy: 97.5, r: 2.5 });
      expect(layout.items[1]?.marker).toEqual({ cx: 102, cy: 117.5, r: 2.5 });
    });

    it('should apply per-item color and opacity', () => {
      const layout = engine.layoutList(
        listShape({ color: 'navy', items: [{ content: 'a' }, { content: 'b', color: 'red', opacity: 50 }] }),
        ctx
      );

      expect(layout.items[0]?.paint).toEqual({ color: 'navy', opacity: 1 });
      expect(layout.items[1]?.paint).toEqual({ color: 'red', opacity: 0.5 });
      expect(layout.markerPaint).toEqual({ color: 'navy', opacity: 1 });
    });

    it('should put centered items on one line each', () => {
      const layout = engine.layoutList(
        listShape({ align: 'middle', items: [{ content: 'a b c' }, { content: 'd' }] }),
        ctx
      );

      expect(layout.items[0]?.runs).toHaveLength(1);
      expect(layout.items[0]?.runs[0]).toMatchObject({ text: 'a b c', anchor: 'middle', y: 100 });
      expect(layout.items[1]?.runs[0]?.y).toBe(120);
    });

    it('should push the next item down by the lines a wrapped item used', () => {
      const long = Array.from({ length: 12 }, () => 'abcdefghij').join(' ');
      const layout = engine.layoutList(listShape({ wp: 50, items: [{ content: long }, { content: 'next' }] }), ctx);

      expect(layout.items[0]?.breaks).toBe(1);
      expect(layout.items[1]?.runs[0]?.y).toBe(140);
    });
  });
});
