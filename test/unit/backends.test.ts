import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { createCanvas, loadImage } from '@napi-rs/canvas';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import type { DeckDocument, RenderOptions } from '../../src/types/index.js';
import type { BackendConfig } from '../../src/backends/Backend.js';
import { PdfBackend } from '../../src/backends/PdfBackend.js';
import { arcChordPoints, standardPdfFont } from '../../src/backends/PdfSurface.js';
import { PngBackend } from '../../src/backends/PngBackend.js';
import { SvgBackend } from '../../src/backends/SvgBackend.js';
import { SvgSurface, escapeXml } from '../../src/backends/SvgSurface.js';
import { resolveRenderOptions } from '../../src/core/config.js';
import { parseDeck } from '../../src/core/DeckParser.js';
import { FontLoadWarning, SlideIndexError } from '../../src/core/errors.js';
import { FontResolver, type FontCache } from '../../src/text/FontResolver.js';
import { ImageDecoder } from '../../src/utils/ImageDecoder.js';
import { createLogger, type LogEntry } from '../../src/utils/Logger.js';

const HELLO = `<deck><title>Quarterly</title><canvas width="792" height="612"/>
<slide>
  <text xp="50" yp="50" sp="3">Hello World</text>
  <rect xp="75" yp="75" wp="20" hp="15"/>
</slide>
<slide bg="black" fg="white">
  <arc xp="50" yp="50" wp="20" hp="20" a1="0" a2="90" sp="0.5"/>
  <curve xp1="10" yp1="10" xp2="50" yp2="90" xp3="90" yp3="10"/>
  <polygon xc="10 20 30" yc="10 30 10" color="steelblue"/>
  <list xp="10" yp="80" sp="2" type="number"><li>One</li><li>Two</li></list>
  <text xp="10" yp="30" sp="1.5" type="code">let x = 1</text>
</slide>
</deck>`;

function backendConfig(options: RenderOptions = {}, fontResolver: FontResolver = new FontResolver()): BackendConfig {
  return { fontResolver, images: new ImageDecoder(), options: resolveRenderOptions(options) };
}

function svgLines(data: Buffer): string[] {
  return data.toString('utf8').split('\n');
}

/**
 * Decodes a PNG and returns a reader for the RGB channels of one pixel.
 */
async function pixelReader(png: Buffer): Promise<(x: number, y: number) => number[]> {
  const image = await loadImage(png);
  const canvas = createCanvas(image.width, image.height);
  const ctx = canvas.getContext('2d');
  ctx.drawImage(image, 0, 0);
  const { data } = ctx.getImageData(0, 0, image.width, image.height);
  return (x, y) => {
    const offset = (y * image.width + x) * 4;
    return Array.from(data.subarray(offset, offset + 3));
  };
}

describe('SvgBackend', () => {
  it('should write a complete document for an empty slide', async () => {
    const doc = parseDeck('<deck><canvas width="100" height="50"/><slide/></deck>');
    const svg = await new SvgBackend(backendConfig()).renderSlide(doc, 0);

    expect(svg.toString('utf8')).toBe(
      [
        '<?xml version="1.0" encoding="UTF-8"?>',
        '<svg xmlns="http://www.w3.org/2000/svg" xmlns:xlink="http://www.w3.org/1999/xlink" width="100" height="50" viewBox="0 0 100 50">',
        '<rect x="0" y="0" width="100" height="50" fill="white"/>',
        '</svg>',
        '',
      ].join('\n')
    );
  });

  it('should place centered text and a centered rectangle', async () => {
    const lines = svgLines(await new SvgBackend(backendConfig()).renderSlide(parseDeck(HELLO), 0));

    expect(lines).toContain(
      '<text x="396" y="306" font-family="sans-serif" font-size="23.76" text-anchor="middle" fill="black">Hello World</text>'
    );
    expect(lines).toContain('<rect x="514.8" y="107.1" width="158.4" height="91.8" fill="rgb(127,127,127)"/>');
  });

  it('should title each slide after the document title', async () => {
    const lines = svgLines(
      await new SvgBackend(backendConfig({ title: 'Quarterly update' })).renderSlide(parseDeck(HELLO), 1)
    );
    expect(lines[2]).toBe('<title>Quarterly update: Slide 2</title>');
  });

  it('should escape the slide title', async () => {
    const lines = svgLines(await new SvgBackend(backendConfig({ title: 'R&D' })).renderSlide(parseDeck(HELLO), 0));
    expect(lines[2]).toBe('<title>R&amp;D: Slide 1</title>');
  });

  it('should leave out the title by default', async () => {
    const lines = svgLines(await new SvgBackend(backendConfig()).renderSlide(parseDeck(HELLO), 0));
    expect(lines[2]?.startsWith('<title>')).toBe(false);
  });

  it('should reject a slide index outside the deck', async () => {
    await expect(new SvgBackend(backendConfig()).renderSlide(parseDeck(HELLO), 2)).rejects.toBeInstanceOf(
      SlideIndexError
    );
  });

  it('should escape markup in text', async () => {
    const doc = parseDeck('<deck><canvas width="100" height="100"/><slide><text>a &lt; b &amp; c</text></slide></deck>');
    const svg = (await new SvgBackend(backendConfig()).renderSlide(doc, 0)).toString('utf8');

    expect(svg).toContain('>a &lt; b &amp; c</text>');
  });
});

describe('SvgSurface', () => {
  const surface = (): SvgSurface => new SvgSurface({ width: 1000, height: 1000, measure: () => 0 });

  it('should write a quarter arc counterclockwise', () => {
    const s = surface();
    s.drawArc(500, 500, 100, 50, 0, 90, { color: 'red', opacity: 1, width: 2 });

    expect(svgLines(Buffer.from(s.toString()))).toContain(
      '<path d="M 600 500 A 100 50 0 0 0 500 450" fill="none" stroke="red" stroke-width="2"/>'
    );
  });

  it('should write a full circle as an ellipse outline', () => {
    const s = surface();
    s.drawArc(10, 20, 5, 5, 0, 360, { color: 'red', opacity: 0.5, width: 1 });

    expect(s.toString()).toContain(
      '<ellipse cx="10" cy="20" rx="5" ry="5" fill="none" stroke="red" stroke-width="1" stroke-opacity="0.5"/>'
    );
  });

  it('should define each distinct gradient once', () => {
    const s = surface();
    const gradient = { color1: 'white', color2: 'navy', percent: 60 };
    s.fillLinearGradient(0, 0, 10, 10, gradient);
    s.fillLinearGradient(20, 0, 10, 10, gradient);
    const svg = s.toString();

    expect(svg.split('<linearGradient').length - 1).toBe(1);
    expect(svg).toContain('<stop offset="60%" stop-color="navy"/>');
    expect(svg.split('fill="url(#grad0)"').length - 1).toBe(2);
  });

  it('should wrap rotated drawing in a group', () => {
    const s = surface();
    s.rotated(30, 100, 200, () => s.fillRect(0, 0, 1, 1, { color: 'red', opacity: 1 }));
    const lines = svgLines(Buffer.from(s.toString()));

    expect(lines.slice(2, 5)).toEqual([
      '<g transform="rotate(-30 100 200)">',
      '<rect x="0" y="0" width="1" height="1" fill="red"/>',
      '</g>',
    ]);
  });

  it('should escape attribute and text characters', () => {
    expect(escapeXml(`<"Tom" & 'Jerry'>`)).toBe('&lt;&quot;Tom&quot; &amp; &apos;Jerry&apos;&gt;');
  });
});

describe('Images in backends', () => {
  let dir: string;

  beforeAll(async () => {
    dir = mkdtempSync(path.join(tmpdir(), 'deck-images-'));
    const canvas = createCanvas(4, 2);
    const ctx = canvas.getContext('2d');
    ctx.fillStyle = 'red';
    ctx.fillRect(0, 0, 4, 2);
    writeFileSync(path.join(dir, 'swatch.png'), await canvas.encode('png'));

    const split = createCanvas(2, 1);
    const splitCtx = split.getContext('2d');
    splitCtx.fillStyle = 'red';
    splitCtx.fillRect(0, 0, 1, 1);
    splitCtx.fillStyle = 'blue';
    splitCtx.fillRect(1, 0, 1, 1);
    writeFileSync(path.join(dir, 'split.png'), await split.encode('png'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should embed the image with its caption', async () => {
    const doc = parseDeck(
      '<deck><canvas width="100" height="100"/><slide><image name="swatch.png" xp="50" yp="50" caption="Swatch"/></slide></deck>'
    );
    const config = { ...backendConfig(), images: new ImageDecoder({ baseDir: dir }) };
    const lines = svgLines(await new SvgBackend(config).renderSlide(doc, 0));

    const image = lines.find((line) => line.startsWith('<image'));
    expect(image).toMatch(/^<image x="48" y="49" width="4" height="2" preserveAspectRatio="none" xlink:href="data:image\/png;base64,/);
    expect(lines).toContain(
      '<text x="50" y="54" font-family="sans-serif" font-size="2" text-anchor="middle" fill="black">Swatch</text>'
    );
  });

  it('should embed a PNG image in the document', async () => {
    const doc = parseDeck(
      '<deck><canvas width="100" height="100"/><slide><image name="swatch.png" xp="50" yp="50"/></slide></deck>'
    );
    const config = { ...backendConfig(), images: new ImageDecoder({ baseDir: dir }) };
    const pdf = await new PdfBackend(config).renderDocument(doc);

    expect(pdf.toString('latin1')).toContain('/Subtype /Image');
  });

  it('should scale a raster image without blending neighboring pixels', async () => {
    const doc = parseDeck(
      '<deck><canvas width="40" height="20"/><slide><image name="split.png" xp="50" yp="50" width="40" height="20"/></slide></deck>'
    );
    const config = { ...backendConfig(), images: new ImageDecoder({ baseDir: dir }) };
    const pixel = await pixelReader(await new PngBackend(config).renderSlide(doc, 0));

    expect(pixel(0, 10)).toEqual([255, 0, 0]);
    expect(pixel(19, 10)).toEqual([255, 0, 0]);
    expect(pixel(20, 10)).toEqual([0, 0, 255]);
    expect(pixel(39, 10)).toEqual([0, 0, 255]);
  });

  it('should draw every element kind on every backend without element failures', async () => {
    const doc = parseDeck(`<deck><title>Everything</title><canvas width="400" height="300"/>
<slide bg="white" fg="black" gradcolor1="white" gradcolor2="steelblue" gp="70">
  <image name="swatch.png" xp="80" yp="80" width="20" height="10" caption="Swatch"/>
  <rect xp="20" yp="80" wp="10" hr="50" color="tomato" opacity="60"/>
  <ellipse xp="40" yp="80" wp="8" hp="8" color="gold"/>
  <line xp1="5" yp1="60" xp2="95" yp2="60" sp="0.4"/>
  <arc xp="20" yp="40" wp="10" hp="10" a1="0" a2="270" sp="0.3"/>
  <curve xp1="30" yp1="30" xp2="40" yp2="50" xp3="50" yp3="30"/>
  <polygon xc="60 70 65" yc="30 30 45" color="seagreen"/>
  <text xp="50" yp="90" sp="3" rotation="10">Rotated title</text>
  <text xp="5" yp="20" sp="1.5" wp="40" type="block">Block text that wraps across the requested width</text>
  <text xp="55" yp="20" sp="1.5" type="code">const x = 1;</text>
  <list xp="5" yp="50" sp="2" type="bullet"><li>One</li><li color="red">Two</li></list>
</slide>
</deck>`);
    const entries: LogEntry[] = [];
    const config: BackendConfig = {
      ...backendConfig({ gridPercent: 25 }),
      images: new ImageDecoder({ baseDir: dir }),
      logger: createLogger('debug', 'Backends', (entry) => entries.push(entry)),
    };

    const svg = await new SvgBackend(config).renderSlide(doc, 0);
    const png = await new PngBackend(config).renderSlide(doc, 0);
    const pdf = await new PdfBackend(config).renderDocument(doc);

    expect(svg.toString('utf8')).toContain('<image ');
    expect(png.readUInt32BE(16)).toBe(400);
    expect(pdf.toString('latin1')).toContain('/Subtype /Image');
    expect(entries.filter((entry) => entry.message.startsWith('Failed to render'))).toEqual([]);
    expect(entries.filter((entry) => entry.message === 'Skipping image')).toEqual([]);
  });
});

describe('PngBackend', () => {
  it('should blend a translucent fill over the background', async () => {
    const doc = parseDeck(
      '<deck><canvas width="10" height="10"/><slide><rect xp="50" yp="50" wp="100" hp="100" color="red" opacity="50"/></slide></deck>'
    );
    const [r, g, b] = (await pixelReader(await new PngBackend(backendConfig()).renderSlide(doc, 0)))(5, 5);

    expect(r).toBe(255);
    expect(Math.abs(g - 128)).toBeLessThanOrEqual(1);
    expect(Math.abs(b - 128)).toBeLessThanOrEqual(1);
  });

  it('should snap rectangle edges to whole pixels', async () => {
    // 25% of 10 centered on 5 spans 3.75..6.25, which rounds to 4..6.
    const doc = parseDeck(
      '<deck><canvas width="10" height="10"/><slide><rect xp="50" yp="50" wp="25" hp="100" color="black"/></slide></deck>'
    );
    const pixel = await pixelReader(await new PngBackend(backendConfig()).renderSlide(doc, 0));

    expect(pixel(3, 5)).toEqual([255, 255, 255]);
    expect(pixel(4, 5)).toEqual([0, 0, 0]);
    expect(pixel(5, 5)).toEqual([0, 0, 0]);
    expect(pixel(6, 5)).toEqual([255, 255, 255]);
  });

  it('should encode a PNG the size of the canvas', async () => {
    const png = await new PngBackend(backendConfig()).renderSlide(parseDeck(HELLO), 1);

    expect(png.subarray(0, 8)).toEqual(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]));
    expect(png.readUInt32BE(16)).toBe(792);
    expect(png.readUInt32BE(20)).toBe(612);
  });

  it('should report an unreadable font file and keep rendering', async () => {
    const dir = mkdtempSync(path.join(tmpdir(), 'deck-badfont-'));
    try {
      const fontPath = path.join(dir, 'broken.ttf');
      writeFileSync(fontPath, 'not a font');
      const cache: FontCache = { lookup: (family) => (family === 'Broken' ? fontPath : undefined) };
      const warnings: FontLoadWarning[] = [];

      const doc = parseDeck('<deck><canvas width="50" height="50"/><slide><text font="Broken">x</text></slide></deck>');
      const png = await new PngBackend(
        backendConfig({ onWarning: (warning) => warnings.push(warning) }, new FontResolver({ cache }))
      ).renderSlide(doc, 0);

      expect(png.readUInt32BE(16)).toBe(50);
      expect(warnings).toHaveLength(1);
      expect(warnings[0]).toBeInstanceOf(FontLoadWarning);
      expect(warnings[0]?.family).toBe('Broken');
      expect(warnings[0]?.path).toBe(fontPath);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('PdfBackend', () => {
  let pdf: string;

  beforeAll(async () => {
    const data = await new PdfBackend(backendConfig()).renderDocument(parseDeck(HELLO));
    pdf = data.toString('latin1');
  });

  it('should write one page per slide', () => {
    expect(pdf.startsWith('%PDF-')).toBe(true);
    expect(pdf).toContain('/Count 2');
  });

  it('should size pages to the canvas', () => {
    expect(pdf).toContain('/MediaBox [0 0 792 612]');
  });

  it('should carry the deck title', () => {
    expect(pdf).toContain('/Title (Quarterly)');
  });

  it('should produce identical bytes for identical input', async () => {
    const again = await new PdfBackend(backendConfig()).renderDocument(parseDeck(HELLO));
    expect(again.toString('latin1')).toBe(pdf);
  });

  it('should take the title option for a title-less deck', async () => {
    const doc: DeckDocument = parseDeck('<deck><canvas width="10" height="10"/><slide/></deck>');
    const data = await new PdfBackend(backendConfig({ title: 'Roadmap' })).renderDocument(doc);

    expect(data.toString('latin1')).toContain('/Title (Roadmap)');
  });

  it('should prefer the title option over the deck title', async () => {
    const data = await new PdfBackend(backendConfig({ title: 'Board' })).renderDocument(parseDeck(HELLO));
    const text = data.toString('latin1');

    expect(text).toContain('/Title (Board)');
    expect(text).not.toContain('(Quarterly)');
  });
});

describe('PDF helpers', () => {
  it('should pick standard fonts by family and weight', () => {
    const base = { requested: 'x', weight: 400, source: 'generic' as const, monospace: false, size: 10 };

    expect(standardPdfFont({ ...base, family: 'sans-serif' })).toBe('Helvetica');
    expect(standardPdfFont({ ...base, family: 'Georgia', weight: 700 })).toBe('Times-Bold');
    expect(standardPdfFont({ ...base, family: 'monospace', monospace: true })).toBe('Courier');
  });

  it('should split arcs into chords of at most 15 degrees', () => {
    const points = arcChordPoints(0, 0, 10, 10, 0, 90);

    expect(points).toHaveLength(7);
    expect(points[0]?.x).toBeCloseTo(10, 10);
    expect(points[6]?.x).toBeCloseTo(0, 10);
    expect(points[6]?.y).toBeCloseTo(-10, 10);
  });
});
