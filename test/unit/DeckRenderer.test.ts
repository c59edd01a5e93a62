import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { DeckCompiler } from '../../src/core/DeckCompiler.js';
import { DeckRenderer, defaultOutputName, isOutputFormat } from '../../src/core/DeckRenderer.js';
import { CompileError, OutputIOError, ParseError, StageError, UnsupportedFormatError } from '../../src/core/errors.js';

const TWO_SLIDES = `<deck><canvas width="200" height="100"/>
<slide><text xp="50" yp="50" sp="5">One</text></slide>
<slide bg="black"><rect xp="50" yp="50" wp="10" hp="10" color="red"/></slide>
</deck>`;

/**
 * Compiler stand-in: "two" compiles to a two-slide deck, anything else is
 * returned as-is.
 */
class StubCompiler implements DeckCompiler {
  calls: string[] = [];

  compile(source: string): Promise<string> {
    this.calls.push(source);
    return Promise.resolve(source.trim() === 'two' ? TWO_SLIDES : source);
  }
}

class FailingCompiler implements DeckCompiler {
  constructor(private readonly error: unknown) {}

  compile(): Promise<string> {
    return Promise.reject(this.error);
  }
}

describe('DeckRenderer', () => {
  describe('render', () => {
    it('should compile then render SVG', async () => {
      const compiler = new StubCompiler();
      const svg = await new DeckRenderer({ compiler }).render('two', 'svg');

      expect(compiler.calls).toEqual(['two']);
      expect(svg.toString('utf8')).toContain('viewBox="0 0 200 100"');
    });

    it('should return the compiled XML for the xml format', async () => {
      const xml = await new DeckRenderer({ compiler: new StubCompiler() }).render('two', 'xml');
      expect(xml.toString('utf8')).toBe(TWO_SLIDES);
    });

    it('should render the selected slide', async () => {
      const svg = await new DeckRenderer({ compiler: new StubCompiler() }).render('two', 'svg', { slide: 1 });
      expect(svg.toString('utf8')).toContain('fill="red"');
    });

    it('should reject an unknown format before compiling', async () => {
      const compiler = new StubCompiler();
      await expect(new DeckRenderer({ compiler }).render('two', 'gif')).rejects.toBeInstanceOf(UnsupportedFormatError);
      expect(compiler.calls).toEqual([]);
    });

    it('should pass compiler errors through', async () => {
      const renderer = new DeckRenderer({ compiler: new FailingCompiler(new CompileError('syntax error', 1)) });
      await expect(renderer.render('x', 'svg')).rejects.toThrow('syntax error');
    });

    it('should label other compiler failures with the stage', async () => {
      const renderer = new DeckRenderer({ compiler: new FailingCompiler(new Error('boom')) });

      const error = await renderer.render('x', 'svg').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(StageError);
      if (error instanceof StageError) {
        expect(error.stage).toBe('compile');
        expect(error.message).toBe('compile: boom');
      }
    });

    it('should report malformed XML as a parse error', async () => {
      const renderer = new DeckRenderer({ compiler: new StubCompiler() });
      await expect(renderer.render('<deck><slide>', 'png')).rejects.toBeInstanceOf(ParseError);
    });

    it('should render every slide into one PDF', async () => {
      const pdf = await new DeckRenderer({ compiler: new StubCompiler() }).render('two', 'pdf');
      expect(pdf.toString('latin1')).toContain('/Count 2');
    });
  });

  describe('renderSlides', () => {
    it('should produce one artifact per slide for svg', async () => {
      const renderer = new DeckRenderer({ compiler: new StubCompiler() });
      const artifacts = await renderer.renderSlides(renderer.parse(TWO_SLIDES), 'svg');

      expect(artifacts.map((a) => [a.format, a.slideIndex])).toEqual([
        ['svg', 0],
        ['svg', 1],
      ]);
    });

    it('should produce a single artifact for pdf', async () => {
      const renderer = new DeckRenderer({ compiler: new StubCompiler() });
      const artifacts = await renderer.renderSlides(renderer.parse(TWO_SLIDES), 'pdf');

      expect(artifacts).toHaveLength(1);
      expect(artifacts[0]?.slideIndex).toBeUndefined();
    });

    it('should not render xml from a document', async () => {
      const renderer = new DeckRenderer({ compiler: new StubCompiler() });
      await expect(renderer.renderSlides(renderer.parse(TWO_SLIDES), 'xml')).rejects.toBeInstanceOf(
        UnsupportedFormatError
      );
    });
  });

  describe('renderFile', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(path.join(tmpdir(), 'deck-render-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should write beside the input by default', async () => {
      const input = path.join(dir, 'talk.dsh');
      writeFileSync(input, 'two');

      const written = await new DeckRenderer({ compiler: new StubCompiler() }).renderFile(input, 'svg');

      expect(written).toBe(path.join(dir, 'talk.svg'));
      expect(readFileSync(written, 'utf8').startsWith('<?xml')).toBe(true);
    });

    it('should create missing output directories', async () => {
      const input = path.join(dir, 'talk.dsh');
      writeFileSync(input, 'two');
      const output = path.join(dir, 'out', 'nested', 'talk.xml');

      await new DeckRenderer({ compiler: new StubCompiler() }).renderFile(input, 'xml', output);

      expect(readFileSync(output, 'utf8')).toBe(TWO_SLIDES);
    });

    it('should fail with OutputIOError when the output cannot be written', async () => {
      const input = path.join(dir, 'talk.dsh');
      writeFileSync(input, 'two');
      const blocker = path.join(dir, 'blocker');
      writeFileSync(blocker, '');

      await expect(
        new DeckRenderer({ compiler: new StubCompiler() }).renderFile(input, 'svg', path.join(blocker, 'talk.svg'))
      ).rejects.toBeInstanceOf(OutputIOError);
    });
  });

  describe('helpers', () => {
    it('should derive output names from the input', () => {
      expect(defaultOutputName('/decks/talk.dsh', 'pdf')).toBe('/decks/talk.pdf');
      expect(defaultOutputName('/decks/notes.txt', 'png')).toBe('/decks/notes.txt.png');
    });

    it('should recognize output formats', () => {
      expect(isOutputFormat('svg')).toBe(true);
      expect(isOutputFormat('xml')).toBe(true);
      expect(isOutputFormat('SVG')).toBe(false);
    });
  });
});
