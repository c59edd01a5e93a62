import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, utimesSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { FileProcessResult } from '../../src/types/index.js';
import { PassThroughCompiler, type DeckCompiler } from '../../src/core/DeckCompiler.js';
import { DeckRenderer } from '../../src/core/DeckRenderer.js';
import { createLogger, type LogEntry } from '../../src/utils/Logger.js';
import { DeckWatcher, InFlightSet } from '../../src/watch/DeckWatcher.js';

const DECK = '<deck><canvas width="100" height="100"/><slide><rect xp="50" yp="50" wp="10" hp="10"/></slide></deck>';

/**
 * Compiler that holds every compile until released.
 */
class GatedCompiler implements DeckCompiler {
  private release: () => void = () => undefined;
  private readonly gate = new Promise<void>((resolve) => {
    this.release = resolve;
  });

  open(): void {
    this.release();
  }

  async compile(source: string): Promise<string> {
    await this.gate;
    return source;
  }
}

describe('InFlightSet', () => {
  it('should admit each key once until deleted', () => {
    const set = new InFlightSet();

    expect(set.tryAdd('a.dsh')).toBe(true);
    expect(set.tryAdd('a.dsh')).toBe(false);
    expect(set.size).toBe(1);

    set.delete('a.dsh');
    expect(set.has('a.dsh')).toBe(false);
    expect(set.tryAdd('a.dsh')).toBe(true);
  });
});

describe('DeckWatcher', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'deck-watch-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, content: string = DECK, ageMs: number = 0): string {
    const file = path.join(dir, name);
    mkdirSync(path.dirname(file), { recursive: true });
    writeFileSync(file, content);
    if (ageMs > 0) {
      const when = new Date(Date.now() - ageMs);
      utimesSync(file, when, when);
    }
    return file;
  }

  function passThrough(): DeckRenderer {
    return new DeckRenderer({ compiler: new PassThroughCompiler() });
  }

  it('should render fresh DSL files in every format', async () => {
    const fresh = write('talk.dsh');
    const nested = write('sub/demo.dsh');
    write('old.dsh', DECK, 60_000);
    write('notes.txt');

    const results: FileProcessResult[] = [];
    const watcher = new DeckWatcher({
      roots: [dir],
      formats: ['svg', 'xml'],
      renderer: passThrough(),
      onProcessed: (result) => results.push(result),
    });

    const dispatched = await watcher.scan();
    await watcher.whenIdle();

    expect(dispatched).toEqual([nested, fresh]);
    expect(readFileSync(path.join(dir, 'talk.xml'), 'utf8')).toBe(DECK);
    expect(readFileSync(path.join(dir, 'talk.svg'), 'utf8').startsWith('<?xml')).toBe(true);
    expect(existsSync(path.join(dir, 'sub', 'demo.svg'))).toBe(true);
    expect(existsSync(path.join(dir, 'old.svg'))).toBe(false);
    expect(results).toHaveLength(2);
  });

  it('should write into the output directory when one is set', async () => {
    write('talk.dsh');
    const out = path.join(dir, 'out');
    const watcher = new DeckWatcher({ roots: [dir], formats: ['png'], outputDir: out, renderer: passThrough() });

    await watcher.scan();
    await watcher.whenIdle();

    expect(readFileSync(path.join(out, 'talk.png')).subarray(1, 4).toString('ascii')).toBe('PNG');
  });

  it('should keep writing other formats when one fails', async () => {
    const file = write('broken.dsh', '<deck><slide></deck>');
    const watcher = new DeckWatcher({ roots: [dir], formats: ['svg', 'xml'], renderer: passThrough() });

    const result = await watcher.processFile(file);

    expect(result.outputs.map((o) => [o.format, o.success])).toEqual([
      ['svg', false],
      ['xml', true],
    ]);
    expect(existsSync(path.join(dir, 'broken.xml'))).toBe(true);
  });

  it('should report a compile failure once for the file', async () => {
    const file = write('bad.dsh');
    const renderer = new DeckRenderer({
      compiler: { compile: () => Promise.reject(new Error('unexpected token')) },
    });
    const watcher = new DeckWatcher({ roots: [dir], formats: ['svg', 'pdf'], renderer });

    const result = await watcher.processFile(file);

    expect(result.outputs).toEqual([]);
    expect(result.errorMessage).toBe('compile: unexpected token');
  });

  it('should not dispatch a file that is still being processed', async () => {
    const file = write('talk.dsh');
    const compiler = new GatedCompiler();
    const watcher = new DeckWatcher({
      roots: [dir],
      formats: ['xml'],
      renderer: new DeckRenderer({ compiler }),
    });

    expect(await watcher.scan()).toEqual([file]);
    expect(await watcher.scan()).toEqual([]);

    compiler.open();
    await watcher.whenIdle();
    expect(await watcher.scan()).toEqual([file]);
    await watcher.whenIdle();
  });

  it('should poll until stopped and drain running work', async () => {
    write('talk.dsh');
    let notify: (result: FileProcessResult) => void = () => undefined;
    const processed = new Promise<FileProcessResult>((resolve) => {
      notify = resolve;
    });

    const watcher = new DeckWatcher({
      roots: [dir],
      formats: ['svg'],
      renderer: passThrough(),
      pollInterval: 10,
      onProcessed: (result) => notify(result),
    });

    watcher.start();
    expect(watcher.running).toBe(true);

    const result = await processed;
    expect(result.outputs[0]?.success).toBe(true);

    await expect(watcher.stop()).resolves.toBe(true);
    expect(watcher.running).toBe(false);
  });

  it('should stop waiting for a stuck task after the shutdown timeout', async () => {
    write('talk.dsh');
    const compiler = new GatedCompiler();
    const entries: LogEntry[] = [];
    const watcher = new DeckWatcher({
      roots: [dir],
      formats: ['xml'],
      renderer: new DeckRenderer({ compiler }),
      shutdownTimeout: 50,
      logger: createLogger('warn', 'Watch', (entry) => entries.push(entry)),
    });

    expect(await watcher.scan()).toHaveLength(1);

    const started = Date.now();
    await expect(watcher.stop()).resolves.toBe(false);
    expect(Date.now() - started).toBeLessThan(1000);
    expect(entries.map((entry) => entry.message)).toContain('Shutdown timed out with tasks still running');

    compiler.open();
    await watcher.whenIdle();
  });

  it('should skip roots that do not exist', async () => {
    const watcher = new DeckWatcher({
      roots: [path.join(dir, 'missing')],
      formats: ['svg'],
      renderer: passThrough(),
    });

    await expect(watcher.scan()).resolves.toEqual([]);
  });
});
