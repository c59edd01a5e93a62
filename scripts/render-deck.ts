#!/usr/bin/env node
/**
 * CLI script to render a deck file to SVG, PNG, PDF or XML.
 *
 * Usage:
 *   npx tsx scripts/render-deck.ts slides.dsh --format png --grid 5
 *
 * Options:
 *   --format, -f      Output format: svg, png, pdf or xml (default: svg)
 *   --output, -o      Output path (default: input with the format's extension)
 *   --slide, -s       Zero-based slide for svg and png (default: 0)
 *   --all-slides      Write every slide for svg and png (name-N.ext)
 *   --layers, -l      Layer order, colon separated
 *   --grid, -g        Grid overlay spacing in percent
 *   --title <text>    Document title for slide metadata
 *   --font            Default font family
 *   --xml             Input is already deck XML; skip the compiler
 *   --log-level       debug, info, warn, error or silent
 *   --help, -h        Show help
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import {
  DeckRenderer,
  PassThroughCompiler,
  defaultOutputName,
  isOutputFormat,
  loadEnvironmentConfig,
  parseLogLevel,
  writeOutput,
  type OutputFormat,
  type RenderOptions,
} from '../src/index.js';

interface CliArgs {
  input: string;
  format: string;
  output?: string;
  slide: number;
  allSlides: boolean;
  layers?: string;
  grid: number;
  title?: string;
  font?: string;
  xml: boolean;
  logLevel?: string;
  help: boolean;
}

function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    input: '',
    format: 'svg',
    output: undefined,
    slide: 0,
    allSlides: false,
    grid: 0,
    xml: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case '--format':
      case '-f':
        result.format = next ?? '';
        i++;
        break;
      case '--output':
      case '-o':
        result.output = next;
        i++;
        break;
      case '--slide':
      case '-s':
        result.slide = parseInt(next ?? '0', 10);
        i++;
        break;
      case '--all-slides':
        result.allSlides = true;
        break;
      case '--layers':
      case '-l':
        result.layers = next;
        i++;
        break;
      case '--grid':
      case '-g':
        result.grid = parseFloat(next ?? '0');
        i++;
        break;
      case '--title':
      case '-t':
        result.title = next;
        i++;
        break;
      case '--font':
        result.font = next;
        i++;
        break;
      case '--xml':
        result.xml = true;
        break;
      case '--log-level':
        result.logLevel = next;
        i++;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      default:
        if (arg !== undefined && !arg.startsWith('-') && !result.input) {
          result.input = arg;
        }
    }
  }

  return result;
}

function showHelp(): void {
  console.log(`
Deck renderer

Usage:
  npx tsx scripts/render-deck.ts <input> [options]

Options:
  --format, -f <fmt>       svg, png, pdf or xml (default: svg)
  --output, -o <path>      Output path (default: input with the format's extension)
  --slide, -s <n>          Zero-based slide for svg and png (default: 0)
  --all-slides             Write every slide for svg and png as name-N.ext
  --layers, -l <list>      Layer order, e.g. text:rect:image
  --grid, -g <percent>     Grid overlay spacing in percent (default: off)
  --title, -t <text>       Document title; slides are titled "<text>: Slide N"
  --font <family>          Default font family (default: sans)
  --xml                    Input is already deck XML
  --log-level <level>      debug, info, warn, error or silent
  --help, -h               Show this help message

Environment:
  DECKFONTS                Font directory
  DECKSH_BIN               DSL compiler executable (default: decksh)
  DECK_LOG_LEVEL           Log level when --log-level is not given

Examples:
  npx tsx scripts/render-deck.ts talk.dsh -f pdf
  npx tsx scripts/render-deck.ts talk.dsh -f png --all-slides -g 10
  npx tsx scripts/render-deck.ts fragment.xml --xml -f svg -o fragment.svg
`);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    showHelp();
    process.exit(0);
  }

  if (!args.input) {
    console.error('Error: an input file is required');
    console.error('Run with --help for usage information');
    process.exit(1);
  }

  if (!isOutputFormat(args.format)) {
    console.error(`Error: unsupported format: ${args.format}`);
    process.exit(1);
  }
  const format: OutputFormat = args.format;

  const env = loadEnvironmentConfig();
  const logLevel = parseLogLevel(args.logLevel) ?? env.logLevel ?? 'warn';
  const options: RenderOptions = {
    slide: args.slide,
    gridPercent: args.grid,
    title: args.title,
    logLevel,
  };
  if (args.layers) {
    options.layers = args.layers;
  }
  if (args.font) {
    options.fontFamily = args.font;
  }

  const inputPath = path.resolve(args.input);
  const renderer = new DeckRenderer({
    compiler: args.xml ? new PassThroughCompiler() : undefined,
    imageDir: path.dirname(inputPath),
    logLevel,
  });

  const startTime = Date.now();

  try {
    if (args.allSlides && (format === 'svg' || format === 'png')) {
      const xml = await renderer.compile(await readFile(inputPath, 'utf8'));
      const document = renderer.parse(xml, options);
      const artifacts = await renderer.renderSlides(document, format, options);
      const base = args.output ?? defaultOutputName(inputPath, format);
      const ext = path.extname(base);
      for (const artifact of artifacts) {
        const outputPath = `${base.slice(0, base.length - ext.length)}-${(artifact.slideIndex ?? 0) + 1}${ext}`;
        await writeOutput(outputPath, artifact.data);
        console.log(`  [OK] ${outputPath} (${artifact.data.length} bytes)`);
      }
    } else {
      const outputPath = await renderer.renderFile(
        inputPath,
        format,
        args.output ? path.resolve(args.output) : undefined,
        options
      );
      console.log(`  [OK] ${outputPath}`);
    }

    console.log(`\nCompleted in ${Date.now() - startTime}ms`);
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal:', error instanceof Error ? error.message : error);
  process.exit(1);
});
