#!/usr/bin/env node
/**
 * CLI script that watches directories and re-renders changed deck files.
 *
 * Usage:
 *   npx tsx scripts/watch-decks.ts ./talks --formats svg,png,pdf
 *
 * Options:
 *   --formats, -f     Comma-separated formats (default: svg)
 *   --output, -o      Directory for outputs (default: beside each input)
 *   --interval, -i    Poll interval in ms (default: 2000)
 *   --freshness       Only files modified within this many ms (default: 10000)
 *   --grid, -g        Grid overlay spacing in percent
 *   --log-level       debug, info, warn, error or silent
 *   --help, -h        Show help
 */

import * as path from 'node:path';
import {
  DEFAULT_WATCH_OPTIONS,
  DeckWatcher,
  createLogger,
  isOutputFormat,
  loadEnvironmentConfig,
  parseLogLevel,
  type OutputFormat,
} from '../src/index.js';

interface CliArgs {
  roots: string[];
  formats: string;
  output?: string;
  interval: number;
  freshness: number;
  grid: number;
  logLevel?: string;
  help: boolean;
}

function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    roots: [],
    formats: 'svg',
    output: undefined,
    interval: DEFAULT_WATCH_OPTIONS.pollInterval,
    freshness: DEFAULT_WATCH_OPTIONS.freshness,
    grid: 0,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case '--formats':
      case '-f':
        result.formats = next ?? '';
        i++;
        break;
      case '--output':
      case '-o':
        result.output = next;
        i++;
        break;
      case '--interval':
      case '-i':
        result.interval = parseInt(next ?? String(DEFAULT_WATCH_OPTIONS.pollInterval), 10);
        i++;
        break;
      case '--freshness':
        result.freshness = parseInt(next ?? String(DEFAULT_WATCH_OPTIONS.freshness), 10);
        i++;
        break;
      case '--grid':
      case '-g':
        result.grid = parseFloat(next ?? '0');
        i++;
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
        if (arg !== undefined && !arg.startsWith('-')) {
          result.roots.push(arg);
        }
    }
  }

  return result;
}

function showHelp(): void {
  console.log(`
Deck watcher

Usage:
  npx tsx scripts/watch-decks.ts <dir> [<dir> ...] [options]

Options:
  --formats, -f <list>     Comma-separated formats: svg, png, pdf, xml (default: svg)
  --output, -o <dir>       Directory for outputs (default: beside each input)
  --interval, -i <ms>      Poll interval (default: ${DEFAULT_WATCH_OPTIONS.pollInterval})
  --freshness <ms>         Only files modified this recently (default: ${DEFAULT_WATCH_OPTIONS.freshness})
  --grid, -g <percent>     Grid overlay spacing in percent (default: off)
  --log-level <level>      debug, info, warn, error or silent (default: info)
  --help, -h               Show this help message

Stop with Ctrl-C; running renders get up to ${DEFAULT_WATCH_OPTIONS.shutdownTimeout / 1000}s to finish.
`);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    showHelp();
    process.exit(0);
  }

  if (args.roots.length === 0) {
    console.error('Error: at least one directory to watch is required');
    console.error('Run with --help for usage information');
    process.exit(1);
  }

  const formats: OutputFormat[] = [];
  for (const name of args.formats.split(',').map((f) => f.trim()).filter((f) => f.length > 0)) {
    if (!isOutputFormat(name)) {
      console.error(`Error: unsupported format: ${name}`);
      process.exit(1);
    }
    formats.push(name);
  }

  const logLevel = parseLogLevel(args.logLevel) ?? loadEnvironmentConfig().logLevel ?? 'info';
  const logger = createLogger(logLevel, 'watch');

  const watcher = new DeckWatcher({
    roots: args.roots.map((root) => path.resolve(root)),
    formats,
    outputDir: args.output ? path.resolve(args.output) : undefined,
    pollInterval: args.interval,
    freshness: args.freshness,
    renderOptions: { gridPercent: args.grid },
    onProcessed: (result) => {
      for (const output of result.outputs) {
        const icon = output.success ? '[OK]' : '[!!]';
        console.log(`${icon} ${result.inputPath} -> ${output.outputPath ?? output.format} ${output.errorMessage ?? ''}`);
      }
      if (result.errorMessage) {
        console.log(`[!!] ${result.inputPath}: ${result.errorMessage}`);
      }
    },
    logger,
  });

  const shutdown = (): void => {
    console.log('\nStopping...');
    watcher
      .stop()
      .then((drained) => process.exit(drained ? 0 : 1))
      .catch((error: unknown) => {
        console.error('Error stopping:', error instanceof Error ? error.message : error);
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  watcher.start();
}

main().catch((error: unknown) => {
  console.error('Fatal:', error instanceof Error ? error.message : error);
  process.exit(1);
});
