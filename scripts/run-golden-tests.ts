#!/usr/bin/env node
/**
 * CLI script to run or record golden tests.
 *
 * Usage:
 *   npx tsx scripts/run-golden-tests.ts --catalog ./test/fixtures/golden/catalog.json
 *
 * Options:
 *   --catalog, -c     Path to the fixture catalog (default: test/fixtures/golden/catalog.json)
 *   --category        Only run cases in this category
 *   --output, -o      Directory for generated artifacts and the JSON report
 *   --record          Regenerate the expected artifacts instead of testing
 *   --xml             Fixture inputs are already deck XML; skip the compiler
 *   --json            Output only JSON report
 *   --help, -h        Show help
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  DeckRenderer,
  PassThroughCompiler,
  formatGoldenReport,
  recordGoldenFixtures,
  runGoldenTests,
} from '../src/index.js';

interface CliArgs {
  catalog: string;
  category?: string;
  output?: string;
  record: boolean;
  xml: boolean;
  jsonOnly: boolean;
  help: boolean;
}

function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    catalog: 'test/fixtures/golden/catalog.json',
    category: undefined,
    output: undefined,
    record: false,
    xml: false,
    jsonOnly: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];

    switch (arg) {
      case '--catalog':
      case '-c':
        result.catalog = next ?? '';
        i++;
        break;
      case '--category':
        result.category = next;
        i++;
        break;
      case '--output':
      case '-o':
        result.output = next;
        i++;
        break;
      case '--record':
        result.record = true;
        break;
      case '--xml':
        result.xml = true;
        break;
      case '--json':
        result.jsonOnly = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
    }
  }

  return result;
}

function showHelp(): void {
  console.log(`
Golden Test Runner for deckrender

Usage:
  npx tsx scripts/run-golden-tests.ts [options]

Options:
  --catalog, -c <path>     Fixture catalog (default: test/fixtures/golden/catalog.json)
  --category <name>        Only run cases in this category
  --output, -o <path>      Save generated artifacts and golden-report.json here
  --record                 Regenerate expected artifacts from the current code
  --xml                    Fixture inputs are already deck XML
  --json                   Output only JSON report (for programmatic use)
  --help, -h               Show this help message

Examples:
  # Run every case
  npx tsx scripts/run-golden-tests.ts

  # Only text cases, keeping generated artifacts for inspection
  npx tsx scripts/run-golden-tests.ts --category text -o ./test/output

  # Accept the current output as the new baseline
  npx tsx scripts/run-golden-tests.ts --record
`);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    showHelp();
    process.exit(0);
  }

  const catalogPath = path.resolve(args.catalog);
  if (!fs.existsSync(catalogPath)) {
    console.error(`Error: catalog not found: ${catalogPath}`);
    process.exit(1);
  }

  const renderer = new DeckRenderer({ compiler: args.xml ? new PassThroughCompiler() : undefined });
  const options = {
    category: args.category,
    outputDir: args.output ? path.resolve(args.output) : undefined,
    renderer,
  };

  try {
    if (args.record) {
      const result = await recordGoldenFixtures(catalogPath, options);
      for (const written of result.written) {
        console.log(`  [OK] ${written}`);
      }
      for (const failure of result.failures) {
        console.log(`  [!!] ${failure.name} ${failure.stage}: ${failure.error}`);
      }
      process.exit(result.failures.length === 0 ? 0 : 1);
    }

    const report = await runGoldenTests(catalogPath, options);

    if (args.jsonOnly) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      console.log(formatGoldenReport(report));
      if (options.outputDir) {
        console.log(`\nOutput saved to: ${options.outputDir}`);
      }
    }

    process.exit(report.passed ? 0 : 1);
  } catch (error) {
    if (args.jsonOnly) {
      console.log(
        JSON.stringify({
          success: false,
          error: error instanceof Error ? error.message : String(error),
        })
      );
    } else {
      console.error('Error running golden tests:', error instanceof Error ? error.message : error);
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal:', error instanceof Error ? error.message : error);
  process.exit(1);
});
