#!/usr/bin/env node
/**
 * Aggregates per-point benchmark results into summary.json and prints a markdown table.
 *
 *   aggregate-cli --results-dir ./results --hardware h100
 *   aggregate-cli --results-dir ./results            # hardware read from directory names
 */

import { config } from 'dotenv';
import { existsSync, mkdirSync, statSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { AppError, handleError } from './logger.js';
import { SUMMARY_FILE_NAME, loadResults, sortSummary } from './aggregate-results.js';
import { renderMarkdownTable } from './summary-table.js';
import type { SummaryRecord } from './types.js';

config();

export interface AggregateOptions {
  resultsDir: string;
  hardware?: string;
  output?: string;
}

function printUsage(): void {
  console.log(`Usage: aggregate-cli [options]

Options:
  --results-dir <dir>   Root results directory (default: ./results)
  --hardware <label>    Hardware label, overrides the one inferred from directory names
  --output <path>       Summary JSON path (default: <results-dir>/summary.json)
  -h, --help            Show this help`);
}

export function parseArgs(argv: string[]): AggregateOptions {
  const args = [...argv];
  const options: AggregateOptions = {
    resultsDir: process.env.EMBED_BENCH_RESULTS_ROOT || './results',
  };

  while (args.length > 0) {
    const arg = args.shift();
    switch (arg) {
      case '--results-dir':
        options.resultsDir = args.shift() ?? options.resultsDir;
        break;
      case '--hardware':
        options.hardware = args.shift();
        break;
      case '--output':
        options.output = args.shift();
        break;
      case '-h':
      case '--help':
        printUsage();
        process.exit(0);
      default:
        throw new AppError(`Unknown argument: ${arg}`, 'INVALID_ARGUMENT', 400);
    }
  }

  return options;
}

export interface AggregateOutcome {
  records: SummaryRecord[];
  outputPath: string;
  table: string;
}

/**
 * Throws AppError when the directory is missing or holds no valid records
 */
export function aggregate(options: AggregateOptions): AggregateOutcome {
  if (!existsSync(options.resultsDir) || !statSync(options.resultsDir).isDirectory()) {
    throw new AppError(`Results directory not found: ${options.resultsDir}`, 'RESULTS_DIR_MISSING', 404);
  }

  const outputPath = options.output ?? join(options.resultsDir, SUMMARY_FILE_NAME);
  const records = sortSummary(
    loadResults(options.resultsDir, { hardwareOverride: options.hardware, exclude: [outputPath] })
  );
  if (records.length === 0) {
    throw new AppError('No result JSON files found.', 'NO_RESULTS', 404);
  }

  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, JSON.stringify(records, null, 2));

  return { records, outputPath, table: renderMarkdownTable(records) };
}

export function main(argv: string[] = process.argv.slice(2)): void {
  const outcome = aggregate(parseArgs(argv));
  console.log(`Wrote ${outcome.records.length} records to ${outcome.outputPath}\n`);
  console.log(outcome.table);
}

const isDirectRun =
  process.argv[1] && process.argv[1].includes('aggregate-cli');
if (isDirectRun) {
  try {
    main();
  } catch (error) {
    const appError = handleError(error, 'AggregateCLI');
    console.error(`❌ ${appError.message}`);
    process.exit(1);
  }
}
