/**
 * Loads persisted sweep results from a results tree and derives the summary rows.
 */

import { readFileSync } from 'fs';
import { basename, dirname, resolve } from 'path';
import glob from 'fast-glob';
import { errorMessage, logger } from './logger.js';
import type { ResultRecord, SummaryRecord } from './types.js';
import { roundTo } from './statistics.js';

export const SUMMARY_FILE_NAME = 'summary.json';

const NUMBER_FIELDS = [
  'chunk_size',
  'batch_size',
  'concurrency',
  'num_requests',
  'completed_requests',
  'elapsed_sec',
  'p50_latency_ms',
  'p99_latency_ms',
  'throughput_emb_per_sec',
  'throughput_per_user',
] as const;

const NULLABLE_FIELDS = ['power_avg_w', 'energy_joules', 'emb_per_joule'] as const;

export function isResultRecord(value: unknown): value is ResultRecord {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const record: Record<string, unknown> = Object.fromEntries(Object.entries(value));

  if (typeof record.model !== 'string') return false;
  if (!NUMBER_FIELDS.every(field => typeof record[field] === 'number')) return false;
  // Records written before power sampling existed have no power fields at all
  return NULLABLE_FIELDS.every(field => {
    const entry = record[field];
    return entry === undefined || entry === null || typeof entry === 'number';
  });
}

/**
 * `<model_slug>__<hardware>` directory names carry the hardware label
 */
export function inferHardware(filePath: string): string {
  const parent = basename(dirname(filePath));
  const separator = parent.indexOf('__');
  return separator >= 0 ? parent.slice(separator + 2) : 'unknown';
}

export function toSummaryRecord(record: ResultRecord, hardware: string): SummaryRecord {
  return {
    ...record,
    power_avg_w: record.power_avg_w ?? null,
    energy_joules: record.energy_joules ?? null,
    emb_per_joule: record.emb_per_joule ?? null,
    hardware,
    latency_per_text_ms: record.batch_size ? roundTo(record.p99_latency_ms / record.batch_size, 3) : 0,
  };
}

export interface LoadOptions {
  hardwareOverride?: string;
  /** Files to leave out, such as a previous summary written inside the tree */
  exclude?: string[];
}

export function loadResults(resultsDir: string, options: LoadOptions = {}): SummaryRecord[] {
  const excluded = new Set((options.exclude ?? []).map(file => resolve(file)));
  const files = glob
    .sync('**/*.json', { cwd: resultsDir, absolute: true, onlyFiles: true })
    .filter(file => basename(file) !== SUMMARY_FILE_NAME && !excluded.has(resolve(file)))
    .sort();

  const records: SummaryRecord[] = [];
  for (const file of files) {
    let data: unknown;
    try {
      data = JSON.parse(readFileSync(file, 'utf-8'));
    } catch (error) {
      logger.warn(
        `Skipping ${file}: ${errorMessage(error)}`,
        undefined,
        'Aggregator'
      );
      continue;
    }

    if (!isResultRecord(data)) {
      logger.warn(`Skipping ${file}: not a benchmark result record`, undefined, 'Aggregator');
      continue;
    }

    records.push(toSummaryRecord(data, options.hardwareOverride ?? inferHardware(file)));
  }

  return records;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Orders by model, hardware, chunk size, batch size, concurrency
 */
export function compareSummary(a: SummaryRecord, b: SummaryRecord): number {
  return (
    compareText(a.model, b.model) ||
    compareText(a.hardware, b.hardware) ||
    a.chunk_size - b.chunk_size ||
    a.batch_size - b.batch_size ||
    a.concurrency - b.concurrency
  );
}

export function sortSummary(records: readonly SummaryRecord[]): SummaryRecord[] {
  return [...records].sort(compareSummary);
}
