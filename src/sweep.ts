/**
 * Sweep driver: walks chunk size × batch size × concurrency and persists one result per point.
 */

import { basename } from 'path';
import { CONNECTION_HEADROOM, HttpEmbeddingClient } from './embedding-client.js';
import type { EmbeddingClient } from './embedding-client.js';
import type { Clock } from './dispatcher.js';
import { logger } from './logger.js';
import { PowerSampler } from './power-sampler.js';
import { ProgressTracker } from './progress.js';
import { hasResult, writeResult } from './result-store.js';
import { evaluateSweepPoint } from './sweep-evaluator.js';
import { TextGenerator } from './text-generator.js';
import type { ResultRecord, SweepPoint } from './types.js';

export interface SweepPlan {
  model: string;
  chunkSizes: readonly number[];
  batchSizes: readonly number[];
  concurrencies: readonly number[];
  numRequests: number;
}

export function planSweep(plan: SweepPlan): SweepPoint[] {
  const points: SweepPoint[] = [];
  for (const chunkSize of plan.chunkSizes) {
    for (const batchSize of plan.batchSizes) {
      for (const concurrency of plan.concurrencies) {
        points.push({ model: plan.model, chunkSize, batchSize, concurrency, numRequests: plan.numRequests });
      }
    }
  }
  return points;
}

export interface RunSweepOptions {
  plan: SweepPlan;
  resultDir: string;
  generator: TextGenerator;
  sampler: PowerSampler;
  createClient: (point: SweepPoint) => EmbeddingClient;
  /** Re-run points whose result file already exists */
  force?: boolean;
  showProgress?: boolean;
  clock?: Clock;
  print?: (line: string) => void;
}

export interface SweepSummary {
  results: ResultRecord[];
  written: string[];
  skipped: SweepPoint[];
}

export function httpClientFactory(baseUrl: string, timeoutMs: number): (point: SweepPoint) => EmbeddingClient {
  return point =>
    new HttpEmbeddingClient({
      baseUrl,
      model: point.model,
      maxSockets: point.concurrency + CONNECTION_HEADROOM,
      timeoutMs,
    });
}

export async function runSweep(options: RunSweepOptions): Promise<SweepSummary> {
  const print = options.print ?? ((line: string) => console.log(line));
  const points = planSweep(options.plan);
  const summary: SweepSummary = { results: [], written: [], skipped: [] };

  logger.info(
    `Sweeping ${points.length} points`,
    { model: options.plan.model, resultDir: options.resultDir, powerSampling: options.sampler.enabled },
    'Sweep'
  );

  for (const point of points) {
    if (!options.force && hasResult(options.resultDir, point)) {
      print(`  chunk=${point.chunkSize} batch=${point.batchSize} concurrency=${point.concurrency} (already done, skipping)`);
      summary.skipped.push(point);
      continue;
    }

    print(`  chunk=${point.chunkSize} batch=${point.batchSize} concurrency=${point.concurrency} ...`);

    const tracker = options.showProgress
      ? new ProgressTracker({ total: point.numRequests, label: '    requests' })
      : null;

    const record = await evaluateSweepPoint(point, {
      generator: options.generator,
      createClient: options.createClient,
      sampler: options.sampler,
      clock: options.clock,
      onSettled: tracker ? settled => tracker.set(settled) : undefined,
    });
    tracker?.complete();

    const filePath = writeResult(options.resultDir, point, record);
    summary.results.push(record);
    summary.written.push(filePath);

    print(
      `    -> p50=${record.p50_latency_ms}ms  p99=${record.p99_latency_ms}ms  ` +
        `tput=${record.throughput_emb_per_sec} emb/s  saved ${basename(filePath)}`
    );
  }

  return summary;
}
