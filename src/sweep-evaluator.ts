/**
 * Measures one sweep point: workload generation, timed dispatch with power
 * sampling alongside, and the derived result record.
 */

import { dispatchBounded } from './dispatcher.js';
import type { Clock } from './dispatcher.js';
import type { EmbeddingClient } from './embedding-client.js';
import { logger } from './logger.js';
import { PowerSampler } from './power-sampler.js';
import { computeMetrics, roundTo } from './statistics.js';
import { TextGenerator } from './text-generator.js';
import type { DispatchOutcome, RequestBatch, ResultRecord, SweepPoint } from './types.js';

export interface EvaluatorDeps {
  generator: TextGenerator;
  createClient: (point: SweepPoint) => EmbeddingClient;
  sampler: PowerSampler;
  clock?: Clock;
  onSettled?: (settled: number, total: number) => void;
}

interface MeasuredWindow {
  outcome: DispatchOutcome;
  powerAvgW: number | null;
}

/**
 * Dispatch with the sampler running; the sampler is stopped on every exit path
 */
async function measureWindow(
  point: SweepPoint,
  batches: readonly RequestBatch[],
  client: EmbeddingClient,
  deps: EvaluatorDeps
): Promise<MeasuredWindow> {
  deps.sampler.start();

  let outcome: DispatchOutcome;
  try {
    outcome = await dispatchBounded(batches, client, {
      concurrency: point.concurrency,
      clock: deps.clock,
      onSettled: deps.onSettled,
    });
  } catch (error) {
    await deps.sampler.stop();
    throw error;
  }

  return { outcome, powerAvgW: await deps.sampler.stop() };
}

export async function evaluateSweepPoint(point: SweepPoint, deps: EvaluatorDeps): Promise<ResultRecord> {
  // Generated up front so generation cost stays out of the timed window
  const batches = deps.generator.generateBatches(point.numRequests, point.batchSize, point.chunkSize);
  const client = deps.createClient(point);

  try {
    const { outcome, powerAvgW } = await measureWindow(point, batches, client, deps);

    if (outcome.failures > 0) {
      logger.warn(
        `${outcome.failures}/${point.numRequests} requests failed`,
        { batchSize: point.batchSize, concurrency: point.concurrency },
        'SweepEvaluator'
      );
    }

    return buildResultRecord(point, outcome, powerAvgW);
  } finally {
    client.close();
  }
}

export function buildResultRecord(
  point: SweepPoint,
  outcome: DispatchOutcome,
  powerAvgW: number | null
): ResultRecord {
  const elapsedSec = outcome.elapsedMs / 1000;
  const metrics = computeMetrics({
    latenciesMs: outcome.latenciesMs,
    elapsedSec,
    batchSize: point.batchSize,
    concurrency: point.concurrency,
    powerAvgW,
  });

  return {
    model: point.model,
    chunk_size: point.chunkSize,
    batch_size: point.batchSize,
    concurrency: point.concurrency,
    num_requests: point.numRequests,
    completed_requests: metrics.completed,
    elapsed_sec: roundTo(elapsedSec, 3),
    p50_latency_ms: roundTo(metrics.p50LatencyMs, 2),
    p99_latency_ms: roundTo(metrics.p99LatencyMs, 2),
    throughput_emb_per_sec: roundTo(metrics.throughputEmbPerSec, 2),
    throughput_per_user: roundTo(metrics.throughputPerUser, 2),
    power_avg_w: metrics.powerAvgW === null ? null : roundTo(metrics.powerAvgW, 2),
    energy_joules: metrics.energyJoules === null ? null : roundTo(metrics.energyJoules, 2),
    emb_per_joule: metrics.embPerJoule === null ? null : roundTo(metrics.embPerJoule, 4),
  };
}
