/**
 * Runs pre-generated request batches with a fixed bound on in-flight requests.
 */

import { performance } from 'perf_hooks';
import pLimit from 'p-limit';
import type { EmbeddingClient } from './embedding-client.js';
import { AppError, errorMessage, logger } from './logger.js';
import type { DispatchOutcome, RequestBatch } from './types.js';

/** Monotonic milliseconds */
export type Clock = () => number;

export const monotonicClock: Clock = () => performance.now();

export interface DispatchOptions {
  concurrency: number;
  clock?: Clock;
  /** Called after every request settles, successful or not */
  onSettled?: (settled: number, total: number) => void;
}

export async function dispatchBounded(
  batches: readonly RequestBatch[],
  client: EmbeddingClient,
  options: DispatchOptions
): Promise<DispatchOutcome> {
  const { concurrency, onSettled } = options;
  const clock = options.clock ?? monotonicClock;

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new AppError(`Concurrency must be a positive integer, got ${concurrency}`, 'INVALID_ARGUMENT', 400);
  }

  // p-limit releases the slot whether the task resolves or rejects
  const gate = pLimit(concurrency);
  const latenciesMs: number[] = [];
  let failures = 0;
  let settled = 0;

  const start = clock();
  const tasks = batches.map(batch =>
    gate(async () => {
      try {
        latenciesMs.push(await client.embed(batch));
      } catch (error) {
        failures++;
        logger.debug('Request failed', { error: errorMessage(error) }, 'Dispatcher');
      } finally {
        settled++;
        onSettled?.(settled, batches.length);
      }
    })
  );

  await Promise.all(tasks);
  const elapsedMs = clock() - start;

  return { latenciesMs, failures, elapsedMs };
}
