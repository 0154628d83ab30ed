/**
 * Derived metrics for one sweep point
 */

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Nearest-rank style percentile over an ascending list: element at
 * floor(q * n) - 1, clamped into the list. Empty list gives 0.
 */
export function percentile(sortedAsc: readonly number[], q: number): number {
  const n = sortedAsc.length;
  if (n === 0) return 0;
  const index = Math.min(n - 1, Math.max(0, Math.floor(q * n) - 1));
  return sortedAsc[index] ?? 0;
}

export interface MetricsInput {
  latenciesMs: readonly number[];
  elapsedSec: number;
  batchSize: number;
  concurrency: number;
  /** Mean power over the window in watts, null when not sampled */
  powerAvgW: number | null;
}

export interface PointMetrics {
  completed: number;
  p50LatencyMs: number;
  p99LatencyMs: number;
  throughputEmbPerSec: number;
  throughputPerUser: number;
  powerAvgW: number | null;
  energyJoules: number | null;
  embPerJoule: number | null;
}

/**
 * Unrounded metrics. Every ratio falls back to 0 or null instead of dividing by zero.
 */
export function computeMetrics(input: MetricsInput): PointMetrics {
  const sorted = [...input.latenciesMs].sort((a, b) => a - b);
  const completed = sorted.length;
  const totalEmbeddings = completed * input.batchSize;

  const throughputEmbPerSec = input.elapsedSec > 0 ? totalEmbeddings / input.elapsedSec : 0;
  const throughputPerUser = input.concurrency > 0 ? throughputEmbPerSec / input.concurrency : 0;

  let energyJoules: number | null = null;
  let embPerJoule: number | null = null;
  if (input.powerAvgW !== null) {
    energyJoules = input.powerAvgW * input.elapsedSec;
    embPerJoule = energyJoules > 0 ? totalEmbeddings / energyJoules : null;
  }

  return {
    completed,
    p50LatencyMs: percentile(sorted, 0.5),
    p99LatencyMs: percentile(sorted, 0.99),
    throughputEmbPerSec,
    throughputPerUser,
    powerAvgW: input.powerAvgW,
    energyJoules,
    embPerJoule,
  };
}
