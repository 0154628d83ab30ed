/**
 * Core types for the embedding benchmark harness
 */

/**
 * One (batch size, concurrency) configuration to measure. Never mutated.
 */
export interface SweepPoint {
  readonly model: string;
  readonly chunkSize: number;
  readonly batchSize: number;
  readonly concurrency: number;
  readonly numRequests: number;
}

/** Texts carried by one request. */
export type RequestBatch = readonly string[];

/**
 * Persisted outcome of one sweep point. Field names are the on-disk format.
 */
export interface ResultRecord {
  model: string;
  chunk_size: number;
  batch_size: number;
  concurrency: number;
  num_requests: number;
  completed_requests: number;
  elapsed_sec: number;
  p50_latency_ms: number;
  p99_latency_ms: number;
  throughput_emb_per_sec: number;
  throughput_per_user: number;
  power_avg_w: number | null;
  energy_joules: number | null;
  emb_per_joule: number | null;
}

/**
 * A result record as it appears in the aggregated summary
 */
export interface SummaryRecord extends ResultRecord {
  hardware: string;
  latency_per_text_ms: number;
}

export interface DispatchOutcome {
  latenciesMs: number[];
  failures: number;
  elapsedMs: number;
}
