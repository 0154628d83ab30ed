import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { join } from 'path';
import { defaultResultDir, hasResult, modelSlug, resultFileName, writeResult } from './result-store.js';
import type { ResultRecord, SweepPoint } from './types.js';

const point: SweepPoint = {
  model: 'BAAI/bge-m3',
  chunkSize: 512,
  batchSize: 16,
  concurrency: 4,
  numRequests: 200,
};

const record: ResultRecord = {
  model: 'BAAI/bge-m3',
  chunk_size: 512,
  batch_size: 16,
  concurrency: 4,
  num_requests: 200,
  completed_requests: 200,
  elapsed_sec: 12.5,
  p50_latency_ms: 210.4,
  p99_latency_ms: 388.02,
  throughput_emb_per_sec: 256,
  throughput_per_user: 64,
  power_avg_w: null,
  energy_joules: null,
  emb_per_joule: null,
};

describe('result-store', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(process.cwd(), '.test-tmp', 'results-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should replace slashes in model names', () => {
    expect(modelSlug('BAAI/bge-m3')).toBe('BAAI_bge-m3');
    expect(modelSlug('org/team/model')).toBe('org_team_model');
    expect(modelSlug('local-model')).toBe('local-model');
  });

  it('should name files after the sweep point', () => {
    expect(resultFileName(point)).toBe('BAAI_bge-m3__chunk512__bs16__conc4.json');
  });

  it('should place results under model and hardware', () => {
    expect(defaultResultDir('results', 'BAAI/bge-m3', 'h100')).toBe(join('results', 'BAAI_bge-m3__h100'));
  });

  it('should write pretty JSON and report it as present', () => {
    const target = join(dir, 'nested');
    expect(hasResult(target, point)).toBe(false);

    const filePath = writeResult(target, point, record);

    expect(filePath).toBe(join(target, 'BAAI_bge-m3__chunk512__bs16__conc4.json'));
    expect(hasResult(target, point)).toBe(true);
    expect(hasResult(target, { ...point, concurrency: 8 })).toBe(false);

    const content = readFileSync(filePath, 'utf-8');
    expect(content.split('\n')[1]).toBe('  "model": "BAAI/bge-m3",');
    expect(JSON.parse(content)).toEqual(record);
  });
});
