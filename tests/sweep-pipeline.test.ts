import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import express from 'express';
import type { Server } from 'http';
import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { aggregate } from '../src/aggregate-cli.js';
import { PowerMonitor } from '../src/power-source.js';
import type { PowerSource } from '../src/power-source.js';
import { PowerSampler } from '../src/power-sampler.js';
import { defaultResultDir } from '../src/result-store.js';
import { httpClientFactory, runSweep } from '../src/sweep.js';
import { SeededRandom, TextGenerator } from '../src/text-generator.js';

interface EmbeddingRequest {
  model: string;
  input: string[];
}

function isEmbeddingRequest(value: unknown): value is EmbeddingRequest {
  if (typeof value !== 'object' || value === null) return false;
  if (!('model' in value) || typeof value.model !== 'string') return false;
  return 'input' in value && Array.isArray(value.input) && value.input.every(text => typeof text === 'string');
}

function steadyGpu(watts: number): PowerSource {
  return {
    initialize: async () => {},
    deviceCount: async () => 1,
    readDevicePower: async () => watts,
    shutdown: async () => {},
  };
}

describe('Sweep pipeline', () => {
  let server: Server;
  let baseUrl: string;
  let root: string;
  const received: EmbeddingRequest[] = [];

  beforeAll(async () => {
    const app = express();
    app.use(express.json({ limit: '10mb' }));
    app.post('/v1/embeddings', (req, res) => {
      if (!isEmbeddingRequest(req.body)) {
        res.status(400).json({ error: 'bad request' });
        return;
      }
      const body = req.body;
      received.push(body);
      setTimeout(() => {
        res.json({
          object: 'list',
          model: body.model,
          data: body.input.map((_text, index) => ({ object: 'embedding', index, embedding: [0, 1, 0] })),
        });
      }, 2);
    });

    await new Promise<void>(resolve => {
      server = app.listen(0, '127.0.0.1', () => resolve());
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
    root = mkdtempSync(join(process.cwd(), '.test-tmp', 'pipeline-'));
  });

  afterAll(async () => {
    rmSync(root, { recursive: true, force: true });
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  it('sweeps a live endpoint and aggregates the results', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const monitor = await PowerMonitor.open(steadyGpu(150));
    const resultDir = defaultResultDir(root, 'BAAI/bge-m3', 'test-gpu');

    try {
      const summary = await runSweep({
        plan: { model: 'BAAI/bge-m3', chunkSizes: [4], batchSizes: [1, 3], concurrencies: [2], numRequests: 6 },
        resultDir,
        generator: new TextGenerator(new SeededRandom(42)),
        sampler: new PowerSampler(monitor, { intervalMs: 5 }),
        createClient: httpClientFactory(baseUrl, 5000),
        print: () => {},
      });

      expect(summary.written).toHaveLength(2);
      expect(summary.results.map(record => record.completed_requests)).toEqual([6, 6]);
      expect(summary.results.map(record => record.power_avg_w)).toEqual([150, 150]);
    } finally {
      await monitor.close();
    }

    expect(received).toHaveLength(12);
    expect(received.every(body => body.model === 'BAAI/bge-m3')).toBe(true);
    expect(received.slice(0, 6).every(body => body.input.length === 1)).toBe(true);
    expect(received.slice(6).every(body => body.input.length === 3)).toBe(true);
    expect(received[0].input[0].split(' ')).toHaveLength(4);

    const outcome = aggregate({ resultsDir: root });

    expect(outcome.records.map(record => [record.hardware, record.batch_size])).toEqual([
      ['test-gpu', 1],
      ['test-gpu', 3],
    ]);
    for (const record of outcome.records) {
      expect(record.latency_per_text_ms).toBeCloseTo(record.p99_latency_ms / record.batch_size, 3);
      expect(record.emb_per_joule).not.toBeNull();
    }
    expect(outcome.table.split('\n')[2].startsWith('| bge-m3 | test-gpu |')).toBe(true);
    vi.restoreAllMocks();
  });
});
