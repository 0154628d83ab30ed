import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import express from 'express';
import type { Server } from 'http';
import { HttpEmbeddingClient, RequestError, embeddingsUrl } from './embedding-client.js';

function portOf(server: Server): number {
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }
  return address.port;
}

describe('embeddingsUrl', () => {
  it('joins the base URL and the embeddings path', () => {
    expect(embeddingsUrl('http://localhost:8000')).toBe('http://localhost:8000/v1/embeddings');
    expect(embeddingsUrl('http://localhost:8000/')).toBe('http://localhost:8000/v1/embeddings');
  });
});

describe('HttpEmbeddingClient', () => {
  let server: Server;
  let baseUrl: string;
  let received: unknown[] = [];
  let status = 200;
  let delayMs = 0;

  beforeAll(async () => {
    const app = express();
    app.use(express.json({ limit: '10mb' }));
    app.post('/v1/embeddings', (req, res) => {
      received.push(req.body);
      setTimeout(() => {
        if (status !== 200) {
          res.status(status).json({ error: 'unavailable' });
          return;
        }
        res.json({ object: 'list', data: [{ object: 'embedding', index: 0, embedding: [0.1, 0.2] }] });
      }, delayMs);
    });

    await new Promise<void>(resolve => {
      server = app.listen(0, '127.0.0.1', () => resolve());
    });
    baseUrl = `http://127.0.0.1:${portOf(server)}`;
  });

  afterAll(async () => {
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  beforeEach(() => {
    received = [];
    status = 200;
    delayMs = 0;
  });

  it('posts the model and input texts and returns the latency', async () => {
    const client = new HttpEmbeddingClient({ baseUrl, model: 'BAAI/bge-m3', maxSockets: 4, timeoutMs: 5000 });
    delayMs = 20;

    const latency = await client.embed(['alpha beta', 'gamma']);
    client.close();

    expect(received).toEqual([{ model: 'BAAI/bge-m3', input: ['alpha beta', 'gamma'] }]);
    expect(latency).toBeGreaterThanOrEqual(15);
  });

  it('raises a RequestError carrying the status on a server error', async () => {
    const client = new HttpEmbeddingClient({ baseUrl, model: 'm', maxSockets: 4, timeoutMs: 5000 });
    status = 503;

    const error = await client.embed(['x']).catch((err: unknown) => err);
    client.close();

    expect(error).toBeInstanceOf(RequestError);
    expect(error).toMatchObject({ code: 'REQUEST_FAILED', status: 503 });
  });

  it('raises a timeout error when the server is too slow', async () => {
    const client = new HttpEmbeddingClient({ baseUrl, model: 'm', maxSockets: 4, timeoutMs: 50 });
    delayMs = 500;

    const error = await client.embed(['x']).catch((err: unknown) => err);
    client.close();

    expect(error).toBeInstanceOf(RequestError);
    expect(error).toMatchObject({ code: 'REQUEST_TIMEOUT' });
  });

  it('raises a RequestError without a status when the connection fails', async () => {
    const closed = express().listen(0, '127.0.0.1');
    await new Promise<void>(resolve => closed.once('listening', () => resolve()));
    const port = portOf(closed);
    await new Promise<void>(resolve => closed.close(() => resolve()));

    const client = new HttpEmbeddingClient({
      baseUrl: `http://127.0.0.1:${port}`,
      model: 'm',
      maxSockets: 4,
      timeoutMs: 5000,
    });

    const error = await client.embed(['x']).catch((err: unknown) => err);
    client.close();

    expect(error).toBeInstanceOf(RequestError);
    expect(error).toMatchObject({ code: 'REQUEST_FAILED', status: undefined });
  });
});
