/**
 * HTTP client for an OpenAI-compatible /v1/embeddings endpoint.
 * Only the round-trip latency of each call matters here; the vectors are discarded.
 */

import http from 'http';
import https from 'https';
import { performance } from 'perf_hooks';
import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { AppError } from './logger.js';

export class RequestError extends AppError {
  constructor(message: string, code: string, public status?: number) {
    super(message, code, status ?? 502, status === undefined ? undefined : { status });
    this.name = 'RequestError';
  }
}

export interface EmbeddingClient {
  /** Resolves with the round-trip latency in milliseconds */
  embed(texts: readonly string[]): Promise<number>;
  close(): void;
}

export interface HttpEmbeddingClientOptions {
  baseUrl: string;
  model: string;
  /** Simultaneous connections the agent may open */
  maxSockets: number;
  timeoutMs: number;
}

// Extra sockets beyond the concurrency bound so the pool never queues requests itself
export const CONNECTION_HEADROOM = 4;

export function embeddingsUrl(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/v1/embeddings`;
}

export class HttpEmbeddingClient implements EmbeddingClient {
  private client: AxiosInstance;
  private httpAgent: http.Agent;
  private httpsAgent: https.Agent;
  private url: string;

  constructor(private options: HttpEmbeddingClientOptions) {
    this.url = embeddingsUrl(options.baseUrl);
    this.httpAgent = new http.Agent({ keepAlive: true, maxSockets: options.maxSockets });
    this.httpsAgent = new https.Agent({ keepAlive: true, maxSockets: options.maxSockets });
    this.client = axios.create({
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      headers: { 'Content-Type': 'application/json' },
      responseType: 'json',
      proxy: false,
    });
  }

  async embed(texts: readonly string[]): Promise<number> {
    const payload = { model: this.options.model, input: texts };
    const signal = AbortSignal.timeout(this.options.timeoutMs);

    const start = performance.now();
    try {
      // axios resolves only once the whole body has been read and parsed
      await this.client.post(this.url, payload, { signal });
    } catch (error) {
      throw toRequestError(error, this.options.timeoutMs);
    }
    return performance.now() - start;
  }

  close(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}

function toRequestError(error: unknown, timeoutMs: number): RequestError {
  if (axios.isCancel(error)) {
    return new RequestError(`Request timed out after ${timeoutMs}ms`, 'REQUEST_TIMEOUT');
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status !== undefined) {
      return new RequestError(`Server responded with status ${status}`, 'REQUEST_FAILED', status);
    }
    return new RequestError(`Connection failed: ${error.message}`, 'REQUEST_FAILED');
  }

  return new RequestError(error instanceof Error ? error.message : String(error), 'REQUEST_FAILED');
}
