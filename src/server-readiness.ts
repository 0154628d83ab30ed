/**
 * Waits for the embedding server to answer GET /v1/models before a sweep starts.
 */

import OpenAI from 'openai';
import pRetry from 'p-retry';
import { AppError, errorMessage, logger } from './logger.js';

export interface ReadinessOptions {
  baseUrl: string;
  /** Attempts after the first one */
  retries: number;
  /** Per-attempt timeout */
  timeoutMs: number;
  minDelayMs?: number;
  maxDelayMs?: number;
}

export interface ServerInfo {
  models: string[];
  attempts: number;
}

export interface ModelLister {
  listModelIds(): Promise<string[]>;
}

/**
 * OpenAI-compatible model listing; vLLM and most embedding servers expose it
 */
export function createModelLister(baseUrl: string, timeoutMs: number): ModelLister {
  const client = new OpenAI({
    apiKey: process.env.OPENAI_API_KEY || 'not-needed-for-local', // allow-secret: env var reference only
    baseURL: `${baseUrl.replace(/\/+$/, '')}/v1`,
    timeout: timeoutMs,
    maxRetries: 0,
  });

  return {
    async listModelIds() {
      const page = await client.models.list();
      return page.data.map(model => model.id);
    },
  };
}

export async function waitForServerReady(
  options: ReadinessOptions,
  lister: ModelLister = createModelLister(options.baseUrl, options.timeoutMs)
): Promise<ServerInfo> {
  let attempts = 0;

  try {
    const models = await pRetry(
      async () => {
        attempts++;
        return lister.listModelIds();
      },
      {
        retries: options.retries,
        minTimeout: options.minDelayMs ?? 1000,
        maxTimeout: options.maxDelayMs ?? 5000,
        onFailedAttempt: error => {
          logger.debug(
            `Server not ready (attempt ${error.attemptNumber}, ${error.retriesLeft} left)`,
            { error: error.message },
            'ServerReadiness'
          );
        },
      }
    );

    logger.info('Embedding server is ready', { baseUrl: options.baseUrl, models }, 'ServerReadiness');
    return { models, attempts };
  } catch (error) {
    throw new AppError(
      `Embedding server at ${options.baseUrl} did not become ready after ${attempts} attempts: ${errorMessage(error)}`,
      'SERVER_NOT_READY',
      503,
      { baseUrl: options.baseUrl }
    );
  }
}
