#!/usr/bin/env node
/**
 * Embedding benchmark sweep CLI.
 * Measures latency, throughput and (when available) GPU energy for every
 * batch size × concurrency combination against one embedding server.
 */

import { config } from 'dotenv';
import { AppError, handleError, logger } from './logger.js';
import { ConfigManager, applyEnvOverrides, parseIntList } from './config.js';
import type { BenchConfig } from './config.js';
import { NvidiaSmiPowerSource, PowerMonitor } from './power-source.js';
import { PowerSampler } from './power-sampler.js';
import { defaultResultDir } from './result-store.js';
import { waitForServerReady } from './server-readiness.js';
import { httpClientFactory, runSweep } from './sweep.js';
import type { SweepPlan } from './sweep.js';
import { SeededRandom, TextGenerator } from './text-generator.js';

config();

export interface SweepCliArgs {
  model?: string;
  baseUrl?: string;
  chunkSizes?: number[];
  batchSizes?: number[];
  concurrencies?: number[];
  numRequests?: number;
  resultDir?: string;
  hardware?: string;
  configPath?: string;
  seed?: number;
  timeoutMs?: number;
  powerIntervalMs?: number;
  noPower: boolean;
  force: boolean;
  noWait: boolean;
  progress: boolean;
  help: boolean;
}

export interface SweepSettings {
  plan: SweepPlan;
  baseUrl: string;
  resultDir: string;
  hardware: string;
  seed: number;
  timeoutMs: number;
  readinessTimeoutMs: number;
  readinessRetries: number;
  power: { enabled: boolean; intervalMs: number; stopTimeoutMs: number; command: string };
  force: boolean;
  waitForServer: boolean;
  progress: boolean;
}

function printUsage(): void {
  console.log(`Usage: sweep-cli --model <name> [options]

Options:
  --model <name>               Model served by the endpoint (required)
  --base-url <url>             Server base URL (default: http://localhost:8000)
  --chunk-size <n>             Approximate tokens per text
  --chunk-sizes <list>         Comma-separated chunk sizes (default: 256,512)
  --batch-sizes <list>         Comma-separated batch sizes (default: 1,4,16,64,256)
  --concurrencies <list>       Comma-separated concurrencies (default: 1,4,16,64)
  --num-requests <n>           Requests per sweep point (default: 200)
  --result-dir <dir>           Output directory (default: <results-root>/<model>__<hardware>)
  --hardware <label>           Hardware label used in the default output directory
  --config <path>              YAML or JSON config file (default: ./bench.config.yaml)
  --seed <n>                   Seed for synthetic text (default: 42)
  --timeout-ms <n>             Per-request timeout (default: 300000)
  --power-interval-ms <n>      Power sampling interval (default: 100)
  --no-power                   Skip power sampling
  --no-wait                    Do not wait for the server to answer /v1/models
  --force                      Re-run points that already have a result file
  --progress                   Show per-request progress
  -h, --help                   Show this help`);
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('--')) {
    throw new AppError(`Missing value for ${flag}`, 'INVALID_ARGUMENT', 400);
  }
  return value;
}

function parsePositiveInt(flag: string, value: string | undefined): number {
  const raw = requireValue(flag, value);
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new AppError(`${flag} expects a positive integer, got "${raw}"`, 'INVALID_ARGUMENT', 400);
  }
  return parsed;
}

export function parseArgs(argv: string[]): SweepCliArgs {
  const args = [...argv];
  const parsed: SweepCliArgs = { noPower: false, force: false, noWait: false, progress: false, help: false };

  while (args.length > 0) {
    const arg = args.shift();
    switch (arg) {
      case '--model':
        parsed.model = requireValue(arg, args.shift());
        break;
      case '--base-url':
        parsed.baseUrl = requireValue(arg, args.shift());
        break;
      case '--chunk-size':
        parsed.chunkSizes = [parsePositiveInt(arg, args.shift())];
        break;
      case '--chunk-sizes':
        parsed.chunkSizes = parseIntList(requireValue(arg, args.shift()));
        break;
      case '--batch-sizes':
        parsed.batchSizes = parseIntList(requireValue(arg, args.shift()));
        break;
      case '--concurrencies':
        parsed.concurrencies = parseIntList(requireValue(arg, args.shift()));
        break;
      case '--num-requests':
        parsed.numRequests = parsePositiveInt(arg, args.shift());
        break;
      case '--result-dir':
        parsed.resultDir = requireValue(arg, args.shift());
        break;
      case '--hardware':
        parsed.hardware = requireValue(arg, args.shift());
        break;
      case '--config':
        parsed.configPath = requireValue(arg, args.shift());
        break;
      case '--seed': {
        const raw = requireValue(arg, args.shift());
        const seed = Number(raw);
        if (!Number.isInteger(seed)) {
          throw new AppError(`--seed expects an integer, got "${raw}"`, 'INVALID_ARGUMENT', 400);
        }
        parsed.seed = seed;
        break;
      }
      case '--timeout-ms':
        parsed.timeoutMs = parsePositiveInt(arg, args.shift());
        break;
      case '--power-interval-ms':
        parsed.powerIntervalMs = parsePositiveInt(arg, args.shift());
        break;
      case '--no-power':
        parsed.noPower = true;
        break;
      case '--no-wait':
        parsed.noWait = true;
        break;
      case '--force':
        parsed.force = true;
        break;
      case '--progress':
        parsed.progress = true;
        break;
      case '-h':
      case '--help':
        parsed.help = true;
        break;
      default:
        throw new AppError(`Unknown argument: ${arg}`, 'INVALID_ARGUMENT', 400);
    }
  }

  return parsed;
}

/**
 * Flags win over the merged config (env over file over defaults)
 */
export function resolveSettings(args: SweepCliArgs, cfg: BenchConfig): SweepSettings {
  const model = args.model ?? cfg.target.model;
  if (!model) {
    throw new AppError('--model is required', 'INVALID_ARGUMENT', 400);
  }

  const hardware = args.hardware ?? cfg.output.hardware;

  return {
    plan: {
      model,
      chunkSizes: args.chunkSizes ?? cfg.sweep.chunkSizes,
      batchSizes: args.batchSizes ?? cfg.sweep.batchSizes,
      concurrencies: args.concurrencies ?? cfg.sweep.concurrencies,
      numRequests: args.numRequests ?? cfg.sweep.numRequests,
    },
    baseUrl: args.baseUrl ?? cfg.target.baseUrl,
    resultDir: args.resultDir ?? cfg.output.resultDir ?? defaultResultDir(cfg.output.resultsRoot, model, hardware),
    hardware,
    seed: args.seed ?? cfg.sweep.seed,
    timeoutMs: args.timeoutMs ?? cfg.target.requestTimeoutMs,
    readinessTimeoutMs: cfg.target.readinessTimeoutMs,
    readinessRetries: cfg.target.readinessRetries,
    power: {
      enabled: cfg.power.enabled && !args.noPower,
      intervalMs: args.powerIntervalMs ?? cfg.power.intervalMs,
      stopTimeoutMs: cfg.power.stopTimeoutMs,
      command: cfg.power.command,
    },
    force: args.force,
    waitForServer: !args.noWait,
    progress: args.progress,
  };
}

/**
 * Checks the settings after flags and env are applied; the config file
 * alone was validated before the merge
 */
export function validateSettings(settings: SweepSettings): string[] {
  const errors: string[] = [];

  let url: URL | null = null;
  try {
    url = new URL(settings.baseUrl);
  } catch {
    errors.push(`base URL "${settings.baseUrl}" is not a valid URL`);
  }
  if (url && url.protocol !== 'http:' && url.protocol !== 'https:') {
    errors.push(`base URL "${settings.baseUrl}" must use http or https`);
  }

  if (!Number.isInteger(settings.timeoutMs) || settings.timeoutMs < 1) {
    errors.push('request timeout must be a positive integer');
  }
  if (!Number.isInteger(settings.power.intervalMs) || settings.power.intervalMs < 1) {
    errors.push('power interval must be a positive integer');
  }
  if (!settings.hardware.trim()) {
    errors.push('hardware label must not be empty');
  }

  return errors;
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  let args: SweepCliArgs;
  let settings: SweepSettings;
  try {
    args = parseArgs(argv);
    if (args.help) {
      printUsage();
      return;
    }

    const manager = new ConfigManager(args.configPath);
    const validation = manager.validate();
    if (!validation.valid) {
      throw new AppError(`Invalid configuration: ${validation.errors.join('; ')}`, 'INVALID_CONFIG', 400);
    }
    const cfg = applyEnvOverrides(manager.getAll());
    logger.setMinLevel(cfg.logLevel);
    settings = resolveSettings(args, cfg);
    const errors = validateSettings(settings);
    if (errors.length > 0) {
      throw new AppError(`Invalid settings: ${errors.join('; ')}`, 'INVALID_ARGUMENT', 400);
    }
  } catch (error) {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}\n`);
    printUsage();
    process.exit(1);
  }

  console.log('=== Embedding Benchmark ===');
  console.log(`Model:       ${settings.plan.model}`);
  console.log(`Base URL:    ${settings.baseUrl}`);
  console.log(`Hardware:    ${settings.hardware}`);
  console.log(`Result dir:  ${settings.resultDir}\n`);

  if (settings.waitForServer) {
    await waitForServerReady({
      baseUrl: settings.baseUrl,
      retries: settings.readinessRetries,
      timeoutMs: settings.readinessTimeoutMs,
    });
  }

  const monitor = settings.power.enabled
    ? await PowerMonitor.open(
        new NvidiaSmiPowerSource({ command: settings.power.command, intervalMs: settings.power.intervalMs })
      )
    : PowerMonitor.unavailable();

  const shutdown = (signal: NodeJS.Signals) => {
    logger.warn(`Received ${signal}, releasing power monitor`, undefined, 'SweepCLI');
    void monitor
      .close()
      .catch((error) => handleError(error, 'SweepCLI'))
      .finally(() => process.exit(130));
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  try {
    const summary = await runSweep({
      plan: settings.plan,
      resultDir: settings.resultDir,
      // Seeded once per process so repeated runs send identical text
      generator: new TextGenerator(new SeededRandom(settings.seed)),
      sampler: new PowerSampler(monitor, {
        intervalMs: settings.power.intervalMs,
        stopTimeoutMs: settings.power.stopTimeoutMs,
      }),
      createClient: httpClientFactory(settings.baseUrl, settings.timeoutMs),
      force: settings.force,
      showProgress: settings.progress,
    });

    console.log(
      `\nDone. ${summary.written.length} result(s) written, ${summary.skipped.length} skipped. Results in ${settings.resultDir}`
    );
  } finally {
    process.removeListener('SIGINT', shutdown);
    process.removeListener('SIGTERM', shutdown);
    await monitor.close();
  }
}

const isDirectRun =
  process.argv[1] && process.argv[1].includes('sweep-cli');
if (isDirectRun) {
  main().catch((error) => {
    handleError(error, 'SweepCLI');
    process.exit(1);
  });
}
