/**
 * Configuration system with YAML and JSON support
 */

import { readFileSync, existsSync } from 'fs';
import YAML from 'js-yaml';
import { AppError, isLogLevel, logger } from './logger.js';
import type { LogLevel } from './logger.js';

export interface TargetConfig {
  baseUrl: string;
  model?: string;
  requestTimeoutMs: number;
  readinessTimeoutMs: number;
  readinessRetries: number;
}

export interface SweepConfig {
  chunkSizes: number[];
  batchSizes: number[];
  concurrencies: number[];
  numRequests: number;
  seed: number;
}

export interface PowerConfig {
  enabled: boolean;
  intervalMs: number;
  stopTimeoutMs: number;
  command: string;
}

export interface OutputConfig {
  resultsRoot: string;
  resultDir?: string;
  hardware: string;
}

export interface BenchConfig {
  target: TargetConfig;
  sweep: SweepConfig;
  power: PowerConfig;
  output: OutputConfig;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: BenchConfig = {
  target: {
    baseUrl: 'http://localhost:8000',
    requestTimeoutMs: 300000, // 5 minutes
    readinessTimeoutMs: 5000,
    readinessRetries: 30
  },
  sweep: {
    chunkSizes: [256, 512],
    batchSizes: [1, 4, 16, 64, 256],
    concurrencies: [1, 4, 16, 64],
    numRequests: 200,
    seed: 42
  },
  power: {
    enabled: true,
    intervalMs: 100,
    stopTimeoutMs: 2000,
    command: 'nvidia-smi'
  },
  output: {
    resultsRoot: './results',
    hardware: 'unknown'
  },
  logLevel: 'info'
};

// Kebab-case keys as written in sweep master files
const KEY_ALIASES: Record<string, string> = {
  'chunk-sizes': 'chunkSizes',
  'batch-sizes': 'batchSizes',
  'num-requests': 'numRequests',
  'base-url': 'baseUrl',
  'result-dir': 'resultDir',
  'results-root': 'resultsRoot',
  'interval-ms': 'intervalMs',
  'stop-timeout-ms': 'stopTimeoutMs',
  'request-timeout-ms': 'requestTimeoutMs',
  'readiness-timeout-ms': 'readinessTimeoutMs',
  'readiness-retries': 'readinessRetries',
  'log-level': 'logLevel'
};

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function cloneConfig(config: BenchConfig): BenchConfig {
  return structuredClone(config);
}

function normalizeKeys(value: PlainObject): PlainObject {
  const normalized: PlainObject = {};
  for (const [key, entry] of Object.entries(value)) {
    normalized[KEY_ALIASES[key] ?? key] = isPlainObject(entry) ? normalizeKeys(entry) : entry;
  }
  return normalized;
}

function pickNumber(value: unknown, fallback: number): number {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return fallback;
}

function pickString(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim() !== '' ? value : fallback;
}

function pickOptionalString(value: unknown, fallback?: string): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : fallback;
}

function pickBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

function pickIntList(value: unknown, fallback: number[]): number[] {
  if (typeof value === 'string') {
    return parseIntList(value);
  }
  if (Array.isArray(value) && value.every(item => typeof item === 'number')) {
    return [...value];
  }
  return [...fallback];
}

function section(user: PlainObject, key: string): PlainObject {
  const value = user[key];
  return isPlainObject(value) ? value : {};
}

/**
 * Merge user config with defaults (user config takes precedence)
 */
export function mergeConfig(defaults: BenchConfig, raw: unknown): BenchConfig {
  if (!isPlainObject(raw)) return cloneConfig(defaults);
  const user = normalizeKeys(raw);

  // Master files keep sweep parameters under `sweep`
  const target = section(user, 'target');
  const sweep = section(user, 'sweep');
  const power = section(user, 'power');
  const output = section(user, 'output');

  return {
    target: {
      baseUrl: pickString(target.baseUrl, defaults.target.baseUrl),
      model: pickOptionalString(target.model, defaults.target.model),
      requestTimeoutMs: pickNumber(target.requestTimeoutMs, defaults.target.requestTimeoutMs),
      readinessTimeoutMs: pickNumber(target.readinessTimeoutMs, defaults.target.readinessTimeoutMs),
      readinessRetries: pickNumber(target.readinessRetries, defaults.target.readinessRetries)
    },
    sweep: {
      chunkSizes: pickIntList(sweep.chunkSizes, defaults.sweep.chunkSizes),
      batchSizes: pickIntList(sweep.batchSizes, defaults.sweep.batchSizes),
      concurrencies: pickIntList(sweep.concurrencies, defaults.sweep.concurrencies),
      numRequests: pickNumber(sweep.numRequests, defaults.sweep.numRequests),
      seed: pickNumber(sweep.seed, defaults.sweep.seed)
    },
    power: {
      enabled: pickBoolean(power.enabled, defaults.power.enabled),
      intervalMs: pickNumber(power.intervalMs, defaults.power.intervalMs),
      stopTimeoutMs: pickNumber(power.stopTimeoutMs, defaults.power.stopTimeoutMs),
      command: pickString(power.command, defaults.power.command)
    },
    output: {
      resultsRoot: pickString(output.resultsRoot, defaults.output.resultsRoot),
      resultDir: pickOptionalString(output.resultDir, defaults.output.resultDir),
      hardware: pickString(output.hardware, defaults.output.hardware)
    },
    logLevel: isLogLevel(user.logLevel) ? user.logLevel : defaults.logLevel
  };
}

/**
 * Apply EMBED_BENCH_* environment overrides
 */
export function applyEnvOverrides(config: BenchConfig, env: NodeJS.ProcessEnv = process.env): BenchConfig {
  const next = cloneConfig(config);
  if (env.EMBED_BENCH_BASE_URL) next.target.baseUrl = env.EMBED_BENCH_BASE_URL;
  if (env.EMBED_BENCH_MODEL) next.target.model = env.EMBED_BENCH_MODEL;
  if (env.EMBED_BENCH_HARDWARE) next.output.hardware = env.EMBED_BENCH_HARDWARE;
  if (env.EMBED_BENCH_RESULTS_ROOT) next.output.resultsRoot = env.EMBED_BENCH_RESULTS_ROOT;
  if (isLogLevel(env.LOG_LEVEL)) next.logLevel = env.LOG_LEVEL;
  return next;
}

/**
 * Parse "1,4, 16" into [1, 4, 16]
 */
export function parseIntList(value: string): number[] {
  const parts = value.split(',').map(part => part.trim()).filter(Boolean);
  if (parts.length === 0) {
    throw new AppError(`Expected a comma-separated list of integers, got "${value}"`, 'INVALID_ARGUMENT', 400);
  }

  return parts.map(part => {
    const parsed = Number(part);
    if (!Number.isInteger(parsed) || parsed < 1) {
      throw new AppError(`Invalid positive integer "${part}" in "${value}"`, 'INVALID_ARGUMENT', 400);
    }
    return parsed;
  });
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: BenchConfig;
  private configPath: string;

  constructor(configPath: string = './bench.config.yaml') {
    this.configPath = configPath;
    this.config = this.loadConfig();
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): BenchConfig {
    if (!existsSync(this.configPath)) {
      logger.debug(
        `Config file not found: ${this.configPath}, using defaults`,
        { path: this.configPath },
        'ConfigManager'
      );
      return cloneConfig(DEFAULT_CONFIG);
    }

    try {
      const content = readFileSync(this.configPath, 'utf-8');
      let raw: unknown;

      if (this.configPath.endsWith('.json')) {
        raw = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        raw = YAML.load(content);
      } else {
        throw new Error(`Unsupported config format: ${this.configPath}`);
      }

      logger.info(
        `Loaded configuration from ${this.configPath}`,
        undefined,
        'ConfigManager'
      );

      return mergeConfig(DEFAULT_CONFIG, raw);
    } catch (error) {
      logger.warn(
        `Failed to load config: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        'ConfigManager'
      );
      return cloneConfig(DEFAULT_CONFIG);
    }
  }

  /**
   * Get complete configuration
   */
  getAll(): BenchConfig {
    return cloneConfig(this.config);
  }

  /**
   * Validate configuration
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const { target, sweep, power } = this.config;

    try {
      new URL(target.baseUrl);
    } catch {
      errors.push(`Invalid base URL: ${target.baseUrl}`);
    }

    const lists: Array<[string, number[]]> = [
      ['chunkSizes', sweep.chunkSizes],
      ['batchSizes', sweep.batchSizes],
      ['concurrencies', sweep.concurrencies]
    ];
    for (const [name, values] of lists) {
      if (values.length === 0) {
        errors.push(`sweep.${name} must not be empty`);
      } else if (values.some(value => !Number.isInteger(value) || value < 1)) {
        errors.push(`sweep.${name} must contain positive integers`);
      }
    }

    if (!Number.isInteger(sweep.numRequests) || sweep.numRequests < 1) {
      errors.push('sweep.numRequests must be at least 1');
    }

    if (target.requestTimeoutMs <= 0) {
      errors.push('target.requestTimeoutMs must be positive');
    }

    if (power.intervalMs <= 0) {
      errors.push('power.intervalMs must be positive');
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }
}
