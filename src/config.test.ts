import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  ConfigManager,
  DEFAULT_CONFIG,
  applyEnvOverrides,
  mergeConfig,
  parseIntList,
} from './config.js';
import { AppError } from './logger.js';
import { writeFileSync, rmSync, mkdirSync } from 'fs';
import { join } from 'path';

describe('ConfigManager', () => {
  let configDir: string;

  beforeEach(() => {
    configDir = join(process.cwd(), '.test-tmp', 'config');
    mkdirSync(configDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(configDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe('Initialization', () => {
    it('should load defaults if file does not exist', () => {
      const manager = new ConfigManager(join(configDir, 'missing.yaml'));
      expect(manager.getAll()).toEqual(DEFAULT_CONFIG);
    });
  });

  describe('YAML Configuration', () => {
    it('should load kebab-case keys from a sweep file', () => {
      const yamlPath = join(configDir, 'sweep.yaml');
      writeFileSync(
        yamlPath,
        `
target:
  base-url: http://gpu-box:9000
  model: BAAI/bge-m3
sweep:
  chunk-sizes: [128]
  batch-sizes: "1, 8"
  concurrencies: [2, 4]
  num-requests: 50
power:
  enabled: false
output:
  hardware: h100
logLevel: debug
`
      );

      const config = new ConfigManager(yamlPath).getAll();

      expect(config.target.baseUrl).toBe('http://gpu-box:9000');
      expect(config.target.model).toBe('BAAI/bge-m3');
      expect(config.sweep.chunkSizes).toEqual([128]);
      expect(config.sweep.batchSizes).toEqual([1, 8]);
      expect(config.sweep.concurrencies).toEqual([2, 4]);
      expect(config.sweep.numRequests).toBe(50);
      expect(config.sweep.seed).toBe(42);
      expect(config.power.enabled).toBe(false);
      expect(config.power.intervalMs).toBe(100);
      expect(config.output.hardware).toBe('h100');
      expect(config.logLevel).toBe('debug');
    });

    it('should read kebab-case readiness and log-level keys', () => {
      const yamlPath = join(configDir, 'readiness.yaml');
      writeFileSync(
        yamlPath,
        `
target:
  readiness-timeout-ms: 1500
  readiness-retries: 3
log-level: warn
`
      );

      const config = new ConfigManager(yamlPath).getAll();

      expect(config.target.readinessTimeoutMs).toBe(1500);
      expect(config.target.readinessRetries).toBe(3);
      expect(config.logLevel).toBe('warn');
    });

    it('should load every value from the example file', () => {
      const config = new ConfigManager(join(process.cwd(), 'bench.config.example.yaml')).getAll();

      expect(config).toEqual({
        ...DEFAULT_CONFIG,
        target: { ...DEFAULT_CONFIG.target, model: 'BAAI/bge-m3' },
      });
    });
  });

  describe('JSON Configuration', () => {
    it('should merge custom config with defaults', () => {
      const jsonPath = join(configDir, 'bench.json');
      writeFileSync(jsonPath, JSON.stringify({ sweep: { numRequests: 10 } }));

      const config = new ConfigManager(jsonPath).getAll();

      expect(config.sweep.numRequests).toBe(10);
      expect(config.sweep.batchSizes).toEqual(DEFAULT_CONFIG.sweep.batchSizes);
      expect(config.target).toEqual(DEFAULT_CONFIG.target);
    });

    it('should handle invalid JSON gracefully', () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const jsonPath = join(configDir, 'broken.json');
      writeFileSync(jsonPath, '{ invalid json ]');

      const config = new ConfigManager(jsonPath).getAll();

      expect(config).toEqual(DEFAULT_CONFIG);
      expect(warnSpy).toHaveBeenCalledTimes(1);
    });

    it('should reject unsupported formats', () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const tomlPath = join(configDir, 'bench.toml');
      writeFileSync(tomlPath, 'model = "x"');

      expect(new ConfigManager(tomlPath).getAll()).toEqual(DEFAULT_CONFIG);
      expect(String(warnSpy.mock.calls[0][0])).toContain('Unsupported config format');
    });
  });

  describe('getAll', () => {
    it('should not expose internal state through getAll', () => {
      const manager = new ConfigManager(join(configDir, 'missing.yaml'));
      manager.getAll().sweep.batchSizes.push(999);
      expect(manager.getAll().sweep.batchSizes).toEqual(DEFAULT_CONFIG.sweep.batchSizes);
    });
  });

  describe('Configuration Validation', () => {
    it('should accept the defaults', () => {
      expect(new ConfigManager(join(configDir, 'missing.yaml')).validate()).toEqual({ valid: true, errors: [] });
    });

    it('should list every problem', () => {
      const jsonPath = join(configDir, 'invalid.json');
      writeFileSync(
        jsonPath,
        JSON.stringify({
          target: { baseUrl: 'not a url' },
          sweep: { concurrencies: [], batchSizes: [4, -1], numRequests: 0 },
        })
      );

      const result = new ConfigManager(jsonPath).validate();

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        'Invalid base URL: not a url',
        'sweep.batchSizes must contain positive integers',
        'sweep.concurrencies must not be empty',
        'sweep.numRequests must be at least 1',
      ]);
    });
  });
});

describe('mergeConfig', () => {
  it('should return a copy of the defaults for non-object input', () => {
    const merged = mergeConfig(DEFAULT_CONFIG, null);
    expect(merged).toEqual(DEFAULT_CONFIG);
    expect(merged).not.toBe(DEFAULT_CONFIG);
    expect(mergeConfig(DEFAULT_CONFIG, ['a'])).toEqual(DEFAULT_CONFIG);
  });

  it('should ignore values of the wrong type', () => {
    const merged = mergeConfig(DEFAULT_CONFIG, {
      sweep: { numRequests: 'many', seed: '7', batchSizes: ['1'] },
      power: { enabled: 'yes' },
      logLevel: 'verbose',
    });

    expect(merged.sweep.numRequests).toBe(200);
    expect(merged.sweep.seed).toBe(7);
    expect(merged.sweep.batchSizes).toEqual(DEFAULT_CONFIG.sweep.batchSizes);
    expect(merged.power.enabled).toBe(true);
    expect(merged.logLevel).toBe('info');
  });
});

describe('applyEnvOverrides', () => {
  it('should apply EMBED_BENCH_* variables without mutating the input', () => {
    const base = mergeConfig(DEFAULT_CONFIG, {});
    const config = applyEnvOverrides(base, {
      EMBED_BENCH_BASE_URL: 'http://10.0.0.5:8080',
      EMBED_BENCH_MODEL: 'intfloat/e5-large-v2',
      EMBED_BENCH_HARDWARE: 'l4',
      EMBED_BENCH_RESULTS_ROOT: '/data/results',
      LOG_LEVEL: 'warn',
    });

    expect(config.target.baseUrl).toBe('http://10.0.0.5:8080');
    expect(config.target.model).toBe('intfloat/e5-large-v2');
    expect(config.output.hardware).toBe('l4');
    expect(config.output.resultsRoot).toBe('/data/results');
    expect(config.logLevel).toBe('warn');
    expect(base.target.baseUrl).toBe('http://localhost:8000');
  });

  it('should leave the config alone when nothing is set', () => {
    expect(applyEnvOverrides(DEFAULT_CONFIG, {})).toEqual(DEFAULT_CONFIG);
  });
});

describe('parseIntList', () => {
  it('should parse comma-separated integers', () => {
    expect(parseIntList('1,4, 16')).toEqual([1, 4, 16]);
    expect(parseIntList('64,')).toEqual([64]);
  });

  it('should reject empty and non-positive lists', () => {
    expect(() => parseIntList('')).toThrow(AppError);
    expect(() => parseIntList('1,0')).toThrow('Invalid positive integer "0" in "1,0"');
    expect(() => parseIntList('2,x')).toThrow(AppError);
    expect(() => parseIntList('1.5')).toThrow(AppError);
  });
});
