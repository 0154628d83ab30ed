import { beforeAll, afterAll } from 'vitest';
import { existsSync, rmSync, mkdirSync } from 'fs';
import { join } from 'path';

// Scratch space for result trees and config files written by tests
const TEST_DIR = join(process.cwd(), '.test-tmp');
process.env.NODE_ENV = 'test';
delete process.env.EMBED_BENCH_RESULTS_ROOT;

beforeAll(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterAll(() => {
  if (!process.env.VITEST_CLEANUP || !existsSync(TEST_DIR)) {
    return;
  }
  try {
    rmSync(TEST_DIR, { recursive: true, force: true });
  } catch (error) {
    // Parallel workers may race on the same directory
    console.warn('Could not remove test scratch directory:', error);
  }
});
