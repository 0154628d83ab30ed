/**
 * Background power polling for the duration of one measurement window.
 *
 * The loop runs beside the dispatcher and only appends to its own sample list.
 * A read only sums readings the power source already holds; ticks fall on
 * fixed deadlines from the start of the window, so a slow read does not
 * stretch the period.
 */

import { monotonicClock } from './dispatcher.js';
import type { Clock } from './dispatcher.js';
import { errorMessage, logger } from './logger.js';
import type { PowerMonitor } from './power-source.js';

export interface PowerSamplerOptions {
  intervalMs?: number;
  /** Longest stop() waits for an in-flight read before abandoning the loop */
  stopTimeoutMs?: number;
  clock?: Clock;
}

export class PowerSampler {
  private intervalMs: number;
  private stopTimeoutMs: number;
  private clock: Clock;
  private collected: number[] = [];
  private running = false;
  private generation = 0;
  private loop: Promise<void> | null = null;
  private wakeTimer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;

  constructor(private monitor: PowerMonitor, options: PowerSamplerOptions = {}) {
    this.intervalMs = options.intervalMs ?? 100;
    this.stopTimeoutMs = options.stopTimeoutMs ?? 2000;
    this.clock = options.clock ?? monotonicClock;
  }

  get enabled(): boolean {
    return this.monitor.available;
  }

  start(): void {
    if (!this.enabled || this.running) return;

    this.collected = [];
    this.running = true;
    this.generation++;
    this.loop = this.run(this.generation);
  }

  /**
   * Stop polling and return the mean power over the window, or null when nothing was sampled
   */
  async stop(): Promise<number | null> {
    if (!this.running) {
      return null;
    }

    this.running = false;
    this.interruptSleep();

    const loop = this.loop;
    this.loop = null;
    if (loop) {
      const finished = await waitAtMost(loop, this.stopTimeoutMs);
      if (!finished) {
        logger.warn('Power sampler did not stop in time, abandoning it', { timeoutMs: this.stopTimeoutMs }, 'PowerSampler');
      }
    }

    return mean(this.collected);
  }

  /** Copy of the samples taken in the current or last window */
  samples(): number[] {
    return [...this.collected];
  }

  private isCurrent(generation: number): boolean {
    return this.running && this.generation === generation;
  }

  private async run(generation: number): Promise<void> {
    const collected = this.collected;
    const startedAt = this.clock();
    let tick = 0;

    while (this.isCurrent(generation)) {
      let watts: number | null = null;
      try {
        watts = await this.monitor.readTotalWatts();
      } catch (error) {
        logger.debug('Power read failed', { error: errorMessage(error) }, 'PowerSampler');
      }

      // A read that lands after stop() belongs to no window
      if (!this.isCurrent(generation)) break;
      if (watts !== null) collected.push(watts);

      // Next deadline after now; deadlines missed by a slow read are dropped
      const now = this.clock();
      tick = Math.max(tick + 1, Math.floor((now - startedAt) / this.intervalMs) + 1);
      await this.sleep(startedAt + tick * this.intervalMs - now);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      this.wake = resolve;
      this.wakeTimer = setTimeout(() => {
        this.wakeTimer = null;
        this.wake = null;
        resolve();
      }, Math.max(0, ms));
    });
  }

  private interruptSleep(): void {
    if (this.wakeTimer) {
      clearTimeout(this.wakeTimer);
      this.wakeTimer = null;
    }
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

async function waitAtMost(task: Promise<void>, timeoutMs: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<boolean>(resolve => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });

  try {
    return await Promise.race([task.then(() => true), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
