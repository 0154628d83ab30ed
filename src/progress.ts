/**
 * One-line progress bar for request completion within a sweep point
 */

export interface ProgressOptions {
  total: number;
  label?: string;
  /** Minimum gap between redraws */
  updateIntervalMs?: number;
  write?: (chunk: string) => void;
}

export interface ProgressStats {
  current: number;
  total: number;
  percent: number;
  elapsed: number;
  rate: number;
  isComplete: boolean;
}

export class ProgressTracker {
  private current = 0;
  private total: number;
  private label: string;
  private startTime = Date.now();
  private lastUpdate = 0;
  private updateIntervalMs: number;
  private write: (chunk: string) => void;

  constructor(options: ProgressOptions) {
    this.total = Math.max(0, options.total);
    this.label = options.label || 'Progress';
    this.updateIntervalMs = options.updateIntervalMs ?? 250;
    this.write = options.write ?? (chunk => process.stdout.write(chunk));
  }

  /**
   * Set progress to specific value
   */
  set(value: number): void {
    this.current = Math.min(Math.max(value, 0), this.total);
    this.updateDisplay();
  }

  complete(): void {
    this.current = this.total;
    this.lastUpdate = 0;
    this.updateDisplay();
    this.write('\n');
  }

  getStats(): ProgressStats {
    const elapsed = (Date.now() - this.startTime) / 1000;
    const rate = elapsed > 0 ? this.current / elapsed : 0;

    return {
      current: this.current,
      total: this.total,
      percent: this.total > 0 ? (this.current / this.total) * 100 : 100,
      elapsed: Math.round(elapsed),
      rate: Math.round(rate * 10) / 10,
      isComplete: this.current >= this.total
    };
  }

  render(width: number = 20): string {
    const stats = this.getStats();
    const filled = this.total > 0 ? Math.round((this.current / this.total) * width) : width;
    const bar = '[' + '█'.repeat(filled) + '░'.repeat(width - filled) + ']';
    return `${this.label}: ${bar} ${this.current}/${this.total} ${Math.round(stats.percent)}% ${stats.rate} req/s`;
  }

  private updateDisplay(): void {
    const now = Date.now();
    if (now - this.lastUpdate < this.updateIntervalMs && this.current < this.total) {
      return;
    }
    this.lastUpdate = now;
    this.write('\r' + this.render());
  }
}
