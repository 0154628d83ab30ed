/**
 * Device power readings and the process-wide lifecycle around them.
 */

import { execFile, spawn } from 'child_process';
import { createInterface } from 'readline';
import { promisify } from 'util';
import { errorMessage, logger } from './logger.js';

const execFileAsync = promisify(execFile);

/**
 * A device-management interface that can report instantaneous power draw
 */
export interface PowerSource {
  initialize(): Promise<void>;
  deviceCount(): Promise<number>;
  /** Instantaneous draw of one device in watts */
  readDevicePower(index: number): Promise<number>;
  shutdown(): Promise<void>;
}

export type CommandRunner = (command: string, args: string[]) => Promise<string>;

const runCommand: CommandRunner = async (command, args) => {
  const { stdout } = await execFileAsync(command, args, { timeout: 5000 });
  return stdout;
};

/** Line-oriented output of a long-running child process */
export interface LineStream {
  onLine(listener: (line: string) => void): void;
  onExit(listener: (reason: string) => void): void;
  stop(): void;
}

export type StreamLauncher = (command: string, args: string[]) => LineStream;

const launchStream: StreamLauncher = (command, args) => {
  const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'ignore'] });
  const lines = createInterface({ input: child.stdout });

  return {
    onLine: listener => {
      lines.on('line', listener);
    },
    onExit: listener => {
      child.once('error', error => listener(error.message));
      child.once('exit', (code, signal) => listener(signal ? `killed by ${signal}` : `exited with code ${code}`));
    },
    stop: () => {
      lines.close();
      if (child.exitCode === null) child.kill();
    },
  };
};

export interface DeviceReading {
  index: number;
  /** null when the driver reports the value as unavailable */
  watts: number | null;
}

/**
 * Parses one `index, power.draw` line; null for anything that is not a reading
 */
export function parseReadingLine(line: string): DeviceReading | null {
  const [indexField, wattsField] = line.split(',').map(field => field.trim());
  if (!indexField || wattsField === undefined || !/^\d+$/.test(indexField)) {
    return null;
  }
  const watts = Number.parseFloat(wattsField);
  return { index: Number.parseInt(indexField, 10), watts: Number.isFinite(watts) ? watts : null };
}

export interface NvidiaSmiOptions {
  command?: string;
  /** Reporting period of the streaming query */
  intervalMs?: number;
  /** How long initialize() waits for the stream's first reading */
  firstReadingTimeoutMs?: number;
  run?: CommandRunner;
  launch?: StreamLauncher;
}

/**
 * Reads GPU power through the nvidia-smi binary.
 *
 * One `nvidia-smi -lms` process is started by initialize() and keeps
 * reporting every device until shutdown(). Reads return the latest line
 * seen for a device, so no process is started while a window is measured.
 */
export class NvidiaSmiPowerSource implements PowerSource {
  private command: string;
  private intervalMs: number;
  private firstReadingTimeoutMs: number;
  private run: CommandRunner;
  private launch: StreamLauncher;
  private stream: LineStream | null = null;
  private latest = new Map<number, number>();
  private settleFirstReading: ((error?: Error) => void) | null = null;

  constructor(options: NvidiaSmiOptions = {}) {
    this.command = options.command ?? 'nvidia-smi';
    this.intervalMs = options.intervalMs ?? 100;
    this.firstReadingTimeoutMs = options.firstReadingTimeoutMs ?? 2000;
    this.run = options.run ?? runCommand;
    this.launch = options.launch ?? launchStream;
  }

  async initialize(): Promise<void> {
    // Fails when the binary or the driver is missing
    await this.run(this.command, ['--query-gpu=name', '--format=csv,noheader']);
    if (this.stream) return;

    const firstReading = new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.settleFirstReading = null;
        logger.debug('No power reading yet, continuing', { waitedMs: this.firstReadingTimeoutMs }, 'NvidiaSmi');
        resolve();
      }, this.firstReadingTimeoutMs);

      this.settleFirstReading = error => {
        clearTimeout(timer);
        this.settleFirstReading = null;
        if (error) reject(error);
        else resolve();
      };
    });

    const stream = this.launch(this.command, [
      '--query-gpu=index,power.draw',
      '--format=csv,noheader,nounits',
      '-lms',
      String(this.intervalMs),
    ]);
    this.stream = stream;
    stream.onLine(line => this.record(line));
    stream.onExit(reason => this.handleExit(stream, reason));

    await firstReading;
  }

  async deviceCount(): Promise<number> {
    const output = await this.run(this.command, ['--query-gpu=count', '--format=csv,noheader']);
    const count = Number.parseInt(output.trim().split(/\r?\n/)[0] ?? '', 10);
    return Number.isInteger(count) && count > 0 ? count : 0;
  }

  async readDevicePower(index: number): Promise<number> {
    if (!this.stream) {
      throw new Error('nvidia-smi power stream is not running');
    }
    const watts = this.latest.get(index);
    if (watts === undefined) {
      throw new Error(`No power reading for device ${index}`);
    }
    return watts;
  }

  async shutdown(): Promise<void> {
    const stream = this.stream;
    this.stream = null;
    this.latest.clear();
    stream?.stop();
  }

  private record(line: string): void {
    const reading = parseReadingLine(line);
    if (!reading) return;

    if (reading.watts === null) {
      this.latest.delete(reading.index);
    } else {
      this.latest.set(reading.index, reading.watts);
    }
    this.settleFirstReading?.();
  }

  private handleExit(stream: LineStream, reason: string): void {
    // Exits after shutdown() are expected
    if (this.stream !== stream) return;

    this.stream = null;
    this.latest.clear();
    if (this.settleFirstReading) {
      this.settleFirstReading(new Error(`nvidia-smi stopped before reporting power: ${reason}`));
      return;
    }
    logger.warn('nvidia-smi power stream ended, power readings stop here', { reason }, 'NvidiaSmi');
  }
}

/**
 * Owns an initialised PowerSource for the lifetime of the process.
 * Open once at startup and close once at exit.
 */
export class PowerMonitor {
  private closed = false;

  private constructor(
    private source: PowerSource | null,
    readonly deviceCount: number
  ) {}

  static async open(source: PowerSource): Promise<PowerMonitor> {
    try {
      await source.initialize();
    } catch (error) {
      logger.info('Power metrics unavailable, continuing without them', { reason: errorMessage(error) }, 'PowerMonitor');
      return PowerMonitor.unavailable();
    }

    try {
      const count = await source.deviceCount();
      if (count < 1) {
        logger.info('No power-reporting devices found', undefined, 'PowerMonitor');
        await source.shutdown();
        return PowerMonitor.unavailable();
      }
      logger.debug('Power monitor ready', { devices: count }, 'PowerMonitor');
      return new PowerMonitor(source, count);
    } catch (error) {
      logger.info('Power device enumeration failed, continuing without power metrics', { reason: errorMessage(error) }, 'PowerMonitor');
      await source.shutdown();
      return PowerMonitor.unavailable();
    }
  }

  static unavailable(): PowerMonitor {
    return new PowerMonitor(null, 0);
  }

  get available(): boolean {
    return this.source !== null && !this.closed;
  }

  /**
   * Sum of all devices that answered; null when none did
   */
  async readTotalWatts(): Promise<number | null> {
    const source = this.source;
    if (!source || this.closed) return null;

    const readings = await Promise.allSettled(
      Array.from({ length: this.deviceCount }, (_, index) => source.readDevicePower(index))
    );

    let total = 0;
    let answered = 0;
    readings.forEach((reading, index) => {
      if (reading.status === 'fulfilled') {
        total += reading.value;
        answered++;
      } else {
        logger.debug('Skipping device power read', { device: index, error: errorMessage(reading.reason) }, 'PowerMonitor');
      }
    });

    return answered > 0 ? total : null;
  }

  async close(): Promise<void> {
    if (!this.source || this.closed) return;
    this.closed = true;
    await this.source.shutdown();
  }
}
