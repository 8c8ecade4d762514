import { performance } from 'node:perf_hooks';
import { ConfigurationError, toError } from '../errors/index.js';
import { createNoopLogger, type Logger } from '../observability/logging.js';

/**
 * Flush work; resolves to the number of samples it processed.
 */
export type FlushCallback = () => number | Promise<number>;

export type FlusherState = 'idle' | 'flushing' | 'stopped';

export interface FlusherOptions {
  logger?: Logger;
  /** Monotonic clock in milliseconds (default: performance.now) */
  now?: () => number;
  /** Duration above which a flush is reported as an overrun (default: the interval) */
  overrunThresholdMs?: number;
}

export interface FlusherStats {
  state: FlusherState;
  flushes: number;
  skippedTicks: number;
  lastFlushDurationMs: number | null;
  lastSampleCount: number | null;
}

/**
 * Runs a flush callback on a fixed interval, never two at once.
 *
 * A tick that arrives while the previous flush is still running is skipped,
 * not queued; whatever it would have drained stays buffered for the next one.
 */
export class PeriodicFlusher {
  private readonly intervalMs: number;
  private readonly callback: FlushCallback;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly overrunThresholdMs: number;

  private state: FlusherState = 'idle';
  private timer: NodeJS.Timeout | undefined;
  private inFlight: Promise<void> | undefined;
  private stopping: Promise<void> | undefined;
  private started = false;

  private flushes = 0;
  private skippedTicks = 0;
  private lastFlushDurationMs: number | null = null;
  private lastSampleCount: number | null = null;

  /**
   * @throws ConfigurationError if the interval is not a positive finite number
   */
  constructor(intervalMs: number, callback: FlushCallback, options: FlusherOptions = {}) {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new ConfigurationError(`Flush interval must be positive, got ${intervalMs}`, {
        option: 'flushIntervalMs',
      });
    }

    this.intervalMs = intervalMs;
    this.callback = callback;
    this.logger = options.logger ?? createNoopLogger();
    this.now = options.now ?? (() => performance.now());
    this.overrunThresholdMs = options.overrunThresholdMs ?? intervalMs;
  }

  /**
   * Starts the timer. Calling it again while running does nothing.
   * @throws Error if the flusher has been stopped
   */
  start(): void {
    if (this.stopping) {
      throw new Error('Flusher has been stopped');
    }
    if (this.timer) {
      return;
    }

    this.started = true;
    this.timer = setInterval(() => this.tick(), this.intervalMs);
  }

  /**
   * Stops the timer, waits for an in-flight flush, and runs one last flush
   * so nothing buffered before the call is left behind. Returns the same
   * promise on every call.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  /**
   * Timer entry point; exposed for deterministic driving in tests.
   */
  tick(): void {
    if (this.stopping || this.state === 'stopped') {
      return;
    }
    if (this.state === 'flushing') {
      this.skippedTicks++;
      this.logger.debug('Skipping flush tick, previous flush still running', {
        skippedTicks: this.skippedTicks,
      });
      return;
    }

    this.inFlight = this.runFlush();
  }

  getState(): FlusherState {
    return this.state;
  }

  stats(): FlusherStats {
    return {
      state: this.state,
      flushes: this.flushes,
      skippedTicks: this.skippedTicks,
      lastFlushDurationMs: this.lastFlushDurationMs,
      lastSampleCount: this.lastSampleCount,
    };
  }

  private async shutdown(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }

    if (this.inFlight) {
      await this.inFlight;
    }
    if (this.started) {
      await this.runFlush();
    }

    this.state = 'stopped';
  }

  private async runFlush(): Promise<void> {
    this.state = 'flushing';
    const startedAt = this.now();

    try {
      const sampleCount = await this.callback();
      const durationMs = this.now() - startedAt;

      this.lastFlushDurationMs = durationMs;
      this.lastSampleCount = sampleCount;

      if (durationMs > this.overrunThresholdMs) {
        this.logger.warn('Flush took longer than the flush interval', {
          flushDurationMs: durationMs,
          sampleCount,
          intervalMs: this.intervalMs,
        });
      }
    } catch (error) {
      this.logger.error('Flush failed', toError(error));
    } finally {
      this.flushes++;
      this.state = 'idle';
      this.inFlight = undefined;
    }
  }
}
