import { errorMessage, silentLogger } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';

/** Largest delay Node timers honor; longer ones fire after 1ms */
export const MAX_INTERVAL_MS = 2 ** 31 - 1;

export interface IntervalTaskOptions {
  name: string;
  intervalMs: number;
  run: () => void | Promise<void>;
  logger?: Logger;
}

/**
 * Fixed-interval background loop owned by the session manager.
 *
 * Ticks never overlap: if a run is still in flight when the timer fires,
 * that tick is skipped. A failing run is logged and the loop carries on.
 */
export class IntervalTask {
  readonly name: string;
  readonly intervalMs: number;
  private readonly runFn: () => void | Promise<void>;
  private readonly logger: Logger;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;
  private _lastRun: Date | null = null;

  constructor(options: IntervalTaskOptions) {
    if (!Number.isFinite(options.intervalMs) || options.intervalMs <= 0) {
      throw new RangeError(`Interval for ${options.name} must be positive, got ${options.intervalMs}`);
    }
    if (options.intervalMs > MAX_INTERVAL_MS) {
      throw new RangeError(
        `Interval for ${options.name} must be at most ${MAX_INTERVAL_MS}ms, got ${options.intervalMs}`
      );
    }

    this.name = options.name;
    this.intervalMs = options.intervalMs;
    this.runFn = options.run;
    this.logger = options.logger ?? silentLogger;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  get lastRun(): Date | null {
    return this._lastRun;
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      void this.tick();
    }, this.intervalMs);

    // Ensure timer doesn't prevent process exit
    this.timer.unref?.();
    this.logger.debug(`Started ${this.name} task (every ${this.intervalMs}ms)`);
  }

  /**
   * Run once now, outside the schedule. Joins a run already in flight
   * instead of starting a second one.
   */
  async tick(): Promise<void> {
    if (this.inFlight) {
      return this.inFlight;
    }

    this.inFlight = this.execute();
    try {
      await this.inFlight;
    } finally {
      this.inFlight = null;
    }
  }

  /**
   * Cancel the schedule and wait for a run in flight to finish.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.debug(`Stopped ${this.name} task`);
    }

    if (this.inFlight) {
      await this.inFlight;
    }
  }

  private async execute(): Promise<void> {
    try {
      await this.runFn();
    } catch (error) {
      this.logger.error(`Error in ${this.name} task: ${errorMessage(error)}`);
    } finally {
      this._lastRun = new Date();
    }
  }
}
