/**
 * Periodic Task - runs an async job on a fixed cadence until stopped
 *
 * Runs are chained with timers rather than overlapping: the next run is
 * scheduled only after the previous one settles. stop() sets the stop
 * signal, clears any pending timer and resolves once an in-flight run has
 * finished.
 */

export interface PeriodicTaskOptions {
  /** Delay between the end of one run and the start of the next */
  intervalMs: number;
  /** Delay after a failed run (default: intervalMs) */
  retryDelayMs?: number;
  /** Run once immediately on start (default: true) */
  runImmediately?: boolean;
  /** Receives errors thrown by the job */
  onError?: (error: unknown) => void;
}

export type PeriodicJob = () => Promise<void>;

/**
 * Cadence a stopped task can be restarted with
 */
export type PeriodicSchedule = Partial<Pick<PeriodicTaskOptions, 'intervalMs' | 'retryDelayMs'>>;

function requirePositive(name: string, value: number): number {
  if (!(value > 0) || !Number.isFinite(value)) {
    throw new RangeError(`${name} must be positive, got ${value}`);
  }
  return value;
}

function requireNonNegative(name: string, value: number): number {
  if (!(value >= 0) || !Number.isFinite(value)) {
    throw new RangeError(`${name} must be non-negative, got ${value}`);
  }
  return value;
}

export class PeriodicTask {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<void> | null = null;
  private stopRequested = true;
  private interval: number;
  private retryDelay: number;

  constructor(
    private readonly job: PeriodicJob,
    private readonly options: PeriodicTaskOptions
  ) {
    this.interval = requirePositive('intervalMs', options.intervalMs);
    this.retryDelay = requireNonNegative('retryDelayMs', options.retryDelayMs ?? options.intervalMs);
  }

  get running(): boolean {
    return !this.stopRequested;
  }

  get intervalMs(): number {
    return this.interval;
  }

  get retryDelayMs(): number {
    return this.retryDelay;
  }

  /**
   * Start the task, optionally with a new cadence. Starting a running task
   * has no effect.
   */
  start(schedule: PeriodicSchedule = {}): void {
    if (this.running) {
      return;
    }
    if (schedule.intervalMs !== undefined) {
      this.interval = requirePositive('intervalMs', schedule.intervalMs);
      this.retryDelay = schedule.intervalMs;
    }
    if (schedule.retryDelayMs !== undefined) {
      this.retryDelay = requireNonNegative('retryDelayMs', schedule.retryDelayMs);
    }
    this.stopRequested = false;

    // A run still settling from before stop() picks the schedule back up
    if (this.inFlight) {
      return;
    }
    if (this.options.runImmediately === false) {
      this.schedule(this.interval);
    } else {
      this.schedule(0);
    }
  }

  /**
   * Signal the task to stop and wait for any in-flight run to settle
   */
  async stop(): Promise<void> {
    this.stopRequested = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.runOnce().finally(() => {
        this.inFlight = null;
      });
    }, delayMs);
  }

  private async runOnce(): Promise<void> {
    if (this.stopRequested) {
      return;
    }

    let failed = false;
    try {
      await this.job();
    } catch (error) {
      failed = true;
      if (this.options.onError) {
        this.options.onError(error);
      } else {
        console.error('[PeriodicTask] Run failed:', error);
      }
    }

    if (!this.stopRequested) {
      this.schedule(failed ? this.retryDelay : this.interval);
    }
  }
}
