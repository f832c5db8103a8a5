/**
 * FixedRateTicker - drift-corrected periodic callback.
 *
 * Tick n is scheduled at start + n × period, measured on the injected clock,
 * so timer lateness does not accumulate over a long recording. Ticks that fall
 * more than one period behind are dropped rather than fired in a burst.
 *
 * stop() takes effect immediately: the pending timeout is cleared and the run
 * token changes, so no tick body runs after stop() returns.
 */

const TIMER_EPSILON_MS = 1e-6;

export interface FixedRateTickerOptions {
  rateHz: number;
  /** Monotonic clock in ms (default performance.now) */
  now?: () => number;
}

export type TickHandler = (tick: number) => void;

export class FixedRateTicker {
  readonly periodMs: number;
  private readonly now: () => number;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private runToken = 0;
  private startTime = 0;
  private nextTick = 1;
  private skipped = 0;

  constructor(options: FixedRateTickerOptions) {
    if (!Number.isFinite(options.rateHz) || options.rateHz <= 0) {
      throw new RangeError(`Tick rate must be positive, got ${options.rateHz}`);
    }
    this.periodMs = 1000 / options.rateHz;
    this.now = options.now ?? (() => performance.now());
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /** Ticks dropped because the loop fell behind */
  get skippedTicks(): number {
    return this.skipped;
  }

  start(onTick: TickHandler): void {
    this.stop();
    const token = ++this.runToken;
    this.startTime = this.now();
    this.nextTick = 1;
    this.skipped = 0;
    this.schedule(token, onTick);
  }

  stop(): void {
    this.runToken++;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private schedule(token: number, onTick: TickHandler): void {
    const due = this.startTime + this.nextTick * this.periodMs;
    // Epsilon absorbs float error in n × period (e.g. 60 × 16.666… > 1000)
    const delay = Math.max(0, Math.ceil(due - this.now() - TIMER_EPSILON_MS));
    this.timer = setTimeout(() => this.fire(token, onTick), delay);
  }

  private fire(token: number, onTick: TickHandler): void {
    if (token !== this.runToken) return;

    // Catch up without bursting: jump to the latest tick already due
    let tick = this.nextTick;
    const due = Math.floor((this.now() - this.startTime) / this.periodMs);
    if (due > tick) {
      this.skipped += due - tick;
      tick = due;
    }
    this.nextTick = tick + 1;

    onTick(tick);

    // onTick may have called stop()
    if (token === this.runToken) {
      this.schedule(token, onTick);
    }
  }
}
