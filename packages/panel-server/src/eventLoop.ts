import { withPrefix, type Logger } from './logger';

export interface TickTarget {
  tick(now: number): unknown;
}

export interface PanelEventLoopOptions {
  target: TickTarget;
  tickMs: number;
  logger?: Logger;
  /** Monotonic clock in milliseconds. */
  now?: () => number;
}

/**
 * Fixed-interval frame driver. Every tick hands the current monotonic time to the target.
 */
export class PanelEventLoop {
  private readonly target: TickTarget;
  private readonly tickMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private ticks = 0;

  constructor(options: PanelEventLoopOptions) {
    this.target = options.target;
    this.tickMs = options.tickMs;
    this.logger = withPrefix('event-loop', options.logger);
    this.now = options.now ?? (() => performance.now());
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  get tickCount(): number {
    return this.ticks;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.logger.info(`started (${this.tickMs} ms)`);
    this.timer = setInterval(() => {
      this.runOnce();
    }, this.tickMs);
  }

  stop(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = null;
    this.logger.info(`stopped after ${this.ticks} ticks`);
  }

  runOnce(): void {
    this.ticks += 1;
    try {
      this.target.tick(this.now());
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`tick ${this.ticks} failed: ${message}`);
    }
  }
}
