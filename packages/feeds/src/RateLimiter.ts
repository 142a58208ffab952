import type { Clock } from './clock.ts';
import { systemClock } from './clock.ts';

/**
 * Spaces out attempts so no more than `rate` happen per second
 */
export class RateLimiter {
  readonly intervalMs: number;
  private nextAt: number | null = null;

  constructor(
    readonly rate: number,
    private readonly clock: Clock = systemClock
  ) {
    if (!(rate > 0)) {
      throw new Error(`Rate must be positive, got ${rate}`);
    }
    this.intervalMs = 1000 / rate;
  }

  /**
   * Resolve when the next attempt is allowed; the first one passes immediately
   */
  async wait(signal?: AbortSignal): Promise<void> {
    const now = this.clock.now();
    if (this.nextAt === null || now >= this.nextAt) {
      this.nextAt = now + this.intervalMs;
      return;
    }
    const delay = this.nextAt - now;
    this.nextAt += this.intervalMs;
    await this.clock.sleep(delay, signal);
  }
}
