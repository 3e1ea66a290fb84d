import { Clock, systemClock } from './clock.js';

/**
 * Fixed-interval throttle: successive starts are at least 60000 / ratePerMinute ms apart,
 * so any 60 second window holds at most ratePerMinute starts.
 * Meant for a single caller awaiting acquire() in a loop.
 */
export class IntervalThrottle {
  readonly intervalMs: number;
  private nextStartAt: number | null = null;

  constructor(
    ratePerMinute: number,
    private readonly clock: Clock = systemClock
  ) {
    if (!Number.isFinite(ratePerMinute) || ratePerMinute <= 0) {
      throw new RangeError(`Rate limit must be a positive number, got ${ratePerMinute}`);
    }
    this.intervalMs = 60000 / ratePerMinute;
  }

  /**
   * Wait for the next start slot and claim it
   */
  async acquire(): Promise<void> {
    let now = this.clock.now();
    while (this.nextStartAt !== null && now < this.nextStartAt) {
      await this.clock.sleep(this.nextStartAt - now);
      now = this.clock.now();
    }
    this.nextStartAt = now + this.intervalMs;
  }
}
