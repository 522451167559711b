import { sleep } from './retry.js';

/**
 * Minimum gap between request starts, shared by every caller holding the instance.
 *
 * One limiter is created per run and handed to the extractor, so the politeness
 * delay holds across all extraction workers rather than per document.
 */
export class RequestRateLimiter {
  private nextSlot = 0;

  constructor(
    private readonly minIntervalMs: number,
    private readonly now: () => number = Date.now,
    private readonly wait: (ms: number, signal?: AbortSignal) => Promise<void> = sleep
  ) {}

  /**
   * Resolve once the caller may start its request.
   * Slots are reserved synchronously, so concurrent callers queue up in call order.
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    const current = this.now();
    const slot = Math.max(current, this.nextSlot);
    this.nextSlot = slot + this.minIntervalMs;
    const delay = slot - current;
    if (delay > 0) {
      await this.wait(delay, signal);
    }
  }
}
