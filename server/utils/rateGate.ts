import { sleep } from './async';
import { Semaphore } from './concurrency';

/**
 * Sliding one-minute window shared by every caller of one API key. `reserve` waits until a
 * request slot is free; it never retries anything itself.
 */
export class RequestRateGate {
  private readonly requestTimestamps: number[] = [];
  private readonly mutex = new Semaphore(1);
  private readonly requestsPerMinute: number;

  constructor(
    requestsPerMinute: number,
    private readonly windowMs = 60_000,
  ) {
    // Hard cap: never exceed 10 RPM regardless of config
    this.requestsPerMinute = Math.max(1, Math.min(10, Math.floor(requestsPerMinute)));
  }

  async reserve(signal?: AbortSignal): Promise<void> {
    // Check+reserve stays atomic under concurrent callers.
    while (true) {
      const release = await this.mutex.acquire(signal);
      let waitMs = 0;
      try {
        const now = Date.now();
        while (this.requestTimestamps.length > 0 && now - this.requestTimestamps[0] >= this.windowMs) {
          this.requestTimestamps.shift();
        }
        if (this.requestTimestamps.length < this.requestsPerMinute) {
          this.requestTimestamps.push(now);
        } else {
          waitMs = Math.max(0, this.requestTimestamps[0] + this.windowMs - now);
        }
      } finally {
        release();
      }

      if (waitMs <= 0) {
        return;
      }
      await sleep(waitMs, signal);
    }
  }
}
