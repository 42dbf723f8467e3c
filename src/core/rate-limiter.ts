import { logDebug } from "./logging.js";

/**
 * Minimum-interval throttle shared by every request a client makes.
 * Calls are serialized through a promise chain: each waits for the previous
 * one, then for whatever is left of the interval since the last request.
 * The first call never waits.
 */
export class RateLimiter {
  private chain: Promise<void> = Promise.resolve();
  private lastRequestTime: number | null = null;
  private readonly intervalMs: number;

  constructor(intervalMs: number) {
    this.intervalMs = intervalMs;
  }

  waitIfNeeded(): Promise<void> {
    this.chain = this.chain.then(async () => {
      if (this.lastRequestTime !== null) {
        const elapsed = Date.now() - this.lastRequestTime;
        if (elapsed < this.intervalMs) {
          const waitTime = this.intervalMs - elapsed;
          logDebug(`Rate limiting: waiting ${waitTime}ms`);
          await new Promise<void>((r) => setTimeout(r, waitTime));
        }
      }
      this.lastRequestTime = Date.now();
    });
    return this.chain;
  }
}
