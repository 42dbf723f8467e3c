import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("../src/core/logging.js", () => ({
  logDebug: vi.fn(),
}));

import { RateLimiter } from "../src/core/rate-limiter.js";

describe("RateLimiter", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("does not wait on the first call", async () => {
    const limiter = new RateLimiter(600);
    const start = Date.now();

    await limiter.waitIfNeeded();

    expect(Date.now() - start).toBe(0);
  });

  it("holds a back-to-back call until the interval has passed", async () => {
    const limiter = new RateLimiter(600);
    await limiter.waitIfNeeded();
    const firstAt = Date.now();

    let released = false;
    const second = limiter.waitIfNeeded().then(() => {
      released = true;
    });

    await vi.advanceTimersByTimeAsync(599);
    expect(released).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await second;
    expect(released).toBe(true);
    expect(Date.now() - firstAt).toBe(600);
  });

  it("waits only for the remainder of the interval", async () => {
    const limiter = new RateLimiter(600);
    await limiter.waitIfNeeded();

    await vi.advanceTimersByTimeAsync(450);
    const before = Date.now();

    const next = limiter.waitIfNeeded();
    await vi.advanceTimersByTimeAsync(150);
    await next;

    expect(Date.now() - before).toBe(150);
  });

  it("does not wait when the interval has already elapsed", async () => {
    const limiter = new RateLimiter(600);
    await limiter.waitIfNeeded();

    await vi.advanceTimersByTimeAsync(1000);
    const before = Date.now();
    await limiter.waitIfNeeded();

    expect(Date.now() - before).toBe(0);
  });

  it("serializes queued calls one interval apart", async () => {
    const limiter = new RateLimiter(500);
    const releasedAt: number[] = [];
    const start = Date.now();

    const calls = [0, 1, 2].map(() =>
      limiter.waitIfNeeded().then(() => {
        releasedAt.push(Date.now() - start);
      }),
    );
    await vi.advanceTimersByTimeAsync(1000);
    await Promise.all(calls);

    expect(releasedAt).toEqual([0, 500, 1000]);
  });
});
