import { describe, expect, it } from "vitest";
import { createCaptureLogger } from "../../__tests__/support/captureLogger";
import { FakeTime } from "../../__tests__/support/fakeTime";
import {
  SlidingWindowRateLimiter,
  type RateLimitMode,
} from "./slidingWindowRateLimiter";

const createLimiter = (
  maxCalls: number,
  periodMs: number,
  onLimit: RateLimitMode,
) => {
  const time = new FakeTime();
  const { log, records } = createCaptureLogger();
  const limiter = new SlidingWindowRateLimiter(
    "test",
    { maxCalls, periodMs, onLimit },
    time,
    time,
    log,
  );
  return { limiter, time, records };
};

describe("SlidingWindowRateLimiter", () => {
  it("admits maxCalls calls without waiting", async () => {
    const { limiter, time } = createLimiter(3, 1_000, "wait");

    for (let i = 0; i < 3; i += 1) {
      const admission = await limiter.admit();
      expect(admission.isOk()).toBe(true);
    }

    expect(time.sleeps).toEqual([]);
    expect(limiter.snapshot().inWindow).toBe(3);
  });

  it("makes the next call wait until the oldest admission leaves the window", async () => {
    const { limiter, time, records } = createLimiter(3, 1_000, "wait");

    await limiter.admit();
    time.advance(200);
    await limiter.admit();
    await limiter.admit();

    const admission = await limiter.admit();

    expect(admission.isOk()).toBe(true);
    expect(time.sleeps).toEqual([800]);
    expect(time.elapsedMs).toBe(1_000);
    expect(records.at(-1)).toMatchObject({
      msg: "Rate limit reached; waiting for a free slot",
      waitMs: 800,
    });
  });

  it("waits a full period when every admission happened at the same instant", async () => {
    const { limiter, time } = createLimiter(2, 5_000, "wait");

    await limiter.admit();
    await limiter.admit();
    await limiter.admit();

    expect(time.sleeps).toEqual([5_000]);
  });

  it("rejects immediately with the time until a slot frees", async () => {
    const { limiter, time } = createLimiter(2, 1_000, "reject");

    await limiter.admit();
    time.advance(300);
    await limiter.admit();
    const admission = await limiter.admit();

    expect(admission.isErr()).toBe(true);
    if (admission.isOk()) {
      throw new Error("expected rejection");
    }
    expect(admission.error.code).toBe("rate_limited");
    expect(admission.error.retryAfterMs).toBe(700);
    expect(time.sleeps).toEqual([]);
    expect(limiter.snapshot().inWindow).toBe(2);
  });

  it("frees slots once admissions are a full period old", async () => {
    const { limiter, time } = createLimiter(1, 1_000, "reject");

    await limiter.admit();
    time.advance(1_000);
    const admission = await limiter.admit();

    expect(admission.isOk()).toBe(true);
  });

  it("never exceeds maxCalls per window under concurrent callers", async () => {
    const { limiter, time } = createLimiter(3, 1_000, "wait");

    const admissions = await Promise.all(
      Array.from({ length: 10 }, () => limiter.admit()),
    );

    expect(admissions.every((admission) => admission.isOk())).toBe(true);
    // Three full windows at t=0, 1000 and 2000, then the tenth call at 3000.
    expect(time.sleeps).toEqual([1_000, 1_000, 1_000]);
    expect(time.elapsedMs).toBe(3_000);
    expect(limiter.snapshot().inWindow).toBe(1);
  });

  it("rejects invalid policies", () => {
    const time = new FakeTime();
    expect(
      () =>
        new SlidingWindowRateLimiter(
          "bad",
          { maxCalls: 0, periodMs: 1_000, onLimit: "wait" },
          time,
          time,
        ),
    ).toThrow(RangeError);
    expect(
      () =>
        new SlidingWindowRateLimiter(
          "bad",
          { maxCalls: 1, periodMs: 0, onLimit: "wait" },
          time,
          time,
        ),
    ).toThrow(RangeError);
  });
});
