import { err, ok, type Result } from "neverthrow";
import type { ClockPort, SleepPort } from "../../core/ports/outboundPorts";
import { logger as rootLogger, type Logger } from "../../shared/logger/logger";
import { SystemClock, SystemSleep } from "../system/systemPorts";
import { AsyncMutex } from "./asyncMutex";

export const rateLimitModes = ["wait", "reject"] as const;

export type RateLimitMode = (typeof rateLimitModes)[number];

export type RateLimitPolicy = {
  maxCalls: number;
  periodMs: number;
  /** `wait` sleeps until a slot frees up, `reject` fails the admission immediately. */
  onLimit: RateLimitMode;
};

export type RateLimitRejection = {
  code: "rate_limited";
  message: string;
  retryAfterMs: number;
};

export type RateLimiterSnapshot = {
  name: string;
  maxCalls: number;
  periodMs: number;
  onLimit: RateLimitMode;
  inWindow: number;
};

/**
 * Caps admissions per trailing window for one wrapped operation.
 */
export class SlidingWindowRateLimiter {
  private readonly admitted: number[] = [];
  private readonly mutex = new AsyncMutex();
  private readonly log: Logger;

  constructor(
    readonly name: string,
    private readonly policy: RateLimitPolicy,
    private readonly clock: ClockPort = new SystemClock(),
    private readonly sleeper: SleepPort = new SystemSleep(),
    log: Logger = rootLogger,
  ) {
    if (!Number.isInteger(policy.maxCalls) || policy.maxCalls < 1) {
      throw new RangeError(
        `maxCalls must be a positive integer, got ${policy.maxCalls}.`,
      );
    }

    if (!(policy.periodMs > 0)) {
      throw new RangeError(`periodMs must be positive, got ${policy.periodMs}.`);
    }

    this.log = log.child({ limiter: name });
  }

  /**
   * Admits one call, waiting or rejecting per policy once the window is full.
   */
  async admit(): Promise<Result<void, RateLimitRejection>> {
    return this.mutex.runExclusive(async () => {
      let now = this.nowMs();
      this.prune(now);

      while (this.admitted.length >= this.policy.maxCalls) {
        const waitMs = this.msUntilSlotFrees(now);

        if (this.policy.onLimit === "reject") {
          this.log.warn(
            { retryAfterMs: waitMs, maxCalls: this.policy.maxCalls },
            "Rate limit reached; rejecting call",
          );
          return err({
            code: "rate_limited",
            message: `Rate limit of ${this.policy.maxCalls} calls per ${this.policy.periodMs} ms reached for ${this.name}.`,
            retryAfterMs: waitMs,
          });
        }

        this.log.warn(
          { waitMs, maxCalls: this.policy.maxCalls },
          "Rate limit reached; waiting for a free slot",
        );
        await this.sleeper.sleep(waitMs);
        now = this.nowMs();
        this.prune(now);
      }

      this.admitted.push(now);
      return ok(undefined);
    });
  }

  snapshot(): RateLimiterSnapshot {
    this.prune(this.nowMs());
    return {
      name: this.name,
      maxCalls: this.policy.maxCalls,
      periodMs: this.policy.periodMs,
      onLimit: this.policy.onLimit,
      inWindow: this.admitted.length,
    };
  }

  private nowMs(): number {
    return this.clock.now().getTime();
  }

  private prune(now: number): void {
    const threshold = now - this.policy.periodMs;
    let expired = 0;
    while (expired < this.admitted.length) {
      const timestamp = this.admitted[expired];
      if (timestamp === undefined || timestamp > threshold) {
        break;
      }
      expired += 1;
    }

    if (expired > 0) {
      this.admitted.splice(0, expired);
    }
  }

  private msUntilSlotFrees(now: number): number {
    const oldest = this.admitted[0] ?? now;
    // Timer granularity can wake us a hair early; never ask for a zero-length wait.
    return Math.max(oldest + this.policy.periodMs - now, 1);
  }
}
