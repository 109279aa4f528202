import { err, ok, type Result } from "neverthrow";
import type {
  AppBoundaryError,
  AppBoundarySource,
} from "../../core/entities/appError";
import type { ClockPort, SleepPort } from "../../core/ports/outboundPorts";
import { logger as rootLogger, type Logger } from "../../shared/logger/logger";
import { SystemClock, SystemSleep } from "../system/systemPorts";
import { BackoffRetrier, type RetryPolicy } from "./backoffRetrier";
import {
  ResponseCache,
  type ResponseCacheSnapshot,
} from "./responseCache";
import {
  SlidingWindowRateLimiter,
  type RateLimitPolicy,
  type RateLimiterSnapshot,
} from "./slidingWindowRateLimiter";

/**
 * Per-operation tuning; `cache` is absent for operations whose answers must not be reused.
 */
export type ResilienceProfile = {
  retry: RetryPolicy;
  rateLimit: RateLimitPolicy;
  cache?: {
    ttlMs: number;
    maxEntries: number;
  };
};

export type OperationIdentity = {
  name: string;
  source: AppBoundarySource;
  provider: string;
};

export type ResilientOperationDeps = {
  clock?: ClockPort;
  sleeper?: SleepPort;
  logger?: Logger;
};

export type OperationSnapshot = {
  name: string;
  limiter: RateLimiterSnapshot;
  cache?: ResponseCacheSnapshot;
  inFlight: number;
};

type RunOptions = {
  /** Enables cache lookup/store and same-key sharing of in-flight fetches. */
  cacheKey?: string;
};

/**
 * Owns the limiter, retrier and cache of one outbound operation and applies them in a fixed order:
 * admission, cache lookup, backoff-wrapped call, cache store.
 */
export class ResilientOperation<T> {
  private readonly limiter: SlidingWindowRateLimiter;
  private readonly retrier: BackoffRetrier;
  private readonly cache?: ResponseCache<T>;
  private readonly inFlight = new Map<
    string,
    Promise<Result<T, AppBoundaryError>>
  >();
  private readonly log: Logger;

  constructor(
    private readonly identity: OperationIdentity,
    profile: ResilienceProfile,
    deps: ResilientOperationDeps = {},
  ) {
    const clock = deps.clock ?? new SystemClock();
    const sleeper = deps.sleeper ?? new SystemSleep();
    this.log = (deps.logger ?? rootLogger).child({ operation: identity.name });

    this.limiter = new SlidingWindowRateLimiter(
      identity.name,
      profile.rateLimit,
      clock,
      sleeper,
      this.log,
    );
    this.retrier = new BackoffRetrier(profile.retry, sleeper, this.log);

    if (profile.cache) {
      this.cache = new ResponseCache<T>(
        identity.name,
        {
          defaultTtlMs: profile.cache.ttlMs,
          maxEntries: profile.cache.maxEntries,
        },
        clock,
      );
    }
  }

  async run(
    call: () => Promise<Result<T, AppBoundaryError>>,
    options: RunOptions = {},
  ): Promise<Result<T, AppBoundaryError>> {
    const admission = await this.limiter.admit();
    if (admission.isErr()) {
      return err({
        source: this.identity.source,
        code: "rate_limited",
        provider: this.identity.provider,
        message: admission.error.message,
        retryable: true,
        cause: { retryAfterMs: admission.error.retryAfterMs },
      });
    }

    const cacheKey = this.cache ? options.cacheKey : undefined;
    if (cacheKey === undefined) {
      return this.callWithRetry(call);
    }

    const cached = this.cache?.get(cacheKey);
    if (cached !== undefined) {
      this.log.debug({ cacheKey }, "Serving cached response");
      return ok(cached);
    }

    const pending = this.inFlight.get(cacheKey);
    if (pending) {
      this.log.debug({ cacheKey }, "Joining in-flight request");
      return pending;
    }

    const request = this.callWithRetry(call)
      .then((result) => {
        if (result.isOk()) {
          this.cache?.set(cacheKey, result.value);
        }
        return result;
      })
      .finally(() => {
        this.inFlight.delete(cacheKey);
      });

    this.inFlight.set(cacheKey, request);
    return request;
  }

  snapshot(): OperationSnapshot {
    return {
      name: this.identity.name,
      limiter: this.limiter.snapshot(),
      cache: this.cache?.snapshot(),
      inFlight: this.inFlight.size,
    };
  }

  private callWithRetry(
    call: () => Promise<Result<T, AppBoundaryError>>,
  ): Promise<Result<T, AppBoundaryError>> {
    return this.retrier.execute(call, {
      shouldRetry: (error) => error.retryable,
    });
  }
}
