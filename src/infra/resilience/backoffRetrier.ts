import type { Result } from "neverthrow";
import type { SleepPort } from "../../core/ports/outboundPorts";
import { describeFailure } from "../../shared/errors/errorDetails";
import { logger as rootLogger, type Logger } from "../../shared/logger/logger";
import { SystemSleep } from "../system/systemPorts";

export type RetryPolicy = {
  /** Retries after the first attempt; 0 means a single attempt. */
  maxRetries: number;
  initialDelayMs: number;
  /** Multiplier applied to the delay after every failed attempt. */
  backoffFactor: number;
};

export type RetryOptions<E> = {
  /** Defaults to retrying every failure. */
  shouldRetry?: (error: E, attempt: number) => boolean;
};

export const assertRetryPolicy = (policy: RetryPolicy): void => {
  if (!Number.isInteger(policy.maxRetries) || policy.maxRetries < 0) {
    throw new RangeError(
      `maxRetries must be a non-negative integer, got ${policy.maxRetries}.`,
    );
  }

  if (!(policy.initialDelayMs > 0)) {
    throw new RangeError(
      `initialDelayMs must be positive, got ${policy.initialDelayMs}.`,
    );
  }

  if (!(policy.backoffFactor >= 1)) {
    throw new RangeError(
      `backoffFactor must be at least 1, got ${policy.backoffFactor}.`,
    );
  }
};

/**
 * Delay slept before attempt `attempt + 1`, for a 1-based failed `attempt`.
 */
export const backoffDelayMs = (policy: RetryPolicy, attempt: number): number =>
  policy.initialDelayMs * policy.backoffFactor ** (attempt - 1);

/**
 * Re-runs a fallible async operation with exponential backoff and hands back the last failure untouched.
 */
export class BackoffRetrier {
  private readonly log: Logger;

  constructor(
    private readonly policy: RetryPolicy,
    private readonly sleeper: SleepPort = new SystemSleep(),
    log: Logger = rootLogger,
  ) {
    assertRetryPolicy(policy);
    this.log = log;
  }

  get maxAttempts(): number {
    return this.policy.maxRetries + 1;
  }

  async execute<T, E>(
    operation: () => Promise<Result<T, E>>,
    options: RetryOptions<E> = {},
  ): Promise<Result<T, E>> {
    const shouldRetry = options.shouldRetry ?? (() => true);
    const maxAttempts = this.maxAttempts;
    let attempt = 1;

    for (;;) {
      const result = await operation();

      if (result.isOk()) {
        this.log.info({ attempt, maxAttempts }, "Outbound call succeeded");
        return result;
      }

      const failure = result.error;
      const hasAttemptsLeft = attempt < maxAttempts;

      if (!hasAttemptsLeft) {
        this.log.error(
          { attempt, maxAttempts, error: describeFailure(failure) },
          "Outbound call exhausted retries",
        );
        return result;
      }

      if (!shouldRetry(failure, attempt)) {
        this.log.error(
          { attempt, maxAttempts, error: describeFailure(failure) },
          "Outbound call failed with a non-retryable error",
        );
        return result;
      }

      const delayMs = backoffDelayMs(this.policy, attempt);
      this.log.warn(
        { attempt, maxAttempts, delayMs, error: describeFailure(failure) },
        "Outbound attempt failed; retrying",
      );

      await this.sleeper.sleep(delayMs);
      attempt += 1;
    }
  }
}
