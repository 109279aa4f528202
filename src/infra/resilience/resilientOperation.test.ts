import { err, ok, type Result } from "neverthrow";
import { describe, expect, it } from "vitest";
import type { AppBoundaryError } from "../../core/entities/appError";
import { createCaptureLogger } from "../../__tests__/support/captureLogger";
import { FakeTime } from "../../__tests__/support/fakeTime";
import { testProfile } from "../../__tests__/support/profiles";
import {
  ResilientOperation,
  type ResilienceProfile,
} from "./resilientOperation";

const transient: AppBoundaryError = {
  source: "news",
  code: "transport_error",
  provider: "test",
  message: "socket reset",
  retryable: true,
};

const malformed: AppBoundaryError = {
  source: "news",
  code: "malformed_response",
  provider: "test",
  message: "not an object",
  retryable: false,
};

const createOperation = (profile: ResilienceProfile = testProfile()) => {
  const time = new FakeTime();
  const { log, records } = createCaptureLogger();
  const operation = new ResilientOperation<string>(
    { name: "news", source: "news", provider: "test" },
    profile,
    { clock: time, sleeper: time, logger: log },
  );
  return { operation, time, records };
};

describe("ResilientOperation", () => {
  it("retries retryable failures and caches the eventual success", async () => {
    const { operation, time } = createOperation();
    let calls = 0;
    const call = async (): Promise<Result<string, AppBoundaryError>> => {
      calls += 1;
      return calls < 2 ? err(transient) : ok(`answer-${calls}`);
    };

    const first = await operation.run(call, { cacheKey: "news?q=oil" });
    const second = await operation.run(call, { cacheKey: "news?q=oil" });

    expect(first.isOk() && first.value).toBe("answer-2");
    expect(second.isOk() && second.value).toBe("answer-2");
    expect(calls).toBe(2);
    expect(time.sleeps).toEqual([10]);
  });

  it("does not retry non-retryable failures nor cache them", async () => {
    const { operation } = createOperation();
    let calls = 0;
    const call = async (): Promise<Result<string, AppBoundaryError>> => {
      calls += 1;
      return err(malformed);
    };

    const first = await operation.run(call, { cacheKey: "k" });
    const second = await operation.run(call, { cacheKey: "k" });

    expect(first.isErr() && first.error).toBe(malformed);
    expect(second.isErr()).toBe(true);
    expect(calls).toBe(2);
  });

  it("returns the last error after retries are exhausted", async () => {
    const { operation, time } = createOperation();
    let calls = 0;
    const call = async (): Promise<Result<string, AppBoundaryError>> => {
      calls += 1;
      return err({ ...transient, message: `attempt ${calls}` });
    };

    const result = await operation.run(call);

    expect(calls).toBe(3);
    expect(time.sleeps).toEqual([10, 20]);
    expect(result.isErr() && result.error.message).toBe("attempt 3");
  });

  it("shares one in-flight fetch between concurrent callers of the same key", async () => {
    const { operation } = createOperation();
    let calls = 0;
    let release: (value: Result<string, AppBoundaryError>) => void = () => {};
    const call = () => {
      calls += 1;
      return new Promise<Result<string, AppBoundaryError>>((resolve) => {
        release = resolve;
      });
    };

    const first = operation.run(call, { cacheKey: "same" });
    const second = operation.run(call, { cacheKey: "same" });
    await new Promise((resolve) => setTimeout(resolve, 0));
    release(ok("shared"));

    const results = await Promise.all([first, second]);

    expect(calls).toBe(1);
    expect(results.map((result) => result.isOk() && result.value)).toEqual([
      "shared",
      "shared",
    ]);
    expect(operation.snapshot().inFlight).toBe(0);
  });

  it("skips the cache when the operation has no cache configured", async () => {
    const { operation } = createOperation(testProfile({ cache: undefined }));
    let calls = 0;
    const call = async (): Promise<Result<string, AppBoundaryError>> => {
      calls += 1;
      return ok("fresh");
    };

    await operation.run(call, { cacheKey: "k" });
    await operation.run(call, { cacheKey: "k" });

    expect(calls).toBe(2);
    expect(operation.snapshot().cache).toBeUndefined();
  });

  it("maps a rate-limit rejection to a retryable boundary error without calling out", async () => {
    const { operation } = createOperation(
      testProfile({
        rateLimit: { maxCalls: 1, periodMs: 60_000, onLimit: "reject" },
        cache: undefined,
      }),
    );
    let calls = 0;
    const call = async (): Promise<Result<string, AppBoundaryError>> => {
      calls += 1;
      return ok("value");
    };

    await operation.run(call);
    const rejected = await operation.run(call);

    expect(calls).toBe(1);
    expect(rejected.isErr()).toBe(true);
    if (rejected.isOk()) {
      throw new Error("expected rejection");
    }
    expect(rejected.error).toMatchObject({
      source: "news",
      code: "rate_limited",
      provider: "test",
      retryable: true,
      cause: { retryAfterMs: 60_000 },
    });
  });

  it("admits every logical call once, even cache hits", async () => {
    const { operation } = createOperation();
    const call = async (): Promise<Result<string, AppBoundaryError>> =>
      ok("value");

    await operation.run(call, { cacheKey: "k" });
    await operation.run(call, { cacheKey: "k" });

    expect(operation.snapshot().limiter.inWindow).toBe(2);
    expect(operation.snapshot().cache?.size).toBe(1);
  });
});
