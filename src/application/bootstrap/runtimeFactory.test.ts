import { afterEach, describe, expect, it, vi } from "vitest";
import { parseEnv } from "../../shared/config/env";
import { createCaptureLogger } from "../../__tests__/support/captureLogger";
import { FakeTime } from "../../__tests__/support/fakeTime";
import { jsonResponse, setFetch } from "../../__tests__/support/fetchStub";
import { createRuntime } from "./runtimeFactory";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createRuntime", () => {
  it("reports a configuration failure without any network call when keys are missing", async () => {
    const fetchMock = setFetch(async () => jsonResponse({}));
    const time = new FakeTime();
    const { log } = createCaptureLogger();

    const runtime = createRuntime(parseEnv({ NODE_ENV: "test" }), {
      clock: time,
      sleeper: time,
      logger: log,
    });
    const result = await runtime.advice.getAdvice({
      category: "generic",
      userInput: "How much should I save?",
    });
    await runtime.close();

    expect(fetchMock).not.toHaveBeenCalled();
    expect(result.isErr() && result.error).toMatchObject({
      kind: "configuration",
      httpStatus: 500,
      message: "GROQ_API_KEY environment variable is not set.",
    });
    expect(runtime.insights).toBeNull();
  });

  it("skips the news call when only the LLM key is missing", async () => {
    const fetchMock = setFetch(async () => jsonResponse({ results: [] }));
    const time = new FakeTime();
    const { log } = createCaptureLogger();

    const runtime = createRuntime(
      parseEnv({ NODE_ENV: "test", TAVILY_API_KEY: "test-secret" }),
      { clock: time, sleeper: time, logger: log },
    );
    const result = await runtime.advice.getAdvice({
      category: "generic",
      userInput: "How much should I save?",
    });
    await runtime.close();

    expect(fetchMock).not.toHaveBeenCalled();
    expect(result.isErr() && result.error.kind).toBe("configuration");
    expect(
      runtime.snapshots().find((snapshot) => snapshot.name === "news")?.limiter
        .inWindow,
    ).toBe(0);
  });

  it("exposes one limiter and cache snapshot per operation", () => {
    const runtime = createRuntime(parseEnv({ NODE_ENV: "test" }));

    expect(
      runtime.snapshots().map((snapshot) => ({
        name: snapshot.name,
        onLimit: snapshot.limiter.onLimit,
        cached: snapshot.cache !== undefined,
      })),
    ).toEqual([
      { name: "news", onLimit: "wait", cached: true },
      { name: "llm", onLimit: "wait", cached: false },
      { name: "quote", onLimit: "reject", cached: true },
      { name: "embed", onLimit: "wait", cached: true },
    ]);
  });
});
