import { afterEach, describe, expect, it, vi } from "vitest";
import type { LlmCompletion } from "../../core/ports/outboundPorts";
import {
  createCaptureLogger,
  LEVEL,
} from "../../__tests__/support/captureLogger";
import { FakeTime } from "../../__tests__/support/fakeTime";
import {
  jsonResponse,
  readJsonBody,
  setFetch,
} from "../../__tests__/support/fetchStub";
import { testProfile } from "../../__tests__/support/profiles";
import { HttpJsonClient } from "../http/httpJsonClient";
import { ResilientOperation } from "../resilience/resilientOperation";
import { GroqLlm } from "./groqLlm";

afterEach(() => {
  vi.restoreAllMocks();
});

const createLlm = (apiKey = "test-secret") => {
  const time = new FakeTime();
  const { log, records } = createCaptureLogger();
  const operation = new ResilientOperation<LlmCompletion>(
    { name: "llm", source: "llm", provider: "groq" },
    testProfile({ cache: undefined }),
    { clock: time, sleeper: time, logger: log },
  );
  const llm = new GroqLlm(
    {
      baseUrl: "https://api.groq.test",
      apiKey,
      model: "llama-3.3-70b-versatile",
      temperature: 0.7,
      maxTokens: 1024,
      timeoutMs: 5_000,
    },
    operation,
    new HttpJsonClient(),
    log,
  );
  return { llm, records, time };
};

const completion = (content: string) =>
  jsonResponse({
    model: "llama-3.3-70b-versatile",
    choices: [{ message: { content } }],
    usage: { prompt_tokens: 12, completion_tokens: 30, total_tokens: 42 },
  });

describe("GroqLlm", () => {
  it("returns a configuration error without any HTTP call when the key is missing", async () => {
    const fetchMock = setFetch(async () => completion("unused"));

    const { llm } = createLlm("");
    const result = await llm.complete({ prompt: "Should I rebalance?" });

    expect(fetchMock).not.toHaveBeenCalled();
    expect(result.isErr() && result.error).toMatchObject({
      code: "config_invalid",
      message: "GROQ_API_KEY environment variable is not set.",
      retryable: false,
    });
  });

  it("sends system and user messages with bearer auth and returns the content", async () => {
    let requestedUrl = "";
    let headers: unknown;
    let body: unknown;
    setFetch(async (input, init) => {
      requestedUrl = String(input);
      headers = init?.headers;
      body = readJsonBody(init);
      return completion("  Diversify gradually.  ");
    });

    const { llm, records } = createLlm();
    const result = await llm.complete({
      prompt: "Should I rebalance?",
      systemPrompt: "Be careful.",
      temperature: 0.2,
    });

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    expect(result.value).toEqual({
      text: "Diversify gradually.",
      model: "llama-3.3-70b-versatile",
      usage: { promptTokens: 12, completionTokens: 30, totalTokens: 42 },
    });
    expect(requestedUrl).toBe(
      "https://api.groq.test/openai/v1/chat/completions",
    );
    expect(headers).toMatchObject({ authorization: "Bearer test-secret" });
    expect(body).toEqual({
      model: "llama-3.3-70b-versatile",
      messages: [
        { role: "system", content: "Be careful." },
        { role: "user", content: "Should I rebalance?" },
      ],
      max_tokens: 1024,
      temperature: 0.2,
    });
    expect(
      records.find((record) => record.msg === "Groq token usage"),
    ).toMatchObject({ level: LEVEL.info, totalTokens: 42 });
  });

  it("includes stop sequences only when some are given", async () => {
    const bodies: unknown[] = [];
    setFetch(async (_input, init) => {
      bodies.push(readJsonBody(init));
      return completion("ok");
    });

    const { llm } = createLlm();
    await llm.complete({ prompt: "a", stop: [] });
    await llm.complete({ prompt: "b", stop: ["\n\n"] });

    expect(bodies[0]).not.toHaveProperty("stop");
    expect(bodies[1]).toMatchObject({ stop: ["\n\n"] });
  });

  it("treats empty content as a malformed response without retrying", async () => {
    const fetchMock = setFetch(async () => completion("   "));

    const { llm } = createLlm();
    const result = await llm.complete({ prompt: "Hello" });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(result.isErr() && result.error.code).toBe("malformed_response");
  });

  it.each([
    ["a null body", null],
    ["non-text content", { choices: [{ message: { content: 7 } }], usage: null }],
  ])("treats %s as a malformed response", async (_label, payload) => {
    const fetchMock = setFetch(async () => jsonResponse(payload));

    const { llm } = createLlm();
    const result = await llm.complete({ prompt: "Hello" });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(result.isErr() && result.error).toMatchObject({
      code: "malformed_response",
      provider: "groq",
      retryable: false,
    });
  });

  it("does not retry a rejected credential", async () => {
    const fetchMock = setFetch(async () =>
      jsonResponse({ error: { message: "Invalid API Key" } }, 401),
    );

    const { llm, time } = createLlm();
    const result = await llm.complete({ prompt: "Hello" });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(time.sleeps).toEqual([]);
    expect(result.isErr() && result.error).toMatchObject({
      code: "auth_invalid",
      httpStatus: 401,
      retryable: false,
    });
  });

  it("retries transient failures and succeeds on a later attempt", async () => {
    let calls = 0;
    setFetch(async () => {
      calls += 1;
      if (calls === 1) {
        throw new TypeError("fetch failed");
      }
      return completion("Second time lucky.");
    });

    const { llm, time } = createLlm();
    const result = await llm.complete({ prompt: "Hello" });

    expect(calls).toBe(2);
    expect(time.sleeps).toEqual([10]);
    expect(result.isOk() && result.value.text).toBe("Second time lucky.");
  });
});
