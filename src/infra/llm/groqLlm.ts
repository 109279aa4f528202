import { err, ok, type Result } from "neverthrow";
import {
  missingCredentialError,
  type AppBoundaryError,
} from "../../core/entities/appError";
import type {
  LlmCompletion,
  LlmCompletionRequest,
  LlmPort,
  LlmTokenUsage,
} from "../../core/ports/outboundPorts";
import { logger as rootLogger, type Logger } from "../../shared/logger/logger";
import { toBoundaryError } from "../http/boundaryErrors";
import { HttpJsonClient } from "../http/httpJsonClient";
import type { ResilientOperation } from "../resilience/resilientOperation";

type GroqChatMessage = {
  role: "system" | "user";
  content: string;
};

type GroqChatResponse = {
  model?: unknown;
  choices?: Array<{ message?: { content?: unknown } | null } | null>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  };
};

export type GroqLlmSettings = {
  baseUrl: string;
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
};

/**
 * Calls Groq's OpenAI-compatible chat completions endpoint behind the shared resilience policy.
 */
export class GroqLlm implements LlmPort {
  private readonly log: Logger;

  constructor(
    private readonly settings: GroqLlmSettings,
    private readonly operation: ResilientOperation<LlmCompletion>,
    private readonly httpClient = new HttpJsonClient(),
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ provider: "groq" });
  }

  configurationError(): AppBoundaryError | undefined {
    return this.settings.apiKey.trim()
      ? undefined
      : missingCredentialError("llm", "groq", "GROQ_API_KEY");
  }

  async complete(
    request: LlmCompletionRequest,
  ): Promise<Result<LlmCompletion, AppBoundaryError>> {
    const configError = this.configurationError();
    if (configError) {
      return err(configError);
    }

    this.log.debug(
      { promptLength: request.prompt.length },
      "Calling Groq chat completions",
    );

    return this.operation.run(() => this.chat(request));
  }

  private async chat(
    request: LlmCompletionRequest,
  ): Promise<Result<LlmCompletion, AppBoundaryError>> {
    const messages: GroqChatMessage[] = [];
    if (request.systemPrompt) {
      messages.push({ role: "system", content: request.systemPrompt });
    }
    messages.push({ role: "user", content: request.prompt });

    const body: Record<string, unknown> = {
      model: this.settings.model,
      messages,
      max_tokens: request.maxTokens ?? this.settings.maxTokens,
      temperature: request.temperature ?? this.settings.temperature,
    };

    if (request.stop && request.stop.length > 0) {
      body.stop = request.stop;
    }

    const response = await this.httpClient.requestJson<GroqChatResponse>({
      url: new URL("/openai/v1/chat/completions", this.settings.baseUrl).toString(),
      method: "POST",
      headers: {
        "content-type": "application/json",
        authorization: `Bearer ${this.settings.apiKey}`,
      },
      body,
      timeoutMs: this.settings.timeoutMs,
    });

    if (response.isErr()) {
      this.log.error(
        {
          httpStatus: response.error.httpStatus,
          details: response.error.responseBody,
        },
        `Request error calling Groq API: ${response.error.message}`,
      );
      return err(toBoundaryError("llm", "groq", response.error));
    }

    const payload = response.value;
    if (!payload || typeof payload !== "object") {
      return err({
        source: "llm",
        code: "malformed_response",
        provider: "groq",
        message: "Groq chat payload was not an object.",
        retryable: false,
      });
    }

    const usage = this.toUsage(payload.usage);
    if (usage) {
      this.log.info(usage, "Groq token usage");
    }

    const rawContent = Array.isArray(payload.choices)
      ? payload.choices[0]?.message?.content
      : undefined;
    const content = typeof rawContent === "string" ? rawContent.trim() : "";
    if (!content) {
      return err({
        source: "llm",
        code: "malformed_response",
        provider: "groq",
        message: "Groq chat payload did not contain choices[0].message.content.",
        retryable: false,
      });
    }

    return ok({
      text: content,
      model:
        typeof payload.model === "string" ? payload.model : this.settings.model,
      usage,
    });
  }

  private toUsage(
    raw: GroqChatResponse["usage"],
  ): LlmTokenUsage | undefined {
    if (!raw || typeof raw !== "object") {
      return undefined;
    }

    return {
      promptTokens: raw.prompt_tokens ?? 0,
      completionTokens: raw.completion_tokens ?? 0,
      totalTokens: raw.total_tokens ?? 0,
    };
  }
}
