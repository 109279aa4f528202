import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { NewsQuery } from "../../core/entities/news";
import type { InsightLibraryPort } from "../../core/ports/inboundPorts";
import type {
  LlmCompletion,
  LlmCompletionRequest,
  LlmPort,
  NewsSearchPort,
} from "../../core/ports/outboundPorts";

export const boundaryError = (
  overrides: Partial<AppBoundaryError> = {},
): AppBoundaryError => ({
  source: "llm",
  code: "transport_error",
  provider: "groq",
  message: "socket reset",
  retryable: true,
  ...overrides,
});

export class FakeLlm implements LlmPort {
  readonly requests: LlmCompletionRequest[] = [];

  constructor(
    private readonly outcome: Result<LlmCompletion, AppBoundaryError> = ok({
      text: "Build an emergency fund first.",
      model: "test-model",
    }),
    private readonly missingCredential?: AppBoundaryError,
  ) {}

  configurationError(): AppBoundaryError | undefined {
    return this.missingCredential;
  }

  async complete(
    request: LlmCompletionRequest,
  ): Promise<Result<LlmCompletion, AppBoundaryError>> {
    this.requests.push(request);
    return this.outcome;
  }
}

export class FakeNews implements NewsSearchPort {
  readonly queries: NewsQuery[] = [];

  constructor(
    private readonly outcome: Result<string, AppBoundaryError> = ok(
      "#### 1. Rates hold",
    ),
  ) {}

  async fetchLatestNews(
    query: NewsQuery,
  ): Promise<Result<string, AppBoundaryError>> {
    this.queries.push(query);
    return this.outcome;
  }
}

export class FakeInsights implements InsightLibraryPort {
  readonly queries: string[] = [];

  constructor(
    private readonly outcome: Result<string, AppBoundaryError> = ok(
      "Self-Help Book Learnings:\n- Pay yourself first.",
    ),
  ) {}

  async addInsights(): Promise<Result<number, AppBoundaryError>> {
    return err(boundaryError({ source: "insights", code: "storage_error" }));
  }

  async retrieveContext(
    query: string,
  ): Promise<Result<string, AppBoundaryError>> {
    this.queries.push(query);
    return this.outcome;
  }
}

export class SequentialIds {
  private counter = 0;

  constructor(private readonly prefix = "id") {}

  next(): string {
    this.counter += 1;
    return `${this.prefix}-${this.counter}`;
  }
}
