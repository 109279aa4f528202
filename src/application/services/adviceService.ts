import { err, ok, ResultAsync, type Result } from "neverthrow";
import { z } from "zod";
import type {
  AdviceCategory,
  AdviceFailure,
  AdviceRequest,
  AdviceResult,
} from "../../core/entities/advice";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { ConversationTurnEntity } from "../../core/entities/conversation";
import type { AdvicePort } from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  ConversationHistoryPort,
  IdGeneratorPort,
  LlmPort,
} from "../../core/ports/outboundPorts";
import { toErrorDetails } from "../../shared/errors/errorDetails";
import { logger as rootLogger, type Logger } from "../../shared/logger/logger";
import {
  ADVISOR_SYSTEM_PROMPT,
  buildAdvicePrompt,
} from "../prompts/adviceTemplates";
import type { ContextAssemblyService } from "./contextAssemblyService";

export const NO_HISTORY_PLACEHOLDER = "No previous conversation.";

export const fallbackAdviceText = (category: AdviceCategory): string =>
  `Sorry, I encountered an error while generating ${category} advice. Please try again.`;

const scriptBlockPattern = /<script\b[^>]*>[\s\S]*?<\/script\s*>/gi;

const htmlEscapes: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#x27;",
};

/**
 * Drops script blocks, HTML-escapes the remainder and trims it.
 */
export const sanitizeText = (value: string): string =>
  value
    .replace(scriptBlockPattern, "")
    .replace(/[&<>"']/g, (char) => htmlEscapes[char] ?? char)
    .trim();

const optionalText = z.string().transform(sanitizeText).optional();
const requiredText = z
  .string()
  .transform(sanitizeText)
  .pipe(z.string().min(1, "must not be empty"));

const requestBase = {
  userInput: requiredText,
  context: optionalText,
  newsKeywords: optionalText,
  sessionId: z.string().trim().min(1).max(128).optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().max(8_192).optional(),
};

export const adviceRequestSchema = z.discriminatedUnion("category", [
  z.object({ ...requestBase, category: z.literal("generic") }),
  z.object({
    ...requestBase,
    category: z.literal("portfolio"),
    portfolioDetails: requiredText,
  }),
  z.object({
    ...requestBase,
    category: z.literal("domain"),
    domainDetails: requiredText,
    domainType: optionalText,
  }),
]);

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) =>
    issue.path.length > 0
      ? `${issue.path.join(".")}: ${issue.message}`
      : issue.message,
  );

const renderHistory = (turns: ConversationTurnEntity[]): string =>
  turns.length === 0
    ? NO_HISTORY_PLACEHOLDER
    : turns
        .map((turn) => `User: ${turn.userInput}\nAdvisor: ${turn.response}`)
        .join("\n\n");

export type AdviceServiceOptions = {
  historyTurns: number;
};

/**
 * Validates a request, assembles its context, renders the category template and asks the LLM for advice.
 */
export class AdviceService implements AdvicePort {
  constructor(
    private readonly llm: LlmPort,
    private readonly contextAssembly: ContextAssemblyService,
    private readonly history: ConversationHistoryPort,
    private readonly clock: ClockPort,
    private readonly ids: IdGeneratorPort,
    private readonly options: AdviceServiceOptions = { historyTurns: 5 },
    private readonly log: Logger = rootLogger,
  ) {}

  async getAdvice(
    input: unknown,
  ): Promise<Result<AdviceResult, AdviceFailure>> {
    const parsed = adviceRequestSchema.safeParse(input);
    if (!parsed.success) {
      const issues = formatIssues(parsed.error);
      this.log.warn({ issues }, "Rejected invalid advice request");
      return err({
        kind: "validation",
        httpStatus: 400,
        message: "Invalid advice request.",
        issues,
      });
    }

    const request: AdviceRequest = parsed.data;

    const configError = this.llm.configurationError();
    if (configError) {
      this.logFailure(request.category, configError);
      return err(this.configurationFailure(configError));
    }

    const [context, previousTurns] = await Promise.all([
      this.contextAssembly.assemble({
        userInput: request.userInput,
        callerContext: request.context,
        newsKeywords: request.newsKeywords,
      }),
      this.loadHistory(request.sessionId),
    ]);

    const prompt = buildAdvicePrompt(request, {
      context: context.text,
      history: renderHistory(previousTurns),
    });

    const completion = await this.llm.complete({
      prompt,
      systemPrompt: ADVISOR_SYSTEM_PROMPT,
      temperature: request.temperature,
      maxTokens: request.maxTokens,
    });

    if (completion.isErr()) {
      return this.handleLlmFailure(
        request.category,
        completion.error,
        context.sources,
      );
    }

    if (request.sessionId) {
      await this.appendTurn({
        id: this.ids.next(),
        sessionId: request.sessionId,
        category: request.category,
        userInput: request.userInput,
        response: completion.value.text,
        createdAt: this.clock.now(),
      });
    }

    this.log.info(
      {
        category: request.category,
        model: completion.value.model,
        contextSources: context.sources,
      },
      "Advice generated",
    );

    return ok({
      category: request.category,
      advice: completion.value.text,
      degraded: false,
      model: completion.value.model,
      contextSources: context.sources,
    });
  }

  /**
   * Transient failures degrade to the apology text; configuration and hard upstream failures surface as typed errors.
   */
  private handleLlmFailure(
    category: AdviceCategory,
    error: AppBoundaryError,
    contextSources: AdviceResult["contextSources"],
  ): Result<AdviceResult, AdviceFailure> {
    this.logFailure(category, error);

    if (error.code === "config_invalid") {
      return err(this.configurationFailure(error));
    }

    if (!error.retryable) {
      return err({
        kind: "upstream",
        httpStatus: 502,
        message: `LLM provider ${error.provider} failed: ${error.message}`,
        cause: error,
      });
    }

    return ok({
      category,
      advice: fallbackAdviceText(category),
      degraded: true,
      contextSources,
    });
  }

  private logFailure(category: AdviceCategory, error: AppBoundaryError): void {
    this.log.error(
      {
        category,
        source: error.source,
        provider: error.provider,
        code: error.code,
        retryable: error.retryable,
        httpStatus: error.httpStatus,
        reason: error.message,
      },
      "Advice generation failed",
    );
  }

  private configurationFailure(error: AppBoundaryError): AdviceFailure {
    return {
      kind: "configuration",
      httpStatus: 500,
      message: error.message,
      cause: error,
    };
  }

  private async loadHistory(
    sessionId: string | undefined,
  ): Promise<ConversationTurnEntity[]> {
    if (!sessionId || this.options.historyTurns === 0) {
      return [];
    }

    const turns = await ResultAsync.fromPromise(
      this.history.listRecent(sessionId, this.options.historyTurns),
      toErrorDetails,
    );

    if (turns.isErr()) {
      this.log.warn(
        { sessionId, error: turns.error },
        "Conversation history unavailable; continuing without it",
      );
      return [];
    }

    return turns.value;
  }

  private async appendTurn(turn: ConversationTurnEntity): Promise<void> {
    const appended = await ResultAsync.fromPromise(
      this.history.append(turn),
      toErrorDetails,
    );

    if (appended.isErr()) {
      this.log.warn(
        { sessionId: turn.sessionId, error: appended.error },
        "Failed to record conversation turn",
      );
    }
  }
}
