import type { AdviceResult } from "../../core/entities/advice";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { InsightLibraryPort } from "../../core/ports/inboundPorts";
import type { NewsSearchPort } from "../../core/ports/outboundPorts";
import { logger as rootLogger, type Logger } from "../../shared/logger/logger";

export const NO_NEWS_PLACEHOLDER = "No news articles available.";
export const NO_INSIGHTS_PLACEHOLDER = "No self-help book insights available.";

export type ContextRequest = {
  userInput: string;
  callerContext?: string;
  newsKeywords?: string;
};

export type AssembledContext = {
  text: string;
  sources: AdviceResult["contextSources"];
};

export type ContextAssemblyOptions = {
  numArticles: number;
  maxAgeHours: number;
  insightLimit: number;
};

type SourceOutcome = {
  text: string;
  status: AdviceResult["contextSources"]["news"];
};

const defaultOptions: ContextAssemblyOptions = {
  numArticles: 5,
  maxAgeHours: 24,
  insightLimit: 3,
};

/**
 * Gathers caller, news and insight context; a failing source degrades to its placeholder instead of failing the request.
 */
export class ContextAssemblyService {
  private readonly options: ContextAssemblyOptions;

  constructor(
    private readonly news: NewsSearchPort,
    private readonly insights: InsightLibraryPort | null,
    options: Partial<ContextAssemblyOptions> = {},
    private readonly log: Logger = rootLogger,
  ) {
    this.options = { ...defaultOptions, ...options };
  }

  async assemble(request: ContextRequest): Promise<AssembledContext> {
    const [news, insights] = await Promise.all([
      this.newsContext(request.newsKeywords?.trim() || request.userInput),
      this.insightContext(request.userInput),
    ]);

    const parts = [
      request.callerContext?.trim() ?? "",
      news.text,
      insights.text,
    ].filter((part) => part.length > 0);

    return {
      text: parts.join("\n\n"),
      sources: { news: news.status, insights: insights.status },
    };
  }

  private async newsContext(query: string): Promise<SourceOutcome> {
    const result = await this.news.fetchLatestNews({
      query,
      numArticles: this.options.numArticles,
      maxAgeHours: this.options.maxAgeHours,
    });

    if (result.isErr()) {
      this.logDegraded(result.error);
      return { text: NO_NEWS_PLACEHOLDER, status: "degraded" };
    }

    return { text: result.value, status: "ok" };
  }

  private async insightContext(query: string): Promise<SourceOutcome> {
    if (!this.insights) {
      return { text: NO_INSIGHTS_PLACEHOLDER, status: "skipped" };
    }

    const result = await this.insights.retrieveContext(
      query,
      this.options.insightLimit,
    );

    if (result.isErr()) {
      this.logDegraded(result.error);
      return { text: NO_INSIGHTS_PLACEHOLDER, status: "degraded" };
    }

    return {
      text: result.value || NO_INSIGHTS_PLACEHOLDER,
      status: "ok",
    };
  }

  private logDegraded(error: AppBoundaryError): void {
    this.log.warn(
      {
        source: error.source,
        provider: error.provider,
        code: error.code,
        retryable: error.retryable,
        reason: error.message,
      },
      "Context source degraded; using placeholder",
    );
  }
}
