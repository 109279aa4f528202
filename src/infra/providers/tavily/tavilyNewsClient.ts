import { err, ok, type Result } from "neverthrow";
import {
  missingCredentialError,
  type AppBoundaryError,
} from "../../../core/entities/appError";
import type {
  NewsArticle,
  NewsQuery,
  NewsSearchResult,
} from "../../../core/entities/news";
import type {
  ClockPort,
  NewsSearchPort,
} from "../../../core/ports/outboundPorts";
import { logger as rootLogger, type Logger } from "../../../shared/logger/logger";
import { toBoundaryError } from "../../http/boundaryErrors";
import { HttpJsonClient } from "../../http/httpJsonClient";
import { buildCacheKey } from "../../resilience/cacheKey";
import type { ResilientOperation } from "../../resilience/resilientOperation";
import { SystemClock } from "../../system/systemPorts";

type TavilySearchItem = {
  title?: string;
  url?: string;
  published_date?: string;
  content?: string;
};

type TavilySearchResponse = {
  answer?: unknown;
  results?: unknown;
};

export const DEFAULT_NEWS_QUERY = "latest financial news market update";
export const NO_NEWS_FOUND = "No relevant financial news found.";

export const financialNewsDomains = [
  "finance.yahoo.com",
  "bloomberg.com",
  "cnbc.com",
  "ft.com",
  "wsj.com",
  "reuters.com",
  "marketwatch.com",
  "economist.com",
  "barrons.com",
  "investing.com",
] as const;

const financialTerms = ["finance", "market", "stock", "economic", "invest"];

const MIN_ARTICLES = 1;
const MAX_ARTICLES = 10;

export type NormalizedNewsQuery = {
  query: string;
  numArticles: number;
  maxAgeHours: number;
};

export const normalizeNewsQuery = (request: NewsQuery): NormalizedNewsQuery => {
  const query = request.query?.trim() || DEFAULT_NEWS_QUERY;
  const requested = Math.trunc(request.numArticles ?? 5);

  return {
    query,
    numArticles: Math.max(MIN_ARTICLES, Math.min(requested, MAX_ARTICLES)),
    maxAgeHours: request.maxAgeHours ?? 24,
  };
};

/**
 * Steers generic queries toward market coverage; queries already naming a financial term pass through.
 */
export const withFinancialContext = (query: string): string => {
  const lowered = query.toLowerCase();
  return financialTerms.some((term) => lowered.includes(term))
    ? query
    : `${query} financial market implications`;
};

/**
 * Flattens a search result into the prompt-context text block: optional summary, then numbered articles.
 */
export const formatNewsContext = (
  result: NewsSearchResult,
  limit: number,
): string => {
  if (result.articles.length === 0) {
    return NO_NEWS_FOUND;
  }

  const sections: string[] = [];

  if (result.answer) {
    sections.push(`### Summary\n${result.answer}\n`);
  }

  result.articles.slice(0, limit).forEach((article, index) => {
    sections.push(
      `#### ${index + 1}. ${article.title}\n` +
        `**Source**: ${article.url}\n` +
        `**Date**: ${article.publishedDate}\n` +
        `${article.snippet}\n`,
    );
  });

  return sections.join("\n");
};

const stringField = (
  raw: object,
  key: keyof TavilySearchItem,
): string | undefined => {
  const value: unknown = Reflect.get(raw, key);
  return typeof value === "string" ? value : undefined;
};

const toArticle = (raw: unknown): NewsArticle | null => {
  if (!raw || typeof raw !== "object") {
    return null;
  }

  return {
    title: stringField(raw, "title")?.trim() || "Untitled",
    url: stringField(raw, "url") ?? "",
    publishedDate: stringField(raw, "published_date") ?? "",
    snippet: stringField(raw, "content") ?? "",
  };
};

/**
 * Searches recent coverage on financial outlets through Tavily and renders it as prompt context.
 */
export class TavilyNewsClient implements NewsSearchPort {
  private readonly log: Logger;

  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    private readonly operation: ResilientOperation<NewsSearchResult>,
    private readonly timeoutMs = 10_000,
    private readonly clock: ClockPort = new SystemClock(),
    private readonly httpClient = new HttpJsonClient(),
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ provider: "tavily" });
  }

  async fetchLatestNews(
    request: NewsQuery,
  ): Promise<Result<string, AppBoundaryError>> {
    if (!this.apiKey.trim()) {
      return err(missingCredentialError("news", "tavily", "TAVILY_API_KEY"));
    }

    const normalized = normalizeNewsQuery(request);
    const cacheKey = buildCacheKey("tavily-news", {
      query: normalized.query,
      numArticles: normalized.numArticles,
      maxAgeHours: normalized.maxAgeHours,
    });

    const result = await this.operation.run(() => this.search(normalized), {
      cacheKey,
    });

    return result.map((value) =>
      formatNewsContext(value, normalized.numArticles),
    );
  }

  private async search(
    request: NormalizedNewsQuery,
  ): Promise<Result<NewsSearchResult, AppBoundaryError>> {
    const searchQuery = withFinancialContext(request.query);
    const startDate = new Date(
      this.clock.now().getTime() - request.maxAgeHours * 60 * 60 * 1000,
    )
      .toISOString()
      .slice(0, 10);

    this.log.info({ query: searchQuery, startDate }, "Fetching news");

    const response = await this.httpClient.requestJson<TavilySearchResponse>({
      url: new URL("/search", this.baseUrl).toString(),
      method: "POST",
      headers: { "content-type": "application/json" },
      body: {
        api_key: this.apiKey,
        query: searchQuery,
        search_depth: "advanced",
        include_domains: financialNewsDomains,
        max_results: request.numArticles,
        include_answer: true,
        include_images: false,
        include_raw_content: false,
        start_date: startDate,
      },
      timeoutMs: this.timeoutMs,
    });

    if (response.isErr()) {
      this.log.error(
        {
          httpStatus: response.error.httpStatus,
          details: response.error.responseBody,
        },
        `Error fetching news: ${response.error.message}`,
      );
      return err(toBoundaryError("news", "tavily", response.error));
    }

    const payload = response.value;
    if (!payload || typeof payload !== "object") {
      return err({
        source: "news",
        code: "malformed_response",
        provider: "tavily",
        message: "Tavily search response was not an object.",
        retryable: false,
      });
    }

    const rawResults = payload.results ?? [];
    if (!Array.isArray(rawResults)) {
      return err({
        source: "news",
        code: "malformed_response",
        provider: "tavily",
        message: "Tavily search results were not an array.",
        retryable: false,
      });
    }

    const articles = rawResults
      .map(toArticle)
      .filter((article): article is NewsArticle => article !== null);

    if (articles.length === 0) {
      this.log.warn({ query: searchQuery }, "No news results found");
    } else {
      this.log.info({ count: articles.length }, "Fetched news articles");
    }

    const answer =
      typeof payload.answer === "string" ? payload.answer.trim() : undefined;
    return ok({ answer: answer || undefined, articles });
  }
}
