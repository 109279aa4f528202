import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { ConversationTurnEntity } from "../entities/conversation";
import type { InsightEntity, InsightMatch } from "../entities/insight";
import type { NewsQuery } from "../entities/news";
import type { StockQuoteSeries } from "../entities/quote";

export type LlmCompletionRequest = {
  prompt: string;
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  stop?: string[];
};

export type LlmTokenUsage = {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
};

export type LlmCompletion = {
  text: string;
  model: string;
  usage?: LlmTokenUsage;
};

export interface LlmPort {
  /**
   * Reports missing credentials without any network call, so callers can fail before doing other work.
   */
  configurationError(): AppBoundaryError | undefined;
  complete(
    request: LlmCompletionRequest,
  ): Promise<Result<LlmCompletion, AppBoundaryError>>;
}

export interface NewsSearchPort {
  /**
   * Returns the formatted news blob consumed as free-text prompt context.
   */
  fetchLatestNews(query: NewsQuery): Promise<Result<string, AppBoundaryError>>;
}

export interface StockQuotePort {
  fetchDailySeries(
    symbol: string,
  ): Promise<Result<StockQuoteSeries, AppBoundaryError>>;
}

export interface EmbeddingPort {
  embedTexts(texts: string[]): Promise<Result<number[][], AppBoundaryError>>;
}

export interface InsightRepositoryPort {
  upsertMany(
    insights: Array<InsightEntity & { embedding: number[] }>,
  ): Promise<void>;
  searchSimilar(embedding: number[], limit: number): Promise<InsightMatch[]>;
}

export interface ConversationHistoryPort {
  append(turn: ConversationTurnEntity): Promise<void>;
  listRecent(sessionId: string, limit: number): Promise<ConversationTurnEntity[]>;
}

export interface ClockPort {
  now(): Date;
}

export interface SleepPort {
  sleep(ms: number): Promise<void>;
}

export interface IdGeneratorPort {
  next(): string;
}
