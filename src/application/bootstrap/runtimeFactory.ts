import type { InsightLibraryPort } from "../../core/ports/inboundPorts";
import type {
  ConversationHistoryPort,
  LlmCompletion,
} from "../../core/ports/outboundPorts";
import type { NewsSearchResult } from "../../core/entities/news";
import type { StockQuoteSeries } from "../../core/entities/quote";
import { createDb } from "../../infra/db/client";
import {
  PgVectorInsightRepositoryService,
  PostgresConversationHistoryRepositoryService,
} from "../../infra/db/repositories";
import { INSIGHT_VECTOR_DIMENSION } from "../../infra/db/schema";
import { HttpJsonClient } from "../../infra/http/httpJsonClient";
import { GroqLlm } from "../../infra/llm/groqLlm";
import { OllamaEmbedding } from "../../infra/llm/ollamaEmbedding";
import { InMemoryConversationHistory } from "../../infra/memory/inMemoryConversationHistory";
import { AlphaVantageQuoteClient } from "../../infra/providers/alphavantage/alphaVantageQuoteClient";
import { TavilyNewsClient } from "../../infra/providers/tavily/tavilyNewsClient";
import {
  ResilientOperation,
  type OperationSnapshot,
  type ResilientOperationDeps,
} from "../../infra/resilience/resilientOperation";
import { SystemClock, UuidIdGenerator } from "../../infra/system/systemPorts";
import {
  env,
  resilienceProfile,
  type AppEnv,
} from "../../shared/config/env";
import { logger as rootLogger } from "../../shared/logger/logger";
import { AdviceService } from "../services/adviceService";
import { ContextAssemblyService } from "../services/contextAssemblyService";
import { InsightLibraryService } from "../services/insightLibraryService";

/**
 * Centralizes runtime wiring so every entry point shares one set of limiters and caches.
 */
export const createRuntime = (
  appEnv: AppEnv = env,
  deps: ResilientOperationDeps = {},
) => {
  const clock = deps.clock ?? new SystemClock();
  const ids = new UuidIdGenerator();
  const log = deps.logger ?? rootLogger;
  const operationDeps = { ...deps, clock, logger: log };

  const newsOperation = new ResilientOperation<NewsSearchResult>(
    { name: "news", source: "news", provider: "tavily" },
    resilienceProfile("news", appEnv),
    operationDeps,
  );
  const llmOperation = new ResilientOperation<LlmCompletion>(
    { name: "llm", source: "llm", provider: "groq" },
    resilienceProfile("llm", appEnv),
    operationDeps,
  );
  const quoteOperation = new ResilientOperation<StockQuoteSeries>(
    { name: "quote", source: "quote", provider: "alphavantage" },
    resilienceProfile("quote", appEnv),
    operationDeps,
  );
  const embedOperation = new ResilientOperation<number[][]>(
    { name: "embed", source: "embedding", provider: "ollama" },
    resilienceProfile("embed", appEnv),
    operationDeps,
  );

  const news = new TavilyNewsClient(
    appEnv.TAVILY_BASE_URL,
    appEnv.TAVILY_API_KEY,
    newsOperation,
    appEnv.TAVILY_TIMEOUT_MS,
    clock,
    new HttpJsonClient(),
    log,
  );
  const llm = new GroqLlm(
    {
      baseUrl: appEnv.GROQ_BASE_URL,
      apiKey: appEnv.GROQ_API_KEY,
      model: appEnv.GROQ_MODEL,
      temperature: appEnv.LLM_TEMPERATURE,
      maxTokens: appEnv.LLM_MAX_TOKENS,
      timeoutMs: appEnv.GROQ_TIMEOUT_MS,
    },
    llmOperation,
    new HttpJsonClient(),
    log,
  );
  const quotes = new AlphaVantageQuoteClient(
    appEnv.ALPHA_VANTAGE_BASE_URL,
    appEnv.ALPHA_VANTAGE_API_KEY,
    quoteOperation,
    appEnv.ALPHA_VANTAGE_TIMEOUT_MS,
  );
  const embedder = new OllamaEmbedding(
    appEnv.OLLAMA_BASE_URL,
    appEnv.OLLAMA_EMBED_MODEL,
    INSIGHT_VECTOR_DIMENSION,
    embedOperation,
    appEnv.OLLAMA_EMBED_TIMEOUT_MS,
  );

  const needsDatabase =
    appEnv.INSIGHT_STORE === "pgvector" || appEnv.HISTORY_STORE === "postgres";
  const database = needsDatabase ? createDb(appEnv.POSTGRES_URL) : null;

  const insights: InsightLibraryPort | null =
    database && appEnv.INSIGHT_STORE === "pgvector"
      ? new InsightLibraryService(
          embedder,
          new PgVectorInsightRepositoryService(database.sql),
          clock,
          ids,
        )
      : null;

  const history: ConversationHistoryPort =
    database && appEnv.HISTORY_STORE === "postgres"
      ? new PostgresConversationHistoryRepositoryService(database.db)
      : new InMemoryConversationHistory();

  const contextAssembly = new ContextAssemblyService(
    news,
    insights,
    { insightLimit: appEnv.INSIGHT_MATCH_LIMIT },
    log,
  );
  const advice = new AdviceService(
    llm,
    contextAssembly,
    history,
    clock,
    ids,
    { historyTurns: appEnv.HISTORY_TURNS_IN_PROMPT },
    log,
  );

  return {
    advice,
    news,
    quotes,
    insights,
    snapshots: (): OperationSnapshot[] => [
      newsOperation.snapshot(),
      llmOperation.snapshot(),
      quoteOperation.snapshot(),
      embedOperation.snapshot(),
    ],
    close: async (): Promise<void> => {
      await database?.sql.end();
    },
  };
};

export type Runtime = ReturnType<typeof createRuntime>;
